"use client";
import React from "react";
import UploadPanel from "@/components/UploadPanel";
import ResultsPanel from "@/components/ResultsPanel";
import { useUploadController } from "@/lib/use-upload-controller";
import { isSubmitting } from "@/lib/upload-state";

export default function Home() {
  const { controller, state } = useUploadController();
  const submitting = isSubmitting(state);

  return (
    <div className="font-sans mx-auto w-full max-w-6xl px-6 py-10 grid gap-8 md:gap-10">
      <div className="grid gap-8 md:grid-cols-2">
        <UploadPanel
          files={state.files}
          canSubmit={controller.canSubmit()}
          submitting={submitting}
          onSelect={(slot, file) => controller.selectFile(slot, file)}
          onClear={(slot) => controller.clearFile(slot)}
          onSubmit={() => void controller.submit()}
        />
        <div>
          {submitting ? <p className="text-sm">Analyzing...</p> : null}
          {state.error ? (
            <p role="alert" className="text-sm text-red-600 mb-3">
              {state.error}
            </p>
          ) : null}
          <ResultsPanel result={state.result} />
        </div>
      </div>
    </div>
  );
}
