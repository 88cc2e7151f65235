"use client";
import React from "react";
import { ACCEPTED_EXTENSIONS, ACCEPT_ATTRIBUTE, MAX_UPLOAD_MB } from "@/lib/config";
import { SLOTS, type Slot } from "@/lib/upload-state";
import { cn, formatBytes } from "@/lib/utils";

const SLOT_LABELS: Record<Slot, string> = {
  rubric: "Rubric",
  assignment: "Assignment",
};

export default function UploadPanel({
  files,
  canSubmit,
  submitting,
  onSelect,
  onClear,
  onSubmit,
}: {
  files: Record<Slot, File | null>;
  canSubmit: boolean;
  submitting: boolean;
  onSelect: (slot: Slot, file: File) => void;
  onClear: (slot: Slot) => void;
  onSubmit: () => void;
}) {
  return (
    <section aria-label="Upload" className="w-full max-w-xl">
      <h2 className="text-xl font-semibold mb-2">Upload Documents</h2>
      <p className="text-sm opacity-80 mb-4">
        Accepted formats: {ACCEPTED_EXTENSIONS.join(", ")} (max {MAX_UPLOAD_MB}MB each).
      </p>
      <div className="flex flex-col gap-3">
        {SLOTS.map((slot) => {
          const file = files[slot];
          return (
            <div key={slot} className="flex flex-col gap-1">
              <label htmlFor={`${slot}-input`} className="text-sm font-medium">
                {SLOT_LABELS[slot]}
              </label>
              <input
                id={`${slot}-input`}
                aria-label={`Select ${slot} file`}
                type="file"
                accept={ACCEPT_ATTRIBUTE}
                onChange={(e) => {
                  const picked = e.target.files?.[0];
                  if (picked) onSelect(slot, picked);
                  else onClear(slot);
                }}
              />
              {file ? (
                <span data-testid={`${slot}-selected`} className="text-xs opacity-70">
                  {file.name} ({formatBytes(file.size)})
                </span>
              ) : null}
            </div>
          );
        })}
        <div className="flex gap-2">
          <button
            type="button"
            className={cn(
              "rounded border px-3 py-1.5 text-sm font-medium transition bg-blue-600 text-white border-blue-600",
              !canSubmit && "opacity-50 cursor-not-allowed"
            )}
            onClick={onSubmit}
            disabled={!canSubmit}
          >
            {submitting ? "Analyzing..." : "Analyze"}
          </button>
        </div>
      </div>
    </section>
  );
}
