import React from "react";
import type { AnalysisResult } from "@/lib/analysis-result";
import { renderResults, type StatusCategory } from "@/lib/render-results";
import { cn } from "@/lib/utils";

const CATEGORY_CLASSES: Record<StatusCategory, string> = {
  positive: "border-green-600 bg-green-50 text-green-900",
  warning: "border-amber-500 bg-amber-50 text-amber-900",
  negative: "border-red-600 bg-red-50 text-red-900",
  neutral: "border-gray-300",
};

export default function ResultsPanel({ result }: { result?: AnalysisResult | null }) {
  const view = React.useMemo(() => (result ? renderResults(result) : null), [result]);

  return (
    <section aria-label="Results" className="w-full max-w-xl">
      <h2 className="text-xl font-semibold mb-2">Analysis Results</h2>
      {!view ? (
        <p className="text-sm opacity-80 mb-3">Upload a rubric and an assignment to see feedback.</p>
      ) : (
        <>
          <p className="text-2xl font-bold">{view.scoreLabel}</p>
          {view.pointsLabel ? <p className="text-sm opacity-70 mb-3">{view.pointsLabel}</p> : null}

          <h3 className="text-base font-semibold mt-4 mb-2">Requirement Feedback</h3>
          <ul aria-label="Requirement feedback" className="space-y-2">
            {view.items.map((item) => (
              <li
                key={item.key}
                data-status={item.category}
                className={cn("border-l-4 rounded px-3 py-2 text-sm", CATEGORY_CLASSES[item.category])}
              >
                <div className="flex items-center justify-between gap-2">
                  <span className="font-medium">{item.requirement}</span>
                  <span className="text-xs font-semibold">{item.pointsLabel}</span>
                </div>
                <div className="text-xs uppercase tracking-wide opacity-80">{item.statusLabel}</div>
                <p className="mt-1">{item.feedback}</p>
                {item.suggestions.length > 0 ? (
                  <ol aria-label={`Suggestions for ${item.requirement}`} className="list-decimal list-inside mt-1 text-xs">
                    {item.suggestions.map((s, i) => (
                      <li key={i}>{s}</li>
                    ))}
                  </ol>
                ) : null}
              </li>
            ))}
          </ul>

          <h3 className="text-base font-semibold mt-4 mb-2">Strengths</h3>
          <ol aria-label="Strengths" className="list-disc list-inside text-sm space-y-1">
            {view.strengths.map((s, i) => (
              <li key={i}>{s}</li>
            ))}
          </ol>

          <h3 className="text-base font-semibold mt-4 mb-2">Areas for Improvement</h3>
          <ol aria-label="Areas for improvement" className="list-disc list-inside text-sm space-y-1">
            {view.improvements.map((s, i) => (
              <li key={i}>{s}</li>
            ))}
          </ol>

          <h3 className="text-base font-semibold mt-4 mb-2">Summary</h3>
          <p data-testid="summary" className="text-sm whitespace-pre-line">{view.summary}</p>
        </>
      )}
    </section>
  );
}
