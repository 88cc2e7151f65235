import type { AnalysisResult, RequirementStatus } from '@/lib/analysis-result';

export type StatusCategory = 'positive' | 'warning' | 'negative' | 'neutral';

export type RenderedFeedbackItem = {
  key: string;
  requirement: string;
  statusLabel: string;
  category: StatusCategory;
  pointsLabel: string;
  feedback: string;
  suggestions: string[];
};

export type RenderedView = {
  scoreLabel: string;
  pointsLabel?: string;
  items: RenderedFeedbackItem[];
  strengths: string[];
  improvements: string[];
  summary: string;
};

const STATUS_CATEGORY = new Map<RequirementStatus, StatusCategory>([
  ['Met', 'positive'],
  ['Partially Met', 'warning'],
  ['Not Met', 'negative'],
]);

// Wire spellings, plus the compact forms some analyzers emit
const STATUS_ALIASES = new Map<string, RequirementStatus>([
  ['Met', 'Met'],
  ['Partially Met', 'Partially Met'],
  ['PartiallyMet', 'Partially Met'],
  ['Not Met', 'Not Met'],
  ['NotMet', 'Not Met'],
]);

export function statusCategory(status: string): StatusCategory {
  const known = STATUS_ALIASES.get(status.trim());
  return (known && STATUS_CATEGORY.get(known)) ?? 'neutral';
}

export function formatScore(score: number): string {
  return `Score: ${score}%`;
}

/**
 * Structural projection of an analysis result for display. Order is kept as
 * received and nothing is recomputed, so earned points above possible or a
 * score outside 0-100 show exactly as sent.
 */
export function renderResults(result: AnalysisResult): RenderedView {
  const view: RenderedView = {
    scoreLabel: formatScore(result.score),
    items: result.detailed_feedback.map((item, index) => ({
      key: `${index}:${item.requirement}`,
      requirement: item.requirement,
      statusLabel: item.status,
      category: statusCategory(item.status),
      pointsLabel: `${item.points_earned}/${item.points_possible}`,
      feedback: item.feedback,
      suggestions: item.improvement_suggestions ? [...item.improvement_suggestions] : [],
    })),
    strengths: [...result.overall_feedback.strengths],
    improvements: [...result.overall_feedback.areas_for_improvement],
    summary: result.overall_feedback.summary,
  };
  if (typeof result.points_earned === 'number' && typeof result.total_points === 'number') {
    view.pointsLabel = `${result.points_earned} / ${result.total_points} points`;
  }
  return view;
}
