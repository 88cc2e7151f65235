import { AnalysisSchemaError } from '@/lib/errors';

export type RequirementStatus = 'Met' | 'Partially Met' | 'Not Met';

export type RequirementFeedback = {
  requirement: string;
  // Kept as received; unknown values render with a neutral style.
  status: string;
  points_earned: number;
  points_possible: number;
  feedback: string;
  improvement_suggestions?: string[];
};

export type OverallFeedback = {
  strengths: string[];
  areas_for_improvement: string[];
  summary: string;
};

export type AnalysisResult = {
  score: number;
  detailed_feedback: RequirementFeedback[];
  overall_feedback: OverallFeedback;
  points_earned?: number;
  total_points?: number;
};

type Json = Record<string, unknown>;

function isObject(v: unknown): v is Json {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function fail(path: string, detail: string): never {
  throw new AnalysisSchemaError(path, detail);
}

function readNumber(obj: Json, key: string, path: string): number {
  const v = obj[key];
  if (typeof v !== 'number' || !Number.isFinite(v)) fail(`${path}${key}`, 'must be a number');
  return v;
}

function readOptionalNumber(obj: Json, key: string, path: string): number | undefined {
  return obj[key] === undefined || obj[key] === null ? undefined : readNumber(obj, key, path);
}

function readString(obj: Json, key: string, path: string): string {
  const v = obj[key];
  if (typeof v !== 'string') fail(`${path}${key}`, 'must be a string');
  return v;
}

function readStringList(obj: Json, key: string, path: string): string[] {
  const v = obj[key];
  if (!Array.isArray(v)) fail(`${path}${key}`, 'must be a list');
  return v.map((item, i) => {
    if (typeof item !== 'string') fail(`${path}${key}[${i}]`, 'must be a string');
    return item;
  });
}

function parseRequirement(raw: unknown, index: number): RequirementFeedback {
  const path = `detailed_feedback[${index}]`;
  if (!isObject(raw)) fail(path, 'must be an object');
  const prefix = `${path}.`;
  // The analyzer names this field fulfillment_level; status wins when both exist.
  const level = raw.fulfillment_level;
  const status =
    raw.status === undefined && typeof level === 'string' ? level : readString(raw, 'status', prefix);
  const item: RequirementFeedback = {
    requirement: readString(raw, 'requirement', prefix),
    status,
    points_earned: readNumber(raw, 'points_earned', prefix),
    points_possible: readNumber(raw, 'points_possible', prefix),
    feedback: readString(raw, 'feedback', prefix),
  };
  if (raw.improvement_suggestions !== undefined && raw.improvement_suggestions !== null) {
    item.improvement_suggestions = readStringList(raw, 'improvement_suggestions', prefix);
  }
  return item;
}

/**
 * Checks an analyze response body against the shape the results view reads.
 * Score range and earned-vs-possible points are passed through untouched.
 */
export function parseAnalysisResult(body: unknown): AnalysisResult {
  if (!isObject(body)) fail('response', 'must be an object');

  const score = readNumber(body, 'score', '');

  const detailed = body.detailed_feedback;
  if (!Array.isArray(detailed)) fail('detailed_feedback', 'must be a list');

  const overall = body.overall_feedback;
  if (!isObject(overall)) fail('overall_feedback', 'must be an object');

  const result: AnalysisResult = {
    score,
    detailed_feedback: detailed.map(parseRequirement),
    overall_feedback: {
      strengths: readStringList(overall, 'strengths', 'overall_feedback.'),
      areas_for_improvement: readStringList(overall, 'areas_for_improvement', 'overall_feedback.'),
      summary: readString(overall, 'summary', 'overall_feedback.'),
    },
  };

  const earned = readOptionalNumber(body, 'points_earned', '');
  const total = readOptionalNumber(body, 'total_points', '');
  if (earned !== undefined) result.points_earned = earned;
  if (total !== undefined) result.total_points = total;
  return result;
}
