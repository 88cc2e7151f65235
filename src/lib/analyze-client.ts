import { AnalyzeRequestError, AnalyzeTransportError, errorMessage } from '@/lib/errors';
import { parseAnalysisResult, type AnalysisResult } from '@/lib/analysis-result';
import type { Slot } from '@/lib/upload-state';

export type AnalyzeResponseLike = {
  ok: boolean;
  status: number;
  json: () => Promise<unknown>;
};

export type AnalyzeFetch = (
  input: string,
  init: { method: 'POST'; body: FormData }
) => Promise<AnalyzeResponseLike>;

export type AnalyzeFiles = Record<Slot, File>;

export const GENERIC_FAILURE_MESSAGE = 'Analysis failed';

// Resolved per call so a stubbed global fetch is picked up.
export const defaultFetch: AnalyzeFetch = (input, init) => fetch(input, init);

/** Multipart body with exactly the `rubric` and `assignment` parts. */
export function buildAnalyzeForm(files: AnalyzeFiles): FormData {
  const form = new FormData();
  form.append('rubric', files.rubric, files.rubric.name);
  form.append('assignment', files.assignment, files.assignment.name);
  return form;
}

function bodyError(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('error' in body)) return undefined;
  const { error } = body;
  return typeof error === 'string' && error.length > 0 ? error : undefined;
}

/**
 * POST an already-built form and decode the reply. Network and JSON failures
 * become AnalyzeTransportError, non-2xx replies AnalyzeRequestError, and a
 * malformed success body AnalysisSchemaError.
 */
export async function postAnalyze(
  url: string,
  form: FormData,
  fetchImpl: AnalyzeFetch = defaultFetch
): Promise<AnalysisResult> {
  let res: AnalyzeResponseLike;
  let body: unknown;
  try {
    res = await fetchImpl(url, { method: 'POST', body: form });
    body = await res.json();
  } catch (e: unknown) {
    throw new AnalyzeTransportError(errorMessage(e), { cause: e });
  }

  if (!res.ok) {
    throw new AnalyzeRequestError(res.status, bodyError(body) ?? GENERIC_FAILURE_MESSAGE);
  }
  return parseAnalysisResult(body);
}

export function requestAnalysis(
  url: string,
  files: AnalyzeFiles,
  fetchImpl: AnalyzeFetch = defaultFetch
): Promise<AnalysisResult> {
  return postAnalyze(url, buildAnalyzeForm(files), fetchImpl);
}
