import type { AnalysisResult } from '@/lib/analysis-result';

export const SLOTS = ['rubric', 'assignment'] as const;
export type Slot = (typeof SLOTS)[number];

export type SubmissionPhase = 'idle' | 'submitting' | 'succeeded' | 'failed';

export type UploadState = {
  files: Record<Slot, File | null>;
  phase: SubmissionPhase;
  result: AnalysisResult | null;
  // Only one message is shown at a time; the latest action replaces it.
  error: string | null;
};

export type UploadEvent =
  | { type: 'FILE_SELECTED'; slot: Slot; file: File }
  | { type: 'FILE_REJECTED'; slot: Slot; message: string }
  | { type: 'FILE_CLEARED'; slot: Slot }
  | { type: 'SUBMIT_STARTED' }
  | { type: 'SUBMIT_SUCCEEDED'; result: AnalysisResult }
  | { type: 'SUBMIT_FAILED'; message: string };

export const initialUploadState: UploadState = {
  files: { rubric: null, assignment: null },
  phase: 'idle',
  result: null,
  error: null,
};

export function canSubmit(state: UploadState): boolean {
  return state.files.rubric !== null && state.files.assignment !== null && state.phase !== 'submitting';
}

export function isSubmitting(state: UploadState): boolean {
  return state.phase === 'submitting';
}

export function uploadReducer(state: UploadState, event: UploadEvent): UploadState {
  switch (event.type) {
    case 'FILE_SELECTED':
      // A prior result stays visible until the next submit.
      return { ...state, files: { ...state.files, [event.slot]: event.file }, error: null };
    case 'FILE_REJECTED':
      return { ...state, error: event.message };
    case 'FILE_CLEARED':
      return { ...state, files: { ...state.files, [event.slot]: null } };
    case 'SUBMIT_STARTED':
      if (!canSubmit(state)) return state;
      return { ...state, phase: 'submitting', result: null, error: null };
    case 'SUBMIT_SUCCEEDED':
      if (state.phase !== 'submitting') return state;
      return { ...state, phase: 'succeeded', result: event.result, error: null };
    case 'SUBMIT_FAILED':
      if (state.phase !== 'submitting') return state;
      return { ...state, phase: 'failed', result: null, error: event.message };
  }
}
