import { ANALYZE_URL, MAX_UPLOAD_BYTES } from '@/lib/config';
import { buildAnalyzeForm, defaultFetch, postAnalyze, GENERIC_FAILURE_MESSAGE, type AnalyzeFetch } from '@/lib/analyze-client';
import { assertFileSize } from '@/lib/file-validation';
import { errorMessage, isAnalyzeError } from '@/lib/errors';
import { createLogger, type Logger } from '@/lib/logger';
import {
  canSubmit,
  initialUploadState,
  uploadReducer,
  type Slot,
  type UploadEvent,
  type UploadState,
} from '@/lib/upload-state';

export type UploadControllerOptions = {
  analyzeUrl?: string;
  maxFileBytes?: number;
  fetchImpl?: AnalyzeFetch;
  logger?: Logger;
};

type Listener = () => void;

/**
 * Owns the two file slots and the submission lifecycle. Every change goes
 * through `uploadReducer`; listeners are told after each transition.
 */
export class UploadController {
  private state: UploadState = initialUploadState;
  private readonly listeners = new Set<Listener>();
  private readonly analyzeUrl: string;
  private readonly maxFileBytes: number;
  private readonly fetchImpl: AnalyzeFetch;
  private readonly log: Logger;

  constructor(options: UploadControllerOptions = {}) {
    this.analyzeUrl = options.analyzeUrl ?? ANALYZE_URL;
    this.maxFileBytes = options.maxFileBytes ?? MAX_UPLOAD_BYTES;
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
    this.log = options.logger ?? createLogger('upload');
  }

  getState = (): UploadState => this.state;

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  canSubmit(): boolean {
    return canSubmit(this.state);
  }

  selectFile(slot: Slot, file: File): void {
    try {
      assertFileSize(slot, file, this.maxFileBytes);
    } catch (e: unknown) {
      this.log.warn(`rejected ${slot} file`, file.name, file.size);
      this.dispatch({ type: 'FILE_REJECTED', slot, message: errorMessage(e) });
      return;
    }
    this.log.info(`selected ${slot} file`, file.name, file.size);
    this.dispatch({ type: 'FILE_SELECTED', slot, file });
  }

  clearFile(slot: Slot): void {
    this.dispatch({ type: 'FILE_CLEARED', slot });
  }

  async submit(): Promise<void> {
    const { rubric, assignment } = this.state.files;
    if (!this.canSubmit() || !rubric || !assignment) return;

    // Serialized up front: later selections do not touch this request.
    const form = buildAnalyzeForm({ rubric, assignment });
    this.dispatch({ type: 'SUBMIT_STARTED' });
    this.log.info('submitting', rubric.name, assignment.name);

    try {
      const result = await postAnalyze(this.analyzeUrl, form, this.fetchImpl);
      this.dispatch({ type: 'SUBMIT_SUCCEEDED', result });
      this.log.debug('analysis score', result.score);
    } catch (e: unknown) {
      if (isAnalyzeError(e)) {
        this.log.warn(`${e.kind} failure`, e.message);
      } else {
        this.log.error('unexpected failure', e);
      }
      this.dispatch({ type: 'SUBMIT_FAILED', message: errorMessage(e) });
    } finally {
      if (this.state.phase === 'submitting') {
        this.dispatch({ type: 'SUBMIT_FAILED', message: GENERIC_FAILURE_MESSAGE });
      }
    }
  }

  private dispatch(event: UploadEvent): void {
    const next = uploadReducer(this.state, event);
    if (next === this.state) return;
    this.state = next;
    for (const listener of this.listeners) listener();
  }
}
