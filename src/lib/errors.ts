import type { Slot } from '@/lib/upload-state';

export class FileTooLargeError extends Error {
  readonly kind = 'validation' as const;
  constructor(
    readonly slot: Slot,
    readonly size: number,
    readonly limit: number,
    message: string
  ) {
    super(message);
    this.name = 'FileTooLargeError';
  }
}

/** Non-2xx answer from the analyze endpoint. */
export class AnalyzeRequestError extends Error {
  readonly kind = 'request' as const;
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = 'AnalyzeRequestError';
  }
}

/** The request never produced a readable JSON body. */
export class AnalyzeTransportError extends Error {
  readonly kind = 'transport' as const;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AnalyzeTransportError';
  }
}

export class AnalysisSchemaError extends Error {
  readonly kind = 'schema' as const;
  constructor(readonly path: string, detail: string) {
    super(`Invalid analysis response: ${path} ${detail}`);
    this.name = 'AnalysisSchemaError';
  }
}

export type AnalyzeError = FileTooLargeError | AnalyzeRequestError | AnalyzeTransportError | AnalysisSchemaError;

export function isAnalyzeError(e: unknown): e is AnalyzeError {
  return (
    e instanceof FileTooLargeError ||
    e instanceof AnalyzeRequestError ||
    e instanceof AnalyzeTransportError ||
    e instanceof AnalysisSchemaError
  );
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
