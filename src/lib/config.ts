// Client settings, read once from NEXT_PUBLIC_* env with fallbacks

function truthy(v: string | undefined | null) {
  if (!v) return false;
  const s = String(v).trim().toLowerCase();
  return s === '1' || s === 'true' || s === 'yes' || s === 'on';
}

function positiveNumber(raw: string | undefined, fallback: number): number {
  const n = raw != null && raw.trim() !== '' ? Number(raw) : NaN;
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export const BYTES_PER_MB = 1024 * 1024;

export const ANALYZE_URL: string =
  (typeof process !== 'undefined' ? process.env.NEXT_PUBLIC_ANALYZE_URL : undefined) || '/analyze';

export const MAX_UPLOAD_MB: number = positiveNumber(
  typeof process !== 'undefined' ? process.env.NEXT_PUBLIC_MAX_UPLOAD_MB : undefined,
  5
);

export const MAX_UPLOAD_BYTES: number = MAX_UPLOAD_MB * BYTES_PER_MB;

export const ANALYZE_TRACE = truthy(
  typeof process !== 'undefined' ? process.env.NEXT_PUBLIC_ANALYZE_TRACE : undefined
);

// Hint for the file pickers only; contents are never inspected client-side.
export const ACCEPTED_EXTENSIONS = ['.pdf', '.doc', '.docx', '.txt'] as const;

export const ACCEPT_ATTRIBUTE = ACCEPTED_EXTENSIONS.join(',');

export { truthy, positiveNumber };
