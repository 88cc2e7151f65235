import { BYTES_PER_MB } from '@/lib/config';
import { FileTooLargeError } from '@/lib/errors';
import type { Slot } from '@/lib/upload-state';

export function tooLargeMessage(slot: Slot, limitBytes: number): string {
  const mb = Number((limitBytes / BYTES_PER_MB).toFixed(2));
  return `${slot} file is too large. Please keep files under ${mb}MB.`;
}

/**
 * Size check for one slot. The limit itself is allowed; anything over it
 * throws before the file reaches controller state.
 */
export function assertFileSize(slot: Slot, file: Pick<File, 'size'>, limitBytes: number): void {
  if (file.size > limitBytes) {
    throw new FileTooLargeError(slot, file.size, limitBytes, tooLargeMessage(slot, limitBytes));
  }
}
