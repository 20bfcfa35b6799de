/**
 * Writer contract - one call per task, on its own asynchronous worker
 *
 * A writer reports non-decreasing byte counts up to `totalSize` through
 * `onProgress`, then calls `onFinish` exactly once before its promise settles.
 * Failures are returned as outcomes, not thrown.
 */

import type { FlashTarget, WriteFailureKind, WriteOutcome } from './types';

export interface WriteRequest {
  image: Uint8Array;
  target: FlashTarget;
  totalSize: number;
  verify: boolean;
  onProgress: (bytesWritten: number) => void;
  onFinish: () => void;
}

export interface Writer {
  write(request: WriteRequest): Promise<WriteOutcome>;
}

export function writeFailure(kind: WriteFailureKind, message: string): WriteOutcome {
  return { success: false, error: { kind, message } };
}
