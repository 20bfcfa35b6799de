/**
 * Type definitions for flasher package
 */

export type LoadPhase = 'empty' | 'loading' | 'ready' | 'invalidated';

export type LogLevel = 'info' | 'warning' | 'error';

export type FlashLogger = (message: string, level: LogLevel) => void;

export interface FlashTarget {
  /** Canonical device path, e.g. /dev/sdb */
  deviceId: string;
  /** Human-readable name shown next to the progress bar */
  label?: string;
}

export type WriteFailureKind =
  | 'open_failed'
  | 'short_write'
  | 'sync_failed'
  | 'verify_mismatch'
  | 'io_error'
  | 'writer_crashed';

export interface WriteFailure {
  kind: WriteFailureKind;
  message: string;
}

export type WriteOutcome = { success: true } | { success: false; error: WriteFailure };

export type LoadResult = { success: true; size: number } | { success: false; error: Error };

export interface ImageInfo {
  path: string;
  name: string;
  size: number;
}

export interface TaskSnapshot {
  deviceId: string;
  label: string;
  fraction: number;
  bytesWritten: number;
  totalSize: number;
  finished: boolean;
  /** 3-poll moving average of bytes written per poll interval */
  bytesPerInterval: number;
  bytesPerSecond: number;
  rate: string;
}

export interface FlashError {
  deviceId: string;
  reason: WriteFailure;
}

export type MonitorReport =
  | { kind: 'empty'; reschedule: true }
  | { kind: 'loading'; busy: true; canProceed: false; path: string; reschedule: true }
  | { kind: 'ready'; busy: false; canProceed: true; image: ImageInfo; reschedule: true }
  | { kind: 'invalidated'; busy: false; canProceed: false; error: Error | null; reschedule: true }
  | { kind: 'flashing'; tasks: TaskSnapshot[]; elapsedMs: number; reschedule: true }
  | {
      kind: 'complete';
      tasks: TaskSnapshot[];
      elapsedMs: number;
      total: number;
      succeeded: number;
      summary: string;
      errors: readonly FlashError[];
      reschedule: false;
    };

export type ChecksumType = 'sha256' | 'md5';
