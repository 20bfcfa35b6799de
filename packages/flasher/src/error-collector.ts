import type { FlashError, WriteOutcome } from './types';

/**
 * Failed devices and their reasons, in task submission order. Built once when a
 * session drains.
 */
export class ErrorCollector implements Iterable<FlashError> {
  readonly entries: readonly FlashError[];

  private constructor(entries: FlashError[]) {
    this.entries = Object.freeze(entries);
  }

  static fromOutcomes(results: ReadonlyArray<{ deviceId: string; outcome: WriteOutcome }>): ErrorCollector {
    const entries: FlashError[] = [];
    for (const { deviceId, outcome } of results) {
      if (!outcome.success) {
        entries.push(Object.freeze({ deviceId, reason: outcome.error }));
      }
    }
    return new ErrorCollector(entries);
  }

  get size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  [Symbol.iterator](): Iterator<FlashError> {
    return this.entries[Symbol.iterator]();
  }
}
