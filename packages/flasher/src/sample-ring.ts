import { RATE_WINDOW, SAMPLE_DEPTH } from './constants';

/**
 * Per-task history of byte-count deltas between consecutive polls.
 *
 * Slot 0 holds the raw counter seen on the previous poll; slots 1..depth hold
 * deltas, oldest first. Owned and mutated by the monitor only.
 */
export class SampleRing {
  private readonly slots: number[];

  constructor(
    private readonly depth: number = SAMPLE_DEPTH,
    private readonly window: number = RATE_WINDOW
  ) {
    if (window > depth) {
      throw new RangeError(`Rate window ${window} exceeds sample depth ${depth}`);
    }
    this.slots = new Array<number>(depth + 1).fill(0);
  }

  /** Records the raw counter of this poll and returns the inserted delta. */
  push(raw: number): number {
    const delta = raw - this.slots[0];
    for (let i = 1; i < this.depth; i++) {
      this.slots[i] = this.slots[i + 1];
    }
    this.slots[this.depth] = delta;
    this.slots[0] = raw;
    return delta;
  }

  /** Mean of the most recent `window` deltas, in bytes per poll interval. */
  smoothed(): number {
    let sum = 0;
    for (let i = this.depth - this.window + 1; i <= this.depth; i++) {
      sum += this.slots[i];
    }
    return sum / this.window;
  }

  deltas(): number[] {
    return this.slots.slice(1);
  }

  get baseline(): number {
    return this.slots[0];
  }
}
