/**
 * Flash Task - Per-device progress record
 *
 * The writer receives only the sink half of a task's progress cell and the
 * monitor only the view half, so each field keeps a single writer.
 */

import { SampleRing } from './sample-ring';
import type { FlashTarget } from './types';

export interface TaskProgressSink {
  report(bytesWritten: number): void;
  finish(): void;
}

export interface TaskProgressView {
  readonly bytesWritten: number;
  readonly finished: boolean;
}

class ProgressCell implements TaskProgressView {
  private written = 0;
  private done = false;

  get bytesWritten(): number {
    return this.written;
  }

  get finished(): boolean {
    return this.done;
  }

  readonly sink: TaskProgressSink = {
    report: (bytesWritten: number) => {
      // Counter never moves backwards, and freezes once finished.
      if (!this.done && bytesWritten > this.written) {
        this.written = bytesWritten;
      }
    },
    finish: () => {
      this.done = true;
    },
  };
}

export class FlashTask {
  readonly deviceId: string;
  readonly label: string;
  readonly totalSize: number;
  readonly recentSamples = new SampleRing();
  private readonly cell = new ProgressCell();

  constructor(target: FlashTarget, totalSize: number) {
    this.deviceId = target.deviceId;
    this.label = target.label ?? target.deviceId;
    this.totalSize = totalSize;
  }

  get progress(): TaskProgressView {
    return this.cell;
  }

  /** Write handle; handed to exactly one writer. */
  get sink(): TaskProgressSink {
    return this.cell.sink;
  }
}
