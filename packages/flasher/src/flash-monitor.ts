/**
 * Flash Monitor - Periodic, non-blocking progress poll
 *
 * Each poll checks the session latch first and the image load phase second.
 * While flashing it reads every task in session order, updates its sample ring
 * and reports fraction and smoothed rate. The first poll that sees every task
 * finished drains the session and reports completion with `reschedule: false`.
 *
 * Polls are assumed to arrive at a roughly constant interval; a delayed or
 * skipped poll widens the wall-clock window the rate is smoothed over.
 */

import { POLL_INTERVAL_MS } from './constants';
import { errorMessage, toError } from './errors';
import type { FlashSession } from './flash-session';
import type { FlashTask } from './flash-task';
import { bytesPerSecond, formatRate, formatSummary } from './format';
import type { ImageBuffer } from './image-buffer';
import { silentLogger } from './logger';
import type { FlashLogger, MonitorReport, TaskSnapshot } from './types';

type CompletionReport = Extract<MonitorReport, { kind: 'complete' }>;

export interface FlashMonitorOptions {
  pollIntervalMs?: number;
  logger?: FlashLogger;
}

/** Fraction written; a zero-size task reads 0 until its writer finishes. */
export function taskFraction(bytesWritten: number, totalSize: number, finished: boolean): number {
  if (finished) {
    return 1;
  }
  if (totalSize === 0) {
    return 0;
  }
  return bytesWritten / totalSize;
}

export class FlashMonitor {
  private readonly pollIntervalMs: number;
  private readonly log: FlashLogger;
  private completion: CompletionReport | null = null;
  private draining: Promise<CompletionReport> | null = null;

  constructor(
    private readonly buffer: ImageBuffer,
    private readonly session: FlashSession,
    options: FlashMonitorOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS;
    this.log = options.logger ?? silentLogger;
  }

  get intervalMs(): number {
    return this.pollIntervalMs;
  }

  async poll(): Promise<MonitorReport> {
    if (this.draining) {
      return this.draining;
    }
    if (this.session.isActive()) {
      this.completion = null;
      return this.pollSession();
    }
    if (this.completion) {
      return this.completion;
    }
    return this.pollImage();
  }

  /** Forget the last completion so polls report the load phase again. */
  reset(): void {
    this.completion = null;
  }

  /**
   * Poll every `pollIntervalMs` until a report stops rescheduling or the
   * returned function is called. A failing poll or handler stops the watch
   * and is passed to `onError`.
   */
  watch(onReport: (report: MonitorReport) => void, onError?: (error: Error) => void): () => void {
    let stopped = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const tick = async (): Promise<void> => {
      const report = await this.poll();
      if (stopped) {
        return;
      }
      onReport(report);
      if (report.reschedule && !stopped) {
        timer = setTimeout(run, this.pollIntervalMs);
      }
    };

    const run = (): void => {
      tick().catch((error: unknown) => {
        stopped = true;
        this.log(`Progress monitor stopped: ${errorMessage(error)}`, 'error');
        onError?.(toError(error));
      });
    };

    timer = setTimeout(run, this.pollIntervalMs);

    return () => {
      stopped = true;
      if (timer) {
        clearTimeout(timer);
      }
    };
  }

  private pollImage(): MonitorReport {
    const image = this.buffer.snapshot();

    switch (image.phase) {
      case 'empty':
        return { kind: 'empty', reschedule: true };
      case 'loading':
        return { kind: 'loading', busy: true, canProceed: false, path: image.path, reschedule: true };
      case 'ready':
        return { kind: 'ready', busy: false, canProceed: true, image: this.buffer.info(), reschedule: true };
      case 'invalidated':
        return {
          kind: 'invalidated',
          busy: false,
          canProceed: false,
          error: this.buffer.lastError,
          reschedule: true,
        };
    }
  }

  private async pollSession(): Promise<MonitorReport> {
    const tasks: TaskSnapshot[] = [];
    let allFinished = true;
    for (const task of this.session.tasks) {
      const snapshot = this.sampleTask(task);
      if (!snapshot.finished) {
        allFinished = false;
      }
      tasks.push(snapshot);
    }
    const elapsedMs = this.session.elapsedMs();

    if (!allFinished) {
      return { kind: 'flashing', tasks, elapsedMs, reschedule: true };
    }

    this.draining = this.complete(tasks, elapsedMs);
    try {
      return await this.draining;
    } finally {
      this.draining = null;
    }
  }

  private sampleTask(task: FlashTask): TaskSnapshot {
    const raw = task.progress.bytesWritten;
    const finished = task.progress.finished;

    task.recentSamples.push(raw);
    const bytesPerInterval = task.recentSamples.smoothed();
    const perSecond = bytesPerSecond(bytesPerInterval, this.pollIntervalMs);

    return {
      deviceId: task.deviceId,
      label: task.label,
      fraction: taskFraction(raw, task.totalSize, finished),
      bytesWritten: raw,
      totalSize: task.totalSize,
      finished,
      bytesPerInterval,
      bytesPerSecond: perSecond,
      rate: formatRate(perSecond),
    };
  }

  private async complete(tasks: TaskSnapshot[], elapsedMs: number): Promise<CompletionReport> {
    const { total, succeeded, errors } = await this.session.drain();
    const summary = formatSummary(succeeded, total);

    this.log(summary, errors.isEmpty() ? 'info' : 'warning');
    for (const { deviceId, reason } of errors) {
      this.log(`${deviceId}: ${reason.message}`, 'error');
    }

    this.completion = {
      kind: 'complete',
      tasks,
      elapsedMs,
      total,
      succeeded,
      summary,
      errors: errors.entries,
      reschedule: false,
    };
    return this.completion;
  }
}
