/**
 * Flash Session - One writer per target, started together, drained together
 */

import { ErrorCollector } from './error-collector';
import { NoSessionError, SessionActiveError, SessionNotFinishedError, errorMessage } from './errors';
import { FlashTask } from './flash-task';
import { silentLogger } from './logger';
import type { FlashLogger, FlashTarget, WriteOutcome } from './types';
import type { Writer } from './writer';
import { writeFailure } from './writer';

export interface StartOptions {
  verify?: boolean;
}

export interface DrainResult {
  total: number;
  succeeded: number;
  errors: ErrorCollector;
}

export class FlashSession {
  private writer: Writer;
  private log: FlashLogger;
  private activeTasks: FlashTask[] = [];
  private writerHandles: Promise<WriteOutcome>[] = [];
  private active = false;
  private startTime = 0;

  constructor(writer: Writer, logger: FlashLogger = silentLogger) {
    this.writer = writer;
    this.log = logger;
  }

  /**
   * Spawn one writer per target. Tasks and handles keep the order of `targets`.
   * Outcomes surface only through drain().
   */
  start(targets: readonly FlashTarget[], image: Uint8Array, options: StartOptions = {}): void {
    if (this.active) {
      throw new SessionActiveError();
    }
    if (targets.length === 0) {
      throw new Error('No target devices specified');
    }

    const verify = options.verify ?? false;
    this.active = true;
    this.startTime = Date.now();
    this.activeTasks = targets.map((target) => new FlashTask(target, image.byteLength));
    this.writerHandles = this.activeTasks.map((task) => this.spawn(task, image, verify));

    this.log(`Flashing ${this.activeTasks.length} device(s)${verify ? ' with verification' : ''}`, 'info');
  }

  private async spawn(task: FlashTask, image: Uint8Array, verify: boolean): Promise<WriteOutcome> {
    const { sink } = task;
    // Defer past start() so every task exists before any writer runs.
    await Promise.resolve();

    let outcome: WriteOutcome;
    try {
      outcome = await this.writer.write({
        image,
        target: { deviceId: task.deviceId, label: task.label },
        totalSize: task.totalSize,
        verify,
        onProgress: (bytes) => sink.report(bytes),
        onFinish: () => sink.finish(),
      });
    } catch (error) {
      outcome = writeFailure('writer_crashed', errorMessage(error));
    }

    // A writer that settles without calling onFinish is still finished.
    sink.finish();

    if (outcome.success) {
      this.log(`${task.deviceId}: write complete`, 'info');
    } else {
      this.log(`${task.deviceId}: ${outcome.error.message}`, 'error');
    }
    return outcome;
  }

  isActive(): boolean {
    return this.active;
  }

  get tasks(): readonly FlashTask[] {
    return this.activeTasks;
  }

  get startedAt(): number {
    return this.startTime;
  }

  elapsedMs(now: number = Date.now()): number {
    return this.active ? now - this.startTime : 0;
  }

  allFinished(): boolean {
    return this.activeTasks.every((task) => task.progress.finished);
  }

  /**
   * Join every writer and collect failures. Only legal once every task reports
   * finished, so the joins do not wait on writes still in progress.
   */
  async drain(): Promise<DrainResult> {
    if (!this.active) {
      throw new NoSessionError();
    }

    const pending = this.activeTasks.filter((task) => !task.progress.finished);
    if (pending.length > 0) {
      throw new SessionNotFinishedError(pending.map((task) => task.deviceId));
    }

    const tasks = this.activeTasks;
    const handles = this.writerHandles;
    this.activeTasks = [];
    this.writerHandles = [];

    const results: Array<{ deviceId: string; outcome: WriteOutcome }> = [];
    for (let i = 0; i < handles.length; i++) {
      results.push({ deviceId: tasks[i].deviceId, outcome: await handles[i] });
    }

    this.active = false;

    const errors = ErrorCollector.fromOutcomes(results);
    return { total: tasks.length, succeeded: tasks.length - errors.size, errors };
  }
}
