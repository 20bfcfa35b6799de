/**
 * Flasher - Ties the image buffer, flash session and monitor together
 *
 * One instance per application run. The image buffer is loaded here and shared
 * read-only with every writer of a session; loading another image is refused
 * until that session has drained. A failed load stays `invalidated` until
 * another image is selected or `clearImage` empties the buffer.
 */

import { checksum } from './checksum';
import { ImageNotReadyError, SessionActiveError } from './errors';
import { FlashMonitor } from './flash-monitor';
import { FlashSession } from './flash-session';
import { ImageBuffer } from './image-buffer';
import { loadImage } from './image-loader';
import { FileImageSource } from './image-source';
import type { ImageSource } from './image-source';
import { consoleLogger } from './logger';
import { BlockDeviceWriter } from './transports/block-device-writer';
import type { ChecksumType, FlashLogger, FlashTarget, ImageInfo, LoadResult, MonitorReport } from './types';
import type { Writer } from './writer';

export interface FlasherOptions {
  writer?: Writer;
  imageSource?: ImageSource;
  pollIntervalMs?: number;
  onLog?: FlashLogger;
}

export interface StartFlashOptions {
  verify?: boolean;
}

export class Flasher {
  private readonly buffer = new ImageBuffer();
  private readonly session: FlashSession;
  private readonly monitor: FlashMonitor;
  private readonly imageSource: ImageSource;
  private readonly log: FlashLogger;

  constructor(options: FlasherOptions = {}) {
    this.log = options.onLog ?? consoleLogger;
    this.imageSource = options.imageSource ?? new FileImageSource();
    this.session = new FlashSession(options.writer ?? new BlockDeviceWriter({ logger: this.log }), this.log);
    this.monitor = new FlashMonitor(this.buffer, this.session, {
      pollIntervalMs: options.pollIntervalMs,
      logger: this.log,
    });
  }

  /**
   * Load a new source image
   */
  async selectImage(imagePath: string, onProgress?: (bytesRead: number, totalSize: number) => void): Promise<LoadResult> {
    if (this.session.isActive()) {
      throw new SessionActiveError();
    }

    this.monitor.reset();
    return loadImage(this.buffer, this.imageSource, imagePath, { onProgress, logger: this.log });
  }

  /**
   * Drop the current image, loaded or failed, and return the buffer to `empty`
   */
  clearImage(): void {
    if (this.session.isActive()) {
      throw new SessionActiveError();
    }
    if (this.buffer.phase !== 'empty') {
      this.buffer.reset();
    }
    this.monitor.reset();
  }

  /**
   * Start writing the loaded image to every target at once
   */
  startFlash(targets: readonly FlashTarget[], options: StartFlashOptions = {}): void {
    if (this.session.isActive()) {
      throw new SessionActiveError();
    }
    if (this.buffer.phase !== 'ready') {
      throw new ImageNotReadyError(this.buffer.phase);
    }

    this.session.start(targets, this.buffer.bytes, { verify: options.verify });
  }

  poll(): Promise<MonitorReport> {
    return this.monitor.poll();
  }

  watch(onReport: (report: MonitorReport) => void, onError?: (error: Error) => void): () => void {
    return this.monitor.watch(onReport, onError);
  }

  checksum(type: ChecksumType): string {
    if (this.buffer.phase !== 'ready') {
      throw new ImageNotReadyError(this.buffer.phase);
    }
    return checksum(this.buffer.bytes, type);
  }

  getImage(): ImageInfo | null {
    return this.buffer.phase === 'ready' ? this.buffer.info() : null;
  }

  get pollIntervalMs(): number {
    return this.monitor.intervalMs;
  }

  /**
   * Check if flashing is in progress
   */
  isFlashInProgress(): boolean {
    return this.session.isActive();
  }
}
