/**
 * In-process collaborators for tests: a writer whose calls are completed by
 * hand and an image source backed by memory.
 */

import type { ImageSource, OpenedImage } from './image-source';
import type { WriteFailureKind, WriteOutcome } from './types';
import type { WriteRequest, Writer } from './writer';

export interface PendingWrite {
  request: WriteRequest;
  resolve: (outcome: WriteOutcome) => void;
  reject: (error: Error) => void;
}

export class ControlledWriter implements Writer {
  readonly calls: PendingWrite[] = [];

  write(request: WriteRequest): Promise<WriteOutcome> {
    return new Promise((resolve, reject) => {
      this.calls.push({ request, resolve, reject });
    });
  }

  call(deviceId: string): PendingWrite {
    const found = this.calls.find((c) => c.request.target.deviceId === deviceId);
    if (!found) {
      throw new Error(`No write started for ${deviceId}`);
    }
    return found;
  }

  /** Report `bytes`, finish, and settle the write for `deviceId`. */
  complete(deviceId: string, bytes: number, failure?: { kind: WriteFailureKind; message: string }): void {
    const { request, resolve } = this.call(deviceId);
    request.onProgress(bytes);
    request.onFinish();
    resolve(failure ? { success: false, error: failure } : { success: true });
  }
}

export class MemoryImageSource implements ImageSource {
  readonly opened: string[] = [];

  constructor(private readonly images: Record<string, Uint8Array>) {}

  async open(imagePath: string): Promise<OpenedImage> {
    const data = this.images[imagePath];
    if (!data) {
      throw new Error(`ENOENT: no such file or directory, stat '${imagePath}'`);
    }
    this.opened.push(imagePath);

    return {
      totalSize: data.byteLength,
      async read(onProgress) {
        const half = Math.floor(data.byteLength / 2);
        onProgress?.(half);
        onProgress?.(data.byteLength);
        return data.slice();
      },
    };
  }
}

/** Let pending promise callbacks and zero-delay timers run. */
export function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
