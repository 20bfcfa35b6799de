/**
 * Block Device Writer - Writes an image to a device node with node:fs
 *
 * Writes the image in chunks from offset 0, syncs, and when asked reads the
 * device back and compares it with the image. `onFinish` is called exactly
 * once, whatever the outcome.
 */

import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { WRITE_CHUNK_SIZE } from '../constants';
import { errorMessage } from '../errors';
import { silentLogger } from '../logger';
import type { FlashLogger, WriteOutcome } from '../types';
import type { WriteRequest, Writer } from '../writer';
import { writeFailure } from '../writer';

export interface BlockDeviceWriterOptions {
  chunkSize?: number;
  logger?: FlashLogger;
  /** Flags passed to open(); regular files used as targets need 'r+' too */
  openFlags?: string;
}

export class BlockDeviceWriter implements Writer {
  private chunkSize: number;
  private log: FlashLogger;
  private openFlags: string;

  constructor(options: BlockDeviceWriterOptions = {}) {
    this.chunkSize = options.chunkSize ?? WRITE_CHUNK_SIZE;
    this.log = options.logger ?? silentLogger;
    this.openFlags = options.openFlags ?? 'r+';
  }

  async write(request: WriteRequest): Promise<WriteOutcome> {
    try {
      return await this.writeAndVerify(request);
    } finally {
      request.onFinish();
    }
  }

  private async writeAndVerify(request: WriteRequest): Promise<WriteOutcome> {
    const { target, image, totalSize } = request;
    const devicePath = target.deviceId;

    let handle: FileHandle;
    try {
      handle = await open(devicePath, this.openFlags);
    } catch (error) {
      return writeFailure('open_failed', `failed to open ${devicePath}: ${errorMessage(error)}`);
    }

    try {
      this.log(`${devicePath}: writing ${totalSize} bytes`, 'info');
      const written = await this.writeImage(handle, request);
      if (!written.success) {
        return written;
      }

      try {
        await handle.sync();
      } catch (error) {
        return writeFailure('sync_failed', `failed to sync ${devicePath}: ${errorMessage(error)}`);
      }

      if (request.verify) {
        this.log(`${devicePath}: verifying`, 'info');
        return await this.verifyImage(handle, image, totalSize, devicePath);
      }

      return { success: true };
    } finally {
      await handle.close();
    }
  }

  private async writeImage(handle: FileHandle, request: WriteRequest): Promise<WriteOutcome> {
    const { image, totalSize, onProgress, target } = request;
    let offset = 0;

    onProgress(0);
    while (offset < totalSize) {
      const length = Math.min(this.chunkSize, totalSize - offset);
      let bytesWritten: number;
      try {
        ({ bytesWritten } = await handle.write(image, offset, length, offset));
      } catch (error) {
        return writeFailure('io_error', `write to ${target.deviceId} failed at byte ${offset}: ${errorMessage(error)}`);
      }

      if (bytesWritten !== length) {
        return writeFailure(
          'short_write',
          `only ${offset + bytesWritten} of ${totalSize} bytes written to ${target.deviceId}`
        );
      }

      offset += bytesWritten;
      onProgress(offset);
    }

    return { success: true };
  }

  private async verifyImage(
    handle: FileHandle,
    image: Uint8Array,
    totalSize: number,
    devicePath: string
  ): Promise<WriteOutcome> {
    const chunk = new Uint8Array(this.chunkSize);
    let offset = 0;

    while (offset < totalSize) {
      const length = Math.min(this.chunkSize, totalSize - offset);
      let bytesRead: number;
      try {
        ({ bytesRead } = await handle.read(chunk, 0, length, offset));
      } catch (error) {
        return writeFailure('io_error', `read back from ${devicePath} failed at byte ${offset}: ${errorMessage(error)}`);
      }

      if (bytesRead !== length) {
        return writeFailure('verify_mismatch', `${devicePath} ended after ${offset + bytesRead} of ${totalSize} bytes`);
      }

      const expected = image.subarray(offset, offset + length);
      const actual = chunk.subarray(0, length);
      if (Buffer.compare(expected, actual) !== 0) {
        return writeFailure('verify_mismatch', `${devicePath} does not match the image near byte ${offset}`);
      }

      offset += length;
    }

    return { success: true };
  }
}
