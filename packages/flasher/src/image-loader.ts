/**
 * Image Loader - Drives an ImageBuffer through one load cycle
 */

import { errorMessage, toError } from './errors';
import type { ImageBuffer } from './image-buffer';
import type { ImageSource } from './image-source';
import type { FlashLogger, LoadResult } from './types';
import { silentLogger } from './logger';

export interface LoadImageOptions {
  onProgress?: (bytesRead: number, totalSize: number) => void;
  logger?: FlashLogger;
}

/**
 * Load `imagePath` into `buffer`. Read failures invalidate the buffer and are
 * returned; only starting a load while another is in flight throws.
 */
export async function loadImage(
  buffer: ImageBuffer,
  source: ImageSource,
  imagePath: string,
  options: LoadImageOptions = {}
): Promise<LoadResult> {
  const log = options.logger ?? silentLogger;

  buffer.beginLoad(imagePath);
  log(`Loading image ${imagePath}`, 'info');

  try {
    const image = await source.open(imagePath);
    const bytes = await image.read((bytesRead) => {
      options.onProgress?.(bytesRead, image.totalSize);
    });

    if (bytes.byteLength !== image.totalSize) {
      throw new Error(`Read ${bytes.byteLength} of ${image.totalSize} bytes`);
    }

    buffer.completeLoad(bytes);
    log(`Image loaded: ${imagePath} (${bytes.byteLength} bytes)`, 'info');
    return { success: true, size: bytes.byteLength };
  } catch (error) {
    const failure = new Error(`error with image at '${imagePath}': ${errorMessage(error)}`, {
      cause: toError(error),
    });
    buffer.failLoad(failure);
    log(failure.message, 'error');
    return { success: false, error: failure };
  }
}
