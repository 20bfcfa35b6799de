/**
 * Image Source - Opens a source image and reads it with progress
 */

import { open, stat } from 'node:fs/promises';
import { READ_CHUNK_SIZE } from './constants';

export interface OpenedImage {
  totalSize: number;
  read(onProgress?: (bytesRead: number) => void): Promise<Uint8Array>;
}

export interface ImageSource {
  open(imagePath: string): Promise<OpenedImage>;
}

export interface FileImageSourceOptions {
  chunkSize?: number;
}

export class FileImageSource implements ImageSource {
  private chunkSize: number;

  constructor(options: FileImageSourceOptions = {}) {
    this.chunkSize = options.chunkSize ?? READ_CHUNK_SIZE;
  }

  async open(imagePath: string): Promise<OpenedImage> {
    const info = await stat(imagePath);
    if (!info.isFile()) {
      throw new Error(`${imagePath} is not a regular file`);
    }

    const totalSize = info.size;
    const chunkSize = this.chunkSize;

    return {
      totalSize,
      async read(onProgress) {
        const data = new Uint8Array(totalSize);
        const handle = await open(imagePath, 'r');
        let offset = 0;

        try {
          while (offset < totalSize) {
            const length = Math.min(chunkSize, totalSize - offset);
            const { bytesRead } = await handle.read(data, offset, length, offset);
            if (bytesRead === 0) {
              throw new Error(`Image ended after ${offset} of ${totalSize} bytes`);
            }
            offset += bytesRead;
            onProgress?.(offset);
          }
        } finally {
          await handle.close();
        }

        return data;
      },
    };
  }
}
