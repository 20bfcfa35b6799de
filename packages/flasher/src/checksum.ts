import { createHash } from 'node:crypto';
import type { ChecksumType } from './types';

export const CHECKSUM_TYPES: readonly ChecksumType[] = ['sha256', 'md5'];

export function isChecksumType(value: string): value is ChecksumType {
  return CHECKSUM_TYPES.some((type) => type === value);
}

/** Hex digest of the loaded image, shown next to the image chooser. */
export function checksum(bytes: Uint8Array, type: ChecksumType): string {
  return createHash(type).update(bytes).digest('hex');
}
