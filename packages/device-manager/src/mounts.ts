import { readFile } from 'node:fs/promises';
import { MOUNTS_PATH } from './constants';
import type { Mount } from './types';

/** The kernel writes space, tab, newline and backslash in mount fields as \ooo. */
function unescapeField(field: string): string {
  return field.replace(/\\([0-7]{3})/g, (_, octal: string) => String.fromCharCode(parseInt(octal, 8)));
}

export function parseMounts(contents: string): Mount[] {
  const mounts: Mount[] = [];
  for (const line of contents.split('\n')) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < 4) {
      continue;
    }
    const [source, target, fstype, options] = fields;
    mounts.push({
      source: unescapeField(source),
      target: unescapeField(target),
      fstype,
      options,
    });
  }
  return mounts;
}

export async function readMounts(mountsPath: string = MOUNTS_PATH): Promise<Mount[]> {
  return parseMounts(await readFile(mountsPath, 'utf8'));
}

/**
 * Whether `source` is `device` itself or one of its partitions
 * (/dev/sdb1, /dev/nvme0n1p2, /dev/mmcblk0p1).
 *
 * Names ending in a digit take a `p` before the partition number, so
 * /dev/loop10 is not a partition of /dev/loop1.
 */
export function isOnDevice(source: string, device: string): boolean {
  if (source === device) {
    return true;
  }
  if (!source.startsWith(device)) {
    return false;
  }
  const suffix = source.slice(device.length);
  return /\d$/.test(device) ? /^p\d+$/.test(suffix) : /^\d+$/.test(suffix);
}

/**
 * The mount whose target is the longest prefix of `filePath`.
 */
export function mountContaining(mounts: readonly Mount[], filePath: string): Mount | null {
  let best: Mount | null = null;
  for (const mount of mounts) {
    const prefix = mount.target.endsWith('/') ? mount.target : `${mount.target}/`;
    const contains = filePath === mount.target || filePath.startsWith(prefix);
    if (contains && (!best || mount.target.length > best.target.length)) {
      best = mount;
    }
  }
  return best;
}
