/**
 * Device Manager - Block device enumeration and target resolution
 * Lists removable disks with lsblk and turns user-given paths into flash targets
 */

import { realpath } from 'node:fs/promises';
import type { FlashLogger, FlashTarget } from '@multiflash/flasher';
import { errorMessage, silentLogger } from '@multiflash/flasher';
import { runCommand } from './command-runner';
import { LSBLK_COLUMNS, MOUNTS_PATH } from './constants';
import { DeviceMountedError, SourceDeviceError } from './errors';
import { isOnDevice, mountContaining, readMounts } from './mounts';
import { lsblkOutputSchema, rawBlockDeviceSchema } from './schemas';
import type { BlockDevice, CommandRunner, DeviceSource, Mount, RawBlockDevice, ResolveTargetsOptions } from './types';

export interface DeviceManagerOptions {
  runCommand?: CommandRunner;
  mountsPath?: string;
  /** Resolves symlinks such as /dev/disk/by-id/* to the device node */
  canonicalize?: (path: string) => Promise<string>;
  logger?: FlashLogger;
}

/**
 * Parse `lsblk --json` output into raw entries, skipping anything malformed
 */
export function parseLsblk(stdout: string): RawBlockDevice[] {
  const parsed = lsblkOutputSchema.safeParse(JSON.parse(stdout));
  if (!parsed.success) {
    throw new Error('Unexpected lsblk output: missing blockdevices');
  }

  const devices: RawBlockDevice[] = [];
  for (const entry of parsed.data.blockdevices) {
    const device = rawBlockDeviceSchema.safeParse(entry);
    if (device.success) {
      devices.push(device.data);
    }
  }
  return devices;
}

/**
 * Whole disks that are removable or attached over USB, and writable
 */
export function toFlashableDevices(raw: readonly RawBlockDevice[]): BlockDevice[] {
  return raw
    .filter((d) => d.type === 'disk' && (d.tran === 'usb' || d.rm) && !d.ro)
    .map((d) => ({
      path: d.name,
      size: Number(d.size ?? 0),
      vendor: d.vendor,
      model: d.model,
      transport: d.tran,
      removable: d.rm,
    }))
    .sort((a, b) => a.path.localeCompare(b.path));
}

export function describeDevice(device: BlockDevice): string {
  const name = [device.vendor, device.model].filter((part): part is string => part !== null).join(' ');
  return name ? `${name} (${device.path})` : device.path;
}

export class DeviceManager implements DeviceSource {
  private run: CommandRunner;
  private mountsPath: string;
  private canonicalize: (path: string) => Promise<string>;
  private log: FlashLogger;

  constructor(options: DeviceManagerOptions = {}) {
    this.run = options.runCommand ?? runCommand;
    this.mountsPath = options.mountsPath ?? MOUNTS_PATH;
    this.canonicalize = options.canonicalize ?? ((path) => realpath(path));
    this.log = options.logger ?? silentLogger;
  }

  /**
   * List disks that can be flashed, ordered by device path
   */
  async listTargets(): Promise<BlockDevice[]> {
    const stdout = await this.run('lsblk', ['--json', '--bytes', '--paths', '-o', LSBLK_COLUMNS.join(',')]);
    return toFlashableDevices(parseLsblk(stdout));
  }

  readMounts(): Promise<Mount[]> {
    return readMounts(this.mountsPath);
  }

  /**
   * Turn device paths into flash targets, in argument order.
   * Nothing is unmounted unless every path passes its checks.
   */
  async resolveTargets(paths: readonly string[], options: ResolveTargetsOptions = {}): Promise<FlashTarget[]> {
    const devices: string[] = [];
    for (const given of paths) {
      let device: string;
      try {
        device = await this.canonicalize(given);
      } catch (error) {
        throw new Error(`cannot resolve ${given}: ${errorMessage(error)}`);
      }
      if (devices.includes(device)) {
        throw new Error(`${device} was given more than once`);
      }
      devices.push(device);
    }

    const mounts = await this.readMounts();

    if (options.imagePath) {
      const imageDevice = await this.deviceHolding(options.imagePath, mounts);
      const clash = imageDevice === null ? undefined : devices.find((d) => isOnDevice(imageDevice, d));
      if (clash) {
        throw new SourceDeviceError(clash, options.imagePath);
      }
    }

    const mounted = new Map<string, Mount[]>();
    for (const device of devices) {
      const partitions = mounts.filter((m) => isOnDevice(m.source, device));
      if (partitions.length === 0) {
        continue;
      }
      if (!options.unmount) {
        throw new DeviceMountedError(device, partitions.map((m) => m.target));
      }
      mounted.set(device, partitions);
    }

    await this.unmount([...mounted.values()].flat());

    return devices.map((deviceId) => {
      const known = options.devices?.find((d) => d.path === deviceId);
      return known ? { deviceId, label: describeDevice(known) } : { deviceId };
    });
  }

  /**
   * Unmount deepest targets first so nested mounts are gone before their parents
   */
  async unmount(partitions: readonly Mount[]): Promise<void> {
    const ordered = [...partitions].sort((a, b) => b.target.length - a.target.length);
    for (const mount of ordered) {
      await this.run('umount', [mount.target]);
      this.log(`Unmounted ${mount.source} from ${mount.target}`, 'info');
    }
  }

  private async deviceHolding(imagePath: string, mounts: readonly Mount[]): Promise<string | null> {
    const mount = mountContaining(mounts, await this.canonicalize(imagePath));
    if (!mount || !mount.source.startsWith('/dev/')) {
      return null;
    }
    return this.canonicalize(mount.source);
  }
}
