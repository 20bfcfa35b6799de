/**
 * Type definitions for device manager
 */

import type { z } from 'zod';
import type { rawBlockDeviceSchema } from './schemas';

/** One entry of `lsblk --json` output, with flags read as booleans and blank text as null. */
export type RawBlockDevice = z.infer<typeof rawBlockDeviceSchema>;

export interface BlockDevice {
  /** Device node, e.g. /dev/sdb */
  path: string;
  size: number;
  vendor: string | null;
  model: string | null;
  transport: string | null;
  removable: boolean;
}

export interface Mount {
  source: string;
  target: string;
  fstype: string;
  options: string;
}

/** Runs a command and resolves with its stdout; rejects with CommandError on a non-zero exit. */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<string>;

export interface DeviceSource {
  listTargets(): Promise<BlockDevice[]>;
}

export interface ResolveTargetsOptions {
  /** Image being flashed; the device holding it is refused */
  imagePath?: string;
  /** Unmount mounted partitions instead of refusing the device */
  unmount?: boolean;
  /** Devices already listed; a target found here is labelled with its vendor and model */
  devices?: readonly BlockDevice[];
}

export type DeviceConnectionCallback = (device: BlockDevice) => void;
export type DeviceDisconnectionCallback = (path: string) => void;
