/**
 * Device Detector - Polls for flashable disks being plugged in or removed
 */

import type { FlashLogger } from '@multiflash/flasher';
import { errorMessage, silentLogger } from '@multiflash/flasher';
import { DEVICE_WATCH_INTERVAL_MS } from './constants';
import type { BlockDevice, DeviceConnectionCallback, DeviceDisconnectionCallback, DeviceSource } from './types';

export interface DeviceDetectorOptions {
  logger?: FlashLogger;
}

export class DeviceDetector {
  private devices: Map<string, BlockDevice> = new Map();
  private connectionCallbacks: Set<DeviceConnectionCallback> = new Set();
  private disconnectionCallbacks: Set<DeviceDisconnectionCallback> = new Set();
  private watchInterval?: ReturnType<typeof setInterval>;
  private checking: Promise<void> | null = null;
  private log: FlashLogger;

  constructor(
    private source: DeviceSource,
    options: DeviceDetectorOptions = {}
  ) {
    this.log = options.logger ?? silentLogger;
  }

  /**
   * Start watching for device connections/disconnections
   */
  startWatching(intervalMs: number = DEVICE_WATCH_INTERVAL_MS): void {
    if (this.watchInterval) {
      return;
    }

    this.watchInterval = setInterval(() => {
      this.scheduleCheck();
    }, intervalMs);

    // Initial check
    this.scheduleCheck();
  }

  /**
   * Stop watching for device changes
   */
  stopWatching(): void {
    if (this.watchInterval) {
      clearInterval(this.watchInterval);
      this.watchInterval = undefined;
    }
  }

  isWatching(): boolean {
    return this.watchInterval !== undefined;
  }

  /**
   * Compare the current device list with the last one and notify listeners.
   * Overlapping calls share one listing.
   */
  checkDevices(): Promise<void> {
    if (!this.checking) {
      this.checking = this.refresh().finally(() => {
        this.checking = null;
      });
    }
    return this.checking;
  }

  private scheduleCheck(): void {
    this.checkDevices().catch((error: unknown) => {
      this.log(`Device check failed: ${errorMessage(error)}`, 'warning');
    });
  }

  private async refresh(): Promise<void> {
    const current = await this.source.listTargets();
    const seen = new Set<string>();

    for (const device of current) {
      seen.add(device.path);
      if (!this.devices.has(device.path)) {
        this.devices.set(device.path, device);
        this.notifyConnection(device);
      } else {
        this.devices.set(device.path, device);
      }
    }

    for (const [path] of this.devices) {
      if (!seen.has(path)) {
        this.devices.delete(path);
        this.notifyDisconnection(path);
      }
    }
  }

  /**
   * Register callback for device connections
   */
  onDeviceConnected(callback: DeviceConnectionCallback): () => void {
    this.connectionCallbacks.add(callback);
    return () => this.connectionCallbacks.delete(callback);
  }

  /**
   * Register callback for device disconnections
   */
  onDeviceDisconnected(callback: DeviceDisconnectionCallback): () => void {
    this.disconnectionCallbacks.add(callback);
    return () => this.disconnectionCallbacks.delete(callback);
  }

  private notifyConnection(device: BlockDevice): void {
    this.connectionCallbacks.forEach((callback) => callback(device));
  }

  private notifyDisconnection(path: string): void {
    this.disconnectionCallbacks.forEach((callback) => callback(path));
  }

  /**
   * Get all currently tracked devices
   */
  getDevices(): BlockDevice[] {
    return Array.from(this.devices.values());
  }
}
