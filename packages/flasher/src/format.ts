import { KIB, MIB, POLL_INTERVAL_MS } from './constants';

export function bytesPerSecond(bytesPerInterval: number, intervalMs: number = POLL_INTERVAL_MS): number {
  if (intervalMs <= 0) {
    return 0;
  }
  return (bytesPerInterval * 1000) / intervalMs;
}

export function formatRate(bytesPerSec: number): string {
  const rate = Math.max(0, bytesPerSec);
  if (rate >= MIB) {
    return `${Math.floor(rate / MIB)} MiB/s`;
  }
  return `${Math.floor(rate / KIB)} KiB/s`;
}

const UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

export function formatSummary(succeeded: number, total: number): string {
  if (succeeded === total) {
    return `${total} devices successfully flashed`;
  }
  return `${succeeded} of ${total} devices successfully flashed`;
}
