import { describe, expect, it } from 'vitest';
import { MIB } from './constants';
import { bytesPerSecond, formatBytes, formatRate, formatSummary } from './format';

describe('rate formatting', () => {
  it('converts bytes per poll interval to bytes per second', () => {
    expect(bytesPerSecond(300, 500)).toBe(600);
    expect(bytesPerSecond(300, 250)).toBe(1200);
    expect(bytesPerSecond(300, 0)).toBe(0);
  });

  it('switches to MiB/s at one mebibyte per second', () => {
    expect(formatRate(MIB)).toBe('1 MiB/s');
    expect(formatRate(MIB - 1)).toBe('1023 KiB/s');
    expect(formatRate(5.9 * MIB)).toBe('5 MiB/s');
  });

  it('floors small and negative rates to whole KiB/s', () => {
    expect(formatRate(0)).toBe('0 KiB/s');
    expect(formatRate(1023)).toBe('0 KiB/s');
    expect(formatRate(2048)).toBe('2 KiB/s');
    expect(formatRate(-10)).toBe('0 KiB/s');
  });
});

describe('formatBytes', () => {
  it('uses binary units', () => {
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KiB');
    expect(formatBytes(4 * MIB)).toBe('4.0 MiB');
  });
});

describe('formatSummary', () => {
  it('reports a full success without a ratio', () => {
    expect(formatSummary(3, 3)).toBe('3 devices successfully flashed');
  });

  it('reports partial success as K of N', () => {
    expect(formatSummary(2, 3)).toBe('2 of 3 devices successfully flashed');
    expect(formatSummary(0, 2)).toBe('0 of 2 devices successfully flashed');
  });
});
