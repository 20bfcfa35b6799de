import { describe, expect, it } from 'vitest';
import { isOnDevice, mountContaining, parseMounts } from './mounts';

const PROC_MOUNTS = [
  '/dev/nvme0n1p2 / ext4 rw,relatime 0 0',
  'proc /proc proc rw,nosuid,nodev,noexec,relatime 0 0',
  '/dev/sdc1 /media/user/USB\\040STICK vfat rw,nosuid 0 0',
  '/dev/sdd1 /media/user/data ext4 rw 0 0',
  '',
].join('\n');

describe('parseMounts', () => {
  it('reads each line and decodes escaped characters', () => {
    const mounts = parseMounts(PROC_MOUNTS);

    expect(mounts).toHaveLength(4);
    expect(mounts[2]).toEqual({
      source: '/dev/sdc1',
      target: '/media/user/USB STICK',
      fstype: 'vfat',
      options: 'rw,nosuid',
    });
  });
});

describe('isOnDevice', () => {
  it('matches the device and its partitions', () => {
    expect(isOnDevice('/dev/sdb', '/dev/sdb')).toBe(true);
    expect(isOnDevice('/dev/sdb1', '/dev/sdb')).toBe(true);
    expect(isOnDevice('/dev/nvme0n1p2', '/dev/nvme0n1')).toBe(true);
    expect(isOnDevice('/dev/mmcblk0p1', '/dev/mmcblk0')).toBe(true);
  });

  it('does not match a device whose name merely starts the same', () => {
    expect(isOnDevice('/dev/sdbb1', '/dev/sdb')).toBe(false);
    expect(isOnDevice('/dev/sdc1', '/dev/sdb')).toBe(false);
  });

  it('requires a p before partitions of devices whose name ends in a digit', () => {
    expect(isOnDevice('/dev/loop10', '/dev/loop1')).toBe(false);
    expect(isOnDevice('/dev/nvme0n12', '/dev/nvme0n1')).toBe(false);
    expect(isOnDevice('/dev/loop1p1', '/dev/loop1')).toBe(true);
    expect(isOnDevice('/dev/sdbp1', '/dev/sdb')).toBe(false);
  });
});

describe('mountContaining', () => {
  const mounts = parseMounts(PROC_MOUNTS);

  it('picks the deepest mount holding the path', () => {
    expect(mountContaining(mounts, '/media/user/data/images/os.img')?.source).toBe('/dev/sdd1');
    expect(mountContaining(mounts, '/home/user/os.img')?.source).toBe('/dev/nvme0n1p2');
  });

  it('does not treat a sibling directory as inside a mount', () => {
    expect(mountContaining(mounts, '/media/user/database/os.img')?.source).toBe('/dev/nvme0n1p2');
  });

  it('returns null when nothing is mounted', () => {
    expect(mountContaining([], '/tmp/os.img')).toBeNull();
  });
});
