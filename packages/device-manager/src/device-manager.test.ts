import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DeviceManager, describeDevice, parseLsblk, toFlashableDevices } from './device-manager';
import { DeviceMountedError, SourceDeviceError } from './errors';

const LSBLK = JSON.stringify({
  blockdevices: [
    { name: '/dev/sda', size: 512110190592, type: 'disk', tran: 'sata', rm: false, ro: false, vendor: 'ATA     ', model: 'SSD' },
    { name: '/dev/sdc', size: '16008609792', type: 'disk', tran: 'usb', rm: '0', ro: '0', vendor: 'SanDisk ', model: 'Ultra' },
    { name: '/dev/sdb', size: 8004304896, type: 'disk', tran: null, rm: true, ro: false, vendor: null, model: null },
    { name: '/dev/sde', size: 4001366016, type: 'disk', tran: 'usb', rm: true, ro: true, vendor: 'Kingston', model: 'Locked' },
    { name: '/dev/sr0', size: 1073741312, type: 'rom', tran: 'usb', rm: true, ro: false, vendor: null, model: 'DVD' },
    { name: '/dev/loop0', size: 4096, type: 'loop', tran: null, rm: false, ro: false, vendor: null, model: null },
  ],
});

const PROC_MOUNTS = [
  '/dev/nvme0n1p2 / ext4 rw,relatime 0 0',
  '/dev/sdc1 /media/user/USB\\040STICK vfat rw 0 0',
  '/dev/sdd1 /media/user/data ext4 rw 0 0',
  '/dev/sdg2 /media/stick ext4 rw 0 0',
  '/dev/sdg1 /media/stick/boot vfat rw 0 0',
  '/dev/loop10 /snap/core/1 squashfs ro 0 0',
].join('\n');

const LINKS: Record<string, string> = {
  '/dev/disk/by-id/usb-Stick': '/dev/sdf',
  '/dev/disk/by-id/usb-B': '/dev/sdb',
};

async function canonicalize(p: string): Promise<string> {
  if (p === '/dev/missing') {
    throw new Error(`ENOENT: no such file or directory, realpath '${p}'`);
  }
  return LINKS[p] ?? p;
}

describe('parseLsblk', () => {
  it('rejects output without a device list', () => {
    expect(() => parseLsblk('{}')).toThrow('Unexpected lsblk output: missing blockdevices');
    expect(() => parseLsblk('{"blockdevices":{}}')).toThrow('Unexpected lsblk output: missing blockdevices');
  });

  it('reads flags in either form and skips malformed entries', () => {
    const devices = parseLsblk(
      JSON.stringify({
        blockdevices: [
          { name: '/dev/sdb', size: '8004304896', type: 'disk', tran: ' usb ', rm: '1', ro: false, vendor: '   ', model: 'Ultra' },
          { name: 7, type: 'disk' },
          'garbage',
          { name: '/dev/sdc', type: 'disk' },
        ],
      })
    );

    expect(devices).toEqual([
      { name: '/dev/sdb', size: '8004304896', type: 'disk', tran: 'usb', rm: true, ro: false, vendor: null, model: 'Ultra' },
      { name: '/dev/sdc', size: null, type: 'disk', tran: null, rm: false, ro: false, vendor: null, model: null },
    ]);
  });
});

describe('toFlashableDevices', () => {
  it('keeps writable removable or USB disks, ordered by path', () => {
    const devices = toFlashableDevices(parseLsblk(LSBLK));

    expect(devices).toEqual([
      { path: '/dev/sdb', size: 8004304896, vendor: null, model: null, transport: null, removable: true },
      { path: '/dev/sdc', size: 16008609792, vendor: 'SanDisk', model: 'Ultra', transport: 'usb', removable: false },
    ]);
  });
});

describe('describeDevice', () => {
  it('names the device by vendor and model when known', () => {
    const [bare, named] = toFlashableDevices(parseLsblk(LSBLK));
    expect(describeDevice(named)).toBe('SanDisk Ultra (/dev/sdc)');
    expect(describeDevice(bare)).toBe('/dev/sdb');
  });
});

describe('DeviceManager', () => {
  let dir: string;
  let mountsPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'multiflash-mounts-'));
    mountsPath = path.join(dir, 'mounts');
    await writeFile(mountsPath, PROC_MOUNTS);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createManager() {
    const runCommand = vi.fn(async (command: string, _args: readonly string[]) => (command === 'lsblk' ? LSBLK : ''));
    const logger = vi.fn();
    const manager = new DeviceManager({ runCommand, mountsPath, canonicalize, logger });
    return { manager, runCommand, logger };
  }

  it('lists targets through lsblk', async () => {
    const { manager, runCommand } = createManager();

    const devices = await manager.listTargets();

    expect(runCommand).toHaveBeenCalledWith('lsblk', [
      '--json',
      '--bytes',
      '--paths',
      '-o',
      'NAME,SIZE,TYPE,TRAN,RM,RO,VENDOR,MODEL',
    ]);
    expect(devices.map((d) => d.path)).toEqual(['/dev/sdb', '/dev/sdc']);
  });

  it('resolves symlinks and keeps argument order', async () => {
    const { manager, runCommand } = createManager();

    const targets = await manager.resolveTargets(['/dev/disk/by-id/usb-Stick', '/dev/sdb']);

    expect(targets).toEqual([{ deviceId: '/dev/sdf' }, { deviceId: '/dev/sdb' }]);
    expect(runCommand).not.toHaveBeenCalled();
  });

  it('rejects the same device given twice', async () => {
    const { manager } = createManager();

    await expect(manager.resolveTargets(['/dev/sdb', '/dev/disk/by-id/usb-B'])).rejects.toThrow(
      '/dev/sdb was given more than once'
    );
  });

  it('reports a path that does not exist', async () => {
    const { manager } = createManager();

    await expect(manager.resolveTargets(['/dev/missing'])).rejects.toThrow(
      "cannot resolve /dev/missing: ENOENT: no such file or directory, realpath '/dev/missing'"
    );
  });

  it('refuses a mounted device unless asked to unmount', async () => {
    const { manager, runCommand } = createManager();

    const attempt = manager.resolveTargets(['/dev/sdc']);

    await expect(attempt).rejects.toThrow(DeviceMountedError);
    await expect(attempt).rejects.toThrow('/dev/sdc is mounted on /media/user/USB STICK');
    expect(runCommand).not.toHaveBeenCalled();
  });

  it('unmounts mounted partitions when asked', async () => {
    const { manager, runCommand, logger } = createManager();

    const targets = await manager.resolveTargets(['/dev/sdc'], { unmount: true });

    expect(targets).toEqual([{ deviceId: '/dev/sdc' }]);
    expect(runCommand).toHaveBeenCalledWith('umount', ['/media/user/USB STICK']);
    expect(logger).toHaveBeenCalledWith('Unmounted /dev/sdc1 from /media/user/USB STICK', 'info');
  });

  it('unmounts nested mounts before their parents', async () => {
    const { manager, runCommand } = createManager();

    await manager.resolveTargets(['/dev/sdg'], { unmount: true });

    expect(runCommand.mock.calls).toEqual([
      ['umount', ['/media/stick/boot']],
      ['umount', ['/media/stick']],
    ]);
  });

  it('leaves mounts of a device with a longer name alone', async () => {
    const { manager, runCommand } = createManager();

    const targets = await manager.resolveTargets(['/dev/loop1'], { unmount: true });

    expect(targets).toEqual([{ deviceId: '/dev/loop1' }]);
    expect(runCommand).not.toHaveBeenCalled();
  });

  it('labels targets found among listed devices', async () => {
    const { manager } = createManager();
    const devices = await manager.listTargets();

    const targets = await manager.resolveTargets(['/dev/sdc', '/dev/sdf'], { unmount: true, devices });

    expect(targets).toEqual([{ deviceId: '/dev/sdc', label: 'SanDisk Ultra (/dev/sdc)' }, { deviceId: '/dev/sdf' }]);
  });

  it('refuses the device holding the image and unmounts nothing', async () => {
    const { manager, runCommand } = createManager();

    const attempt = manager.resolveTargets(['/dev/sdc', '/dev/sdd'], {
      imagePath: '/media/user/data/images/os.img',
      unmount: true,
    });

    await expect(attempt).rejects.toThrow(SourceDeviceError);
    await expect(attempt).rejects.toThrow('/dev/sdd holds the image /media/user/data/images/os.img');
    expect(runCommand).not.toHaveBeenCalled();
  });
});
