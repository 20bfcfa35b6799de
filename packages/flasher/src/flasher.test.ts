import { describe, expect, it, vi } from 'vitest';
import { ImageNotReadyError, SessionActiveError } from './errors';
import { Flasher } from './flasher';
import { ControlledWriter, MemoryImageSource, settle } from './test-helpers';

const ABC = new TextEncoder().encode('abc');

function createFlasher() {
  const writer = new ControlledWriter();
  const imageSource = new MemoryImageSource({
    '/images/abc.img': ABC,
    '/images/other.img': new Uint8Array(32),
  });
  const flasher = new Flasher({ writer, imageSource, onLog: vi.fn() });
  return { flasher, writer, imageSource };
}

describe('Flasher', () => {
  it('loads an image and exposes it once ready', async () => {
    const { flasher } = createFlasher();
    const onProgress = vi.fn();

    const result = await flasher.selectImage('/images/abc.img', onProgress);

    expect(result).toEqual({ success: true, size: 3 });
    expect(flasher.getImage()).toEqual({ path: '/images/abc.img', name: 'abc.img', size: 3 });
    expect(onProgress).toHaveBeenLastCalledWith(3, 3);
    expect((await flasher.poll()).kind).toBe('ready');
  });

  it('reports a failed load through the monitor', async () => {
    const { flasher } = createFlasher();

    const result = await flasher.selectImage('/images/none.img');

    expect(result.success).toBe(false);
    expect(flasher.getImage()).toBeNull();
    expect(await flasher.poll()).toMatchObject({ kind: 'invalidated', canProceed: false });
  });

  it('clears a failed image back to empty', async () => {
    const { flasher } = createFlasher();
    await flasher.selectImage('/images/none.img');

    flasher.clearImage();

    expect((await flasher.poll()).kind).toBe('empty');
    await expect(flasher.selectImage('/images/abc.img')).resolves.toEqual({ success: true, size: 3 });
    flasher.clearImage();
    expect(flasher.getImage()).toBeNull();
    expect((await flasher.poll()).kind).toBe('empty');
  });

  it('hashes the loaded image', async () => {
    const { flasher } = createFlasher();
    expect(() => flasher.checksum('sha256')).toThrow(ImageNotReadyError);

    await flasher.selectImage('/images/abc.img');

    expect(flasher.checksum('sha256')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    expect(flasher.checksum('md5')).toBe('900150983cd24fb0d6963f7d28e17f72');
  });

  it('will not flash before an image is ready', () => {
    const { flasher } = createFlasher();
    expect(() => flasher.startFlash([{ deviceId: '/dev/sdb' }])).toThrow(ImageNotReadyError);
  });

  it('shares the loaded bytes with every writer', async () => {
    const { flasher, writer } = createFlasher();
    await flasher.selectImage('/images/abc.img');

    flasher.startFlash([{ deviceId: '/dev/sdb' }, { deviceId: '/dev/sdc' }], { verify: true });
    await settle();

    expect(flasher.isFlashInProgress()).toBe(true);
    expect(writer.calls).toHaveLength(2);
    expect(writer.calls[0].request.image).toBe(writer.calls[1].request.image);
    expect(writer.calls[0].request).toMatchObject({ totalSize: 3, verify: true });
  });

  it('refuses a new image or a second session while flashing', async () => {
    const { flasher, writer, imageSource } = createFlasher();
    await flasher.selectImage('/images/abc.img');
    flasher.startFlash([{ deviceId: '/dev/sdb' }]);
    await settle();

    await expect(flasher.selectImage('/images/other.img')).rejects.toThrow(SessionActiveError);
    expect(() => flasher.startFlash([{ deviceId: '/dev/sdc' }])).toThrow(SessionActiveError);
    expect(() => flasher.clearImage()).toThrow(SessionActiveError);
    expect(imageSource.opened).toEqual(['/images/abc.img']);

    writer.complete('/dev/sdb', 3);
    await settle();
    const report = await flasher.poll();

    expect(report).toMatchObject({ kind: 'complete', summary: '1 devices successfully flashed' });
    expect(flasher.isFlashInProgress()).toBe(false);
    await expect(flasher.selectImage('/images/other.img')).resolves.toEqual({ success: true, size: 32 });
    expect((await flasher.poll()).kind).toBe('ready');
  });
});
