/**
 * Image Buffer - Source image path and bytes behind a load phase
 *
 * Written once per load by the loader, read by the monitor and by session start.
 * Bytes are only non-empty while the phase is `ready`, and are never mutated in
 * that phase: a new load first moves back to `loading` and clears them.
 *
 * The caller must not begin a new load while a flash session holds the current
 * bytes; the Flasher facade enforces this.
 */

import path from 'node:path';
import { ImageBusyError, InvalidPhaseTransitionError } from './errors';
import { LoadPhaseMachine } from './state-machine';
import type { ImageInfo, LoadPhase } from './types';

const EMPTY = new Uint8Array(0);

export interface ImageBufferSnapshot {
  phase: LoadPhase;
  path: string;
  size: number;
}

export class ImageBuffer {
  private readonly machine = new LoadPhaseMachine();
  private currentPath = '';
  private data: Uint8Array = EMPTY;
  private failure: Error | null = null;

  get phase(): LoadPhase {
    return this.machine.getPhase();
  }

  get path(): string {
    return this.currentPath;
  }

  /** Read-only view of the loaded image; empty unless the phase is `ready`. */
  get bytes(): Uint8Array {
    return this.data;
  }

  /** Error passed to the last failLoad, cleared when a new load begins. */
  get lastError(): Error | null {
    return this.failure;
  }

  beginLoad(imagePath: string): void {
    if (this.phase === 'loading') {
      throw new ImageBusyError(imagePath);
    }

    this.data = EMPTY;
    this.failure = null;
    this.currentPath = imagePath;
    this.machine.transition('loading');
  }

  completeLoad(bytes: Uint8Array): void {
    this.assertTransition('ready');
    this.data = bytes;
    this.machine.transition('ready');
  }

  failLoad(error?: Error): void {
    this.assertTransition('invalidated');
    this.failure = error ?? null;
    this.machine.transition('invalidated');
  }

  /** Returns a ready or invalidated buffer to `empty`. */
  reset(): void {
    this.machine.transition('empty');
    this.data = EMPTY;
    this.currentPath = '';
    this.failure = null;
  }

  size(): number {
    return this.data.byteLength;
  }

  info(): ImageInfo {
    return {
      path: this.currentPath,
      name: path.basename(this.currentPath),
      size: this.size(),
    };
  }

  snapshot(): ImageBufferSnapshot {
    return { phase: this.phase, path: this.currentPath, size: this.size() };
  }

  private assertTransition(phase: LoadPhase): void {
    if (!this.machine.canTransition(phase)) {
      throw new InvalidPhaseTransitionError(this.phase, phase);
    }
  }

  onPhaseChange(callback: (phase: LoadPhase, previous: LoadPhase) => void): () => void {
    return this.machine.onPhaseChange(callback);
  }
}
