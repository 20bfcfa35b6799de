/**
 * Programming-error classes. Runtime failures of loads and writes are returned
 * as values (LoadResult, WriteOutcome) and never thrown through these.
 */

import type { LoadPhase } from './types';

export class ImageBusyError extends Error {
  constructor(path: string) {
    super(`An image is already loading; cannot load ${path} until it completes`);
    this.name = 'ImageBusyError';
  }
}

export class InvalidPhaseTransitionError extends Error {
  constructor(
    readonly from: LoadPhase,
    readonly to: LoadPhase
  ) {
    super(`Invalid image phase transition: ${from} -> ${to}`);
    this.name = 'InvalidPhaseTransitionError';
  }
}

export class ImageNotReadyError extends Error {
  constructor(phase: LoadPhase) {
    super(`Image is not ready (phase: ${phase})`);
    this.name = 'ImageNotReadyError';
  }
}

export class SessionActiveError extends Error {
  constructor() {
    super('Flash operation already in progress');
    this.name = 'SessionActiveError';
  }
}

export class SessionNotFinishedError extends Error {
  constructor(pending: string[]) {
    super(`Cannot drain flash session; still writing: ${pending.join(', ')}`);
    this.name = 'SessionNotFinishedError';
  }
}

export class NoSessionError extends Error {
  constructor() {
    super('No flash session to drain');
    this.name = 'NoSessionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
