/**
 * Load Phase Machine - Tracks the image buffer's load phase
 *
 * Empty -> Loading -> Ready -> Loading -> ...
 * Loading -> Invalidated -> Empty
 */

import { InvalidPhaseTransitionError } from './errors';
import type { LoadPhase } from './types';

const TRANSITIONS: Record<LoadPhase, readonly LoadPhase[]> = {
  empty: ['loading'],
  loading: ['ready', 'invalidated'],
  ready: ['loading', 'empty'],
  invalidated: ['loading', 'empty'],
};

export class LoadPhaseMachine {
  private currentPhase: LoadPhase = 'empty';
  private phaseListeners: Set<(phase: LoadPhase, previous: LoadPhase) => void> = new Set();

  /**
   * Get current phase
   */
  getPhase(): LoadPhase {
    return this.currentPhase;
  }

  canTransition(phase: LoadPhase): boolean {
    return TRANSITIONS[this.currentPhase].includes(phase);
  }

  /**
   * Transition to new phase
   */
  transition(phase: LoadPhase): void {
    if (!this.canTransition(phase)) {
      throw new InvalidPhaseTransitionError(this.currentPhase, phase);
    }

    const previous = this.currentPhase;
    this.currentPhase = phase;
    this.notifyPhaseListeners(phase, previous);
  }

  /**
   * Register phase change listener
   */
  onPhaseChange(callback: (phase: LoadPhase, previous: LoadPhase) => void): () => void {
    this.phaseListeners.add(callback);
    return () => this.phaseListeners.delete(callback);
  }

  private notifyPhaseListeners(phase: LoadPhase, previous: LoadPhase): void {
    this.phaseListeners.forEach((callback) => callback(phase, previous));
  }
}
