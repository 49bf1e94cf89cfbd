/**
 * Combined control state tracking.
 *
 * States:
 * - SAFE: no hazard, commands pass through unchanged
 * - HAZARD_GUARDED: hazard active, safe mode restricts commands
 * - HAZARD_OVERRIDDEN: hazard active, operator override suspends safe mode
 *
 * There is no terminal state.
 */

import { DEFAULT_STATE_HISTORY } from '../constants.js';
import { errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { ControlState, HazardStatus } from './types.js';

export interface ControlStateTransition {
  from: ControlState;
  to: ControlState;
  reason: string;
  timestamp: number;
}

export type ControlStateListener = (transition: ControlStateTransition) => void;

export function deriveControlState(status: HazardStatus, manualOverride: boolean): ControlState {
  if (status === 'SAFE') return 'SAFE';
  return manualOverride ? 'HAZARD_OVERRIDDEN' : 'HAZARD_GUARDED';
}

export class ControlStateTracker {
  private state: ControlState = 'SAFE';
  private history: ControlStateTransition[] = [];
  private listeners: ControlStateListener[] = [];

  constructor(
    private readonly log: Logger = rootLogger.child('ControlState'),
    private readonly maxHistory = DEFAULT_STATE_HISTORY,
  ) {}

  get currentState(): ControlState {
    return this.state;
  }

  /**
   * Move to the state implied by (status, override).
   * @returns the transition, or null when the state is unchanged
   */
  sync(status: HazardStatus, manualOverride: boolean, reason: string): ControlStateTransition | null {
    const to = deriveControlState(status, manualOverride);
    if (to === this.state) return null;

    const transition: ControlStateTransition = {
      from: this.state,
      to,
      reason,
      timestamp: Date.now(),
    };

    this.state = to;
    this.history.push(transition);
    if (this.history.length > this.maxHistory) {
      this.history = this.history.slice(-this.maxHistory);
    }

    for (const listener of this.listeners) {
      try {
        listener(transition);
      } catch (err) {
        this.log.warn('State listener failed', { error: errorMessage(err) });
      }
    }

    return transition;
  }

  onStateChange(listener: ControlStateListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  /** Newest first. */
  getHistory(limit?: number): ControlStateTransition[] {
    const result = [...this.history].reverse();
    return limit ? result.slice(0, limit) : result;
  }
}
