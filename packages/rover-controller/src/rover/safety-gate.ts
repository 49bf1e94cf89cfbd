/**
 * Safety gate: the single chokepoint every motion command passes through.
 *
 * While safe mode is engaged, forward motion is blocked and speed is
 * capped; reverse and turning stay available so the operator can back
 * away from the hazard.
 */

import { DEFAULT_SAFE_MODE_SPEED_CAP } from '../constants.js';
import type { Command, GateResult, HazardStatusSource, HazardTransitionEvent } from './types.js';

export interface SafetyGateOptions {
  speedCap?: number;
}

export class SafetyGate {
  private safeMode = false;
  private override = false;
  private readonly cap: number;

  constructor(private readonly monitor: HazardStatusSource, options: SafetyGateOptions = {}) {
    this.cap = options.speedCap ?? DEFAULT_SAFE_MODE_SPEED_CAP;
  }

  get safeModeEnabled(): boolean {
    return this.safeMode;
  }

  get manualOverride(): boolean {
    return this.override;
  }

  get speedCap(): number {
    return this.cap;
  }

  onTransition(event: HazardTransitionEvent): void {
    switch (event.kind) {
      case 'entered_hazard':
        this.safeMode = !this.override;
        break;
      case 'cleared_hazard':
        this.safeMode = false;
        break;
    }
  }

  /**
   * Record the operator override flag. While a hazard is active the flag
   * also drives safe mode directly; otherwise it only affects the next
   * hazard entry.
   * @returns whether the flag changed
   */
  setOverride(enabled: boolean): boolean {
    const changed = this.override !== enabled;
    this.override = enabled;
    if (this.monitor.status === 'HAZARD') {
      this.safeMode = !enabled;
    }
    return changed;
  }

  apply(raw: Command): GateResult {
    if (!this.safeMode) {
      return { command: raw, restricted: false };
    }

    const forwardAxis = raw.forwardAxis > 0 ? 0 : raw.forwardAxis;
    const speed = Math.min(raw.speed, this.cap);
    const restricted = forwardAxis !== raw.forwardAxis || speed < raw.speed;

    return {
      command: { forwardAxis, turnAxis: raw.turnAxis, speed },
      restricted,
    };
  }
}
