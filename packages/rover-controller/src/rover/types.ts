/**
 * Hazard safety state machine type definitions.
 */

import type { InvalidReadingError, InvalidThresholdError, InvalidCommandError } from '../errors.js';

export type HazardStatus = 'SAFE' | 'HAZARD';

/** Combined monitor × gate state. */
export type ControlState = 'SAFE' | 'HAZARD_GUARDED' | 'HAZARD_OVERRIDDEN';

export interface Command {
  readonly forwardAxis: number;  // [-1, 1], positive = forward
  readonly turnAxis: number;     // [-1, 1], positive = left
  readonly speed: number;        // [0, 1]
}

export type HazardTransitionEvent =
  | { kind: 'entered_hazard'; distance: number; threshold: number }
  | { kind: 'cleared_hazard'; distance: number; threshold: number };

export type OverrideTransitionEvent =
  | { kind: 'override_enabled' }
  | { kind: 'override_disabled' };

export type TransitionEvent = HazardTransitionEvent | OverrideTransitionEvent;

/** Read-only view of the monitor that the gate is allowed to see. */
export interface HazardStatusSource {
  readonly status: HazardStatus;
}

export interface GateResult {
  command: Command;
  /** True only when this tick's command was clamped or capped. */
  restricted: boolean;
}

/** Outbound collaborator. Implementations must not call back synchronously expecting fresh state. */
export interface RoverOutbound {
  publishCommand(command: Command): void;
  publishAlert(text: string): void;
  notifyStatusChanged(status: HazardStatus, safeModeEnabled: boolean): void;
}

export interface RoverSnapshot {
  currentDistance: number;
  threshold: number;
  status: HazardStatus;
  safeModeEnabled: boolean;
  manualOverride: boolean;
  controlState: ControlState;
  speedCap: number;
  readingsProcessed: number;
  readingsRejected: number;
  commandsPublished: number;
  commandsRestricted: number;
  lastCommand: Command | null;
}

export type DistanceResult =
  | { ok: true; status: HazardStatus; event: HazardTransitionEvent | null }
  | { ok: false; error: InvalidReadingError };

export type ThresholdResult =
  | { ok: true; threshold: number }
  | { ok: false; error: InvalidThresholdError };

export interface CommandResult {
  ok: true;
  command: Command;
  restricted: boolean;
  /** Range corrections applied to the raw operator input. */
  corrections: InvalidCommandError[];
}

export interface OverrideResult {
  ok: true;
  manualOverride: boolean;
  safeModeEnabled: boolean;
  event: OverrideTransitionEvent | null;
}
