/**
 * Operator input sampler.
 *
 * Holds the operator's current intent (drive buttons, stick, speed) and
 * forwards it to the controller on a fixed cadence. A sample is only
 * forwarded when it differs from the last forwarded one by more than the
 * command deadzone, or when the controller's safety status changed since
 * then, so a held command is re-gated against the new state.
 */

import {
  DEFAULT_COMMAND_DEADZONE,
  DEFAULT_SAMPLE_INTERVAL_MS,
  DEFAULT_STICK_DEADZONE,
  SPEED_STEP_PERCENT,
} from '../constants.js';
import { errorMessage } from '../errors.js';
import { STOP_COMMAND } from '../rover/command.js';
import type { Command, CommandResult } from '../rover/types.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export type DriveButton = 'forward' | 'backward' | 'left' | 'right';

export const DRIVE_BUTTONS: readonly DriveButton[] = ['forward', 'backward', 'left', 'right'];

export interface OperatorCommandSink {
  onOperatorCommand(forwardAxis: number, turnAxis: number, speed: number): Promise<CommandResult>;
}

export interface OperatorInputOptions {
  sink: OperatorCommandSink;
  sampleIntervalMs?: number;
  commandDeadzone?: number;
  stickDeadzone?: number;
  logger?: Logger;
}

export class OperatorInputSampler {
  private readonly sink: OperatorCommandSink;
  private readonly sampleIntervalMs: number;
  private readonly commandDeadzone: number;
  private readonly stickDeadzone: number;
  private readonly log: Logger;

  private buttons: Record<DriveButton, boolean> = { forward: false, backward: false, left: false, right: false };
  private stick = { forward: 0, turn: 0 };
  private speed = 0;
  private speedAxis = 0;
  private lastForwarded: Command = STOP_COMMAND;
  private resendPending = false;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: OperatorInputOptions) {
    this.sink = options.sink;
    this.sampleIntervalMs = options.sampleIntervalMs ?? DEFAULT_SAMPLE_INTERVAL_MS;
    this.commandDeadzone = options.commandDeadzone ?? DEFAULT_COMMAND_DEADZONE;
    this.stickDeadzone = options.stickDeadzone ?? DEFAULT_STICK_DEADZONE;
    this.log = options.logger ?? rootLogger.child('OperatorInput');
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((err: unknown) => {
        this.log.error('Operator sample failed', { error: errorMessage(err) });
      });
    }, this.sampleIntervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  setButton(button: DriveButton, pressed: boolean): void {
    this.buttons[button] = pressed;
    this.log.debug(`Button ${button} ${pressed ? 'pressed' : 'released'}`);
  }

  /** Stick axes in command space (forward positive, left positive). */
  setStick(forward: number, turn: number): void {
    let f = Math.abs(forward) > this.stickDeadzone ? forward : 0;
    let t = Math.abs(turn) > this.stickDeadzone ? turn : 0;
    const magnitude = Math.sqrt(f * f + t * t);
    if (magnitude > 1) {
      f /= magnitude;
      t /= magnitude;
    }
    this.stick = { forward: f, turn: t };
  }

  setSpeed(speed: number): void {
    this.speed = Math.min(1, Math.max(0, speed));
    this.log.debug(`Speed set to ${Math.round(this.speed * 100)}%`);
  }

  /**
   * Step the speed by a whole number of percent, clamped to 0..100.
   * @param axis speed stick deflection in [-1, 1]; full deflection moves
   *   the speed by SPEED_STEP_PERCENT
   */
  adjustSpeed(axis: number): void {
    const change = Math.trunc(axis * SPEED_STEP_PERCENT);
    if (change === 0) return;
    const percent = Math.min(100, Math.max(0, Math.round(this.speed * 100) + change));
    this.speed = percent / 100;
    this.log.debug(`Speed adjusted to ${percent}%`);
  }

  /** Held speed stick, applied through adjustSpeed on every tick. */
  setSpeedAxis(axis: number): void {
    const clamped = Math.min(1, Math.max(-1, axis));
    this.speedAxis = Math.abs(clamped) > this.stickDeadzone ? clamped : 0;
  }

  /** Release every input without forwarding anything. */
  release(): void {
    this.buttons = { forward: false, backward: false, left: false, right: false };
    this.stick = { forward: 0, turn: 0 };
    this.speedAxis = 0;
  }

  /** Force the next tick to forward the held command. */
  requestResend(): void {
    this.resendPending = true;
  }

  /** The command the operator is currently asking for. */
  sample(): Command {
    if (this.stick.forward !== 0 || this.stick.turn !== 0) {
      return { forwardAxis: this.stick.forward, turnAxis: this.stick.turn, speed: this.speed };
    }
    let forwardAxis = 0;
    let turnAxis = 0;
    if (this.buttons.forward) forwardAxis += 1;
    if (this.buttons.backward) forwardAxis -= 1;
    if (this.buttons.left) turnAxis += 1;
    if (this.buttons.right) turnAxis -= 1;
    return { forwardAxis, turnAxis, speed: this.speed };
  }

  /**
   * Sample once and forward if needed.
   * @returns the controller result, or null when nothing was forwarded
   */
  async tick(): Promise<CommandResult | null> {
    if (this.speedAxis !== 0) this.adjustSpeed(this.speedAxis);
    const current = this.sample();
    if (!this.resendPending && !this.differs(current, this.lastForwarded)) {
      return null;
    }
    return this.forward(current);
  }

  /** Release all input and send a zero command immediately. */
  async emergencyStop(): Promise<CommandResult> {
    this.release();
    this.speed = 0;
    this.log.warn('EMERGENCY STOP issued');
    return this.forward(STOP_COMMAND);
  }

  private differs(a: Command, b: Command): boolean {
    return Math.abs(a.forwardAxis - b.forwardAxis) > this.commandDeadzone
      || Math.abs(a.turnAxis - b.turnAxis) > this.commandDeadzone
      || Math.abs(a.speed - b.speed) > this.commandDeadzone;
  }

  private forward(command: Command): Promise<CommandResult> {
    this.lastForwarded = command;
    this.resendPending = false;
    return this.sink.onOperatorCommand(command.forwardAxis, command.turnAxis, command.speed);
  }
}
