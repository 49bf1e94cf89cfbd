/**
 * Motion command helpers: range normalization and wire conversion.
 */

import { InvalidCommandError } from '../errors.js';
import type { Twist } from '../types/ros.js';
import type { Command } from './types.js';

export const STOP_COMMAND: Command = Object.freeze({ forwardAxis: 0, turnAxis: 0, speed: 0 });

export interface NormalizedCommand {
  command: Command;
  corrections: InvalidCommandError[];
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function normalizeField(
  field: 'forwardAxis' | 'turnAxis' | 'speed',
  value: number,
  min: number,
  max: number,
  corrections: InvalidCommandError[],
): number {
  if (Number.isNaN(value)) {
    corrections.push(new InvalidCommandError(`${field} is NaN, using 0`, field));
    return 0;
  }
  const bounded = clamp(value, min, max);
  if (bounded !== value) {
    corrections.push(new InvalidCommandError(`${field} ${value} clamped to ${bounded}`, field));
  }
  return bounded;
}

/**
 * Clamp raw operator input into the documented ranges.
 * Input devices can transiently report out-of-range values, so this never fails.
 */
export function normalizeCommand(forwardAxis: number, turnAxis: number, speed: number): NormalizedCommand {
  const corrections: InvalidCommandError[] = [];
  const command: Command = {
    forwardAxis: normalizeField('forwardAxis', forwardAxis, -1, 1, corrections),
    turnAxis: normalizeField('turnAxis', turnAxis, -1, 1, corrections),
    speed: normalizeField('speed', speed, 0, 1, corrections),
  };
  return { command, corrections };
}

/** Scale the axes by speed into a Twist for cmd_vel. */
export function toTwist(command: Command): Twist {
  return {
    linear: { x: command.forwardAxis * command.speed, y: 0, z: 0 },
    angular: { x: 0, y: 0, z: command.turnAxis * command.speed },
  };
}

export function formatCommand(command: Command): string {
  return `x: ${command.forwardAxis.toFixed(2)} | z: ${command.turnAxis.toFixed(2)} | speed: ${command.speed.toFixed(2)}`;
}
