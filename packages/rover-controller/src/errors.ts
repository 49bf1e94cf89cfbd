/**
 * Custom error types for the rover controller.
 *
 * Core operations return these as values; only the bridge and config
 * layers throw them.
 */

export type RoverErrorCode =
  | 'INVALID_READING'
  | 'INVALID_THRESHOLD'
  | 'INVALID_COMMAND'
  | 'PUBLISH_FAILURE'
  | 'BRIDGE_CONNECTION_ERROR'
  | 'BRIDGE_TIMEOUT'
  | 'CONFIG_LOAD_ERROR';

/** Base error for all rover controller errors */
export class RoverControlError extends Error {
  constructor(message: string, public readonly code: RoverErrorCode) {
    super(message);
    this.name = 'RoverControlError';
  }
}

/** Distance reading that is negative, NaN or infinite */
export class InvalidReadingError extends RoverControlError {
  constructor(public readonly reading: number) {
    super(`Invalid distance reading: ${reading}`, 'INVALID_READING');
    this.name = 'InvalidReadingError';
  }
}

/** Threshold that is not a positive finite number */
export class InvalidThresholdError extends RoverControlError {
  constructor(public readonly threshold: number) {
    super(`Invalid hazard threshold: ${threshold} (must be > 0)`, 'INVALID_THRESHOLD');
    this.name = 'InvalidThresholdError';
  }
}

/** Operator command outside the documented ranges (normalized, never rejected) */
export class InvalidCommandError extends RoverControlError {
  constructor(message: string, public readonly field: 'forwardAxis' | 'turnAxis' | 'speed') {
    super(message, 'INVALID_COMMAND');
    this.name = 'InvalidCommandError';
  }
}

/** Outbound publish that did not reach the robot */
export class PublishFailureError extends RoverControlError {
  constructor(message: string, public readonly target?: string) {
    super(message, 'PUBLISH_FAILURE');
    this.name = 'PublishFailureError';
  }
}

/** Bridge connection errors */
export class BridgeConnectionError extends RoverControlError {
  constructor(message: string, public readonly bridgeUrl?: string) {
    super(message, 'BRIDGE_CONNECTION_ERROR');
    this.name = 'BridgeConnectionError';
  }
}

/** Bridge timeout errors */
export class BridgeTimeoutError extends RoverControlError {
  constructor(message: string, public readonly timeoutMs?: number) {
    super(message, 'BRIDGE_TIMEOUT');
    this.name = 'BridgeTimeoutError';
  }
}

/** Configuration file could not be read or validated */
export class ConfigLoadError extends RoverControlError {
  constructor(message: string, public readonly filePath?: string) {
    super(message, 'CONFIG_LOAD_ERROR');
    this.name = 'ConfigLoadError';
  }
}

/** Render any thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
