/**
 * Hazard monitor: tracks the last distance reading against a threshold.
 *
 * Status is recomputed only on `update`. A threshold change is picked up
 * by the next sensor reading; `setThreshold` never flips status by itself.
 */

import { InvalidReadingError, InvalidThresholdError } from '../errors.js';
import { DEFAULT_HAZARD_THRESHOLD_M, NO_HAZARD_DISTANCE_M } from '../constants.js';
import type { DistanceResult, HazardStatus, HazardStatusSource, ThresholdResult } from './types.js';

export interface HazardMonitorOptions {
  threshold?: number;
  initialDistance?: number;
}

export function classifyDistance(distance: number, threshold: number): HazardStatus {
  return distance <= threshold ? 'HAZARD' : 'SAFE';
}

export function isValidReading(distance: number): boolean {
  return Number.isFinite(distance) && distance >= 0;
}

export function isValidThreshold(threshold: number): boolean {
  return Number.isFinite(threshold) && threshold > 0;
}

export class HazardMonitor implements HazardStatusSource {
  private distance: number;
  private thresholdM: number;
  private currentStatus: HazardStatus;

  constructor(options: HazardMonitorOptions = {}) {
    const threshold = options.threshold ?? DEFAULT_HAZARD_THRESHOLD_M;
    const initial = options.initialDistance ?? NO_HAZARD_DISTANCE_M;
    if (!isValidThreshold(threshold)) {
      throw new InvalidThresholdError(threshold);
    }
    if (!isValidReading(initial)) {
      throw new InvalidReadingError(initial);
    }
    this.thresholdM = threshold;
    this.distance = initial;
    this.currentStatus = classifyDistance(initial, threshold);
  }

  get status(): HazardStatus {
    return this.currentStatus;
  }

  get currentDistance(): number {
    return this.distance;
  }

  get threshold(): number {
    return this.thresholdM;
  }

  update(distance: number): DistanceResult {
    if (!isValidReading(distance)) {
      return { ok: false, error: new InvalidReadingError(distance) };
    }

    const previous = this.currentStatus;
    this.distance = distance;
    this.currentStatus = classifyDistance(distance, this.thresholdM);

    if (previous === 'SAFE' && this.currentStatus === 'HAZARD') {
      return {
        ok: true,
        status: this.currentStatus,
        event: { kind: 'entered_hazard', distance, threshold: this.thresholdM },
      };
    }
    if (previous === 'HAZARD' && this.currentStatus === 'SAFE') {
      return {
        ok: true,
        status: this.currentStatus,
        event: { kind: 'cleared_hazard', distance, threshold: this.thresholdM },
      };
    }
    return { ok: true, status: this.currentStatus, event: null };
  }

  setThreshold(value: number): ThresholdResult {
    if (!isValidThreshold(value)) {
      return { ok: false, error: new InvalidThresholdError(value) };
    }
    this.thresholdM = value;
    return { ok: true, threshold: value };
  }
}
