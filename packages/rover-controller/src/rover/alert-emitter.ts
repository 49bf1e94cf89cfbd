/**
 * Alert text for state machine transitions. One alert per event.
 */

import type { TransitionEvent } from './types.js';

export const OVERRIDE_ENABLED_ALERT = 'WARNING: Safe mode manually disabled - Full control enabled';
export const OVERRIDE_DISABLED_ALERT = 'NOTICE: Safe mode override released - Safety restrictions active';

export class AlertEmitter {
  onTransition(event: TransitionEvent): string {
    switch (event.kind) {
      case 'entered_hazard':
        return `EMERGENCY: Hazard distance breached! Distance: ${event.distance.toFixed(2)}m (threshold ${event.threshold.toFixed(2)}m)`;
      case 'cleared_hazard':
        return `ALL CLEAR: Safe distance restored. Distance: ${event.distance.toFixed(2)}m (threshold ${event.threshold.toFixed(2)}m) - Normal operation resumed`;
      case 'override_enabled':
        return OVERRIDE_ENABLED_ALERT;
      case 'override_disabled':
        return OVERRIDE_DISABLED_ALERT;
    }
  }
}
