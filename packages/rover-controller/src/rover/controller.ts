/**
 * Rover controller: the single owner of hazard and safety state.
 *
 * Sensor readings, operator commands, override toggles and threshold
 * changes arrive on independent cadences. Every inbound call is posted to
 * one FIFO mailbox and applied to completion (monitor, gate, tracker,
 * alert, outbound calls) before the next one starts, so a command is never
 * gated against stale safety state. Calls made from inside an outbound
 * callback queue behind the event being processed.
 *
 * When the initial distance is already within the threshold the controller
 * starts in HAZARD with safe mode engaged. The matching stop, alert and
 * status notification go out ahead of the first inbound event, so nothing
 * is published from the constructor.
 */

import { PublishFailureError, errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { AlertEmitter } from './alert-emitter.js';
import { STOP_COMMAND, formatCommand, normalizeCommand } from './command.js';
import { ControlStateTracker } from './control-state.js';
import { HazardMonitor } from './hazard-monitor.js';
import { SafetyGate } from './safety-gate.js';
import type {
  Command,
  CommandResult,
  DistanceResult,
  HazardStatus,
  OverrideResult,
  OverrideTransitionEvent,
  RoverOutbound,
  RoverSnapshot,
  ThresholdResult,
  TransitionEvent,
} from './types.js';

type EnteredHazardEvent = Extract<TransitionEvent, { kind: 'entered_hazard' }>;

export interface RoverControllerOptions {
  outbound: RoverOutbound;
  threshold?: number;
  initialDistance?: number;
  speedCap?: number;
  logger?: Logger;
}

interface SafetyFlags {
  status: HazardStatus;
  safeModeEnabled: boolean;
}

export class RoverController {
  private readonly monitor: HazardMonitor;
  private readonly gate: SafetyGate;
  private readonly alerts = new AlertEmitter();
  private readonly tracker: ControlStateTracker;
  private readonly outbound: RoverOutbound;
  private readonly log: Logger;

  private mailbox: Array<() => void> = [];
  private draining = false;
  private initialHazard: EnteredHazardEvent | null = null;

  private readingsProcessed = 0;
  private readingsRejected = 0;
  private commandsPublished = 0;
  private commandsRestricted = 0;
  private lastCommand: Command | null = null;

  constructor(options: RoverControllerOptions) {
    this.outbound = options.outbound;
    this.log = options.logger ?? rootLogger.child('RoverController');
    this.monitor = new HazardMonitor({
      threshold: options.threshold,
      initialDistance: options.initialDistance,
    });
    this.gate = new SafetyGate(this.monitor, { speedCap: options.speedCap });
    this.tracker = new ControlStateTracker(this.log.child('ControlState'));

    if (this.monitor.status === 'HAZARD') {
      this.initialHazard = {
        kind: 'entered_hazard',
        distance: this.monitor.currentDistance,
        threshold: this.monitor.threshold,
      };
      this.gate.onTransition(this.initialHazard);
      this.tracker.sync('HAZARD', this.gate.manualOverride, 'initial distance within threshold');
    }
  }

  // --- Inbound ---

  onDistanceReading(meters: number): Promise<DistanceResult> {
    return this.post(() => this.handleDistance(meters));
  }

  onOperatorCommand(forwardAxis: number, turnAxis: number, speed: number): Promise<CommandResult> {
    return this.post(() => this.handleOperatorCommand(forwardAxis, turnAxis, speed));
  }

  onOverrideToggle(enabled: boolean): Promise<OverrideResult> {
    return this.post(() => this.handleOverride(enabled));
  }

  onThresholdChange(meters: number): Promise<ThresholdResult> {
    return this.post(() => this.handleThreshold(meters));
  }

  // --- Queries ---

  get stateTracker(): ControlStateTracker {
    return this.tracker;
  }

  getSnapshot(): RoverSnapshot {
    return {
      currentDistance: this.monitor.currentDistance,
      threshold: this.monitor.threshold,
      status: this.monitor.status,
      safeModeEnabled: this.gate.safeModeEnabled,
      manualOverride: this.gate.manualOverride,
      controlState: this.tracker.currentState,
      speedCap: this.gate.speedCap,
      readingsProcessed: this.readingsProcessed,
      readingsRejected: this.readingsRejected,
      commandsPublished: this.commandsPublished,
      commandsRestricted: this.commandsRestricted,
      lastCommand: this.lastCommand,
    };
  }

  // --- Mailbox ---

  private post<R>(handler: () => R): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      this.mailbox.push(() => {
        try {
          resolve(handler());
        } catch (err) {
          reject(err);
        }
      });
      this.drain();
    });
  }

  private drain(): void {
    if (this.draining) return;
    this.draining = true;
    try {
      const initial = this.initialHazard;
      if (initial) {
        this.initialHazard = null;
        this.announceInitialHazard(initial);
      }
      let job = this.mailbox.shift();
      while (job) {
        job();
        job = this.mailbox.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  // --- Handlers ---

  private handleDistance(meters: number): DistanceResult {
    const before = this.flags();
    const result = this.monitor.update(meters);

    if (!result.ok) {
      this.readingsRejected++;
      this.log.warn('Rejected distance reading', { reading: String(meters) });
      return result;
    }

    this.readingsProcessed++;
    const event = result.event;
    if (event) {
      this.gate.onTransition(event);
      this.tracker.sync(this.monitor.status, this.gate.manualOverride, event.kind);

      if (event.kind === 'entered_hazard') {
        this.engageEmergency(event);
      } else {
        this.log.info(`EMERGENCY CLEARED: Distance ${event.distance.toFixed(2)}m > ${event.threshold.toFixed(2)}m`);
      }
      this.alert(event);
    }

    this.notifyIfChanged(before);
    return result;
  }

  private announceInitialHazard(event: EnteredHazardEvent): void {
    this.engageEmergency(event);
    this.alert(event);
    this.notifyIfChanged({ status: 'SAFE', safeModeEnabled: false });
  }

  private engageEmergency(event: EnteredHazardEvent): void {
    this.log.error(
      `EMERGENCY TRIGGERED: Distance ${event.distance.toFixed(2)}m <= ${event.threshold.toFixed(2)}m`,
      { safeModeEnabled: this.gate.safeModeEnabled, manualOverride: this.gate.manualOverride },
    );
    if (this.gate.safeModeEnabled) {
      this.publish(STOP_COMMAND);
    }
  }

  private handleOperatorCommand(forwardAxis: number, turnAxis: number, speed: number): CommandResult {
    const { command: raw, corrections } = normalizeCommand(forwardAxis, turnAxis, speed);
    for (const correction of corrections) {
      this.log.debug('Operator input normalized', { field: correction.field, detail: correction.message });
    }

    const { command, restricted } = this.gate.apply(raw);
    if (restricted) {
      this.commandsRestricted++;
      if (command.forwardAxis !== raw.forwardAxis) {
        this.log.warn('Forward movement blocked in safe mode! Use backward or turn to escape.');
      } else {
        this.log.info(`Safe mode speed cap applied: ${raw.speed.toFixed(2)} -> ${command.speed.toFixed(2)}`);
      }
    }

    this.publish(command);
    this.log.debug(`WHEEL [${this.gate.safeModeEnabled ? 'SAFE MODE' : 'NORMAL'}]: ${formatCommand(command)}`);
    return { ok: true, command, restricted, corrections };
  }

  private handleOverride(enabled: boolean): OverrideResult {
    const before = this.flags();
    const changed = this.gate.setOverride(enabled);
    this.tracker.sync(this.monitor.status, this.gate.manualOverride, enabled ? 'override enabled' : 'override disabled');

    let event: OverrideTransitionEvent | null = null;
    if (changed) {
      event = enabled ? { kind: 'override_enabled' } : { kind: 'override_disabled' };
      if (enabled) {
        this.log.warn('Safe mode override ENABLED - full movement allowed', { status: this.monitor.status });
      } else {
        this.log.info('Safe mode override DISABLED - safety restrictions active', { status: this.monitor.status });
      }
      this.alert(event);
    }

    this.notifyIfChanged(before);
    return {
      ok: true,
      manualOverride: this.gate.manualOverride,
      safeModeEnabled: this.gate.safeModeEnabled,
      event,
    };
  }

  private handleThreshold(meters: number): ThresholdResult {
    const result = this.monitor.setThreshold(meters);
    if (result.ok) {
      // status is re-evaluated on the next reading
      this.log.info(`Hazard threshold updated to: ${meters.toFixed(2)}m`);
    } else {
      this.log.warn('Rejected threshold change', { threshold: String(meters) });
    }
    return result;
  }

  // --- Outbound ---

  private flags(): SafetyFlags {
    return { status: this.monitor.status, safeModeEnabled: this.gate.safeModeEnabled };
  }

  private notifyIfChanged(before: SafetyFlags): void {
    const now = this.flags();
    if (now.status === before.status && now.safeModeEnabled === before.safeModeEnabled) return;
    this.deliver('status', () => this.outbound.notifyStatusChanged(now.status, now.safeModeEnabled));
  }

  private publish(command: Command): void {
    this.lastCommand = command;
    this.commandsPublished++;
    this.deliver('command', () => this.outbound.publishCommand(command));
  }

  private alert(event: TransitionEvent): void {
    const text = this.alerts.onTransition(event);
    this.deliver('alert', () => this.outbound.publishAlert(text));
  }

  private deliver(target: string, send: () => void): void {
    try {
      send();
    } catch (err) {
      const failure = new PublishFailureError(errorMessage(err), target);
      this.log.error('Outbound delivery failed', { code: failure.code, target, error: failure.message });
    }
  }
}
