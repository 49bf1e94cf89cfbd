import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RoverController } from './controller.js';
import { OVERRIDE_DISABLED_ALERT, OVERRIDE_ENABLED_ALERT } from './alert-emitter.js';
import { STOP_COMMAND } from './command.js';
import { Logger } from '../utils/logger.js';
import type { Command, HazardStatus, RoverOutbound } from './types.js';

type OutboundCall =
  | { type: 'command'; command: Command }
  | { type: 'alert'; text: string }
  | { type: 'status'; status: HazardStatus; safeModeEnabled: boolean };

class RecordingOutbound implements RoverOutbound {
  calls: OutboundCall[] = [];

  publishCommand(command: Command): void {
    this.calls.push({ type: 'command', command });
  }

  publishAlert(text: string): void {
    this.calls.push({ type: 'alert', text });
  }

  notifyStatusChanged(status: HazardStatus, safeModeEnabled: boolean): void {
    this.calls.push({ type: 'status', status, safeModeEnabled });
  }

  ofType<T extends OutboundCall['type']>(type: T): Extract<OutboundCall, { type: T }>[] {
    return this.calls.filter((c): c is Extract<OutboundCall, { type: T }> => c.type === type);
  }
}

describe('RoverController', () => {
  let outbound: RecordingOutbound;
  let output: ReturnType<typeof vi.fn>;
  let log: Logger;
  let controller: RoverController;

  beforeEach(() => {
    outbound = new RecordingOutbound();
    output = vi.fn();
    log = new Logger({ level: 'debug', component: 'Test' });
    log.setOutput(output);
    controller = new RoverController({ outbound, logger: log });
  });

  it('starts SAFE with defaults', () => {
    const snapshot = controller.getSnapshot();
    expect(snapshot.status).toBe('SAFE');
    expect(snapshot.currentDistance).toBe(999);
    expect(snapshot.threshold).toBe(5);
    expect(snapshot.safeModeEnabled).toBe(false);
    expect(snapshot.manualOverride).toBe(false);
    expect(snapshot.controlState).toBe('SAFE');
    expect(snapshot.speedCap).toBe(0.3);
  });

  it('starts guarded when the initial distance is already within the threshold', () => {
    const c = new RoverController({ outbound, logger: log, initialDistance: 2 });
    const snapshot = c.getSnapshot();
    expect(snapshot.status).toBe('HAZARD');
    expect(snapshot.safeModeEnabled).toBe(true);
    expect(snapshot.controlState).toBe('HAZARD_GUARDED');
  });

  it('announces an initial hazard ahead of the first inbound event', async () => {
    const c = new RoverController({ outbound, logger: log, initialDistance: 2 });
    expect(outbound.calls).toEqual([]);

    await c.onOperatorCommand(1, 0, 1);
    await c.onOperatorCommand(0, 1, 1);

    expect(outbound.calls).toEqual([
      { type: 'command', command: STOP_COMMAND },
      { type: 'alert', text: 'EMERGENCY: Hazard distance breached! Distance: 2.00m (threshold 5.00m)' },
      { type: 'status', status: 'HAZARD', safeModeEnabled: true },
      { type: 'command', command: { forwardAxis: 0, turnAxis: 0, speed: 0.3 } },
      { type: 'command', command: { forwardAxis: 0, turnAxis: 1, speed: 0.3 } },
    ]);
    expect(output).toHaveBeenCalledWith(
      '[Test] ERROR EMERGENCY TRIGGERED: Distance 2.00m <= 5.00m {"safeModeEnabled":true,"manualOverride":false}',
    );
  });

  describe('distance readings', () => {
    it('walks SAFE, HAZARD, HAZARD, SAFE with transitions only at the crossings', async () => {
      const results = [];
      for (const d of [10.0, 4.0, 3.0, 6.0]) {
        results.push(await controller.onDistanceReading(d));
      }

      expect(results.map(r => (r.ok ? r.status : null))).toEqual(['SAFE', 'HAZARD', 'HAZARD', 'SAFE']);
      expect(results.map(r => (r.ok && r.event ? r.event.kind : null)))
        .toEqual([null, 'entered_hazard', null, 'cleared_hazard']);
    });

    it('publishes a stop, the emergency alert and the status change on hazard entry', async () => {
      await controller.onDistanceReading(4);

      expect(outbound.calls).toEqual([
        { type: 'command', command: STOP_COMMAND },
        { type: 'alert', text: 'EMERGENCY: Hazard distance breached! Distance: 4.00m (threshold 5.00m)' },
        { type: 'status', status: 'HAZARD', safeModeEnabled: true },
      ]);
      expect(controller.getSnapshot().controlState).toBe('HAZARD_GUARDED');
    });

    it('publishes the all-clear alert and status when the hazard clears', async () => {
      await controller.onDistanceReading(4);
      outbound.calls = [];
      await controller.onDistanceReading(6);

      expect(outbound.calls).toEqual([
        {
          type: 'alert',
          text: 'ALL CLEAR: Safe distance restored. Distance: 6.00m (threshold 5.00m) - Normal operation resumed',
        },
        { type: 'status', status: 'SAFE', safeModeEnabled: false },
      ]);
    });

    it('stays silent on readings that do not cross the threshold', async () => {
      await controller.onDistanceReading(20);
      await controller.onDistanceReading(12);
      expect(outbound.calls).toEqual([]);
      expect(controller.getSnapshot().readingsProcessed).toBe(2);
    });

    it.each([-1.0, Number.NaN, Number.POSITIVE_INFINITY])('rejects reading %s and keeps prior state', async (reading) => {
      await controller.onDistanceReading(4);
      outbound.calls = [];

      const result = await controller.onDistanceReading(reading);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('INVALID_READING');
      const snapshot = controller.getSnapshot();
      expect(snapshot.currentDistance).toBe(4);
      expect(snapshot.status).toBe('HAZARD');
      expect(snapshot.readingsRejected).toBe(1);
      expect(outbound.calls).toEqual([]);
      expect(output).toHaveBeenCalledWith(`[Test] WARN  Rejected distance reading {"reading":"${String(reading)}"}`);
    });
  });

  describe('operator commands', () => {
    it('passes commands through unchanged when SAFE', async () => {
      const result = await controller.onOperatorCommand(1, -0.5, 0.8);
      expect(result.command).toEqual({ forwardAxis: 1, turnAxis: -0.5, speed: 0.8 });
      expect(result.restricted).toBe(false);
      expect(outbound.ofType('command')).toEqual([
        { type: 'command', command: { forwardAxis: 1, turnAxis: -0.5, speed: 0.8 } },
      ]);
    });

    it('blocks forward motion and caps speed while guarded', async () => {
      await controller.onDistanceReading(3);
      const result = await controller.onOperatorCommand(1.0, 0.5, 1.0);

      expect(result.command).toEqual({ forwardAxis: 0, turnAxis: 0.5, speed: 0.3 });
      expect(result.restricted).toBe(true);
      expect(controller.getSnapshot().commandsRestricted).toBe(1);
      expect(controller.getSnapshot().lastCommand).toEqual({ forwardAxis: 0, turnAxis: 0.5, speed: 0.3 });
      expect(output).toHaveBeenCalledWith('[Test] WARN  Forward movement blocked in safe mode! Use backward or turn to escape.');
    });

    it('allows reverse and turning within the cap without flagging a restriction', async () => {
      await controller.onDistanceReading(3);
      const result = await controller.onOperatorCommand(-1, 1, 0.25);
      expect(result.command).toEqual({ forwardAxis: -1, turnAxis: 1, speed: 0.25 });
      expect(result.restricted).toBe(false);
    });

    it('clamps out-of-range operator input instead of failing', async () => {
      const result = await controller.onOperatorCommand(1.4, -2, 1.2);
      expect(result.ok).toBe(true);
      expect(result.command).toEqual({ forwardAxis: 1, turnAxis: -1, speed: 1 });
      expect(result.corrections.map(c => c.field)).toEqual(['forwardAxis', 'turnAxis', 'speed']);
    });
  });

  describe('override', () => {
    it('suspends restrictions when enabled during a hazard', async () => {
      await controller.onDistanceReading(4);
      const toggle = await controller.onOverrideToggle(true);
      const result = await controller.onOperatorCommand(1, 0, 1);

      expect(toggle).toEqual({
        ok: true,
        manualOverride: true,
        safeModeEnabled: false,
        event: { kind: 'override_enabled' },
      });
      expect(result.command).toEqual({ forwardAxis: 1, turnAxis: 0, speed: 1 });
      expect(result.restricted).toBe(false);
      expect(controller.getSnapshot().status).toBe('HAZARD');
      expect(controller.getSnapshot().controlState).toBe('HAZARD_OVERRIDDEN');
    });

    it('pre-empts safe mode when enabled before the hazard, and re-arms when released', async () => {
      await controller.onOverrideToggle(true);
      await controller.onDistanceReading(4);

      expect(controller.getSnapshot().safeModeEnabled).toBe(false);
      expect(outbound.ofType('command')).toEqual([]);
      expect(outbound.ofType('status')).toEqual([{ type: 'status', status: 'HAZARD', safeModeEnabled: false }]);

      const release = await controller.onOverrideToggle(false);
      expect(release.safeModeEnabled).toBe(true);
      expect(controller.getSnapshot().controlState).toBe('HAZARD_GUARDED');
      expect(outbound.calls.slice(-2)).toEqual([
        { type: 'alert', text: OVERRIDE_DISABLED_ALERT },
        { type: 'status', status: 'HAZARD', safeModeEnabled: true },
      ]);
    });

    it('emits one cautionary alert per actual change', async () => {
      await controller.onOverrideToggle(true);
      await controller.onOverrideToggle(true);
      expect(outbound.ofType('alert')).toEqual([{ type: 'alert', text: OVERRIDE_ENABLED_ALERT }]);
    });

    it('keeps the override flag after the hazard clears', async () => {
      await controller.onDistanceReading(4);
      await controller.onOverrideToggle(true);
      await controller.onDistanceReading(9);

      const snapshot = controller.getSnapshot();
      expect(snapshot.manualOverride).toBe(true);
      expect(snapshot.safeModeEnabled).toBe(false);
      expect(snapshot.controlState).toBe('SAFE');
    });
  });

  describe('threshold changes', () => {
    it('applies on the next reading, not immediately', async () => {
      await controller.onDistanceReading(7);
      const result = await controller.onThresholdChange(8);

      expect(result).toEqual({ ok: true, threshold: 8 });
      expect(controller.getSnapshot().status).toBe('SAFE');

      await controller.onDistanceReading(7);
      expect(controller.getSnapshot().status).toBe('HAZARD');
      expect(controller.getSnapshot().safeModeEnabled).toBe(true);
    });

    it('rejects a non-positive threshold and keeps the previous one', async () => {
      const result = await controller.onThresholdChange(0);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('INVALID_THRESHOLD');
      expect(controller.getSnapshot().threshold).toBe(5);
    });
  });

  describe('serialization', () => {
    it('queues re-entrant calls behind the event in progress', async () => {
      let reentered = false;
      const reentrant: RoverOutbound = {
        publishCommand: (command) => outbound.publishCommand(command),
        notifyStatusChanged: (status, safe) => outbound.notifyStatusChanged(status, safe),
        publishAlert: (text) => {
          outbound.publishAlert(text);
          if (!reentered) {
            reentered = true;
            void c.onOperatorCommand(1, 0, 1);
          }
        },
      };
      const c = new RoverController({ outbound: reentrant, logger: log });

      await c.onDistanceReading(4);

      expect(outbound.calls.map(call => call.type)).toEqual(['command', 'alert', 'status', 'command']);
      expect(outbound.calls[3]).toEqual({ type: 'command', command: { forwardAxis: 0, turnAxis: 0, speed: 0.3 } });
    });

    it('applies state before the call returns', () => {
      void controller.onDistanceReading(2);
      expect(controller.getSnapshot().safeModeEnabled).toBe(true);
    });
  });

  describe('outbound failures', () => {
    it('logs a publish failure without touching core state', async () => {
      const failing: RoverOutbound = {
        publishCommand: () => {
          throw new Error('bridge down');
        },
        publishAlert: () => {},
        notifyStatusChanged: () => {},
      };
      const c = new RoverController({ outbound: failing, logger: log });

      const result = await c.onOperatorCommand(0.5, 0, 0.5);

      expect(result.ok).toBe(true);
      expect(c.getSnapshot().commandsPublished).toBe(1);
      expect(output).toHaveBeenCalledWith(
        '[Test] ERROR Outbound delivery failed {"code":"PUBLISH_FAILURE","target":"command","error":"bridge down"}',
      );
    });
  });
});
