/**
 * Operator surface as MCP tools: drive, stop, override, threshold, status.
 */

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { DRIVE_BUTTONS } from '../operator/input-sampler.js';
import type { RoverRuntime } from '../runtime.js';

const STATUS_TRANSITIONS = 5;

const EmptyArgs = z.object({});

const DriveArgs = z.object({
  forward: z.number().min(-1).max(1).describe('Forward axis: 1 = full forward, -1 = full reverse'),
  turn: z.number().min(-1).max(1).describe('Turn axis: 1 = full left, -1 = full right'),
  speed: z.number().min(0).max(1).optional().describe('Speed scalar 0-1 (keeps the current speed if omitted)'),
  speedAxis: z.number().min(-1).max(1).optional()
    .describe('Held speed stick: steps the speed up (positive) or down (negative) on every sample; released if omitted'),
});

const ButtonArgs = z.object({
  direction: z.enum(['forward', 'backward', 'left', 'right']).describe('Drive button'),
  pressed: z.boolean().describe('true = pressed, false = released'),
});

const OverrideArgs = z.object({
  enabled: z.boolean().describe('true suspends safe-mode restrictions while a hazard is active'),
});

const ThresholdArgs = z.object({
  meters: z.number().describe('Hazard distance threshold in meters (must be > 0)'),
});

const AlertsArgs = z.object({
  limit: z.number().int().positive().default(20).describe('Number of alerts to return'),
});

function toInputSchema(schema: z.ZodType): Tool['inputSchema'] {
  return zodToJsonSchema(schema) as unknown as Tool['inputSchema'];
}

function text(body: string, isError = false): CallToolResult {
  return {
    content: [{ type: 'text', text: body }],
    ...(isError ? { isError: true } : {}),
  };
}

function invalidArgs(name: string, error: z.ZodError): CallToolResult {
  const issues = error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
  return text(`Invalid arguments for ${name}: ${issues.join('; ')}`, true);
}

export function getRoverTools(): Tool[] {
  return [
    {
      name: 'rover_status',
      description: 'Get hazard distance, threshold, hazard status, safe mode, override flag, command counters and recent control state transitions',
      inputSchema: toInputSchema(EmptyArgs),
    },
    {
      name: 'rover_drive',
      description: 'Set the held drive intent (stick axes and optional speed). While safe mode is active forward motion is blocked and speed is capped.',
      inputSchema: toInputSchema(DriveArgs),
    },
    {
      name: 'rover_button',
      description: `Press or release a drive button (${DRIVE_BUTTONS.join(', ')})`,
      inputSchema: toInputSchema(ButtonArgs),
    },
    {
      name: 'rover_stop',
      description: 'EMERGENCY STOP - release all operator input and send a zero command immediately',
      inputSchema: toInputSchema(EmptyArgs),
    },
    {
      name: 'rover_set_override',
      description: 'Enable or disable the manual safe-mode override',
      inputSchema: toInputSchema(OverrideArgs),
    },
    {
      name: 'rover_set_threshold',
      description: 'Change the hazard distance threshold. Takes effect on the next sensor reading.',
      inputSchema: toInputSchema(ThresholdArgs),
    },
    {
      name: 'rover_alerts',
      description: 'List recent alerts (emergency, all clear, override notices), newest first',
      inputSchema: toInputSchema(AlertsArgs),
    },
  ];
}

export async function handleRoverTool(
  name: string,
  args: Record<string, unknown>,
  runtime: RoverRuntime,
): Promise<CallToolResult> {
  switch (name) {
    case 'rover_status': {
      const snapshot = runtime.controller.getSnapshot();
      const transitions = runtime.controller.stateTracker.getHistory(STATUS_TRANSITIONS);
      return text(JSON.stringify({ ...snapshot, bridgeConnected: runtime.connection.isConnected, transitions }, null, 2));
    }

    case 'rover_drive': {
      const parsed = DriveArgs.safeParse(args);
      if (!parsed.success) return invalidArgs(name, parsed.error);
      runtime.operator.setStick(parsed.data.forward, parsed.data.turn);
      if (parsed.data.speed !== undefined) {
        runtime.operator.setSpeed(parsed.data.speed);
      }
      runtime.operator.setSpeedAxis(parsed.data.speedAxis ?? 0);
      const result = await runtime.operator.tick();
      if (!result) {
        return text('Drive intent unchanged (within deadzone). Nothing sent.');
      }
      const c = result.command;
      return text(
        `Command sent: forward=${c.forwardAxis.toFixed(2)} turn=${c.turnAxis.toFixed(2)} speed=${c.speed.toFixed(2)}`
        + (result.restricted ? '\nSAFE MODE: forward motion blocked and speed capped.' : ''),
      );
    }

    case 'rover_button': {
      const parsed = ButtonArgs.safeParse(args);
      if (!parsed.success) return invalidArgs(name, parsed.error);
      runtime.operator.setButton(parsed.data.direction, parsed.data.pressed);
      return text(`Button ${parsed.data.direction} ${parsed.data.pressed ? 'pressed' : 'released'}`);
    }

    case 'rover_stop': {
      await runtime.operator.emergencyStop();
      return text('EMERGENCY STOP issued. All input released, zero command sent.');
    }

    case 'rover_set_override': {
      const parsed = OverrideArgs.safeParse(args);
      if (!parsed.success) return invalidArgs(name, parsed.error);
      const result = await runtime.controller.onOverrideToggle(parsed.data.enabled);
      return text(
        `Safe mode override ${result.manualOverride ? 'ENABLED' : 'DISABLED'} (safe mode ${result.safeModeEnabled ? 'active' : 'inactive'})`,
      );
    }

    case 'rover_set_threshold': {
      const parsed = ThresholdArgs.safeParse(args);
      if (!parsed.success) return invalidArgs(name, parsed.error);
      const result = await runtime.controller.onThresholdChange(parsed.data.meters);
      if (!result.ok) return text(result.error.message, true);
      return text(`Hazard threshold set to ${result.threshold.toFixed(2)}m. Applies from the next sensor reading.`);
    }

    case 'rover_alerts': {
      const parsed = AlertsArgs.safeParse(args);
      if (!parsed.success) return invalidArgs(name, parsed.error);
      const alerts = runtime.bus.getHistoryByType('alert', parsed.data.limit);
      if (alerts.length === 0) return text('No alerts.');
      return text(alerts.map(a => `${new Date(a.timestamp).toISOString()} ${a.text}`).join('\n'));
    }

    default:
      return text(`Unknown rover tool: ${name}`, true);
  }
}
