/**
 * Load controller configuration from YAML files.
 *
 * Every field is optional in the file; missing fields take the defaults
 * below. Values are validated with zod before use.
 */

import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  DEFAULT_CMD_VEL_TOPIC,
  DEFAULT_COMMAND_DEADZONE,
  DEFAULT_EMERGENCY_ALERT_TOPIC,
  DEFAULT_HAZARD_DISTANCE_TOPIC,
  DEFAULT_HAZARD_THRESHOLD_M,
  DEFAULT_SAFE_MODE_SPEED_CAP,
  DEFAULT_SAMPLE_INTERVAL_MS,
  DEFAULT_STICK_DEADZONE,
  NO_HAZARD_DISTANCE_M,
} from '../constants.js';
import { ConfigLoadError, errorMessage } from '../errors.js';
import { validateTopicName } from '../utils/input-validation.js';

function topicName(defaultTopic: string) {
  return z.string().default(defaultTopic).superRefine((name, ctx) => {
    const result = validateTopicName(name);
    if (!result.valid) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error ?? 'Invalid topic name' });
    }
  });
}

export const RoverConfigSchema = z.object({
  name: z.string().min(1).default('default'),
  description: z.string().default('Default hazard rover profile'),
  hazard: z.object({
    thresholdMeters: z.number().finite().positive().default(DEFAULT_HAZARD_THRESHOLD_M),
    initialDistanceMeters: z.number().finite().nonnegative().default(NO_HAZARD_DISTANCE_M),
  }).default({}),
  safeMode: z.object({
    speedCap: z.number().gt(0).max(1).default(DEFAULT_SAFE_MODE_SPEED_CAP),
  }).default({}),
  operator: z.object({
    sampleIntervalMs: z.number().int().positive().default(DEFAULT_SAMPLE_INTERVAL_MS),
    commandDeadzone: z.number().nonnegative().max(1).default(DEFAULT_COMMAND_DEADZONE),
    stickDeadzone: z.number().nonnegative().lt(1).default(DEFAULT_STICK_DEADZONE),
  }).default({}),
  topics: z.object({
    hazardDistance: topicName(DEFAULT_HAZARD_DISTANCE_TOPIC),
    cmdVel: topicName(DEFAULT_CMD_VEL_TOPIC),
    emergencyAlert: topicName(DEFAULT_EMERGENCY_ALERT_TOPIC),
  }).default({}),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    format: z.enum(['text', 'json']).default('text'),
  }).default({}),
});

export type RoverConfig = z.infer<typeof RoverConfigSchema>;

export function getDefaultConfig(): RoverConfig {
  return RoverConfigSchema.parse({});
}

/** Parse YAML text into a validated config. */
export function parseConfig(text: string, source = '<inline>'): RoverConfig {
  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (err) {
    throw new ConfigLoadError(`Invalid YAML in ${source}: ${errorMessage(err)}`, source);
  }

  const result = RoverConfigSchema.safeParse(data ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigLoadError(`Invalid config in ${source}: ${issues.join('; ')}`, source);
  }
  return result.data;
}

/** @throws ConfigLoadError when the file is missing, unreadable or invalid */
export function readConfigFile(filePath: string): RoverConfig {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigLoadError(`Cannot read ${filePath}: ${errorMessage(err)}`, filePath);
  }
  return parseConfig(raw, filePath);
}
