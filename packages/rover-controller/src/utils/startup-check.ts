/**
 * Startup self-test: validates configuration before the controller starts.
 */

import { MIN_NODE_VERSION } from '../constants.js';
import { readConfigFile, type RoverConfig } from '../config/config-loader.js';
import { errorMessage } from '../errors.js';
import type { Logger } from './logger.js';

export interface StartupCheck {
  name: string;
  status: 'ok' | 'warn' | 'fail';
  message: string;
}

export interface StartupCheckResult {
  passed: boolean;
  checks: StartupCheck[];
  /** The config that was validated, when a file was given and loaded. */
  config?: RoverConfig;
}

export function runStartupChecks(options: {
  bridgeUrl: string;
  configPath?: string;
  nodeVersion?: string;
}): StartupCheckResult {
  const checks: StartupCheck[] = [];
  let config: RoverConfig | undefined;

  // 1. Bridge URL format and port
  try {
    const url = new URL(options.bridgeUrl);
    if (url.protocol !== 'ws:' && url.protocol !== 'wss:') {
      checks.push({
        name: 'bridge-url',
        status: 'fail',
        message: `Bridge URL must use ws:// or wss:// protocol, got: ${url.protocol}`,
      });
    } else {
      checks.push({ name: 'bridge-url', status: 'ok', message: `Bridge URL: ${options.bridgeUrl}` });
    }
  } catch {
    checks.push({
      name: 'bridge-url',
      status: 'fail',
      message: `Invalid bridge URL: ${options.bridgeUrl}`,
    });
  }

  // 2. Config file
  if (options.configPath) {
    try {
      config = readConfigFile(options.configPath);
      checks.push({ name: 'config-file', status: 'ok', message: `Config loaded: ${config.name}` });

      if (config.hazard.thresholdMeters > 50) {
        checks.push({
          name: 'config-threshold',
          status: 'warn',
          message: `Hazard threshold ${config.hazard.thresholdMeters} m is very large, safe mode may engage constantly`,
        });
      }
      if (config.hazard.initialDistanceMeters <= config.hazard.thresholdMeters) {
        checks.push({
          name: 'config-initial-distance',
          status: 'warn',
          message: 'Initial distance is within the hazard threshold, controller starts in safe mode',
        });
      }
    } catch (err) {
      checks.push({ name: 'config-file', status: 'fail', message: errorMessage(err) });
    }
  } else {
    checks.push({ name: 'config-file', status: 'ok', message: 'Using default config' });
  }

  // 3. Node.js version
  const version = options.nodeVersion ?? process.version;
  const major = parseInt(version.replace(/^v/, ''), 10);
  if (Number.isNaN(major) || major < MIN_NODE_VERSION) {
    checks.push({ name: 'node-version', status: 'fail', message: `Node.js >= ${MIN_NODE_VERSION} required, got: ${version}` });
  } else {
    checks.push({ name: 'node-version', status: 'ok', message: `Node.js ${version}` });
  }

  const passed = checks.every(c => c.status !== 'fail');
  return { passed, checks, config };
}

export function printStartupChecks(result: StartupCheckResult, log: Logger): void {
  for (const check of result.checks) {
    const text = `${check.name}: ${check.message}`;
    if (check.status === 'fail') log.error(text);
    else if (check.status === 'warn') log.warn(text);
    else log.info(text);
  }
  if (!result.passed) {
    log.error('Startup checks FAILED. Fix the issues above and try again.');
  }
}
