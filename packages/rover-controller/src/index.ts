#!/usr/bin/env node

/**
 * Hazard rover controller - teleoperation with a proximity safety policy.
 *
 * Subscribes to a hazard distance topic over rosbridge, gates operator
 * commands through the safe-mode policy, publishes cmd_vel and alerts,
 * and exposes the operator surface as MCP tools over stdio.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { DEFAULT_BRIDGE_URL, PACKAGE_NAME, VERSION } from './constants.js';
import { getDefaultConfig } from './config/config-loader.js';
import { errorMessage } from './errors.js';
import { RoverRuntime } from './runtime.js';
import { getRoverTools, handleRoverTool } from './tools/rover-tools.js';
import { isLogLevel, logger } from './utils/logger.js';
import { printStartupChecks, runStartupChecks } from './utils/startup-check.js';

// --- CLI argument parsing ---
function parseArgs(): { bridgeUrl: string; configPath?: string; verbose: boolean } {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    process.stderr.write(`
${PACKAGE_NAME} - teleoperated rover controller with hazard safe mode

Usage: hazard-rover [options]

Options:
  --bridge-url <url>   WebSocket URL of the rosbridge server (default: ${DEFAULT_BRIDGE_URL})
  --config <path>      Path to a YAML controller config
  --verbose            Enable debug logging
  --version            Show version number
  --help               Show this help message

Environment variables:
  ROVER_BRIDGE_URL     Same as --bridge-url
  ROVER_CONFIG         Same as --config
  ROVER_LOG_LEVEL      debug | info | warn | error
`);
    process.exit(0);
  }

  if (args.includes('--version') || args.includes('-v')) {
    process.stderr.write(`${VERSION}\n`);
    process.exit(0);
  }

  let bridgeUrl = process.env.ROVER_BRIDGE_URL || DEFAULT_BRIDGE_URL;
  let configPath = process.env.ROVER_CONFIG || undefined;
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--bridge-url':
        bridgeUrl = args[++i] ?? bridgeUrl;
        break;
      case '--config':
        configPath = args[++i] ?? configPath;
        break;
      case '--verbose':
        verbose = true;
        break;
    }
  }

  return { bridgeUrl, configPath, verbose };
}

const options = parseArgs();
const log = logger.child('Main');

// Startup self-test
const startup = runStartupChecks({ bridgeUrl: options.bridgeUrl, configPath: options.configPath });
printStartupChecks(startup, log);
if (!startup.passed) {
  process.exit(1);
}

const config = startup.config ?? getDefaultConfig();
const envLevel = process.env.ROVER_LOG_LEVEL;
logger.setLevel(options.verbose ? 'debug' : isLogLevel(envLevel) ? envLevel : config.logging.level);
logger.setFormat(config.logging.format);

const runtime = new RoverRuntime({
  config,
  bridgeUrl: options.bridgeUrl,
  logger: logger.child('Runtime'),
});

// MCP Server
const server = new Server(
  {
    name: PACKAGE_NAME,
    version: VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

const tools = getRoverTools();

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  try {
    return await handleRoverTool(name, args ?? {}, runtime);
  } catch (error) {
    const message = errorMessage(error);
    log.error(`Tool error (${name}): ${message}`);
    return {
      content: [{ type: 'text', text: `Error: ${message}` }],
      isError: true,
    };
  }
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  log.info(`${signal} received, shutting down...`);
  try {
    await runtime.stop();
    await server.close();
  } catch (error) {
    log.error(`Shutdown error: ${errorMessage(error)}`);
  }
  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

// Start
async function main() {
  log.info(`Starting ${PACKAGE_NAME} v${VERSION}`);
  log.info(`Bridge URL: ${options.bridgeUrl}`);
  log.info(`Config: ${config.name} (threshold ${config.hazard.thresholdMeters}m, safe-mode cap ${config.safeMode.speedCap})`);
  log.info(`Tools registered: ${tools.length}`);

  await runtime.start();
  await server.connect(new StdioServerTransport());
}

main().catch((error: unknown) => {
  log.error(`Failed to start: ${errorMessage(error)}`);
  process.exit(1);
});
