#!/usr/bin/env node

// Load .env first, before any other module initializes
import './env.js';

import { parseArgs, USAGE } from './cli/args.js';
import { runCommand } from './cli/commands.js';
import { error as formatError } from './cli/ui.js';
import { loadConfigFile, resolveDevice } from './config/load.js';
import { createTransport } from './ble/index.js';
import { ConnectionManager } from './engine/connection.js';
import { createPlugin } from './devices/index.js';
import { createLogger, setLogLevel, LogLevel } from './logger.js';
import { errMsg } from './utils/error.js';

const log = createLogger('CLI');

// ─── Abort / signal handling ─────────────────────────────────────────────────

const ac = new AbortController();
let forceExitOnNext = false;

function onSignal(): void {
  if (forceExitOnNext) {
    log.info('Force exit.');
    process.exit(1);
  }
  forceExitOnNext = true;
  log.info('\nCancelling... (press again to force exit)');
  ac.abort();
}

// ─── Main ────────────────────────────────────────────────────────────────────

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (!args.device || !args.command) {
    console.error(USAGE);
    return 2;
  }
  if (args.debug) setLogLevel(LogLevel.DEBUG);

  const { config } = loadConfigFile(args.configPath);
  if (config.runtime?.debug) setLogLevel(LogLevel.DEBUG);
  const device = resolveDevice(config, args.device);

  const transport = await createTransport(device.adapter);
  const connections = new ConnectionManager(transport);
  const plugin = createPlugin({ device, connections });

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  try {
    return await runCommand(
      plugin,
      args.command,
      { print: (line) => console.log(line) },
      { json: args.json, signal: ac.signal },
    );
  } finally {
    await plugin.close();
    await transport.destroy();
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(formatError(errMsg(err)));
    process.exit(1);
  },
);
