#!/usr/bin/env node

/**
 * bag-recorder: records ROS2 topics through the bridge into rotating,
 * timestamped bag directories, started and stopped from a control topic.
 */

import { RecorderApp } from './app.js';
import { ConnectionManager } from './bridge/connection-manager.js';
import { USAGE, parseArgs } from './cli.js';
import { loadConfig } from './config/config-loader.js';
import { VERSION } from './constants.js';
import { InvalidConfigError, errorMessage } from './errors.js';
import { logger } from './utils/logger.js';
import { printStartupChecks, runStartupChecks } from './utils/startup-check.js';

async function main(): Promise<void> {
  const command = parseArgs(process.argv.slice(2));
  if (command.kind === 'help') {
    console.error(USAGE);
    process.exit(0);
  }
  if (command.kind === 'version') {
    console.error(VERSION);
    process.exit(0);
  }

  const { options } = command;
  logger.setLevel(options.verbose ? 'debug' : 'info');
  logger.setFormat(options.logFormat);

  // Startup self-test
  const startupResult = runStartupChecks({
    bridgeUrl: options.bridgeUrl,
    configPath: options.configPath,
    overrides: options.overrides,
  });
  printStartupChecks(startupResult);
  if (!startupResult.passed) {
    process.exit(1);
  }

  const config = loadConfig(options.configPath, options.overrides);
  const app = new RecorderApp({
    config,
    bridge: new ConnectionManager(options.bridgeUrl, logger),
    log: logger,
  });

  // Graceful shutdown
  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down', { signal });
    app.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('Shutdown did not complete cleanly', { error: errorMessage(err) });
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  logger.info(`Starting bag recorder v${VERSION}`, { bridgeUrl: options.bridgeUrl, config: options.configPath ?? 'defaults' });
  await app.start();
}

main().catch((error: unknown) => {
  if (error instanceof InvalidConfigError) {
    logger.error(error.message, error.issues.length > 0 ? { issues: error.issues } : undefined);
  } else {
    logger.error('Failed to start', { error: errorMessage(error) });
  }
  process.exit(1);
});
