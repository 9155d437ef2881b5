#!/usr/bin/env node
/**
 * geoalerts command-line entry point
 */

import { AlertStore, ErrorCategory, isAlertStoreError, registerErrorHandler } from '@geoalerts/shared';
import { ConfigManager, resolveConfigPath } from '../config/manager';
import { NodeFileSystemAdapter } from '../storage/node-fs-adapter';
import { NodeFileWatcher } from '../storage/node-file-watcher';
import { configureLogger, getLogger } from '../telemetry/logger';
import { getSyncMetrics } from '../telemetry/sync-metrics';
import { parseCliArgs } from './cli-parser';
import { runCommand } from './commands';

function waitForShutdown(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });
}

export async function main(argv: string[]): Promise<number> {
  const args = parseCliArgs(argv);
  const configManager = new ConfigManager(resolveConfigPath(args.configPath ?? undefined));
  const config = await configManager.resolve();

  configureLogger({ minLevel: config.logLevel });
  const logger = getLogger();

  // Preserved conflicts need a human; surface them on stderr
  registerErrorHandler(
    (error) => {
      if (isAlertStoreError(error, 'ConflictingContent')) {
        process.stderr.write(`conflict: ${error.message}\n`);
      }
    },
    { categories: [ErrorCategory.Sync] }
  );

  const fs = new NodeFileSystemAdapter();
  const store = new AlertStore(fs, config.alertsRoot, { config: config.store, logger });

  return runCommand(args, {
    store,
    fs,
    config,
    logger,
    out: (line) => process.stdout.write(`${line}\n`),
    metrics: getSyncMetrics().asPoolCallbacks(),
    createWatcher: () => new NodeFileWatcher({ logger }),
    waitForShutdown,
  });
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    }
  );
}
