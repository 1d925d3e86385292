#!/usr/bin/env node
/**
 * index.ts
 * orchestrator-status command
 */

import 'dotenv/config';

import chalk from 'chalk';
import { Command } from 'commander';

import { loadConfig } from '../config/config.js';
import { logger } from '../utils/logger.js';

import { runStatus } from './status.js';

interface StatusCliOptions {
  config?: string;
  json?: boolean;
  color: boolean;
}

const program = new Command();

program
  .name('orchestrator-status')
  .description('Check the health of every configured prefill and decode server')
  .version('1.0.0')
  .option('-c, --config <path>', 'configuration file (JSON or YAML)')
  .option('--json', 'print the health snapshot as JSON')
  .option('--no-color', 'disable colored output')
  .action(async () => {
    const options = program.opts<StatusCliOptions>();

    // Probe failures are part of the report, not log noise
    logger.setLevel('error', { overrideEnv: true });

    const config = await loadConfig({ filePath: options.config });
    process.exitCode = await runStatus({
      config,
      json: options.json,
      color: options.color,
    });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(chalk.red(`\nFatal error: ${message}`));
  process.exit(1);
});
