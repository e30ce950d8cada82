#!/usr/bin/env node

import { Command } from 'commander';
import * as dotenv from 'dotenv';
import debug from 'debug';
import { registerSyncCommand } from './commands/sync';
import { registerAccountCommands } from './commands/account';

const debugCli = debug('cli:index');

// Load .env from the working directory; variables already set win
const loaded = dotenv.config();
if (loaded.error) {
  debugCli('No .env loaded: %s', loaded.error.message);
} else {
  debugCli('Loaded environment variables from .env');
}

const program = new Command();

program
  .name('fitsync')
  .description('Sync Fitbit metrics to local storage')
  .version('0.1.0');

registerSyncCommand(program);
registerAccountCommands(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
