#!/usr/bin/env node

/**
 * rawsync - folder transfer and dependency locking for raw artifact repositories
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerUploadCommand } from './commands/upload.js';
import { registerDownloadCommand } from './commands/download.js';
import { registerDepsCommands } from './commands/deps.js';

const require = createRequire(import.meta.url);
const pkg = require('../../package.json') as { version: string };

const program = new Command();

program
  .name('rawsync')
  .description('Upload, download and lock files in a raw artifact repository')
  .version(pkg.version)
  .option('--url <url>', 'repository server URL (default: RAWSYNC_URL or http://localhost:8081)')
  .option('--username <name>', 'user name (default: RAWSYNC_USER or admin)')
  .option('--password <password>', 'password (default: RAWSYNC_PASS or admin)')
  .option('-v, --verbose', 'enable debug logging')
  .option('-q, --quiet', 'only log warnings and errors; hide progress and summaries');

registerUploadCommand(program);
registerDownloadCommand(program);

// Dependency management (rawsync deps init|lock|sync|env)
const depsCmd = program
  .command('deps')
  .description('Manage dependencies with deps.ini, deps-lock.ini and deps.env');

registerDepsCommands(depsCmd);

await program.parseAsync();
