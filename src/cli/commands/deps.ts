/**
 * rawsync deps commands: manifest, lock file and env file management.
 *
 * Commands:
 *   rawsync deps init   Write a starter deps.ini
 *   rawsync deps lock   Resolve deps.ini into deps-lock.ini
 *   rawsync deps sync   Download and verify against deps-lock.ini
 *   rawsync deps env    Write deps.env for shell and Makefile use
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '../../errors.js';
import { writeEnvFile } from '../../deps/env.js';
import { readLockFile, writeLockFile } from '../../deps/lock-file.js';
import { readManifest } from '../../deps/manifest.js';
import { DependencyResolver } from '../../deps/resolver.js';
import { DependencySynchronizer } from '../../deps/sync.js';
import { createManifestTemplate } from '../../deps/template.js';
import { ENV_FILE, LOCK_FILE, MANIFEST_FILE } from '../../deps/types.js';
import { createCliContext } from '../utils/context.js';
import type { GlobalFlags } from '../utils/context.js';

function fail(error: unknown): never {
  console.error(chalk.red('Error:'), errorMessage(error));
  process.exit(1);
}

export function registerDepsCommands(program: Command): void {
  // ── deps init ───────────────────────────────────────────────────────────

  program
    .command('init')
    .description(`Create a template ${MANIFEST_FILE}`)
    .action(async () => {
      try {
        await createManifestTemplate(MANIFEST_FILE);
        console.log(chalk.green(`Created ${MANIFEST_FILE}`));
      } catch (error) {
        fail(error);
      }
    });

  // ── deps lock ───────────────────────────────────────────────────────────

  program
    .command('lock')
    .description(`Resolve ${MANIFEST_FILE} and write checksums to ${LOCK_FILE}`)
    .action(async (_flags: Record<string, never>, command: Command) => {
      try {
        const ctx = createCliContext(command.optsWithGlobals<GlobalFlags>());
        const manifest = await readManifest(MANIFEST_FILE);
        const resolver = new DependencyResolver(ctx.clientFor, ctx.logger);

        const lock = await resolver.resolve(manifest);
        await writeLockFile(LOCK_FILE, lock);

        if (!ctx.quiet) {
          const totalFiles = Object.values(lock.dependencies).reduce(
            (sum, files) => sum + Object.keys(files).length,
            0
          );
          console.log(chalk.green(`Dependencies resolved: ${manifest.dependencies.length}`));
          console.log(`Total files: ${totalFiles}`);
          console.log(`Lock file: ${LOCK_FILE}`);
        }
      } catch (error) {
        fail(error);
      }
    });

  // ── deps sync ───────────────────────────────────────────────────────────

  program
    .command('sync')
    .description(`Download dependencies and verify them against ${LOCK_FILE}`)
    .option('--no-cleanup', 'keep untracked files in output directories')
    .action(async (flags: { cleanup: boolean }, command: Command) => {
      try {
        const ctx = createCliContext(command.optsWithGlobals<GlobalFlags>());
        const manifest = await readManifest(MANIFEST_FILE);
        const lock = await readLockFile(LOCK_FILE);
        const synchronizer = new DependencySynchronizer(
          ctx.clientFor,
          { concurrency: ctx.config.concurrency },
          ctx.logger,
          ctx.progressFactory
        );

        const report = await synchronizer.sync(manifest, lock, { cleanup: flags.cleanup });

        if (!ctx.quiet) {
          console.log(chalk.green(`Dependencies synced: ${report.dependencies}`));
          console.log(`Total files verified: ${report.filesVerified}`);
          if (report.deleted > 0) {
            console.log(chalk.dim(`Cleaned up ${report.deleted} untracked file(s)`));
          }
          console.log(chalk.green('Status: all checksums valid'));
        }
      } catch (error) {
        fail(error);
      }
    });

  // ── deps env ────────────────────────────────────────────────────────────

  program
    .command('env')
    .description(`Generate ${ENV_FILE} for shell and Makefile integration`)
    .action(async () => {
      try {
        const manifest = await readManifest(MANIFEST_FILE);
        await writeEnvFile(ENV_FILE, manifest);
        console.log(chalk.green(`Generated ${ENV_FILE}`));
      } catch (error) {
        fail(error);
      }
    });
}
