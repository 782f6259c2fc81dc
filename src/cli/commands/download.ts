/**
 * rawsync download <src> <dest>
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '../../errors.js';
import { FolderDownloader } from '../../transfer/folder-downloader.js';
import { buildDownloadOptions, DEFAULT_CHECKSUM_ALGORITHM } from '../../transfer/options.js';
import { createCliContext } from '../utils/context.js';
import type { GlobalFlags } from '../utils/context.js';
import { printFolderResult } from '../utils/report.js';

interface DownloadFlags {
  checksum: string;
  skipChecksum?: boolean;
  flatten?: boolean;
  delete?: boolean;
  compress?: boolean;
  compressFormat?: string;
  glob?: string;
  keyFrom?: string;
  force?: boolean;
  dryRun?: boolean;
  recursive?: boolean;
}

export function registerDownloadCommand(program: Command): void {
  program
    .command('download')
    .description('Download a repository folder into a local directory')
    .argument('<src>', 'repository/path, ending in an archive name when compressed')
    .argument('<dest>', 'local destination directory')
    .option('-c, --checksum <algorithm>', 'checksum algorithm: sha1, sha256, sha512 or md5', DEFAULT_CHECKSUM_ALGORITHM)
    .option('-s, --skip-checksum', 'skip files that exist locally without comparing checksums')
    .option('-f, --flatten', 'strip the source path from local file paths')
    .option('--delete', 'remove local files that are not in the repository folder')
    .option('-z, --compress', 'download one archive and extract it')
    .option('--compress-format <format>', 'archive format: gzip, zstd or zip (default: from the archive name)')
    .option('-g, --glob <patterns>', 'comma-separated include patterns; prefix with ! to exclude')
    .option('--key-from <file>', 'replace {key} in the source with the sha256 of this file')
    .option('--force', 'download every file, even when it already exists locally')
    .option('-n, --dry-run', 'show what would be downloaded without downloading')
    .option('-r, --recursive', 'include files in subfolders')
    .action(async (src: string, dest: string, flags: DownloadFlags, command: Command) => {
      try {
        const globals = command.optsWithGlobals<GlobalFlags>();
        const ctx = createCliContext(globals, flags.dryRun);
        const options = buildDownloadOptions({
          checksum: flags.checksum,
          skipChecksum: flags.skipChecksum,
          force: flags.force,
          dryRun: flags.dryRun,
          glob: flags.glob,
          compress: flags.compress,
          compressFormat: flags.compressFormat,
          keyFrom: flags.keyFrom,
          flatten: flags.flatten,
          deleteExtra: flags.delete,
          recursive: flags.recursive,
        });

        const downloader = new FolderDownloader(
          ctx.clientFor(''),
          { concurrency: ctx.config.concurrency },
          ctx.logger,
          ctx.progressFactory
        );
        const result = await downloader.downloadFolder(src, dest, options);
        printFolderResult(result, ctx.quiet);
        process.exit(result.status);
      } catch (error) {
        console.error(chalk.red('Error:'), errorMessage(error));
        process.exit(1);
      }
    });
}
