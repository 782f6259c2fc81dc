/**
 * rawsync upload <src> <dest>
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '../../errors.js';
import { FolderUploader } from '../../transfer/folder-uploader.js';
import { buildUploadOptions, DEFAULT_CHECKSUM_ALGORITHM } from '../../transfer/options.js';
import { createCliContext } from '../utils/context.js';
import type { GlobalFlags } from '../utils/context.js';
import { printFolderResult } from '../utils/report.js';

interface UploadFlags {
  compress?: boolean;
  compressFormat?: string;
  glob?: string;
  keyFrom?: string;
  checksum: string;
  skipChecksum?: boolean;
  force?: boolean;
  dryRun?: boolean;
}

export function registerUploadCommand(program: Command): void {
  program
    .command('upload')
    .description('Upload a local folder to a repository path')
    .argument('<src>', 'local folder to upload')
    .argument('<dest>', 'repository[/path], ending in an archive name when compressing')
    .option('-z, --compress', 'upload the folder as one archive')
    .option('--compress-format <format>', 'archive format: gzip, zstd or zip (default: from the archive name)')
    .option('-g, --glob <patterns>', 'comma-separated include patterns; prefix with ! to exclude')
    .option('--key-from <file>', 'replace {key} in the destination with the sha256 of this file')
    .option('-c, --checksum <algorithm>', 'checksum algorithm: sha1, sha256, sha512 or md5', DEFAULT_CHECKSUM_ALGORITHM)
    .option('-s, --skip-checksum', 'skip files that exist remotely without comparing checksums')
    .option('--force', 'upload every file, even when it already exists remotely')
    .option('-n, --dry-run', 'show what would be uploaded without uploading')
    .action(async (src: string, dest: string, flags: UploadFlags, command: Command) => {
      try {
        const globals = command.optsWithGlobals<GlobalFlags>();
        const ctx = createCliContext(globals, flags.dryRun);
        const options = buildUploadOptions({
          checksum: flags.checksum,
          skipChecksum: flags.skipChecksum,
          force: flags.force,
          dryRun: flags.dryRun,
          glob: flags.glob,
          compress: flags.compress,
          compressFormat: flags.compressFormat,
          keyFrom: flags.keyFrom,
        });

        const uploader = new FolderUploader(
          ctx.clientFor(''),
          { concurrency: ctx.config.concurrency },
          ctx.logger,
          ctx.progressFactory
        );
        const result = await uploader.uploadFolder(src, dest, options);
        printFolderResult(result, ctx.quiet);
        process.exit(result.status);
      } catch (error) {
        console.error(chalk.red('Error:'), errorMessage(error));
        process.exit(1);
      }
    });
}
