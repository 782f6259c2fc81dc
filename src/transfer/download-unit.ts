/**
 * Single-asset download: decide skip vs. transfer, then stream the bytes.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { pipeline } from 'node:stream/promises';
import type { Logger } from 'pino';
import type { ProgressSink } from '../checksum/types.js';
import { MissingDigestError, toError } from '../errors.js';
import type { Asset, RepositoryClient } from '../repository/types.js';
import { relativeAssetPath } from './paths.js';
import { runPipePair } from './pipe-pair.js';
import type { DownloadOptions, TransferOutcome } from './types.js';

/** Shared state for all downloads of one folder operation */
export interface DownloadContext {
  client: RepositoryClient;
  destDir: string;
  /** Source path inside the repository; stripped when flattening */
  basePath: string;
  options: Readonly<DownloadOptions>;
  progress: ProgressSink;
  logger: Logger;
}

/** Local path (relative to destDir) an asset is written to */
export function localPathFor(asset: Asset, basePath: string, flatten: boolean): string {
  return flatten && basePath
    ? relativeAssetPath(asset.path, basePath)
    : relativeAssetPath(asset.path, '');
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.stat(filePath);
    return true;
  } catch {
    return false;
  }
}

async function shouldSkip(ctx: DownloadContext, asset: Asset, localPath: string): Promise<boolean> {
  const { options, progress } = ctx;

  if (options.force || !(await exists(localPath))) {
    return false;
  }

  if (options.skipChecksum) {
    progress.advance(asset.fileSize);
    return true;
  }

  try {
    return await options.validator.validateWithProgress(localPath, asset.checksum, progress);
  } catch (err) {
    if (!(err instanceof MissingDigestError)) throw err;
    ctx.logger.debug({ path: asset.path }, 'No remote digest, downloading again');
    return false;
  }
}

/**
 * Download one asset into the context's destination directory.
 * Never rejects: failures come back as a 'failed' outcome.
 */
export async function downloadAsset(ctx: DownloadContext, asset: Asset): Promise<TransferOutcome> {
  const { client, options, progress, logger } = ctx;
  const startedAt = Date.now();
  const relativePath = relativeAssetPath(asset.path, ctx.basePath);
  const localPath = path.join(ctx.destDir, localPathFor(asset, ctx.basePath, options.flatten));

  const outcome = (status: TransferOutcome['status'], error?: Error): TransferOutcome => ({
    path: relativePath,
    size: asset.fileSize,
    status,
    error,
    startedAt,
    finishedAt: Date.now(),
  });

  try {
    if (await shouldSkip(ctx, asset, localPath)) {
      progress.completeFile();
      logger.debug({ path: relativePath }, 'Skipped existing file');
      return outcome('skipped');
    }

    if (options.dryRun) {
      progress.advance(asset.fileSize);
      progress.completeFile();
      logger.info({ path: relativePath }, 'Would download');
      return outcome('success');
    }

    await fs.promises.mkdir(path.dirname(localPath), { recursive: true });
    await runPipePair(
      (sink) => client.downloadAsset(asset.downloadUrl, sink),
      (source) => pipeline(source, fs.createWriteStream(localPath)),
      progress
    );

    progress.completeFile();
    logger.debug({ path: relativePath, size: asset.fileSize }, 'Downloaded file');
    return outcome('success');
  } catch (err) {
    const error = toError(err);
    logger.error({ path: relativePath, error: error.message }, 'Download failed');
    return outcome('failed', error);
  }
}
