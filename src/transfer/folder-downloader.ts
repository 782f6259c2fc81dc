/**
 * Folder download orchestrator.
 *
 * Lists the remote folder, filters it, fans the assets out over a bounded
 * worker pool and derives one folder status. Also handles the single
 * archive path and delete-extra reconciliation.
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import { detectArchiveFormat, archiveExtension } from '../archive/types.js';
import { extractArchive } from '../archive/codec.js';
import { errorMessage } from '../errors.js';
import { filterWithGlob } from '../glob/glob-filter.js';
import type { Asset, RepositoryClient } from '../repository/types.js';
import { downloadAsset, localPathFor } from './download-unit.js';
import type { DownloadContext } from './download-unit.js';
import { applyKeyTemplate, parseRepositoryPath, relativeAssetPath, splitArchiveName } from './paths.js';
import { runPipePair } from './pipe-pair.js';
import { countingProgress } from './progress.js';
import { removeUntracked } from './reconcile.js';
import { TransferTracker } from './tracker.js';
import { processWithConcurrency } from './worker-pool.js';
import { FolderStatus } from './types.js';
import type { DownloadOptions, FolderResult, ProgressFactory, TransferConfig } from './types.js';

export class FolderDownloader {
  private readonly client: RepositoryClient;
  private readonly config: TransferConfig;
  private readonly logger: Logger;
  private readonly progressFactory: ProgressFactory;

  constructor(
    client: RepositoryClient,
    config: TransferConfig,
    logger: Logger,
    progressFactory: ProgressFactory = countingProgress
  ) {
    this.client = client;
    this.config = config;
    this.logger = logger.child({ component: 'folder-downloader' });
    this.progressFactory = progressFactory;
  }

  /**
   * Download "repository/path" into `destDir`.
   *
   * Malformed arguments and listing failures yield status Error; an empty
   * listing (after glob filtering) yields NoAssetsFound.
   */
  async downloadFolder(
    source: string,
    destDir: string,
    options: Readonly<DownloadOptions>
  ): Promise<FolderResult> {
    const tracker = new TransferTracker('download');

    let repository: string;
    let remotePath: string;
    try {
      const resolved = await applyKeyTemplate(source, options.keyFrom);
      if (options.keyFrom) {
        this.logger.info({ template: source, resolved }, 'Using key template');
      }
      ({ repository, path: remotePath } = parseRepositoryPath(resolved));
    } catch (err) {
      return this.fail(tracker, errorMessage(err));
    }

    if (options.compress) {
      return this.downloadArchive(repository, remotePath, destDir, options, tracker);
    }

    let assets: Asset[];
    try {
      assets = await this.client.listAssets(repository, remotePath, options.recursive);
    } catch (err) {
      return this.fail(tracker, `Error listing assets: ${errorMessage(err)}`);
    }

    assets = filterWithGlob(assets, options.glob, (asset) =>
      relativeAssetPath(asset.path, remotePath)
    );

    if (assets.length === 0) {
      const message = `No assets found in folder '${remotePath}' in repository '${repository}'`;
      this.logger.warn({ repository, path: remotePath }, 'No assets found');
      return {
        status: FolderStatus.NoAssetsFound,
        outcomes: [],
        summary: tracker.summarize(),
        deleted: 0,
        message,
      };
    }

    return this.downloadAssets(assets, remotePath, destDir, options, tracker);
  }

  /**
   * Download an already-resolved asset list. `basePath` is the remote
   * folder the assets were listed under (used by flatten and reporting).
   */
  async downloadAssets(
    assets: readonly Asset[],
    basePath: string,
    destDir: string,
    options: Readonly<DownloadOptions>,
    tracker: TransferTracker = new TransferTracker('download')
  ): Promise<FolderResult> {
    const totalBytes = assets.reduce((sum, asset) => sum + asset.fileSize, 0);
    const progress = this.progressFactory({
      label: 'Processing files',
      totalBytes,
      totalFiles: assets.length,
    });

    this.logger.info(
      { files: assets.length, bytes: totalBytes, destDir, dryRun: options.dryRun },
      'Starting folder download'
    );

    const ctx: DownloadContext = {
      client: this.client,
      destDir,
      basePath,
      options,
      progress,
      logger: this.logger,
    };

    const outcomes = await processWithConcurrency(assets, this.config.concurrency, (asset) =>
      downloadAsset(ctx, asset)
    );
    progress.finish();
    outcomes.forEach((outcome) => tracker.record(outcome));

    let deleted = 0;
    if (options.deleteExtra && options.dryRun) {
      this.logger.info('Dry-run mode: delete flag ignored (no files would be deleted)');
    } else if (options.deleteExtra) {
      const tracked = new Set(
        assets.map((asset) => localPathFor(asset, basePath, options.flatten))
      );
      deleted = await removeUntracked(destDir, tracked, this.logger);
      if (deleted > 0) {
        this.logger.info({ deleted }, 'Deleted extra files');
      }
    }

    const failed = outcomes.filter((o) => o.status === 'failed').length;
    const summary = tracker.summarize();

    this.logger.info(
      { succeeded: summary.successful, skipped: summary.skipped, failed },
      'Folder download complete'
    );

    return {
      status: failed === 0 ? FolderStatus.Success : FolderStatus.Error,
      outcomes,
      summary,
      deleted,
      message: failed === 0 ? undefined : `${failed} file(s) failed to download`,
    };
  }

  private async downloadArchive(
    repository: string,
    remotePath: string,
    destDir: string,
    options: Readonly<DownloadOptions>,
    tracker: TransferTracker
  ): Promise<FolderResult> {
    const { directory, archiveName } = splitArchiveName(remotePath);
    if (!archiveName) {
      const ext = archiveExtension(options.compressFormat ?? 'gzip');
      return this.fail(
        tracker,
        `when using compression, you must specify the ${ext} filename in the source path (e.g., repo/path/archive${ext})`
      );
    }

    const format = options.compressFormat ?? detectArchiveFormat(archiveName);
    this.logger.debug({ archiveName, format }, 'Looking for compressed archive');

    let assets: Asset[];
    try {
      assets = await this.client.listAssets(repository, directory, options.recursive);
    } catch (err) {
      return this.fail(tracker, `Error listing assets: ${errorMessage(err)}`);
    }

    const archive = assets.find((asset) => asset.path.endsWith(archiveName));
    if (!archive) {
      const message = `Archive '${archiveName}' not found in '${directory}' in repository '${repository}'`;
      this.logger.debug({ available: assets.map((a) => a.path) }, 'Available assets');
      return {
        status: assets.length === 0 ? FolderStatus.NoAssetsFound : FolderStatus.Error,
        outcomes: [],
        summary: tracker.summarize(),
        deleted: 0,
        message,
      };
    }

    const startedAt = Date.now();

    if (options.dryRun) {
      this.logger.info(
        { archiveName, repository, directory, destDir },
        'Dry-run mode: would download and extract archive'
      );
      tracker.record({
        path: archiveName,
        size: archive.fileSize,
        status: 'success',
        startedAt,
        finishedAt: Date.now(),
      });
      return {
        status: FolderStatus.Success,
        outcomes: [...tracker.outcomes],
        summary: tracker.summarize(),
        deleted: 0,
      };
    }

    const progress = this.progressFactory({
      label: 'Downloading archive',
      totalBytes: archive.fileSize,
      totalFiles: 1,
    });

    try {
      await runPipePair(
        (sink) => this.client.downloadAsset(archive.downloadUrl, sink),
        (source) => extractArchive(format, source, destDir),
        progress
      );
      progress.completeFile();
    } catch (err) {
      progress.finish();
      const error = err instanceof Error ? err : new Error(String(err));
      tracker.record({
        path: archiveName,
        size: archive.fileSize,
        status: 'failed',
        error,
        startedAt,
        finishedAt: Date.now(),
      });
      return this.fail(tracker, `Failed to download and extract archive: ${error.message}`);
    }
    progress.finish();

    tracker.record({
      path: archiveName,
      size: archive.fileSize,
      status: 'success',
      startedAt,
      finishedAt: Date.now(),
    });
    this.logger.info(
      { archiveName, repository, directory, destDir: path.resolve(destDir) },
      'Downloaded and extracted archive'
    );

    return {
      status: FolderStatus.Success,
      outcomes: [...tracker.outcomes],
      summary: tracker.summarize(),
      deleted: 0,
    };
  }

  private fail(tracker: TransferTracker, message: string): FolderResult {
    this.logger.error(message);
    return {
      status: FolderStatus.Error,
      outcomes: [...tracker.outcomes],
      summary: tracker.summarize(),
      deleted: 0,
      message,
    };
  }
}
