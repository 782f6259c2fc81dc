/**
 * Folder upload orchestrator.
 *
 * Either uploads matching files as one multipart component (after skip
 * checks against the remote listing) or streams the folder as a single
 * archive straight into the upload request.
 */

import type { Logger } from 'pino';
import { archiveExtension, detectArchiveFormat } from '../archive/types.js';
import type { SourceFile } from '../archive/types.js';
import { collectFiles } from '../archive/walk.js';
import { writeArchive } from '../archive/codec.js';
import type { ProgressSink } from '../checksum/types.js';
import { MissingDigestError, errorMessage, toError } from '../errors.js';
import type { Asset, RepositoryClient } from '../repository/types.js';
import { buildArchiveUploadForm, buildRawUploadForm } from '../repository/upload-form.js';
import { applyKeyTemplate, parseRepositoryPath, relativeAssetPath, splitArchiveName } from './paths.js';
import { runPipePair } from './pipe-pair.js';
import { countingProgress } from './progress.js';
import { TransferTracker } from './tracker.js';
import { processWithConcurrency } from './worker-pool.js';
import { FolderStatus } from './types.js';
import type {
  FolderResult,
  ProgressFactory,
  TransferConfig,
  TransferOutcome,
  UploadOptions,
} from './types.js';

/** Where an upload lands */
interface UploadTarget {
  repository: string;
  directory: string;
  archiveName: string;
}

export class FolderUploader {
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
    this.logger = logger.child({ component: 'folder-uploader' });
    this.progressFactory = progressFactory;
  }

  /**
   * Upload the files under `sourceDir` to "repository" or
   * "repository/directory" (optionally ending in an archive file name).
   */
  async uploadFolder(
    sourceDir: string,
    destination: string,
    options: Readonly<UploadOptions>
  ): Promise<FolderResult> {
    const tracker = new TransferTracker('upload');

    let target: UploadTarget;
    let files: SourceFile[];
    try {
      const resolved = await applyKeyTemplate(destination, options.keyFrom);
      if (options.keyFrom) {
        this.logger.info({ template: destination, resolved }, 'Using key template');
      }
      target = this.resolveTarget(resolved, options.compress);
      files = await collectFiles(sourceDir, options.glob);
    } catch (err) {
      return this.fail(tracker, errorMessage(err));
    }

    if (files.length === 0) {
      const message = `No files to upload in ${sourceDir}`;
      this.logger.warn({ sourceDir, glob: options.glob }, 'No files to upload');
      return {
        status: FolderStatus.NoAssetsFound,
        outcomes: [],
        summary: tracker.summarize(),
        deleted: 0,
        message,
      };
    }

    if (options.compress) {
      return this.uploadArchive(files, target, options, tracker);
    }
    return this.uploadFiles(files, target, options, tracker);
  }

  private resolveTarget(destination: string, compress: boolean): UploadTarget {
    let repository = destination;
    let directory = '';
    if (destination.includes('/')) {
      ({ repository, path: directory } = parseRepositoryPath(destination));
    }

    if (!compress) {
      return { repository, directory, archiveName: '' };
    }
    const split = splitArchiveName(directory);
    return { repository, directory: split.directory, archiveName: split.archiveName };
  }

  /** Map of remote assets keyed by path relative to `directory` */
  private async remoteLookup(target: UploadTarget): Promise<Map<string, Asset>> {
    const lookup = new Map<string, Asset>();
    try {
      const assets = await this.client.listAssets(target.repository, target.directory, true);
      for (const asset of assets) {
        lookup.set(relativeAssetPath(asset.path, target.directory), asset);
      }
    } catch (err) {
      this.logger.debug(
        { error: errorMessage(err) },
        'Could not list existing assets (will upload all files)'
      );
    }
    return lookup;
  }

  private async shouldSkip(
    file: SourceFile,
    remote: Asset | undefined,
    options: Readonly<UploadOptions>,
    progress: ProgressSink
  ): Promise<boolean> {
    if (!remote) return false;

    if (options.skipChecksum) {
      progress.advance(file.size);
      return true;
    }

    try {
      return await options.validator.validateWithProgress(file.absolutePath, remote.checksum, progress);
    } catch (err) {
      if (err instanceof MissingDigestError) return false;
      throw err;
    }
  }

  private async uploadFiles(
    files: SourceFile[],
    target: UploadTarget,
    options: Readonly<UploadOptions>,
    tracker: TransferTracker
  ): Promise<FolderResult> {
    const totalBytes = files.reduce((sum, file) => sum + file.size, 0);
    const progress = this.progressFactory({
      label: 'Processing files',
      totalBytes,
      totalFiles: files.length,
    });

    const remote = options.force ? new Map<string, Asset>() : await this.remoteLookup(target);
    const startedAt = Date.now();

    let decisions: boolean[];
    try {
      decisions = await processWithConcurrency(files, this.config.concurrency, (file) =>
        this.shouldSkip(file, remote.get(file.relativePath), options, progress)
      );
    } catch (err) {
      progress.finish();
      return this.fail(tracker, errorMessage(err));
    }

    const pending: SourceFile[] = [];
    files.forEach((file, idx) => {
      if (decisions[idx]) {
        progress.completeFile();
        this.logger.debug({ path: file.relativePath }, 'Skipped (already present)');
        tracker.record(this.outcome(file, 'skipped', startedAt));
      } else {
        pending.push(file);
      }
    });

    if (pending.length === 0) {
      progress.finish();
      this.logger.info({ files: files.length }, 'All files already exist with matching checksums');
      return this.done(tracker);
    }

    if (options.dryRun) {
      for (const file of pending) {
        progress.advance(file.size);
        progress.completeFile();
        this.logger.info({ path: file.relativePath }, 'Would upload');
        tracker.record(this.outcome(file, 'success', startedAt));
      }
      progress.finish();
      return this.done(tracker);
    }

    const form = buildRawUploadForm(pending, target.directory, progress);
    try {
      await this.client.uploadComponent(target.repository, form);
    } catch (err) {
      progress.finish();
      const error = toError(err);
      pending.forEach((file) => tracker.record(this.outcome(file, 'failed', startedAt, error)));
      return this.fail(tracker, `Upload error: ${error.message}`);
    }
    progress.finish();

    pending.forEach((file) => tracker.record(this.outcome(file, 'success', startedAt)));
    this.logger.info(
      { uploaded: pending.length, skipped: files.length - pending.length, repository: target.repository },
      'Folder upload complete'
    );
    return this.done(tracker);
  }

  private async uploadArchive(
    files: SourceFile[],
    target: UploadTarget,
    options: Readonly<UploadOptions>,
    tracker: TransferTracker
  ): Promise<FolderResult> {
    if (!target.archiveName) {
      const ext = archiveExtension(options.compressFormat ?? 'gzip');
      return this.fail(
        tracker,
        `when using compression, you must specify the ${ext} filename in the destination path (e.g., repo/path/archive${ext})`
      );
    }

    const format = options.compressFormat ?? detectArchiveFormat(target.archiveName);
    const totalBytes = files.reduce((sum, file) => sum + file.size, 0);
    const startedAt = Date.now();
    const archiveOutcome = (status: TransferOutcome['status'], error?: Error): TransferOutcome => ({
      path: target.archiveName,
      size: totalBytes,
      status,
      error,
      startedAt,
      finishedAt: Date.now(),
    });

    if (options.dryRun) {
      this.logger.info(
        { archiveName: target.archiveName, format, files: files.length },
        'Dry-run mode: would upload compressed archive'
      );
      tracker.record(archiveOutcome('success'));
      return this.done(tracker);
    }

    this.logger.debug({ archiveName: target.archiveName, format }, 'Creating compressed archive');
    const progress = this.progressFactory({
      label: 'Uploading compressed archive',
      totalBytes,
      totalFiles: 1,
    });

    try {
      await runPipePair(
        (sink) => writeArchive(format, files, sink),
        (source) =>
          this.client.uploadComponent(
            target.repository,
            buildArchiveUploadForm(source, target.archiveName, target.directory)
          ),
        progress
      );
    } catch (err) {
      progress.finish();
      const error = toError(err);
      tracker.record(archiveOutcome('failed', error));
      return this.fail(tracker, `Upload error: ${error.message}`);
    }
    progress.completeFile();
    progress.finish();

    tracker.record(archiveOutcome('success'));
    this.logger.info(
      { archiveName: target.archiveName, files: files.length },
      'Uploaded compressed archive'
    );
    return this.done(tracker);
  }

  private outcome(
    file: SourceFile,
    status: TransferOutcome['status'],
    startedAt: number,
    error?: Error
  ): TransferOutcome {
    return {
      path: file.relativePath,
      size: file.size,
      status,
      error,
      startedAt,
      finishedAt: Date.now(),
    };
  }

  /** Outcomes in source order (collectFiles sorts by relative path) */
  private ordered(tracker: TransferTracker): TransferOutcome[] {
    return [...tracker.outcomes].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  private done(tracker: TransferTracker): FolderResult {
    return {
      status: FolderStatus.Success,
      outcomes: this.ordered(tracker),
      summary: tracker.summarize(),
      deleted: 0,
    };
  }

  private fail(tracker: TransferTracker, message: string): FolderResult {
    this.logger.error(message);
    return {
      status: FolderStatus.Error,
      outcomes: this.ordered(tracker),
      summary: tracker.summarize(),
      deleted: 0,
      message,
    };
  }
}
