/**
 * Dependency synchronization against a lock file.
 *
 * Every dependency is checked against the lock file before anything is
 * downloaded. Each dependency's locked files are then downloaded, and
 * every locked file is re-hashed from disk; the first mismatch stops the
 * run. Cleanup removes files under each output directory that no
 * dependency locks.
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import { computeFileDigest } from '../checksum/validator.js';
import { ListingError, MissingLockEntryError, TransferError, errorMessage } from '../errors.js';
import type { Asset } from '../repository/types.js';
import { FolderDownloader } from '../transfer/folder-downloader.js';
import { buildDownloadOptions } from '../transfer/options.js';
import { relativeAssetPath } from '../transfer/paths.js';
import { countingProgress } from '../transfer/progress.js';
import { removeUntracked } from '../transfer/reconcile.js';
import { FolderStatus } from '../transfer/types.js';
import type { ProgressFactory, TransferConfig } from '../transfer/types.js';
import { expandedPath } from './dependency.js';
import { parseLockEntry, verifyLockedFile } from './lock-file.js';
import type { ClientFactory } from './resolver.js';
import type { Dependency, LockEntry, LockFile, Manifest } from './types.js';

export interface SyncOptions {
  /** Remove untracked files from each output directory (default: true) */
  cleanup?: boolean;
}

/** Totals for one sync run */
export interface SyncReport {
  dependencies: number;
  filesVerified: number;
  filesDownloaded: number;
  deleted: number;
}

/** A dependency paired with its parsed lock entries */
export interface LockedDependency {
  dep: Dependency;
  entries: Map<string, LockEntry>;
}

export class DependencySynchronizer {
  private readonly clientFor: ClientFactory;
  private readonly config: TransferConfig;
  private readonly logger: Logger;
  private readonly progressFactory: ProgressFactory;

  constructor(
    clientFor: ClientFactory,
    config: TransferConfig,
    logger: Logger,
    progressFactory: ProgressFactory = countingProgress
  ) {
    this.clientFor = clientFor;
    this.config = config;
    this.logger = logger.child({ component: 'dependency-sync' });
    this.progressFactory = progressFactory;
  }

  /**
   * Pair every manifest dependency with its lock section.
   * @throws MissingLockEntryError for a missing section or malformed entry
   */
  checkLockFile(manifest: Manifest, lock: LockFile): LockedDependency[] {
    return manifest.dependencies.map((dep) => {
      const files = lock.dependencies[dep.name];
      if (!files) {
        throw new MissingLockEntryError(dep.name, `dependency ${dep.name} not found in lock file`);
      }

      const entries = new Map<string, LockEntry>();
      for (const [filePath, value] of Object.entries(files)) {
        const entry = parseLockEntry(dep.name, value);
        if (entry.algorithm !== dep.checksum) {
          this.logger.warn(
            { dependency: dep.name, path: filePath, locked: entry.algorithm, configured: dep.checksum },
            'Lock entry algorithm differs from the manifest; verifying with the locked algorithm'
          );
        }
        entries.set(relativeAssetPath(filePath, ''), entry);
      }
      return { dep, entries };
    });
  }

  /**
   * Download and verify every dependency.
   *
   * @throws MissingLockEntryError before any download when the lock file is incomplete
   * @throws TransferError when a file fails to download
   * @throws ChecksumMismatchError when a file on disk differs from the lock file
   */
  async sync(manifest: Manifest, lock: LockFile, options: SyncOptions = {}): Promise<SyncReport> {
    const locked = this.checkLockFile(manifest, lock);
    const trackedByOutputDir = new Map<string, Set<string>>();
    const report: SyncReport = {
      dependencies: locked.length,
      filesVerified: 0,
      filesDownloaded: 0,
      deleted: 0,
    };

    for (const { dep, entries } of locked) {
      this.logger.info(
        {
          dependency: dep.name,
          repository: dep.repository,
          path: expandedPath(dep),
          outputDir: dep.outputDir,
          files: entries.size,
          checksum: dep.checksum,
        },
        'Syncing dependency'
      );

      report.filesDownloaded += await this.download(dep, entries);
      await this.verify(dep, lock, entries);
      report.filesVerified += entries.size;

      const key = path.normalize(dep.outputDir);
      const tracked = trackedByOutputDir.get(key) ?? new Set<string>();
      for (const filePath of entries.keys()) {
        tracked.add(filePath);
      }
      trackedByOutputDir.set(key, tracked);
    }

    if (options.cleanup ?? true) {
      for (const [outputDir, tracked] of trackedByOutputDir) {
        report.deleted += await removeUntracked(outputDir, tracked, this.logger);
      }
      if (report.deleted > 0) {
        this.logger.info({ deleted: report.deleted }, 'Cleaned up untracked files');
      }
    }

    this.logger.info(
      { dependencies: report.dependencies, filesVerified: report.filesVerified },
      'All checksums valid'
    );
    return report;
  }

  private async lookup(dep: Dependency): Promise<Asset[]> {
    const client = this.clientFor(dep.url);
    const remotePath = expandedPath(dep);
    try {
      if (dep.recursive) {
        return await client.listAssets(dep.repository, remotePath.replace(/\/+$/, ''), true);
      }
      return [await client.getAssetByPath(dep.repository, remotePath)];
    } catch (err) {
      throw new ListingError(`failed to look up assets for ${dep.name}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  /** Download the dependency's locked assets; returns the number transferred */
  private async download(dep: Dependency, entries: Map<string, LockEntry>): Promise<number> {
    const remote = await this.lookup(dep);
    const assets = remote.filter((asset) => entries.has(relativeAssetPath(asset.path, '')));

    for (const filePath of entries.keys()) {
      if (!assets.some((asset) => relativeAssetPath(asset.path, '') === filePath)) {
        this.logger.warn({ dependency: dep.name, path: filePath }, 'Locked file not found in repository');
      }
    }
    if (assets.length === 0) return 0;

    const downloader = new FolderDownloader(
      this.clientFor(dep.url),
      this.config,
      this.logger,
      this.progressFactory
    );
    const options = buildDownloadOptions({ checksum: dep.checksum, recursive: dep.recursive });
    const result = await downloader.downloadAssets(assets, '', dep.outputDir, options);

    if (result.status !== FolderStatus.Success) {
      const failed = result.outcomes.find((outcome) => outcome.status === 'failed');
      throw new TransferError(
        failed?.path ?? dep.name,
        `failed to download ${dep.name}: ${failed?.error?.message ?? result.message ?? 'unknown error'}`
      );
    }
    return result.summary.successful;
  }

  private async verify(dep: Dependency, lock: LockFile, entries: Map<string, LockEntry>): Promise<void> {
    const files = lock.dependencies[dep.name] ?? {};
    for (const lockKey of Object.keys(files)) {
      const filePath = relativeAssetPath(lockKey, '');
      const entry = entries.get(filePath);
      if (!entry) continue;

      const localFile = path.join(dep.outputDir, filePath);
      const actual = await computeFileDigest(localFile, entry.algorithm);
      verifyLockedFile(lock, dep.name, lockKey, entry.algorithm, actual);
      this.logger.debug({ dependency: dep.name, path: filePath }, 'Checksum verified');
    }
  }
}
