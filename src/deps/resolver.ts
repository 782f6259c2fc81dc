/**
 * Dependency resolution: turn manifest entries into locked file digests.
 */

import type { Logger } from 'pino';
import { digestFor } from '../checksum/validator.js';
import { ListingError, MissingDigestError, NoAssetsError, errorMessage } from '../errors.js';
import type { Asset, RepositoryClient } from '../repository/types.js';
import { relativeAssetPath } from '../transfer/paths.js';
import { expandedPath } from './dependency.js';
import { formatLockEntry } from './lock-file.js';
import type { Dependency, LockFile, LockedFiles, Manifest } from './types.js';

/** Returns a client for a server URL (empty = the configured default) */
export type ClientFactory = (url: string) => RepositoryClient;

export class DependencyResolver {
  private readonly clientFor: ClientFactory;
  private readonly logger: Logger;

  constructor(clientFor: ClientFactory, logger: Logger) {
    this.clientFor = clientFor;
    this.logger = logger.child({ component: 'dependency-resolver' });
  }

  /**
   * Find the remote files of one dependency and record their digests.
   *
   * @throws NoAssetsError when a recursive dependency matches nothing
   * @throws MissingDigestError when an asset lacks the configured digest
   * @throws ListingError when the lookup fails
   */
  async resolveDependency(dep: Dependency): Promise<LockedFiles> {
    const client = this.clientFor(dep.url);
    const remotePath = expandedPath(dep);

    let assets: Asset[];
    if (dep.recursive) {
      const prefix = remotePath.replace(/\/+$/, '');
      try {
        assets = await client.listAssets(dep.repository, prefix, true);
      } catch (err) {
        throw new ListingError(`failed to search assets for ${dep.name}: ${errorMessage(err)}`, {
          cause: err,
        });
      }
      if (assets.length === 0) {
        throw new NoAssetsError(`no assets found for dependency ${dep.name} at path ${remotePath}`);
      }
    } else {
      try {
        assets = [await client.getAssetByPath(dep.repository, remotePath)];
      } catch (err) {
        throw new ListingError(`failed to get asset for ${dep.name}: ${errorMessage(err)}`, {
          cause: err,
        });
      }
    }

    const files: LockedFiles = {};
    for (const asset of assets) {
      const digest = digestFor(asset.checksum, dep.checksum);
      if (!digest) {
        throw new MissingDigestError(dep.checksum, asset.path);
      }
      files[relativeAssetPath(asset.path, '')] = formatLockEntry(dep.checksum, digest);
    }
    return files;
  }

  /** Resolve every dependency; the first failure aborts the whole run */
  async resolve(manifest: Manifest): Promise<LockFile> {
    const dependencies: Record<string, LockedFiles> = {};

    for (const dep of manifest.dependencies) {
      this.logger.info(
        {
          dependency: dep.name,
          repository: dep.repository,
          path: expandedPath(dep),
          checksum: dep.checksum,
          url: dep.url || undefined,
        },
        'Resolving dependency'
      );
      const files = await this.resolveDependency(dep);
      dependencies[dep.name] = files;
      this.logger.info({ dependency: dep.name, files: Object.keys(files).length }, 'Resolved dependency');
    }

    return { dependencies };
  }
}
