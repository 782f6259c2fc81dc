/**
 * Types for the dependency manifest, lock file and env export.
 */

import type { ChecksumAlgorithm } from '../repository/types.js';

/** Manifest file name */
export const MANIFEST_FILE = 'deps.ini';

/** Lock file name */
export const LOCK_FILE = 'deps-lock.ini';

/** Generated environment file name */
export const ENV_FILE = 'deps.env';

/** Values of the [defaults] section, inherited by every dependency */
export interface Defaults {
  /** Server URL (empty = use the client configuration) */
  url: string;

  /** Repository name */
  repository: string;

  /** Checksum algorithm recorded in the lock file */
  checksum: ChecksumAlgorithm;

  /** Local root directory for downloaded files */
  outputDir: string;
}

/** One named dependency section */
export interface Dependency {
  /** Section name */
  name: string;

  url: string;
  repository: string;

  /** Remote path template; `${version}` is replaced with `version` */
  path: string;

  version: string;
  checksum: ChecksumAlgorithm;
  outputDir: string;

  /** Explicit local path exported to deps.env */
  dest: string;

  /** Resolve every file below `path` instead of a single file */
  recursive: boolean;
}

/** A parsed deps.ini */
export interface Manifest {
  defaults: Defaults;

  /** Dependencies in file order */
  dependencies: Dependency[];
}

/** Relative file path → "algorithm:digest" */
export type LockedFiles = Record<string, string>;

/** A parsed deps-lock.ini: dependency name → locked files */
export interface LockFile {
  dependencies: Record<string, LockedFiles>;
}

/** A parsed "algorithm:digest" lock value */
export interface LockEntry {
  algorithm: ChecksumAlgorithm;
  digest: string;
}

/** Variables exported for one dependency */
export interface EnvExport {
  name: string;
  version: string;
  path: string;
}
