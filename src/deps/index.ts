export type {
  Defaults,
  Dependency,
  Manifest,
  LockFile,
  LockedFiles,
  LockEntry,
  EnvExport,
} from './types.js';
export { MANIFEST_FILE, LOCK_FILE, ENV_FILE } from './types.js';
export { expandedPath, localPath, normalizeName, envExportFor, envVariableNames } from './dependency.js';
export {
  MANIFEST_DEFAULTS,
  validateOutputDir,
  parseManifest,
  readManifest,
  serializeManifest,
} from './manifest.js';
export {
  parseLockFile,
  readLockFile,
  serializeLockFile,
  writeLockFile,
  formatLockEntry,
  parseLockEntry,
  verifyLockedFile,
} from './lock-file.js';
export type { ClientFactory } from './resolver.js';
export { DependencyResolver } from './resolver.js';
export type { SyncOptions, SyncReport, LockedDependency } from './sync.js';
export { DependencySynchronizer } from './sync.js';
export { renderEnvFile, writeEnvFile } from './env.js';
export { DEFAULT_MANIFEST_TEMPLATE, createManifestTemplate } from './template.js';
