export type {
  TransferStatus,
  TransferDirection,
  TransferOutcome,
  TransferSummary,
  FolderResult,
  TransferOptionsInput,
  DownloadOptionsInput,
  UploadOptionsInput,
  TransferOptions,
  DownloadOptions,
  UploadOptions,
  ProgressSpec,
  ProgressReporter,
  ProgressFactory,
  TransferConfig,
} from './types.js';
export { FolderStatus } from './types.js';
export { DEFAULT_CHECKSUM_ALGORITHM, buildDownloadOptions, buildUploadOptions } from './options.js';
export type { RepositoryPath, ArchiveLocation } from './paths.js';
export {
  parseRepositoryPath,
  relativeAssetPath,
  splitArchiveName,
  applyKeyTemplate,
} from './paths.js';
export { processWithConcurrency } from './worker-pool.js';
export { runPipePair } from './pipe-pair.js';
export { TransferTracker, formatBytes, formatDuration, formatSummary } from './tracker.js';
export { CountingProgress, countingProgress } from './progress.js';
export { removeUntracked, pruneEmptyDirectories } from './reconcile.js';
export { localPathFor } from './download-unit.js';
export { FolderDownloader } from './folder-downloader.js';
export { FolderUploader } from './folder-uploader.js';
