/**
 * Types for folder transfers (download and upload).
 */

import type { ArchiveFormat } from '../archive/types.js';
import type { ChecksumValidator, ProgressSink } from '../checksum/types.js';
import type { ChecksumAlgorithm } from '../repository/types.js';

/** Outcome of one file transfer */
export type TransferStatus = 'success' | 'skipped' | 'failed';

/** Direction of a folder operation */
export type TransferDirection = 'upload' | 'download';

/** Per-file result record */
export interface TransferOutcome {
  /** Path relative to the operation's base */
  path: string;

  /** Size in bytes */
  size: number;

  status: TransferStatus;

  /** Set when status is 'failed' */
  error?: Error;

  /** Epoch milliseconds */
  startedAt: number;

  /** Epoch milliseconds */
  finishedAt: number;
}

/** Folder-level status, used directly as the process exit code */
export const FolderStatus = {
  Success: 0,
  Error: 1,
  NoAssetsFound: 66,
} as const;

export type FolderStatus = (typeof FolderStatus)[keyof typeof FolderStatus];

/** Aggregated counts for one folder operation */
export interface TransferSummary {
  direction: TransferDirection;
  successful: number;
  skipped: number;
  failed: number;
  /** Bytes moved by successful transfers */
  bytes: number;
  elapsedMs: number;
}

/** Result of a whole-folder operation */
export interface FolderResult {
  status: FolderStatus;

  /** Per-file outcomes, in input order */
  outcomes: TransferOutcome[];

  summary: TransferSummary;

  /** Local files removed by delete-extra reconciliation */
  deleted: number;

  /** Human-readable reason when status is not Success */
  message?: string;
}

/** Raw, unvalidated options as collected from flags or callers */
export interface TransferOptionsInput {
  /** Checksum algorithm name (default: sha1) */
  checksum?: string;

  /** Skip when the target exists, without comparing digests */
  skipChecksum?: boolean;

  /** Always transfer; disables every skip check */
  force?: boolean;

  /** Report what would be transferred without touching anything */
  dryRun?: boolean;

  /** Comma-separated include/exclude patterns */
  glob?: string;

  /** Transfer the folder as a single archive */
  compress?: boolean;

  /** Archive format name; inferred from the archive name when omitted */
  compressFormat?: string;

  /** File whose sha256 replaces `{key}` in the remote path */
  keyFrom?: string;
}

export interface DownloadOptionsInput extends TransferOptionsInput {
  /** Strip the source path prefix from local paths */
  flatten?: boolean;

  /** Remove local files that are not in the remote listing */
  deleteExtra?: boolean;

  /** List the source path recursively */
  recursive?: boolean;
}

export type UploadOptionsInput = TransferOptionsInput;

/** Fully resolved, immutable transfer options */
export interface TransferOptions {
  readonly checksumAlgorithm: ChecksumAlgorithm;
  readonly validator: ChecksumValidator;
  readonly skipChecksum: boolean;
  readonly force: boolean;
  readonly dryRun: boolean;
  readonly glob: string;
  readonly compress: boolean;
  /** Explicit archive format, or null to infer from the archive name */
  readonly compressFormat: ArchiveFormat | null;
  readonly keyFrom: string;
}

export interface DownloadOptions extends TransferOptions {
  readonly flatten: boolean;
  readonly deleteExtra: boolean;
  readonly recursive: boolean;
}

export type UploadOptions = TransferOptions;

/** Sizing information for a progress display */
export interface ProgressSpec {
  label: string;
  totalBytes: number;
  totalFiles: number;
}

/** A progress sink that can be closed */
export interface ProgressReporter extends ProgressSink {
  finish(): void;
}

/** Creates a progress reporter for one folder operation */
export type ProgressFactory = (spec: ProgressSpec) => ProgressReporter;

/** Scheduling settings for the orchestrators */
export interface TransferConfig {
  /** Maximum number of concurrent file transfers */
  concurrency: number;
}
