/**
 * Types for checksum computation and validation.
 */

import type { Checksum, ChecksumAlgorithm } from '../repository/types.js';

/**
 * Receives byte counts while files are read or transferred.
 * Shared by all concurrent transfers of one folder operation.
 */
export interface ProgressSink {
  /** Account `bytes` toward the overall progress */
  advance(bytes: number): void;

  /** Mark one more file as completed */
  completeFile(): void;
}

/** A checksum validator bound to one algorithm */
export interface ChecksumValidator {
  /** Normalized (lowercase) algorithm name */
  readonly algorithm: ChecksumAlgorithm;

  /** Stream a file through the hash and return its hex digest */
  computeDigest(filePath: string): Promise<string>;

  /**
   * Compare a file against the expected record.
   * Throws MissingDigestError if the record has no digest for this algorithm.
   */
  validate(filePath: string, expected: Checksum): Promise<boolean>;

  /** Same as validate, also advancing `progress` by each chunk hashed */
  validateWithProgress(filePath: string, expected: Checksum, progress: ProgressSink): Promise<boolean>;
}
