/**
 * Streaming checksum validator.
 *
 * Hashes files through Node.js crypto streams so verification and progress
 * reporting happen in a single read pass.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import type { Checksum, ChecksumAlgorithm } from '../repository/types.js';
import { IOError, MissingDigestError, UnsupportedAlgorithmError } from '../errors.js';
import type { ChecksumValidator, ProgressSink } from './types.js';

export const SUPPORTED_ALGORITHMS: readonly ChecksumAlgorithm[] = ['sha1', 'sha256', 'sha512', 'md5'];

/**
 * Normalize an algorithm name (case-insensitive).
 * @throws UnsupportedAlgorithmError for anything outside sha1/sha256/sha512/md5
 */
export function parseChecksumAlgorithm(name: string): ChecksumAlgorithm {
  const lower = name.trim().toLowerCase();
  const match = SUPPORTED_ALGORITHMS.find((alg) => alg === lower);
  if (!match) {
    throw new UnsupportedAlgorithmError(name);
  }
  return match;
}

/** Pick the digest for `algorithm` out of a checksum record */
export function digestFor(checksum: Checksum, algorithm: ChecksumAlgorithm): string {
  return checksum[algorithm];
}

/**
 * Compute the hex digest of a file, optionally reporting bytes to a progress sink.
 *
 * @throws IOError if the file cannot be opened or read
 */
export async function computeFileDigest(
  filePath: string,
  algorithm: ChecksumAlgorithm,
  progress?: ProgressSink
): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const hash = crypto.createHash(algorithm);
    const stream = fs.createReadStream(filePath);

    stream.on('data', (chunk: string | Buffer) => {
      hash.update(chunk);
      progress?.advance(chunk.length);
    });

    stream.on('end', () => {
      resolve(hash.digest('hex'));
    });

    stream.on('error', (err: Error) => {
      reject(new IOError(`Failed to hash file ${filePath}: ${err.message}`, { cause: err }));
    });
  });
}

class StreamingChecksumValidator implements ChecksumValidator {
  readonly algorithm: ChecksumAlgorithm;

  constructor(algorithm: ChecksumAlgorithm) {
    this.algorithm = algorithm;
  }

  computeDigest(filePath: string): Promise<string> {
    return computeFileDigest(filePath, this.algorithm);
  }

  validate(filePath: string, expected: Checksum): Promise<boolean> {
    return this.compare(filePath, expected);
  }

  validateWithProgress(filePath: string, expected: Checksum, progress: ProgressSink): Promise<boolean> {
    return this.compare(filePath, expected, progress);
  }

  private async compare(filePath: string, expected: Checksum, progress?: ProgressSink): Promise<boolean> {
    const expectedDigest = digestFor(expected, this.algorithm);
    if (!expectedDigest) {
      throw new MissingDigestError(this.algorithm);
    }
    const actual = await computeFileDigest(filePath, this.algorithm, progress);
    return actual.toLowerCase() === expectedDigest.toLowerCase();
  }
}

/**
 * Construct a validator bound to one algorithm.
 *
 * @param algorithm - sha1, sha256, sha512 or md5 (any case)
 */
export function createChecksumValidator(algorithm: string): ChecksumValidator {
  return new StreamingChecksumValidator(parseChecksumAlgorithm(algorithm));
}
