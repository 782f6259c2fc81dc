/**
 * deps-lock.ini reading, writing and verification.
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { parseChecksumAlgorithm } from '../checksum/validator.js';
import {
  ChecksumMismatchError,
  ManifestError,
  MissingLockEntryError,
  errorMessage,
} from '../errors.js';
import type { ChecksumAlgorithm } from '../repository/types.js';
import { parseIniDocument, serializeIniDocument } from './ini-document.js';
import type { LockEntry, LockFile, LockedFiles } from './types.js';

const lockedFilesSchema = z.record(z.union([z.string(), z.boolean()]).transform((v) => String(v).trim()));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse lock file text. Keys outside a section are ignored.
 * @throws ManifestError for malformed sections
 */
export function parseLockFile(text: string): LockFile {
  const parsed = parseIniDocument(text);
  const dependencies: Record<string, LockedFiles> = {};

  for (const [name, raw] of Object.entries(parsed)) {
    if (!isRecord(raw)) continue;
    const result = lockedFilesSchema.safeParse(raw);
    if (!result.success) {
      throw new ManifestError(`invalid lock entries in [${name}]`);
    }
    dependencies[name] = result.data;
  }

  return { dependencies };
}

/**
 * Read and parse a lock file.
 * @throws ManifestError if the file cannot be read
 */
export async function readLockFile(filePath: string): Promise<LockFile> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ManifestError(`failed to open ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
  return parseLockFile(text);
}

/** Render a lock file as INI text, files sorted by path */
export function serializeLockFile(lock: LockFile): string {
  const doc: Record<string, LockedFiles> = {};
  for (const [name, files] of Object.entries(lock.dependencies)) {
    const sorted: LockedFiles = {};
    for (const filePath of Object.keys(files).sort()) {
      sorted[filePath] = files[filePath] ?? '';
    }
    doc[name] = sorted;
  }
  return serializeIniDocument(doc);
}

export async function writeLockFile(filePath: string, lock: LockFile): Promise<void> {
  await fs.promises.writeFile(filePath, serializeLockFile(lock), 'utf-8');
}

/** Format a lock value as "algorithm:digest" */
export function formatLockEntry(algorithm: ChecksumAlgorithm, digest: string): string {
  return `${algorithm}:${digest}`;
}

/**
 * Split an "algorithm:digest" lock value.
 * @throws MissingLockEntryError when the value is malformed
 */
export function parseLockEntry(dependency: string, value: string): LockEntry {
  const colon = value.indexOf(':');
  if (colon < 0) {
    throw new MissingLockEntryError(
      dependency,
      `invalid checksum format in lock file for ${dependency}: ${value}`
    );
  }
  const digest = value.slice(colon + 1).trim();
  let algorithm: ChecksumAlgorithm;
  try {
    algorithm = parseChecksumAlgorithm(value.slice(0, colon));
  } catch (err) {
    throw new MissingLockEntryError(
      dependency,
      `invalid checksum in lock file for ${dependency}: ${errorMessage(err)}`
    );
  }
  if (!digest) {
    throw new MissingLockEntryError(dependency, `empty digest in lock file for ${dependency}: ${value}`);
  }
  return { algorithm, digest };
}

/**
 * Check a computed digest against the lock file.
 *
 * @throws MissingLockEntryError if the dependency or file is not locked,
 *   or the algorithm differs from the locked one
 * @throws ChecksumMismatchError if the digests differ
 */
export function verifyLockedFile(
  lock: LockFile,
  dependency: string,
  filePath: string,
  algorithm: ChecksumAlgorithm,
  actualDigest: string
): void {
  const files = lock.dependencies[dependency];
  if (!files) {
    throw new MissingLockEntryError(dependency);
  }
  const value = files[filePath];
  if (value === undefined) {
    throw new MissingLockEntryError(
      dependency,
      `file ${filePath} not found in lock file for dependency ${dependency}`
    );
  }

  const entry = parseLockEntry(dependency, value);
  if (entry.algorithm !== algorithm) {
    throw new MissingLockEntryError(
      dependency,
      `checksum algorithm mismatch: expected ${entry.algorithm}, got ${algorithm}`
    );
  }
  if (entry.digest.toLowerCase() !== actualDigest.toLowerCase()) {
    throw new ChecksumMismatchError(filePath, entry.digest, actualDigest);
  }
}
