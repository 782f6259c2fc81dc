/**
 * Transfer option builders.
 *
 * Options are resolved once (checksum validator, archive format) and then
 * frozen, so concurrent transfers only ever read them.
 */

import { parseArchiveFormat } from '../archive/types.js';
import { createChecksumValidator } from '../checksum/validator.js';
import type {
  DownloadOptions,
  DownloadOptionsInput,
  TransferOptions,
  TransferOptionsInput,
  UploadOptions,
  UploadOptionsInput,
} from './types.js';

export const DEFAULT_CHECKSUM_ALGORITHM = 'sha1';

function buildTransferOptions(input: TransferOptionsInput): TransferOptions {
  const validator = createChecksumValidator(input.checksum ?? DEFAULT_CHECKSUM_ALGORITHM);
  return {
    checksumAlgorithm: validator.algorithm,
    validator,
    skipChecksum: input.skipChecksum ?? false,
    force: input.force ?? false,
    dryRun: input.dryRun ?? false,
    glob: input.glob ?? '',
    compress: input.compress ?? false,
    compressFormat: input.compressFormat ? parseArchiveFormat(input.compressFormat) : null,
    keyFrom: input.keyFrom ?? '',
  };
}

/**
 * Resolve download options.
 * @throws UnsupportedAlgorithmError or ArgumentError for invalid values
 */
export function buildDownloadOptions(input: DownloadOptionsInput = {}): Readonly<DownloadOptions> {
  return Object.freeze({
    ...buildTransferOptions(input),
    flatten: input.flatten ?? false,
    deleteExtra: input.deleteExtra ?? false,
    recursive: input.recursive ?? false,
  });
}

/**
 * Resolve upload options.
 * @throws UnsupportedAlgorithmError or ArgumentError for invalid values
 */
export function buildUploadOptions(input: UploadOptionsInput = {}): Readonly<UploadOptions> {
  return Object.freeze(buildTransferOptions(input));
}
