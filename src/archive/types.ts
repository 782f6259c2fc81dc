/**
 * Archive container formats.
 */

import { ArgumentError } from '../errors.js';

/** gzip-compressed tar, zstd-compressed tar, or zip */
export type ArchiveFormat = 'gzip' | 'zstd' | 'zip';

const EXTENSIONS: Record<ArchiveFormat, string> = {
  gzip: '.tar.gz',
  zstd: '.tar.zst',
  zip: '.zip',
};

/** A regular file picked up from a source tree */
export interface SourceFile {
  /** Absolute path on disk */
  absolutePath: string;

  /** Slash-separated path relative to the source root */
  relativePath: string;

  /** Size in bytes */
  size: number;

  /** Permission bits */
  mode: number;

  /** Last modification time */
  mtime: Date;
}

/** File extension (including the leading dot) for a format */
export function archiveExtension(format: ArchiveFormat): string {
  return EXTENSIONS[format];
}

/**
 * Parse a user-supplied format name.
 * Accepts gzip/gz, zstd/zst and zip in any case.
 */
export function parseArchiveFormat(value: string): ArchiveFormat {
  switch (value.trim().toLowerCase()) {
    case 'gzip':
    case 'gz':
      return 'gzip';
    case 'zstd':
    case 'zst':
      return 'zstd';
    case 'zip':
      return 'zip';
    default:
      throw new ArgumentError(
        `unsupported compression format '${value}': must be one of: gzip, zstd, zip`
      );
  }
}

/** Infer the format from a file name; anything unrecognised is gzip */
export function detectArchiveFormat(fileName: string): ArchiveFormat {
  if (fileName.endsWith('.tar.zst')) return 'zstd';
  if (fileName.endsWith('.zip')) return 'zip';
  return 'gzip';
}

/** True when the name carries one of the archive extensions */
export function hasArchiveExtension(fileName: string): boolean {
  return Object.values(EXTENSIONS).some((ext) => fileName.endsWith(ext));
}
