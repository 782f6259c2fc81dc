/**
 * Archive codec: create or extract a compressed, path-preserving archive
 * on streams in one of the supported formats.
 */

import type { Readable, Transform, Writable } from 'node:stream';
import * as zlib from 'node:zlib';
import { collectFiles } from './walk.js';
import { readTar, writeTar } from './tar.js';
import { readZip, writeZip } from './zip.js';
import { ZstdCompressStream, ZstdDecompressStream } from './zstd.js';
import type { ArchiveFormat, SourceFile } from './types.js';

function compressorFor(format: 'gzip' | 'zstd'): Transform {
  return format === 'gzip' ? zlib.createGzip() : new ZstdCompressStream();
}

function decompressorFor(format: 'gzip' | 'zstd'): Transform {
  return format === 'gzip' ? zlib.createGunzip() : new ZstdDecompressStream();
}

/** Write an already-collected file list as an archive */
export async function writeArchive(
  format: ArchiveFormat,
  files: readonly SourceFile[],
  output: Writable
): Promise<void> {
  if (format === 'zip') {
    await writeZip(files, output);
    return;
  }
  await writeTar(files, compressorFor(format), output);
}

/**
 * Walk `sourceDir` (optionally glob-filtered) and stream it as an archive
 * into `output`. Returns the files that were written.
 */
export async function createArchive(
  format: ArchiveFormat,
  sourceDir: string,
  output: Writable,
  globPattern = ''
): Promise<SourceFile[]> {
  const files = await collectFiles(sourceDir, globPattern);
  await writeArchive(format, files, output);
  return files;
}

/**
 * Extract an archive stream into `destDir`, creating parent directories.
 * Rejects with PathTraversalError if an entry would escape `destDir`.
 */
export async function extractArchive(
  format: ArchiveFormat,
  input: Readable,
  destDir: string
): Promise<void> {
  if (format === 'zip') {
    await readZip(input, destDir);
    return;
  }
  await readTar(input, decompressorFor(format), destDir);
}
