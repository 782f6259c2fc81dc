/**
 * Streaming tar writer/reader wrapped in a compressor (gzip or zstd).
 *
 * Close order on write: the tar stream is finalized first, its end flows
 * through the compressor, and only then is the output ended.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Readable, Transform, Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import tarStream from 'tar-stream';
import type { Headers, Pack } from 'tar-stream';
import { PathTraversalError, toError } from '../errors.js';
import type { SourceFile } from './types.js';
import { resolveInside } from './walk.js';

function appendFile(pack: Pack, file: SourceFile): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const entry = pack.entry(
      {
        name: file.relativePath,
        size: file.size,
        mode: file.mode,
        mtime: file.mtime,
        type: 'file',
      },
      (err) => (err ? reject(err) : resolve())
    );
    const source = fs.createReadStream(file.absolutePath);
    source.on('error', (err) => {
      entry.destroy(err);
      reject(err);
    });
    source.pipe(entry);
  });
}

/**
 * Write `files` as a tar stream through `compressor` into `output`.
 * Resolves once the compressor has flushed and `output` has finished.
 */
export async function writeTar(
  files: readonly SourceFile[],
  compressor: Transform,
  output: Writable
): Promise<void> {
  const pack = tarStream.pack();
  const done = pipeline(pack, compressor, output);
  // Awaited below, after the entries are written.
  done.catch(() => undefined);

  try {
    for (const file of files) {
      await appendFile(pack, file);
    }
    pack.finalize();
  } catch (err) {
    pack.destroy(toError(err));
  }

  await done;
}

async function writeEntry(
  header: Headers,
  stream: Readable,
  destDir: string
): Promise<void> {
  const target = resolveInside(destDir, header.name);
  if (target === null) {
    throw new PathTraversalError(header.name);
  }

  if (header.type === 'directory') {
    await fs.promises.mkdir(target, { recursive: true });
    stream.resume();
    return;
  }

  if (header.type && header.type !== 'file' && header.type !== 'contiguous-file') {
    // Links and special files are not materialized.
    stream.resume();
    return;
  }

  await fs.promises.mkdir(path.dirname(target), { recursive: true });
  const mode = header.mode ? header.mode & 0o777 : 0o644;
  await pipeline(stream, fs.createWriteStream(target, { mode }));
}

/**
 * Read a tar stream from `input` through `decompressor`, writing entries
 * beneath `destDir`. Rejects with PathTraversalError if an entry escapes it.
 */
export async function readTar(
  input: Readable,
  decompressor: Transform,
  destDir: string
): Promise<void> {
  const extract = tarStream.extract();

  extract.on('entry', (header, stream, next) => {
    writeEntry(header, stream, destDir).then(
      () => next(),
      (err: unknown) => extract.destroy(toError(err))
    );
  });

  await pipeline(input, decompressor, extract);
}
