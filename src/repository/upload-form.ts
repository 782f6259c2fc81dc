/**
 * Multipart form builders for raw component uploads.
 *
 * Field layout: `raw.asset<N>` carries the bytes, `raw.asset<N>.filename`
 * the path inside the repository, and `raw.directory` an optional target
 * directory.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { Readable, Transform } from 'node:stream';
import FormData from 'form-data';
import type { ProgressSink } from '../checksum/types.js';

/** One local file to place in a raw upload form */
export interface RawUploadFile {
  /** Absolute path on disk */
  absolutePath: string;

  /** Path the asset should have below the target directory */
  relativePath: string;
}

/** Pass bytes through unchanged while reporting them to a progress sink */
export function progressTap(progress?: ProgressSink, onEnd?: () => void): Transform {
  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      progress?.advance(chunk.length);
      callback(null, chunk);
    },
    flush(callback) {
      onEnd?.();
      callback();
    },
  });
}

/**
 * File body for one form part. The file is opened on the first read, so a
 * form holding many parts keeps at most one descriptor open.
 */
export class LazyFileStream extends Readable {
  private readonly filePath: string;
  private readonly progress?: ProgressSink;
  private source?: fs.ReadStream;

  constructor(filePath: string, progress?: ProgressSink) {
    super();
    this.filePath = filePath;
    this.progress = progress;
  }

  _read(): void {
    if (this.source) {
      this.source.resume();
      return;
    }

    const source = fs.createReadStream(this.filePath);
    source.on('data', (chunk: Buffer | string) => {
      const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      this.progress?.advance(buf.length);
      if (!this.push(buf)) source.pause();
    });
    source.on('end', () => {
      this.progress?.completeFile();
      this.push(null);
    });
    source.on('error', (err) => this.destroy(err));
    this.source = source;
  }

  _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    this.source?.destroy();
    callback(error);
  }
}

/**
 * Build a raw upload form for a list of files. File contents are streamed
 * as the form is read; each file completion is reported to `progress`.
 */
export function buildRawUploadForm(
  files: readonly RawUploadFile[],
  directory: string,
  progress?: ProgressSink
): FormData {
  const form = new FormData();

  files.forEach((file, idx) => {
    const field = `raw.asset${idx + 1}`;
    form.append(field, new LazyFileStream(file.absolutePath, progress), {
      filename: path.basename(file.absolutePath),
    });
    form.append(`${field}.filename`, file.relativePath);
  });

  if (directory) {
    form.append('raw.directory', directory);
  }

  return form;
}

/** Build a raw upload form holding a single streamed archive */
export function buildArchiveUploadForm(
  archive: Readable,
  archiveName: string,
  directory: string
): FormData {
  const form = new FormData();
  form.append('raw.asset1', archive, { filename: archiveName });
  form.append('raw.asset1.filename', archiveName);
  if (directory) {
    form.append('raw.directory', directory);
  }
  return form;
}
