/**
 * Zip container support.
 *
 * Writing streams entries through yazl. Reading needs the central
 * directory at the end of the file, so the incoming stream is spooled to a
 * temporary file and then read entry by entry with yauzl.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Readable, Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import yazl from 'yazl';
import yauzl from 'yauzl';
import type { Entry, ZipFile } from 'yauzl';
import { IOError, PathTraversalError } from '../errors.js';
import type { SourceFile } from './types.js';
import { resolveInside } from './walk.js';

const REGULAR_FILE = 0o100000;

/** Write `files` as a zip archive into `output` */
export async function writeZip(files: readonly SourceFile[], output: Writable): Promise<void> {
  const zip = new yazl.ZipFile();
  for (const file of files) {
    zip.addFile(file.absolutePath, file.relativePath, {
      mode: REGULAR_FILE | file.mode,
      mtime: file.mtime,
    });
  }
  zip.end();
  await pipeline(zip.outputStream, output);
}

function openZip(filePath: string): Promise<ZipFile> {
  return new Promise<ZipFile>((resolve, reject) => {
    yauzl.open(filePath, { lazyEntries: true }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(err ?? new IOError(`Failed to open zip archive ${filePath}`));
        return;
      }
      resolve(zipfile);
    });
  });
}

function openEntryStream(zipfile: ZipFile, entry: Entry): Promise<Readable> {
  return new Promise<Readable>((resolve, reject) => {
    zipfile.openReadStream(entry, (err, stream) => {
      if (err || !stream) {
        reject(err ?? new IOError(`Failed to read zip entry ${entry.fileName}`));
        return;
      }
      resolve(stream);
    });
  });
}

async function writeEntry(zipfile: ZipFile, entry: Entry, destDir: string): Promise<void> {
  const target = resolveInside(destDir, entry.fileName);
  if (target === null) {
    throw new PathTraversalError(entry.fileName);
  }

  if (entry.fileName.endsWith('/')) {
    await fs.promises.mkdir(target, { recursive: true });
    return;
  }

  await fs.promises.mkdir(path.dirname(target), { recursive: true });
  const perm = (entry.externalFileAttributes >>> 16) & 0o777;
  const stream = await openEntryStream(zipfile, entry);
  await pipeline(stream, fs.createWriteStream(target, { mode: perm || 0o644 }));
}

function extractEntries(zipfile: ZipFile, destDir: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    zipfile.on('entry', (entry: Entry) => {
      writeEntry(zipfile, entry, destDir).then(
        () => zipfile.readEntry(),
        (err: unknown) => {
          zipfile.close();
          reject(err);
        }
      );
    });
    zipfile.on('end', () => resolve());
    zipfile.on('error', reject);
    zipfile.readEntry();
  });
}

/** Extract a zip stream into `destDir` */
export async function readZip(input: Readable, destDir: string): Promise<void> {
  const spoolDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'rawsync-zip-'));
  const spoolFile = path.join(spoolDir, 'archive.zip');

  try {
    await pipeline(input, fs.createWriteStream(spoolFile));
    const zipfile = await openZip(spoolFile);
    await extractEntries(zipfile, destDir);
  } finally {
    await fs.promises.rm(spoolDir, { recursive: true, force: true });
  }
}
