/**
 * Source tree enumeration for uploads and archive creation.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { GlobFilter } from '../glob/glob-filter.js';
import { IOError } from '../errors.js';
import type { SourceFile } from './types.js';

/**
 * Recursively collect regular files under `rootDir`, sorted by relative path.
 * When `globPattern` is non-empty only matching relative paths are kept.
 *
 * @throws IOError if the root cannot be read
 */
export async function collectFiles(rootDir: string, globPattern = ''): Promise<SourceFile[]> {
  const filter = new GlobFilter(globPattern);
  const files: SourceFile[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const absolutePath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(absolutePath);
        continue;
      }
      if (!entry.isFile()) continue;

      const relativePath = path.relative(rootDir, absolutePath).split(path.sep).join('/');
      if (!filter.match(relativePath)) continue;

      const stat = await fs.promises.stat(absolutePath);
      files.push({
        absolutePath,
        relativePath,
        size: stat.size,
        mode: stat.mode & 0o777,
        mtime: stat.mtime,
      });
    }
  };

  try {
    await walk(rootDir);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new IOError(`Failed to read source directory ${rootDir}: ${message}`, { cause: err });
  }

  return files.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
}

/**
 * Resolve an archive entry name beneath `destDir`.
 * Returns null when the entry would land outside it.
 */
export function resolveInside(destDir: string, entryName: string): string | null {
  const root = path.resolve(destDir);
  const target = path.resolve(root, entryName);
  const rel = path.relative(root, target);
  if (rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    return null;
  }
  return target;
}
