/**
 * Local tree reconciliation: remove files outside a tracked set and prune
 * directories left empty.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Logger } from 'pino';

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function listFiles(rootDir: string): Promise<string[]> {
  const files: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const absolutePath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(absolutePath);
      } else {
        files.push(absolutePath);
      }
    }
  };

  try {
    await walk(rootDir);
  } catch (err) {
    if (isMissing(err)) return [];
    throw err;
  }
  return files;
}

/**
 * Delete every file under `rootDir` whose slash-separated relative path is
 * not in `tracked`, then prune empty directories.
 * Returns the number of files deleted. Individual delete failures are
 * logged and counted as not deleted.
 */
export async function removeUntracked(
  rootDir: string,
  tracked: ReadonlySet<string>,
  logger: Logger
): Promise<number> {
  let deleted = 0;

  for (const file of await listFiles(rootDir)) {
    const relativePath = path.relative(rootDir, file).split(path.sep).join('/');
    if (tracked.has(relativePath)) continue;

    try {
      await fs.promises.rm(file);
      deleted++;
      logger.debug({ path: relativePath }, 'Deleted untracked file');
    } catch (err) {
      logger.warn(
        { path: relativePath, error: err instanceof Error ? err.message : String(err) },
        'Failed to delete untracked file'
      );
    }
  }

  await pruneEmptyDirectories(rootDir, logger);
  return deleted;
}

/**
 * Remove empty directories below `rootDir`, deepest first. `rootDir`
 * itself is kept. Returns the number of directories removed.
 */
export async function pruneEmptyDirectories(rootDir: string, logger: Logger): Promise<number> {
  let removed = 0;

  const prune = async (dir: string): Promise<boolean> => {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    let remaining = entries.length;
    for (const entry of entries) {
      if (entry.isDirectory() && (await prune(path.join(dir, entry.name)))) {
        remaining--;
      }
    }
    if (dir === rootDir || remaining > 0) {
      return false;
    }
    await fs.promises.rmdir(dir);
    removed++;
    logger.debug({ path: dir }, 'Removed empty directory');
    return true;
  };

  try {
    await prune(rootDir);
  } catch (err) {
    if (!isMissing(err)) throw err;
  }
  return removed;
}
