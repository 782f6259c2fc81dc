/**
 * Repository path helpers.
 */

import * as path from 'node:path';
import { hasArchiveExtension } from '../archive/types.js';
import { computeFileDigest } from '../checksum/validator.js';
import { ArgumentError, KeyTemplateError } from '../errors.js';

const KEY_PLACEHOLDER = '{key}';

/** A repository name plus the path inside it */
export interface RepositoryPath {
  repository: string;
  path: string;
}

/**
 * Split "repository/some/path/" on the first slash and drop trailing slashes.
 * @throws ArgumentError when there is no slash
 */
export function parseRepositoryPath(value: string): RepositoryPath {
  const slash = value.indexOf('/');
  if (slash < 0) {
    throw new ArgumentError(
      `'${value}' must be in the form 'repository/folder' or 'repository/folder/subfolder'`
    );
  }
  const repository = value.slice(0, slash);
  if (!repository) {
    throw new ArgumentError(`'${value}' is missing the repository name`);
  }
  return { repository, path: value.slice(slash + 1).replace(/\/+$/, '') };
}

/**
 * Normalize an asset path (collapse duplicate slashes, drop the leading
 * slash) and strip `basePath/` from its front when present.
 */
export function relativeAssetPath(assetPath: string, basePath: string): string {
  const clean = path.posix.normalize('/' + assetPath).replace(/^\/+/, '');
  if (!basePath) return clean;

  const base = path.posix.normalize('/' + basePath).replace(/^\/+/, '').replace(/\/+$/, '');
  if (base && clean.startsWith(base + '/')) {
    return clean.slice(base.length + 1);
  }
  return clean;
}

/** A remote path whose last segment names an archive */
export interface ArchiveLocation {
  /** Directory part (may be empty) */
  directory: string;

  /** Archive file name, or empty when the path names no archive */
  archiveName: string;
}

/**
 * Split the archive file name off a path ending in .tar.gz, .tar.zst or .zip.
 * Paths without an archive extension come back unchanged with an empty name.
 */
export function splitArchiveName(remotePath: string): ArchiveLocation {
  if (!hasArchiveExtension(remotePath)) {
    return { directory: remotePath, archiveName: '' };
  }
  const slash = remotePath.lastIndexOf('/');
  if (slash < 0) {
    return { directory: '', archiveName: remotePath };
  }
  return { directory: remotePath.slice(0, slash), archiveName: remotePath.slice(slash + 1) };
}

/**
 * Replace `{key}` in `template` with the sha256 of `keyFile`.
 * Without a key file the template is returned unchanged.
 *
 * @throws KeyTemplateError if the placeholder is missing or the file is unreadable
 */
export async function applyKeyTemplate(template: string, keyFile: string): Promise<string> {
  if (!keyFile) return template;

  if (!template.includes(KEY_PLACEHOLDER)) {
    throw new KeyTemplateError(
      `when a key file is given, the path must contain the ${KEY_PLACEHOLDER} template placeholder`
    );
  }

  let key: string;
  try {
    key = await computeFileDigest(keyFile, 'sha256');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new KeyTemplateError(`failed to compute key from file ${keyFile}: ${message}`, {
      cause: err,
    });
  }

  return template.split(KEY_PLACEHOLDER).join(key);
}
