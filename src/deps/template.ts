/**
 * Starter deps.ini written by `deps init`.
 */

import * as fs from 'node:fs';
import { IOError, ManifestError, errorMessage } from '../errors.js';
import { serializeManifest } from './manifest.js';
import type { Manifest } from './types.js';

const TEMPLATE_DEFAULTS = {
  url: 'http://localhost:8081',
  repository: 'libs',
  checksum: 'sha256',
  outputDir: './local',
} as const;

export const DEFAULT_MANIFEST_TEMPLATE: Readonly<Manifest> = {
  defaults: { ...TEMPLATE_DEFAULTS },
  dependencies: [
    {
      ...TEMPLATE_DEFAULTS,
      name: 'example_txt',
      path: 'docs/example-${version}.txt',
      version: '1.0.0',
      dest: '',
      recursive: false,
    },
    {
      ...TEMPLATE_DEFAULTS,
      name: 'libfoo_tar',
      path: 'thirdparty/libfoo-${version}.tar.gz',
      version: '1.2.3',
      checksum: 'sha512',
      dest: '',
      recursive: false,
    },
    {
      ...TEMPLATE_DEFAULTS,
      name: 'docs_folder',
      path: 'docs/${version}/',
      version: '2025-10-15',
      dest: '',
      recursive: true,
    },
  ],
};

/**
 * Write the starter manifest to `filePath`.
 * @throws ManifestError if the file already exists
 */
export async function createManifestTemplate(filePath: string): Promise<void> {
  const text = serializeManifest(DEFAULT_MANIFEST_TEMPLATE);
  try {
    await fs.promises.writeFile(filePath, text, { encoding: 'utf-8', flag: 'wx' });
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'EEXIST') {
      throw new ManifestError(`${filePath} already exists`);
    }
    throw new IOError(`failed to create ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
}
