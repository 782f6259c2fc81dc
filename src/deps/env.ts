/**
 * deps.env generation for shell and Makefile integration.
 */

import * as fs from 'node:fs';
import { envExportFor, envVariableNames } from './dependency.js';
import type { Manifest } from './types.js';

/**
 * Render DEPS_<NAME>_NAME, _VERSION and _PATH assignments for every
 * dependency, each block followed by a blank line.
 */
export function renderEnvFile(manifest: Manifest): string {
  let out = '';
  for (const dep of manifest.dependencies) {
    const exported = envExportFor(dep);
    const names = envVariableNames(exported.name);
    out += `${names.name}="${exported.name}"\n`;
    out += `${names.version}="${exported.version}"\n`;
    out += `${names.path}="${exported.path}"\n`;
    out += '\n';
  }
  return out;
}

export async function writeEnvFile(filePath: string, manifest: Manifest): Promise<void> {
  await fs.promises.writeFile(filePath, renderEnvFile(manifest), 'utf-8');
}
