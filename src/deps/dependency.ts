/**
 * Dependency path and naming helpers.
 */

import * as path from 'node:path';
import type { Dependency, EnvExport } from './types.js';

const VERSION_PLACEHOLDER = '${version}';

/** Remote path with `${version}` substituted */
export function expandedPath(dep: Pick<Dependency, 'path' | 'version'>): string {
  return dep.path.split(VERSION_PLACEHOLDER).join(dep.version);
}

/** Local path exported for a dependency: `dest`, else output_dir joined with the expanded path */
export function localPath(dep: Dependency): string {
  if (dep.dest) return dep.dest;
  return path.join(dep.outputDir, expandedPath(dep));
}

/** Upper-case a dependency name for use in a variable name, mapping '-' to '_' */
export function normalizeName(name: string): string {
  return name.replace(/-/g, '_').toUpperCase();
}

export function envExportFor(dep: Dependency): EnvExport {
  return { name: dep.name, version: dep.version, path: localPath(dep) };
}

/** Variable names for one export: DEPS_<NAME>_NAME, _VERSION, _PATH */
export function envVariableNames(name: string): { name: string; version: string; path: string } {
  const prefix = `DEPS_${normalizeName(name)}`;
  return {
    name: `${prefix}_NAME`,
    version: `${prefix}_VERSION`,
    path: `${prefix}_PATH`,
  };
}
