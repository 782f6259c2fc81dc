/**
 * deps.ini reading and writing.
 *
 * The INI text is parsed with `ini`; each section is then validated with
 * zod and merged over the [defaults] section.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { parseChecksumAlgorithm } from '../checksum/validator.js';
import { ManifestError, errorMessage } from '../errors.js';
import type { ChecksumAlgorithm } from '../repository/types.js';
import { parseIniDocument, serializeIniDocument } from './ini-document.js';
import type { Defaults, Dependency, Manifest } from './types.js';

const DEFAULTS_SECTION = 'defaults';

/** Built-in defaults applied before the [defaults] section */
export const MANIFEST_DEFAULTS: Readonly<Defaults> = Object.freeze({
  url: '',
  repository: '',
  checksum: 'sha256',
  outputDir: './local',
});

// `ini` turns bare true/false into booleans
const valueSchema = z.union([z.string(), z.boolean()]).transform((v) => String(v).trim());

const sectionSchema = z.object({
  url: valueSchema.optional(),
  repository: valueSchema.optional(),
  checksum: valueSchema.optional(),
  output_dir: valueSchema.optional(),
  path: valueSchema.optional(),
  version: valueSchema.optional(),
  dest: valueSchema.optional(),
  recursive: valueSchema.optional(),
});

type Section = z.infer<typeof sectionSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reject output directories that would point cleanup at the working
 * directory or the filesystem root.
 */
export function validateOutputDir(dir: string): void {
  if (!dir) {
    throw new ManifestError('output_dir cannot be empty');
  }
  let clean = path.normalize(dir);
  if (clean.length > 1) clean = clean.replace(/[\\/]+$/, '');
  if (clean === '.') {
    throw new ManifestError("output_dir cannot be '.' (current directory)");
  }
  if (clean === '/' || clean === path.parse(clean).root) {
    throw new ManifestError("output_dir cannot be '/' (root directory)");
  }
}

function parseSection(name: string, raw: unknown): Section {
  const result = sectionSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue?.path.join('.') || name;
    throw new ManifestError(`invalid value for '${key}' in [${name}]`);
  }
  return result.data;
}

function parseChecksum(section: string, value: string): ChecksumAlgorithm {
  try {
    return parseChecksumAlgorithm(value);
  } catch (err) {
    throw new ManifestError(`invalid checksum in [${section}]: ${errorMessage(err)}`, { cause: err });
  }
}

function outputDirOf(section: string, value: string): string {
  try {
    validateOutputDir(value);
  } catch (err) {
    throw new ManifestError(`invalid output_dir in [${section}]: ${errorMessage(err)}`);
  }
  return value;
}

/**
 * Parse deps.ini text.
 * @throws ManifestError for invalid values or incomplete dependencies
 */
export function parseManifest(text: string): Manifest {
  const parsed = parseIniDocument(text);

  const defaults: Defaults = { ...MANIFEST_DEFAULTS };
  const rawDefaults = parsed[DEFAULTS_SECTION];
  if (isRecord(rawDefaults)) {
    const section = parseSection(DEFAULTS_SECTION, rawDefaults);
    if (section.url !== undefined) defaults.url = section.url;
    if (section.repository !== undefined) defaults.repository = section.repository;
    if (section.checksum !== undefined) {
      defaults.checksum = parseChecksum(DEFAULTS_SECTION, section.checksum);
    }
    if (section.output_dir !== undefined) {
      defaults.outputDir = outputDirOf(DEFAULTS_SECTION, section.output_dir);
    }
  }

  const dependencies: Dependency[] = [];
  for (const [name, raw] of Object.entries(parsed)) {
    // Keys outside any section are ignored
    if (name === DEFAULTS_SECTION || !isRecord(raw)) continue;

    const section = parseSection(name, raw);
    const dep: Dependency = {
      name,
      url: section.url || defaults.url,
      repository: section.repository || defaults.repository,
      path: section.path ?? '',
      version: section.version ?? '',
      checksum: section.checksum ? parseChecksum(name, section.checksum) : defaults.checksum,
      outputDir: section.output_dir !== undefined ? outputDirOf(name, section.output_dir) : defaults.outputDir,
      dest: section.dest ?? '',
      recursive: section.recursive?.toLowerCase() === 'true',
    };

    if (!dep.path) {
      throw new ManifestError(`dependency ${name} is missing required 'path' field`);
    }
    if (!dep.repository) {
      throw new ManifestError(
        `dependency ${name} is missing 'repository' (not set in defaults or dependency)`
      );
    }
    dependencies.push(dep);
  }

  return { defaults, dependencies };
}

/**
 * Read and parse a manifest file.
 * @throws ManifestError if the file cannot be read or is invalid
 */
export async function readManifest(filePath: string): Promise<Manifest> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ManifestError(`failed to open ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
  return parseManifest(text);
}

/**
 * Render a manifest as INI text. Dependency keys equal to the defaults
 * are omitted.
 */
export function serializeManifest(manifest: Manifest): string {
  const { defaults } = manifest;
  const doc: Record<string, Record<string, string | boolean>> = {};

  const defaultsSection: Record<string, string> = {};
  if (defaults.url) defaultsSection.url = defaults.url;
  if (defaults.repository) defaultsSection.repository = defaults.repository;
  defaultsSection.checksum = defaults.checksum;
  defaultsSection.output_dir = defaults.outputDir;
  doc[DEFAULTS_SECTION] = defaultsSection;

  for (const dep of manifest.dependencies) {
    const section: Record<string, string | boolean> = { path: dep.path };
    if (dep.version) section.version = dep.version;
    if (dep.url && dep.url !== defaults.url) section.url = dep.url;
    if (dep.repository && dep.repository !== defaults.repository) section.repository = dep.repository;
    if (dep.checksum !== defaults.checksum) section.checksum = dep.checksum;
    if (dep.outputDir !== defaults.outputDir) section.output_dir = dep.outputDir;
    if (dep.dest) section.dest = dep.dest;
    if (dep.recursive) section.recursive = true;
    doc[dep.name] = section;
  }

  return serializeIniDocument(doc);
}
