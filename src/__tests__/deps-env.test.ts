import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { renderEnvFile, writeEnvFile } from '../deps/env.js';
import { parseManifest, readManifest } from '../deps/manifest.js';
import { DEFAULT_MANIFEST_TEMPLATE, createManifestTemplate } from '../deps/template.js';
import { ManifestError } from '../errors.js';

const MANIFEST = parseManifest(
  [
    '[defaults]',
    'repository = libs',
    'output_dir = ./vendor',
    '',
    '[zlib]',
    'path = thirdparty/zlib-${version}.tar.gz',
    'version = 1.3',
    '',
    '[docs-site]',
    'path = docs/${version}/',
    'version = 2.0',
    'dest = build/docs',
    '',
  ].join('\n')
);

describe('renderEnvFile', () => {
  it('should export name, version and path for each dependency', () => {
    expect(renderEnvFile(MANIFEST)).toBe(
      [
        'DEPS_ZLIB_NAME="zlib"',
        'DEPS_ZLIB_VERSION="1.3"',
        'DEPS_ZLIB_PATH="vendor/thirdparty/zlib-1.3.tar.gz"',
        '',
        'DEPS_DOCS_SITE_NAME="docs-site"',
        'DEPS_DOCS_SITE_VERSION="2.0"',
        'DEPS_DOCS_SITE_PATH="build/docs"',
        '',
        '',
      ].join('\n')
    );
  });

  it('should render nothing for an empty manifest', () => {
    expect(renderEnvFile(parseManifest('[defaults]\nrepository = libs\n'))).toBe('');
  });
});

describe('manifest files', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rawsync-deps-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should write a starter manifest that parses back', async () => {
    const file = path.join(tmpDir, 'deps.ini');

    await createManifestTemplate(file);

    expect(fs.readFileSync(file, 'utf-8')).toContain(
      '[defaults]\nurl = http://localhost:8081\nrepository = libs\nchecksum = sha256\noutput_dir = ./local\n'
    );
    expect(await readManifest(file)).toEqual(DEFAULT_MANIFEST_TEMPLATE);
  });

  it('should refuse to overwrite an existing manifest', async () => {
    const file = path.join(tmpDir, 'deps.ini');
    fs.writeFileSync(file, '[mine]\n');

    await expect(createManifestTemplate(file)).rejects.toThrow(new ManifestError(`${file} already exists`));
    expect(fs.readFileSync(file, 'utf-8')).toBe('[mine]\n');
  });

  it('should report a missing manifest', async () => {
    const file = path.join(tmpDir, 'absent.ini');

    await expect(readManifest(file)).rejects.toThrow(`failed to open ${file}`);
  });

  it('should write the env file', async () => {
    const file = path.join(tmpDir, 'deps.env');

    await writeEnvFile(file, MANIFEST);

    expect(fs.readFileSync(file, 'utf-8')).toBe(renderEnvFile(MANIFEST));
  });
});
