import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { Readable } from 'node:stream';
import { extractArchive } from '../archive/codec.js';
import { FolderUploader } from '../transfer/folder-uploader.js';
import { buildUploadOptions } from '../transfer/options.js';
import { CountingProgress } from '../transfer/progress.js';
import { FolderStatus } from '../transfer/types.js';
import type { ProgressFactory } from '../transfer/types.js';
import { FakeRepository, createMockLogger } from './fake-repository.js';

describe('FolderUploader', () => {
  let tmpDir: string;
  let srcDir: string;
  let repo: FakeRepository;
  let progressBars: CountingProgress[];
  let uploader: FolderUploader;

  const progressFactory: ProgressFactory = () => {
    const progress = new CountingProgress();
    progressBars.push(progress);
    return progress;
  };

  const partNames = (index: number): string[] =>
    (repo.uploads[index]?.parts ?? []).map((p) => `${p.name}=${p.filename ?? p.body.toString('utf-8')}`);

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rawsync-upload-test-'));
    srcDir = path.join(tmpDir, 'src');
    fs.mkdirSync(path.join(srcDir, 'sub'), { recursive: true });
    fs.writeFileSync(path.join(srcDir, 'a.txt'), 'alpha');
    fs.writeFileSync(path.join(srcDir, 'c.log'), 'charlie');
    fs.writeFileSync(path.join(srcDir, 'sub', 'b.txt'), 'bravo');
    progressBars = [];
    repo = new FakeRepository().addRepository('libs');
    uploader = new FolderUploader(repo, { concurrency: 2 }, createMockLogger(), progressFactory);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  // ── raw uploads ─────────────────────────────────────────────────────────

  it('should upload every file in one component', async () => {
    const result = await uploader.uploadFolder(srcDir, 'libs/app/1.0', buildUploadOptions());

    expect(result.status).toBe(FolderStatus.Success);
    expect(result.summary.successful).toBe(3);
    expect(result.summary.bytes).toBe(17);
    expect(repo.uploads).toHaveLength(1);
    expect(repo.paths('libs')).toEqual(['app/1.0/a.txt', 'app/1.0/c.log', 'app/1.0/sub/b.txt']);
    expect(repo.content('libs', 'app/1.0/sub/b.txt')).toBe('bravo');
  });

  it('should upload a folder with thousands of files', async () => {
    const manyDir = path.join(tmpDir, 'many');
    fs.mkdirSync(manyDir);
    for (let i = 0; i < 3000; i++) {
      fs.writeFileSync(path.join(manyDir, `f${String(i).padStart(4, '0')}.txt`), `file ${i}`);
    }

    const result = await uploader.uploadFolder(manyDir, 'libs/bulk', buildUploadOptions());

    expect(result.status).toBe(FolderStatus.Success);
    expect(result.summary.successful).toBe(3000);
    expect(repo.paths('libs')).toHaveLength(3000);
    expect(repo.content('libs', 'bulk/f2999.txt')).toBe('file 2999');
  });

  it('should lay out the multipart fields', async () => {
    await uploader.uploadFolder(srcDir, 'libs/app/1.0/', buildUploadOptions());

    expect(partNames(0)).toEqual([
      'raw.asset1=a.txt',
      'raw.asset1.filename=a.txt',
      'raw.asset2=c.log',
      'raw.asset2.filename=c.log',
      'raw.asset3=b.txt',
      'raw.asset3.filename=sub/b.txt',
      'raw.directory=app/1.0',
    ]);
  });

  it('should upload to the repository root without a directory field', async () => {
    await uploader.uploadFolder(srcDir, 'libs', buildUploadOptions());

    expect(repo.paths('libs')).toEqual(['a.txt', 'c.log', 'sub/b.txt']);
    expect(repo.uploads[0]?.parts.some((p) => p.name === 'raw.directory')).toBe(false);
  });

  it('should report progress for the uploaded bytes', async () => {
    await uploader.uploadFolder(srcDir, 'libs/app', buildUploadOptions());

    expect(progressBars).toHaveLength(1);
    expect(progressBars[0]?.bytes).toBe(17);
    expect(progressBars[0]?.files).toBe(3);
    expect(progressBars[0]?.finished).toBe(true);
  });

  it('should only upload files matching the glob', async () => {
    const result = await uploader.uploadFolder(srcDir, 'libs/app', buildUploadOptions({ glob: '**/*.txt' }));

    expect(result.outcomes.map((o) => o.path)).toEqual(['a.txt', 'sub/b.txt']);
    expect(repo.paths('libs')).toEqual(['app/a.txt', 'app/sub/b.txt']);
  });

  // ── skip logic ──────────────────────────────────────────────────────────

  it('should skip files already present with the same checksum', async () => {
    await uploader.uploadFolder(srcDir, 'libs/app', buildUploadOptions());
    fs.writeFileSync(path.join(srcDir, 'a.txt'), 'alpha v2');

    const result = await uploader.uploadFolder(srcDir, 'libs/app', buildUploadOptions());

    expect(result.outcomes.map((o) => `${o.path}:${o.status}`)).toEqual([
      'a.txt:success',
      'c.log:skipped',
      'sub/b.txt:skipped',
    ]);
    expect(partNames(1)).toEqual(['raw.asset1=a.txt', 'raw.asset1.filename=a.txt', 'raw.directory=app']);
    expect(repo.content('libs', 'app/a.txt')).toBe('alpha v2');
  });

  it('should make no request when everything is up to date', async () => {
    await uploader.uploadFolder(srcDir, 'libs/app', buildUploadOptions());
    const result = await uploader.uploadFolder(srcDir, 'libs/app', buildUploadOptions());

    expect(result.status).toBe(FolderStatus.Success);
    expect(result.summary.skipped).toBe(3);
    expect(repo.uploads).toHaveLength(1);
  });

  it('should skip on existence alone with skip-checksum', async () => {
    repo.put('libs', 'app/a.txt', 'different');

    const result = await uploader.uploadFolder(srcDir, 'libs/app', buildUploadOptions({ skipChecksum: true }));

    expect(result.outcomes.find((o) => o.path === 'a.txt')?.status).toBe('skipped');
    expect(repo.content('libs', 'app/a.txt')).toBe('different');
  });

  it('should upload everything when forced', async () => {
    await uploader.uploadFolder(srcDir, 'libs/app', buildUploadOptions());
    const result = await uploader.uploadFolder(srcDir, 'libs/app', buildUploadOptions({ force: true }));

    expect(result.summary.successful).toBe(3);
    expect(repo.uploads).toHaveLength(2);
  });

  it('should upload everything when the remote listing fails', async () => {
    repo.failListing = true;
    const result = await uploader.uploadFolder(srcDir, 'libs/app', buildUploadOptions());

    expect(result.status).toBe(FolderStatus.Success);
    expect(result.summary.successful).toBe(3);
  });

  // ── dry run and failures ────────────────────────────────────────────────

  it('should not upload in dry-run mode', async () => {
    const result = await uploader.uploadFolder(srcDir, 'libs/app', buildUploadOptions({ dryRun: true }));

    expect(result.status).toBe(FolderStatus.Success);
    expect(result.summary.successful).toBe(3);
    expect(repo.uploads).toEqual([]);
  });

  it('should return NoAssetsFound for an empty folder', async () => {
    const emptyDir = path.join(tmpDir, 'empty');
    fs.mkdirSync(emptyDir);

    const result = await uploader.uploadFolder(emptyDir, 'libs/app', buildUploadOptions());
    expect(result.status).toBe(FolderStatus.NoAssetsFound);
  });

  it('should fail for a missing source folder', async () => {
    const result = await uploader.uploadFolder(path.join(tmpDir, 'nope'), 'libs/app', buildUploadOptions());
    expect(result.status).toBe(FolderStatus.Error);
  });

  it('should mark every file failed when the repository does not exist', async () => {
    const result = await uploader.uploadFolder(srcDir, 'missing/app', buildUploadOptions());

    expect(result.status).toBe(FolderStatus.Error);
    expect(result.message).toBe("Upload error: repository 'missing' not found (status 404)");
    expect(result.summary.failed).toBe(3);
  });

  // ── compressed archives ─────────────────────────────────────────────────

  it('should stream the folder as one archive', async () => {
    const result = await uploader.uploadFolder(
      srcDir,
      'libs/app/1.0/bundle.tar.zst',
      buildUploadOptions({ compress: true })
    );

    expect(result.status).toBe(FolderStatus.Success);
    expect(result.outcomes.map((o) => o.path)).toEqual(['bundle.tar.zst']);
    expect(repo.paths('libs')).toEqual(['app/1.0/bundle.tar.zst']);

    const stored = repo.repositories.get('libs')?.get('app/1.0/bundle.tar.zst')?.content ?? Buffer.alloc(0);
    const outDir = path.join(tmpDir, 'out');
    await extractArchive('zstd', Readable.from([stored]), outDir);
    expect(fs.readFileSync(path.join(outDir, 'sub', 'b.txt'), 'utf-8')).toBe('bravo');
    expect(fs.readFileSync(path.join(outDir, 'c.log'), 'utf-8')).toBe('charlie');
  });

  it('should use an explicit archive format', async () => {
    await uploader.uploadFolder(
      srcDir,
      'libs/app/bundle.zip',
      buildUploadOptions({ compress: true, compressFormat: 'zip', glob: '**/*.txt' })
    );

    const stored = repo.repositories.get('libs')?.get('app/bundle.zip')?.content ?? Buffer.alloc(0);
    const outDir = path.join(tmpDir, 'out');
    await extractArchive('zip', Readable.from([stored]), outDir);
    expect(fs.readFileSync(path.join(outDir, 'a.txt'), 'utf-8')).toBe('alpha');
    expect(fs.existsSync(path.join(outDir, 'c.log'))).toBe(false);
  });

  it('should require an archive name when compressing', async () => {
    const result = await uploader.uploadFolder(srcDir, 'libs/app', buildUploadOptions({ compress: true }));

    expect(result.status).toBe(FolderStatus.Error);
    expect(result.message).toBe(
      'when using compression, you must specify the .tar.gz filename in the destination path (e.g., repo/path/archive.tar.gz)'
    );
    expect(repo.uploads).toEqual([]);
  });

  it('should not upload an archive in dry-run mode', async () => {
    const result = await uploader.uploadFolder(
      srcDir,
      'libs/app/bundle.tar.gz',
      buildUploadOptions({ compress: true, dryRun: true })
    );

    expect(result.status).toBe(FolderStatus.Success);
    expect(repo.uploads).toEqual([]);
  });
});
