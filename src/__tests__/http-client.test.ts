import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { PassThrough, Readable } from 'node:stream';
import { RepositoryHttpClient } from '../repository/http-client.js';
import { buildArchiveUploadForm } from '../repository/upload-form.js';
import { FolderUploader } from '../transfer/folder-uploader.js';
import { buildUploadOptions } from '../transfer/options.js';
import { FolderStatus } from '../transfer/types.js';
import { ListingError, RepositoryNotFoundError, TransferError } from '../errors.js';
import { createMockLogger } from './fake-repository.js';

type FetchMock = Mock<(url: string, init?: RequestInit) => Promise<Response>>;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function item(path: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: `id-${path}`,
    repository: 'libs',
    format: 'raw',
    path,
    downloadUrl: `http://repo.test/repository/libs/${path}`,
    fileSize: 4,
    checksum: { sha1: 'aa', sha256: 'bb' },
    ...overrides,
  };
}

describe('RepositoryHttpClient', () => {
  let fetchMock: FetchMock;
  let client: RepositoryHttpClient;

  const requestedUrl = (call: number): URL => new URL(String(fetchMock.mock.calls[call]?.[0]));

  beforeEach(() => {
    fetchMock = vi.fn<(url: string, init?: RequestInit) => Promise<Response>>();
    vi.stubGlobal('fetch', fetchMock);
    client = new RepositoryHttpClient(
      { url: 'http://repo.test', username: 'admin', password: 'test-secret', timeoutMs: 0 },
      createMockLogger()
    );
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  // ── listing ─────────────────────────────────────────────────────────────

  it('should search direct children with basic auth', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ items: [item('app/a.txt')], continuationToken: null }));

    const assets = await client.listAssets('libs', '/app/', false);

    expect(assets).toHaveLength(1);
    const url = requestedUrl(0);
    expect(url.pathname).toBe('/service/rest/v1/search/assets');
    expect(url.searchParams.get('repository')).toBe('libs');
    expect(url.searchParams.get('format')).toBe('raw');
    expect(url.searchParams.get('sort')).toBe('name');
    expect(url.searchParams.get('direction')).toBe('asc');
    expect(url.searchParams.get('q')).toBe('/app/*');

    const headers = new Headers(fetchMock.mock.calls[0]?.[1]?.headers);
    expect(headers.get('Authorization')).toBe(`Basic ${Buffer.from('admin:test-secret').toString('base64')}`);
  });

  it('should use a prefix query when recursive', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ items: [] }));
    await client.listAssets('libs', 'app/1.0/', true);
    expect(requestedUrl(0).searchParams.get('q')).toBe('/app/1.0*');
  });

  it('should query the whole repository for an empty path', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ items: [] }));
    await client.listAssets('libs', '', false);
    expect(requestedUrl(0).searchParams.get('q')).toBe('/*');
  });

  it('should follow continuation tokens', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ items: [item('a')], continuationToken: 'next-page' }))
      .mockResolvedValueOnce(jsonResponse({ items: [item('b')], continuationToken: null }));

    const assets = await client.listAssets('libs', 'x', true);

    expect(assets.map((a) => a.path)).toEqual(['a', 'b']);
    expect(requestedUrl(0).searchParams.has('continuationToken')).toBe(false);
    expect(requestedUrl(1).searchParams.get('continuationToken')).toBe('next-page');
  });

  it('should fill missing digests with empty strings', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ items: [item('a', { checksum: { md5: 'cc' } })] }));

    const [asset] = await client.listAssets('libs', '', true);

    expect(asset?.checksum).toEqual({ sha1: '', sha256: '', sha512: '', md5: 'cc' });
  });

  it('should throw ListingError on a non-200 response', async () => {
    fetchMock.mockResolvedValueOnce(new Response('nope', { status: 500 }));
    await expect(client.listAssets('libs', 'x', false)).rejects.toThrow(ListingError);
  });

  it('should throw ListingError on a malformed response', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ items: [{ path: 42 }] }));
    await expect(client.listAssets('libs', 'x', false)).rejects.toThrow('Unexpected search response');
  });

  // ── lookup ──────────────────────────────────────────────────────────────

  it('should return the exact path match', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ items: [item('docs/a.txt.bak'), item('/docs/a.txt')] })
    );

    const asset = await client.getAssetByPath('libs', 'docs/a.txt');

    expect(asset.path).toBe('/docs/a.txt');
    expect(requestedUrl(0).searchParams.get('q')).toBe('/docs/a.txt');
  });

  it('should throw when no asset matches exactly', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ items: [item('docs/a.txt.bak')] }));
    await expect(client.getAssetByPath('libs', 'docs/a.txt')).rejects.toThrow('asset not found: libs/docs/a.txt');
  });

  // ── download ────────────────────────────────────────────────────────────

  it('should stream the asset body into the destination', async () => {
    fetchMock.mockResolvedValueOnce(new Response('file-bytes', { status: 200 }));
    const sink = new PassThrough();
    const chunks: Buffer[] = [];
    sink.on('data', (chunk: Buffer) => chunks.push(chunk));

    await client.downloadAsset('http://repo.test/repository/libs/a', sink);

    expect(Buffer.concat(chunks).toString('utf-8')).toBe('file-bytes');
    expect(String(fetchMock.mock.calls[0]?.[0])).toBe('http://repo.test/repository/libs/a');
  });

  it('should throw TransferError when the download fails', async () => {
    fetchMock.mockResolvedValueOnce(new Response('missing', { status: 404 }));
    await expect(client.downloadAsset('http://repo.test/x', new PassThrough())).rejects.toThrow(
      TransferError
    );
  });

  // ── upload ──────────────────────────────────────────────────────────────

  it('should post the form to the components endpoint', async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));
    const form = buildArchiveUploadForm(Readable.from(['data']), 'bundle.tar.gz', 'app');

    await client.uploadComponent('libs', form);

    const url = requestedUrl(0);
    expect(url.pathname).toBe('/service/rest/v1/components');
    expect(url.searchParams.get('repository')).toBe('libs');
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('POST');
    const headers = new Headers(fetchMock.mock.calls[0]?.[1]?.headers);
    expect(headers.get('content-type')).toBe(`multipart/form-data; boundary=${form.getBoundary()}`);
  });

  it('should map 404 to RepositoryNotFoundError', async () => {
    fetchMock.mockResolvedValueOnce(new Response('', { status: 404 }));
    const form = buildArchiveUploadForm(Readable.from(['data']), 'bundle.tar.gz', '');

    await expect(client.uploadComponent('nope', form)).rejects.toBeInstanceOf(RepositoryNotFoundError);
  });

  it('should include the response text for other failures', async () => {
    fetchMock.mockResolvedValueOnce(new Response('quota exceeded', { status: 500 }));
    const form = buildArchiveUploadForm(Readable.from(['data']), 'bundle.tar.gz', '');

    await expect(client.uploadComponent('libs', form)).rejects.toThrow(
      'upload failed with status 500: quota exceeded'
    );
  });
});

/** fetch as it behaves when the connection is refused: the body is destroyed, then the call rejects */
async function refusedFetch(_url: string, init?: RequestInit): Promise<Response> {
  const failure = new TypeError('fetch failed');
  if (init?.body instanceof PassThrough) {
    init.body.destroy(failure);
  }
  throw failure;
}

describe('RepositoryHttpClient upload failures', () => {
  let tmpDir: string;
  let srcDir: string;
  let client: RepositoryHttpClient;

  const settle = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 20));

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rawsync-http-upload-test-'));
    srcDir = path.join(tmpDir, 'src');
    fs.mkdirSync(path.join(srcDir, 'sub'), { recursive: true });
    fs.writeFileSync(path.join(srcDir, 'a.txt'), 'alpha');
    fs.writeFileSync(path.join(srcDir, 'sub', 'b.txt'), 'bravo');
    vi.stubGlobal('fetch', vi.fn(refusedFetch));
    client = new RepositoryHttpClient(
      { url: 'http://repo.test', username: 'admin', password: 'test-secret', timeoutMs: 0 },
      createMockLogger()
    );
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should reject when the request fails before the body is read', async () => {
    const form = buildArchiveUploadForm(Readable.from(['data']), 'bundle.tar.gz', '');

    await expect(client.uploadComponent('libs', form)).rejects.toThrow('fetch failed');
    await settle();
  });

  it('should report a refused raw upload as a failed folder', async () => {
    const uploader = new FolderUploader(client, { concurrency: 2 }, createMockLogger());

    const result = await uploader.uploadFolder(srcDir, 'libs/app', buildUploadOptions());
    await settle();

    expect(result.status).toBe(FolderStatus.Error);
    expect(result.message).toBe('Upload error: fetch failed');
    expect(result.outcomes.map((o) => o.status)).toEqual(['failed', 'failed']);
  });

  it.each(['bundle.tar.gz', 'bundle.tar.zst', 'bundle.zip'])(
    'should report a refused archive upload as a failed folder (%s)',
    async (archiveName) => {
      const uploader = new FolderUploader(client, { concurrency: 2 }, createMockLogger());

      const result = await uploader.uploadFolder(
        srcDir,
        `libs/app/${archiveName}`,
        buildUploadOptions({ compress: true })
      );
      await settle();

      expect(result.status).toBe(FolderStatus.Error);
      expect(result.message).toBe('Upload error: fetch failed');
    }
  );
});
