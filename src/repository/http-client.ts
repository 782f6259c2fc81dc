/**
 * HTTP client for the repository REST API.
 *
 * Authenticates every request with basic auth. Listing follows the search
 * API's continuation tokens until the last page.
 */

import { PassThrough, Readable } from 'node:stream';
import type { Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type FormData from 'form-data';
import type { Logger } from 'pino';
import { z } from 'zod';
import { ListingError, RepositoryNotFoundError, TransferError } from '../errors.js';
import type { Asset, RepositoryClient, RepositoryConnection } from './types.js';

const SEARCH_ASSETS_PATH = '/service/rest/v1/search/assets';
const COMPONENTS_PATH = '/service/rest/v1/components';

const checksumSchema = z
  .object({
    sha1: z.string().optional(),
    sha256: z.string().optional(),
    sha512: z.string().optional(),
    md5: z.string().optional(),
  })
  .partial()
  .default({});

const assetSchema = z.object({
  id: z.string().default(''),
  repository: z.string().default(''),
  format: z.string().default('raw'),
  path: z.string(),
  downloadUrl: z.string(),
  fileSize: z.number().default(0),
  checksum: checksumSchema,
});

const searchResponseSchema = z.object({
  items: z.array(assetSchema).default([]),
  continuationToken: z.string().nullish(),
});

type RawAsset = z.infer<typeof assetSchema>;

function toAsset(raw: RawAsset): Asset {
  return {
    id: raw.id,
    repository: raw.repository,
    format: raw.format,
    path: raw.path,
    downloadUrl: raw.downloadUrl,
    fileSize: raw.fileSize,
    checksum: {
      sha1: raw.checksum.sha1 ?? '',
      sha256: raw.checksum.sha256 ?? '',
      sha512: raw.checksum.sha512 ?? '',
      md5: raw.checksum.md5 ?? '',
    },
  };
}

function stripSlashes(value: string): string {
  return value.replace(/^\/+/, '').replace(/\/+$/, '');
}

export class RepositoryHttpClient implements RepositoryClient {
  private readonly connection: RepositoryConnection;
  private readonly logger: Logger;
  private readonly authHeader: string;

  constructor(connection: RepositoryConnection, logger: Logger) {
    this.connection = connection;
    this.logger = logger.child({ component: 'repository-client' });
    this.authHeader =
      'Basic ' + Buffer.from(`${connection.username}:${connection.password}`).toString('base64');
  }

  async listAssets(repository: string, path: string, recursive: boolean): Promise<Asset[]> {
    const clean = stripSlashes(path);
    let query: string;
    if (recursive) {
      query = clean ? `/${clean}*` : '/*';
    } else {
      query = clean ? `/${clean}/*` : '/*';
    }
    return this.search(repository, query);
  }

  async getAssetByPath(repository: string, path: string): Promise<Asset> {
    const clean = stripSlashes(path);
    const assets = await this.search(repository, `/${clean}`);
    const match = assets.find((asset) => stripSlashes(asset.path) === clean);
    if (!match) {
      throw new ListingError(`asset not found: ${repository}/${clean}`);
    }
    return match;
  }

  async downloadAsset(downloadUrl: string, destination: Writable): Promise<void> {
    const response = await this.request(downloadUrl, { method: 'GET' });

    if (response.status !== 200 || !response.body) {
      throw new TransferError(downloadUrl, `failed to download asset: ${response.status}`);
    }

    await pipeline(Readable.fromWeb(response.body), destination);
  }

  async uploadComponent(repository: string, form: FormData): Promise<void> {
    const url = new URL(COMPONENTS_PATH, this.connection.url);
    url.searchParams.set('repository', repository);

    const body = new PassThrough();
    form.on('error', (err: Error) => body.destroy(err));
    // fetch destroys the body when the request fails before reading it
    body.on('error', (err) => {
      form.destroy();
      this.logger.debug({ repository, error: err.message }, 'Upload body closed');
    });
    form.pipe(body);

    this.logger.debug({ repository }, 'Uploading component');

    const response = await this.request(url.toString(), {
      method: 'POST',
      headers: form.getHeaders(),
      body,
      duplex: 'half',
    });

    if (response.status === 204) {
      return;
    }
    if (response.status === 404) {
      throw new RepositoryNotFoundError(repository, response.status);
    }

    const text = await response.text();
    throw new TransferError(repository, `upload failed with status ${response.status}: ${text}`);
  }

  private async search(repository: string, query: string): Promise<Asset[]> {
    const assets: Asset[] = [];
    let continuationToken: string | null | undefined;

    do {
      const url = new URL(SEARCH_ASSETS_PATH, this.connection.url);
      url.searchParams.set('repository', repository);
      url.searchParams.set('format', 'raw');
      url.searchParams.set('direction', 'asc');
      url.searchParams.set('sort', 'name');
      url.searchParams.set('q', query);
      if (continuationToken) {
        url.searchParams.set('continuationToken', continuationToken);
      }

      let response: Response;
      try {
        response = await this.request(url.toString(), { method: 'GET' });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new ListingError(`Failed to list assets: ${message}`, { cause: err });
      }

      if (response.status !== 200) {
        throw new ListingError(`Failed to list assets: ${response.status}`);
      }

      const parsed = searchResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new ListingError(`Unexpected search response: ${parsed.error.message}`);
      }

      assets.push(...parsed.data.items.map(toAsset));
      continuationToken = parsed.data.continuationToken;
    } while (continuationToken);

    this.logger.debug({ repository, query, count: assets.length }, 'Listed assets');
    return assets;
  }

  private request(url: string, init: RequestInit): Promise<Response> {
    const headers = new Headers(init.headers);
    headers.set('Authorization', this.authHeader);
    const signal =
      this.connection.timeoutMs > 0 ? AbortSignal.timeout(this.connection.timeoutMs) : undefined;
    return fetch(url, { ...init, headers, signal });
  }
}
