/**
 * Types for the remote raw repository.
 *
 * The engine only talks to the repository through {@link RepositoryClient};
 * the HTTP implementation lives in http-client.ts and tests supply an
 * in-memory fake.
 */

import type { Writable } from 'node:stream';
import type FormData from 'form-data';

/** Supported digest algorithms, lowercase */
export type ChecksumAlgorithm = 'sha1' | 'sha256' | 'sha512' | 'md5';

/**
 * Digest record for a remote asset.
 * An empty string means the repository did not report that digest.
 */
export interface Checksum {
  sha1: string;
  sha256: string;
  sha512: string;
  md5: string;
}

/** A remote file descriptor */
export interface Asset {
  /** Repository-internal identifier */
  id: string;

  /** Repository the asset belongs to */
  repository: string;

  /** Repository format (always "raw" for this client) */
  format: string;

  /** Slash-separated path; may carry a leading slash */
  path: string;

  /** Size in bytes as reported by the search API */
  fileSize: number;

  /** Digests reported by the repository */
  checksum: Checksum;

  /** URL the client resolves to the asset's bytes */
  downloadUrl: string;
}

/** Remote repository operations the engine depends on */
export interface RepositoryClient {
  /**
   * List assets under a path. Non-recursive listing returns the direct
   * children of `path`; recursive listing returns everything below it.
   */
  listAssets(repository: string, path: string, recursive: boolean): Promise<Asset[]>;

  /** Look up one asset by its exact path */
  getAssetByPath(repository: string, path: string): Promise<Asset>;

  /** Stream an asset's bytes into `destination`, ending it when done */
  downloadAsset(downloadUrl: string, destination: Writable): Promise<void>;

  /**
   * Upload a multipart component body.
   * Rejects with RepositoryNotFoundError when the repository does not exist.
   */
  uploadComponent(repository: string, form: FormData): Promise<void>;
}

/** Connection settings for the HTTP client */
export interface RepositoryConnection {
  /** Base server URL, without trailing slash */
  url: string;

  /** Basic-auth user name */
  username: string;

  /** Basic-auth password */
  password: string;

  /** Request timeout in milliseconds (0 = none) */
  timeoutMs: number;
}

/** Create an empty checksum record */
export function emptyChecksum(): Checksum {
  return { sha1: '', sha256: '', sha512: '', md5: '' };
}
