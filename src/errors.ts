/**
 * Error taxonomy for the transfer engine.
 *
 * Every error carries a stable `code` so callers (and the CLI) can branch
 * on the kind of failure without matching on message text.
 */

export type SyncErrorCode =
  | 'ARGUMENT'
  | 'LISTING'
  | 'NO_ASSETS'
  | 'TRANSFER'
  | 'CHECKSUM_MISMATCH'
  | 'MISSING_LOCK_ENTRY'
  | 'MISSING_DIGEST'
  | 'UNSUPPORTED_ALGORITHM'
  | 'IO'
  | 'REPOSITORY_NOT_FOUND'
  | 'MANIFEST'
  | 'PATH_TRAVERSAL'
  | 'KEY_TEMPLATE';

export class SyncError extends Error {
  public readonly code: SyncErrorCode;

  constructor(code: SyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SyncError';
    this.code = code;
  }
}

/** Malformed repository/path argument or option value */
export class ArgumentError extends SyncError {
  constructor(message: string) {
    super('ARGUMENT', message);
    this.name = 'ArgumentError';
  }
}

export class ListingError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LISTING', message, options);
    this.name = 'ListingError';
  }
}

/** Listing or filtering matched nothing; not a defect */
export class NoAssetsError extends SyncError {
  constructor(message: string) {
    super('NO_ASSETS', message);
    this.name = 'NoAssetsError';
  }
}

export class TransferError extends SyncError {
  public readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('TRANSFER', message, options);
    this.name = 'TransferError';
    this.path = path;
  }
}

export class ChecksumMismatchError extends SyncError {
  public readonly filePath: string;
  public readonly expected: string;
  public readonly actual: string;

  constructor(filePath: string, expected: string, actual: string) {
    super('CHECKSUM_MISMATCH', `checksum mismatch for ${filePath}: expected ${expected}, got ${actual}`);
    this.name = 'ChecksumMismatchError';
    this.filePath = filePath;
    this.expected = expected;
    this.actual = actual;
  }
}

export class MissingLockEntryError extends SyncError {
  public readonly dependency: string;

  constructor(dependency: string, detail?: string) {
    super('MISSING_LOCK_ENTRY', detail ?? `dependency ${dependency} not found in lock file`);
    this.name = 'MissingLockEntryError';
    this.dependency = dependency;
  }
}

/** The expected checksum record has no digest for the requested algorithm */
export class MissingDigestError extends SyncError {
  constructor(algorithm: string, assetPath?: string) {
    super(
      'MISSING_DIGEST',
      assetPath
        ? `no ${algorithm} checksum available for asset ${assetPath}`
        : `no ${algorithm} checksum available for validation`
    );
    this.name = 'MissingDigestError';
  }
}

export class UnsupportedAlgorithmError extends SyncError {
  constructor(algorithm: string) {
    super(
      'UNSUPPORTED_ALGORITHM',
      `unsupported checksum algorithm '${algorithm}': must be one of: sha1, sha256, sha512, md5`
    );
    this.name = 'UnsupportedAlgorithmError';
  }
}

export class IOError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('IO', message, options);
    this.name = 'IOError';
  }
}

export class RepositoryNotFoundError extends SyncError {
  public readonly repository: string;

  constructor(repository: string, status: number) {
    super('REPOSITORY_NOT_FOUND', `repository '${repository}' not found (status ${status})`);
    this.name = 'RepositoryNotFoundError';
    this.repository = repository;
  }
}

export class ManifestError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MANIFEST', message, options);
    this.name = 'ManifestError';
  }
}

export class PathTraversalError extends SyncError {
  public readonly entryName: string;

  constructor(entryName: string) {
    super('PATH_TRAVERSAL', `archive entry '${entryName}' resolves outside the destination directory`);
    this.name = 'PathTraversalError';
    this.entryName = entryName;
  }
}

export class KeyTemplateError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('KEY_TEMPLATE', message, options);
    this.name = 'KeyTemplateError';
  }
}

/** Render an unknown thrown value as a message */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Coerce an unknown thrown value into an Error instance */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
