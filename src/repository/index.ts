export type { Asset, Checksum, ChecksumAlgorithm, RepositoryClient, RepositoryConnection } from './types.js';
export { emptyChecksum } from './types.js';
export { RepositoryHttpClient } from './http-client.js';
export type { RawUploadFile } from './upload-form.js';
export { LazyFileStream, buildRawUploadForm, buildArchiveUploadForm, progressTap } from './upload-form.js';
