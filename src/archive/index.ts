export type { ArchiveFormat, SourceFile } from './types.js';
export {
  archiveExtension,
  parseArchiveFormat,
  detectArchiveFormat,
  hasArchiveExtension,
} from './types.js';
export { collectFiles, resolveInside } from './walk.js';
export { createArchive, extractArchive, writeArchive } from './codec.js';
export { ZstdCompressStream, ZstdDecompressStream } from './zstd.js';
