export type { ChecksumValidator, ProgressSink } from './types.js';
export {
  SUPPORTED_ALGORITHMS,
  parseChecksumAlgorithm,
  digestFor,
  computeFileDigest,
  createChecksumValidator,
} from './validator.js';
