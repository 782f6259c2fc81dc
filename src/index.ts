/**
 * rawsync library entry point.
 */

export * from './errors.js';
export * from './config/index.js';
export * from './repository/index.js';
export * from './checksum/index.js';
export * from './glob/index.js';
export * from './archive/index.js';
export * from './transfer/index.js';
export * from './deps/index.js';
