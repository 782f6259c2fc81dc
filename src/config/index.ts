export type { ClientConfig } from './types.js';
export { DEFAULT_CLIENT_CONFIG } from './types.js';
export { buildClientConfig, validateClientConfig } from './config.js';
