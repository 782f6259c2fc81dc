/**
 * Client configuration builder.
 *
 * Reads from environment variables with sensible defaults.
 * All values can be overridden programmatically.
 */

import type { ClientConfig } from './types.js';
import { DEFAULT_CLIENT_CONFIG } from './types.js';

function getEnv(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function getEnvNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

/**
 * Build client config from environment variables and optional overrides.
 *
 * Environment variables:
 * - RAWSYNC_URL: Repository server URL (default: http://localhost:8081)
 * - RAWSYNC_USER: User name (default: admin)
 * - RAWSYNC_PASS: Password (default: admin)
 * - RAWSYNC_CONCURRENCY: Max concurrent transfers (default: 8)
 * - RAWSYNC_TIMEOUT_MS: HTTP timeout, 0 disables (default: 0)
 */
export function buildClientConfig(overrides?: Partial<ClientConfig>): Readonly<ClientConfig> {
  const url = overrides?.url ?? getEnv('RAWSYNC_URL', DEFAULT_CLIENT_CONFIG.url);

  return Object.freeze({
    url: url.replace(/\/+$/, ''),
    username: overrides?.username ?? getEnv('RAWSYNC_USER', DEFAULT_CLIENT_CONFIG.username),
    password: overrides?.password ?? getEnv('RAWSYNC_PASS', DEFAULT_CLIENT_CONFIG.password),
    concurrency:
      overrides?.concurrency ??
      getEnvNumber('RAWSYNC_CONCURRENCY', DEFAULT_CLIENT_CONFIG.concurrency),
    timeoutMs:
      overrides?.timeoutMs ??
      getEnvNumber('RAWSYNC_TIMEOUT_MS', DEFAULT_CLIENT_CONFIG.timeoutMs),
  });
}

/**
 * Validate a client configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateClientConfig(config: ClientConfig): string[] {
  const errors: string[] = [];

  if (!config.url) {
    errors.push('url is required');
  } else if (!/^https?:\/\//.test(config.url)) {
    errors.push('url must start with http:// or https://');
  }

  if (config.concurrency < 1) {
    errors.push('concurrency must be at least 1');
  }

  if (config.concurrency > 64) {
    errors.push('concurrency must not exceed 64');
  }

  if (config.timeoutMs < 0) {
    errors.push('timeoutMs must not be negative');
  }

  return errors;
}
