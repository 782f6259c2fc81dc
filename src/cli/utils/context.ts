/**
 * Wiring shared by every command: configuration, logger, repository
 * clients and progress reporting.
 */

import type { Logger } from 'pino';
import { buildClientConfig, validateClientConfig } from '../../config/config.js';
import type { ClientConfig } from '../../config/types.js';
import type { ClientFactory } from '../../deps/resolver.js';
import { RepositoryHttpClient } from '../../repository/http-client.js';
import type { ProgressFactory } from '../../transfer/types.js';
import { createCliLogger } from './logger.js';
import { progressFactoryFor } from './progress.js';

/** Options defined on the root program */
export interface GlobalFlags {
  url?: string;
  username?: string;
  password?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export interface CliContext {
  config: Readonly<ClientConfig>;
  logger: Logger;
  clientFor: ClientFactory;
  progressFactory: ProgressFactory;
  quiet: boolean;
}

/**
 * Build the command context.
 * @throws Error when the environment configuration is invalid
 */
export function createCliContext(flags: GlobalFlags, dryRun = false): CliContext {
  const config = buildClientConfig({
    ...(flags.url ? { url: flags.url } : {}),
    ...(flags.username ? { username: flags.username } : {}),
    ...(flags.password ? { password: flags.password } : {}),
  });
  const problems = validateClientConfig(config);
  if (problems.length > 0) {
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }

  const logger = createCliLogger(flags);
  const clientFor: ClientFactory = (url) =>
    new RepositoryHttpClient(
      {
        url: (url || config.url).replace(/\/+$/, ''),
        username: config.username,
        password: config.password,
        timeoutMs: config.timeoutMs,
      },
      logger
    );

  return {
    config,
    logger,
    clientFor,
    progressFactory: progressFactoryFor({ quiet: flags.quiet, dryRun }),
    quiet: flags.quiet ?? false,
  };
}
