/**
 * Root logger for the command-line program. Logs go to stderr so stdout
 * stays free for summaries.
 */

import pino from 'pino';
import type { Logger } from 'pino';

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export interface LogFlags {
  verbose?: boolean;
  quiet?: boolean;
}

/** --verbose and --quiet win over RAWSYNC_LOG_LEVEL; the default is info */
export function resolveLogLevel(flags: LogFlags, envLevel = process.env.RAWSYNC_LOG_LEVEL): string {
  if (flags.verbose) return 'debug';
  if (flags.quiet) return 'warn';
  const requested = envLevel?.trim().toLowerCase();
  const known = LEVELS.find((level) => level === requested);
  return known ?? 'info';
}

export function createCliLogger(flags: LogFlags): Logger {
  return pino({ name: 'rawsync', level: resolveLogLevel(flags) }, pino.destination(2));
}
