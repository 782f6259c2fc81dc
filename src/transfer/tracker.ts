/**
 * Transfer tracker: collects per-file outcomes and renders the summary line.
 */

import type { TransferDirection, TransferOutcome, TransferSummary } from './types.js';

const UNIT_PREFIXES = 'KMGTPE';

/** Format a byte count in binary units ("512 B", "1.5 KiB") */
export function formatBytes(bytes: number): string {
  const unit = 1024;
  if (bytes < unit) {
    return `${Math.floor(bytes)} B`;
  }
  let div = unit;
  let exp = 0;
  for (let n = Math.floor(bytes / unit); n >= unit; n = Math.floor(n / unit)) {
    div *= unit;
    exp++;
  }
  return `${(bytes / div).toFixed(1)} ${UNIT_PREFIXES[exp]}iB`;
}

/** Format a duration given in milliseconds ("250ms", "1.5s", "2.0m", "1.2h") */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  if (ms < 3_600_000) {
    return `${(ms / 60_000).toFixed(1)}m`;
  }
  return `${(ms / 3_600_000).toFixed(1)}h`;
}

/** Render a summary line such as "Files downloaded: 3, skipped: 1, size: 2.0 KiB, time: 120ms" */
export function formatSummary(summary: TransferSummary): string {
  const action = summary.direction === 'download' ? 'downloaded' : 'uploaded';
  let line = `Files ${action}: ${summary.successful}`;
  if (summary.skipped > 0) {
    line += `, skipped: ${summary.skipped}`;
  }
  if (summary.failed > 0) {
    line += `, failed: ${summary.failed}`;
  }
  line += `, size: ${formatBytes(summary.bytes)}`;
  line += `, time: ${formatDuration(summary.elapsedMs)}`;

  const seconds = summary.elapsedMs / 1000;
  if (seconds > 0 && summary.bytes > 0) {
    line += `, speed: ${formatBytes(summary.bytes / seconds)}/s`;
  }
  return line;
}

export class TransferTracker {
  private readonly direction: TransferDirection;
  private readonly clock: () => number;
  private readonly startedAt: number;
  private readonly recorded: TransferOutcome[] = [];

  constructor(direction: TransferDirection, clock: () => number = Date.now) {
    this.direction = direction;
    this.clock = clock;
    this.startedAt = clock();
  }

  record(outcome: TransferOutcome): void {
    this.recorded.push(outcome);
  }

  get outcomes(): readonly TransferOutcome[] {
    return this.recorded;
  }

  summarize(): TransferSummary {
    const summary: TransferSummary = {
      direction: this.direction,
      successful: 0,
      skipped: 0,
      failed: 0,
      bytes: 0,
      elapsedMs: this.clock() - this.startedAt,
    };

    for (const outcome of this.recorded) {
      switch (outcome.status) {
        case 'success':
          summary.successful++;
          summary.bytes += outcome.size;
          break;
        case 'skipped':
          summary.skipped++;
          break;
        case 'failed':
          summary.failed++;
          break;
      }
    }

    return summary;
  }
}
