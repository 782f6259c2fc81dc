/**
 * Terminal progress bar on top of cli-progress.
 */

import cliProgress from 'cli-progress';
import type { SingleBar } from 'cli-progress';
import { formatBytes } from '../../transfer/tracker.js';
import { countingProgress } from '../../transfer/progress.js';
import type { ProgressFactory, ProgressReporter, ProgressSpec } from '../../transfer/types.js';

class TerminalProgress implements ProgressReporter {
  private readonly bar: SingleBar;
  private readonly totalFiles: number;
  private bytes = 0;
  private files = 0;
  private done = false;

  constructor(spec: ProgressSpec) {
    this.totalFiles = spec.totalFiles;
    this.bar = new cliProgress.SingleBar(
      {
        format: '{label} |{bar}| {percentage}% | {transferred}/{size} | {files}/{totalFiles} files',
        hideCursor: true,
        clearOnComplete: false,
        stream: process.stderr,
      },
      cliProgress.Presets.shades_classic
    );
    this.bar.start(Math.max(spec.totalBytes, 1), 0, {
      label: spec.label,
      transferred: formatBytes(0),
      size: formatBytes(spec.totalBytes),
      files: 0,
      totalFiles: spec.totalFiles,
    });
  }

  advance(bytes: number): void {
    this.bytes += bytes;
    this.bar.increment(bytes, { transferred: formatBytes(this.bytes) });
  }

  completeFile(): void {
    this.files = Math.min(this.files + 1, this.totalFiles);
    this.bar.update({ files: this.files });
  }

  finish(): void {
    if (this.done) return;
    this.done = true;
    this.bar.stop();
  }
}

export interface ProgressFlags {
  quiet?: boolean;
  dryRun?: boolean;
}

/** A bar on interactive terminals, a silent counter otherwise */
export function progressFactoryFor(flags: ProgressFlags): ProgressFactory {
  if (flags.quiet || flags.dryRun || !process.stderr.isTTY) {
    return countingProgress;
  }
  return (spec) => new TerminalProgress(spec);
}
