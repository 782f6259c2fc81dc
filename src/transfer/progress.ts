/**
 * Headless progress reporter.
 *
 * Counts bytes and completed files; terminal rendering is layered on top
 * by the CLI.
 */

import type { ProgressFactory, ProgressReporter } from './types.js';

export class CountingProgress implements ProgressReporter {
  bytes = 0;
  files = 0;
  finished = false;

  advance(bytes: number): void {
    this.bytes += bytes;
  }

  completeFile(): void {
    this.files++;
  }

  finish(): void {
    this.finished = true;
  }
}

export const countingProgress: ProgressFactory = () => new CountingProgress();
