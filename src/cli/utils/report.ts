/**
 * Console rendering of folder results.
 */

import chalk from 'chalk';
import { formatSummary } from '../../transfer/tracker.js';
import { FolderStatus } from '../../transfer/types.js';
import type { FolderResult } from '../../transfer/types.js';

const MAX_LISTED_FAILURES = 5;

export function printFolderResult(result: FolderResult, quiet: boolean): void {
  if (result.status === FolderStatus.NoAssetsFound) {
    console.error(chalk.yellow(result.message ?? 'No assets found'));
    return;
  }

  const failures = result.outcomes.filter((o) => o.status === 'failed');
  if (failures.length > 0) {
    console.error(chalk.yellow(`  ${failures.length} error${failures.length !== 1 ? 's' : ''}:`));
    for (const failure of failures.slice(0, MAX_LISTED_FAILURES)) {
      console.error(chalk.red(`    - ${failure.path}: ${failure.error?.message ?? 'failed'}`));
    }
    if (failures.length > MAX_LISTED_FAILURES) {
      console.error(chalk.dim(`    ... and ${failures.length - MAX_LISTED_FAILURES} more`));
    }
  }

  if (result.status === FolderStatus.Error && result.message) {
    console.error(chalk.red('Error:'), result.message);
  }

  if (quiet) return;

  const line = formatSummary(result.summary);
  console.log(result.status === FolderStatus.Success ? chalk.green(line) : line);
  if (result.deleted > 0) {
    console.log(chalk.dim(`Deleted ${result.deleted} extra file${result.deleted !== 1 ? 's' : ''}`));
  }
}
