/**
 * Include/exclude glob filter.
 *
 * Patterns are comma separated; a leading `!` marks an exclusion.
 * Example: "**\/*.ts,!**\/*.test.ts" keeps sources but drops tests.
 * `**` crosses directory separators, `*` does not.
 */

import { Minimatch } from 'minimatch';

const MATCH_OPTIONS = { dot: true } as const;

export class GlobFilter {
  private readonly positive: Minimatch[];
  private readonly negative: Minimatch[];

  constructor(pattern: string) {
    this.positive = [];
    this.negative = [];

    for (const raw of pattern.split(',')) {
      const trimmed = raw.trim();
      if (!trimmed) continue;
      if (trimmed.startsWith('!')) {
        this.negative.push(new Minimatch(trimmed.slice(1), MATCH_OPTIONS));
      } else {
        this.positive.push(new Minimatch(trimmed, MATCH_OPTIONS));
      }
    }
  }

  /** True when no patterns were given */
  get isEmpty(): boolean {
    return this.positive.length === 0 && this.negative.length === 0;
  }

  /**
   * A path matches when at least one positive pattern matches (or there are
   * none) and no negative pattern matches.
   */
  match(relativePath: string): boolean {
    const normalized = relativePath.replace(/\\/g, '/');

    const included =
      this.positive.length === 0 || this.positive.some((m) => m.match(normalized));
    if (!included) return false;

    return !this.negative.some((m) => m.match(normalized));
  }
}

/**
 * Keep the items whose extracted path matches the pattern, preserving order.
 * An empty pattern keeps everything.
 */
export function filterWithGlob<T>(
  items: readonly T[],
  pattern: string,
  pathOf: (item: T) => string
): T[] {
  if (!pattern) return [...items];
  const filter = new GlobFilter(pattern);
  return items.filter((item) => filter.match(pathOf(item)));
}
