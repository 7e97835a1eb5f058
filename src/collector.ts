/**
 * Match collection: walker + glob filter + matcher into an unordered list of matches.
 */

import { basename } from "node:path";
import { compileGlobSet, matchesEntryKind } from "./glob-filter.js";
import { createMatcher } from "./matcher.js";
import { walkTree } from "./walker.js";
import type { WarningHandler } from "./walker.js";
import type { EntryKind, Match, PatternConfig, WalkConfig } from "./types.js";

export interface CollectOptions {
  walk: WalkConfig;
  /** Empty means every entry. */
  globs: readonly string[];
  type: EntryKind;
  pattern: PatternConfig;
  onWarning?: WarningHandler;
}

export interface Collection {
  collect(): Match[];
}

/**
 * Compile the pattern and globs, throwing InvalidPatternError on either, without touching
 * the filesystem. The walk happens on `collect()`.
 */
export function prepareCollection(options: CollectOptions): Collection {
  const matcher = createMatcher(options.pattern);
  const globSet = compileGlobSet(options.globs);
  const { pattern, replacement } = options.pattern;

  return {
    collect() {
      const matches: Match[] = [];
      for (const entry of walkTree(options.walk, options.onWarning)) {
        if (!globSet.isMatch(entry.relativePath)) continue;
        if (!matchesEntryKind(options.type, entry.isDir)) continue;

        const newName = matcher.match(basename(entry.path));
        if (newName === undefined) continue;

        matches.push({
          path: entry.path,
          newName,
          isDir: entry.isDir,
          pattern,
          replacement: replacement ?? "",
        });
      }
      return matches;
    },
  };
}

/**
 * Collect every entry whose base name matches. Pattern and glob errors are thrown before
 * the walk starts. The order of the result is the walker's and carries no guarantee.
 */
export function collectMatches(options: CollectOptions): Match[] {
  return prepareCollection(options).collect();
}
