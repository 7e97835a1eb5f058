/**
 * Search mode: list matching entries without renaming anything.
 */

import { prepareCollection } from "../collector.js";
import type { ParsedArgs } from "../flags.js";
import { toPatternConfig, toWalkConfig } from "../flags.js";
import type { Reporter } from "../types.js";
import { ensureDir } from "./common.js";

export function runSearch(args: ParsedArgs, pattern: string, reporter: Reporter): number {
  const collection = prepareCollection({
    walk: toWalkConfig(args),
    globs: args.globs,
    type: args.type,
    pattern: toPatternConfig({ ...args, replacement: undefined }, pattern),
    onWarning: (warning) => reporter.warn(warning),
  });
  ensureDir(args.baseDir);
  const matches = collection.collect();
  for (const m of matches) {
    reporter.match(m.path, m.newName, m.isDir);
  }
  return 0;
}
