/**
 * Glob set compilation (with `!` exclusions) and the file/dir kind filter.
 */

import { Minimatch } from "minimatch";
import { InvalidPatternError } from "./errors.js";
import type { EntryKind } from "./types.js";

export interface GlobSet {
  /** Membership test on a `/`-separated path relative to the base directory. */
  isMatch(relativePath: string): boolean;
}

function compileGlob(expression: string, glob: string): Minimatch {
  if (glob === "") {
    throw new InvalidPatternError(expression, "empty glob expression");
  }
  const compiled = new Minimatch(glob, { dot: true, matchBase: true });
  if (compiled.makeRe() === false) {
    throw new InvalidPatternError(expression, "malformed glob expression");
  }
  return compiled;
}

export function compileGlobSet(expressions: readonly string[]): GlobSet {
  const include: Minimatch[] = [];
  const exclude: Minimatch[] = [];

  for (const expression of expressions) {
    if (expression.startsWith("!")) {
      exclude.push(compileGlob(expression, expression.slice(1)));
    } else {
      include.push(compileGlob(expression, expression));
    }
  }

  return {
    isMatch(relativePath) {
      const included = include.length === 0 || include.some((glob) => glob.match(relativePath));
      return included && !exclude.some((glob) => glob.match(relativePath));
    },
  };
}

export function matchesEntryKind(kind: EntryKind, isDir: boolean): boolean {
  if (kind === "file") return !isDir;
  if (kind === "dir") return isDir;
  return true;
}
