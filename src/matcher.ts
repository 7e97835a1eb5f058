/**
 * Pattern matching on filenames: regex or literal/glob-lite, with new-name computation.
 *
 * Regex mode replaces every occurrence, literal mode only the first one. Both behaviors
 * are relied on by callers and must stay as they are.
 */

import { InvalidPatternError } from "./errors.js";
import type { PatternConfig } from "./types.js";

export interface Matcher {
  /** New name (rename mode) or the filename itself (search mode); undefined when no match. */
  match(filename: string): string | undefined;
  matchesOnly(filename: string): boolean;
}

function compileRegex(pattern: string, flags: string): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new InvalidPatternError(pattern, `Invalid regex: ${msg}`, { cause: err });
  }
}

function createRegexMatcher(config: PatternConfig): Matcher {
  const flags = config.caseSensitive ? "" : "i";
  // The tester has no "g" flag so test() never carries lastIndex between filenames.
  const tester = compileRegex(config.pattern, flags);
  const replacer = compileRegex(config.pattern, `${flags}g`);
  const { replacement } = config;

  return {
    matchesOnly: (filename) => tester.test(filename),
    match(filename) {
      if (!tester.test(filename)) return undefined;
      return replacement === undefined ? filename : filename.replace(replacer, replacement);
    },
  };
}

interface Wildcard {
  prefix: string;
  suffix: string;
}

/** Exactly one `*` splits into prefix/suffix; anything else is a plain needle. */
function splitWildcard(pattern: string): Wildcard | undefined {
  const parts = pattern.split("*");
  if (parts.length !== 2) return undefined;
  return { prefix: parts[0], suffix: parts[1] };
}

function sameText(a: string, b: string, caseSensitive: boolean): boolean {
  return caseSensitive ? a === b : a.toLowerCase() === b.toLowerCase();
}

function matchesWildcard(filename: string, wildcard: Wildcard, caseSensitive: boolean): boolean {
  const { prefix, suffix } = wildcard;
  if (filename.length < prefix.length + suffix.length) return false;
  return (
    sameText(filename.slice(0, prefix.length), prefix, caseSensitive) &&
    sameText(filename.slice(filename.length - suffix.length), suffix, caseSensitive)
  );
}

function replaceWildcard(filename: string, wildcard: Wildcard, replacement: string): string {
  const middle = filename.slice(wildcard.prefix.length, filename.length - wildcard.suffix.length);
  const target = splitWildcard(replacement);
  if (target === undefined) return replacement;
  return `${target.prefix}${middle}${target.suffix}`;
}

interface Span {
  start: number;
  end: number;
}

/**
 * First occurrence of `needle` in `filename`, compared lowercase, as offsets into the
 * original filename. Lowercasing can change a character's length, so the lowered text
 * keeps a map back to the character each unit came from.
 */
function findFolded(filename: string, needle: string): Span | undefined {
  const target = needle.toLowerCase();
  if (target === "") return { start: 0, end: 0 };

  let folded = "";
  const starts: number[] = [];
  const ends: number[] = [];
  let index = 0;
  for (const ch of filename) {
    const lower = ch.toLowerCase();
    for (let k = 0; k < lower.length; k++) {
      starts.push(index);
      ends.push(index + ch.length);
    }
    folded += lower;
    index += ch.length;
  }

  const at = folded.indexOf(target);
  if (at === -1) return undefined;
  return { start: starts[at], end: ends[at + target.length - 1] };
}

function findLiteral(filename: string, needle: string, caseSensitive: boolean): Span | undefined {
  if (!caseSensitive) return findFolded(filename, needle);
  const start = filename.indexOf(needle);
  return start === -1 ? undefined : { start, end: start + needle.length };
}

function createLiteralMatcher(config: PatternConfig): Matcher {
  const { pattern, replacement, caseSensitive } = config;
  if (pattern === "") {
    throw new InvalidPatternError(pattern, "Find pattern cannot be empty for literal match.");
  }

  const wildcard = splitWildcard(pattern);
  if (wildcard !== undefined) {
    const matchesOnly = (filename: string) => matchesWildcard(filename, wildcard, caseSensitive);
    return {
      matchesOnly,
      match(filename) {
        if (!matchesOnly(filename)) return undefined;
        return replacement === undefined ? filename : replaceWildcard(filename, wildcard, replacement);
      },
    };
  }

  const needle = pattern.replaceAll("*", "");

  return {
    matchesOnly: (filename) => findLiteral(filename, needle, caseSensitive) !== undefined,
    match(filename) {
      const span = findLiteral(filename, needle, caseSensitive);
      if (span === undefined) return undefined;
      if (replacement === undefined) return filename;
      return `${filename.slice(0, span.start)}${replacement}${filename.slice(span.end)}`;
    },
  };
}

/**
 * Compile a matcher for the given pattern config. Throws InvalidPatternError for a regex
 * that does not compile or an empty literal pattern.
 */
export function createMatcher(config: PatternConfig): Matcher {
  return config.regex ? createRegexMatcher(config) : createLiteralMatcher(config);
}
