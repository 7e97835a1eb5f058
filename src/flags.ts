/**
 * CLI flag parsing and usage/version output.
 */

import { parse } from "@bomb.sh/args";
import { FnrError } from "./errors.js";
import type { EntryKind, PatternConfig, WalkConfig } from "./types.js";

export const VERSION = "0.2.0";

export class UsageError extends FnrError {}

export interface ParsedArgs {
  help: boolean;
  version: boolean;
  pattern: string | undefined;
  replacement: string | undefined;
  globs: string[];
  baseDir: string;
  regex: boolean;
  type: EntryKind;
  dryRun: boolean;
  interactive: boolean;
  recursive: boolean;
  caseSensitive: boolean;
  hidden: boolean;
  color: boolean;
  followSymlinks: boolean;
  honorIgnoreFiles: boolean;
  maxDepth: number | undefined;
  minDepth: number | undefined;
}

const ARGS_CONFIG = {
  boolean: ["help", "version", "regex", "dry-run", "case-sensitive", "hidden"] as const,
  string: ["base-dir", "type", "max-depth", "min-depth"] as const,
  alias: { h: "help", v: "version", r: "regex", d: "base-dir", t: "type" } as const,
};

// Taken out of argv before parsing so the parser's own `--no-` handling never sees them.
const NEGATED_SWITCHES = ["interactive", "recursive", "color", "symlink", "skip-gitignore"] as const;
type NegatedSwitch = (typeof NEGATED_SWITCHES)[number];

function splitNegated(argv: readonly string[]): { rest: string[]; negated: Set<NegatedSwitch> } {
  const negated = new Set<NegatedSwitch>();
  const rest: string[] = [];
  for (const [i, arg] of argv.entries()) {
    if (arg === "--") {
      rest.push(...argv.slice(i));
      break;
    }
    const name = NEGATED_SWITCHES.find((s) => arg === `--no-${s}`);
    if (name === undefined) rest.push(arg);
    else negated.add(name);
  }
  return { rest, negated };
}

function parseEntryKind(value: string | undefined): EntryKind {
  if (value === undefined) return "both";
  if (value === "file" || value === "dir" || value === "both") return value;
  throw new UsageError(`Invalid --type "${value}" (expected file, dir or both)`);
}

function parseDepth(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const text = String(value);
  if (!/^\d+$/.test(text)) {
    throw new UsageError(`Invalid --${flag} "${text}" (expected a non-negative integer)`);
  }
  return Number.parseInt(text, 10);
}

export function parseArgs(argv: string[]): ParsedArgs {
  const { rest, negated } = splitNegated(argv);
  const raw = parse(rest, ARGS_CONFIG);
  const [pattern, replacement, ...globs] = raw._.map(String);
  const baseDir = raw["base-dir"];

  return {
    help: Boolean(raw.help),
    version: Boolean(raw.version),
    pattern,
    replacement,
    globs,
    baseDir: baseDir === undefined || baseDir === "" ? "." : String(baseDir),
    regex: Boolean(raw.regex),
    type: parseEntryKind(raw.type),
    dryRun: Boolean(raw["dry-run"]),
    interactive: !negated.has("interactive"),
    recursive: !negated.has("recursive"),
    caseSensitive: Boolean(raw["case-sensitive"]),
    hidden: Boolean(raw.hidden),
    color: !negated.has("color"),
    followSymlinks: !negated.has("symlink"),
    honorIgnoreFiles: !negated.has("skip-gitignore"),
    maxDepth: parseDepth("max-depth", raw["max-depth"]),
    minDepth: parseDepth("min-depth", raw["min-depth"]),
  };
}

export function toWalkConfig(args: ParsedArgs): WalkConfig {
  return {
    baseDir: args.baseDir,
    recursive: args.recursive,
    maxDepth: args.maxDepth,
    minDepth: args.minDepth,
    includeHidden: args.hidden,
    followSymlinks: args.followSymlinks,
    honorIgnoreFiles: args.honorIgnoreFiles,
  };
}

export function toPatternConfig(args: ParsedArgs, pattern: string): PatternConfig {
  return {
    pattern,
    replacement: args.replacement,
    regex: args.regex,
    caseSensitive: args.caseSensitive,
  };
}

export function printHelp(): void {
  const usage = `fnr – search and batch rename files and directories by name

Usage:
  fnr <pattern>                          Search mode: list matching entries
  fnr <pattern> <replacement> [globs...] Rename mode (interactive by default)
  fnr --help                             Show this help
  fnr --version                          Show version

Options:
  -d, --base-dir <dir>     Base directory to search from (default: .)
  -r, --regex              Treat pattern as a regular expression (replacement may use $1, $<name>)
  -t, --type <kind>        Filter by entry type: file, dir or both (default: both)
  --dry-run                Show what would be renamed without renaming
  --no-interactive         Apply all renames without prompts
  --no-recursive           Only look at the base directory's entries
  --case-sensitive         Case-sensitive matching
  --hidden                 Include hidden files and directories
  --no-color               Disable colored output
  --no-symlink             Do not follow symbolic links
  --no-skip-gitignore      Do not skip entries listed in .gitignore/.ignore files
  --max-depth <n>          Maximum depth to search
  --min-depth <n>          Minimum depth to report

Literal patterns match anywhere in the name; a single * splits the pattern into a
prefix and a suffix (IMG_*.jpg). Literal renames replace the first occurrence,
regex renames replace every occurrence.

Globs restrict which paths are considered ('*.ts', 'src/**', '!dist/**').

Examples:
  fnr draft
  fnr draft final --dry-run
  fnr "IMG_*.jpg" "photo_*.jpg" -t file
  fnr "(\\d+)-(\\d+)" "$2-$1" -r --no-interactive '**/*.txt'`;
  console.log(usage);
}

export function printVersion(): void {
  console.log(VERSION);
}
