/**
 * Shared output for the search and rename commands: line formatting and the terminal reporter.
 */

import { existsSync, statSync } from "node:fs";
import * as p from "@clack/prompts";
import pc from "picocolors";
import type { RenameFailedError, WalkWarning } from "../errors.js";
import { UsageError } from "../flags.js";
import type { Reporter } from "../types.js";
import type { BatchSummary } from "../sequencer.js";

export type Colors = ReturnType<typeof pc.createColors>;

export function createColors(enabled: boolean): Colors {
  return enabled ? pc : pc.createColors(false);
}

export interface ReporterOutput {
  line(text: string): void;
  /** Closing line of a run, such as the batch summary. */
  done(text: string): void;
  warn(text: string): void;
  error(text: string): void;
}

/** Listing on stdout, warnings and errors on stderr, all colored through `c`. */
export function createConsoleOutput(c: Colors, colored: boolean): ReporterOutput {
  return {
    line: (text) => console.log(text),
    done: (text) => (colored ? p.outro(text) : console.log(text)),
    warn: (text) => console.error(`${c.yellow("Warning:")} ${text}`),
    error: (text) => console.error(`${c.red("Error:")} ${text}`),
  };
}

export function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    throw new UsageError(`Directory does not exist: ${dir}`);
  }
  if (!statSync(dir).isDirectory()) {
    throw new UsageError(`Not a directory: ${dir}`);
  }
}

export function formatMatchLine(path: string, isDir: boolean, c: Colors): string {
  const indicator = isDir ? c.bold(c.blue("d")) : c.bold(c.green("f"));
  return `[${indicator}] ${path}`;
}

export function formatPreviewLines(source: string, destination: string, c: Colors): [string, string] {
  return [`    ${source}`, ` -> ${c.yellow(destination)}`];
}

export function formatRenamedLine(source: string, destination: string, c: Colors): string {
  return `${c.bold(c.cyan("Renamed:"))} ${source} ${c.bold(c.yellow("->"))} ${c.bold(c.yellow(destination))}`;
}

export function formatSummary(summary: BatchSummary): string {
  const parts = [`${summary.renamed} renamed`, `${summary.skipped} skipped`];
  if (summary.failed.length > 0) parts.push(`${summary.failed.length} failed`);
  return summary.quit ? `${parts.join(", ")} (quit early)` : parts.join(", ");
}

export function createTerminalReporter(c: Colors, out: ReporterOutput): Reporter {
  return {
    match(path, _newName, isDir) {
      out.line(formatMatchLine(path, isDir, c));
    },
    preview(source, destination) {
      for (const line of formatPreviewLines(source, destination, c)) out.line(line);
    },
    renamed(source, destination) {
      out.line(formatRenamedLine(source, destination, c));
    },
    failed(error: RenameFailedError) {
      out.error(error.message);
    },
    warn(warning: WalkWarning) {
      out.warn(`${warning.path}: ${warning.message}`);
    },
  };
}
