/**
 * Shared records passed between the walker, collector, sequencer and the CLI.
 */

import type { RenameFailedError, WalkWarning } from "./errors.js";

/** One filesystem entry selected for reporting or renaming. */
export interface Match {
  readonly path: string;
  /** Final filename, derived once from the original name. */
  readonly newName: string;
  readonly isDir: boolean;
  readonly pattern: string;
  readonly replacement: string;
}

export interface PatternConfig {
  pattern: string;
  /** Present in rename mode, absent in search mode. */
  replacement?: string;
  regex: boolean;
  caseSensitive: boolean;
}

export interface WalkConfig {
  baseDir: string;
  recursive: boolean;
  maxDepth?: number;
  minDepth?: number;
  includeHidden: boolean;
  followSymlinks: boolean;
  honorIgnoreFiles: boolean;
}

export type EntryKind = "file" | "dir" | "both";

export type Decision = "yes" | "no" | "all" | "quit";

export interface DecisionSource {
  decide(match: Match): Decision | Promise<Decision>;
}

/** Display collaborator. Rendering and color are up to the implementation. */
export interface Reporter {
  match(path: string, newName: string, isDir: boolean): void;
  preview(source: string, destination: string, isDir: boolean): void;
  renamed(source: string, destination: string, isDir: boolean): void;
  failed(error: RenameFailedError): void;
  warn(warning: WalkWarning): void;
}
