/**
 * Error kinds raised by the search/rename engine.
 */

export class FnrError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed regex, empty literal pattern or malformed glob. Raised before any walk. */
export class InvalidPatternError extends FnrError {
  readonly pattern: string;

  constructor(pattern: string, reason: string, options?: { cause?: unknown }) {
    super(`Invalid pattern "${pattern}": ${reason}`, options);
    this.pattern = pattern;
  }
}

/** A computed name that would not stay inside its parent directory. */
export class InvalidNewNameError extends FnrError {
  readonly path: string;
  readonly newName: string;

  constructor(path: string, newName: string, reason: string) {
    super(`Cannot rename ${path} to "${newName}": ${reason}`);
    this.path = path;
    this.newName = newName;
  }
}

export class DestinationCollisionError extends FnrError {
  readonly destination: string;
  readonly sources: readonly [string, string];

  constructor(destination: string, first: string, second: string) {
    super(`Both ${first} and ${second} would be renamed to ${destination}`);
    this.destination = destination;
    this.sources = [first, second];
  }
}

export class RenameFailedError extends FnrError {
  readonly source: string;
  readonly destination: string;

  constructor(source: string, destination: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to rename ${source} to ${destination}: ${reason}`, { cause });
    this.source = source;
    this.destination = destination;
  }
}

/** Non-fatal traversal problem; the entry is skipped. Reported, never thrown. */
export interface WalkWarning {
  readonly path: string;
  readonly message: string;
}

export function toWalkWarning(path: string, err: unknown): WalkWarning {
  const message = err instanceof Error ? err.message : String(err);
  return { path, message };
}
