/**
 * Rename sequencing: order a batch so no rename moves a still-pending entry, validate it,
 * then apply it as a dry run, interactively or unconditionally.
 */

import { lstatSync, renameSync } from "node:fs";
import { basename, dirname, join, normalize, sep } from "node:path";
import { DestinationCollisionError, InvalidNewNameError, RenameFailedError } from "./errors.js";
import type { Decision, DecisionSource, Match, Reporter } from "./types.js";

export type ApplyMode = "dry-run" | "interactive" | "forced";

/** Confirmation state threaded between interactive steps. */
export type ConfirmState = "prompting" | "apply-remaining";

export type ApplyOptions =
  | { mode: "interactive"; reporter: Reporter; decisions: DecisionSource }
  | { mode: "dry-run" | "forced"; reporter: Reporter };

export interface BatchSummary {
  renamed: number;
  skipped: number;
  failed: RenameFailedError[];
  /** True when an interactive quit stopped the batch early. */
  quit: boolean;
}

export interface ConfirmStep {
  action: "rename" | "skip" | "stop";
  state: ConfirmState;
}

export function pathDepth(path: string): number {
  return normalize(path)
    .split(sep)
    .filter((part) => part !== "" && part !== ".").length;
}

export function destinationOf(match: Match): string {
  return join(dirname(match.path), match.newName);
}

function isUnchanged(match: Match): boolean {
  return basename(match.path) === match.newName;
}

/**
 * Files first in discovery order, then directories deepest first. Any matched descendant
 * of a matched directory is therefore renamed before the directory, while its recorded
 * path is still valid.
 */
export function orderMatches(matches: readonly Match[]): Match[] {
  const files = matches.filter((m) => !m.isDir);
  const dirs = matches
    .filter((m) => m.isDir)
    .map((match) => ({ match, depth: pathDepth(match.path) }))
    .sort((a, b) => b.depth - a.depth)
    .map(({ match }) => match);
  return [...files, ...dirs];
}

/**
 * Reject names that would leave their parent directory and batches where two entries
 * end up at the same destination. Throws before anything is renamed.
 */
export function validateBatch(matches: readonly Match[]): void {
  const destinations = new Map<string, string>();

  for (const match of matches) {
    const { path, newName } = match;
    if (newName === "") {
      throw new InvalidNewNameError(path, newName, "the new name is empty");
    }
    if (newName === "." || newName === "..") {
      throw new InvalidNewNameError(path, newName, "the new name is a reserved directory name");
    }
    if (newName.includes("/") || newName.includes(sep)) {
      throw new InvalidNewNameError(path, newName, "the new name contains a path separator");
    }

    const destination = destinationOf(match);
    const previous = destinations.get(destination);
    if (previous !== undefined) {
      throw new DestinationCollisionError(destination, previous, path);
    }
    destinations.set(destination, path);
  }
}

/** True when the destination exists and is not the source itself (case-only renames). */
function isOccupied(source: string, destination: string): boolean {
  const target = lstatSync(destination, { throwIfNoEntry: false });
  if (target === undefined) return false;
  const current = lstatSync(source);
  return current.ino !== target.ino || current.dev !== target.dev;
}

/**
 * Rename one match inside its parent directory and return the destination.
 * Throws RenameFailedError; an existing destination is never overwritten.
 */
export function applyMatch(match: Match): string {
  const destination = destinationOf(match);
  if (isUnchanged(match)) return destination;

  try {
    if (isOccupied(match.path, destination)) {
      throw new Error("destination already exists");
    }
    renameSync(match.path, destination);
  } catch (err: unknown) {
    throw new RenameFailedError(match.path, destination, err);
  }
  return destination;
}

export function confirmStep(decision: Decision): ConfirmStep {
  switch (decision) {
    case "yes":
      return { action: "rename", state: "prompting" };
    case "no":
      return { action: "skip", state: "prompting" };
    case "all":
      return { action: "rename", state: "apply-remaining" };
    case "quit":
      return { action: "stop", state: "prompting" };
  }
}

function renameAndReport(match: Match, reporter: Reporter, summary: BatchSummary): void {
  try {
    const destination = applyMatch(match);
    summary.renamed++;
    reporter.renamed(match.path, destination, match.isDir);
  } catch (err: unknown) {
    if (!(err instanceof RenameFailedError)) throw err;
    summary.failed.push(err);
    reporter.failed(err);
  }
}

/**
 * Order, validate and apply a batch. Rename failures are reported per entry and do not
 * stop the batch; an interactive quit stops before the next rename and keeps what was done.
 */
export async function applyBatch(matches: readonly Match[], options: ApplyOptions): Promise<BatchSummary> {
  const ordered = orderMatches(matches);
  validateBatch(ordered);

  const { reporter } = options;
  const summary: BatchSummary = { renamed: 0, skipped: 0, failed: [], quit: false };

  if (options.mode === "dry-run") {
    for (const match of ordered) {
      reporter.preview(match.path, destinationOf(match), match.isDir);
    }
    return summary;
  }

  let state: ConfirmState = options.mode === "forced" ? "apply-remaining" : "prompting";

  for (const match of ordered) {
    if (isUnchanged(match)) {
      summary.skipped++;
      continue;
    }

    if (state === "prompting" && options.mode === "interactive") {
      reporter.preview(match.path, destinationOf(match), match.isDir);
      const step = confirmStep(await options.decisions.decide(match));
      state = step.state;
      if (step.action === "stop") {
        summary.quit = true;
        break;
      }
      if (step.action === "skip") {
        summary.skipped++;
        continue;
      }
    }

    renameAndReport(match, reporter, summary);
  }

  return summary;
}
