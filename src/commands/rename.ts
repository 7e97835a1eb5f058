/**
 * Rename mode: collect, then dry-run, prompt per entry, or apply everything.
 */

import { prepareCollection } from "../collector.js";
import type { ParsedArgs } from "../flags.js";
import { toPatternConfig, toWalkConfig } from "../flags.js";
import { applyBatch } from "../sequencer.js";
import type { ApplyOptions } from "../sequencer.js";
import type { DecisionSource, Reporter } from "../types.js";
import type { Colors, ReporterOutput } from "./common.js";
import { ensureDir, formatSummary } from "./common.js";

export interface RenameContext {
  reporter: Reporter;
  output: ReporterOutput;
  colors: Colors;
  /** Only asked in interactive mode. */
  decisions: DecisionSource;
}

function applyOptions(args: ParsedArgs, context: RenameContext): ApplyOptions {
  const { reporter, decisions } = context;
  if (args.dryRun) return { mode: "dry-run", reporter };
  if (args.interactive) return { mode: "interactive", reporter, decisions };
  return { mode: "forced", reporter };
}

export async function runRename(
  args: ParsedArgs,
  pattern: string,
  replacement: string,
  context: RenameContext,
): Promise<number> {
  const { reporter, output, colors } = context;

  const collection = prepareCollection({
    walk: toWalkConfig(args),
    globs: args.globs,
    type: args.type,
    pattern: toPatternConfig({ ...args, replacement }, pattern),
    onWarning: (warning) => reporter.warn(warning),
  });
  ensureDir(args.baseDir);
  const matches = collection.collect();

  if (matches.length === 0) {
    output.line("No matches found.");
    return 0;
  }

  if (args.dryRun) {
    output.line(colors.yellow("Dry run - showing what would be renamed:"));
  }

  const summary = await applyBatch(matches, applyOptions(args, context));
  if (args.dryRun) return 0;

  output.done(formatSummary(summary));
  return summary.failed.length > 0 ? 1 : 0;
}
