#!/usr/bin/env node
/**
 * fnr – search files and directories by name and batch rename them.
 * Search mode with a pattern only; rename mode (dry-run, interactive, --no-interactive) with a replacement.
 */

import { parseArgs, printHelp, printVersion, UsageError } from "./flags.js";
import { createColors, createConsoleOutput, createTerminalReporter } from "./commands/common.js";
import { createKeystrokeDecisionSource } from "./commands/keystroke.js";
import { runRename } from "./commands/rename.js";
import { runSearch } from "./commands/search.js";

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    return 0;
  }
  if (args.version) {
    printVersion();
    return 0;
  }
  if (args.pattern === undefined) {
    throw new UsageError("A search pattern is required. Run fnr --help for usage.");
  }

  const colors = createColors(args.color);
  const output = createConsoleOutput(colors, args.color);
  const reporter = createTerminalReporter(colors, output);

  if (args.replacement === undefined) {
    return runSearch(args, args.pattern, reporter);
  }
  return runRename(args, args.pattern, args.replacement, {
    reporter,
    output,
    colors,
    decisions: createKeystrokeDecisionSource(colors),
  });
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    const msg = err instanceof Error ? err.message : String(err);
    console.error("Error:", msg);
    process.exitCode = 1;
  },
);
