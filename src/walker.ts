/**
 * Lazy directory traversal with depth bounds, symlink, hidden-entry and ignore-file policy.
 */

import { existsSync, readdirSync, readFileSync, realpathSync, statSync } from "node:fs";
import type { Dirent } from "node:fs";
import { join, posix } from "node:path";
import ignore from "ignore";
import { toWalkWarning } from "./errors.js";
import type { WalkWarning } from "./errors.js";
import type { WalkConfig } from "./types.js";

export const IGNORE_FILES = [".gitignore", ".ignore"] as const;

export interface WalkEntry {
  /** Base directory joined with the relative path. */
  readonly path: string;
  /** `/`-separated path relative to the base directory. */
  readonly relativePath: string;
  readonly depth: number;
  readonly isDir: boolean;
}

type Ignore = ReturnType<typeof ignore>;

/** Rules read from one directory's ignore files, scoped to that directory. */
interface IgnoreScope {
  readonly dir: string;
  readonly rules: Ignore;
}

interface DirFrame {
  readonly path: string;
  readonly relativePath: string;
  readonly depth: number;
  readonly scopes: readonly IgnoreScope[];
  readonly realPaths: readonly string[];
}

export type WarningHandler = (warning: WalkWarning) => void;

function effectiveMaxDepth(config: WalkConfig): number {
  if (!config.recursive) return 1;
  return config.maxDepth ?? Number.POSITIVE_INFINITY;
}

function isHidden(name: string): boolean {
  return name.startsWith(".");
}

function loadIgnoreScope(dir: string, relativeDir: string, onWarning: WarningHandler): IgnoreScope | undefined {
  let rules: Ignore | undefined;
  for (const file of IGNORE_FILES) {
    const filePath = join(dir, file);
    if (!existsSync(filePath)) continue;
    try {
      rules ??= ignore();
      rules.add(readFileSync(filePath, "utf-8"));
    } catch (err: unknown) {
      onWarning(toWalkWarning(filePath, err));
    }
  }
  return rules === undefined ? undefined : { dir: relativeDir, rules };
}

/** Deeper scopes override shallower ones, including `!` re-includes. */
function isIgnored(scopes: readonly IgnoreScope[], relativePath: string, isDir: boolean): boolean {
  let ignored = false;
  for (const scope of scopes) {
    const local = scope.dir === "" ? relativePath : posix.relative(scope.dir, relativePath);
    const result = scope.rules.test(isDir ? `${local}/` : local);
    if (result.ignored) ignored = true;
    else if (result.unignored) ignored = false;
  }
  return ignored;
}

function readDir(path: string, onWarning: WarningHandler): Dirent[] | undefined {
  try {
    return readdirSync(path, { withFileTypes: true }).sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
    );
  } catch (err: unknown) {
    onWarning(toWalkWarning(path, err));
    return undefined;
  }
}

/**
 * Whether an entry is a directory, looking through links. A broken link is an error when
 * following links and a plain entry otherwise.
 */
function resolveIsDir(dirent: Dirent, path: string, followSymlinks: boolean): boolean {
  if (!dirent.isSymbolicLink()) return dirent.isDirectory();
  if (followSymlinks) return statSync(path).isDirectory();
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

/**
 * Walk the tree under `config.baseDir`, yielding every entry that survives the hidden,
 * ignore-file and depth policies. The base directory itself is never yielded.
 */
export function* walkTree(config: WalkConfig, onWarning: WarningHandler = () => {}): Generator<WalkEntry> {
  const maxDepth = effectiveMaxDepth(config);
  const minDepth = config.minDepth ?? 0;

  let rootReal: string;
  try {
    rootReal = realpathSync(config.baseDir);
  } catch (err: unknown) {
    onWarning(toWalkWarning(config.baseDir, err));
    return;
  }

  const stack: DirFrame[] = [
    { path: config.baseDir, relativePath: "", depth: 0, scopes: [], realPaths: [rootReal] },
  ];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (frame === undefined) break;

    const dirents = readDir(frame.path, onWarning);
    if (dirents === undefined) continue;

    let scopes = frame.scopes;
    if (config.honorIgnoreFiles) {
      const scope = loadIgnoreScope(frame.path, frame.relativePath, onWarning);
      if (scope !== undefined) scopes = [...scopes, scope];
    }

    const depth = frame.depth + 1;
    if (depth > maxDepth) continue;

    const children: DirFrame[] = [];

    for (const dirent of dirents) {
      const name = dirent.name;
      if (!config.includeHidden && isHidden(name)) continue;

      const path = join(frame.path, name);
      const relativePath = frame.relativePath === "" ? name : `${frame.relativePath}/${name}`;

      let isDir: boolean;
      try {
        isDir = resolveIsDir(dirent, path, config.followSymlinks);
      } catch (err: unknown) {
        onWarning(toWalkWarning(path, err));
        continue;
      }

      if (config.honorIgnoreFiles && isIgnored(scopes, relativePath, isDir)) continue;

      let realPaths = frame.realPaths;
      const descend = isDir && depth < maxDepth && (config.followSymlinks || !dirent.isSymbolicLink());
      if (descend && dirent.isSymbolicLink()) {
        let real: string;
        try {
          real = realpathSync(path);
        } catch (err: unknown) {
          onWarning(toWalkWarning(path, err));
          continue;
        }
        if (realPaths.includes(real)) {
          onWarning({ path, message: `File system loop found: ${path} points to an ancestor ${real}` });
          continue;
        }
        realPaths = [...realPaths, real];
      } else if (descend) {
        realPaths = [...realPaths, join(frame.realPaths[frame.realPaths.length - 1], name)];
      }

      if (depth >= minDepth) {
        yield { path, relativePath, depth, isDir };
      }
      if (descend) {
        children.push({ path, relativePath, depth, scopes, realPaths });
      }
    }

    // Reversed so subdirectories are walked in name order.
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
}
