/**
 * Temporary directory trees for filesystem tests.
 */

import { mkdirSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/** Paths ending in "/" are directories, everything else is a file. */
export function createTree(paths: readonly string[]): string {
  const root = mkdtempSync(join(tmpdir(), "fnr-test-"));
  for (const p of paths) {
    const full = join(root, p);
    if (p.endsWith("/")) {
      mkdirSync(full, { recursive: true });
    } else {
      mkdirSync(dirname(full), { recursive: true });
      writeFileSync(full, p, "utf-8");
    }
  }
  return root;
}

/** Every entry under root, `/`-separated, directories with a trailing "/", sorted. */
export function listTree(root: string, prefix = ""): string[] {
  const out: string[] = [];
  for (const entry of readdirSync(join(root, prefix), { withFileTypes: true })) {
    const rel = `${prefix}${entry.name}`;
    if (entry.isDirectory()) {
      out.push(`${rel}/`, ...listTree(root, `${rel}/`));
    } else {
      out.push(rel);
    }
  }
  return out.sort();
}

export function removeTree(root: string): void {
  rmSync(root, { recursive: true, force: true });
}
