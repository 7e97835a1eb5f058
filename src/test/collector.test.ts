import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { collectMatches } from "../collector.js";
import type { CollectOptions } from "../collector.js";
import { InvalidPatternError } from "../errors.js";
import type { PatternConfig } from "../types.js";
import { createTree, removeTree } from "./fixtures.js";

let root = "";

afterEach(() => {
  if (root !== "") removeTree(root);
  root = "";
});

const TREE = ["foo/bar/baz.txt", "foo/notes.txt", "other.txt"];

function options(pattern: Partial<PatternConfig> & { pattern: string }, rest: Partial<CollectOptions> = {}): CollectOptions {
  return {
    walk: {
      baseDir: root,
      recursive: true,
      includeHidden: false,
      followSymlinks: true,
      honorIgnoreFiles: true,
    },
    globs: [],
    type: "both",
    pattern: { regex: false, caseSensitive: false, ...pattern },
    ...rest,
  };
}

describe("collectMatches", () => {
  it("matches base names, not full paths", () => {
    root = createTree(TREE);
    expect(collectMatches(options({ pattern: "bar" }))).toEqual([
      { path: join(root, "foo", "bar"), newName: "bar", isDir: true, pattern: "bar", replacement: "" },
    ]);
  });

  it("computes new names in rename mode", () => {
    root = createTree(TREE);
    const matches = collectMatches(options({ pattern: "notes", replacement: "todo" }));
    expect(matches).toEqual([
      {
        path: join(root, "foo", "notes.txt"),
        newName: "todo.txt",
        isDir: false,
        pattern: "notes",
        replacement: "todo",
      },
    ]);
  });

  it("applies the glob set before matching", () => {
    root = createTree(TREE);
    const matches = collectMatches(options({ pattern: "o" }, { globs: ["*.txt"] }));
    expect(matches.map((m) => m.path)).toEqual([join(root, "other.txt"), join(root, "foo", "notes.txt")]);
  });

  it("applies the type filter", () => {
    root = createTree(TREE);
    expect(collectMatches(options({ pattern: "o" }, { type: "dir" })).map((m) => m.path)).toEqual([
      join(root, "foo"),
    ]);
    expect(collectMatches(options({ pattern: "o" }, { type: "file" })).map((m) => m.path)).toEqual([
      join(root, "other.txt"),
      join(root, "foo", "notes.txt"),
    ]);
  });

  it("returns the same matches for repeated searches", () => {
    root = createTree(TREE);
    const first = collectMatches(options({ pattern: "a" }));
    const second = collectMatches(options({ pattern: "a" }));
    expect(first.length).toBeGreaterThan(0);
    expect(second).toEqual(first);
  });

  it("fails on an invalid regex before touching the filesystem", () => {
    root = createTree([]);
    const onWarning = vi.fn();
    const bad = options({ pattern: "(oops", regex: true }, { onWarning });
    bad.walk.baseDir = join(root, "does-not-exist");
    expect(() => collectMatches(bad)).toThrow(InvalidPatternError);
    expect(onWarning).not.toHaveBeenCalled();
  });

  it("fails on an invalid glob before touching the filesystem", () => {
    root = createTree([]);
    const onWarning = vi.fn();
    const bad = options({ pattern: "x" }, { globs: ["!"], onWarning });
    bad.walk.baseDir = join(root, "does-not-exist");
    expect(() => collectMatches(bad)).toThrow(InvalidPatternError);
    expect(onWarning).not.toHaveBeenCalled();
  });

  it("forwards walk warnings", () => {
    root = createTree([]);
    const onWarning = vi.fn();
    const missing = options({ pattern: "x" }, { onWarning });
    missing.walk.baseDir = join(root, "does-not-exist");
    expect(collectMatches(missing)).toEqual([]);
    expect(onWarning).toHaveBeenCalledTimes(1);
  });
});
