import { describe, expect, it } from "vitest";
import { InvalidPatternError } from "../errors.js";
import { compileGlobSet, matchesEntryKind } from "../glob-filter.js";

describe("compileGlobSet", () => {
  it("matches everything when empty", () => {
    const set = compileGlobSet([]);
    expect(set.isMatch("a/b.txt")).toBe(true);
    expect(set.isMatch(".env")).toBe(true);
  });

  it("tests slash-free globs against the base name", () => {
    const set = compileGlobSet(["*.rs"]);
    expect(set.isMatch("main.rs")).toBe(true);
    expect(set.isMatch("src/main.rs")).toBe(true);
    expect(set.isMatch("src/main.ts")).toBe(false);
  });

  it("tests globs with a slash against the relative path", () => {
    const set = compileGlobSet(["src/**/*.ts"]);
    expect(set.isMatch("src/a/b.ts")).toBe(true);
    expect(set.isMatch("lib/a/b.ts")).toBe(false);
  });

  it("keeps an entry matched by any inclusion", () => {
    const set = compileGlobSet(["*.md", "*.txt"]);
    expect(set.isMatch("notes.txt")).toBe(true);
    expect(set.isMatch("README.md")).toBe(true);
    expect(set.isMatch("main.rs")).toBe(false);
  });

  it("drops entries matched by a ! exclusion", () => {
    const set = compileGlobSet(["**/*", "!dist/**"]);
    expect(set.isMatch("src/a.ts")).toBe(true);
    expect(set.isMatch("dist/out.js")).toBe(false);
  });

  it("treats a set of exclusions only as everything else", () => {
    const set = compileGlobSet(["!*.log"]);
    expect(set.isMatch("a.txt")).toBe(true);
    expect(set.isMatch("logs/x.log")).toBe(false);
  });

  it("lets dot files through", () => {
    expect(compileGlobSet(["*.ts"]).isMatch(".hidden.ts")).toBe(true);
  });

  it("rejects empty expressions", () => {
    expect(() => compileGlobSet([""])).toThrow(InvalidPatternError);
    expect(() => compileGlobSet(["!"])).toThrow(InvalidPatternError);
  });
});

describe("matchesEntryKind", () => {
  it("filters by entry kind", () => {
    expect(matchesEntryKind("file", false)).toBe(true);
    expect(matchesEntryKind("file", true)).toBe(false);
    expect(matchesEntryKind("dir", true)).toBe(true);
    expect(matchesEntryKind("dir", false)).toBe(false);
    expect(matchesEntryKind("both", true)).toBe(true);
    expect(matchesEntryKind("both", false)).toBe(true);
  });
});
