import { describe, it, expect } from "vitest";
import { DiffMonitor, countLines, modificationOf } from "./diff-monitor.js";

const PROJECT = "/work/proj";

describe("modificationOf", () => {
  it("counts written lines", () => {
    expect(modificationOf("Write", { file_path: "/work/proj/a.ts", content: "one\ntwo\n" }, PROJECT)).toEqual({
      path: "a.ts",
      linesAdded: 2,
      linesRemoved: 0,
    });
  });

  it("counts replaced and replacing lines of an edit", () => {
    expect(modificationOf("Edit", { path: "b.ts", old_string: "x", new_string: "y\nz" }, PROJECT)).toEqual({
      path: "b.ts",
      linesAdded: 2,
      linesRemoved: 1,
    });
  });

  it("sums every edit of a MultiEdit and skips malformed entries", () => {
    const input = {
      file_path: "c.ts",
      edits: [{ old_string: "a", new_string: "b\nc" }, { old_string: "d\ne", new_string: "" }, "junk"],
    };
    expect(modificationOf("MultiEdit", input, PROJECT)).toEqual({ path: "c.ts", linesAdded: 2, linesRemoved: 3 });
  });

  it("ignores read tools and calls without a path", () => {
    expect(modificationOf("Read", { path: "a.ts" }, PROJECT)).toBeNull();
    expect(modificationOf("Write", { content: "x" }, PROJECT)).toBeNull();
  });

  it("treats a trailing newline as the end of the last line", () => {
    expect([countLines(""), countLines("a"), countLines("a\n"), countLines("a\n\n"), countLines(3)]).toEqual([0, 1, 1, 2, 0]);
  });
});

describe("DiffMonitor", () => {
  it("warns once when the line threshold is crossed", () => {
    const monitor = new DiffMonitor({ maxLinesChanged: 5, maxFilesChanged: 0 });

    monitor.record({ path: "a.ts", linesAdded: 3, linesRemoved: 0 });
    expect(monitor.checkThresholds()).toBeNull();

    monitor.record({ path: "a.ts", linesAdded: 2, linesRemoved: 1 });
    expect(monitor.checkThresholds()).toBe("Diff size threshold exceeded: lines changed 6/5, files changed 1/0");
    expect(monitor.checkThresholds()).toBeNull();
    expect(monitor.stats()).toEqual({ linesAdded: 5, linesRemoved: 1, linesChanged: 6, filesChanged: 1, files: ["a.ts"] });
  });

  it("warns when too many files change", () => {
    const monitor = new DiffMonitor({ maxLinesChanged: 0, maxFilesChanged: 1 });
    monitor.record({ path: "b.ts", linesAdded: 1, linesRemoved: 0 });
    monitor.record({ path: "a.ts", linesAdded: 1, linesRemoved: 0 });

    expect(monitor.checkThresholds()).toBe("Diff size threshold exceeded: lines changed 2/0, files changed 2/1");
    expect(monitor.stats().files).toEqual(["a.ts", "b.ts"]);
  });

  it("stays quiet without limits", () => {
    const monitor = new DiffMonitor({ maxLinesChanged: 0, maxFilesChanged: 0 });
    monitor.record({ path: "a.ts", linesAdded: 500, linesRemoved: 0 });
    expect(monitor.enabled).toBe(false);
    expect(monitor.checkThresholds()).toBeNull();
  });
});
