import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { MemoryTransport } from "@modelgate/shared/logging";
import { initGatewayLogging } from "../logging.js";
import { FileAccessGuard, type FileAccessSettings } from "./file-access.js";
import { globToPattern, normalizeToolPath, toolPathOf } from "./paths.js";

const PROJECT = "/work/proj";

function guard(settings: Partial<FileAccessSettings>) {
  return new FileAccessGuard({ mode: "strict", allowedPaths: [], deniedPaths: [], maxFilesPerTurn: 0, ...settings }, PROJECT);
}

describe("path helpers", () => {
  it("normalizes separators, leading ./ and paths inside the project", () => {
    expect(normalizeToolPath("/work/proj/src/a.ts", PROJECT)).toBe("src/a.ts");
    expect(normalizeToolPath("./src\\b.ts", PROJECT)).toBe("src/b.ts");
    expect(normalizeToolPath("/etc/hosts", PROJECT)).toBe("/etc/hosts");
    expect(normalizeToolPath("../other/c.ts", PROJECT)).toBe("../other/c.ts");
  });

  it("turns globs into segment-aware patterns", () => {
    expect(globToPattern("src/**/*.ts")).toBe("src/(?:.*/)?[^/]*\\.ts");
    expect(globToPattern("logs/**")).toBe("logs/.*");
    expect(globToPattern("file?.md")).toBe("file[^/]\\.md");
  });

  it("reads the path from the usual input keys", () => {
    expect(toolPathOf({ file_path: "a.ts" })).toBe("a.ts");
    expect(toolPathOf({ notebook_path: " nb.ipynb " })).toBe("nb.ipynb");
    expect(toolPathOf({ command: "ls" })).toBeUndefined();
  });
});

describe("FileAccessGuard", () => {
  it("denies matching paths even when the allow list covers them", () => {
    const g = guard({ allowedPaths: ["src/**", "docs/*.md"], deniedPaths: ["**/.env", "src/generated/**"] });
    const touched = new Set<string>();

    expect(g.check("Read", { path: "src/app.ts" }, touched)).toEqual({ allowed: true });
    expect(g.check("Read", { file_path: "/work/proj/src/.env" }, touched)).toEqual({
      allowed: false,
      reason: "Guardrail: path '/work/proj/src/.env' matches denied pattern '**/.env'",
    });
    expect(g.check("Edit", { file_path: "src/generated/api.ts" }, touched)).toEqual({
      allowed: false,
      reason: "Guardrail: path 'src/generated/api.ts' matches denied pattern 'src/generated/**'",
    });
  });

  it("denies paths outside a non-empty allow list", () => {
    const g = guard({ allowedPaths: ["docs/*.md"] });
    const touched = new Set<string>();

    expect(g.check("Read", { path: "docs/guide.md" }, touched)).toEqual({ allowed: true });
    expect(g.check("Read", { path: "docs/api/ref.md" }, touched)).toEqual({
      allowed: false,
      reason: "Guardrail: path 'docs/api/ref.md' is outside the allowed paths",
    });
  });

  it("lets calls without a path through", () => {
    const g = guard({ allowedPaths: ["src/**"] });
    expect(g.check("Bash", { command: "npm test" }, new Set())).toEqual({ allowed: true });
  });

  it("caps the distinct files one exchange may touch", () => {
    const g = guard({ maxFilesPerTurn: 2 });
    const touched = new Set<string>();

    expect(g.check("Read", { path: "a.ts" }, touched).allowed).toBe(true);
    expect(g.check("Edit", { file_path: "./b.ts" }, touched).allowed).toBe(true);
    expect(g.check("Read", { path: "/work/proj/a.ts" }, touched).allowed).toBe(true);
    expect(g.check("Read", { path: "c.ts" }, touched)).toEqual({
      allowed: false,
      reason: "Guardrail: exceeded max files per turn (3/2)",
    });
    expect([...touched]).toEqual(["a.ts", "b.ts"]);
  });

  it("skips globs that cannot be compiled", () => {
    expect(guard({ deniedPaths: ["x".repeat(600)] }).active).toBe(false);
  });

  describe("advisory mode", () => {
    const transport = new MemoryTransport();

    beforeEach(() => {
      transport.clear();
      initGatewayLogging({ console: false, transports: [transport] });
    });

    afterEach(() => {
      initGatewayLogging({ console: false });
    });

    it("logs the violation and allows the call", () => {
      const g = guard({ mode: "advisory", deniedPaths: ["*.pem"] });

      expect(g.check("Read", { path: "server.pem" }, new Set())).toEqual({ allowed: true });
      const [entry] = transport.find("Guardrail violation (advisory)");
      expect(entry?.level).toBe("warn");
      expect(entry?.data).toEqual({ tool: "Read", path: "server.pem", violation: "path 'server.pem' matches denied pattern '*.pem'" });
    });
  });
});
