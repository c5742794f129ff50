/**
 * Path helpers for the guardrails: which path a tool call names, how it is
 * normalized against the project directory, and how globs become patterns.
 */

import * as path from "path";
import type { JsonObject } from "../canonical/types.js";

const PATH_KEYS = ["path", "file_path", "filePath", "notebook_path"] as const;
const REGEX_SPECIAL = new Set([".", "+", "^", "$", "|", "(", ")", "{", "}", "[", "]", "\\"]);

/** The file path a tool call acts on, if its input names one */
export function toolPathOf(input: JsonObject): string | undefined {
  for (const key of PATH_KEYS) {
    const value = input[key];
    if (typeof value === "string" && value.trim()) return value.trim();
  }
  return undefined;
}

/**
 * Forward slashes, no leading "./", and relative to the project directory
 * when the path lies inside it. Paths outside stay absolute.
 */
export function normalizeToolPath(raw: string, projectDir: string): string {
  let normalized = raw.replace(/\\/g, "/");
  if (path.isAbsolute(normalized)) {
    const relative = path.relative(projectDir, normalized).replace(/\\/g, "/");
    if (relative === "") return ".";
    if (!relative.startsWith("..") && !path.isAbsolute(relative)) normalized = relative;
  }
  while (normalized.startsWith("./")) normalized = normalized.slice(2);
  return normalized;
}

/**
 * Glob to an unanchored pattern body: `*` stays inside one segment, `**`
 * crosses segments and `**\/` may match nothing.
 */
export function globToPattern(glob: string): string {
  let out = "";
  let i = 0;
  while (i < glob.length) {
    const c = glob.charAt(i);
    if (c === "*" && glob.charAt(i + 1) === "*") {
      if (glob.charAt(i + 2) === "/") {
        out += "(?:.*/)?";
        i += 3;
      } else {
        out += ".*";
        i += 2;
      }
      continue;
    }
    if (c === "*") out += "[^/]*";
    else if (c === "?") out += "[^/]";
    else if (REGEX_SPECIAL.has(c)) out += `\\${c}`;
    else out += c;
    i++;
  }
  return out;
}
