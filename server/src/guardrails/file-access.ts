/**
 * File Access Guard
 *
 * Checks the path a tool call names against deny and allow globs and a
 * per-exchange file budget. The deny list wins over the allow list; an
 * empty allow list allows everything not denied. In advisory mode a
 * violation is logged and the call goes ahead.
 */

import type { JsonObject } from "../canonical/types.js";
import { toErrorMessage } from "../errors.js";
import { createComponentLogger } from "../logging.js";
import { compileSafePattern, type PatternTester } from "../utils/safe-regex.js";
import { globToPattern, normalizeToolPath, toolPathOf } from "./paths.js";
import type { AccessVerdict, GuardrailSettings } from "./types.js";

const log = createComponentLogger("guardrails");

const ALLOWED: AccessVerdict = { allowed: true };

interface CompiledGlob {
  glob: string;
  test: PatternTester;
}

function compileGlobs(globs: readonly string[]): CompiledGlob[] {
  const compiled: CompiledGlob[] = [];
  for (const glob of globs) {
    try {
      compiled.push({ glob, test: compileSafePattern(globToPattern(glob)) });
    } catch (err) {
      log.warn("Ignoring invalid path glob", { glob, error: toErrorMessage(err) });
    }
  }
  return compiled;
}

export type FileAccessSettings = Pick<GuardrailSettings, "mode" | "allowedPaths" | "deniedPaths" | "maxFilesPerTurn">;

export class FileAccessGuard {
  private readonly denied: CompiledGlob[];
  private readonly allowed: CompiledGlob[];

  constructor(
    private readonly settings: FileAccessSettings,
    private readonly projectDir: string,
  ) {
    this.denied = compileGlobs(settings.deniedPaths);
    this.allowed = compileGlobs(settings.allowedPaths);
  }

  /** False when no rule is configured and every check passes */
  get active(): boolean {
    return this.denied.length > 0 || this.allowed.length > 0 || this.settings.maxFilesPerTurn > 0;
  }

  /**
   * Check one tool call. `touched` holds the normalized paths the current
   * exchange has already been allowed; an allowed path is added to it.
   */
  check(toolName: string, input: JsonObject, touched: Set<string>): AccessVerdict {
    if (!this.active) return ALLOWED;
    const raw = toolPathOf(input);
    if (raw === undefined) return ALLOWED;

    const normalized = normalizeToolPath(raw, this.projectDir);
    const violation = this.violation(raw, normalized, touched);
    if (violation === null) {
      touched.add(normalized);
      return ALLOWED;
    }

    if (this.settings.mode === "advisory") {
      log.warn("Guardrail violation (advisory)", { tool: toolName, path: raw, violation });
      return ALLOWED;
    }
    log.warn("Guardrail blocked tool call", { tool: toolName, path: raw, violation });
    return { allowed: false, reason: `Guardrail: ${violation}` };
  }

  private violation(raw: string, normalized: string, touched: ReadonlySet<string>): string | null {
    const denied = this.denied.find((g) => g.test(normalized));
    if (denied) return `path '${raw}' matches denied pattern '${denied.glob}'`;

    if (this.allowed.length > 0 && !this.allowed.some((g) => g.test(normalized))) {
      return `path '${raw}' is outside the allowed paths`;
    }

    const max = this.settings.maxFilesPerTurn;
    if (max > 0 && !touched.has(normalized) && touched.size >= max) {
      return `exceeded max files per turn (${touched.size + 1}/${max})`;
    }
    return null;
  }
}
