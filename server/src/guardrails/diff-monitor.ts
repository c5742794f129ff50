/**
 * Diff Monitor
 *
 * Tallies the lines and files a session's write tools change and reports
 * once when a threshold is crossed. It never blocks a call.
 */

import type { JsonObject, JsonValue } from "../canonical/types.js";
import { isJsonObject } from "../canonical/index.js";
import { normalizeToolPath, toolPathOf } from "./paths.js";
import type { DiffStats, FileModification, GuardrailSettings } from "./types.js";

export type DiffLimits = Pick<GuardrailSettings, "maxLinesChanged" | "maxFilesChanged">;

/** Lines in a text; a trailing newline does not start another line */
export function countLines(value: JsonValue | undefined): number {
  if (typeof value !== "string" || value === "") return 0;
  const body = value.endsWith("\n") ? value.slice(0, -1) : value;
  return body.split("\n").length;
}

/** What a Write, Edit or MultiEdit call changes; null for other tools */
export function modificationOf(toolName: string, input: JsonObject, projectDir: string): FileModification | null {
  const raw = toolPathOf(input);
  if (raw === undefined) return null;
  const path = normalizeToolPath(raw, projectDir);

  switch (toolName) {
    case "Write":
      return { path, linesAdded: countLines(input.content), linesRemoved: 0 };
    case "Edit":
      return { path, linesAdded: countLines(input.new_string), linesRemoved: countLines(input.old_string) };
    case "MultiEdit": {
      const edits = Array.isArray(input.edits) ? input.edits.filter(isJsonObject) : [];
      return {
        path,
        linesAdded: edits.reduce((sum, e) => sum + countLines(e.new_string), 0),
        linesRemoved: edits.reduce((sum, e) => sum + countLines(e.old_string), 0),
      };
    }
    default:
      return null;
  }
}

export class DiffMonitor {
  private linesAdded = 0;
  private linesRemoved = 0;
  private readonly files = new Set<string>();
  private warned = false;

  constructor(private readonly limits: DiffLimits) {}

  get enabled(): boolean {
    return this.limits.maxLinesChanged > 0 || this.limits.maxFilesChanged > 0;
  }

  record(modification: FileModification): void {
    this.linesAdded += modification.linesAdded;
    this.linesRemoved += modification.linesRemoved;
    this.files.add(modification.path);
  }

  stats(): DiffStats {
    return {
      linesAdded: this.linesAdded,
      linesRemoved: this.linesRemoved,
      linesChanged: this.linesAdded + this.linesRemoved,
      filesChanged: this.files.size,
      files: [...this.files].sort(),
    };
  }

  /** Warning text the first time a threshold is exceeded, else null */
  checkThresholds(): string | null {
    if (this.warned || !this.enabled) return null;
    const { linesChanged, filesChanged } = this.stats();
    const { maxLinesChanged, maxFilesChanged } = this.limits;
    const overLines = maxLinesChanged > 0 && linesChanged > maxLinesChanged;
    const overFiles = maxFilesChanged > 0 && filesChanged > maxFilesChanged;
    if (!overLines && !overFiles) return null;

    this.warned = true;
    return `Diff size threshold exceeded: lines changed ${linesChanged}/${maxLinesChanged}, files changed ${filesChanged}/${maxFilesChanged}`;
  }
}
