/**
 * Guardrail Types
 */

/** strict: violations deny the tool call. advisory: violations are only logged. */
export type GuardMode = "strict" | "advisory";

export interface GuardrailSettings {
  mode: GuardMode;
  /** Globs relative to the project directory; empty allows every path */
  allowedPaths: string[];
  /** Globs relative to the project directory; checked before the allow list */
  deniedPaths: string[];
  /** Distinct paths one exchange may touch; 0 = unlimited */
  maxFilesPerTurn: number;
  /** Lines added plus removed per session before a warning; 0 = off */
  maxLinesChanged: number;
  /** Distinct files written per session before a warning; 0 = off */
  maxFilesChanged: number;
}

export type AccessVerdict = { allowed: true } | { allowed: false; reason: string };

export interface FileModification {
  path: string;
  linesAdded: number;
  linesRemoved: number;
}

export interface DiffStats {
  linesAdded: number;
  linesRemoved: number;
  linesChanged: number;
  filesChanged: number;
  files: string[];
}

export const DEFAULT_GUARDRAILS: GuardrailSettings = {
  mode: "strict",
  allowedPaths: [],
  deniedPaths: [],
  maxFilesPerTurn: 0,
  maxLinesChanged: 0,
  maxFilesChanged: 0,
};
