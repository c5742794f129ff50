export { FileAccessGuard, type FileAccessSettings } from "./file-access.js";
export { DiffMonitor, countLines, modificationOf, type DiffLimits } from "./diff-monitor.js";
export { globToPattern, normalizeToolPath, toolPathOf } from "./paths.js";
export {
  DEFAULT_GUARDRAILS,
  type AccessVerdict,
  type DiffStats,
  type FileModification,
  type GuardMode,
  type GuardrailSettings,
} from "./types.js";
