/**
 * Structured logging for the gateway.
 *
 * ```typescript
 * import { Logger, ConsoleTransport, FileTransport } from "@modelgate/shared/logging";
 *
 * const root = new Logger({
 *   minLevel: "info",
 *   component: "gateway",
 *   transports: [new ConsoleTransport(), new FileTransport({ logDir: "./logs" })],
 * });
 *
 * const hooksLog = root.child({ component: "hooks" });   // "gateway.hooks"
 * hooksLog.warn("Handler timed out", { handlerId: "cmd-1", timeoutMs: 500 });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LogTransport,
  type LoggerConfig,
  type ILogger,
} from "./types.js";

export { Logger, RingBuffer } from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  MemoryTransport,
  type ConsoleTransportOptions,
  type FileTransportOptions,
  type MemoryTransportOptions,
} from "./transports/index.js";
