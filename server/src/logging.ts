/**
 * Logging Setup for the Gateway
 *
 * One root logger per process; modules take a namespaced child through
 * createComponentLogger().
 */

import {
  Logger,
  ConsoleTransport,
  FileTransport,
  isLogLevel,
  type ILogger,
  type LogLevel,
  type LogTransport,
} from "@modelgate/shared/logging";

export interface LoggingOptions {
  /** Default: GATEWAY_LOG_LEVEL, else "silent" under test, "info" in production, "debug" otherwise */
  minLevel?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Directory for JSON-lines log files; no file output when unset (default: GATEWAY_LOG_DIR) */
  logDir?: string;
  /** Extra transports (tests attach a MemoryTransport here) */
  transports?: LogTransport[];
}

let logger: Logger | null = null;

function defaultLevel(): LogLevel {
  const fromEnv = process.env.GATEWAY_LOG_LEVEL;
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  if (process.env.NODE_ENV === "test") return "silent";
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

/**
 * Initialize (or re-initialize) the process logger.
 */
export function initGatewayLogging(options: LoggingOptions = {}): Logger {
  const minLevel = options.minLevel ?? defaultLevel();
  const transports: LogTransport[] = [];

  if (options.console !== false) {
    transports.push(new ConsoleTransport({ minLevel }));
  }

  const logDir = options.logDir ?? process.env.GATEWAY_LOG_DIR;
  if (logDir) {
    transports.push(new FileTransport({ minLevel: "debug", logDir, filename: "gateway", maxFiles: 10 }));
  }

  transports.push(...(options.transports ?? []));

  logger = new Logger({
    minLevel: options.transports?.length ? "trace" : minLevel,
    component: "gateway",
    transports,
    ringBufferSize: 2000,
  });
  return logger;
}

/**
 * Get the process logger. Auto-initializes with defaults on first access.
 */
export function getGatewayLogger(): Logger {
  return logger ?? initGatewayLogging();
}

/**
 * Namespaced logger for one module, e.g. createComponentLogger("hooks").
 * Resolved lazily so loggers created at import time follow a later init.
 */
export function createComponentLogger(component: string): ILogger {
  let bound: Logger | null = null;
  let boundTo: Logger | null = null;
  const current = (): Logger => {
    const root = getGatewayLogger();
    if (!bound || boundTo !== root) {
      bound = root.child({ component });
      boundTo = root;
    }
    return bound;
  };
  return {
    trace: (message, data) => current().trace(message, data),
    debug: (message, data) => current().debug(message, data),
    info: (message, data) => current().info(message, data),
    warn: (message, data) => current().warn(message, data),
    error: (message, error, data) => current().error(message, error, data),
    fatal: (message, error, data) => current().fatal(message, error, data),
    child: (context) => current().child(context),
    getRecentLogs: (count) => current().getRecentLogs(count),
    flush: () => current().flush(),
  };
}
