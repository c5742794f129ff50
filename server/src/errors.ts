/**
 * Gateway Error Taxonomy
 *
 * Every failure the pipeline can surface has its own class so callers can
 * tell "upstream rejected the request" from "gateway could not speak the
 * upstream's protocol" without string matching.
 */

export type GatewayErrorCode =
  | "configuration_error"
  | "upstream_error"
  | "translation_error"
  | "hook_timeout"
  | "hook_crash"
  | "compaction_failure"
  | "memory_capacity"
  | "memory_conflict"
  | "memory_not_found"
  | "session_not_found"
  | "exchange_cancelled"
  | "invalid_request";

export class GatewayError extends Error {
  constructor(
    readonly code: GatewayErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Fatal at startup: bad provider id, invalid thresholds, unreadable hook config. */
export class ConfigurationError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("configuration_error", message, options);
  }
}

/** Provider HTTP or transport failure. Status 0 means no HTTP response was received. */
export class UpstreamError extends GatewayError {
  constructor(
    readonly provider: string,
    readonly status: number,
    readonly body: string,
    readonly retryAfterMs?: number,
    options?: { cause?: unknown },
  ) {
    super(
      "upstream_error",
      status === 0
        ? `${provider} request failed: ${body}`
        : `${provider} returned HTTP ${status}: ${body.slice(0, 300)}`,
      options,
    );
  }
}

/** Malformed wire payload in either direction. */
export class TranslationError extends GatewayError {
  constructor(readonly provider: string, message: string, options?: { cause?: unknown }) {
    super("translation_error", `${provider}: ${message}`, options);
  }
}

export class HookTimeoutError extends GatewayError {
  constructor(readonly handlerId: string, readonly timeoutMs: number) {
    super("hook_timeout", `Hook handler ${handlerId} timed out after ${timeoutMs}ms`);
  }
}

export class HookCrashError extends GatewayError {
  constructor(
    readonly handlerId: string,
    readonly exitCode: number | null,
    readonly stderr: string,
    message?: string,
  ) {
    super("hook_crash", message ?? `Hook handler ${handlerId} exited with code ${exitCode}: ${stderr.trim()}`);
  }
}

export class CompactionFailure extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("compaction_failure", message, options);
  }
}

export class MemoryCapacityError extends GatewayError {
  constructor(readonly blockName: string, readonly size: number, readonly limit: number) {
    super(
      "memory_capacity",
      `Core memory block "${blockName}" is ${size} characters; the limit is ${limit}`,
    );
  }
}

export class MemoryConflictError extends GatewayError {
  constructor(readonly recordId: string, readonly supersededBy: string) {
    super("memory_conflict", `Memory record ${recordId} was superseded by ${supersededBy}`);
  }
}

export class MemoryNotFoundError extends GatewayError {
  constructor(readonly recordId: string) {
    super("memory_not_found", `Memory record ${recordId} not found`);
  }
}

export class SessionNotFoundError extends GatewayError {
  constructor(readonly sessionId: string) {
    super("session_not_found", `Session ${sessionId} not found`);
  }
}

export class ExchangeCancelledError extends GatewayError {
  constructor(message = "Exchange cancelled") {
    super("exchange_cancelled", message);
  }
}

export class InvalidRequestError extends GatewayError {
  constructor(message: string) {
    super("invalid_request", message);
  }
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === "string" ? err : JSON.stringify(err) ?? String(err);
}

export function isAbortError(err: unknown): boolean {
  return (
    err instanceof ExchangeCancelledError ||
    (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError"))
  );
}
