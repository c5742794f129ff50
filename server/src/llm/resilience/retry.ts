/**
 * Retry & Error Detection
 *
 * Decides whether an upstream failure is transient and retries it with
 * exponential backoff, honoring Retry-After hints. Cancellation and
 * translation failures are never retried.
 */

import { TranslationError, UpstreamError, isAbortError } from "../../errors.js";
import { createComponentLogger } from "../../logging.js";
import { sleep } from "../../utils/abort.js";

const log = createComponentLogger("llm.retry");

/** HTTP status codes that indicate a transient failure */
const RETRYABLE_STATUS_CODES = [408, 409, 429, 500, 502, 503, 504, 529];

/** Transport error patterns (status 0) that indicate a transient failure */
const RETRYABLE_PATTERNS = [
  "rate limit",
  "overloaded",
  "fetch failed",
  "econnrefused",
  "econnreset",
  "enotfound",
  "etimedout",
  "socket hang up",
  "network",
  "timed out",
  "timeout",
];

export function isRetryableError(error: unknown): boolean {
  if (isAbortError(error) || error instanceof TranslationError) return false;
  if (error instanceof UpstreamError) {
    if (RETRYABLE_STATUS_CODES.includes(error.status)) return true;
    if (error.status !== 0) return false;
  }
  const msg = (error instanceof Error ? error.message : String(error)).toLowerCase();
  return RETRYABLE_PATTERNS.some((pattern) => msg.includes(pattern));
}

/**
 * Retry-After delay in ms: the value captured from the response header, else
 * a "retry after N" hint in the body. Hints above 30s are ignored (0).
 */
export function extractRetryAfterMs(error: unknown): number {
  if (error instanceof UpstreamError && error.retryAfterMs !== undefined) {
    return error.retryAfterMs <= 30_000 ? error.retryAfterMs : 0;
  }
  const msg = error instanceof Error ? error.message : String(error);
  const match = msg.match(/retry[- ]after:?\s*(\d+)/i);
  if (!match?.[1]) return 0;
  const seconds = parseInt(match[1], 10);
  return seconds <= 30 ? seconds * 1000 : 0;
}

/** Parse a Retry-After header (seconds or HTTP date) into ms */
export function parseRetryAfterHeader(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

export interface RetryOptions {
  maxRetries: number;
  /** First backoff step; doubles per attempt (default 500ms) */
  baseDelayMs?: number;
  signal?: AbortSignal;
  /** Extra veto on top of isRetryableError */
  retryIf?: (error: unknown) => boolean;
  /** Called before each retry */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const baseDelay = options.baseDelayMs ?? 500;
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= options.maxRetries || !isRetryableError(error) || options.retryIf?.(error) === false) throw error;
      const delayMs = extractRetryAfterMs(error) || baseDelay * 2 ** attempt;
      log.warn("Retrying upstream call", {
        attempt: attempt + 1,
        maxRetries: options.maxRetries,
        delayMs,
        error: error instanceof Error ? error.message : String(error),
      });
      options.onRetry?.(attempt + 1, error, delayMs);
      await sleep(delayMs, options.signal);
    }
  }
}
