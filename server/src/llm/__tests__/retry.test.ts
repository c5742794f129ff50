import { describe, it, expect, vi } from "vitest";
import { extractRetryAfterMs, isRetryableError, parseRetryAfterHeader, withRetry } from "../resilience/retry.js";
import { ExchangeCancelledError, TranslationError, UpstreamError } from "../../errors.js";

describe("isRetryableError", () => {
  it("retries transient statuses and transport failures", () => {
    expect(isRetryableError(new UpstreamError("openai", 503, "unavailable"))).toBe(true);
    expect(isRetryableError(new UpstreamError("anthropic", 529, "overloaded"))).toBe(true);
    expect(isRetryableError(new UpstreamError("openai", 0, "socket hang up"))).toBe(true);
  });

  it("does not retry client errors, translation errors or cancellation", () => {
    expect(isRetryableError(new UpstreamError("openai", 400, "bad request: rate limit field"))).toBe(false);
    expect(isRetryableError(new TranslationError("openai", "timeout in payload"))).toBe(false);
    expect(isRetryableError(new ExchangeCancelledError())).toBe(false);
  });
});

describe("Retry-After handling", () => {
  it("uses the captured header value up to 30 seconds", () => {
    expect(extractRetryAfterMs(new UpstreamError("openai", 429, "", 4000))).toBe(4000);
    expect(extractRetryAfterMs(new UpstreamError("openai", 429, "", 45_000))).toBe(0);
  });

  it("falls back to a hint in the message", () => {
    expect(extractRetryAfterMs(new Error("Rate limited, retry after 5 seconds"))).toBe(5000);
    expect(extractRetryAfterMs(new Error("no hint"))).toBe(0);
  });

  it("parses seconds and HTTP dates", () => {
    const now = Date.parse("Wed, 21 Oct 2026 07:28:00 GMT");
    expect(parseRetryAfterHeader("3")).toBe(3000);
    expect(parseRetryAfterHeader("Wed, 21 Oct 2026 07:28:05 GMT", now)).toBe(5000);
    expect(parseRetryAfterHeader("soon")).toBeUndefined();
    expect(parseRetryAfterHeader(null)).toBeUndefined();
  });
});

describe("withRetry", () => {
  it("retries with exponential backoff until the call succeeds", async () => {
    const onRetry = vi.fn();
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new UpstreamError("openai", 503, "unavailable");
        return "ok";
      },
      { maxRetries: 3, baseDelayMs: 1, onRetry },
    );

    expect(result).toBe("ok");
    expect(calls).toBe(3);
    expect(onRetry.mock.calls.map(([attempt, , delay]) => [attempt, delay])).toEqual([
      [1, 1],
      [2, 2],
    ]);
  });

  it("gives up after maxRetries", async () => {
    const fn = vi.fn(async () => {
      throw new UpstreamError("openai", 502, "bad gateway");
    });
    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1 })).rejects.toBeInstanceOf(UpstreamError);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry a non-retryable error", async () => {
    const fn = vi.fn(async () => {
      throw new UpstreamError("openai", 401, "unauthorized");
    });
    await expect(withRetry(fn, { maxRetries: 5, baseDelayMs: 1 })).rejects.toThrow("openai returned HTTP 401: unauthorized");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("stops when retryIf vetoes the error", async () => {
    const fn = vi.fn(async () => {
      throw new UpstreamError("openai", 503, "unavailable");
    });
    await expect(withRetry(fn, { maxRetries: 5, baseDelayMs: 1, retryIf: () => false })).rejects.toBeInstanceOf(UpstreamError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
