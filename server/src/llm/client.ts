/**
 * Provider Client
 *
 * The only place the gateway talks HTTP to an upstream. Pairs an adapter
 * with its endpoint settings; maps transport failures and deadline expiry
 * onto UpstreamError, undecodable payloads onto TranslationError, and
 * caller aborts onto ExchangeCancelledError.
 */

import type { CanonicalRequest, CanonicalResponse } from "../canonical/types.js";
import { ExchangeCancelledError, TranslationError, UpstreamError, isAbortError, toErrorMessage } from "../errors.js";
import { createComponentLogger } from "../logging.js";
import { linkSignals } from "../utils/abort.js";
import { mergeCapabilities } from "./capabilities.js";
import { parseRetryAfterHeader } from "./resilience/retry.js";
import { readServerSentEvents } from "./sse.js";
import type { ProviderAdapter, ProviderCapabilitySet, StreamDelta } from "./types.js";

const log = createComponentLogger("llm.client");

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface ProviderClientOptions {
  adapter: ProviderAdapter;
  /** Default: the adapter's base URL */
  baseUrl?: string;
  apiKey?: string;
  capabilities?: Partial<ProviderCapabilitySet>;
  /** Per-call deadline (default 120s) */
  timeoutMs?: number;
  /** Injected for tests; default global fetch */
  fetch?: FetchFn;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export class ProviderClient {
  readonly adapter: ProviderAdapter;
  readonly capabilities: ProviderCapabilitySet;
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: ProviderClientOptions) {
    this.adapter = options.adapter;
    this.capabilities = mergeCapabilities(options.adapter.capabilities, options.capabilities);
    this.baseUrl = (options.baseUrl ?? options.adapter.defaultBaseUrl).replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get provider(): string {
    return this.adapter.id;
  }

  /** Non-streaming chat completion */
  async complete(request: CanonicalRequest, options: CallOptions = {}): Promise<CanonicalResponse> {
    const deadline = AbortSignal.timeout(this.timeoutMs);
    const linked = linkSignals(options.signal, deadline);
    try {
      const response = await this.post(request, false, linked.signal, options.signal);
      let body: unknown;
      try {
        body = await response.json();
      } catch (err) {
        if (options.signal?.aborted) throw new ExchangeCancelledError();
        if (deadline.aborted) throw this.timedOut(err);
        throw new TranslationError(this.provider, "response body is not JSON", { cause: err });
      }
      const result = this.adapter.fromWire(body);
      return { ...result, model: result.model || request.model };
    } finally {
      linked.dispose();
    }
  }

  /**
   * Streaming chat completion. Yields deltas in arrival order and returns
   * the reassembled response. A stream that stops early, or whose final
   * event was cut off mid-payload, returns what was received, marked
   * incomplete. The per-call deadline covers the whole stream.
   */
  async *stream(request: CanonicalRequest, options: CallOptions = {}): AsyncGenerator<StreamDelta, CanonicalResponse, undefined> {
    if (!this.capabilities.streaming) {
      const response = await this.complete(request, options);
      return response;
    }

    const deadline = AbortSignal.timeout(this.timeoutMs);
    const linked = linkSignals(options.signal, deadline);
    try {
      const response = await this.post(request, true, linked.signal, options.signal);
      if (!response.body) {
        throw new TranslationError(this.provider, "streaming response has no body");
      }

      const state = this.adapter.createStreamState(request.model);
      try {
        for await (const event of readServerSentEvents(response.body, linked.signal)) {
          let deltas: StreamDelta[];
          try {
            deltas = this.adapter.fromWireChunk(state, event);
          } catch (err) {
            if (!event.truncated || !(err instanceof TranslationError)) throw err;
            log.warn("Dropped truncated final stream event", { provider: this.provider, error: err.message });
            break;
          }
          for (const delta of deltas) {
            yield delta;
          }
        }
      } catch (err) {
        if (options.signal?.aborted) throw new ExchangeCancelledError();
        if (deadline.aborted) throw this.timedOut(err);
        if (isAbortError(err)) throw new ExchangeCancelledError();
        if (err instanceof UpstreamError || err instanceof TranslationError) throw err;
        // Connection dropped mid-stream: keep what arrived
        log.warn("Stream interrupted", { provider: this.provider, error: toErrorMessage(err) });
      }

      if (options.signal?.aborted) throw new ExchangeCancelledError();
      if (deadline.aborted) throw this.timedOut();

      const result = state.finish();
      if (result.incomplete) {
        log.warn("Stream ended without terminal event", { provider: this.provider, notes: result.notes });
      }
      return result;
    } finally {
      linked.dispose();
    }
  }

  /** Deadline expiry; status 0 with a "timed out" body is retryable */
  private timedOut(cause?: unknown): UpstreamError {
    return new UpstreamError(this.provider, 0, `request timed out after ${this.timeoutMs}ms`, undefined, { cause });
  }

  private async post(
    request: CanonicalRequest,
    stream: boolean,
    signal: AbortSignal,
    callerSignal: AbortSignal | undefined,
  ): Promise<Response> {
    const wire = this.adapter.toWire(request, this.capabilities, { stream });
    const url = `${this.baseUrl}${wire.path}`;

    log.debug("Upstream request", {
      provider: this.provider,
      model: request.model,
      stream,
      messages: request.messages.length,
      degradations: request.metadata.degradations.length,
    });

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: "POST",
        headers: this.adapter.headers(this.apiKey),
        body: JSON.stringify(wire.body),
        signal,
      });
    } catch (err) {
      if (callerSignal?.aborted) throw new ExchangeCancelledError();
      if (signal.aborted) throw this.timedOut(err);
      throw new UpstreamError(this.provider, 0, toErrorMessage(err), undefined, { cause: err });
    }

    if (!response.ok) {
      const body = await response.text().catch((err: unknown) => `<unreadable body: ${toErrorMessage(err)}>`);
      throw new UpstreamError(
        this.provider,
        response.status,
        body,
        parseRetryAfterHeader(response.headers.get("retry-after")),
      );
    }

    return response;
  }
}
