import { describe, it, expect, vi } from "vitest";
import { ProviderClient, type FetchFn } from "../client.js";
import { getAdapter } from "../factory.js";
import type { StreamDelta } from "../types.js";
import type { CanonicalResponse } from "../../canonical/types.js";
import { userText, textOf } from "../../canonical/messages.js";
import { ExchangeCancelledError, TranslationError, UpstreamError } from "../../errors.js";
import { isRetryableError } from "../resilience/retry.js";
import { makeRequest } from "./fixtures.js";

const COMPLETION = {
  id: "chatcmpl-7",
  model: "gpt-4o-2024-08-06",
  choices: [{ message: { role: "assistant", content: "pong" }, finish_reason: "stop" }],
  usage: { prompt_tokens: 3, completion_tokens: 1 },
};

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { "content-type": "application/json" }, ...init });
}

function client(fetchFn: FetchFn, overrides: { streaming?: boolean; provider?: string; timeoutMs?: number } = {}) {
  return new ProviderClient({
    adapter: getAdapter(overrides.provider ?? "openai"),
    baseUrl: "http://upstream.test/v1/",
    apiKey: "test-secret",
    fetch: fetchFn,
    timeoutMs: overrides.timeoutMs,
    capabilities: overrides.streaming === undefined ? undefined : { streaming: overrides.streaming },
  });
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected rejection");
}

async function drain(gen: AsyncGenerator<StreamDelta, CanonicalResponse, undefined>) {
  const deltas: StreamDelta[] = [];
  let next = await gen.next();
  while (!next.done) {
    deltas.push(next.value);
    next = await gen.next();
  }
  return { deltas, response: next.value };
}

describe("ProviderClient.complete", () => {
  it("posts the encoded request and decodes the reply", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => jsonResponse(COMPLETION));
    const response = await client(fetchFn).complete(makeRequest([userText("ping")], { model: "gpt-4o" }));

    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe("http://upstream.test/v1/chat/completions");
    expect(new Headers(init?.headers).get("Authorization")).toBe("Bearer test-secret");
    expect(JSON.parse(String(init?.body))).toEqual({ model: "gpt-4o", messages: [{ role: "user", content: "ping" }] });

    expect(textOf(response.message)).toBe("pong");
    expect(response.model).toBe("gpt-4o-2024-08-06");
    expect(response.provider).toBe("openai");
  });

  it("fills the model from the request when the reply omits it", async () => {
    const { model: _model, ...withoutModel } = COMPLETION;
    const response = await client(async () => jsonResponse(withoutModel)).complete(makeRequest([userText("ping")], { model: "gpt-4o" }));
    expect(response.model).toBe("gpt-4o");
  });

  it("maps an HTTP error with Retry-After onto UpstreamError", async () => {
    const err = await captureError(
      client(async () => new Response("slow down", { status: 429, headers: { "retry-after": "2" } })).complete(
        makeRequest([userText("ping")]),
      ),
    );
    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toMatchObject({ status: 429, retryAfterMs: 2000, body: "slow down", provider: "openai" });
    expect(isRetryableError(err)).toBe(true);
  });

  it("maps a transport failure onto UpstreamError with status 0", async () => {
    const err = await captureError(
      client(async () => {
        throw new TypeError("fetch failed");
      }).complete(makeRequest([userText("ping")])),
    );
    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toMatchObject({ status: 0, message: "openai request failed: fetch failed" });
    expect(isRetryableError(err)).toBe(true);
  });

  it("rejects a body that is not JSON with TranslationError", async () => {
    const err = await captureError(
      client(async () => new Response("<html>oops</html>", { status: 200 })).complete(makeRequest([userText("ping")])),
    );
    expect(err).toBeInstanceOf(TranslationError);
    expect(isRetryableError(err)).toBe(false);
  });

  it("reports cancellation when the caller aborts", async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchFn: FetchFn = async (_url, init) => {
      if (init.signal?.aborted) throw new DOMException("aborted", "AbortError");
      return jsonResponse(COMPLETION);
    };
    const err = await captureError(client(fetchFn).complete(makeRequest([userText("ping")]), { signal: controller.signal }));
    expect(err).toBeInstanceOf(ExchangeCancelledError);
  });
});

describe("ProviderClient.stream", () => {
  const encoder = new TextEncoder();

  function sseResponse(lines: string[], keepOpen = false): Response {
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        for (const line of lines) controller.enqueue(encoder.encode(line));
        if (!keepOpen) controller.close();
      },
    });
    return new Response(body, { status: 200, headers: { "content-type": "text/event-stream" } });
  }

  it("yields deltas and returns the reassembled response", async () => {
    const fetchFn = vi.fn<FetchFn>(async () =>
      sseResponse([
        'data: {"id":"c2","choices":[{"delta":{"content":"po"}}]}\n\n',
        'data: {"choices":[{"delta":{"content":"ng"},"finish_reason":"stop"}]}\n\n',
        "data: [DONE]\n\n",
      ]),
    );
    const { deltas, response } = await drain(client(fetchFn).stream(makeRequest([userText("ping")], { model: "gpt-4o" })));

    expect(deltas).toEqual([
      { type: "text", text: "po" },
      { type: "text", text: "ng" },
      { type: "stop", stopReason: "end_turn" },
    ]);
    expect(textOf(response.message)).toBe("pong");
    expect(response.incomplete).toBe(false);

    const body: unknown = JSON.parse(String(fetchFn.mock.calls[0]?.[1].body));
    expect(body).toMatchObject({ stream: true, stream_options: { include_usage: true } });
  });

  it("returns partial content flagged incomplete when the connection closes early", async () => {
    const { response } = await drain(
      client(async () => sseResponse(['data: {"choices":[{"delta":{"content":"par"}}]}\n\n'])).stream(
        makeRequest([userText("ping")]),
      ),
    );
    expect(textOf(response.message)).toBe("par");
    expect(response.incomplete).toBe(true);
  });

  it("keeps earlier deltas when the final event is cut off mid-payload", async () => {
    const { deltas, response } = await drain(
      client(async () => sseResponse(['data: {"choices":[{"delta":{"content":"par"}}]}\n\n', 'data: {"choices":[{"del'])).stream(
        makeRequest([userText("ping")]),
      ),
    );
    expect(deltas).toEqual([{ type: "text", text: "par" }]);
    expect(textOf(response.message)).toBe("par");
    expect(response.incomplete).toBe(true);
  });

  it("keeps a partial Anthropic reply when its last event is cut off", async () => {
    const { response } = await drain(
      client(
        async () =>
          sseResponse([
            'event: message_start\ndata: {"type":"message_start","message":{"id":"msg_1","model":"claude-test","usage":{"input_tokens":5}}}\n\n',
            'event: content_block_start\ndata: {"type":"content_block_start","index":0,"content_block":{"type":"text","text":""}}\n\n',
            'event: content_block_delta\ndata: {"type":"content_block_delta","index":0,"delta":{"type":"text_delta","text":"hel"}}\n\n',
            'event: content_block_delta\ndata: {"type":"content_block_delta","index":0,"delta":{"type":"text_d',
          ]),
        { provider: "anthropic" },
      ).stream(makeRequest([userText("ping")], { maxTokens: 64 })),
    );
    expect(textOf(response.message)).toBe("hel");
    expect(response.id).toBe("msg_1");
    expect(response.incomplete).toBe(true);
  });

  it("still rejects a malformed event that was fully delivered", async () => {
    const err = await captureError(
      drain(client(async () => sseResponse(['data: {"choices":[{"del\n\n', "data: [DONE]\n\n"])).stream(makeRequest([userText("ping")]))),
    );
    expect(err).toBeInstanceOf(TranslationError);
  });

  it("fails with a retryable upstream timeout when the stream stalls past the deadline", async () => {
    const gen = client(async () => sseResponse(['data: {"choices":[{"delta":{"content":"par"}}]}\n\n'], true), { timeoutMs: 50 }).stream(
      makeRequest([userText("ping")]),
    );

    expect((await gen.next()).value).toEqual({ type: "text", text: "par" });
    const err = await captureError(gen.next());
    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toMatchObject({ status: 0, message: "openai request failed: request timed out after 50ms" });
    expect(isRetryableError(err)).toBe(true);
  });

  it("throws ExchangeCancelledError when aborted mid-stream", async () => {
    const controller = new AbortController();
    const gen = client(async () => sseResponse(['data: {"choices":[{"delta":{"content":"par"}}]}\n\n'], true)).stream(
      makeRequest([userText("ping")]),
      { signal: controller.signal },
    );

    const first = await gen.next();
    expect(first.value).toEqual({ type: "text", text: "par" });
    controller.abort();
    expect(await captureError(gen.next())).toBeInstanceOf(ExchangeCancelledError);
  });

  it("falls back to a single completion when streaming is disabled", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => jsonResponse(COMPLETION));
    const { deltas, response } = await drain(client(fetchFn, { streaming: false }).stream(makeRequest([userText("ping")])));

    expect(deltas).toEqual([]);
    expect(textOf(response.message)).toBe("pong");
    expect(JSON.parse(String(fetchFn.mock.calls[0]?.[1].body)).stream).toBeUndefined();
  });
});
