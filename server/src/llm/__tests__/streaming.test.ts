/**
 * Stream reassembly tests: provider event sequences fed through each
 * adapter's fromWireChunk, plus the SSE reader.
 */

import { describe, it, expect } from "vitest";
import { getAdapter } from "../factory.js";
import { readServerSentEvents } from "../sse.js";
import type { SseEvent, StreamDelta } from "../types.js";
import { TranslationError, UpstreamError } from "../../errors.js";
import { byteStream, sse } from "./fixtures.js";

function run(provider: string, events: SseEvent[]) {
  const adapter = getAdapter(provider);
  const state = adapter.createStreamState("requested-model");
  const deltas: StreamDelta[] = [];
  for (const event of events) deltas.push(...adapter.fromWireChunk(state, event));
  return { deltas, finish: () => state.finish() };
}

const ANTHROPIC_EVENTS: SseEvent[] = [
  sse({ type: "message_start", message: { id: "msg_s", model: "claude-x", usage: { input_tokens: 10, output_tokens: 1 } } }),
  sse({ type: "content_block_start", index: 0, content_block: { type: "text", text: "" } }),
  sse({ type: "content_block_delta", index: 0, delta: { type: "text_delta", text: "Hel" } }),
  sse({ type: "content_block_delta", index: 0, delta: { type: "text_delta", text: "lo" } }),
  sse({ type: "content_block_stop", index: 0 }),
  sse({ type: "content_block_start", index: 1, content_block: { type: "tool_use", id: "toolu_1", name: "Read", input: {} } }),
  sse({ type: "content_block_delta", index: 1, delta: { type: "input_json_delta", partial_json: '{"path":' } }),
  sse({ type: "content_block_delta", index: 1, delta: { type: "input_json_delta", partial_json: '"a.md"}' } }),
  sse({ type: "content_block_stop", index: 1 }),
  sse({ type: "message_delta", delta: { stop_reason: "tool_use" }, usage: { output_tokens: 20 } }),
  sse({ type: "message_stop" }),
];

describe("Anthropic stream", () => {
  it("reassembles text and streamed tool arguments", () => {
    const { deltas, finish } = run("anthropic", ANTHROPIC_EVENTS);
    const response = finish();

    expect(deltas.filter((d) => d.type === "text").map((d) => (d.type === "text" ? d.text : ""))).toEqual(["Hel", "lo"]);
    expect(deltas).toContainEqual({ type: "tool_call", index: 0, id: "toolu_1", name: "Read" });
    expect(response.id).toBe("msg_s");
    expect(response.model).toBe("claude-x");
    expect(response.message.content).toEqual([
      { type: "text", text: "Hello" },
      { type: "tool_call", id: "toolu_1", name: "Read", input: { path: "a.md" } },
    ]);
    expect(response.stopReason).toBe("tool_use");
    expect(response.usage).toEqual({ inputTokens: 10, outputTokens: 20, cacheReadTokens: 0, cacheCreationTokens: 0 });
    expect(response.incomplete).toBe(false);
    expect(response.notes).toEqual([]);
  });

  it("keeps partial content when the stream stops mid tool call", () => {
    const { finish } = run("anthropic", ANTHROPIC_EVENTS.slice(0, 7));
    const response = finish();

    expect(response.incomplete).toBe(true);
    expect(response.stopReason).toBe("unknown");
    expect(response.message.content).toEqual([
      { type: "text", text: "Hello" },
      { type: "tool_call", id: "toolu_1", name: "Read", input: {} },
    ]);
    expect(response.notes).toEqual([
      "tool call toolu_1 arguments truncated; input left empty",
      "stream ended before the provider's terminal event",
    ]);
  });

  it("accumulates signed thinking blocks", () => {
    const { finish } = run("anthropic", [
      sse({ type: "content_block_start", index: 0, content_block: { type: "thinking", thinking: "" } }),
      sse({ type: "content_block_delta", index: 0, delta: { type: "thinking_delta", thinking: "step one" } }),
      sse({ type: "content_block_delta", index: 0, delta: { type: "signature_delta", signature: "sig-1" } }),
      sse({ type: "content_block_delta", index: 1, delta: { type: "text_delta", text: "done" } }),
      sse({ type: "message_stop" }),
    ]);
    expect(finish().message.content).toEqual([
      { type: "reasoning", text: "step one", signature: "sig-1" },
      { type: "text", text: "done" },
    ]);
  });

  it("surfaces an error event as an upstream failure", () => {
    expect(() =>
      run("anthropic", [sse({ type: "error", error: { type: "overloaded_error", message: "Overloaded" } })]),
    ).toThrow(UpstreamError);
  });

  it("rejects an event that is not JSON", () => {
    expect(() => run("anthropic", [sse("{not json")])).toThrow(TranslationError);
  });
});

describe("OpenAI-compatible stream", () => {
  const events: SseEvent[] = [
    sse({ id: "c1", model: "gpt-4o", choices: [{ delta: { role: "assistant", content: "Hi" } }] }),
    sse({ choices: [{ delta: { tool_calls: [{ index: 0, id: "call_1", function: { name: "Read", arguments: "" } }] } }] }),
    sse({ choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: '{"path":"b"}' } }] } }] }),
    sse({ choices: [{ delta: {}, finish_reason: "tool_calls" }] }),
    sse({ choices: [], usage: { prompt_tokens: 5, completion_tokens: 7 } }),
    sse("[DONE]"),
  ];

  it("reassembles text and indexed tool call fragments", () => {
    const { deltas, finish } = run("openai", events);
    const response = finish();

    expect(deltas).toContainEqual({ type: "tool_call", index: 0, id: "call_1", name: "Read" });
    expect(deltas).toContainEqual({ type: "stop", stopReason: "tool_use" });
    expect(response.id).toBe("c1");
    expect(response.message.content).toEqual([
      { type: "text", text: "Hi" },
      { type: "tool_call", id: "call_1", name: "Read", input: { path: "b" } },
    ]);
    expect(response.usage).toEqual({ inputTokens: 5, outputTokens: 7, cacheReadTokens: 0, cacheCreationTokens: 0 });
    expect(response.incomplete).toBe(false);
  });

  it("a finish_reason alone does not complete the stream", () => {
    const response = run("openai", events.slice(0, 4)).finish();
    expect(response.incomplete).toBe(true);
    expect(response.stopReason).toBe("tool_use");
  });

  it("rejects a completed stream whose tool arguments are not JSON", () => {
    const { finish } = run("deepseek", [
      sse({ choices: [{ delta: { tool_calls: [{ index: 0, id: "call_9", function: { name: "Read", arguments: "{bad" } }] } }] }),
      sse("[DONE]"),
    ]);
    expect(() => finish()).toThrow(TranslationError);
  });

  it("collects reasoning_content deltas", () => {
    const response = run("deepseek", [
      sse({ choices: [{ delta: { reasoning_content: "think " } }] }),
      sse({ choices: [{ delta: { reasoning_content: "more" } }] }),
      sse({ choices: [{ delta: { content: "ok" }, finish_reason: "stop" }] }),
      sse("[DONE]"),
    ]).finish();
    expect(response.message.content).toEqual([
      { type: "reasoning", text: "think more" },
      { type: "text", text: "ok" },
    ]);
    expect(response.stopReason).toBe("end_turn");
  });
});

describe("Gemini stream", () => {
  it("merges text across chunks and completes on finishReason", () => {
    const response = run("google", [
      sse({ candidates: [{ content: { parts: [{ text: "considering", thought: true }, { text: "An" }] } }] }),
      sse({
        responseId: "g1",
        candidates: [{ content: { parts: [{ text: "swer" }] }, finishReason: "STOP" }],
        usageMetadata: { promptTokenCount: 3, candidatesTokenCount: 2 },
      }),
    ]).finish();

    expect(response.id).toBe("g1");
    expect(response.message.content).toEqual([
      { type: "reasoning", text: "considering" },
      { type: "text", text: "Answer" },
    ]);
    expect(response.stopReason).toBe("end_turn");
    expect(response.usage.outputTokens).toBe(2);
    expect(response.incomplete).toBe(false);
  });

  it("emits whole function calls as a call plus one argument fragment", () => {
    const { deltas, finish } = run("google", [
      sse({ candidates: [{ content: { parts: [{ functionCall: { id: "fc1", name: "Read", args: { path: "c" } } }] }, finishReason: "STOP" }] }),
    ]);
    expect(deltas.slice(0, 2)).toEqual([
      { type: "tool_call", index: 0, id: "fc1", name: "Read" },
      { type: "tool_arguments", index: 0, fragment: '{"path":"c"}' },
    ]);
    expect(finish().stopReason).toBe("tool_use");
  });
});

describe("readServerSentEvents", () => {
  it("splits events across chunk boundaries and flushes a trailing event", async () => {
    const body = byteStream([': comment\nevent: message_start\ndata: {"a"', ':1}\r\n\r\ndata: x\n\n', "data: tail"]);
    const events: SseEvent[] = [];
    for await (const event of readServerSentEvents(body)) events.push(event);

    expect(events).toEqual([{ event: "message_start", data: '{"a":1}' }, { data: "x" }, { data: "tail", truncated: true }]);
  });

  it("flags a final event with no blank line even when its last line ended", async () => {
    const events: SseEvent[] = [];
    for await (const event of readServerSentEvents(byteStream(["data: a\n\nevent: ping\ndata: b\n"]))) events.push(event);
    expect(events).toEqual([{ data: "a" }, { event: "ping", data: "b", truncated: true }]);
  });

  it("joins multi-line data with newlines", async () => {
    const events: SseEvent[] = [];
    for await (const event of readServerSentEvents(byteStream(["data: one\ndata: two\n\n"]))) events.push(event);
    expect(events).toEqual([{ data: "one\ntwo" }]);
  });
});
