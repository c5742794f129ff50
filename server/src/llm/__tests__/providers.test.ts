/**
 * Adapter translation tests: request encoding, response decoding and the
 * canonical round trip for every provider.
 */

import { describe, it, expect } from "vitest";
import { getAdapter } from "../factory.js";
import { PROVIDER_IDS } from "../types.js";
import { createMessage, systemText, textOf, toolCallsOf, toolResultMessage, userText, reasoningOf } from "../../canonical/messages.js";
import { TranslationError } from "../../errors.js";
import { assistantWithCall, conversation, last, list, makeRequest, READ_TOOL, record } from "./fixtures.js";

/** Wrap the last encoded assistant message as that provider's response payload */
function echoAsResponse(provider: string, body: Record<string, unknown>): unknown {
  if (provider === "anthropic") {
    const message = record(last(list(body.messages)));
    return {
      id: "msg_1",
      type: "message",
      role: "assistant",
      model: "claude-test",
      content: message.content,
      stop_reason: "tool_use",
      usage: { input_tokens: 1, output_tokens: 1 },
    };
  }
  if (provider === "google") {
    const content = record(last(list(body.contents)));
    return { responseId: "r1", modelVersion: "gemini-test", candidates: [{ content, finishReason: "STOP" }] };
  }
  const message = record(last(list(body.messages)));
  return {
    id: "chatcmpl-1",
    model: "test-model",
    choices: [{ index: 0, message, finish_reason: "tool_calls" }],
    usage: { prompt_tokens: 1, completion_tokens: 1 },
  };
}

describe("canonical round trip", () => {
  for (const provider of PROVIDER_IDS) {
    it(`${provider} preserves role, text and tool-call identity`, () => {
      const adapter = getAdapter(provider);
      const original = assistantWithCall();
      const wire = adapter.toWire(makeRequest(conversation(), { tools: [READ_TOOL] }));
      const decoded = adapter.fromWire(echoAsResponse(provider, wire.body)).message;

      expect(decoded.role).toBe(original.role);
      expect(textOf(decoded)).toBe(textOf(original));
      expect(toolCallsOf(decoded)).toEqual(toolCallsOf(original));
    });
  }
});

describe("thinking capability degradation", () => {
  it("generic provider drops thinking and notes it on the request", () => {
    const adapter = getAdapter("generic");
    const request = makeRequest([userText("hi")], { thinking: { enabled: true, budgetTokens: 4000 } });

    const wire = adapter.toWire(request);

    expect(Object.keys(wire.body).sort()).toEqual(["messages", "model"]);
    expect(request.metadata.degradations).toEqual([
      {
        feature: "thinking",
        provider: "generic",
        detail: "generic does not support a thinking parameter; request sent without it",
      },
    ]);
  });

  it("tool definitions are dropped when the capability set has no tool calls", () => {
    const adapter = getAdapter("openai");
    const request = makeRequest([userText("hi")], { tools: [READ_TOOL] });
    const wire = adapter.toWire(request, { ...adapter.capabilities, toolCalls: false });
    expect(wire.body.tools).toBeUndefined();
    expect(request.metadata.degradations.map((d) => d.feature)).toEqual(["tools"]);
  });
});

describe("AnthropicAdapter", () => {
  const adapter = getAdapter("anthropic");

  it("hoists system text with cache control and merges consecutive tool results", () => {
    const assistant = createMessage("assistant", [
      { type: "tool_call", id: "t1", name: "Read", input: { path: "a" } },
      { type: "tool_call", id: "t2", name: "Read", input: { path: "b" } },
    ]);
    const request = makeRequest([
      systemText("Be brief."),
      userText("hi"),
      assistant,
      toolResultMessage("t1", "A"),
      toolResultMessage("t2", "B", true),
    ]);

    const { path, body } = adapter.toWire(request);

    expect(path).toBe("/v1/messages");
    expect(body.system).toEqual([{ type: "text", text: "Be brief.", cache_control: { type: "ephemeral" } }]);
    expect(body.messages).toEqual([
      { role: "user", content: [{ type: "text", text: "hi" }] },
      {
        role: "assistant",
        content: [
          { type: "tool_use", id: "t1", name: "Read", input: { path: "a" } },
          { type: "tool_use", id: "t2", name: "Read", input: { path: "b" } },
        ],
      },
      {
        role: "user",
        content: [
          { type: "tool_result", tool_use_id: "t1", content: "A" },
          { type: "tool_result", tool_use_id: "t2", content: "B", is_error: true },
        ],
      },
    ]);
  });

  it("clamps the thinking budget and omits temperature while thinking", () => {
    const request = makeRequest([userText("hi")], { thinking: { enabled: true, budgetTokens: 500 }, temperature: 0.2 });
    const { body } = adapter.toWire(request);
    expect(body.thinking).toEqual({ type: "enabled", budget_tokens: 1024 });
    expect(body.max_tokens).toBe(4096);
    expect(body.temperature).toBeUndefined();
    expect(request.metadata.degradations).toEqual([]);
  });

  it("raises max_tokens above a large thinking budget", () => {
    const request = makeRequest([userText("hi")], { thinking: { enabled: true, budgetTokens: 20_000 }, maxTokens: 8000 });
    const { body } = adapter.toWire(request);
    expect(body.max_tokens).toBe(24_096);
  });

  it("marks the last tool definition cacheable", () => {
    const { body } = adapter.toWire(makeRequest([userText("hi")], { tools: [READ_TOOL] }));
    expect(body.tools).toEqual([
      { name: "Read", description: "Read a file", input_schema: READ_TOOL.inputSchema, cache_control: { type: "ephemeral" } },
    ]);
  });

  it("decodes thinking, text and tool_use blocks", () => {
    const response = adapter.fromWire({
      id: "msg_9",
      model: "claude-test",
      content: [
        { type: "thinking", thinking: "plan", signature: "sig" },
        { type: "text", text: "ok" },
        { type: "tool_use", id: "toolu_1", name: "Read", input: { path: "a" } },
      ],
      stop_reason: "tool_use",
      usage: { input_tokens: 12, output_tokens: 5, cache_read_input_tokens: 3 },
    });

    expect(response.message.content).toEqual([
      { type: "reasoning", text: "plan", signature: "sig" },
      { type: "text", text: "ok" },
      { type: "tool_call", id: "toolu_1", name: "Read", input: { path: "a" } },
    ]);
    expect(response.stopReason).toBe("tool_use");
    expect(response.usage).toEqual({ inputTokens: 12, outputTokens: 5, cacheReadTokens: 3, cacheCreationTokens: 0 });
  });

  it("rejects malformed payloads with TranslationError", () => {
    expect(() => adapter.fromWire("nope")).toThrow(TranslationError);
    expect(() => adapter.fromWire({ id: "x" })).toThrow(TranslationError);
  });
});

describe("OpenAI-compatible adapters", () => {
  it("OpenAI sends reasoning_effort, defaulting to medium", () => {
    const adapter = getAdapter("openai");
    expect(adapter.toWire(makeRequest([userText("hi")], { thinking: { enabled: true } })).body.reasoning_effort).toBe("medium");
    expect(
      adapter.toWire(makeRequest([userText("hi")], { thinking: { enabled: true, effort: "high" } })).body.reasoning_effort,
    ).toBe("high");
    expect(adapter.toWire(makeRequest([userText("hi")], { thinking: { enabled: false } })).body.reasoning_effort).toBeUndefined();
  });

  it("Qwen sends enable_thinking in both directions", () => {
    const adapter = getAdapter("qwen");
    expect(adapter.toWire(makeRequest([userText("hi")], { thinking: { enabled: true } })).body.enable_thinking).toBe(true);
    expect(adapter.toWire(makeRequest([userText("hi")], { thinking: { enabled: false } })).body.enable_thinking).toBe(false);
  });

  it("GLM toggles thinking and keeps it across turns on request", () => {
    const adapter = getAdapter("glm");
    const messages = [
      userText("hi"),
      createMessage("assistant", [{ type: "reasoning", text: "thought" }, { type: "text", text: "hello" }]),
      userText("again"),
    ];
    const { body, path } = adapter.toWire(
      makeRequest(messages, { thinking: { enabled: true, preserveAcrossTurns: true } }),
    );
    expect(path).toBe("/chat/completions");
    expect(body.thinking).toEqual({ type: "enabled" });
    expect(body.clear_thinking).toBe(false);
    expect(list(body.messages)[1]).toEqual({ role: "assistant", content: "hello", reasoning_content: "thought" });
  });

  it("DeepSeek echoes reasoning_content while thinking", () => {
    const adapter = getAdapter("deepseek");
    const messages = [
      userText("hi"),
      createMessage("assistant", [{ type: "reasoning", text: "r" }, { type: "text", text: "a" }]),
    ];
    const thinkingOn = adapter.toWire(makeRequest(messages, { thinking: { enabled: true } })).body;
    const thinkingOff = adapter.toWire(makeRequest(messages)).body;
    expect(thinkingOn.enable_thinking).toBe(true);
    expect(thinkingOn.thinking).toBeUndefined();
    expect(thinkingOff.enable_thinking).toBeUndefined();
    expect(record(list(thinkingOn.messages)[1]).reasoning_content).toBe("r");
    expect(record(list(thinkingOff.messages)[1]).reasoning_content).toBeUndefined();
  });

  it("expands a multi-result tool message and encodes images as data URLs", () => {
    const adapter = getAdapter("openai");
    const tool = createMessage("tool", [
      { type: "tool_result", toolCallId: "c1", content: "one" },
      { type: "tool_result", toolCallId: "c2", content: "two" },
    ]);
    const image = createMessage("user", [
      { type: "text", text: "look" },
      { type: "attachment", ref: "shot", mediaType: "image/png", data: "AAAA" },
    ]);
    const { body } = adapter.toWire(makeRequest([tool, image]));
    expect(body.messages).toEqual([
      { role: "tool", tool_call_id: "c1", content: "one" },
      { role: "tool", tool_call_id: "c2", content: "two" },
      {
        role: "user",
        content: [
          { type: "text", text: "look" },
          { type: "image_url", image_url: { url: "data:image/png;base64,AAAA" } },
        ],
      },
    ]);
  });

  it("decodes tool calls, keeping malformed arguments as an empty input with a note", () => {
    const adapter = getAdapter("openai");
    const response = adapter.fromWire({
      id: "c",
      model: "gpt-4o",
      choices: [
        {
          message: {
            role: "assistant",
            content: null,
            tool_calls: [
              { id: "call_1", type: "function", function: { name: "Read", arguments: '{"path":"a"}' } },
              { id: "call_2", type: "function", function: { name: "Read", arguments: "{bad" } },
            ],
          },
          finish_reason: "tool_calls",
        },
      ],
      usage: { prompt_tokens: 9, completion_tokens: 4, prompt_tokens_details: { cached_tokens: 2 } },
    });

    expect(toolCallsOf(response.message)).toEqual([
      { type: "tool_call", id: "call_1", name: "Read", input: { path: "a" } },
      { type: "tool_call", id: "call_2", name: "Read", input: {} },
    ]);
    expect(response.notes).toEqual(["tool call call_2 arguments are not a JSON object; input left empty"]);
    expect(response.stopReason).toBe("tool_use");
    expect(response.usage.cacheReadTokens).toBe(2);
  });

  it("decodes reasoning_content as a reasoning segment", () => {
    const response = getAdapter("deepseek").fromWire({
      choices: [{ message: { content: "4", reasoning_content: "2+2" }, finish_reason: "stop" }],
    });
    expect(reasoningOf(response.message).map((r) => r.text)).toEqual(["2+2"]);
    expect(response.stopReason).toBe("end_turn");
  });

  it("rejects a response without choices", () => {
    expect(() => getAdapter("qwen").fromWire({ id: "x", choices: [] })).toThrow(TranslationError);
  });
});

describe("GeminiAdapter", () => {
  const adapter = getAdapter("google");

  it("uses systemInstruction, model role and named function responses", () => {
    const request = makeRequest(
      [systemText("Be brief."), ...conversation(), toolResultMessage("call_abc", "# Title")],
      { model: "gemini-2.5-flash", thinking: { enabled: true, budgetTokens: 100_000 } },
    );
    const { path, body } = adapter.toWire(request);

    expect(path).toBe("/models/gemini-2.5-flash:generateContent");
    expect(body.systemInstruction).toEqual({ parts: [{ text: "Be brief." }] });
    expect(body.contents).toEqual([
      { role: "user", parts: [{ text: "What is in the readme?" }] },
      {
        role: "model",
        parts: [
          { text: "Let me check." },
          { functionCall: { id: "call_abc", name: "Read", args: { path: "README.md" } } },
        ],
      },
      {
        role: "user",
        parts: [{ functionResponse: { id: "call_abc", name: "Read", response: { content: "# Title" } } }],
      },
    ]);
    expect(body.generationConfig).toEqual({ thinkingConfig: { thinkingBudget: 32_768, includeThoughts: true } });
  });

  it("streams through streamGenerateContent with SSE", () => {
    const { path } = adapter.toWire(makeRequest([userText("hi")], { model: "gemini-2.5-pro" }), undefined, { stream: true });
    expect(path).toBe("/models/gemini-2.5-pro:streamGenerateContent?alt=sse");
  });

  it("synthesizes ids for function calls that carry none", () => {
    const response = adapter.fromWire({
      candidates: [{ content: { role: "model", parts: [{ functionCall: { name: "Read", args: { path: "a" } } }] }, finishReason: "STOP" }],
    });
    const [call] = toolCallsOf(response.message);
    expect(call?.id).toMatch(/^call_Read_\d+$/);
    expect(response.stopReason).toBe("tool_use");
  });

  it("maps safety stops and blocked prompts to content_filter", () => {
    expect(adapter.fromWire({ candidates: [{ content: { parts: [] }, finishReason: "SAFETY" }] }).stopReason).toBe("content_filter");
    const blocked = adapter.fromWire({ promptFeedback: { blockReason: "SAFETY" } });
    expect(blocked.stopReason).toBe("content_filter");
    expect(blocked.notes).toEqual(["prompt blocked: SAFETY"]);
  });

  it("rejects a response with neither candidates nor feedback", () => {
    expect(() => adapter.fromWire({})).toThrow(TranslationError);
  });
});
