/**
 * OpenAI-Compatible Adapter
 *
 * Chat completions dialect. Provider variants (OpenAI, DeepSeek, Qwen, GLM)
 * subclass this and differ only in defaults, capabilities and how reasoning
 * is echoed back.
 */

import type {
  CanonicalRequest,
  CanonicalResponse,
  ContentSegment,
  JsonObject,
  StopReason,
  TokenUsage,
} from "../../../canonical/types.js";
import { createMessage, parseJsonObject } from "../../../canonical/messages.js";
import { TranslationError, UpstreamError } from "../../../errors.js";
import { applyThinking, resolveThinking, resolveTools } from "../../capabilities.js";
import { StreamAccumulator } from "../../stream.js";
import type {
  ProviderAdapter,
  ProviderCapabilitySet,
  ProviderId,
  ProviderWireRequest,
  SseEvent,
  StreamDelta,
  ThinkingParameter,
  WireOptions,
} from "../../types.js";
import { asArray, asNumber, asRecord, asString, parseEventData, requireRecord, type WireRecord } from "../../wire.js";
import { formatMessagesForAPI, formatTools } from "./format.js";

const FINISH_REASONS: Record<string, StopReason> = {
  stop: "end_turn",
  tool_calls: "tool_use",
  function_call: "tool_use",
  length: "max_tokens",
  content_filter: "content_filter",
  sensitive: "content_filter",
};

export function toStopReason(value: unknown): StopReason {
  const key = asString(value);
  return (key && FINISH_REASONS[key]) || "unknown";
}

export function parseOpenAIUsage(usage: WireRecord | undefined): TokenUsage {
  const details = asRecord(usage?.prompt_tokens_details);
  return {
    inputTokens: asNumber(usage?.prompt_tokens) ?? 0,
    outputTokens: asNumber(usage?.completion_tokens) ?? 0,
    cacheReadTokens: asNumber(details?.cached_tokens) ?? asNumber(usage?.prompt_cache_hit_tokens) ?? 0,
    cacheCreationTokens: 0,
  };
}

export class OpenAICompatibleAdapter implements ProviderAdapter {
  readonly capabilities: ProviderCapabilitySet;

  constructor(
    readonly id: ProviderId,
    readonly defaultBaseUrl: string,
    thinking: ThinkingParameter | null,
  ) {
    this.capabilities = { streaming: true, toolCalls: true, thinking };
  }

  /** Whether assistant reasoning is replayed as reasoning_content */
  protected echoReasoning(request: CanonicalRequest): boolean {
    return request.thinking?.preserveAcrossTurns === true;
  }

  /** Provider-specific extras once the thinking parameter is written */
  protected decorateThinking(_body: JsonObject, _request: CanonicalRequest): void {}

  toWire(
    request: CanonicalRequest,
    capabilities: ProviderCapabilitySet = this.capabilities,
    options: WireOptions = {},
  ): ProviderWireRequest {
    const body: JsonObject = {
      model: request.model,
      messages: formatMessagesForAPI(request.messages, { echoReasoning: this.echoReasoning(request) }),
    };

    if (request.maxTokens !== undefined) body.max_tokens = request.maxTokens;
    if (request.temperature !== undefined) body.temperature = request.temperature;

    if (resolveTools(request, capabilities, this.id) && request.tools) {
      body.tools = formatTools(request.tools);
    }

    const thinking = resolveThinking(request, capabilities, this.id);
    if (thinking && request.thinking) {
      applyThinking(body, thinking, request.thinking);
      this.decorateThinking(body, request);
    }

    if (options.stream) {
      body.stream = true;
      body.stream_options = { include_usage: true };
    }

    return { path: "/chat/completions", body };
  }

  fromWire(raw: unknown): CanonicalResponse {
    const data = requireRecord(this.id, raw, "response");
    const choice = asRecord(asArray(data.choices)[0]);
    const message = asRecord(choice?.message);
    if (!message) {
      throw new TranslationError(this.id, "response has no choices[0].message");
    }

    const content: ContentSegment[] = [];
    const notes: string[] = [];

    const reasoning = asString(message.reasoning_content) ?? asString(message.reasoning);
    if (reasoning) content.push({ type: "reasoning", text: reasoning });

    const text = asString(message.content);
    if (text) content.push({ type: "text", text });

    for (const raw of asArray(message.tool_calls)) {
      const call = requireRecord(this.id, raw, "tool call");
      const fn = asRecord(call.function);
      const id = asString(call.id);
      const name = asString(fn?.name);
      if (!id || !name) throw new TranslationError(this.id, "tool call without id or function name");
      const args = asString(fn?.arguments) ?? "";
      let input = args.trim() === "" ? {} : parseJsonObject(args);
      if (input === null) {
        notes.push(`tool call ${id} arguments are not a JSON object; input left empty`);
        input = {};
      }
      content.push({ type: "tool_call", id, name, input });
    }

    return {
      id: asString(data.id) ?? "",
      model: asString(data.model) ?? "",
      provider: this.id,
      message: createMessage("assistant", content),
      stopReason: toStopReason(choice?.finish_reason),
      usage: parseOpenAIUsage(asRecord(data.usage)),
      incomplete: false,
      notes,
    };
  }

  createStreamState(model: string): StreamAccumulator {
    return new StreamAccumulator(this.id, model);
  }

  fromWireChunk(state: StreamAccumulator, event: SseEvent): StreamDelta[] {
    if (event.data.trim() === "[DONE]") {
      state.markComplete();
      return [];
    }

    const data = parseEventData(this.id, event.data);
    const deltas: StreamDelta[] = [];

    const error = asRecord(data.error);
    if (error) {
      throw new UpstreamError(this.id, 0, asString(error.message) ?? JSON.stringify(error));
    }

    state.id = asString(data.id) ?? state.id;
    state.model = asString(data.model) ?? state.model;

    const usage = asRecord(data.usage);
    if (usage) {
      state.addUsage(parseOpenAIUsage(usage));
      deltas.push({ type: "usage", usage: state.usage });
    }

    const choice = asRecord(asArray(data.choices)[0]);
    const delta = asRecord(choice?.delta);

    const reasoning = asString(delta?.reasoning_content) ?? asString(delta?.reasoning);
    if (reasoning) {
      state.appendReasoning(reasoning);
      deltas.push({ type: "reasoning", text: reasoning });
    }

    const text = asString(delta?.content);
    if (text) {
      state.appendText(text);
      deltas.push({ type: "text", text });
    }

    for (const raw of asArray(delta?.tool_calls)) {
      const call = asRecord(raw);
      if (!call) continue;
      const key = `tool:${asNumber(call.index) ?? 0}`;
      const fn = asRecord(call.function);
      const id = asString(call.id);
      const name = asString(fn?.name);
      if (id || name) {
        const { index, created } = state.startToolCall(key, id, name);
        if (created) deltas.push({ type: "tool_call", index, id: id ?? "", name: name ?? "" });
      }
      const fragment = asString(fn?.arguments);
      if (fragment) {
        const index = state.appendToolArguments(key, fragment);
        deltas.push({ type: "tool_arguments", index, fragment });
      }
    }

    if (choice?.finish_reason) {
      const stopReason = toStopReason(choice.finish_reason);
      state.setStopReason(stopReason);
      deltas.push({ type: "stop", stopReason });
    }

    return deltas;
  }

  headers(apiKey: string | undefined): Record<string, string> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (apiKey) headers.Authorization = `Bearer ${apiKey}`;
    return headers;
  }
}

/**
 * Any server speaking the chat completions protocol (LM Studio, vLLM,
 * llama.cpp, LocalAI). No thinking parameter is assumed.
 */
export class GenericOpenAIAdapter extends OpenAICompatibleAdapter {
  constructor() {
    super("generic", "http://localhost:1234/v1", null);
  }
}
