/**
 * Anthropic Adapter
 *
 * Messages API: system text is separated out, tool calls are tool_use /
 * tool_result content blocks, and reasoning travels as signed thinking
 * blocks.
 */

import type {
  CanonicalRequest,
  CanonicalResponse,
  ContentSegment,
  JsonObject,
  Message,
  StopReason,
} from "../../canonical/types.js";
import { createMessage, textOf, toJsonObject } from "../../canonical/messages.js";
import { TranslationError, UpstreamError } from "../../errors.js";
import { resolveThinking, resolveTools, clampBudget } from "../capabilities.js";
import { StreamAccumulator } from "../stream.js";
import type {
  ProviderAdapter,
  ProviderCapabilitySet,
  ProviderWireRequest,
  SseEvent,
  StreamDelta,
  WireOptions,
} from "../types.js";
import { asArray, asNumber, asRecord, asString, parseEventData, requireRecord, type WireRecord } from "../wire.js";

const DEFAULT_MAX_TOKENS = 4096;

const STOP_REASONS: Record<string, StopReason> = {
  end_turn: "end_turn",
  stop_sequence: "end_turn",
  tool_use: "tool_use",
  max_tokens: "max_tokens",
  refusal: "content_filter",
};

function toStopReason(value: unknown): StopReason {
  const key = asString(value);
  return (key && STOP_REASONS[key]) || "unknown";
}

// ============================================
// CANONICAL -> WIRE
// ============================================

function formatUserBlock(segment: ContentSegment): JsonObject | null {
  switch (segment.type) {
    case "text":
      return { type: "text", text: segment.text };
    case "attachment":
      if (segment.data && segment.mediaType.startsWith("image/")) {
        return { type: "image", source: { type: "base64", media_type: segment.mediaType, data: segment.data } };
      }
      if (segment.data && segment.mediaType === "application/pdf") {
        return { type: "document", source: { type: "base64", media_type: segment.mediaType, data: segment.data } };
      }
      return { type: "text", text: `[attachment: ${segment.name ?? segment.ref}]` };
    default:
      return null;
  }
}

function formatToolResult(segment: Extract<ContentSegment, { type: "tool_result" }>): JsonObject {
  const block: JsonObject = { type: "tool_result", tool_use_id: segment.toolCallId, content: segment.content };
  if (segment.isError) block.is_error = true;
  return block;
}

function formatAssistantBlocks(message: Message): JsonObject[] {
  const blocks: JsonObject[] = [];
  for (const segment of message.content) {
    if (segment.type === "reasoning") {
      // Unsigned reasoning (from another provider) cannot be replayed to Anthropic
      if (segment.signature) blocks.push({ type: "thinking", thinking: segment.text, signature: segment.signature });
    } else if (segment.type === "text") {
      if (segment.text) blocks.push({ type: "text", text: segment.text });
    } else if (segment.type === "tool_call") {
      blocks.push({ type: "tool_use", id: segment.id, name: segment.name, input: segment.input });
    }
  }
  return blocks;
}

/**
 * Anthropic expects every tool result for a turn in a single user message,
 * so consecutive tool messages are merged.
 */
export function formatMessagesForAnthropic(messages: readonly Message[]): JsonObject[] {
  const result: JsonObject[] = [];
  let pendingResults: JsonObject[] = [];

  const flushResults = () => {
    if (pendingResults.length === 0) return;
    result.push({ role: "user", content: pendingResults });
    pendingResults = [];
  };

  for (const m of messages) {
    if (m.role === "system") continue;

    if (m.role === "tool") {
      for (const segment of m.content) {
        if (segment.type === "tool_result") pendingResults.push(formatToolResult(segment));
      }
      continue;
    }

    flushResults();

    if (m.role === "assistant") {
      const blocks = formatAssistantBlocks(m);
      if (blocks.length > 0) result.push({ role: "assistant", content: blocks });
    } else {
      const blocks: JsonObject[] = [];
      for (const segment of m.content) {
        if (segment.type === "tool_result") blocks.push(formatToolResult(segment));
        const block = formatUserBlock(segment);
        if (block) blocks.push(block);
      }
      if (blocks.length > 0) result.push({ role: "user", content: blocks });
    }
  }

  flushResults();
  return result;
}

function systemBlocks(messages: readonly Message[]): JsonObject[] {
  const texts = messages.filter((m) => m.role === "system").map(textOf).filter((t) => t.length > 0);
  return texts.map((text, i): JsonObject =>
    i === texts.length - 1
      ? { type: "text", text, cache_control: { type: "ephemeral" } }
      : { type: "text", text },
  );
}

// ============================================
// WIRE -> CANONICAL
// ============================================

function parseContentBlocks(provider: string, blocks: unknown[]): ContentSegment[] {
  const content: ContentSegment[] = [];
  for (const raw of blocks) {
    const block = requireRecord(provider, raw, "content block");
    switch (block.type) {
      case "text":
        content.push({ type: "text", text: asString(block.text) ?? "" });
        break;
      case "thinking": {
        const signature = asString(block.signature);
        const text = asString(block.thinking) ?? "";
        content.push(signature ? { type: "reasoning", text, signature } : { type: "reasoning", text });
        break;
      }
      case "tool_use": {
        const id = asString(block.id);
        const name = asString(block.name);
        const input = asRecord(block.input);
        if (!id || !name) throw new TranslationError(provider, "tool_use block without id or name");
        content.push({ type: "tool_call", id, name, input: input ? toJsonObject(input) : {} });
        break;
      }
      default:
        // redacted_thinking and server tool blocks have no canonical form
        break;
    }
  }
  return content;
}

function parseUsage(usage: WireRecord | undefined) {
  return {
    inputTokens: asNumber(usage?.input_tokens) ?? 0,
    outputTokens: asNumber(usage?.output_tokens) ?? 0,
    cacheReadTokens: asNumber(usage?.cache_read_input_tokens) ?? 0,
    cacheCreationTokens: asNumber(usage?.cache_creation_input_tokens) ?? 0,
  };
}

// ============================================
// ADAPTER
// ============================================

export class AnthropicAdapter implements ProviderAdapter {
  readonly id = "anthropic" as const;
  readonly defaultBaseUrl = "https://api.anthropic.com";
  readonly capabilities: ProviderCapabilitySet = {
    streaming: true,
    toolCalls: true,
    thinking: { style: "budget", parameter: "thinking.budget_tokens", defaultBudget: 10_000, minBudget: 1024, maxBudget: 128_000 },
  };

  toWire(
    request: CanonicalRequest,
    capabilities: ProviderCapabilitySet = this.capabilities,
    options: WireOptions = {},
  ): ProviderWireRequest {
    const body: JsonObject = {
      model: request.model,
      messages: formatMessagesForAnthropic(request.messages),
      max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
    };

    const system = systemBlocks(request.messages);
    if (system.length > 0) body.system = system;

    if (resolveTools(request, capabilities, this.id) && request.tools) {
      const tools = request.tools.map((t): JsonObject => ({
        name: t.name,
        description: t.description,
        input_schema: t.inputSchema,
      }));
      const last = tools[tools.length - 1];
      if (last) last.cache_control = { type: "ephemeral" };
      body.tools = tools;
    }

    const thinking = resolveThinking(request, capabilities, this.id);
    if (thinking?.style === "budget" && request.thinking) {
      const budget = clampBudget(thinking, request.thinking.budgetTokens);
      body.thinking = { type: "enabled", budget_tokens: budget };
      // max_tokens must exceed the thinking budget; temperature is fixed while thinking
      if (typeof body.max_tokens === "number" && body.max_tokens <= budget) body.max_tokens = budget + DEFAULT_MAX_TOKENS;
    } else if (request.temperature !== undefined) {
      body.temperature = request.temperature;
    }

    if (options.stream) body.stream = true;

    return { path: "/v1/messages", body };
  }

  fromWire(raw: unknown): CanonicalResponse {
    const data = requireRecord(this.id, raw, "response");
    if (data.type === "error") {
      throw new TranslationError(this.id, `error payload in success response: ${JSON.stringify(data.error)}`);
    }
    if (!Array.isArray(data.content)) {
      throw new TranslationError(this.id, "response has no content array");
    }
    const content = parseContentBlocks(this.id, data.content);
    return {
      id: asString(data.id) ?? "",
      model: asString(data.model) ?? "",
      provider: this.id,
      message: createMessage("assistant", content),
      stopReason: toStopReason(data.stop_reason),
      usage: parseUsage(asRecord(data.usage)),
      incomplete: false,
      notes: [],
    };
  }

  createStreamState(model: string): StreamAccumulator {
    return new StreamAccumulator(this.id, model);
  }

  fromWireChunk(state: StreamAccumulator, event: SseEvent): StreamDelta[] {
    const data = parseEventData(this.id, event.data);
    const key = `block:${asNumber(data.index) ?? 0}`;

    switch (data.type) {
      case "message_start": {
        const message = asRecord(data.message);
        state.id = asString(message?.id) ?? state.id;
        state.model = asString(message?.model) ?? state.model;
        const usage = parseUsage(asRecord(message?.usage));
        state.addUsage(usage);
        return [{ type: "usage", usage: state.usage }];
      }
      case "content_block_start": {
        const block = asRecord(data.content_block);
        if (block?.type === "tool_use") {
          const id = asString(block.id) ?? "";
          const name = asString(block.name) ?? "";
          const { index } = state.startToolCall(key, id, name);
          return [{ type: "tool_call", index, id, name }];
        }
        if (block?.type === "text" && asString(block.text)) {
          const text = asString(block.text) ?? "";
          state.appendText(text, key);
          return [{ type: "text", text }];
        }
        if (block?.type === "thinking") state.appendReasoning(asString(block.thinking) ?? "", key);
        return [];
      }
      case "content_block_delta": {
        const delta = asRecord(data.delta);
        switch (delta?.type) {
          case "text_delta": {
            const text = asString(delta.text) ?? "";
            state.appendText(text, key);
            return [{ type: "text", text }];
          }
          case "thinking_delta": {
            const text = asString(delta.thinking) ?? "";
            state.appendReasoning(text, key);
            return [{ type: "reasoning", text }];
          }
          case "signature_delta":
            state.setSignature(asString(delta.signature) ?? "", key);
            return [];
          case "input_json_delta": {
            const fragment = asString(delta.partial_json) ?? "";
            const index = state.appendToolArguments(key, fragment);
            return [{ type: "tool_arguments", index, fragment }];
          }
          default:
            return [];
        }
      }
      case "message_delta": {
        const delta = asRecord(data.delta);
        const deltas: StreamDelta[] = [];
        if (delta?.stop_reason) {
          const stopReason = toStopReason(delta.stop_reason);
          state.setStopReason(stopReason);
          deltas.push({ type: "stop", stopReason });
        }
        const outputTokens = asNumber(asRecord(data.usage)?.output_tokens);
        if (outputTokens !== undefined) {
          state.addUsage({ outputTokens });
          deltas.push({ type: "usage", usage: state.usage });
        }
        return deltas;
      }
      case "message_stop":
        state.markComplete();
        return [];
      case "error": {
        const error = asRecord(data.error);
        throw new UpstreamError(this.id, 0, `${asString(error?.type) ?? "error"}: ${asString(error?.message) ?? ""}`);
      }
      default:
        // ping, content_block_stop
        return [];
    }
  }

  headers(apiKey: string | undefined): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "anthropic-version": "2023-06-01",
    };
    if (apiKey) headers["x-api-key"] = apiKey;
    return headers;
  }
}
