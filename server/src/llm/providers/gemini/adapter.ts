/**
 * Gemini Adapter
 *
 * generateContent / streamGenerateContent. Streamed chunks are whole
 * GenerateContentResponse objects; the final one carries finishReason.
 */

import type {
  CanonicalRequest,
  CanonicalResponse,
  ContentSegment,
  JsonObject,
  StopReason,
  TokenUsage,
} from "../../../canonical/types.js";
import { createMessage, toJsonObject } from "../../../canonical/messages.js";
import { TranslationError, UpstreamError } from "../../../errors.js";
import { clampBudget, resolveThinking, resolveTools } from "../../capabilities.js";
import { StreamAccumulator } from "../../stream.js";
import type {
  ProviderAdapter,
  ProviderCapabilitySet,
  ProviderWireRequest,
  SseEvent,
  StreamDelta,
  WireOptions,
} from "../../types.js";
import { asArray, asNumber, asRecord, asString, parseEventData, requireRecord, setPath, type WireRecord } from "../../wire.js";
import {
  extractSystemInstruction,
  formatContentsForGemini,
  nextToolCallId,
  toGeminiFunctionDeclarations,
} from "./format.js";

const FINISH_REASONS: Record<string, StopReason> = {
  STOP: "end_turn",
  MAX_TOKENS: "max_tokens",
  SAFETY: "content_filter",
  RECITATION: "content_filter",
  BLOCKLIST: "content_filter",
  PROHIBITED_CONTENT: "content_filter",
  SPII: "content_filter",
};

function toStopReason(value: unknown, hasToolCalls: boolean): StopReason {
  const key = asString(value);
  if (key === "STOP" && hasToolCalls) return "tool_use";
  return (key && FINISH_REASONS[key]) || "unknown";
}

function parseUsage(meta: WireRecord | undefined): TokenUsage {
  return {
    inputTokens: asNumber(meta?.promptTokenCount) ?? 0,
    outputTokens: (asNumber(meta?.candidatesTokenCount) ?? 0) + (asNumber(meta?.thoughtsTokenCount) ?? 0),
    cacheReadTokens: asNumber(meta?.cachedContentTokenCount) ?? 0,
    cacheCreationTokens: 0,
  };
}

interface ParsedPart {
  segment: ContentSegment;
}

function parsePart(provider: string, raw: unknown): ParsedPart | null {
  const part = requireRecord(provider, raw, "content part");
  const call = asRecord(part.functionCall);
  if (call) {
    const name = asString(call.name);
    if (!name) throw new TranslationError(provider, "functionCall without name");
    const args = asRecord(call.args);
    return {
      segment: {
        type: "tool_call",
        id: asString(call.id) ?? nextToolCallId(name),
        name,
        input: args ? toJsonObject(args) : {},
      },
    };
  }
  const text = asString(part.text);
  if (text === undefined) return null;
  if (part.thought === true) {
    const signature = asString(part.thoughtSignature);
    return { segment: signature ? { type: "reasoning", text, signature } : { type: "reasoning", text } };
  }
  return { segment: { type: "text", text } };
}

export class GeminiAdapter implements ProviderAdapter {
  readonly id = "google" as const;
  readonly defaultBaseUrl = "https://generativelanguage.googleapis.com/v1beta";
  readonly capabilities: ProviderCapabilitySet = {
    streaming: true,
    toolCalls: true,
    thinking: {
      style: "budget",
      parameter: "generationConfig.thinkingConfig.thinkingBudget",
      defaultBudget: 8192,
      minBudget: 128,
      maxBudget: 32_768,
    },
  };

  toWire(
    request: CanonicalRequest,
    capabilities: ProviderCapabilitySet = this.capabilities,
    options: WireOptions = {},
  ): ProviderWireRequest {
    const body: JsonObject = {
      contents: formatContentsForGemini(request.messages, {
        includeThoughts: request.thinking?.preserveAcrossTurns === true,
      }),
    };

    const system = extractSystemInstruction(request.messages);
    if (system) body.systemInstruction = { parts: [{ text: system }] };

    if (resolveTools(request, capabilities, this.id) && request.tools) {
      body.tools = [{ functionDeclarations: toGeminiFunctionDeclarations(request.tools) }];
    }

    if (request.temperature !== undefined) setPath(body, "generationConfig.temperature", request.temperature);
    if (request.maxTokens !== undefined) setPath(body, "generationConfig.maxOutputTokens", request.maxTokens);

    const thinking = resolveThinking(request, capabilities, this.id);
    if (thinking?.style === "budget" && request.thinking) {
      setPath(body, thinking.parameter, clampBudget(thinking, request.thinking.budgetTokens));
      setPath(body, "generationConfig.thinkingConfig.includeThoughts", true);
    }

    const model = encodeURIComponent(request.model);
    return {
      path: options.stream ? `/models/${model}:streamGenerateContent?alt=sse` : `/models/${model}:generateContent`,
      body,
    };
  }

  fromWire(raw: unknown): CanonicalResponse {
    const data = requireRecord(this.id, raw, "response");
    const candidate = asRecord(asArray(data.candidates)[0]);
    if (!candidate) {
      const feedback = asRecord(data.promptFeedback);
      if (feedback?.blockReason) {
        return this.emptyResponse(data, "content_filter", `prompt blocked: ${String(feedback.blockReason)}`);
      }
      throw new TranslationError(this.id, "response has no candidates");
    }

    const content: ContentSegment[] = [];
    for (const rawPart of asArray(asRecord(candidate.content)?.parts)) {
      const parsed = parsePart(this.id, rawPart);
      if (parsed) content.push(parsed.segment);
    }

    const hasToolCalls = content.some((s) => s.type === "tool_call");
    return {
      id: asString(data.responseId) ?? "",
      model: asString(data.modelVersion) ?? "",
      provider: this.id,
      message: createMessage("assistant", content),
      stopReason: toStopReason(candidate.finishReason, hasToolCalls),
      usage: parseUsage(asRecord(data.usageMetadata)),
      incomplete: false,
      notes: [],
    };
  }

  createStreamState(model: string): StreamAccumulator {
    return new StreamAccumulator(this.id, model);
  }

  fromWireChunk(state: StreamAccumulator, event: SseEvent): StreamDelta[] {
    const data = parseEventData(this.id, event.data);
    const deltas: StreamDelta[] = [];

    const error = asRecord(data.error);
    if (error) {
      throw new UpstreamError(this.id, asNumber(error.code) ?? 0, asString(error.message) ?? JSON.stringify(error));
    }

    state.id = asString(data.responseId) ?? state.id;
    state.model = asString(data.modelVersion) ?? state.model;

    const candidate = asRecord(asArray(data.candidates)[0]);
    for (const rawPart of asArray(asRecord(candidate?.content)?.parts)) {
      const parsed = parsePart(this.id, rawPart);
      if (!parsed) continue;
      const segment = parsed.segment;
      switch (segment.type) {
        case "text":
          state.appendText(segment.text);
          deltas.push({ type: "text", text: segment.text });
          break;
        case "reasoning":
          state.appendReasoning(segment.text);
          if (segment.signature) state.setSignature(segment.signature);
          deltas.push({ type: "reasoning", text: segment.text });
          break;
        case "tool_call": {
          const index = state.addToolCall(segment.id, segment.name, segment.input);
          deltas.push({ type: "tool_call", index, id: segment.id, name: segment.name });
          deltas.push({ type: "tool_arguments", index, fragment: JSON.stringify(segment.input) });
          break;
        }
        default:
          break;
      }
    }

    const usage = asRecord(data.usageMetadata);
    if (usage) {
      state.addUsage(parseUsage(usage));
      deltas.push({ type: "usage", usage: state.usage });
    }

    if (candidate?.finishReason) {
      const stopReason = toStopReason(candidate.finishReason, state.toolCallCount > 0);
      state.setStopReason(stopReason);
      state.markComplete();
      deltas.push({ type: "stop", stopReason });
    }

    return deltas;
  }

  headers(apiKey: string | undefined): Record<string, string> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (apiKey) headers["x-goog-api-key"] = apiKey;
    return headers;
  }

  private emptyResponse(data: WireRecord, stopReason: StopReason, note: string): CanonicalResponse {
    return {
      id: asString(data.responseId) ?? "",
      model: asString(data.modelVersion) ?? "",
      provider: this.id,
      message: createMessage("assistant", []),
      stopReason,
      usage: parseUsage(asRecord(data.usageMetadata)),
      incomplete: false,
      notes: [note],
    };
  }
}
