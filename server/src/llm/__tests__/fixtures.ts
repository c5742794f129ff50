/**
 * Shared request builders and wire-narrowing helpers for adapter tests.
 */

import type { CanonicalRequest, Message, ThinkingRequest, ToolDefinition } from "../../canonical/types.js";
import { createMessage, userText } from "../../canonical/messages.js";
import { isRecord, type WireRecord } from "../wire.js";
import type { SseEvent } from "../types.js";

export const READ_TOOL: ToolDefinition = {
  name: "Read",
  description: "Read a file",
  inputSchema: { type: "object", properties: { path: { type: "string" } }, required: ["path"] },
};

export function makeRequest(
  messages: Message[],
  extra: { model?: string; thinking?: ThinkingRequest; tools?: ToolDefinition[]; temperature?: number; maxTokens?: number } = {},
): CanonicalRequest {
  return {
    model: extra.model ?? "test-model",
    messages,
    tools: extra.tools,
    thinking: extra.thinking,
    temperature: extra.temperature,
    maxTokens: extra.maxTokens,
    metadata: { degradations: [] },
  };
}

export function assistantWithCall(): Message {
  return createMessage("assistant", [
    { type: "text", text: "Let me check." },
    { type: "tool_call", id: "call_abc", name: "Read", input: { path: "README.md" } },
  ]);
}

export function conversation(): Message[] {
  return [userText("What is in the readme?"), assistantWithCall()];
}

export function record(value: unknown): WireRecord {
  if (!isRecord(value)) throw new Error(`expected object, got ${JSON.stringify(value)}`);
  return value;
}

export function list(value: unknown): unknown[] {
  if (!Array.isArray(value)) throw new Error(`expected array, got ${JSON.stringify(value)}`);
  return value;
}

export function last<T>(items: T[]): T {
  const item = items[items.length - 1];
  if (item === undefined) throw new Error("empty list");
  return item;
}

export function sse(data: unknown): SseEvent {
  return { data: typeof data === "string" ? data : JSON.stringify(data) };
}

export function byteStream(chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
      controller.close();
    },
  });
}
