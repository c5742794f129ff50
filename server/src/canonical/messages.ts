/**
 * Message construction and inspection helpers.
 */

import { nanoid } from "nanoid";
import type {
  ContentSegment,
  JsonObject,
  JsonValue,
  Message,
  Role,
  ToolCallSegment,
  ToolResultSegment,
  ReasoningSegment,
  TextSegment,
} from "./types.js";

export function newMessageId(): string {
  return `msg_${nanoid(12)}`;
}

function freezeJson(value: JsonValue): void {
  if (typeof value !== "object" || value === null) return;
  for (const item of Object.values(value)) freezeJson(item);
  Object.freeze(value);
}

function freezeSegment(segment: ContentSegment): ContentSegment {
  if (segment.type === "tool_call") {
    const input = structuredClone(segment.input);
    freezeJson(input);
    return Object.freeze({ ...segment, input });
  }
  return Object.freeze({ ...segment });
}

/**
 * Build an immutable message. Segments (and tool inputs) are copied, so the
 * caller's objects stay mutable.
 */
export function createMessage(role: Role, content: readonly ContentSegment[], id: string = newMessageId()): Message {
  return Object.freeze({
    id,
    role,
    content: Object.freeze(content.map(freezeSegment)),
  });
}

export function userText(text: string): Message {
  return createMessage("user", [{ type: "text", text }]);
}

export function systemText(text: string): Message {
  return createMessage("system", [{ type: "text", text }]);
}

export function assistantText(text: string): Message {
  return createMessage("assistant", [{ type: "text", text }]);
}

export function toolResultMessage(toolCallId: string, content: string, isError = false): Message {
  const segment: ToolResultSegment = { type: "tool_result", toolCallId, content };
  if (isError) segment.isError = true;
  return createMessage("tool", [segment]);
}

/** Concatenated text segments, in order */
export function textOf(message: Message): string {
  return message.content
    .filter((s): s is TextSegment => s.type === "text")
    .map((s) => s.text)
    .join("");
}

export function toolCallsOf(message: Message): ToolCallSegment[] {
  return message.content.filter((s): s is ToolCallSegment => s.type === "tool_call");
}

export function reasoningOf(message: Message): ReasoningSegment[] {
  return message.content.filter((s): s is ReasoningSegment => s.type === "reasoning");
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse a JSON object string; anything else yields null */
export function parseJsonObject(text: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? toJsonObject(parsed) : null;
  } catch {
    return null;
  }
}

/** Narrow an unknown value to JSON, dropping undefined, functions and symbols */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === "object") return toJsonObject(value);
  return null;
}

export function toJsonObject(value: object): JsonObject {
  const result: JsonObject = {};
  for (const [key, item] of Object.entries(value)) {
    if (item === undefined || typeof item === "function" || typeof item === "symbol") continue;
    result[key] = toJsonValue(item);
  }
  return result;
}
