/**
 * Gemini Format Helpers
 *
 * Gemini uses "user" and "model" roles, carries system text as a separate
 * systemInstruction, and represents tool calls as functionCall /
 * functionResponse parts. Function responses are matched by name, so the
 * name of every call is tracked while formatting.
 */

import type { ContentSegment, JsonObject, Message, ToolDefinition } from "../../../canonical/types.js";
import { textOf } from "../../../canonical/messages.js";

// Monotonic counter for synthesized tool call ids
let toolCallCounter = 0;

export function nextToolCallId(functionName: string): string {
  return `call_${functionName}_${++toolCallCounter}`;
}

export function toGeminiFunctionDeclarations(tools: readonly ToolDefinition[]): JsonObject[] {
  return tools.map((t) => ({ name: t.name, description: t.description, parameters: t.inputSchema }));
}

function userParts(segments: readonly ContentSegment[]): JsonObject[] {
  const parts: JsonObject[] = [];
  for (const segment of segments) {
    if (segment.type === "text") {
      parts.push({ text: segment.text });
    } else if (segment.type === "attachment") {
      parts.push(segment.data
        ? { inlineData: { mimeType: segment.mediaType, data: segment.data } }
        : { text: `[attachment: ${segment.name ?? segment.ref}]` });
    }
  }
  return parts;
}

export interface GeminiFormatOptions {
  /** Replay reasoning as thought parts */
  includeThoughts: boolean;
}

export function formatContentsForGemini(messages: readonly Message[], options: GeminiFormatOptions): JsonObject[] {
  const contents: JsonObject[] = [];
  const callNames = new Map<string, string>();

  const responsePart = (segment: Extract<ContentSegment, { type: "tool_result" }>): JsonObject => ({
    functionResponse: {
      id: segment.toolCallId,
      name: callNames.get(segment.toolCallId) ?? segment.toolCallId,
      response: segment.isError ? { error: segment.content } : { content: segment.content },
    },
  });

  for (const m of messages) {
    if (m.role === "system") continue;

    if (m.role === "assistant") {
      const parts: JsonObject[] = [];
      for (const segment of m.content) {
        if (segment.type === "reasoning" && options.includeThoughts) {
          parts.push({ text: segment.text, thought: true });
        } else if (segment.type === "text" && segment.text) {
          parts.push({ text: segment.text });
        } else if (segment.type === "tool_call") {
          callNames.set(segment.id, segment.name);
          parts.push({ functionCall: { id: segment.id, name: segment.name, args: segment.input } });
        }
      }
      if (parts.length > 0) contents.push({ role: "model", parts });
      continue;
    }

    const parts: JsonObject[] = [];
    for (const segment of m.content) {
      if (segment.type === "tool_result") parts.push(responsePart(segment));
    }
    parts.push(...userParts(m.content));
    if (parts.length === 0) continue;

    // Consecutive user-side contents are merged; Gemini rejects back-to-back user turns
    const previous = contents[contents.length - 1];
    if (previous?.role === "user" && Array.isArray(previous.parts)) {
      previous.parts.push(...parts);
    } else {
      contents.push({ role: "user", parts });
    }
  }

  return contents;
}

export function extractSystemInstruction(messages: readonly Message[]): string | null {
  const texts = messages.filter((m) => m.role === "system").map(textOf).filter(Boolean);
  return texts.length > 0 ? texts.join("\n\n") : null;
}
