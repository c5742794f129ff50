/**
 * OpenAI-Compatible Format Helpers
 *
 * Conversion between canonical messages and the chat completions message
 * shape shared by OpenAI, DeepSeek, Qwen, GLM and self-hosted servers.
 */

import type { ContentSegment, JsonObject, JsonValue, Message, ToolDefinition } from "../../../canonical/types.js";
import { textOf, reasoningOf } from "../../../canonical/messages.js";

export interface FormatOptions {
  /** Send assistant reasoning back as `reasoning_content` */
  echoReasoning: boolean;
}

function userContent(segments: readonly ContentSegment[]): JsonValue {
  const hasAttachment = segments.some((s) => s.type === "attachment");
  if (!hasAttachment) {
    return segments.filter((s) => s.type === "text").map((s) => (s.type === "text" ? s.text : "")).join("");
  }
  const parts: JsonObject[] = [];
  for (const segment of segments) {
    if (segment.type === "text") {
      parts.push({ type: "text", text: segment.text });
    } else if (segment.type === "attachment") {
      if (segment.data && segment.mediaType.startsWith("image/")) {
        parts.push({ type: "image_url", image_url: { url: `data:${segment.mediaType};base64,${segment.data}` } });
      } else {
        parts.push({ type: "text", text: `[attachment: ${segment.name ?? segment.ref}]` });
      }
    }
  }
  return parts;
}

/**
 * Format canonical messages for the chat completions API. A tool message
 * carrying several results expands into one wire message per result.
 */
export function formatMessagesForAPI(messages: readonly Message[], options: FormatOptions): JsonObject[] {
  const result: JsonObject[] = [];

  for (const m of messages) {
    switch (m.role) {
      case "system":
        result.push({ role: "system", content: textOf(m) });
        break;
      case "user": {
        // Tool results riding on a user message still go out as tool messages
        for (const segment of m.content) {
          if (segment.type === "tool_result") {
            result.push({ role: "tool", tool_call_id: segment.toolCallId, content: segment.content });
          }
        }
        const rest = m.content.filter((s) => s.type !== "tool_result");
        if (rest.length > 0) result.push({ role: "user", content: userContent(rest) });
        break;
      }
      case "assistant": {
        const text = textOf(m);
        const msg: JsonObject = { role: "assistant", content: text.length > 0 ? text : null };
        const toolCalls = m.content.flatMap((s): JsonObject[] =>
          s.type === "tool_call"
            ? [{ id: s.id, type: "function", function: { name: s.name, arguments: JSON.stringify(s.input) } }]
            : [],
        );
        if (toolCalls.length > 0) msg.tool_calls = toolCalls;
        if (options.echoReasoning) {
          const reasoning = reasoningOf(m).map((r) => r.text).join("");
          if (reasoning) msg.reasoning_content = reasoning;
        }
        result.push(msg);
        break;
      }
      case "tool":
        for (const segment of m.content) {
          if (segment.type === "tool_result") {
            result.push({ role: "tool", tool_call_id: segment.toolCallId, content: segment.content });
          }
        }
        break;
    }
  }

  return result;
}

export function formatTools(tools: readonly ToolDefinition[]): JsonObject[] {
  return tools.map((t) => ({
    type: "function",
    function: { name: t.name, description: t.description, parameters: t.inputSchema },
  }));
}
