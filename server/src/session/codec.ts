/**
 * Turn (de)serialization for the session tables.
 */

import { nanoid } from "nanoid";
import {
  createMessage,
  estimateMessagesSize,
  isJsonObject,
  type AttachmentSegment,
  type ContentSegment,
  type JsonObject,
  type JsonValue,
  type Message,
  type Role,
  type Turn,
  type TurnKind,
} from "../canonical/index.js";

const ROLES: readonly Role[] = ["user", "assistant", "system", "tool"];

export function newTurnId(): string {
  return `turn_${nanoid(12)}`;
}

export function createTurn(messages: readonly Message[], kind: TurnKind = "verbatim", createdAt = new Date().toISOString()): Turn {
  return Object.freeze({
    id: newTurnId(),
    kind,
    messages: Object.freeze([...messages]),
    createdAt,
    size: estimateMessagesSize(messages),
  });
}

export function encodeMessages(messages: readonly Message[]): string {
  return JSON.stringify(messages);
}

function stringField(obj: JsonObject, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

function decodeSegment(value: JsonValue): ContentSegment | null {
  if (!isJsonObject(value)) return null;
  const type = stringField(value, "type");
  switch (type) {
    case "text": {
      const text = stringField(value, "text");
      return text === undefined ? null : { type, text };
    }
    case "reasoning": {
      const text = stringField(value, "text");
      if (text === undefined) return null;
      const signature = stringField(value, "signature");
      return signature === undefined ? { type, text } : { type, text, signature };
    }
    case "tool_call": {
      const id = stringField(value, "id");
      const name = stringField(value, "name");
      const input = value.input;
      if (id === undefined || name === undefined || !isJsonObject(input)) return null;
      return { type, id, name, input };
    }
    case "tool_result": {
      const toolCallId = stringField(value, "toolCallId");
      const content = stringField(value, "content");
      if (toolCallId === undefined || content === undefined) return null;
      return value.isError === true ? { type, toolCallId, content, isError: true } : { type, toolCallId, content };
    }
    case "attachment": {
      const ref = stringField(value, "ref");
      const mediaType = stringField(value, "mediaType");
      if (ref === undefined || mediaType === undefined) return null;
      const segment: AttachmentSegment = { type, ref, mediaType };
      const data = stringField(value, "data");
      const name = stringField(value, "name");
      if (data !== undefined) segment.data = data;
      if (name !== undefined) segment.name = name;
      return segment;
    }
    default:
      return null;
  }
}

function decodeMessage(value: JsonValue): Message {
  if (!isJsonObject(value)) throw new Error("Stored message is not an object");
  const id = stringField(value, "id");
  const role = ROLES.find((r) => r === value.role);
  const content = value.content;
  if (id === undefined || role === undefined || !Array.isArray(content)) {
    throw new Error(`Stored message ${id ?? "(no id)"} is malformed`);
  }
  const segments = content.map((raw) => {
    const segment = decodeSegment(raw);
    if (!segment) throw new Error(`Stored message ${id} has a malformed segment`);
    return segment;
  });
  return createMessage(role, segments, id);
}

export function decodeMessages(json: string): Message[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) throw new Error("Stored turn is not a message list");
  return parsed.map((item: JsonValue) => decodeMessage(item));
}

export function decodeTurn(row: { turn_id: string; kind: TurnKind; messages: string; size: number; created_at: string }): Turn {
  return Object.freeze({
    id: row.turn_id,
    kind: row.kind,
    messages: Object.freeze(decodeMessages(row.messages)),
    createdAt: row.created_at,
    size: row.size,
  });
}
