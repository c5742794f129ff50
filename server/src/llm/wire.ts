/**
 * Narrowing helpers for untyped provider payloads.
 */

import type { JsonObject, JsonValue } from "../canonical/types.js";
import { TranslationError } from "../errors.js";

export type WireRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is WireRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): WireRecord | undefined {
  return isRecord(value) ? value : undefined;
}

export function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function asNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/** Require a record at the top of a payload */
export function requireRecord(provider: string, value: unknown, what: string): WireRecord {
  if (!isRecord(value)) {
    throw new TranslationError(provider, `expected ${what} to be an object`);
  }
  return value;
}

/** Parse one SSE data payload; malformed JSON is a TranslationError */
export function parseEventData(provider: string, data: string): WireRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (err) {
    throw new TranslationError(provider, `stream event is not JSON: ${data.slice(0, 120)}`, { cause: err });
  }
  return requireRecord(provider, parsed, "stream event");
}

/**
 * Write `value` at a dotted path, creating intermediate objects.
 * setPath(body, "thinking.budget_tokens", 2048)
 */
export function setPath(target: JsonObject, path: string, value: JsonValue): void {
  const keys = path.split(".");
  const last = keys.pop();
  if (last === undefined) return;
  let cursor: JsonObject = target;
  for (const key of keys) {
    const next = cursor[key];
    if (typeof next === "object" && next !== null && !Array.isArray(next)) {
      cursor = next;
    } else {
      const created: JsonObject = {};
      cursor[key] = created;
      cursor = created;
    }
  }
  cursor[last] = value;
}
