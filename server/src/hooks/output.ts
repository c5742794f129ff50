/**
 * Hook output parsing and wire input encoding.
 *
 * Handlers may answer in snake_case, camelCase, or with the nested
 * `hookSpecificOutput` form; unknown keys are ignored.
 */

import type { JsonObject } from "../canonical/types.js";
import { isJsonObject, toJsonValue } from "../canonical/messages.js";
import { HOOK_EVENT_NAMES, type HookEvent, type HookOutput, type PermissionDecision } from "./types.js";

const DECISIONS: Record<string, PermissionDecision> = {
  allow: "allow",
  approve: "allow",
  deny: "deny",
  block: "deny",
  ask: "ask",
};

export function defaultHookOutput(): HookOutput {
  return { continue: true, suppressOutput: false };
}

function pick(source: JsonObject, ...keys: string[]) {
  for (const key of keys) {
    if (key in source) return source[key];
  }
  return undefined;
}

function pickString(source: JsonObject, ...keys: string[]): string | undefined {
  const value = pick(source, ...keys);
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function toDecision(value: unknown): PermissionDecision | undefined {
  if (typeof value !== "string") return undefined;
  const key = value.toLowerCase();
  return Object.hasOwn(DECISIONS, key) ? DECISIONS[key] : undefined;
}

export function parseHookOutput(raw: unknown): HookOutput {
  const output = defaultHookOutput();
  if (!isJsonObject(raw)) return output;

  if (pick(raw, "continue") === false) output.continue = false;
  if (pick(raw, "suppress_output", "suppressOutput") === true) output.suppressOutput = true;
  output.stopReason = pickString(raw, "stop_reason", "stopReason");
  output.systemMessage = pickString(raw, "system_message", "systemMessage");
  output.additionalContext = pickString(raw, "additional_context", "additionalContext");
  output.decision = toDecision(pick(raw, "decision", "permission_decision", "permissionDecision"));
  output.reason = pickString(raw, "reason", "permission_decision_reason", "permissionDecisionReason");
  const updated = pick(raw, "updated_input", "updatedInput");
  if (updated !== undefined && updated !== null) output.updatedInput = updated;

  const specific = pick(raw, "hookSpecificOutput", "hook_specific_output");
  if (isJsonObject(specific)) {
    output.decision = toDecision(pick(specific, "permissionDecision", "permission_decision")) ?? output.decision;
    output.reason = pickString(specific, "permissionDecisionReason", "permission_decision_reason") ?? output.reason;
    output.additionalContext = pickString(specific, "additionalContext", "additional_context") ?? output.additionalContext;
    const nested = pick(specific, "updatedInput", "updated_input");
    if (nested !== undefined && nested !== null) output.updatedInput = nested;
  }

  return output;
}

function snakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
}

/** The JSON object a handler receives on stdin or in its prompt */
export function toWireInput(event: HookEvent): JsonObject {
  const input: JsonObject = {
    session_id: event.sessionId,
    cwd: event.cwd,
    permission_mode: event.permissionMode,
    hook_event_name: HOOK_EVENT_NAMES[event.kind],
  };
  for (const [key, value] of Object.entries(event.payload)) {
    if (value !== undefined) input[snakeCase(key)] = toJsonValue(value);
  }
  return input;
}
