/**
 * Hook Engine Types
 *
 * Lifecycle events, handler outputs and the resolution an event dispatch
 * produces. Events are a closed tagged union keyed by `kind`.
 */

import type { JsonObject, JsonValue } from "../canonical/types.js";

// ============================================
// EVENTS
// ============================================

export const HOOK_EVENT_KINDS = [
  "session_start",
  "session_end",
  "user_prompt_submit",
  "pre_tool_use",
  "post_tool_use",
  "post_tool_use_failure",
  "stop",
  "subagent_start",
  "subagent_stop",
  "pre_compact",
  "permission_request",
  "notification",
] as const;

export type HookEventKind = (typeof HOOK_EVENT_KINDS)[number];

/** Names used in hook config files and sent to handlers as hook_event_name */
export const HOOK_EVENT_NAMES: Record<HookEventKind, string> = {
  session_start: "SessionStart",
  session_end: "SessionEnd",
  user_prompt_submit: "UserPromptSubmit",
  pre_tool_use: "PreToolUse",
  post_tool_use: "PostToolUse",
  post_tool_use_failure: "PostToolUseFailure",
  stop: "Stop",
  subagent_start: "SubagentStart",
  subagent_stop: "SubagentStop",
  pre_compact: "PreCompact",
  permission_request: "PermissionRequest",
  notification: "Notification",
};

export type PermissionMode = "default" | "plan" | "acceptEdits" | "bypassPermissions";

export interface HookEventPayloads {
  session_start: { source: "startup" | "resume" };
  session_end: { reason: string };
  user_prompt_submit: { prompt: string };
  pre_tool_use: { toolName: string; toolInput: JsonObject; toolUseId: string };
  post_tool_use: { toolName: string; toolInput: JsonObject; toolUseId: string; toolOutput: string };
  post_tool_use_failure: { toolName: string; toolInput: JsonObject; toolUseId: string; error: string };
  stop: { reason?: string };
  subagent_start: { agentId: string; agentType: string };
  subagent_stop: { agentId: string; reason?: string };
  pre_compact: { trigger: "auto" | "manual"; currentSize: number; budget: number };
  permission_request: { toolName: string; toolInput: JsonObject };
  notification: { message: string; level: "info" | "warn" | "error" };
}

export interface HookEventCommon {
  sessionId: string;
  cwd: string;
  permissionMode: PermissionMode;
}

export type HookEventOf<K extends HookEventKind> = HookEventCommon & {
  kind: K;
  payload: HookEventPayloads[K];
};

export type HookEvent = { [K in HookEventKind]: HookEventOf<K> }[HookEventKind];

export function createHookEvent<K extends HookEventKind>(
  kind: K,
  common: HookEventCommon,
  payload: HookEventPayloads[K],
): HookEventOf<K> {
  return { ...common, kind, payload };
}

export function isHookEventKind(value: string): value is HookEventKind {
  return HOOK_EVENT_KINDS.some((kind) => kind === value);
}

// ============================================
// HANDLER OUTPUT
// ============================================

export type PermissionDecision = "allow" | "deny" | "ask";

export interface HookOutput {
  /** false stops the exchange */
  continue: boolean;
  stopReason?: string;
  suppressOutput: boolean;
  systemMessage?: string;
  /** Extra context for the model, injected like a system message */
  additionalContext?: string;
  /** pre_tool_use / permission_request */
  decision?: PermissionDecision;
  /** Explanation accompanying a decision */
  reason?: string;
  /** Replacement tool input (object) or replacement prompt (string) */
  updatedInput?: JsonValue;
}

export type HandlerOutcome =
  | { type: "ok"; output: HookOutput }
  | { type: "blocking"; reason: string }
  | { type: "failed"; error: Error };

export const outcome = {
  ok: (output: HookOutput): HandlerOutcome => ({ type: "ok", output }),
  blocking: (reason: string): HandlerOutcome => ({ type: "blocking", reason }),
  failed: (error: Error): HandlerOutcome => ({ type: "failed", error }),
};

export interface HookHandler {
  readonly id: string;
  readonly kind: "command" | "prompt";
  readonly timeoutMs: number;
  run(event: HookEvent, signal: AbortSignal): Promise<HandlerOutcome>;
}

// ============================================
// CONFIGURATION
// ============================================

export type HookSpec =
  | { type: "command"; command: string; timeoutMs?: number }
  | { type: "prompt"; prompt: string; timeoutMs?: number };

export interface HookMatcherGroup {
  /** Regex matched against the event's subject; empty or "*" matches all */
  matcher?: string;
  hooks: HookSpec[];
}

export type HooksConfig = Partial<Record<HookEventKind, HookMatcherGroup[]>>;

// ============================================
// RESOLUTION
// ============================================

export interface HookFailure {
  handlerId: string;
  error: Error;
}

export interface HookResolution {
  event: HookEvent;
  outcome: "proceed" | "blocked";
  /** Why the event was blocked */
  reason?: string;
  permission?: PermissionDecision;
  /** Reason given by the handler whose decision won */
  permissionReason?: string;
  updatedInput?: JsonValue;
  systemMessages: string[];
  suppressOutput: boolean;
  failures: HookFailure[];
}
