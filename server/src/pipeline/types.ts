/**
 * Exchange Pipeline Types
 */

import type {
  AttachmentSegment,
  CanonicalResponse,
  CapabilityDegradation,
  JsonObject,
  ThinkingRequest,
  ToolDefinition,
  Turn,
} from "../canonical/index.js";
import type { CompactionOutcome } from "../compaction/index.js";
import type { TranslationError } from "../errors.js";
import type { HookEventKind, PermissionDecision } from "../hooks/index.js";
import type { StreamDelta } from "../llm/index.js";

// ============================================
// TOOLS
// ============================================

export interface ToolCallRequest {
  id: string;
  name: string;
  input: JsonObject;
}

export interface ToolExecutionResult {
  content: string;
  isError?: boolean;
}

/** Runs allowed tool calls inside the gateway. Without one, calls go back to the client. */
export interface ToolExecutor {
  readonly tools: readonly ToolDefinition[];
  execute(call: ToolCallRequest, signal: AbortSignal): Promise<ToolExecutionResult | string>;
}

/** How pre_tool_use hooks ruled on one call */
export interface ToolDecision {
  toolCallId: string;
  name: string;
  /** Input after any hook rewrite */
  input: JsonObject;
  permission: PermissionDecision;
  reason?: string;
  executed: boolean;
}

// ============================================
// EXCHANGE
// ============================================

/** Result of a tool the client ran for a call returned earlier */
export interface ClientToolResult {
  toolCallId: string;
  content: string;
  isError?: boolean;
}

export interface ExchangeInput {
  /** User prompt; may be empty when only tool results are sent */
  content?: string;
  attachments?: AttachmentSegment[];
  toolResults?: ClientToolResult[];
  /** Overrides the session's model for this exchange */
  model?: string;
  thinking?: ThinkingRequest;
  maxTokens?: number;
  temperature?: number;
  /** Tools the client can run; ignored when the gateway has an executor */
  tools?: ToolDefinition[];
}

export interface ExchangeOptions {
  signal?: AbortSignal;
  /** Stream deltas as they arrive; without it the call is non-streaming */
  onDelta?: (delta: StreamDelta) => void;
}

export type ExchangeResult =
  | {
      status: "completed";
      turn: Turn;
      response: CanonicalResponse;
      degradations: CapabilityDegradation[];
      hookMessages: string[];
      toolDecisions: ToolDecision[];
      compactions: CompactionOutcome[];
      /** Model calls made, one per tool round */
      rounds: number;
    }
  | { status: "blocked"; reason: string; event: HookEventKind }
  | { status: "degraded"; error: TranslationError }
  | { status: "cancelled" };
