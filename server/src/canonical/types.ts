/**
 * Canonical Message Model
 *
 * Provider-independent representation of a conversation. Every adapter
 * translates to and from these types; nothing else in the gateway sees a
 * provider's wire format.
 */

// ============================================
// JSON
// ============================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// ============================================
// MESSAGES
// ============================================

export type Role = "user" | "assistant" | "system" | "tool";

export interface TextSegment {
  type: "text";
  text: string;
}

export interface ToolCallSegment {
  type: "tool_call";
  /** Provider-assigned (or synthesized) call id, echoed back by the matching result */
  id: string;
  name: string;
  input: JsonObject;
}

export interface ToolResultSegment {
  type: "tool_result";
  toolCallId: string;
  content: string;
  isError?: boolean;
}

export interface ReasoningSegment {
  type: "reasoning";
  text: string;
  /** Opaque signature some providers require echoed back with the block */
  signature?: string;
}

export interface AttachmentSegment {
  type: "attachment";
  /** Stable reference (path, URL or content hash) */
  ref: string;
  mediaType: string;
  /** Base64 payload when the attachment is inlined */
  data?: string;
  name?: string;
}

export type ContentSegment =
  | TextSegment
  | ToolCallSegment
  | ToolResultSegment
  | ReasoningSegment
  | AttachmentSegment;

export interface Message {
  readonly id: string;
  readonly role: Role;
  readonly content: readonly ContentSegment[];
}

// ============================================
// TURNS
// ============================================

export type TurnKind = "verbatim" | "summary";

export interface Turn {
  readonly id: string;
  readonly kind: TurnKind;
  readonly messages: readonly Message[];
  /** ISO timestamp */
  readonly createdAt: string;
  /** Estimated size in budget units */
  readonly size: number;
}

// ============================================
// REQUESTS & RESPONSES
// ============================================

export interface ToolDefinition {
  name: string;
  description: string;
  /** JSON Schema for the tool input */
  inputSchema: JsonObject;
}

export type ReasoningEffort = "low" | "medium" | "high";

export interface ThinkingRequest {
  enabled: boolean;
  budgetTokens?: number;
  effort?: ReasoningEffort;
  /** Keep earlier reasoning visible to the model on later turns */
  preserveAcrossTurns?: boolean;
}

export interface CapabilityDegradation {
  feature: "thinking" | "tools" | "attachments";
  provider: string;
  detail: string;
}

export interface RequestMetadata {
  /** Appended by adapters when a requested feature was dropped */
  degradations: CapabilityDegradation[];
  sessionId?: string;
}

export interface CanonicalRequest {
  model: string;
  messages: readonly Message[];
  tools?: readonly ToolDefinition[];
  temperature?: number;
  maxTokens?: number;
  thinking?: ThinkingRequest;
  metadata: RequestMetadata;
}

export type StopReason = "end_turn" | "tool_use" | "max_tokens" | "content_filter" | "unknown";

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  cacheReadTokens: number;
  cacheCreationTokens: number;
}

export interface CanonicalResponse {
  id: string;
  model: string;
  provider: string;
  message: Message;
  stopReason: StopReason;
  usage: TokenUsage;
  /** True when a stream ended without its terminal event */
  incomplete: boolean;
  notes: string[];
}

export function emptyUsage(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0, cacheReadTokens: 0, cacheCreationTokens: 0 };
}

export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
    cacheReadTokens: a.cacheReadTokens + b.cacheReadTokens,
    cacheCreationTokens: a.cacheCreationTokens + b.cacheCreationTokens,
  };
}
