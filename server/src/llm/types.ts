/**
 * Provider Adapter Types
 *
 * One ProviderAdapter per upstream dialect. Adapters are pure translators:
 * they never perform I/O, which lives in ProviderClient.
 */

import type {
  CanonicalRequest,
  CanonicalResponse,
  JsonObject,
  ReasoningEffort,
  StopReason,
  TokenUsage,
} from "../canonical/types.js";
import type { StreamAccumulator } from "./stream.js";

// ============================================
// PROVIDERS
// ============================================

export const PROVIDER_IDS = ["anthropic", "openai", "google", "deepseek", "qwen", "glm", "generic"] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

// ============================================
// CAPABILITIES
// ============================================

/**
 * How a provider takes its reasoning/thinking parameter. `parameter` is the
 * dotted path written into the request body.
 */
export type ThinkingParameter =
  | { style: "budget"; parameter: string; defaultBudget: number; minBudget: number; maxBudget: number }
  | { style: "effort"; parameter: string; defaultEffort: ReasoningEffort }
  | { style: "flag"; parameter: string }
  | { style: "toggle"; parameter: string };

export interface ProviderCapabilitySet {
  streaming: boolean;
  toolCalls: boolean;
  /** null: the provider has no thinking parameter */
  thinking: ThinkingParameter | null;
}

// ============================================
// WIRE
// ============================================

export interface ProviderWireRequest {
  /** Path appended to the provider base URL */
  path: string;
  body: JsonObject;
}

export interface WireOptions {
  stream?: boolean;
}

/** One dispatched server-sent event */
export interface SseEvent {
  event?: string;
  data: string;
  /** Set on a final event the stream closed before its blank line */
  truncated?: boolean;
}

export type StreamDelta =
  | { type: "text"; text: string }
  | { type: "reasoning"; text: string }
  | { type: "tool_call"; index: number; id: string; name: string }
  | { type: "tool_arguments"; index: number; fragment: string }
  | { type: "usage"; usage: TokenUsage }
  | { type: "stop"; stopReason: StopReason };

// ============================================
// ADAPTER CONTRACT
// ============================================

export interface ProviderAdapter {
  readonly id: ProviderId;
  readonly capabilities: ProviderCapabilitySet;
  /** Default base URL; config may override */
  readonly defaultBaseUrl: string;

  /**
   * Encode a canonical request. Features the capability set lacks are
   * dropped and noted on `request.metadata.degradations`.
   */
  toWire(request: CanonicalRequest, capabilities?: ProviderCapabilitySet, options?: WireOptions): ProviderWireRequest;

  /** Decode a complete (non-streaming) response body. Throws TranslationError when malformed. */
  fromWire(body: unknown): CanonicalResponse;

  createStreamState(model: string): StreamAccumulator;

  /** Apply one streamed event to the state, returning the deltas it produced */
  fromWireChunk(state: StreamAccumulator, event: SseEvent): StreamDelta[];

  headers(apiKey: string | undefined): Record<string, string>;
}
