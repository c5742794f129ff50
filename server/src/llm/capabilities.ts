/**
 * Capability negotiation shared by every adapter: decide which requested
 * features the target can take, note the ones it cannot.
 */

import type { CanonicalRequest, JsonObject, ThinkingRequest } from "../canonical/types.js";
import type { ProviderCapabilitySet, ThinkingParameter } from "./types.js";
import { setPath } from "./wire.js";

/**
 * The thinking parameter to encode, or null. Requesting thinking from a
 * provider without one records a degradation instead of failing.
 */
export function resolveThinking(
  request: CanonicalRequest,
  capabilities: ProviderCapabilitySet,
  provider: string,
): ThinkingParameter | null {
  if (!request.thinking) return null;
  if (!capabilities.thinking) {
    if (request.thinking.enabled) {
      request.metadata.degradations.push({
        feature: "thinking",
        provider,
        detail: `${provider} does not support a thinking parameter; request sent without it`,
      });
    }
    return null;
  }
  // Budget and effort styles have no "off" form; only encode when enabled
  if (!request.thinking.enabled && (capabilities.thinking.style === "budget" || capabilities.thinking.style === "effort")) {
    return null;
  }
  return capabilities.thinking;
}

export function clampBudget(param: Extract<ThinkingParameter, { style: "budget" }>, requested?: number): number {
  const budget = requested ?? param.defaultBudget;
  return Math.min(param.maxBudget, Math.max(param.minBudget, Math.floor(budget)));
}

/** Write the thinking parameter into `body` at the capability's path */
export function applyThinking(body: JsonObject, param: ThinkingParameter, thinking: ThinkingRequest): void {
  switch (param.style) {
    case "budget":
      setPath(body, param.parameter, clampBudget(param, thinking.budgetTokens));
      break;
    case "effort":
      setPath(body, param.parameter, thinking.effort ?? param.defaultEffort);
      break;
    case "flag":
      setPath(body, param.parameter, thinking.enabled);
      break;
    case "toggle":
      setPath(body, param.parameter, thinking.enabled ? "enabled" : "disabled");
      break;
  }
}

/** Whether tool definitions may be sent; notes the drop otherwise */
export function resolveTools(request: CanonicalRequest, capabilities: ProviderCapabilitySet, provider: string): boolean {
  if (!request.tools?.length) return false;
  if (capabilities.toolCalls) return true;
  request.metadata.degradations.push({
    feature: "tools",
    provider,
    detail: `${provider} does not support tool calls; ${request.tools.length} tool definition(s) omitted`,
  });
  return false;
}

export function mergeCapabilities(
  base: ProviderCapabilitySet,
  override?: Partial<ProviderCapabilitySet>,
): ProviderCapabilitySet {
  return override ? { ...base, ...override } : base;
}
