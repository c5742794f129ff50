/**
 * Adapter Registry
 *
 * Selecting an adapter is a table lookup. To add a provider:
 * 1. Add its id to PROVIDER_IDS in ./types.ts
 * 2. Implement ProviderAdapter in ./providers/
 * 3. Register its factory in ADAPTER_FACTORIES below
 */

import { ConfigurationError } from "../errors.js";
import type { ProviderAdapter, ProviderId } from "./types.js";
import { PROVIDER_IDS } from "./types.js";
import {
  AnthropicAdapter,
  DeepSeekAdapter,
  GeminiAdapter,
  GenericOpenAIAdapter,
  GLMAdapter,
  OpenAIAdapter,
  QwenAdapter,
} from "./providers/index.js";

const ADAPTER_FACTORIES: Record<ProviderId, () => ProviderAdapter> = {
  anthropic: () => new AnthropicAdapter(),
  openai: () => new OpenAIAdapter(),
  google: () => new GeminiAdapter(),
  deepseek: () => new DeepSeekAdapter(),
  qwen: () => new QwenAdapter(),
  glm: () => new GLMAdapter(),
  generic: () => new GenericOpenAIAdapter(),
};

/** Alternate spellings accepted in configuration */
const PROVIDER_ALIASES: Record<string, ProviderId> = {
  gemini: "google",
  zai: "glm",
  zhipu: "glm",
  alibaba: "qwen",
  dashscope: "qwen",
  local: "generic",
  lmstudio: "generic",
  localai: "generic",
  vllm: "generic",
  "openai-compatible": "generic",
};

function isProviderId(value: string): value is ProviderId {
  return PROVIDER_IDS.some((id) => id === value);
}

/** Canonical provider id for a configured identifier, or null when unknown */
export function normalizeProviderId(identifier: string): ProviderId | null {
  const key = identifier.trim().toLowerCase();
  if (isProviderId(key)) return key;
  return Object.hasOwn(PROVIDER_ALIASES, key) ? PROVIDER_ALIASES[key] : null;
}

const instances = new Map<ProviderId, ProviderAdapter>();

/**
 * Adapter for a configured provider identifier.
 * Throws ConfigurationError for an unknown identifier.
 */
export function getAdapter(identifier: string): ProviderAdapter {
  const id = normalizeProviderId(identifier);
  if (!id) {
    throw new ConfigurationError(
      `Unknown provider: "${identifier}". Valid providers: ${[...PROVIDER_IDS, ...Object.keys(PROVIDER_ALIASES)].join(", ")}`,
    );
  }
  let adapter = instances.get(id);
  if (!adapter) {
    adapter = ADAPTER_FACTORIES[id]();
    instances.set(id, adapter);
  }
  return adapter;
}
