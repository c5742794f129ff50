/**
 * Provider Adapter Layer: public surface
 */

export * from "./types.js";
export { getAdapter, normalizeProviderId } from "./factory.js";
export { contextWindowFor, defaultModelFor, resolveProvider, upstreamModelName, bareModelName } from "./config.js";
export { ProviderClient, type ProviderClientOptions, type CallOptions, type FetchFn } from "./client.js";
export { StreamAccumulator } from "./stream.js";
export { readServerSentEvents } from "./sse.js";
export { resolveThinking, applyThinking, resolveTools, mergeCapabilities } from "./capabilities.js";
export { withRetry, isRetryableError, extractRetryAfterMs } from "./resilience/retry.js";
