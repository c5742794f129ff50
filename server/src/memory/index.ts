export * from "./types.js";
export {
  MemoryStore,
  DEFAULT_MAX_CORE_BLOCK_CHARS,
  DEFAULT_SEARCH_CAP,
  DEFAULT_SEARCH_LIMIT,
  type MemoryStoreOptions,
} from "./store.js";
export {
  ContinuityStore,
  DEFAULT_RECENT_SESSION_HOURS,
  DEFAULT_RECENT_SESSION_LIMIT,
  activityKindFor,
  activityTargetFor,
  summarizeSession,
  type ContinuityStoreOptions,
} from "./continuity.js";
export { indexKeyFor, tokenize, toMatchQuery } from "./tokens.js";
