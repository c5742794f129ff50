export * from "./types.js";
export { createTurn, decodeMessages, encodeMessages } from "./codec.js";
export { SessionStore } from "./store.js";
export { SessionManager, DEFAULT_HISTORY_DEPTH, type SessionManagerOptions } from "./manager.js";
export { KeyedMutex } from "./mutex.js";
