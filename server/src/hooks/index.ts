export * from "./types.js";
export { parseHookOutput, toWireInput, defaultHookOutput } from "./output.js";
export { parseHooksConfig, countHandlers } from "./config.js";
export { HookEngine, mergeOutcomes, type HandlerResult, type HookEngineOptions } from "./engine.js";
export { CommandHookHandler } from "./command-handler.js";
export { PromptHookHandler, clientDecisionModel, renderHookPrompt, type DecisionModel } from "./prompt-handler.js";
export { matcherSubject } from "./matcher.js";
