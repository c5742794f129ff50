export { GeminiAdapter } from "./adapter.js";
export { formatContentsForGemini, extractSystemInstruction, toGeminiFunctionDeclarations, nextToolCallId } from "./format.js";
