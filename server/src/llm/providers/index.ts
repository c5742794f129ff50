/**
 * Provider Adapters
 */

export { AnthropicAdapter } from "./anthropic.js";
export { OpenAICompatibleAdapter, GenericOpenAIAdapter } from "./openai-compatible/index.js";
export { OpenAIAdapter } from "./openai.js";
export { DeepSeekAdapter } from "./deepseek.js";
export { QwenAdapter } from "./qwen.js";
export { GLMAdapter } from "./glm.js";
export { GeminiAdapter } from "./gemini/index.js";
