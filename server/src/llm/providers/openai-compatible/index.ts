export { OpenAICompatibleAdapter, GenericOpenAIAdapter, toStopReason, parseOpenAIUsage } from "./adapter.js";
export { formatMessagesForAPI, formatTools, type FormatOptions } from "./format.js";
