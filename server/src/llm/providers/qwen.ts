/**
 * Qwen (DashScope compatible mode) Adapter
 *
 * Hybrid-thinking models take a boolean `enable_thinking`, sent explicitly
 * as false when thinking was requested off.
 */

import { OpenAICompatibleAdapter } from "./openai-compatible/adapter.js";

export class QwenAdapter extends OpenAICompatibleAdapter {
  constructor() {
    super("qwen", "https://dashscope.aliyuncs.com/compatible-mode/v1", {
      style: "flag",
      parameter: "enable_thinking",
    });
  }
}
