/**
 * GLM (Zhipu / Z.ai) Adapter
 */

import type { CanonicalRequest, JsonObject } from "../../canonical/types.js";
import { OpenAICompatibleAdapter } from "./openai-compatible/adapter.js";

export class GLMAdapter extends OpenAICompatibleAdapter {
  constructor() {
    super("glm", "https://open.bigmodel.cn/api/paas/v4", { style: "toggle", parameter: "thinking.type" });
  }

  /** Interleaved thinking is kept across turns only when clear_thinking is off */
  protected override decorateThinking(body: JsonObject, request: CanonicalRequest): void {
    if (request.thinking?.enabled && request.thinking.preserveAcrossTurns) {
      body.clear_thinking = false;
    }
  }
}
