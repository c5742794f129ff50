/**
 * DeepSeek Adapter
 *
 * Thinking mode is switched on with the boolean `enable_thinking`. The
 * reasoning_content of earlier assistant turns must be passed back between
 * tool-call rounds, so it is always echoed while thinking.
 */

import type { CanonicalRequest } from "../../canonical/types.js";
import { OpenAICompatibleAdapter } from "./openai-compatible/adapter.js";

export class DeepSeekAdapter extends OpenAICompatibleAdapter {
  constructor() {
    super("deepseek", "https://api.deepseek.com/v1", { style: "flag", parameter: "enable_thinking" });
  }

  protected override echoReasoning(request: CanonicalRequest): boolean {
    return request.thinking?.enabled === true;
  }
}
