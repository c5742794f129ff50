/**
 * OpenAI Adapter
 *
 * Reasoning models take a discrete effort level instead of a token budget.
 */

import { OpenAICompatibleAdapter } from "./openai-compatible/adapter.js";

export class OpenAIAdapter extends OpenAICompatibleAdapter {
  constructor() {
    super("openai", "https://api.openai.com/v1", {
      style: "effort",
      parameter: "reasoning_effort",
      defaultEffort: "medium",
    });
  }
}
