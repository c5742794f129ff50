/**
 * Prompt Hook Handler
 *
 * Asks a model to judge the event. The model must answer with a JSON
 * object `{ok, reason, system_message, decision}`; `ok: false` stops the
 * exchange the same way `continue: false` does.
 */

import type { CanonicalRequest } from "../canonical/types.js";
import { parseJsonObject, systemText, textOf, userText } from "../canonical/messages.js";
import { HookCrashError } from "../errors.js";
import type { ProviderClient } from "../llm/client.js";
import { parseHookOutput, toWireInput } from "./output.js";
import { outcome, type HandlerOutcome, type HookEvent, type HookHandler } from "./types.js";

export const DEFAULT_PROMPT_TIMEOUT_MS = 30_000;

export const DECISION_SYSTEM_PROMPT = [
  "You are a policy check inside an LLM gateway. You receive a lifecycle event as JSON and an instruction.",
  "Reply with exactly one JSON object and nothing else:",
  '{"ok": true|false, "reason": "<why>", "system_message": "<optional note for the assistant>", "decision": "allow"|"deny"|"ask"}',
  'Set "ok" to false only when the exchange must stop. "decision" applies to tool calls and may be omitted otherwise.',
].join("\n");

/** One-shot model call used by prompt handlers */
export interface DecisionModel {
  decide(request: { system: string; prompt: string }, signal: AbortSignal): Promise<string>;
}

/** A DecisionModel backed by a provider client */
export function clientDecisionModel(client: ProviderClient, model: string): DecisionModel {
  return {
    async decide({ system, prompt }, signal) {
      const request: CanonicalRequest = {
        model,
        messages: [systemText(system), userText(prompt)],
        maxTokens: 1024,
        metadata: { degradations: [] },
      };
      const response = await client.complete(request, { signal });
      return textOf(response.message);
    },
  };
}

/** Fill `$ARGUMENTS` with the event JSON, or append it when the prompt has no placeholder */
export function renderHookPrompt(template: string, event: HookEvent): string {
  const json = JSON.stringify(toWireInput(event));
  return template.includes("$ARGUMENTS") ? template.split("$ARGUMENTS").join(json) : `${template}\n\nEvent:\n${json}`;
}

/** First JSON object in a reply; models sometimes wrap it in a code fence */
function extractJsonObject(reply: string) {
  const start = reply.indexOf("{");
  const end = reply.lastIndexOf("}");
  if (start === -1 || end <= start) return null;
  return parseJsonObject(reply.slice(start, end + 1));
}

export interface PromptHandlerOptions {
  id: string;
  prompt: string;
  timeoutMs?: number;
  model: DecisionModel;
}

export class PromptHookHandler implements HookHandler {
  readonly kind = "prompt" as const;
  readonly id: string;
  readonly timeoutMs: number;
  private readonly prompt: string;
  private readonly model: DecisionModel;

  constructor(options: PromptHandlerOptions) {
    this.id = options.id;
    this.prompt = options.prompt;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROMPT_TIMEOUT_MS;
    this.model = options.model;
  }

  async run(event: HookEvent, signal: AbortSignal): Promise<HandlerOutcome> {
    const reply = await this.model.decide({ system: DECISION_SYSTEM_PROMPT, prompt: renderHookPrompt(this.prompt, event) }, signal);
    const json = extractJsonObject(reply);
    if (!json) {
      return outcome.failed(new HookCrashError(this.id, null, "", `Prompt hook ${this.id} reply is not a JSON object`));
    }

    const output = parseHookOutput(json);
    if (json.ok === false) {
      output.continue = false;
      output.stopReason = output.stopReason ?? output.reason;
    }
    return outcome.ok(output);
  }
}
