/**
 * Hook Engine
 *
 * Dispatch runs in four steps: collect the handlers whose matcher accepts
 * the event (declared order: group order, then hook order), run them all
 * in parallel each against its own deadline, merge their outcomes, and
 * resolve. An expired handler is abandoned and recorded as a failure.
 */

import type { JsonValue } from "../canonical/types.js";
import { ConfigurationError, ExchangeCancelledError, HookTimeoutError, toErrorMessage } from "../errors.js";
import { createComponentLogger } from "../logging.js";
import { withTimeout } from "../utils/abort.js";
import type { PatternTester } from "../utils/safe-regex.js";
import { CommandHookHandler } from "./command-handler.js";
import { compileMatcher, matchesEvent } from "./matcher.js";
import { PromptHookHandler, type DecisionModel } from "./prompt-handler.js";
import {
  HOOK_EVENT_KINDS,
  outcome,
  type HandlerOutcome,
  type HookEvent,
  type HookEventKind,
  type HookFailure,
  type HookHandler,
  type HookResolution,
  type HooksConfig,
  type HookSpec,
  type PermissionDecision,
} from "./types.js";

const log = createComponentLogger("hooks");

const PERMISSION_RANK: Record<PermissionDecision, number> = { allow: 1, ask: 2, deny: 3 };

export interface HandlerResult {
  handlerId: string;
  outcome: HandlerOutcome;
}

function sameJson(a: JsonValue, b: JsonValue): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Fold handler outcomes, given in declared order, into one resolution.
 */
export function mergeOutcomes(event: HookEvent, results: readonly HandlerResult[]): HookResolution {
  const resolution: HookResolution = {
    event,
    outcome: "proceed",
    systemMessages: [],
    suppressOutput: false,
    failures: [],
  };
  let updatedBy: string | undefined;

  for (const { handlerId, outcome: result } of results) {
    switch (result.type) {
      case "failed":
        resolution.failures.push({ handlerId, error: result.error });
        break;

      case "blocking":
        if (resolution.outcome !== "blocked") {
          resolution.outcome = "blocked";
          resolution.reason = result.reason;
        }
        break;

      case "ok": {
        const output = result.output;
        if (!output.continue && resolution.outcome !== "blocked") {
          resolution.outcome = "blocked";
          resolution.reason = output.stopReason ?? output.reason ?? `Stopped by hook ${handlerId}`;
        }
        if (output.decision) {
          const current = resolution.permission;
          if (!current || PERMISSION_RANK[output.decision] > PERMISSION_RANK[current]) {
            resolution.permission = output.decision;
            resolution.permissionReason = output.reason;
          }
        }
        if (output.updatedInput !== undefined) {
          if (resolution.updatedInput !== undefined && updatedBy && !sameJson(resolution.updatedInput, output.updatedInput)) {
            log.warn("Conflicting input rewrites; the later handler wins", {
              event: event.kind,
              overridden: updatedBy,
              winner: handlerId,
            });
          }
          resolution.updatedInput = output.updatedInput;
          updatedBy = handlerId;
        }
        if (output.systemMessage) resolution.systemMessages.push(output.systemMessage);
        if (output.additionalContext) resolution.systemMessages.push(output.additionalContext);
        if (output.suppressOutput) resolution.suppressOutput = true;
        break;
      }
    }
  }

  return resolution;
}

interface RegisteredGroup {
  matches: PatternTester;
  handlers: HookHandler[];
}

export interface HookEngineOptions {
  /** Working directory for command hooks */
  projectDir: string;
  /** Required when any prompt hook is configured */
  decisionModel?: DecisionModel;
}

export class HookEngine {
  private readonly groups = new Map<HookEventKind, RegisteredGroup[]>();

  constructor(config: HooksConfig, options: HookEngineOptions) {
    for (const kind of HOOK_EVENT_KINDS) {
      const registered = (config[kind] ?? []).map((group, g): RegisteredGroup => ({
        matches: compileMatcher(group.matcher),
        handlers: group.hooks.map((spec, h) => createHandler(spec, `${kind}[${g}][${h}]`, options)),
      }));
      if (registered.length > 0) this.groups.set(kind, registered);
    }
  }

  /** Handlers selected for an event, in declared order */
  handlersFor(event: HookEvent): HookHandler[] {
    return (this.groups.get(event.kind) ?? [])
      .filter((group) => matchesEvent(group.matches, event))
      .flatMap((group) => group.handlers);
  }

  hasHandlers(kind: HookEventKind): boolean {
    return this.groups.has(kind);
  }

  async dispatch(event: HookEvent, signal?: AbortSignal): Promise<HookResolution> {
    const handlers = this.handlersFor(event);
    if (handlers.length === 0) return mergeOutcomes(event, []);

    const started = Date.now();
    const results = await Promise.all(
      handlers.map(async (handler): Promise<HandlerResult> => ({
        handlerId: handler.id,
        outcome: await runHandler(handler, event, signal),
      })),
    );
    if (signal?.aborted) throw new ExchangeCancelledError();

    const resolution = mergeOutcomes(event, results);
    logFailures(resolution.failures, event);
    log.debug("Hooks resolved", {
      event: event.kind,
      handlers: handlers.length,
      outcome: resolution.outcome,
      permission: resolution.permission,
      durationMs: Date.now() - started,
    });
    return resolution;
  }
}

async function runHandler(handler: HookHandler, event: HookEvent, signal?: AbortSignal): Promise<HandlerOutcome> {
  const result = await withTimeout((sig) => handler.run(event, sig), handler.timeoutMs, signal);
  if (result.ok) return result.value;
  if (result.reason === "timeout") return outcome.failed(new HookTimeoutError(handler.id, handler.timeoutMs));
  return outcome.failed(result.error instanceof Error ? result.error : new Error(toErrorMessage(result.error)));
}

function logFailures(failures: HookFailure[], event: HookEvent): void {
  for (const failure of failures) {
    log.warn("Hook handler failed", { event: event.kind, handler: failure.handlerId, error: failure.error.message });
  }
}

function createHandler(spec: HookSpec, id: string, options: HookEngineOptions): HookHandler {
  if (spec.type === "command") {
    return new CommandHookHandler({ id, command: spec.command, timeoutMs: spec.timeoutMs, projectDir: options.projectDir });
  }
  if (!options.decisionModel) {
    throw new ConfigurationError(`hook ${id}: prompt hooks need a decision model`);
  }
  return new PromptHookHandler({ id, prompt: spec.prompt, timeoutMs: spec.timeoutMs, model: options.decisionModel });
}
