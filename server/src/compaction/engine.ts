/**
 * Compaction Engine
 *
 * Watches each session's budget and, when the next turn would overflow it,
 * replaces the older turns with one structured summary produced by a single
 * model call. History is only replaced once a usable summary exists; any
 * failure defers compaction and leaves the session untouched.
 */

import {
  estimateMessagesSize,
  systemText,
  textOf,
  userText,
  type Message,
  type Turn,
  type TurnKind,
} from "../canonical/index.js";
import { ExchangeCancelledError, toErrorMessage } from "../errors.js";
import { createHookEvent, type HookEngine, type PermissionMode } from "../hooks/index.js";
import type { ProviderClient } from "../llm/index.js";
import { contextWindowFor } from "../llm/index.js";
import { createComponentLogger } from "../logging.js";
import { createTurn, type CompactionRecord, type CompactionTrigger, type SessionManager } from "../session/index.js";
import { buildSummaryPrompt, parseSummary, renderSummary, type SummarySections } from "./summary.js";

const log = createComponentLogger("compaction");

export const DEFAULT_THRESHOLD = 0.85;
export const DEFAULT_RESPONSE_RESERVE = 4096;
export const DEFAULT_WARN_THRESHOLD = 0.75;

/** One model call that turns a transcript into a summary reply */
export interface Summarizer {
  summarize(request: { system: string; prompt: string }, signal?: AbortSignal): Promise<string>;
}

export function clientSummarizer(client: ProviderClient, model: string, maxTokens = 8192): Summarizer {
  return {
    async summarize({ system, prompt }, signal) {
      const response = await client.complete(
        {
          model,
          messages: [systemText(system), userText(prompt)],
          maxTokens,
          metadata: { degradations: [] },
        },
        { signal },
      );
      return textOf(response.message);
    },
  };
}

export interface CompactionSettings {
  /** Fraction of the context window the history may use */
  threshold: number;
  /** Tokens kept free for the response */
  responseReserve: number;
  /** Newest turns never compacted */
  preserveRecentTurns: number;
  /** Fraction of the budget at which a warning is logged */
  warnThreshold: number;
}

export interface CompactionEngineOptions extends Partial<CompactionSettings> {
  sessions: SessionManager;
  summarizer: Summarizer;
  hooks?: HookEngine;
  /** Context window for a session's model; default the model table */
  contextWindow?: (model: string | undefined) => number;
  /** Sent with pre_compact events */
  cwd?: string;
  permissionMode?: PermissionMode;
}

export interface CompactOptions {
  signal?: AbortSignal;
}

export type CompactionOutcome =
  | { status: "compacted"; record: CompactionRecord; summaryTurn: Turn; sections: SummarySections }
  | { status: "deferred"; reason: string }
  | { status: "skipped"; reason: string };

export class CompactionEngine {
  private readonly sessions: SessionManager;
  private readonly summarizer: Summarizer;
  private readonly hooks: HookEngine | undefined;
  private readonly contextWindow: (model: string | undefined) => number;
  private readonly settings: CompactionSettings;
  private readonly cwd: string;
  private readonly permissionMode: PermissionMode;

  constructor(options: CompactionEngineOptions) {
    this.sessions = options.sessions;
    this.summarizer = options.summarizer;
    this.hooks = options.hooks;
    this.contextWindow = options.contextWindow ?? ((model) => contextWindowFor(model ?? ""));
    this.settings = {
      threshold: options.threshold ?? DEFAULT_THRESHOLD,
      responseReserve: options.responseReserve ?? DEFAULT_RESPONSE_RESERVE,
      preserveRecentTurns: Math.max(0, options.preserveRecentTurns ?? 0),
      warnThreshold: options.warnThreshold ?? DEFAULT_WARN_THRESHOLD,
    };
    this.cwd = options.cwd ?? process.cwd();
    this.permissionMode = options.permissionMode ?? "default";
  }

  /** History budget for a session: floor(window × threshold) − reserve, never negative */
  budgetFor(sessionId: string): number {
    const { model } = this.sessions.get(sessionId);
    const window = this.contextWindow(model);
    return Math.max(0, Math.floor(window * this.settings.threshold) - this.settings.responseReserve);
  }

  needsCompaction(sessionId: string, incomingSize: number): boolean {
    const session = this.sessions.get(sessionId);
    return session.budgetUsed + incomingSize > this.budgetFor(sessionId);
  }

  /** Compact first when `incomingSize` more would overflow the budget */
  async ensureCapacity(
    sessionId: string,
    incomingSize: number,
    trigger: CompactionTrigger = "auto",
    options: CompactOptions = {},
  ): Promise<CompactionOutcome | null> {
    if (!this.needsCompaction(sessionId, incomingSize)) return null;
    return this.compact(sessionId, trigger, options);
  }

  /**
   * Append a turn, compacting first if it would not fit. The turn is
   * appended even when compaction is deferred.
   */
  async appendTurn(
    sessionId: string,
    messages: readonly Message[],
    kind: TurnKind = "verbatim",
    options: CompactOptions = {},
  ): Promise<{ turn: Turn; compaction: CompactionOutcome | null }> {
    const compaction = await this.ensureCapacity(sessionId, estimateMessagesSize(messages), "auto", options);
    const before = this.sessions.get(sessionId).budgetUsed;
    const turn = this.sessions.appendTurn(sessionId, messages, kind);
    this.warnNearBudget(sessionId, before, before + turn.size);
    return { turn, compaction };
  }

  async compact(sessionId: string, trigger: CompactionTrigger, options: CompactOptions = {}): Promise<CompactionOutcome> {
    const { signal } = options;
    const session = this.sessions.get(sessionId);
    if (session.status === "ended") return { status: "skipped", reason: "session has ended" };
    const keep = Math.min(this.settings.preserveRecentTurns, session.turns.length);
    const prefix = session.turns.slice(0, session.turns.length - keep);

    if (prefix.length === 0 || (prefix.length === 1 && prefix[0].kind === "summary")) {
      return { status: "skipped", reason: "nothing to compact" };
    }

    const budget = this.budgetFor(sessionId);
    if (this.hooks?.hasHandlers("pre_compact")) {
      const resolution = await this.hooks.dispatch(
        createHookEvent(
          "pre_compact",
          { sessionId, cwd: this.cwd, permissionMode: this.permissionMode },
          { trigger, currentSize: session.budgetUsed, budget },
        ),
        signal,
      );
      if (resolution.outcome === "blocked") {
        const reason = resolution.reason ?? "blocked by pre_compact hook";
        log.info("Compaction deferred by hook", { sessionId, reason });
        return { status: "deferred", reason };
      }
    }

    const started = Date.now();
    this.sessions.setStatus(sessionId, "compacting");
    try {
      const reply = await this.summarizer.summarize(buildSummaryPrompt(prefix), signal);
      const sections = parseSummary(reply);
      const summaryTurn = createTurn([userText(renderSummary(sections))], "summary");
      const record = this.sessions.replacePrefix(sessionId, prefix.length, summaryTurn, trigger);
      log.info("Session compacted", {
        sessionId,
        trigger,
        replacedTurns: record.replacedTurns,
        sizeBefore: record.sizeBefore,
        sizeAfter: record.sizeAfter,
        budget,
        durationMs: Date.now() - started,
      });
      return { status: "compacted", record, summaryTurn, sections };
    } catch (err) {
      if (signal?.aborted) throw new ExchangeCancelledError();
      const reason = toErrorMessage(err);
      log.error("Compaction failed; history kept", err, { sessionId, trigger });
      return { status: "deferred", reason };
    } finally {
      if (this.sessions.get(sessionId).status === "compacting") this.sessions.setStatus(sessionId, "active");
    }
  }

  private warnNearBudget(sessionId: string, before: number, after: number): void {
    const budget = this.budgetFor(sessionId);
    const line = budget * this.settings.warnThreshold;
    if (budget > 0 && before < line && after >= line) {
      log.warn("Session nearing its context budget", {
        sessionId,
        used: after,
        budget,
        percent: Math.round((after / budget) * 100),
      });
    }
  }
}
