/**
 * Context Injector
 *
 * Assembles the outgoing message list for one exchange in three tiers:
 *   system:  base prompt, rules blobs, core memory, recent sessions
 *   history: every message of every active turn, oldest first
 *   trigger: resolved attachments, then the triggering user message with
 *             hook output appended as a <system-reminder>
 *
 * Enrichment sources are fetched in parallel, each bounded by its own
 * deadline. A source that fails or times out contributes nothing.
 */

import type { ContentSegment, Message, Turn } from "../canonical/types.js";
import { createMessage, systemText } from "../canonical/messages.js";
import { toErrorMessage } from "../errors.js";
import { createComponentLogger } from "../logging.js";
import { withTimeout } from "../utils/abort.js";

const log = createComponentLogger("context");

export const DEFAULT_SOURCE_TIMEOUT_MS = 1000;

/** Ordered rule text blobs (project rules files, plugin context) */
export interface RulesSource {
  load(signal: AbortSignal): Promise<string[]>;
}

export interface CoreMemorySource {
  formatCoreMemory(): string;
}

/** Summaries of sessions that ended recently */
export interface RecentSessionsSource {
  formatRecentContext(): string;
}

/** Expands references on the trigger message into extra messages */
export interface AttachmentResolver {
  readonly name: string;
  resolve(message: Message, signal: AbortSignal): Promise<Message[]>;
}

export interface ContextInjectorOptions {
  systemPrompt?: string;
  rules?: RulesSource;
  coreMemory?: CoreMemorySource;
  recentSessions?: RecentSessionsSource;
  attachments?: AttachmentResolver[];
  sourceTimeoutMs?: number;
}

export interface AssembleInput {
  turns: readonly Turn[];
  /** Messages of the current exchange that precede the trigger (client tool results) */
  pending?: readonly Message[];
  trigger?: Message;
  hookMessages?: readonly string[];
  signal?: AbortSignal;
}

export interface AssembledContext {
  messages: Message[];
  /** Names of enrichment sources that failed or timed out */
  failedSources: string[];
}

export function wrapSystemReminder(content: string): string {
  return `<system-reminder>\n${content}\n</system-reminder>`;
}

/** Append text to a message as a new text segment, keeping its id */
function appendText(message: Message, text: string): Message {
  const content: ContentSegment[] = [...message.content, { type: "text", text }];
  return createMessage(message.role, content, message.id);
}

/**
 * Put `text` ahead of the conversation as a system reminder, merged into a
 * leading system message when there is one.
 */
export function injectSystemPrefix(messages: readonly Message[], text: string): Message[] {
  const reminder = wrapSystemReminder(text);
  const [first, ...rest] = messages;
  if (first?.role === "system") return [appendText(first, `\n\n${reminder}`), ...rest];
  return [systemText(reminder), ...messages];
}

export class ContextInjector {
  private readonly timeoutMs: number;

  constructor(private readonly options: ContextInjectorOptions = {}) {
    this.timeoutMs = options.sourceTimeoutMs ?? DEFAULT_SOURCE_TIMEOUT_MS;
  }

  async assemble(input: AssembleInput): Promise<AssembledContext> {
    const failedSources: string[] = [];
    const { rules, coreMemory, recentSessions, attachments = [] } = this.options;
    const trigger = input.trigger;

    // Sources have no dependencies on each other
    const [ruleBlobs, memoryBlock, recentBlock, attachmentMessages] = await Promise.all([
      rules ? this.fetch("rules", (signal) => rules.load(signal), input.signal, failedSources) : Promise.resolve(null),
      coreMemory
        ? this.fetch("core_memory", async () => coreMemory.formatCoreMemory(), input.signal, failedSources)
        : Promise.resolve(null),
      recentSessions
        ? this.fetch("recent_sessions", async () => recentSessions.formatRecentContext(), input.signal, failedSources)
        : Promise.resolve(null),
      Promise.all(
        attachments.map((resolver) =>
          trigger
            ? this.fetch(`attachments:${resolver.name}`, (signal) => resolver.resolve(trigger, signal), input.signal, failedSources)
            : Promise.resolve(null),
        ),
      ),
    ]);

    const messages: Message[] = [];

    // System tier
    if (this.options.systemPrompt) messages.push(systemText(this.options.systemPrompt));
    for (const blob of ruleBlobs ?? []) {
      if (blob.trim()) messages.push(systemText(`<rules>\n${blob}\n</rules>`));
    }
    if (memoryBlock) messages.push(systemText(memoryBlock));
    if (recentBlock) messages.push(systemText(recentBlock));

    // History tier
    for (const turn of input.turns) messages.push(...turn.messages);
    messages.push(...(input.pending ?? []));

    // Trigger tier
    for (const resolved of attachmentMessages) messages.push(...(resolved ?? []));

    const hookMessages = (input.hookMessages ?? []).filter((m) => m.trim() !== "");
    const reminder = hookMessages.length > 0 ? wrapSystemReminder(hookMessages.join("\n\n")) : null;
    if (trigger) {
      messages.push(reminder ? appendText(trigger, `\n\n${reminder}`) : trigger);
    } else if (reminder) {
      messages.push(systemText(reminder));
    }

    return { messages, failedSources };
  }

  private async fetch<T>(
    source: string,
    load: (signal: AbortSignal) => Promise<T>,
    parent: AbortSignal | undefined,
    failedSources: string[],
  ): Promise<T | null> {
    const result = await withTimeout(load, this.timeoutMs, parent);
    if (result.ok) return result.value;

    failedSources.push(source);
    if (result.reason === "timeout") {
      log.warn("Context source timed out", { source, timeoutMs: this.timeoutMs });
    } else {
      log.warn("Context source failed", { source, error: toErrorMessage(result.error) });
    }
    return null;
  }
}
