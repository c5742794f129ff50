/**
 * Gateway: the exchange pipeline
 *
 * One exchange per client message, serialized per session:
 *   user_prompt_submit hooks → budget check (may compact) → context assembly
 *   → upstream call → pre_tool_use and file guard gating → tool execution
 *   (optional, looped)
 *   → stop hooks → turn appended and persisted.
 *
 * Components are built per config snapshot. An exchange takes the snapshot
 * current when it starts, so a config swap only affects later exchanges.
 *
 * Pure business logic: no HTTP concerns. Called by routes/sessions.ts.
 */

import {
  createMessage,
  estimateMessagesSize,
  isJsonObject,
  toolCallsOf,
  type CanonicalRequest,
  type CanonicalResponse,
  type CapabilityDegradation,
  type ContentSegment,
  type Message,
  type ToolCallSegment,
  type ToolResultSegment,
  type Turn,
} from "../canonical/index.js";
import { clientSummarizer, CompactionEngine, type CompactionOutcome, type Summarizer } from "../compaction/index.js";
import { ConfigHolder, providerSettings, type GatewayConfig } from "../config.js";
import {
  ContextInjector,
  FileRulesSource,
  ProjectFileResolver,
  wrapSystemReminder,
  type AttachmentResolver,
  type RulesSource,
} from "../context/index.js";
import { ConfigurationError, ExchangeCancelledError, InvalidRequestError, TranslationError, toErrorMessage } from "../errors.js";
import { DiffMonitor, FileAccessGuard, modificationOf } from "../guardrails/index.js";
import {
  clientDecisionModel,
  createHookEvent,
  HookEngine,
  type DecisionModel,
  type HookEventCommon,
  type HookEventKind,
  type PermissionDecision,
} from "../hooks/index.js";
import {
  contextWindowFor,
  defaultModelFor,
  getAdapter,
  normalizeProviderId,
  ProviderClient,
  resolveProvider,
  upstreamModelName,
  withRetry,
  type FetchFn,
  type ProviderCapabilitySet,
  type ProviderId,
  type StreamDelta,
} from "../llm/index.js";
import { createComponentLogger } from "../logging.js";
import { activityKindFor, activityTargetFor, type ContinuityStore, type MemoryStore, type MemoryStats } from "../memory/index.js";
import { KeyedMutex, type CompactionRecord, type CreateSessionOptions, type Session, type SessionManager, type SessionStats } from "../session/index.js";
import { linkSignals } from "../utils/abort.js";
import type {
  ClientToolResult,
  ExchangeInput,
  ExchangeOptions,
  ExchangeResult,
  ToolCallRequest,
  ToolDecision,
  ToolExecutor,
} from "./types.js";

const log = createComponentLogger("pipeline");

// ============================================
// TYPES
// ============================================

export interface GatewayDeps {
  config: ConfigHolder;
  sessions: SessionManager;
  memory: MemoryStore;
  /** Activity log and recent-session summaries; off when absent */
  continuity?: ContinuityStore;
  toolExecutor?: ToolExecutor;
  /** Default: the configured rules files */
  rules?: RulesSource;
  /** Default: project file inlining */
  attachments?: AttachmentResolver[];
  /** Default: a summarizer on the default provider */
  summarizer?: Summarizer;
  /** Default: prompt hooks ask the default provider */
  decisionModel?: DecisionModel;
  /** Injected into every provider client (tests) */
  fetch?: FetchFn;
}

export interface ModelInfo {
  provider: ProviderId;
  defaultModel: string;
  contextWindow: number;
  capabilities: ProviderCapabilitySet;
  isDefault: boolean;
}

export interface GatewayStats {
  sessions: SessionStats;
  memory: MemoryStats;
  activeExchanges: number;
  uptimeMs: number;
}

interface Components {
  config: Readonly<GatewayConfig>;
  hooks: HookEngine;
  injector: ContextInjector;
  compaction: CompactionEngine;
  fileGuard: FileAccessGuard;
  clients: Map<ProviderId, ProviderClient>;
}

interface GatedCall {
  call: ToolCallSegment;
  decision: ToolDecision;
}

type Blocked = Extract<ExchangeResult, { status: "blocked" }>;

function blocked(event: HookEventKind, reason: string | undefined): Blocked {
  return { status: "blocked", event, reason: reason ?? `Blocked by ${event} hook` };
}

function defaultProviderId(config: Readonly<GatewayConfig>): ProviderId {
  const id = normalizeProviderId(config.defaultProvider);
  if (!id) throw new ConfigurationError(`Unknown provider: "${config.defaultProvider}"`);
  return id;
}

function toolResult(toolCallId: string, content: string, isError: boolean): ToolResultSegment {
  return isError ? { type: "tool_result", toolCallId, content, isError: true } : { type: "tool_result", toolCallId, content };
}

function clientToolMessage(results: readonly ClientToolResult[]): Message {
  return createMessage("tool", results.map((r) => toolResult(r.toolCallId, r.content, r.isError === true)));
}

// ============================================
// GATEWAY
// ============================================

export class Gateway {
  private readonly mutex = new KeyedMutex();
  private readonly running = new Map<string, AbortController>();
  /** session_start output waiting for the session's next exchange */
  private readonly pendingContext = new Map<string, string[]>();
  private readonly diffMonitors = new Map<string, DiffMonitor>();
  private readonly snapshots = new WeakMap<Readonly<GatewayConfig>, Components>();
  private readonly startedAt = Date.now();

  constructor(private readonly deps: GatewayDeps) {}

  get sessions(): SessionManager {
    return this.deps.sessions;
  }

  get memory(): MemoryStore {
    return this.deps.memory;
  }

  get continuity(): ContinuityStore | undefined {
    return this.deps.continuity;
  }

  // ── Sessions ──

  async createSession(options: CreateSessionOptions = {}): Promise<Session> {
    const session = this.deps.sessions.create(options);
    await this.fireSessionStart(session.id, "startup");
    return session;
  }

  async resumeSession(sessionId: string): Promise<Session> {
    return this.mutex.runExclusive(sessionId, async () => {
      const session = this.deps.sessions.resume(sessionId);
      await this.fireSessionStart(sessionId, "resume");
      return session;
    });
  }

  async endSession(sessionId: string, reason: string): Promise<Session> {
    this.deps.sessions.get(sessionId);
    this.cancel(sessionId);
    return this.mutex.runExclusive(sessionId, async () => {
      const { config, hooks } = this.components();
      if (hooks.hasHandlers("session_end")) {
        await hooks.dispatch(createHookEvent("session_end", this.hookCommon(sessionId, config), { reason }));
      }
      this.pendingContext.delete(sessionId);
      this.diffMonitors.delete(sessionId);
      const session = this.deps.sessions.end(sessionId, reason);
      this.recordSessionEnd(session);
      return session;
    });
  }

  destroySession(sessionId: string): boolean {
    this.cancel(sessionId);
    this.pendingContext.delete(sessionId);
    this.diffMonitors.delete(sessionId);
    return this.deps.sessions.destroy(sessionId);
  }

  async undo(sessionId: string): Promise<Turn | null> {
    this.deps.sessions.get(sessionId);
    return this.mutex.runExclusive(sessionId, async () => this.deps.sessions.undo(sessionId));
  }

  async redo(sessionId: string): Promise<Turn | null> {
    this.deps.sessions.get(sessionId);
    return this.mutex.runExclusive(sessionId, async () => this.deps.sessions.redo(sessionId));
  }

  async compact(sessionId: string): Promise<CompactionOutcome> {
    this.deps.sessions.get(sessionId);
    return this.mutex.runExclusive(sessionId, () => this.components().compaction.compact(sessionId, "manual"));
  }

  compactions(sessionId: string): CompactionRecord[] {
    return this.deps.sessions.compactions(sessionId);
  }

  /** Abort the session's running exchange. False when nothing is running. */
  cancel(sessionId: string): boolean {
    const controller = this.running.get(sessionId);
    if (!controller) return false;
    controller.abort();
    log.info("Exchange cancel requested", { sessionId });
    return true;
  }

  // ── Introspection ──

  stats(): GatewayStats {
    return {
      sessions: this.deps.sessions.stats(),
      memory: this.deps.memory.stats(),
      activeExchanges: this.running.size,
      uptimeMs: Date.now() - this.startedAt,
    };
  }

  listModels(): ModelInfo[] {
    const components = this.components();
    const { config } = components;
    const fallback = defaultProviderId(config);
    const ids = new Set<ProviderId>([fallback]);
    for (const identifier of Object.keys(config.providers)) {
      const id = normalizeProviderId(identifier);
      if (id) ids.add(id);
    }
    return [...ids].map((provider) => {
      const defaultModel = provider === fallback ? config.defaultModel : defaultModelFor(provider);
      return {
        provider,
        defaultModel,
        contextWindow: contextWindowFor(defaultModel, providerSettings(config, provider).contextWindow),
        capabilities: this.client(components, provider).capabilities,
        isDefault: provider === fallback,
      };
    });
  }

  // ── Exchange ──

  /**
   * Run one exchange. Resolves to completed, blocked, degraded (malformed
   * upstream payload) or cancelled; UpstreamError propagates.
   */
  async exchange(sessionId: string, input: ExchangeInput, options: ExchangeOptions = {}): Promise<ExchangeResult> {
    this.deps.sessions.get(sessionId);
    return this.mutex.runExclusive(sessionId, async () => {
      const controller = new AbortController();
      const linked = linkSignals(options.signal, controller.signal);
      this.running.set(sessionId, controller);
      const started = Date.now();
      try {
        const result = await this.run(sessionId, input, options.onDelta, linked.signal);
        log.info("Exchange finished", { sessionId, status: result.status, durationMs: Date.now() - started });
        return result;
      } catch (err) {
        if (err instanceof ExchangeCancelledError || linked.signal.aborted) {
          log.info("Exchange cancelled", { sessionId, durationMs: Date.now() - started });
          return { status: "cancelled" };
        }
        if (err instanceof TranslationError) {
          log.warn("Upstream payload could not be translated", { sessionId, provider: err.provider, error: err.message });
          return { status: "degraded", error: err };
        }
        throw err;
      } finally {
        this.running.delete(sessionId);
        linked.dispose();
      }
    });
  }

  private async run(
    sessionId: string,
    input: ExchangeInput,
    onDelta: ((delta: StreamDelta) => void) | undefined,
    signal: AbortSignal,
  ): Promise<ExchangeResult> {
    const components = this.components();
    const { config, hooks } = components;
    const session = this.deps.sessions.get(sessionId);
    if (session.status === "ended") throw new InvalidRequestError(`Session ${sessionId} has ended`);

    let prompt = input.content ?? "";
    const attachments = input.attachments ?? [];
    const clientResults = input.toolResults ?? [];
    if (!prompt.trim() && attachments.length === 0 && clientResults.length === 0) {
      throw new InvalidRequestError("Message has no content, attachments or tool results");
    }

    const common = this.hookCommon(sessionId, config);
    // session_start context stays pending until a turn is committed
    const hookMessages = [...(this.pendingContext.get(sessionId) ?? [])];
    // Paths the file guard has allowed during this exchange
    const touched = new Set<string>();

    // ── Step 1: prompt hooks ──
    if (prompt.trim()) {
      const submit = await hooks.dispatch(createHookEvent("user_prompt_submit", common, { prompt }), signal);
      if (submit.outcome === "blocked") return blocked("user_prompt_submit", submit.reason);
      if (typeof submit.updatedInput === "string") prompt = submit.updatedInput;
      hookMessages.push(...submit.systemMessages);
    }

    const pending = clientResults.length > 0 ? [clientToolMessage(clientResults)] : [];
    const triggerContent: ContentSegment[] = [...attachments];
    if (prompt.trim()) triggerContent.unshift({ type: "text", text: prompt });
    const trigger = triggerContent.length > 0 ? createMessage("user", triggerContent) : undefined;
    const incoming = trigger ? [...pending, trigger] : pending;

    // ── Step 2: budget ──
    const compactions: CompactionOutcome[] = [];
    const early = await components.compaction.ensureCapacity(sessionId, estimateMessagesSize(incoming), "auto", { signal });
    if (early) compactions.push(early);

    // ── Step 3: context ──
    const context = await components.injector.assemble({
      turns: this.deps.sessions.get(sessionId).turns,
      pending,
      trigger,
      hookMessages,
      signal,
    });
    if (context.failedSources.length > 0) {
      log.warn("Context assembled without some sources", { sessionId, failed: context.failedSources });
    }

    // ── Step 4: model + tool rounds ──
    const model = input.model ?? session.model ?? config.defaultModel;
    const provider = resolveProvider(model, defaultProviderId(config));
    const client = this.client(components, provider);
    const tools = this.deps.toolExecutor?.tools ?? input.tools;
    const degradations: CapabilityDegradation[] = [];
    const toolDecisions: ToolDecision[] = [];
    const followUps: Message[] = [];
    const maxRounds = config.upstream.maxToolRounds;
    let rounds = 0;

    const callModel = async (): Promise<CanonicalResponse> => {
      rounds++;
      const request: CanonicalRequest = {
        model: upstreamModelName(model),
        messages: [...context.messages, ...followUps],
        tools: tools && tools.length > 0 ? tools : undefined,
        thinking: input.thinking,
        maxTokens: input.maxTokens,
        temperature: input.temperature,
        metadata: { degradations: [], sessionId },
      };
      const response = await this.callUpstream(client, request, config, onDelta, signal);
      degradations.push(...request.metadata.degradations);
      this.deps.sessions.recordUsage(sessionId, response.usage);
      followUps.push(response.message);
      return response;
    };

    let response = await callModel();
    for (;;) {
      const calls = toolCallsOf(response.message);
      if (calls.length === 0) break;

      const gated: GatedCall[] = [];
      for (const call of calls) {
        const result = await this.gateToolCall(call, common, components, hookMessages, touched, signal);
        if (result.status === "blocked") return result;
        gated.push({ call, decision: result.decision });
      }

      const executor = this.deps.toolExecutor;
      if (!executor) {
        // The client runs allowed calls; denied ones are answered here so history stays well-formed
        const denied = gated.filter((g) => g.decision.permission === "deny");
        if (denied.length > 0) {
          followUps.push(createMessage("tool", denied.map((g) => toolResult(g.call.id, denialText(g.decision), true))));
        }
        toolDecisions.push(...gated.map((g) => g.decision));
        break;
      }

      const results: ToolResultSegment[] = [];
      for (const { call, decision } of gated) {
        if (decision.permission !== "allow") {
          results.push(toolResult(call.id, denialText(decision), true));
        } else {
          results.push(await this.runTool(executor, { id: call.id, name: call.name, input: decision.input }, common, components, hookMessages, signal));
          decision.executed = true;
        }
        toolDecisions.push(decision);
      }
      followUps.push(createMessage("tool", results));

      if (maxRounds > 0 && rounds >= maxRounds) {
        log.warn("Tool round limit reached", { sessionId, rounds });
        break;
      }
      response = await callModel();
    }

    // ── Step 5: stop hooks ──
    const stop = await hooks.dispatch(createHookEvent("stop", common, { reason: response.stopReason }), signal);
    if (stop.outcome === "blocked") return blocked("stop", stop.reason);
    hookMessages.push(...stop.systemMessages);

    // ── Step 6: persist ──
    if (signal.aborted) throw new ExchangeCancelledError();
    const { turn, compaction } = await components.compaction.appendTurn(sessionId, [...incoming, ...followUps], "verbatim", { signal });
    if (compaction) compactions.push(compaction);
    this.pendingContext.delete(sessionId);

    return {
      status: "completed",
      turn,
      response,
      degradations,
      hookMessages,
      toolDecisions,
      compactions,
      rounds,
    };
  }

  private async callUpstream(
    client: ProviderClient,
    request: CanonicalRequest,
    config: Readonly<GatewayConfig>,
    onDelta: ((delta: StreamDelta) => void) | undefined,
    signal: AbortSignal,
  ): Promise<CanonicalResponse> {
    let emitted = false;
    return withRetry(
      async () => {
        request.metadata.degradations.length = 0;
        if (!onDelta) return client.complete(request, { signal });
        const stream = client.stream(request, { signal });
        let next = await stream.next();
        while (!next.done) {
          emitted = true;
          onDelta(next.value);
          next = await stream.next();
        }
        return next.value;
      },
      // Deltas already reached the client: a retry would repeat them
      { maxRetries: config.upstream.maxRetries, signal, retryIf: () => !emitted },
    );
  }

  /** pre_tool_use, the file guard, then permission_request when the verdict is "ask" */
  private async gateToolCall(
    call: ToolCallSegment,
    common: HookEventCommon,
    components: Components,
    hookMessages: string[],
    touched: Set<string>,
    signal: AbortSignal,
  ): Promise<Blocked | { status: "gated"; decision: ToolDecision }> {
    const { hooks, config } = components;
    const pre = await hooks.dispatch(
      createHookEvent("pre_tool_use", common, { toolName: call.name, toolInput: call.input, toolUseId: call.id }),
      signal,
    );
    if (pre.outcome === "blocked") return blocked("pre_tool_use", pre.reason);
    hookMessages.push(...pre.systemMessages);

    const input = isJsonObject(pre.updatedInput) ? pre.updatedInput : call.input;
    let permission: PermissionDecision = pre.permission ?? "allow";
    let reason = pre.permissionReason;

    if (permission !== "deny") {
      const verdict = components.fileGuard.check(call.name, input, touched);
      if (!verdict.allowed) {
        permission = "deny";
        reason = verdict.reason;
      }
    }

    if (permission === "ask") {
      if (config.permissionMode === "bypassPermissions") {
        permission = "allow";
      } else if (hooks.hasHandlers("permission_request")) {
        const request = await hooks.dispatch(
          createHookEvent("permission_request", common, { toolName: call.name, toolInput: input }),
          signal,
        );
        hookMessages.push(...request.systemMessages);
        if (request.outcome === "blocked") {
          permission = "deny";
          reason = request.reason ?? reason;
        } else if (request.permission === "allow" || request.permission === "deny") {
          permission = request.permission;
          reason = request.permissionReason ?? reason;
        }
      }
    }

    if (permission !== "allow") {
      log.info("Tool call not allowed", { tool: call.name, toolUseId: call.id, permission, reason });
    }
    const decision: ToolDecision = { toolCallId: call.id, name: call.name, input, permission, executed: false };
    if (reason) decision.reason = reason;
    return { status: "gated", decision };
  }

  private async runTool(
    executor: ToolExecutor,
    call: ToolCallRequest,
    common: HookEventCommon,
    components: Components,
    hookMessages: string[],
    signal: AbortSignal,
  ): Promise<ToolResultSegment> {
    let content: string;
    let isError: boolean;
    try {
      const raw = await executor.execute(call, signal);
      content = typeof raw === "string" ? raw : raw.content;
      isError = typeof raw === "string" ? false : raw.isError === true;
    } catch (err) {
      if (signal.aborted) throw new ExchangeCancelledError();
      content = toErrorMessage(err);
      isError = true;
      log.warn("Tool execution failed", { tool: call.name, toolUseId: call.id, error: content });
    }

    const base = { toolName: call.name, toolInput: call.input, toolUseId: call.id };
    const post = isError
      ? await components.hooks.dispatch(createHookEvent("post_tool_use_failure", common, { ...base, error: content }), signal)
      : await components.hooks.dispatch(createHookEvent("post_tool_use", common, { ...base, toolOutput: content }), signal);
    hookMessages.push(...post.systemMessages);

    // A blocking post hook cannot undo the call; its reason goes back to the model
    if (post.outcome === "blocked" && post.reason) {
      content = `${content}\n\n${wrapSystemReminder(post.reason)}`;
    }

    this.deps.continuity?.logActivity(
      common.sessionId,
      activityKindFor(call.name),
      activityTargetFor(call.name, call.input),
      isError ? "error" : undefined,
    );
    if (!isError) {
      const warning = this.trackDiff(common.sessionId, call, components.config);
      if (warning) content = `${content}\n\n${wrapSystemReminder(warning)}`;
    }
    return toolResult(call.id, content, isError);
  }

  /** Record a successful write against the session's diff totals; the warning text on the first crossing */
  private trackDiff(sessionId: string, call: ToolCallRequest, config: Readonly<GatewayConfig>): string | null {
    const modification = modificationOf(call.name, call.input, config.projectDir);
    if (!modification) return null;
    let monitor = this.diffMonitors.get(sessionId);
    if (!monitor) {
      monitor = new DiffMonitor(config.guardrails);
      this.diffMonitors.set(sessionId, monitor);
    }
    monitor.record(modification);
    const warning = monitor.checkThresholds();
    if (warning) log.warn("Diff size threshold exceeded", { sessionId, ...monitor.stats() });
    return warning;
  }

  private recordSessionEnd(session: Session): void {
    const { continuity } = this.deps;
    if (!continuity) return;
    try {
      continuity.recordSessionEnd(session);
    } catch (err) {
      // Ending succeeds even when the summary cannot be written
      log.error("Session summary not saved", err, { sessionId: session.id });
    }
  }

  // ── Internals ──

  private async fireSessionStart(sessionId: string, source: "startup" | "resume"): Promise<void> {
    const { config, hooks } = this.components();
    if (!hooks.hasHandlers("session_start")) return;
    const resolution = await hooks.dispatch(createHookEvent("session_start", this.hookCommon(sessionId, config), { source }));
    if (resolution.systemMessages.length > 0) {
      this.pendingContext.set(sessionId, [...(this.pendingContext.get(sessionId) ?? []), ...resolution.systemMessages]);
    }
  }

  private hookCommon(sessionId: string, config: Readonly<GatewayConfig>): HookEventCommon {
    return { sessionId, cwd: config.projectDir, permissionMode: config.permissionMode };
  }

  private components(): Components {
    const config = this.deps.config.current();
    const cached = this.snapshots.get(config);
    if (cached) return cached;

    const clients = new Map<ProviderId, ProviderClient>();
    const partial = { config, clients };
    const fallback = defaultProviderId(config);
    const defaultClient = (): ProviderClient => this.client(partial, fallback);
    const defaultModel = upstreamModelName(config.defaultModel);

    const hooks = new HookEngine(config.hooks, {
      projectDir: config.projectDir,
      decisionModel: this.deps.decisionModel ?? clientDecisionModel(defaultClient(), defaultModel),
    });
    const injector = new ContextInjector({
      systemPrompt: config.context.systemPrompt,
      rules: this.deps.rules ?? (config.context.rulesFiles.length > 0 ? new FileRulesSource(config.context.rulesFiles) : undefined),
      coreMemory: this.deps.memory,
      recentSessions: this.deps.continuity,
      attachments: this.deps.attachments ?? [new ProjectFileResolver(config.projectDir)],
      sourceTimeoutMs: config.context.sourceTimeoutMs,
    });
    const compaction = new CompactionEngine({
      sessions: this.deps.sessions,
      summarizer: this.deps.summarizer ?? clientSummarizer(defaultClient(), defaultModel),
      hooks,
      contextWindow: (model) => {
        const name = model ?? config.defaultModel;
        return contextWindowFor(name, providerSettings(config, resolveProvider(name, fallback)).contextWindow);
      },
      cwd: config.projectDir,
      permissionMode: config.permissionMode,
      ...config.compaction,
    });

    const fileGuard = new FileAccessGuard(config.guardrails, config.projectDir);

    const components: Components = { config, hooks, injector, compaction, fileGuard, clients };
    this.snapshots.set(config, components);
    return components;
  }

  private client(components: Pick<Components, "config" | "clients">, provider: ProviderId): ProviderClient {
    const existing = components.clients.get(provider);
    if (existing) return existing;
    const settings = providerSettings(components.config, provider);
    const client = new ProviderClient({
      adapter: getAdapter(provider),
      baseUrl: settings.baseUrl,
      apiKey: settings.apiKey,
      capabilities: settings.capabilities,
      timeoutMs: components.config.upstream.timeoutMs,
      fetch: this.deps.fetch,
    });
    components.clients.set(provider, client);
    return client;
  }
}

function denialText(decision: ToolDecision): string {
  if (decision.permission === "ask") return `Tool call ${decision.name} needs approval and none was given`;
  return decision.reason ? `Tool call denied: ${decision.reason}` : "Tool call denied";
}
