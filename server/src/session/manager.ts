/**
 * Session Manager
 *
 * Owns the in-memory turn lists and keeps them in step with the SessionStore.
 * Each mutation persists first, then updates the cached state, so a crash
 * between the two never leaves memory ahead of disk.
 */

import { nanoid } from "nanoid";
import {
  addUsage,
  emptyUsage,
  textOf,
  totalTurnSize,
  type Message,
  type TokenUsage,
  type Turn,
  type TurnKind,
} from "../canonical/index.js";
import { InvalidRequestError, SessionNotFoundError } from "../errors.js";
import { createComponentLogger } from "../logging.js";
import { createTurn } from "./codec.js";
import type { SessionStore, StoredSession } from "./store.js";
import type {
  CompactionRecord,
  CompactionTrigger,
  CreateSessionOptions,
  Session,
  SessionStats,
  SessionStatus,
  SessionSummary,
  TranscriptEntry,
} from "./types.js";

const log = createComponentLogger("session");

export const DEFAULT_HISTORY_DEPTH = 50;

export interface SessionManagerOptions {
  /** Maximum undone turns kept for redo */
  historyDepth?: number;
}

type SessionState = StoredSession;

function snapshot(state: SessionState): Session {
  return Object.freeze({
    id: state.id,
    createdAt: state.createdAt,
    updatedAt: state.updatedAt,
    status: state.status,
    model: state.model,
    turns: Object.freeze([...state.turns]),
    redo: Object.freeze([...state.redo]),
    budgetUsed: state.budgetUsed,
    usage: Object.freeze({ ...state.usage }),
    endReason: state.endReason,
  });
}

function now(): string {
  return new Date().toISOString();
}

export class SessionManager {
  private sessions = new Map<string, SessionState>();
  private readonly historyDepth: number;

  constructor(
    private readonly store: SessionStore,
    options: SessionManagerOptions = {},
  ) {
    this.historyDepth = Math.max(0, options.historyDepth ?? DEFAULT_HISTORY_DEPTH);
  }

  create(options: CreateSessionOptions = {}): Session {
    const createdAt = now();
    const id = `sess_${nanoid(16)}`;
    this.store.insertSession({ id, model: options.model, createdAt });
    const state: SessionState = {
      id,
      status: "active",
      model: options.model,
      budgetUsed: 0,
      usage: emptyUsage(),
      createdAt,
      updatedAt: createdAt,
      turns: [],
      redo: [],
    };
    this.sessions.set(id, state);
    log.info("Session created", { sessionId: id, model: options.model });
    return snapshot(state);
  }

  /** Cached session, loaded from storage on first access */
  get(id: string): Session {
    return snapshot(this.state(id));
  }

  has(id: string): boolean {
    return this.sessions.has(id) || this.store.exists(id);
  }

  /**
   * Rebuild a session from storage, discarding the cached copy. An ended
   * session becomes active again.
   */
  resume(id: string): Session {
    const stored = this.store.load(id);
    if (!stored) throw new SessionNotFoundError(id);
    if (stored.status !== "active") {
      stored.updatedAt = now();
      this.store.updateStatus(id, "active", null, stored.updatedAt);
      stored.status = "active";
      stored.endReason = undefined;
    }
    this.sessions.set(id, stored);
    log.info("Session resumed", { sessionId: id, turns: stored.turns.length, redo: stored.redo.length });
    return snapshot(stored);
  }

  list(): SessionSummary[] {
    return this.store.list();
  }

  appendTurn(id: string, messages: readonly Message[], kind: TurnKind = "verbatim"): Turn {
    const state = this.writable(id);
    const turn = createTurn(messages, kind);
    const budgetUsed = state.budgetUsed + turn.size;
    const updatedAt = now();

    this.store.appendTurn(id, turn, budgetUsed, updatedAt);

    state.turns.push(turn);
    state.redo = [];
    state.budgetUsed = budgetUsed;
    state.updatedAt = updatedAt;
    return turn;
  }

  /**
   * Move the newest turn to the redo stack. Returns null when there is
   * nothing to undo or the newest turn is a summary.
   */
  undo(id: string): Turn | null {
    const state = this.writable(id);
    const tail = state.turns.at(-1);
    if (!tail || tail.kind === "summary") return null;

    const redo = [...state.redo, tail];
    const dropped = redo.length > this.historyDepth ? redo.splice(0, redo.length - this.historyDepth) : [];
    const budgetUsed = state.budgetUsed - tail.size;
    const updatedAt = now();

    this.store.markUndone(id, tail.id, dropped.map((t) => t.id), budgetUsed, updatedAt);

    state.turns.pop();
    state.redo = redo;
    state.budgetUsed = budgetUsed;
    state.updatedAt = updatedAt;
    if (dropped.length > 0) log.debug("Redo history trimmed", { sessionId: id, dropped: dropped.length });
    return tail;
  }

  redo(id: string): Turn | null {
    const state = this.writable(id);
    const turn = state.redo.at(-1);
    if (!turn) return null;

    const budgetUsed = state.budgetUsed + turn.size;
    const updatedAt = now();

    this.store.markRedone(id, turn.id, budgetUsed, updatedAt);

    state.redo = state.redo.slice(0, -1);
    state.turns.push(turn);
    state.budgetUsed = budgetUsed;
    state.updatedAt = updatedAt;
    return turn;
  }

  end(id: string, reason: string): Session {
    const state = this.state(id);
    if (state.status === "ended") return snapshot(state);
    const updatedAt = now();
    this.store.updateStatus(id, "ended", reason, updatedAt);
    state.status = "ended";
    state.endReason = reason;
    state.updatedAt = updatedAt;
    log.info("Session ended", { sessionId: id, reason });
    return snapshot(state);
  }

  /** Permanently delete a session and everything recorded for it */
  destroy(id: string): boolean {
    this.sessions.delete(id);
    const deleted = this.store.deleteSession(id);
    if (deleted) log.info("Session destroyed", { sessionId: id });
    return deleted;
  }

  recordUsage(id: string, usage: TokenUsage): TokenUsage {
    const state = this.state(id);
    const total = addUsage(state.usage, usage);
    const updatedAt = now();
    this.store.updateUsage(id, total, updatedAt);
    state.usage = total;
    state.updatedAt = updatedAt;
    return total;
  }

  setStatus(id: string, status: SessionStatus): void {
    const state = this.state(id);
    if (state.status === status) return;
    const updatedAt = now();
    this.store.updateStatus(id, status, status === "ended" ? state.endReason ?? null : null, updatedAt);
    state.status = status;
    state.updatedAt = updatedAt;
  }

  /**
   * Replace the first `count` active turns with `summary`. The budget
   * counter becomes the size of the resulting list.
   */
  replacePrefix(id: string, count: number, summary: Turn, trigger: CompactionTrigger = "auto"): CompactionRecord {
    const state = this.state(id);
    if (summary.kind !== "summary") throw new InvalidRequestError("Prefix replacement needs a summary turn");
    if (count < 1 || count > state.turns.length) {
      throw new InvalidRequestError(`Cannot replace ${count} of ${state.turns.length} turns`);
    }

    const removed = state.turns.slice(0, count);
    const turns = [summary, ...state.turns.slice(count)];
    const budgetUsed = totalTurnSize(turns);
    const record: CompactionRecord = {
      id: `cmp_${nanoid(12)}`,
      sessionId: id,
      trigger,
      summaryTurnId: summary.id,
      replacedTurns: count,
      sizeBefore: state.budgetUsed,
      sizeAfter: budgetUsed,
      summary: summary.messages.map(textOf).join("\n\n"),
      createdAt: now(),
    };

    this.store.replacePrefix(id, removed, summary, record, budgetUsed);

    state.turns = turns;
    state.budgetUsed = budgetUsed;
    state.updatedAt = record.createdAt;
    return record;
  }

  compactions(id: string): CompactionRecord[] {
    this.state(id);
    return this.store.compactions(id);
  }

  transcript(id: string): TranscriptEntry[] {
    this.state(id);
    return this.store.transcript(id);
  }

  stats(): SessionStats {
    return this.store.stats();
  }

  // ── internals ──

  private state(id: string): SessionState {
    const cached = this.sessions.get(id);
    if (cached) return cached;
    const stored = this.store.load(id);
    if (!stored) throw new SessionNotFoundError(id);
    this.sessions.set(id, stored);
    return stored;
  }

  private writable(id: string): SessionState {
    const state = this.state(id);
    if (state.status === "ended") throw new InvalidRequestError(`Session ${id} has ended`);
    return state;
  }
}
