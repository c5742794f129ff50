/**
 * Session Store
 *
 * SQLite persistence for sessions, their turn lists and the compaction
 * transcript. Every mutation runs in one transaction and is durable before
 * the call returns.
 */

import type { GatewayDatabase } from "../db/index.js";
import type { TokenUsage, Turn, TurnKind } from "../canonical/index.js";
import { decodeMessages, decodeTurn, encodeMessages } from "./codec.js";
import type {
  CompactionRecord,
  CompactionTrigger,
  SessionStats,
  SessionStatus,
  SessionSummary,
  TranscriptEntry,
} from "./types.js";

// ============================================
// ROW TYPES
// ============================================

interface SessionRow {
  id: string;
  status: SessionStatus;
  model: string | null;
  budget_used: number;
  input_tokens: number;
  output_tokens: number;
  cache_read_tokens: number;
  cache_creation_tokens: number;
  end_reason: string | null;
  created_at: string;
  updated_at: string;
}

interface TurnRow {
  turn_id: string;
  state: "active" | "undone";
  kind: TurnKind;
  messages: string;
  size: number;
  created_at: string;
}

interface CompactionRow {
  id: string;
  session_id: string;
  trigger_kind: CompactionTrigger;
  summary_turn_id: string;
  replaced_turns: number;
  size_before: number;
  size_after: number;
  summary: string;
  created_at: string;
}

interface TranscriptRow {
  session_id: string;
  turn_id: string;
  kind: TurnKind;
  messages: string;
  size: number;
  created_at: string;
  archived_at: string;
}

/** Everything needed to rebuild a session in memory */
export interface StoredSession {
  id: string;
  status: SessionStatus;
  model?: string;
  budgetUsed: number;
  usage: TokenUsage;
  endReason?: string;
  createdAt: string;
  updatedAt: string;
  turns: Turn[];
  redo: Turn[];
}

export interface NewSessionRow {
  id: string;
  model?: string;
  createdAt: string;
}

function rowToUsage(row: SessionRow): TokenUsage {
  return {
    inputTokens: row.input_tokens,
    outputTokens: row.output_tokens,
    cacheReadTokens: row.cache_read_tokens,
    cacheCreationTokens: row.cache_creation_tokens,
  };
}

function rowToCompaction(row: CompactionRow): CompactionRecord {
  return {
    id: row.id,
    sessionId: row.session_id,
    trigger: row.trigger_kind,
    summaryTurnId: row.summary_turn_id,
    replacedTurns: row.replaced_turns,
    sizeBefore: row.size_before,
    sizeAfter: row.size_after,
    summary: row.summary,
    createdAt: row.created_at,
  };
}

// ============================================
// STORE
// ============================================

export class SessionStore {
  constructor(private readonly db: GatewayDatabase) {}

  insertSession(row: NewSessionRow): void {
    this.db
      .prepare<[string, string | null, string, string]>(
        "INSERT INTO sessions (id, status, model, created_at, updated_at) VALUES (?, 'active', ?, ?, ?)",
      )
      .run(row.id, row.model ?? null, row.createdAt, row.createdAt);
  }

  exists(id: string): boolean {
    return this.db.prepare<[string], { id: string }>("SELECT id FROM sessions WHERE id = ?").get(id) !== undefined;
  }

  load(id: string): StoredSession | null {
    const row = this.db.prepare<[string], SessionRow>("SELECT * FROM sessions WHERE id = ?").get(id);
    if (!row) return null;

    const turnRows = this.db
      .prepare<[string], TurnRow>(
        "SELECT turn_id, state, kind, messages, size, created_at FROM session_turns WHERE session_id = ? ORDER BY state, position",
      )
      .all(id);

    return {
      id: row.id,
      status: row.status,
      model: row.model ?? undefined,
      budgetUsed: row.budget_used,
      usage: rowToUsage(row),
      endReason: row.end_reason ?? undefined,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      turns: turnRows.filter((r) => r.state === "active").map(decodeTurn),
      redo: turnRows.filter((r) => r.state === "undone").map(decodeTurn),
    };
  }

  list(): SessionSummary[] {
    const rows = this.db
      .prepare<[], SessionRow & { turn_count: number }>(`
        SELECT s.*, (SELECT COUNT(*) FROM session_turns t WHERE t.session_id = s.id AND t.state = 'active') AS turn_count
        FROM sessions s
        ORDER BY s.updated_at DESC, s.id
      `)
      .all();
    return rows.map((row) => ({
      id: row.id,
      status: row.status,
      model: row.model ?? undefined,
      turnCount: row.turn_count,
      budgetUsed: row.budget_used,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    }));
  }

  /** Append an active turn and drop the redo stack */
  appendTurn(sessionId: string, turn: Turn, budgetUsed: number, updatedAt: string): void {
    this.db.transaction(() => {
      this.db.prepare<[string]>("DELETE FROM session_turns WHERE session_id = ? AND state = 'undone'").run(sessionId);
      this.insertTurn(sessionId, turn, this.nextPosition(sessionId, "active"), "active");
      this.touch(sessionId, budgetUsed, updatedAt);
    })();
  }

  /** Move an active turn onto the redo stack; `dropTurnIds` fall off its bottom */
  markUndone(sessionId: string, turnId: string, dropTurnIds: readonly string[], budgetUsed: number, updatedAt: string): void {
    this.db.transaction(() => {
      const position = this.nextPosition(sessionId, "undone");
      this.db
        .prepare<[number, string, string]>(
          "UPDATE session_turns SET state = 'undone', position = ? WHERE session_id = ? AND turn_id = ?",
        )
        .run(position, sessionId, turnId);
      const drop = this.db.prepare<[string, string]>("DELETE FROM session_turns WHERE session_id = ? AND turn_id = ?");
      for (const id of dropTurnIds) drop.run(sessionId, id);
      this.touch(sessionId, budgetUsed, updatedAt);
    })();
  }

  markRedone(sessionId: string, turnId: string, budgetUsed: number, updatedAt: string): void {
    this.db.transaction(() => {
      const position = this.nextPosition(sessionId, "active");
      this.db
        .prepare<[number, string, string]>(
          "UPDATE session_turns SET state = 'active', position = ? WHERE session_id = ? AND turn_id = ?",
        )
        .run(position, sessionId, turnId);
      this.touch(sessionId, budgetUsed, updatedAt);
    })();
  }

  /**
   * Swap a prefix of the active list for a summary turn. Removed turns are
   * copied to the transcript before their rows go.
   */
  replacePrefix(
    sessionId: string,
    removed: readonly Turn[],
    summary: Turn,
    record: CompactionRecord,
    budgetUsed: number,
  ): void {
    this.db.transaction(() => {
      const first = this.db
        .prepare<[string], { position: number | null }>(
          "SELECT MIN(position) AS position FROM session_turns WHERE session_id = ? AND state = 'active'",
        )
        .get(sessionId)?.position ?? 0;

      const archive = this.db.prepare<[string, string, TurnKind, string, number, string, string]>(`
        INSERT INTO transcript (session_id, turn_id, kind, messages, size, created_at, archived_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `);
      const remove = this.db.prepare<[string, string]>("DELETE FROM session_turns WHERE session_id = ? AND turn_id = ?");
      for (const turn of removed) {
        archive.run(sessionId, turn.id, turn.kind, encodeMessages(turn.messages), turn.size, turn.createdAt, record.createdAt);
        remove.run(sessionId, turn.id);
      }

      this.insertTurn(sessionId, summary, first, "active");

      this.db
        .prepare<[string, string, CompactionTrigger, string, number, number, number, string, string]>(`
          INSERT INTO compactions (id, session_id, trigger_kind, summary_turn_id, replaced_turns, size_before, size_after, summary, created_at)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
        `)
        .run(
          record.id,
          sessionId,
          record.trigger,
          record.summaryTurnId,
          record.replacedTurns,
          record.sizeBefore,
          record.sizeAfter,
          record.summary,
          record.createdAt,
        );

      this.touch(sessionId, budgetUsed, record.createdAt);
    })();
  }

  updateStatus(sessionId: string, status: SessionStatus, endReason: string | null, updatedAt: string): void {
    this.db
      .prepare<[SessionStatus, string | null, string, string]>(
        "UPDATE sessions SET status = ?, end_reason = ?, updated_at = ? WHERE id = ?",
      )
      .run(status, endReason, updatedAt, sessionId);
  }

  updateUsage(sessionId: string, usage: TokenUsage, updatedAt: string): void {
    this.db
      .prepare<[number, number, number, number, string, string]>(`
        UPDATE sessions
        SET input_tokens = ?, output_tokens = ?, cache_read_tokens = ?, cache_creation_tokens = ?, updated_at = ?
        WHERE id = ?
      `)
      .run(usage.inputTokens, usage.outputTokens, usage.cacheReadTokens, usage.cacheCreationTokens, updatedAt, sessionId);
  }

  /** Deletes the session and, by cascade, its turns, transcript and compactions */
  deleteSession(sessionId: string): boolean {
    return this.db.prepare<[string]>("DELETE FROM sessions WHERE id = ?").run(sessionId).changes > 0;
  }

  compactions(sessionId: string): CompactionRecord[] {
    return this.db
      .prepare<[string], CompactionRow>("SELECT * FROM compactions WHERE session_id = ? ORDER BY created_at, rowid")
      .all(sessionId)
      .map(rowToCompaction);
  }

  transcript(sessionId: string): TranscriptEntry[] {
    return this.db
      .prepare<[string], TranscriptRow>(
        "SELECT session_id, turn_id, kind, messages, size, created_at, archived_at FROM transcript WHERE session_id = ? ORDER BY id",
      )
      .all(sessionId)
      .map((row) => ({
        sessionId: row.session_id,
        turnId: row.turn_id,
        kind: row.kind,
        messages: decodeMessages(row.messages),
        size: row.size,
        createdAt: row.created_at,
        archivedAt: row.archived_at,
      }));
  }

  stats(): SessionStats {
    const byStatus = this.db
      .prepare<[], { status: SessionStatus; n: number }>("SELECT status, COUNT(*) AS n FROM sessions GROUP BY status")
      .all();
    const totals = this.db
      .prepare<[], { input: number | null; output: number | null; cache_read: number | null; cache_creation: number | null }>(`
        SELECT SUM(input_tokens) AS input, SUM(output_tokens) AS output,
               SUM(cache_read_tokens) AS cache_read, SUM(cache_creation_tokens) AS cache_creation
        FROM sessions
      `)
      .get();
    const turns = this.db
      .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM session_turns WHERE state = 'active'")
      .get();

    const sessions: Record<SessionStatus, number> = { active: 0, compacting: 0, ended: 0 };
    for (const row of byStatus) sessions[row.status] = row.n;

    return {
      sessions,
      turns: turns?.n ?? 0,
      usage: {
        inputTokens: totals?.input ?? 0,
        outputTokens: totals?.output ?? 0,
        cacheReadTokens: totals?.cache_read ?? 0,
        cacheCreationTokens: totals?.cache_creation ?? 0,
      },
    };
  }

  // ── internals ──

  private nextPosition(sessionId: string, state: "active" | "undone"): number {
    const row = this.db
      .prepare<[string, string], { position: number | null }>(
        "SELECT MAX(position) AS position FROM session_turns WHERE session_id = ? AND state = ?",
      )
      .get(sessionId, state);
    return (row?.position ?? -1) + 1;
  }

  private insertTurn(sessionId: string, turn: Turn, position: number, state: "active" | "undone"): void {
    this.db
      .prepare<[string, string, number, string, TurnKind, string, number, string]>(`
        INSERT INTO session_turns (session_id, turn_id, position, state, kind, messages, size, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(sessionId, turn.id, position, state, turn.kind, encodeMessages(turn.messages), turn.size, turn.createdAt);
  }

  private touch(sessionId: string, budgetUsed: number, updatedAt: string): void {
    this.db
      .prepare<[number, string, string]>("UPDATE sessions SET budget_used = ?, updated_at = ? WHERE id = ?")
      .run(budgetUsed, updatedAt, sessionId);
  }
}
