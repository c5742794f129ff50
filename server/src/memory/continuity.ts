/**
 * Session Continuity
 *
 * Short-term memory between sessions: an activity log written as tools run,
 * and one summary per ended session. Both expire after a fixed window.
 * formatRecentContext() renders the live summaries for the system tier.
 */

import type { GatewayDatabase } from "../db/index.js";
import { textOf } from "../canonical/messages.js";
import type { JsonObject } from "../canonical/types.js";
import { createComponentLogger } from "../logging.js";
import type { Session } from "../session/index.js";
import type { ActivityEntry, ActivityKind, RecentSession, SessionSummaryInput } from "./types.js";

const log = createComponentLogger("memory.continuity");

export const DEFAULT_RECENT_SESSION_HOURS = 48;
export const DEFAULT_RECENT_SESSION_LIMIT = 5;

const MODIFYING_KINDS: readonly ActivityKind[] = ["file_write", "file_edit"];

export interface ContinuityStoreOptions {
  expiryHours?: number;
  recentLimit?: number;
}

interface RecentRow {
  session_id: string;
  summary: string;
  files_modified: string;
  started_at: string;
  ended_at: string;
}

interface ActivityRow {
  id: number;
  session_id: string;
  kind: ActivityKind;
  target: string;
  details: string | null;
  created_at: string;
}

function parseList(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((f): f is string => typeof f === "string") : [];
}

function rowToRecent(row: RecentRow): RecentSession {
  return {
    sessionId: row.session_id,
    summary: row.summary,
    filesModified: parseList(row.files_modified),
    startedAt: row.started_at,
    endedAt: row.ended_at,
  };
}

function rowToActivity(row: ActivityRow): ActivityEntry {
  const entry: ActivityEntry = {
    id: row.id,
    sessionId: row.session_id,
    kind: row.kind,
    target: row.target,
    createdAt: row.created_at,
  };
  if (row.details !== null) entry.details = row.details;
  return entry;
}

function clip(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/** Activity kind for a tool by name */
export function activityKindFor(toolName: string): ActivityKind {
  switch (toolName) {
    case "Read":
      return "file_read";
    case "Write":
      return "file_write";
    case "Edit":
    case "MultiEdit":
      return "file_edit";
    case "Bash":
      return "command";
    default:
      return "tool_call";
  }
}

/** What a tool call acted on: its path or command, else the tool name */
export function activityTargetFor(toolName: string, input: JsonObject): string {
  for (const key of ["path", "file_path", "command"]) {
    const value = input[key];
    if (typeof value === "string" && value) return value;
  }
  return toolName;
}

/**
 * Plain-text digest of a session: the first line of each user request and
 * the opening of the last assistant reply. Empty when there is nothing to say.
 */
export function summarizeSession(session: Session): string {
  const requests: string[] = [];
  let lastReply = "";

  for (const turn of session.turns) {
    if (turn.kind !== "verbatim") continue;
    for (const message of turn.messages) {
      const text = textOf(message).trim();
      if (!text) continue;
      if (message.role === "user") {
        requests.push(clip(text.split("\n")[0] ?? "", 100));
      } else if (message.role === "assistant") {
        lastReply = clip(text.split("\n").slice(0, 3).join(" "), 200);
      }
    }
  }

  const parts: string[] = [];
  if (requests.length > 0) parts.push(`User requests: ${requests.join("; ")}`);
  if (lastReply) parts.push(`Last action: ${lastReply}`);
  return parts.join("\n");
}

export class ContinuityStore {
  private readonly expiryMs: number;
  private readonly recentLimit: number;

  constructor(
    private readonly db: GatewayDatabase,
    options: ContinuityStoreOptions = {},
  ) {
    this.expiryMs = (options.expiryHours ?? DEFAULT_RECENT_SESSION_HOURS) * 3_600_000;
    this.recentLimit = Math.max(1, options.recentLimit ?? DEFAULT_RECENT_SESSION_LIMIT);
  }

  // ── Activity ──

  logActivity(sessionId: string, kind: ActivityKind, target: string, details?: string): ActivityEntry {
    const createdAt = new Date().toISOString();
    const result = this.db
      .prepare<[string, string, string, string | null, string]>(
        "INSERT INTO recent_activity (session_id, kind, target, details, created_at) VALUES (?, ?, ?, ?, ?)",
      )
      .run(sessionId, kind, target, details ?? null, createdAt);
    const entry: ActivityEntry = { id: Number(result.lastInsertRowid), sessionId, kind, target, createdAt };
    if (details !== undefined) entry.details = details;
    return entry;
  }

  /** Newest first */
  activities(sessionId: string): ActivityEntry[] {
    return this.db
      .prepare<[string], ActivityRow>("SELECT * FROM recent_activity WHERE session_id = ? ORDER BY created_at DESC, id DESC")
      .all(sessionId)
      .map(rowToActivity);
  }

  filesModified(sessionId: string): string[] {
    return this.db
      .prepare<[string, string], { target: string }>(`
        SELECT DISTINCT target FROM recent_activity
        WHERE session_id = ? AND kind IN (SELECT value FROM json_each(?))
        ORDER BY target
      `)
      .all(sessionId, JSON.stringify(MODIFYING_KINDS))
      .map((r) => r.target);
  }

  // ── Session summaries ──

  saveSessionSummary(input: SessionSummaryInput): RecentSession {
    const recent: RecentSession = {
      sessionId: input.sessionId,
      summary: input.summary,
      filesModified: [...input.filesModified],
      startedAt: input.startedAt,
      endedAt: new Date().toISOString(),
    };
    this.db
      .prepare<[string, string, string, string, string]>(`
        INSERT INTO recent_sessions (session_id, summary, files_modified, started_at, ended_at) VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(session_id) DO UPDATE SET
          summary = excluded.summary,
          files_modified = excluded.files_modified,
          ended_at = excluded.ended_at
      `)
      .run(recent.sessionId, recent.summary, JSON.stringify(recent.filesModified), recent.startedAt, recent.endedAt);
    return recent;
  }

  /** Summarize an ending session and prune expired entries. Null when the session said nothing. */
  recordSessionEnd(session: Session): RecentSession | null {
    const summary = summarizeSession(session);
    const recent = summary
      ? this.saveSessionSummary({
          sessionId: session.id,
          summary,
          filesModified: this.filesModified(session.id),
          startedAt: session.createdAt,
        })
      : null;

    const pruned = this.cleanupExpired();
    if (pruned.sessions > 0 || pruned.activities > 0) {
      log.debug("Expired continuity entries removed", { ...pruned });
    }
    return recent;
  }

  /** Sessions ended inside the window, newest first */
  recentSessions(limit = this.recentLimit): RecentSession[] {
    return this.db
      .prepare<[string, number], RecentRow>("SELECT * FROM recent_sessions WHERE ended_at > ? ORDER BY ended_at DESC LIMIT ?")
      .all(this.cutoff(), Math.max(1, limit))
      .map(rowToRecent);
  }

  cleanupExpired(): { sessions: number; activities: number } {
    const cutoff = this.cutoff();
    return this.db.transaction(() => ({
      sessions: this.db.prepare<[string]>("DELETE FROM recent_sessions WHERE ended_at <= ?").run(cutoff).changes,
      activities: this.db.prepare<[string]>("DELETE FROM recent_activity WHERE created_at <= ?").run(cutoff).changes,
    }))();
  }

  /** Recent sessions as one prompt section, or "" when there are none */
  formatRecentContext(): string {
    const sessions = this.recentSessions();
    if (sessions.length === 0) return "";

    const lines = ["<recent_sessions>", "The following sessions occurred recently. Use this context to maintain continuity:", ""];
    sessions.forEach((s, i) => {
      lines.push(`### Session ${i + 1} (ended ${s.endedAt})`, s.summary);
      if (s.filesModified.length > 0) lines.push(`Files modified: ${s.filesModified.join(", ")}`);
      lines.push("");
    });
    lines.push("</recent_sessions>");
    return lines.join("\n");
  }

  private cutoff(): string {
    return new Date(Date.now() - this.expiryMs).toISOString();
  }
}
