import type { Message, TokenUsage, Turn } from "../canonical/index.js";

export type SessionStatus = "active" | "compacting" | "ended";

/** Read-only snapshot of a session. Mutations go through SessionManager. */
export interface Session {
  readonly id: string;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly status: SessionStatus;
  readonly model?: string;
  /** Active turns, oldest first. At most the first one is a summary. */
  readonly turns: readonly Turn[];
  /** Undone turns, most recent last */
  readonly redo: readonly Turn[];
  readonly budgetUsed: number;
  readonly usage: TokenUsage;
  readonly endReason?: string;
}

export interface SessionSummary {
  id: string;
  status: SessionStatus;
  model?: string;
  turnCount: number;
  budgetUsed: number;
  createdAt: string;
  updatedAt: string;
}

export interface SessionStats {
  sessions: Record<SessionStatus, number>;
  turns: number;
  usage: TokenUsage;
}

export type CompactionTrigger = "auto" | "manual";

export interface CompactionRecord {
  id: string;
  sessionId: string;
  trigger: CompactionTrigger;
  summaryTurnId: string;
  replacedTurns: number;
  sizeBefore: number;
  sizeAfter: number;
  summary: string;
  createdAt: string;
}

export interface TranscriptEntry {
  sessionId: string;
  turnId: string;
  kind: Turn["kind"];
  messages: readonly Message[];
  size: number;
  createdAt: string;
  archivedAt: string;
}

export interface CreateSessionOptions {
  model?: string;
}
