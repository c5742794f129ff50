export interface MemoryRecord {
  /** mem_<id>; a new id per version */
  id: string;
  /** Shared by every version of one memory */
  lineageId: string;
  version: number;
  text: string;
  tags: string[];
  /** Normalized lowercase tokens, the text FTS indexes */
  indexKey: string;
  createdAt: string;
  supersededBy: string | null;
  forgottenAt: string | null;
}

export interface SaveMemoryInput {
  text: string;
  tags?: readonly string[];
}

export interface SearchOptions {
  /** Default 10, capped at the store's searchCap */
  limit?: number;
  /** Every listed tag must be present */
  tags?: readonly string[];
  /** Include superseded and forgotten versions */
  includeHistory?: boolean;
}

export interface CoreBlock {
  name: string;
  content: string;
  updatedAt: string;
}

export interface MemoryStats {
  records: number;
  lineages: number;
  forgotten: number;
  coreBlocks: number;
}

export type ActivityKind = "file_read" | "file_write" | "file_edit" | "command" | "tool_call";

export interface ActivityEntry {
  id: number;
  sessionId: string;
  kind: ActivityKind;
  /** Path, command or tool name */
  target: string;
  /** "error" when the tool failed */
  details?: string;
  createdAt: string;
}

export interface RecentSession {
  sessionId: string;
  summary: string;
  filesModified: string[];
  startedAt: string;
  endedAt: string;
}

export interface SessionSummaryInput {
  sessionId: string;
  summary: string;
  filesModified: readonly string[];
  startedAt: string;
}
