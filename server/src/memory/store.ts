/**
 * Memory Store
 *
 * Archival memory is append-or-supersede: an update writes a new version in
 * the same lineage and marks the old one superseded; forgetting stamps
 * `forgotten_at`. Rows are never deleted. Core memory holds small named
 * blocks that are replaced whole and injected into every exchange.
 *
 * better-sqlite3 runs every call to completion on the calling thread, so
 * writes to a record never interleave; multi-statement writes share one
 * transaction.
 */

import { nanoid } from "nanoid";
import type { GatewayDatabase } from "../db/index.js";
import { InvalidRequestError, MemoryCapacityError, MemoryConflictError, MemoryNotFoundError } from "../errors.js";
import { createComponentLogger } from "../logging.js";
import { indexKeyFor, normalizeTags, toMatchQuery } from "./tokens.js";
import type { CoreBlock, MemoryRecord, MemoryStats, SaveMemoryInput, SearchOptions } from "./types.js";

const log = createComponentLogger("memory");

export const DEFAULT_SEARCH_LIMIT = 10;
export const DEFAULT_SEARCH_CAP = 50;
export const DEFAULT_MAX_CORE_BLOCK_CHARS = 4000;

const CORE_BLOCK_NAME = /^[a-z][a-z0-9_]*$/;

export interface MemoryStoreOptions {
  searchCap?: number;
  maxCoreBlockChars?: number;
}

interface RecordRow {
  id: string;
  lineage_id: string;
  version: number;
  text: string;
  tags: string;
  index_key: string;
  created_at: string;
  superseded_by: string | null;
  forgotten_at: string | null;
}

interface CoreRow {
  name: string;
  content: string;
  updated_at: string;
}

function parseTags(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((t): t is string => typeof t === "string") : [];
}

function rowToRecord(row: RecordRow): MemoryRecord {
  return {
    id: row.id,
    lineageId: row.lineage_id,
    version: row.version,
    text: row.text,
    tags: parseTags(row.tags),
    indexKey: row.index_key,
    createdAt: row.created_at,
    supersededBy: row.superseded_by,
    forgottenAt: row.forgotten_at,
  };
}

function rowToBlock(row: CoreRow): CoreBlock {
  return { name: row.name, content: row.content, updatedAt: row.updated_at };
}

export class MemoryStore {
  private readonly searchCap: number;
  private readonly maxCoreBlockChars: number;

  constructor(
    private readonly db: GatewayDatabase,
    options: MemoryStoreOptions = {},
  ) {
    this.searchCap = Math.max(1, options.searchCap ?? DEFAULT_SEARCH_CAP);
    this.maxCoreBlockChars = options.maxCoreBlockChars ?? DEFAULT_MAX_CORE_BLOCK_CHARS;
  }

  // ============================================
  // ARCHIVAL
  // ============================================

  save(input: SaveMemoryInput): MemoryRecord {
    const text = input.text.trim();
    if (!text) throw new InvalidRequestError("Memory text is empty");
    const id = this.newId();
    const record: MemoryRecord = {
      id,
      lineageId: id,
      version: 1,
      text,
      tags: normalizeTags(input.tags),
      indexKey: indexKeyFor(text),
      createdAt: new Date().toISOString(),
      supersededBy: null,
      forgottenAt: null,
    };
    this.db.transaction(() => this.insert(record))();
    log.debug("Memory saved", { id, tags: record.tags });
    return record;
  }

  get(id: string): MemoryRecord | null {
    const row = this.db.prepare<[string], RecordRow>("SELECT * FROM memory_records WHERE id = ?").get(id);
    return row ? rowToRecord(row) : null;
  }

  /** New version of a current record; the old version is marked superseded */
  update(id: string, text: string, tags?: readonly string[]): MemoryRecord {
    const trimmed = text.trim();
    if (!trimmed) throw new InvalidRequestError("Memory text is empty");

    return this.db.transaction(() => {
      const current = this.current(id);
      const record: MemoryRecord = {
        id: this.newId(),
        lineageId: current.lineageId,
        version: current.version + 1,
        text: trimmed,
        tags: tags ? normalizeTags(tags) : current.tags,
        indexKey: indexKeyFor(trimmed),
        createdAt: new Date().toISOString(),
        supersededBy: null,
        forgottenAt: null,
      };
      this.insert(record);
      this.db.prepare<[string, string]>("UPDATE memory_records SET superseded_by = ? WHERE id = ?").run(record.id, id);
      log.debug("Memory updated", { id: record.id, lineageId: record.lineageId, version: record.version });
      return record;
    })();
  }

  /** Soft delete: the record stays on disk but leaves default search */
  forget(id: string): MemoryRecord {
    return this.db.transaction(() => {
      const current = this.current(id);
      const forgottenAt = new Date().toISOString();
      this.db.prepare<[string, string]>("UPDATE memory_records SET forgotten_at = ? WHERE id = ?").run(forgottenAt, id);
      log.debug("Memory forgotten", { id });
      return { ...current, forgottenAt };
    })();
  }

  /**
   * Ranked full-text search (bm25, best first). Results are deduplicated by
   * lineage and by identical text, keeping the best-ranked entry.
   */
  search(query: string, options: SearchOptions = {}): MemoryRecord[] {
    const match = toMatchQuery(query);
    if (!match) return [];

    const limit = Math.min(Math.max(1, options.limit ?? DEFAULT_SEARCH_LIMIT), this.searchCap);
    const tags = normalizeTags(options.tags);
    const rows = this.db
      .prepare<[string, number, string], RecordRow>(`
        SELECT r.*, bm25(memory_fts) AS score
        FROM memory_fts
        JOIN memory_records r ON r.id = memory_fts.record_id
        WHERE memory_fts MATCH ?
          AND (? = 1 OR (r.superseded_by IS NULL AND r.forgotten_at IS NULL))
          AND NOT EXISTS (
            SELECT 1 FROM json_each(?) wanted
            WHERE wanted.value NOT IN (SELECT value FROM json_each(r.tags))
          )
        ORDER BY score, r.created_at DESC
      `)
      .all(match, options.includeHistory ? 1 : 0, JSON.stringify(tags));

    const lineages = new Set<string>();
    const texts = new Set<string>();
    const results: MemoryRecord[] = [];
    for (const row of rows) {
      if (lineages.has(row.lineage_id) || texts.has(row.text)) continue;
      lineages.add(row.lineage_id);
      texts.add(row.text);
      results.push(rowToRecord(row));
      if (results.length >= limit) break;
    }
    return results;
  }

  /** Every version of a lineage, oldest first */
  history(lineageId: string): MemoryRecord[] {
    return this.db
      .prepare<[string], RecordRow>("SELECT * FROM memory_records WHERE lineage_id = ? ORDER BY version")
      .all(lineageId)
      .map(rowToRecord);
  }

  stats(): MemoryStats {
    const row = this.db
      .prepare<[], { records: number; lineages: number; forgotten: number | null }>(`
        SELECT COUNT(*) AS records,
               COUNT(DISTINCT lineage_id) AS lineages,
               SUM(CASE WHEN forgotten_at IS NOT NULL THEN 1 ELSE 0 END) AS forgotten
        FROM memory_records
      `)
      .get();
    const core = this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM core_memory").get();
    return {
      records: row?.records ?? 0,
      lineages: row?.lineages ?? 0,
      forgotten: row?.forgotten ?? 0,
      coreBlocks: core?.n ?? 0,
    };
  }

  // ============================================
  // CORE
  // ============================================

  /** Replace a block whole. Oversized content is rejected and the old value kept. */
  writeCore(name: string, content: string): CoreBlock {
    if (!CORE_BLOCK_NAME.test(name)) {
      throw new InvalidRequestError(`Core memory block name "${name}" must match ${CORE_BLOCK_NAME.source}`);
    }
    if (content.length > this.maxCoreBlockChars) {
      throw new MemoryCapacityError(name, content.length, this.maxCoreBlockChars);
    }
    const block: CoreBlock = { name, content, updatedAt: new Date().toISOString() };
    this.db
      .prepare<[string, string, string]>(`
        INSERT INTO core_memory (name, content, updated_at) VALUES (?, ?, ?)
        ON CONFLICT(name) DO UPDATE SET content = excluded.content, updated_at = excluded.updated_at
      `)
      .run(block.name, block.content, block.updatedAt);
    log.debug("Core memory written", { name, chars: content.length });
    return block;
  }

  readCore(name: string): CoreBlock | null {
    const row = this.db.prepare<[string], CoreRow>("SELECT * FROM core_memory WHERE name = ?").get(name);
    return row ? rowToBlock(row) : null;
  }

  listCore(): CoreBlock[] {
    return this.db.prepare<[], CoreRow>("SELECT * FROM core_memory ORDER BY name").all().map(rowToBlock);
  }

  deleteCore(name: string): boolean {
    return this.db.prepare<[string]>("DELETE FROM core_memory WHERE name = ?").run(name).changes > 0;
  }

  /** Core blocks as one prompt section, or "" when there are none */
  formatCoreMemory(): string {
    const blocks = this.listCore();
    if (blocks.length === 0) return "";
    const body = blocks.map((b) => `<${b.name}>\n${b.content}\n</${b.name}>\n`).join("");
    return `<core_memory>\n${body}</core_memory>`;
  }

  // ── internals ──

  private newId(): string {
    return `mem_${nanoid(16)}`;
  }

  /** The record if it is the live version of its lineage */
  private current(id: string): MemoryRecord {
    const record = this.get(id);
    if (!record || record.forgottenAt) throw new MemoryNotFoundError(id);
    if (record.supersededBy) throw new MemoryConflictError(id, record.supersededBy);
    return record;
  }

  private insert(record: MemoryRecord): void {
    this.db
      .prepare<[string, string, number, string, string, string, string]>(`
        INSERT INTO memory_records (id, lineage_id, version, text, tags, index_key, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        record.id,
        record.lineageId,
        record.version,
        record.text,
        JSON.stringify(record.tags),
        record.indexKey,
        record.createdAt,
      );
    this.db.prepare<[string, string]>("INSERT INTO memory_fts (record_id, index_key) VALUES (?, ?)").run(record.id, record.indexKey);
  }
}
