/**
 * Database Migrations
 *
 * Sequential, numbered migrations that bring the schema from any prior
 * version to the current one. Runs whenever a database is opened.
 *
 * Rules:
 * - Migrations are append-only. Never edit a shipped migration.
 * - Each migration runs inside a transaction.
 * - To evolve the schema, add a function to the `migrations` array.
 */

import type Database from "better-sqlite3";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("db.migrations");

type Migration = (db: Database.Database) => void;

/**
 * Run all pending migrations. Already-applied migrations are skipped.
 */
export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const currentVersion = db.prepare<[], { v: number | null }>("SELECT MAX(version) AS v FROM schema_version").get()?.v ?? -1;
  const target = migrations.length - 1;
  if (currentVersion >= target) return;

  log.info("Migrating schema", { from: currentVersion, to: target });

  const stamp = db.prepare<[number]>("INSERT INTO schema_version (version, applied_at) VALUES (?, datetime('now'))");

  migrations.forEach((migrate, version) => {
    if (version <= currentVersion) return;
    db.transaction(() => {
      migrate(db);
      stamp.run(version);
    })();
    log.debug("Applied migration", { version });
  });
}

export function schemaVersion(db: Database.Database): number {
  return db.prepare<[], { v: number | null }>("SELECT MAX(version) AS v FROM schema_version").get()?.v ?? -1;
}

// ============================================
// MIGRATIONS
// ============================================

const migrations: Migration[] = [
  // ── v0: Baseline ──────────────────────────────────────────────────
  function v0_baseline(db) {
    db.exec(`
      -- Sessions and their turn lists
      CREATE TABLE sessions (
        id TEXT PRIMARY KEY,
        status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'compacting', 'ended')),
        model TEXT,
        budget_used INTEGER NOT NULL DEFAULT 0,
        input_tokens INTEGER NOT NULL DEFAULT 0,
        output_tokens INTEGER NOT NULL DEFAULT 0,
        cache_read_tokens INTEGER NOT NULL DEFAULT 0,
        cache_creation_tokens INTEGER NOT NULL DEFAULT 0,
        end_reason TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      -- Active turns ordered by position; undone turns form the redo stack (highest position = most recent)
      CREATE TABLE session_turns (
        session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
        turn_id TEXT NOT NULL,
        position INTEGER NOT NULL,
        state TEXT NOT NULL CHECK (state IN ('active', 'undone')),
        kind TEXT NOT NULL CHECK (kind IN ('verbatim', 'summary')),
        messages TEXT NOT NULL,
        size INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        PRIMARY KEY (session_id, turn_id)
      );
      CREATE INDEX idx_session_turns_order ON session_turns(session_id, state, position);

      -- Immutable log of every turn removed by compaction
      CREATE TABLE transcript (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
        turn_id TEXT NOT NULL,
        kind TEXT NOT NULL,
        messages TEXT NOT NULL,
        size INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        archived_at TEXT NOT NULL
      );
      CREATE INDEX idx_transcript_session ON transcript(session_id, id);

      CREATE TABLE compactions (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
        trigger_kind TEXT NOT NULL,
        summary_turn_id TEXT NOT NULL,
        replaced_turns INTEGER NOT NULL,
        size_before INTEGER NOT NULL,
        size_after INTEGER NOT NULL,
        summary TEXT NOT NULL,
        created_at TEXT NOT NULL
      );
      CREATE INDEX idx_compactions_session ON compactions(session_id, created_at);

      -- Archival memory: versioned records, never deleted
      CREATE TABLE memory_records (
        id TEXT PRIMARY KEY,
        lineage_id TEXT NOT NULL,
        version INTEGER NOT NULL,
        text TEXT NOT NULL,
        tags TEXT NOT NULL DEFAULT '[]',
        index_key TEXT NOT NULL,
        created_at TEXT NOT NULL,
        superseded_by TEXT,
        forgotten_at TEXT,
        UNIQUE (lineage_id, version)
      );

      CREATE VIRTUAL TABLE memory_fts USING fts5(record_id UNINDEXED, index_key);

      -- Core memory: named blocks replaced whole
      CREATE TABLE core_memory (
        name TEXT PRIMARY KEY,
        content TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
  },

  // ── v1: Session continuity ────────────────────────────────────────
  function v1_recent_sessions(db) {
    db.exec(`
      -- One summary per ended session; expires with the continuity window
      CREATE TABLE recent_sessions (
        session_id TEXT PRIMARY KEY,
        summary TEXT NOT NULL,
        files_modified TEXT NOT NULL DEFAULT '[]',
        started_at TEXT NOT NULL,
        ended_at TEXT NOT NULL
      );
      CREATE INDEX idx_recent_sessions_ended ON recent_sessions(ended_at);

      CREATE TABLE recent_activity (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        kind TEXT NOT NULL,
        target TEXT NOT NULL,
        details TEXT,
        created_at TEXT NOT NULL
      );
      CREATE INDEX idx_recent_activity_session ON recent_activity(session_id, created_at);
    `);
  },
];
