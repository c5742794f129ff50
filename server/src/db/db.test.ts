import { describe, it, expect } from "vitest";
import { openDatabase } from "./index.js";
import { runMigrations, schemaVersion } from "./migrations.js";

describe("database migrations", () => {
  it("creates the schema on a fresh database", () => {
    const db = openDatabase(":memory:");
    const tables = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'memory_fts_%' ORDER BY name")
      .all()
      .map((r) => r.name);

    expect(tables).toEqual([
      "compactions",
      "core_memory",
      "memory_fts",
      "memory_records",
      "recent_activity",
      "recent_sessions",
      "schema_version",
      "session_turns",
      "sessions",
      "sqlite_sequence",
      "transcript",
    ]);
    expect(schemaVersion(db)).toBe(1);
  });

  it("is idempotent", () => {
    const db = openDatabase(":memory:");
    runMigrations(db);
    expect(db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM schema_version").get()?.n).toBe(2);
  });

  it("enforces foreign keys", () => {
    const db = openDatabase(":memory:");
    expect(() =>
      db
        .prepare("INSERT INTO session_turns (session_id, turn_id, position, state, kind, messages, size, created_at) VALUES (?, ?, 0, 'active', 'verbatim', '[]', 0, ?)")
        .run("sess_missing", "turn_1", new Date().toISOString()),
    ).toThrow(/FOREIGN KEY/);
  });
});
