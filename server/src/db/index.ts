/**
 * Database Manager
 *
 * One SQLite file per gateway data directory holding sessions, turns,
 * the compaction transcript and the memory store.
 */

import Database from "better-sqlite3";
import * as fs from "fs";
import * as path from "path";
import { createComponentLogger } from "../logging.js";
import { runMigrations } from "./migrations.js";

const log = createComponentLogger("db");

export const DB_FILENAME = "modelgate.db";

export type GatewayDatabase = Database.Database;

let db: GatewayDatabase | null = null;

/**
 * Open a database and bring its schema up to date.
 * Pass ":memory:" for an in-process database (tests).
 */
export function openDatabase(location: string): GatewayDatabase {
  if (location !== ":memory:") fs.mkdirSync(path.dirname(location), { recursive: true });
  const database = new Database(location);
  if (location !== ":memory:") database.pragma("journal_mode = WAL");
  database.pragma("foreign_keys = ON");
  runMigrations(database);
  return database;
}

export function initDatabase(dataDir: string): GatewayDatabase {
  const location = path.join(dataDir, DB_FILENAME);
  db = openDatabase(location);
  log.info("Database initialized", { path: location });
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
