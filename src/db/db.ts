/**
 * Scrimkeeper — src/db/db.ts
 * WHAT: SQLite connection bootstrap and the key-value document table.
 * WHY: Centralizes better-sqlite3 setup and PRAGMAs so stores just take a `Database`.
 * FLOWS:
 *  - openDatabase(path) → set PRAGMAs → ensure kv_documents → return handle
 *  - closeDatabase(db) on shutdown
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA: https://sqlite.org/pragma.html
 *
 * NOTE: better-sqlite3 is synchronous; a read-modify-write inside one
 * db.transaction() can't interleave with anything else in this process.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { logger } from "../lib/logger.js";

const DB_BUSY_TIMEOUT_MS = 5000;
const IN_MEMORY = ":memory:";

export type Db = Database.Database;

/**
 * Open (or create) the database file and make sure the schema exists.
 * Pass ":memory:" for tests.
 */
export function openDatabase(dbPath: string): Db {
  if (dbPath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath, { fileMustExist: false });
  if (dbPath !== IN_MEMORY) {
    // WAL so a reader never blocks the single writer
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
  }
  // Fail-soft during brief contention rather than throwing SQLITE_BUSY immediately
  db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);

  ensureSchema(db);
  logger.info({ evt: "db_opened", dbPath }, "SQLite opened");
  return db;
}

/**
 * One row per document. Each value is a whole JSON snapshot; there are no
 * partial updates, so there is nothing else to migrate.
 */
export function ensureSchema(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS kv_documents (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at INTEGER NOT NULL
    )
  `);
}

export function closeDatabase(db: Db): void {
  if (!db.open) return;
  db.close();
  logger.info({ evt: "db_closed" }, "SQLite closed");
}
