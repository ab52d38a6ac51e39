/**
 * Scrimkeeper — src/store/documentStore.ts
 * WHAT: Whole-document JSON key-value store on top of the kv_documents table.
 * WHY: Scrim state is three flat maps (sessions, attendance, wins). Reading and
 *      replacing whole documents keeps the write atomic and the schema trivial.
 * FLOWS:
 *  - read(key, schema) → row? → JSON.parse → zod validate → value | null
 *  - write(key, value) → single UPSERT (atomic replace)
 *  - update(key, schema, empty, fn) → read → fn → write inside one transaction
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type Database from "better-sqlite3";
import type { z } from "zod";
import type { Db } from "../db/db.js";
import { StoreError } from "../lib/errors.js";

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Wrap anything thrown by SQLite into a StoreError so callers only ever have
 * to handle one error type from the persistence layer.
 */
function asStoreError(key: string, op: string, err: unknown): StoreError {
  if (err instanceof StoreError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new StoreError("io", key, `Document ${op} failed for "${key}": ${detail}`, { cause: err });
}

export class DocumentStore {
  private readonly selectStmt: Database.Statement<[string], { value: string }>;
  private readonly upsertStmt: Database.Statement<[string, string, number]>;

  constructor(private readonly db: Db) {
    this.selectStmt = db.prepare<[string], { value: string }>(
      "SELECT value FROM kv_documents WHERE key = ?"
    );
    this.upsertStmt = db.prepare<[string, string, number]>(
      `INSERT INTO kv_documents (key, value, updated_at) VALUES (?, ?, ?)
       ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`
    );
  }

  /**
   * Read a document. Absent → null. A document that exists but doesn't parse
   * or validate is a "corrupt" StoreError; we never silently treat it as empty,
   * since the next write would then wipe whatever was there.
   */
  read<T>(key: string, schema: Schema<T>): T | null {
    let row: { value: string } | undefined;
    try {
      row = this.selectStmt.get(key);
    } catch (err) {
      throw asStoreError(key, "read", err);
    }
    if (!row) return null;

    let json: unknown;
    try {
      json = JSON.parse(row.value);
    } catch (err) {
      throw new StoreError("corrupt", key, `Document "${key}" is not valid JSON`, { cause: err });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new StoreError("corrupt", key, `Document "${key}" failed validation: ${issues}`);
    }
    return parsed.data;
  }

  /**
   * Replace a document wholesale.
   */
  write<T>(key: string, value: T): void {
    try {
      this.upsertStmt.run(key, JSON.stringify(value), Date.now());
    } catch (err) {
      throw asStoreError(key, "write", err);
    }
  }

  /**
   * Read-modify-write under one SQLite transaction. `fn` must be synchronous;
   * that's what makes the cycle exclusive against every other caller.
   * Returns the document as written.
   */
  update<T>(key: string, schema: Schema<T>, empty: () => T, fn: (current: T) => T): T {
    try {
      return this.db.transaction(() => {
        const next = fn(this.read(key, schema) ?? empty());
        this.write(key, next);
        return next;
      })();
    } catch (err) {
      throw asStoreError(key, "update", err);
    }
  }
}
