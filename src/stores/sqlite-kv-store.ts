/**
 * sqlite-kv-store.ts — SQLite-backed KeyValueStore
 *
 * One table, one row per key. WAL mode so reads from the UI thread never
 * wait on a background write.
 *
 * Usage:
 *   const store = createSqliteKeyValueStore(".plan-sync/cache.db");
 *   store.set("cache_training_plan_3", bytes);
 *   store.close();
 */

import Database from "better-sqlite3";
import * as fs from "node:fs";
import * as path from "node:path";
import { log } from "../logger.js";
import type { KeyValueStore } from "./kv-store.js";

const MEMORY_PATH = ":memory:";

export interface SqliteKeyValueStore extends KeyValueStore {
  /** Number of stored keys. */
  count(): number;
}

/**
 * Create a key-value store backed by SQLite.
 * The parent directory is created on demand.
 */
export function createSqliteKeyValueStore(dbPath: string): SqliteKeyValueStore {
  if (dbPath !== MEMORY_PATH) {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }
  const db = new Database(dbPath);

  if (dbPath !== MEMORY_PATH) {
    db.pragma("journal_mode = WAL");
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS kv_entries (
      key        TEXT PRIMARY KEY,
      value      BLOB NOT NULL,
      updated_at INTEGER NOT NULL
    )
  `);

  const stmtGet = db.prepare<[string], { value: Buffer }>("SELECT value FROM kv_entries WHERE key = ?");
  const stmtSet = db.prepare<[string, Buffer, number]>(
    "INSERT INTO kv_entries (key, value, updated_at) VALUES (?, ?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at"
  );
  const stmtDel = db.prepare<[string]>("DELETE FROM kv_entries WHERE key = ?");
  const stmtSize = db.prepare<[string], { size: number }>("SELECT length(value) AS size FROM kv_entries WHERE key = ?");
  const stmtPrefix = db.prepare<[string, string], { key: string }>(
    "SELECT key FROM kv_entries WHERE substr(key, 1, length(?)) = ? ORDER BY key"
  );
  const stmtCount = db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM kv_entries");

  log.storage.debug({ dbPath }, "sqlite:open");

  return {
    get(key: string): Uint8Array | null {
      const row = stmtGet.get(key);
      return row ? new Uint8Array(row.value) : null;
    },

    set(key: string, value: Uint8Array): void {
      stmtSet.run(key, Buffer.from(value), Date.now());
    },

    remove(key: string): void {
      stmtDel.run(key);
    },

    byteLength(key: string): number {
      return stmtSize.get(key)?.size ?? 0;
    },

    keysWithPrefix(prefix: string): string[] {
      return stmtPrefix.all(prefix, prefix).map((row) => row.key);
    },

    count(): number {
      return stmtCount.get()?.count ?? 0;
    },

    close(): void {
      db.close();
      log.storage.debug({ dbPath }, "sqlite:close");
    },
  };
}
