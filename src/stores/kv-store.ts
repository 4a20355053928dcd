/**
 * kv-store.ts — Key-value byte store contract
 *
 * The only I/O primitive the cache layer depends on. Values are opaque
 * bytes; encoding is the caller's business. No transactions, no atomic
 * multi-key writes. Writes to the same key are last-writer-wins.
 *
 * Implementations:
 *   createMemoryKeyValueStore()     — Map-backed, volatile (tests, fallback)
 *   createSqliteKeyValueStore(path) — better-sqlite3 (see sqlite-kv-store.ts)
 */

import { log } from "../logger.js";

export interface KeyValueStore {
  /** Stored bytes, or null when the key is absent. */
  get(key: string): Uint8Array | null;
  /** Store bytes under a key, replacing any previous value. */
  set(key: string, value: Uint8Array): void;
  /** Remove a key. No-op when absent. */
  remove(key: string): void;
  /** Size of the stored value in bytes (0 when absent), without copying it. */
  byteLength(key: string): number;
  /** Every stored key starting with `prefix`, in ascending order. */
  keysWithPrefix(prefix: string): string[];
  /** Release underlying resources. */
  close(): void;
}

/**
 * Map-backed store. Copies on the way in and out so callers never share a
 * buffer with the store.
 */
export function createMemoryKeyValueStore(): KeyValueStore {
  const entries = new Map<string, Uint8Array>();

  return {
    get(key: string): Uint8Array | null {
      const value = entries.get(key);
      return value ? value.slice() : null;
    },

    set(key: string, value: Uint8Array): void {
      entries.set(key, value.slice());
    },

    remove(key: string): void {
      entries.delete(key);
    },

    byteLength(key: string): number {
      return entries.get(key)?.byteLength ?? 0;
    },

    keysWithPrefix(prefix: string): string[] {
      return [...entries.keys()].filter((key) => key.startsWith(prefix)).sort();
    },

    close(): void {
      log.storage.debug({ keys: entries.size }, "memory:close");
      entries.clear();
    },
  };
}
