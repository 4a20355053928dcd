/**
 * cached-value.test.ts — Typed cache entry: write/read, expiry, corruption policy
 */

import { describe, it, expect, beforeEach } from "vitest";
import { z } from "zod";
import { StorageError } from "../src/errors.js";
import { CachedValue } from "../src/stores/cached-value.js";
import { createMemoryKeyValueStore, type KeyValueStore } from "../src/stores/kv-store.js";
import { createManualClock, type ManualClock } from "./helpers/fakes.js";

const schema = z.object({ week: z.number().int().positive(), label: z.string() });
type Payload = z.infer<typeof schema>;

const TTL_MS = 1800 * 1000;
const KEY = "cache_training_plan_week_3";

let store: KeyValueStore;
let time: ManualClock;
let entry: CachedValue<Payload>;

function rawJson(key: string): unknown {
  const bytes = store.get(key);
  return bytes ? JSON.parse(new TextDecoder().decode(bytes)) : null;
}

beforeEach(() => {
  store = createMemoryKeyValueStore();
  time = createManualClock(1_000_000);
  entry = new CachedValue({ store, key: KEY, schema, ttlMs: TTL_MS, clock: time.clock });
});

// ─── Write / Read ───────────────────────────────────────────────

describe("write and read", () => {
  it("stores payload with an integral capture time", () => {
    time.set(1_000_000.7);
    const result = entry.write({ week: 3, label: "base" });

    expect(result).toEqual({ ok: true, capturedAt: 1_000_000 });
    expect(rawJson(KEY)).toEqual({ payload: { week: 3, label: "base" }, capturedAt: 1_000_000 });
    expect(entry.read()).toEqual({ week: 3, label: "base" });
  });

  it("returns null when nothing was written", () => {
    expect(entry.read()).toBeNull();
    expect(entry.age()).toBeNull();
    expect(entry.capturedAt()).toBeNull();
  });

  it("replaces the entry wholesale on the next write", () => {
    entry.write({ week: 3, label: "base" });
    time.advance(500);
    entry.write({ week: 3, label: "build" });

    expect(entry.read()).toEqual({ week: 3, label: "build" });
    expect(entry.capturedAt()).toBe(1_000_500);
  });

  it("rejects a payload that fails the schema and keeps the previous entry", () => {
    entry.write({ week: 3, label: "base" });
    const result = entry.write({ week: 1.5, label: "bad" });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.operation).toBe("encode");
    expect(entry.read()).toEqual({ week: 3, label: "base" });
  });

  it("reports a store failure and keeps the previous entry", () => {
    entry.write({ week: 3, label: "base" });
    const failing: KeyValueStore = {
      ...store,
      set: () => {
        throw new Error("disk full");
      },
    };
    const sameKey = new CachedValue({ store: failing, key: KEY, schema, ttlMs: TTL_MS, clock: time.clock });

    const result = sameKey.write({ week: 3, label: "build" });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.operation).toBe("write");
      expect(result.error.message).toBe("disk full");
    }
    expect(entry.read()).toEqual({ week: 3, label: "base" });
  });
});

// ─── Age & Expiry ───────────────────────────────────────────────

describe("age and expiry", () => {
  it("is expired 1801 s after capture with a 1800 s TTL", () => {
    entry.write({ week: 3, label: "base" });
    time.advance(1801 * 1000);
    expect(entry.isExpired(1800 * 1000)).toBe(true);
  });

  it("is fresh 1799 s after capture with a 1800 s TTL", () => {
    entry.write({ week: 3, label: "base" });
    time.advance(1799 * 1000);
    expect(entry.isExpired(1800 * 1000)).toBe(false);
  });

  it("is not expired exactly at the TTL", () => {
    entry.write({ week: 3, label: "base" });
    time.advance(TTL_MS);
    expect(entry.isExpired()).toBe(false);
  });

  it("uses the configured TTL by default", () => {
    entry.write({ week: 3, label: "base" });
    time.advance(TTL_MS + 1);
    expect(entry.isExpired()).toBe(true);
  });

  it("counts absence as expired", () => {
    expect(entry.isExpired()).toBe(true);
  });

  it("reports age in milliseconds", () => {
    entry.write({ week: 3, label: "base" });
    time.advance(42_000);
    expect(entry.age()).toBe(42_000);
  });
});

// ─── Corruption ─────────────────────────────────────────────────

describe("corrupt entries", () => {
  const corruptions: Array<[string, Uint8Array]> = [
    ["not JSON", new TextEncoder().encode("{not json")],
    ["invalid UTF-8", new Uint8Array([0xff, 0xfe, 0xfd])],
    ["missing envelope", new TextEncoder().encode(JSON.stringify({ week: 3, label: "base" }))],
    ["negative capture time", new TextEncoder().encode(JSON.stringify({ payload: { week: 3, label: "x" }, capturedAt: -5 }))],
    ["payload off schema", new TextEncoder().encode(JSON.stringify({ payload: { week: "3" }, capturedAt: 10 }))],
  ];

  it.each(corruptions)("clears %s on read, and the next read is also null", (_label, bytes) => {
    store.set(KEY, bytes);

    expect(entry.read()).toBeNull();
    expect(store.get(KEY)).toBeNull();
    expect(entry.read()).toBeNull();
  });

  it("does not clear anything from age, capturedAt or isExpired", () => {
    store.set(KEY, new TextEncoder().encode("{not json"));

    expect(entry.age()).toBeNull();
    expect(entry.capturedAt()).toBeNull();
    expect(entry.isExpired()).toBe(true);
    expect(store.get(KEY)).not.toBeNull();
  });
});

// ─── Size & Clear ───────────────────────────────────────────────

describe("size and clear", () => {
  it("reports the stored byte length", () => {
    entry.write({ week: 3, label: "base" });
    const expected = new TextEncoder().encode(
      JSON.stringify({ payload: { week: 3, label: "base" }, capturedAt: 1_000_000 }),
    ).byteLength;
    expect(entry.sizeBytes()).toBe(expected);
  });

  it("removes the entry", () => {
    entry.write({ week: 3, label: "base" });
    entry.clear();
    expect(entry.read()).toBeNull();
    expect(entry.sizeBytes()).toBe(0);
  });

  it("wraps a store failure on clear in a StorageError", () => {
    const failing: KeyValueStore = {
      ...store,
      remove: () => {
        throw new Error("locked");
      },
    };
    const broken = new CachedValue({ store: failing, key: KEY, schema, ttlMs: TTL_MS });
    let thrown: unknown;
    try {
      broken.clear();
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toBeInstanceOf(StorageError);
    expect(thrown).toMatchObject({ operation: "remove", key: KEY, message: "locked" });
  });
});
