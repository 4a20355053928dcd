/**
 * cached-value.ts — Typed cache entry over a KeyValueStore
 *
 * Stores `{ payload, capturedAt }` as UTF-8 JSON under one key. The payload
 * is validated by a zod schema on the way in and on the way out.
 *
 * Rules:
 * - A write replaces the entry wholesale; a failed write leaves the previous
 *   entry untouched.
 * - A read that cannot decode the entry clears it and returns null. Partially
 *   valid data is never handed out.
 * - age / isExpired / capturedAt never clear anything, so diagnostics can
 *   call them freely.
 * - capturedAt is an integral epoch-millisecond value.
 */

import { z } from "zod";
import { StorageError, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { KeyValueStore } from "./kv-store.js";

// ─── Types ──────────────────────────────────────────────────────

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/** Any zod schema producing T, whatever its input type. */
export type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type WriteResult =
  | { ok: true; capturedAt: number }
  | { ok: false; error: StorageError };

export interface CachedValueOptions<T> {
  store: KeyValueStore;
  key: string;
  schema: PayloadSchema<T>;
  /** Default TTL used by isExpired() */
  ttlMs: number;
  clock?: Clock;
  /** Owning cache identity, for log context */
  cacheIdentifier?: string;
}

const envelopeSchema = z.object({
  payload: z.unknown(),
  capturedAt: z.number().int().nonnegative(),
});

type Envelope = z.infer<typeof envelopeSchema>;

type DecodeResult<T> =
  | { ok: true; payload: T; capturedAt: number }
  | { ok: false; reason: string };

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

// ─── CachedValue ────────────────────────────────────────────────

export class CachedValue<T> {
  readonly key: string;
  readonly ttlMs: number;
  private readonly store: KeyValueStore;
  private readonly schema: PayloadSchema<T>;
  private readonly clock: Clock;
  private readonly cacheIdentifier: string;

  constructor(options: CachedValueOptions<T>) {
    this.store = options.store;
    this.key = options.key;
    this.schema = options.schema;
    this.ttlMs = options.ttlMs;
    this.clock = options.clock ?? systemClock;
    this.cacheIdentifier = options.cacheIdentifier ?? options.key;
  }

  write(payload: T): WriteResult {
    const parsed = this.schema.safeParse(payload);
    if (!parsed.success) {
      return this.fail(new StorageError("encode", this.key, "payload does not match schema", { cause: parsed.error }));
    }

    const capturedAt = Math.floor(this.clock());
    let bytes: Uint8Array;
    try {
      bytes = encoder.encode(JSON.stringify({ payload: parsed.data, capturedAt }));
    } catch (err) {
      return this.fail(new StorageError("encode", this.key, errorMessage(err), { cause: err }));
    }

    try {
      this.store.set(this.key, bytes);
    } catch (err) {
      return this.fail(new StorageError("write", this.key, errorMessage(err), { cause: err }));
    }

    log.cache.debug({ cacheIdentifier: this.cacheIdentifier, key: this.key, bytes: bytes.byteLength }, "cache:write");
    return { ok: true, capturedAt };
  }

  /** Decoded payload, or null when absent or corrupt (corrupt entries are cleared). */
  read(): T | null {
    const bytes = this.getBytes();
    if (!bytes) return null;

    const decoded = this.decode(bytes);
    if (decoded.ok) return decoded.payload;

    log.cache.warn(
      { cacheIdentifier: this.cacheIdentifier, key: this.key, reason: decoded.reason },
      "cache:corrupt: clearing entry",
    );
    try {
      this.clear();
    } catch (err) {
      log.cache.error({ err, key: this.key }, "cache:clear failed after corrupt read");
    }
    return null;
  }

  /** Capture time in epoch ms, or null when absent. */
  capturedAt(): number | null {
    return this.peek()?.capturedAt ?? null;
  }

  /** Milliseconds since capture, or null when absent. */
  age(): number | null {
    const capturedAt = this.capturedAt();
    if (capturedAt === null) return null;
    return this.clock() - capturedAt;
  }

  /** Absence counts as expired. */
  isExpired(ttlMs: number = this.ttlMs): boolean {
    const age = this.age();
    return age === null || age > ttlMs;
  }

  sizeBytes(): number {
    try {
      return this.store.byteLength(this.key);
    } catch (err) {
      log.cache.error({ err, key: this.key }, "cache:size failed");
      return 0;
    }
  }

  clear(): void {
    try {
      this.store.remove(this.key);
    } catch (err) {
      throw new StorageError("remove", this.key, errorMessage(err), { cause: err });
    }
  }

  // ─── Internals ────────────────────────────────────────────────

  private fail(error: StorageError): WriteResult {
    log.cache.error(
      { err: error, cacheIdentifier: this.cacheIdentifier, key: this.key, operation: error.operation },
      "cache:write failed: previous entry kept",
    );
    return { ok: false, error };
  }

  private getBytes(): Uint8Array | null {
    try {
      return this.store.get(this.key);
    } catch (err) {
      log.cache.error({ err, key: this.key }, "cache:read failed");
      return null;
    }
  }

  /** Envelope only; never clears. */
  private peek(): Envelope | null {
    const bytes = this.getBytes();
    if (!bytes) return null;
    const raw = parseJson(bytes);
    if (raw === undefined) return null;
    const envelope = envelopeSchema.safeParse(raw);
    return envelope.success ? envelope.data : null;
  }

  private decode(bytes: Uint8Array): DecodeResult<T> {
    const raw = parseJson(bytes);
    if (raw === undefined) return { ok: false, reason: "invalid JSON" };

    const envelope = envelopeSchema.safeParse(raw);
    if (!envelope.success) return { ok: false, reason: "invalid envelope" };

    const payload = this.schema.safeParse(envelope.data.payload);
    if (!payload.success) {
      return { ok: false, reason: payload.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ") };
    }
    return { ok: true, payload: payload.data, capturedAt: envelope.data.capturedAt };
  }
}

/** Parsed JSON, or undefined when the bytes are not UTF-8 JSON. */
function parseJson(bytes: Uint8Array): unknown {
  try {
    return JSON.parse(decoder.decode(bytes));
  } catch {
    return undefined;
  }
}
