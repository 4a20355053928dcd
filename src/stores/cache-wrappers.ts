/**
 * cache-wrappers.ts — Cacheable wrappers over CachedValue
 *
 *   ValueCache<T>  — one entry:   cache_<identity>
 *   KeyedCache<T>  — many entries: cache_<identity>_<key>, listed and
 *                    cleared by key prefix
 *
 * No other store key may start with `cache_<identity>_` of a KeyedCache.
 * Both register with the bus passed in their options.
 */

import type { Cacheable, CacheEventBus } from "../services/cache-event-bus.js";
import { StorageError, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import { CachedValue, type Clock, type PayloadSchema, type WriteResult } from "./cached-value.js";
import type { KeyValueStore } from "./kv-store.js";

export interface CacheWrapperOptions {
  store: KeyValueStore;
  ttlMs: number;
  clock?: Clock;
  /** Register with this bus on construction */
  bus?: CacheEventBus;
}

// ─── ValueCache ─────────────────────────────────────────────────

export class ValueCache<T> implements Cacheable {
  readonly cacheIdentifier: string;
  private readonly entry: CachedValue<T>;

  constructor(cacheIdentifier: string, schema: PayloadSchema<T>, options: CacheWrapperOptions) {
    this.cacheIdentifier = cacheIdentifier;
    this.entry = new CachedValue({
      store: options.store,
      key: `cache_${cacheIdentifier}`,
      schema,
      ttlMs: options.ttlMs,
      clock: options.clock,
      cacheIdentifier,
    });
    options.bus?.register(this);
  }

  get(): T | null {
    return this.entry.read();
  }

  set(value: T): WriteResult {
    return this.entry.write(value);
  }

  age(): number | null {
    return this.entry.age();
  }

  capturedAt(): number | null {
    return this.entry.capturedAt();
  }

  clearCache(): void {
    this.entry.clear();
    log.cache.debug({ cacheIdentifier: this.cacheIdentifier }, "cache:cleared");
  }

  getCacheSize(): number {
    return this.entry.sizeBytes();
  }

  isExpired(): boolean {
    return this.entry.isExpired();
  }
}

// ─── KeyedCache ─────────────────────────────────────────────────

export class KeyedCache<T> implements Cacheable {
  readonly cacheIdentifier: string;
  private readonly options: CacheWrapperOptions;
  private readonly schema: PayloadSchema<T>;
  private readonly prefix: string;
  private readonly entries = new Map<string, CachedValue<T>>();

  constructor(cacheIdentifier: string, schema: PayloadSchema<T>, options: CacheWrapperOptions) {
    this.cacheIdentifier = cacheIdentifier;
    this.options = options;
    this.schema = schema;
    this.prefix = `cache_${cacheIdentifier}_`;
    options.bus?.register(this);
  }

  get(key: string): T | null {
    return this.entry(key).read();
  }

  has(key: string): boolean {
    return this.get(key) !== null;
  }

  set(key: string, value: T): WriteResult {
    return this.entry(key).write(value);
  }

  delete(key: string): void {
    this.entry(key).clear();
  }

  /** Keys with a stored entry, decodable or not. Never clears anything. */
  keys(): string[] {
    return this.storeKeys().map((storeKey) => storeKey.slice(this.prefix.length));
  }

  age(key: string): number | null {
    return this.entry(key).age();
  }

  isEntryExpired(key: string, ttlMs?: number): boolean {
    return this.entry(key).isExpired(ttlMs);
  }

  clearCache(): void {
    let storeKeys: string[];
    try {
      storeKeys = this.options.store.keysWithPrefix(this.prefix);
    } catch (err) {
      throw new StorageError("remove", `${this.prefix}*`, errorMessage(err), { cause: err });
    }
    for (const storeKey of storeKeys) {
      try {
        this.options.store.remove(storeKey);
      } catch (err) {
        throw new StorageError("remove", storeKey, errorMessage(err), { cause: err });
      }
    }
    log.cache.debug({ cacheIdentifier: this.cacheIdentifier, entries: storeKeys.length }, "cache:cleared");
  }

  getCacheSize(): number {
    return this.keys().reduce((total, key) => total + this.entry(key).sizeBytes(), 0);
  }

  /** Expired when no entry is fresh. */
  isExpired(): boolean {
    return this.keys().every((key) => this.entry(key).isExpired());
  }

  private storeKeys(): string[] {
    try {
      return this.options.store.keysWithPrefix(this.prefix);
    } catch (err) {
      log.cache.error({ err, cacheIdentifier: this.cacheIdentifier }, "cache:list failed");
      return [];
    }
  }

  private entry(key: string): CachedValue<T> {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = new CachedValue({
        store: this.options.store,
        key: `${this.prefix}${key}`,
        schema: this.schema,
        ttlMs: this.options.ttlMs,
        clock: this.options.clock,
        cacheIdentifier: this.cacheIdentifier,
      });
      this.entries.set(key, entry);
    }
    return entry;
  }
}
