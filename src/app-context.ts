/**
 * app-context.ts — Composition root
 *
 * Builds one explicitly-owned graph: key-value store → bus → entity caches →
 * plan controller. Nothing here is a process-wide singleton; tests build as
 * many contexts as they like.
 */

import type { SyncConfig } from "./config.js";
import { log } from "./logger.js";
import { CacheEventBus, Invalidation, type CacheStatus } from "./services/cache-event-bus.js";
import { createTrackedLongRunningWork, type LongRunningWork } from "./services/long-running-work.js";
import { PlanSyncController } from "./services/plan-sync/plan-sync-controller.js";
import type { PlanService } from "./services/plan-sync/plan-service.js";
import type { Clock } from "./stores/cached-value.js";
import { createEntityCaches, type EntityCaches } from "./stores/entity-caches.js";
import type { KeyValueStore } from "./stores/kv-store.js";
import { createSqliteKeyValueStore } from "./stores/sqlite-kv-store.js";

export interface SyncContextOptions {
  config: SyncConfig;
  service: PlanService;
  /** Defaults to an in-process tracker */
  longRunningWork?: LongRunningWork;
  /** Supplied stores are not closed by shutdown() */
  store?: KeyValueStore;
  clock?: Clock;
}

export interface SyncContext {
  config: SyncConfig;
  store: KeyValueStore;
  bus: CacheEventBus;
  caches: EntityCaches;
  plan: PlanSyncController;
  /** Clear every cache and reset published state. */
  logout(): string[];
  /** Clear caches past their TTL. */
  evictExpired(): string[];
  status(): CacheStatus;
  /** Dispose the controller and close a store this context opened. */
  shutdown(): void;
}

export function createSyncContext(options: SyncContextOptions): SyncContext {
  const { config, service, clock } = options;
  const ownsStore = options.store === undefined;
  const store = options.store ?? createSqliteKeyValueStore(config.dbPath);
  const bus = new CacheEventBus();
  const caches = createEntityCaches({ store, bus, clock, ttls: config });
  const plan = new PlanSyncController({
    service,
    planCache: caches.plan,
    bus,
    clock,
    longRunningWork: options.longRunningWork ?? createTrackedLongRunningWork(),
  });

  const unmapped = bus.unmappedIdentities();
  if (unmapped.length > 0) {
    log.boot.warn({ unmapped }, "boot:caches missing from dependency map");
  }
  log.boot.info(
    { dbPath: ownsStore ? config.dbPath : "(supplied)", caches: bus.status().totalCaches },
    "boot:context ready",
  );

  let closed = false;
  return {
    config,
    store,
    bus,
    caches,
    plan,
    logout: () => bus.invalidate(Invalidation.userLogout()),
    evictExpired: () => bus.invalidate(Invalidation.expired()),
    status: () => bus.status(),
    shutdown() {
      if (closed) return;
      closed = true;
      plan.dispose();
      if (ownsStore) store.close();
      log.boot.info("boot:context shut down");
    },
  };
}
