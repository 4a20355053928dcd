/**
 * cache-event-bus.ts — Cacheable registry and invalidation
 *
 * Every cache registers here. The bus is the only component that knows
 * which caches exist and which depend on which kind of data.
 *
 * Invalidation:
 *   userLogout / manualClear → every registered cache
 *   dataChanged(domain)      → exactly the identities CACHE_DEPENDENCIES lists
 *   expired                  → caches reporting isExpired()
 *
 * The dependency map is kept by hand. Adding a cache means adding its
 * identity to every domain that should clear it; `unmappedIdentities()`
 * reports registered caches no domain names.
 *
 * Usage:
 *   const bus = new CacheEventBus();
 *   bus.register(planCache);
 *   bus.invalidate(Invalidation.dataChanged("trainingPlan"), { source: "training_plan" });
 */

import { log } from "../logger.js";

// ─── Types ──────────────────────────────────────────────────────

export const DATA_DOMAINS = [
  "workouts",
  "trainingPlan",
  "weeklySummary",
  "targets",
  "user",
  "healthData",
  "hrv",
  "vdot",
] as const;

export type DataDomain = (typeof DATA_DOMAINS)[number];

export type InvalidationReason =
  | { kind: "userLogout" }
  | { kind: "dataChanged"; domain: DataDomain }
  | { kind: "manualClear" }
  | { kind: "expired" };

export const Invalidation = {
  userLogout: (): InvalidationReason => ({ kind: "userLogout" }),
  dataChanged: (domain: DataDomain): InvalidationReason => ({ kind: "dataChanged", domain }),
  manualClear: (): InvalidationReason => ({ kind: "manualClear" }),
  expired: (): InvalidationReason => ({ kind: "expired" }),
};

export function describeReason(reason: InvalidationReason): string {
  return reason.kind === "dataChanged" ? `dataChanged(${reason.domain})` : reason.kind;
}

/** A cache the bus can clear and inspect. */
export interface Cacheable {
  readonly cacheIdentifier: string;
  clearCache(): void;
  getCacheSize(): number;
  isExpired(): boolean;
}

export type CacheEventListener = (reason: InvalidationReason) => void | Promise<void>;

export type DependencyMap = Readonly<Record<DataDomain, readonly string[]>>;

export interface CacheStatus {
  totalCaches: number;
  totalSizeBytes: number;
  expiredCount: number;
  identities: string[];
}

export interface InvalidateOptions {
  /** Identity of the producer that triggered the change; it is not cleared. */
  source?: string;
}

// ─── Cache Identities & Dependency Map ───────────────────────────

export const CacheId = {
  trainingPlan: "training_plan",
  weeklySummary: "weekly_summary",
  targets: "targets",
  user: "user_cache",
  workouts: "workouts_v2",
  workoutUploads: "workout_uploads",
  hrv: "hrv_cache",
  vdot: "vdot_cache",
} as const;

export type CacheIdentity = (typeof CacheId)[keyof typeof CacheId];

const ALL_IDENTITIES: readonly string[] = Object.values(CacheId);

/**
 * Domain → caches whose contents go stale when that domain changes.
 * Not symmetric: targets clear the plan, the plan does not clear targets.
 */
export const CACHE_DEPENDENCIES: DependencyMap = {
  workouts: [CacheId.workouts],
  trainingPlan: [CacheId.trainingPlan, CacheId.weeklySummary],
  weeklySummary: [CacheId.weeklySummary],
  targets: [CacheId.targets, CacheId.trainingPlan],
  user: ALL_IDENTITIES,
  healthData: [CacheId.workoutUploads, CacheId.hrv],
  hrv: [CacheId.hrv],
  vdot: [CacheId.vdot],
};

// ─── CacheEventBus ──────────────────────────────────────────────

export class CacheEventBus {
  private readonly caches = new Map<string, Cacheable>();
  private readonly listeners = new Set<CacheEventListener>();
  private readonly dependencies: DependencyMap;

  constructor(dependencies: DependencyMap = CACHE_DEPENDENCIES) {
    this.dependencies = dependencies;
  }

  /** First registration for an identity wins; later ones are ignored. */
  register(cache: Cacheable): boolean {
    const id = cache.cacheIdentifier;
    if (this.caches.has(id)) {
      log.cache.debug({ cacheIdentifier: id }, "bus:register ignored: identity already registered");
      return false;
    }
    this.caches.set(id, cache);
    log.cache.info({ cacheIdentifier: id }, "bus:register");
    return true;
  }

  unregister(identity: string): boolean {
    return this.caches.delete(identity);
  }

  isRegistered(identity: string): boolean {
    return this.caches.has(identity);
  }

  addListener(listener: CacheEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Identities a domain change clears (registered or not). */
  relatedIdentities(domain: DataDomain): readonly string[] {
    return this.dependencies[domain];
  }

  /**
   * Clear the caches a reason selects, then notify listeners.
   * Returns the identities that were cleared.
   */
  invalidate(reason: InvalidationReason, options: InvalidateOptions = {}): string[] {
    const targets = this.selectTargets(reason).filter((cache) => cache.cacheIdentifier !== options.source);

    const cleared: string[] = [];
    for (const cache of targets) {
      try {
        cache.clearCache();
        cleared.push(cache.cacheIdentifier);
      } catch (err) {
        log.cache.error({ err, cacheIdentifier: cache.cacheIdentifier }, "bus:clear failed");
      }
    }

    log.cache.info(
      { reason: describeReason(reason), source: options.source, cleared },
      "bus:invalidate",
    );

    this.notifyListeners(reason);
    return cleared;
  }

  /** Aggregate diagnostics. Reads only; nothing is evicted. */
  status(): CacheStatus {
    let totalSizeBytes = 0;
    let expiredCount = 0;
    for (const cache of this.caches.values()) {
      totalSizeBytes += cache.getCacheSize();
      if (cache.isExpired()) expiredCount++;
    }
    return {
      totalCaches: this.caches.size,
      totalSizeBytes,
      expiredCount,
      identities: [...this.caches.keys()],
    };
  }

  /** Registered identities that no domain in the dependency map names. */
  unmappedIdentities(): string[] {
    const mapped = new Set<string>();
    for (const domain of DATA_DOMAINS) {
      for (const id of this.dependencies[domain]) mapped.add(id);
    }
    return [...this.caches.keys()].filter((id) => !mapped.has(id));
  }

  // ─── Internals ────────────────────────────────────────────────

  private selectTargets(reason: InvalidationReason): Cacheable[] {
    const all = [...this.caches.values()];
    switch (reason.kind) {
      case "userLogout":
      case "manualClear":
        return all;
      case "dataChanged": {
        const related = new Set(this.dependencies[reason.domain]);
        return all.filter((cache) => related.has(cache.cacheIdentifier));
      }
      case "expired":
        return all.filter((cache) => cache.isExpired());
    }
  }

  private notifyListeners(reason: InvalidationReason): void {
    for (const listener of [...this.listeners]) {
      try {
        const result = listener(reason);
        if (result instanceof Promise) {
          result.catch((err: unknown) => {
            log.cache.error({ err, reason: describeReason(reason) }, "bus:listener rejected");
          });
        }
      } catch (err) {
        log.cache.error({ err, reason: describeReason(reason) }, "bus:listener threw");
      }
    }
  }
}
