/**
 * cache-event-bus.test.ts — Registration, invalidation by reason, listeners, diagnostics
 */

import { describe, it, expect, vi } from "vitest";
import {
  CACHE_DEPENDENCIES,
  CacheEventBus,
  CacheId,
  DATA_DOMAINS,
  Invalidation,
  describeReason,
  type Cacheable,
  type DependencyMap,
} from "../src/services/cache-event-bus.js";
import { WeeklyPlanCache } from "../src/stores/entity-caches.js";
import { createMemoryKeyValueStore } from "../src/stores/kv-store.js";

class FakeCache implements Cacheable {
  cleared = 0;
  constructor(
    readonly cacheIdentifier: string,
    private readonly options: { size?: number; expired?: boolean; failOnClear?: boolean } = {},
  ) {}

  clearCache(): void {
    if (this.options.failOnClear) throw new Error(`cannot clear ${this.cacheIdentifier}`);
    this.cleared++;
  }

  getCacheSize(): number {
    return this.options.size ?? 0;
  }

  isExpired(): boolean {
    return this.options.expired ?? false;
  }
}

const ALL_IDS = Object.values(CacheId);

function busWithAll(dependencies?: DependencyMap): { bus: CacheEventBus; caches: Map<string, FakeCache> } {
  const bus = new CacheEventBus(dependencies);
  const caches = new Map<string, FakeCache>();
  for (const id of ALL_IDS) {
    const cache = new FakeCache(id);
    caches.set(id, cache);
    bus.register(cache);
  }
  return { bus, caches };
}

function clearedIds(caches: Map<string, FakeCache>): string[] {
  return [...caches.values()].filter((c) => c.cleared > 0).map((c) => c.cacheIdentifier).sort();
}

// ─── Registration ───────────────────────────────────────────────

describe("register", () => {
  it("keeps the first handle for an identity", () => {
    const bus = new CacheEventBus();
    const first = new FakeCache("training_plan");
    const second = new FakeCache("training_plan");

    expect(bus.register(first)).toBe(true);
    expect(bus.register(second)).toBe(false);
    bus.invalidate(Invalidation.manualClear());

    expect(first.cleared).toBe(1);
    expect(second.cleared).toBe(0);
    expect(bus.status().totalCaches).toBe(1);
  });

  it("unregisters by identity", () => {
    const bus = new CacheEventBus();
    const cache = new FakeCache("targets");
    bus.register(cache);

    expect(bus.unregister("targets")).toBe(true);
    expect(bus.isRegistered("targets")).toBe(false);
    bus.invalidate(Invalidation.userLogout());
    expect(cache.cleared).toBe(0);
  });
});

// ─── Invalidation ───────────────────────────────────────────────

describe("invalidate", () => {
  it.each(DATA_DOMAINS.map((d) => [d]))("dataChanged(%s) clears exactly the mapped caches", (domain) => {
    const { bus, caches } = busWithAll();

    const cleared = bus.invalidate(Invalidation.dataChanged(domain));

    const expected = [...new Set(CACHE_DEPENDENCIES[domain])].sort();
    expect([...cleared].sort()).toEqual(expected);
    expect(clearedIds(caches)).toEqual(expected);
  });

  it("follows an injected partial map and leaves everything else alone", () => {
    const partial: DependencyMap = {
      workouts: ["workouts_v2"],
      trainingPlan: [],
      weeklySummary: [],
      targets: ["targets", "not_registered"],
      user: [],
      healthData: [],
      hrv: [],
      vdot: [],
    };
    const { bus, caches } = busWithAll(partial);

    expect(bus.invalidate(Invalidation.dataChanged("trainingPlan"))).toEqual([]);
    expect(bus.invalidate(Invalidation.dataChanged("targets"))).toEqual(["targets"]);
    expect(bus.invalidate(Invalidation.dataChanged("workouts"))).toEqual(["workouts_v2"]);
    expect(clearedIds(caches)).toEqual(["targets", "workouts_v2"]);
  });

  it("does not let the plan clear targets although targets clear the plan", () => {
    const { bus, caches } = busWithAll();

    bus.invalidate(Invalidation.dataChanged("trainingPlan"));
    expect(caches.get("targets")?.cleared).toBe(0);

    bus.invalidate(Invalidation.dataChanged("targets"));
    expect(caches.get("training_plan")?.cleared).toBe(2);
  });

  it("skips the source cache", () => {
    const { bus, caches } = busWithAll();

    const cleared = bus.invalidate(Invalidation.dataChanged("trainingPlan"), { source: "training_plan" });

    expect(cleared).toEqual(["weekly_summary"]);
    expect(caches.get("training_plan")?.cleared).toBe(0);
  });

  it.each([Invalidation.userLogout(), Invalidation.manualClear()])("%o clears every registered cache", (reason) => {
    const { bus, caches } = busWithAll();
    bus.invalidate(reason);
    expect(clearedIds(caches)).toEqual([...ALL_IDS].sort());
  });

  it("expired clears only caches reporting isExpired()", () => {
    const bus = new CacheEventBus();
    const stale = new FakeCache("hrv_cache", { expired: true });
    const fresh = new FakeCache("vdot_cache", { expired: false });
    bus.register(stale);
    bus.register(fresh);

    expect(bus.invalidate(Invalidation.expired())).toEqual(["hrv_cache"]);
    expect(fresh.cleared).toBe(0);
  });

  it("keeps clearing after a cache throws", () => {
    const bus = new CacheEventBus();
    const broken = new FakeCache("training_plan", { failOnClear: true });
    const summary = new FakeCache("weekly_summary");
    bus.register(broken);
    bus.register(summary);

    const cleared = bus.invalidate(Invalidation.dataChanged("trainingPlan"));

    expect(cleared).toEqual(["weekly_summary"]);
    expect(summary.cleared).toBe(1);
  });
});

// ─── Listeners ──────────────────────────────────────────────────

describe("listeners", () => {
  it("are notified with the reason after caches are cleared", () => {
    const bus = new CacheEventBus();
    const cache = new FakeCache("targets");
    bus.register(cache);
    const seen: Array<[string, number]> = [];
    bus.addListener((reason) => {
      seen.push([describeReason(reason), cache.cleared]);
    });

    bus.invalidate(Invalidation.dataChanged("targets"));

    expect(seen).toEqual([["dataChanged(targets)", 1]]);
  });

  it("isolate a throwing listener from the others and from the caller", () => {
    const bus = new CacheEventBus();
    const after = vi.fn();
    bus.addListener(() => {
      throw new Error("listener exploded");
    });
    bus.addListener(after);

    expect(() => bus.invalidate(Invalidation.manualClear())).not.toThrow();
    expect(after).toHaveBeenCalledWith({ kind: "manualClear" });
  });

  it("absorb a rejecting async listener", async () => {
    const bus = new CacheEventBus();
    const after = vi.fn();
    bus.addListener(async () => {
      throw new Error("async listener exploded");
    });
    bus.addListener(after);

    bus.invalidate(Invalidation.userLogout());
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(after).toHaveBeenCalledTimes(1);
  });

  it("stop receiving events once unsubscribed", () => {
    const bus = new CacheEventBus();
    const listener = vi.fn();
    const unsubscribe = bus.addListener(listener);

    unsubscribe();
    bus.invalidate(Invalidation.manualClear());

    expect(listener).not.toHaveBeenCalled();
  });
});

// ─── Diagnostics ────────────────────────────────────────────────

describe("status", () => {
  it("aggregates size and expiry without clearing anything", () => {
    const bus = new CacheEventBus();
    const caches = [
      new FakeCache("training_plan", { size: 120, expired: false }),
      new FakeCache("hrv_cache", { size: 30, expired: true }),
      new FakeCache("vdot_cache", { size: 0, expired: true }),
    ];
    for (const cache of caches) bus.register(cache);

    expect(bus.status()).toEqual({
      totalCaches: 3,
      totalSizeBytes: 150,
      expiredCount: 2,
      identities: ["training_plan", "hrv_cache", "vdot_cache"],
    });
    expect(caches.map((c) => c.cleared)).toEqual([0, 0, 0]);
  });

  it("leaves a corrupt stored entry in place", () => {
    const store = createMemoryKeyValueStore();
    const bus = new CacheEventBus();
    const plans = new WeeklyPlanCache({ store, ttlMs: 60_000, bus });
    store.set("cache_training_plan_week_4", new TextEncoder().encode("{garbage"));
    store.set("cache_training_plan__index", new TextEncoder().encode("{garbage"));

    expect(bus.status()).toEqual({
      totalCaches: 1,
      totalSizeBytes: 16,
      expiredCount: 1,
      identities: ["training_plan"],
    });
    expect(store.get("cache_training_plan_week_4")).not.toBeNull();
    expect(store.get("cache_training_plan__index")).not.toBeNull();
    expect(plans.cachedWeeks()).toEqual([4]);
  });

  it("reports registered identities missing from the map", () => {
    const bus = new CacheEventBus();
    bus.register(new FakeCache("training_plan"));
    bus.register(new FakeCache("race_history"));

    expect(bus.unmappedIdentities()).toEqual(["race_history"]);
  });

  it("maps every known identity under the user domain", () => {
    const bus = new CacheEventBus();
    expect([...bus.relatedIdentities("user")].sort()).toEqual([...ALL_IDS].sort());
  });
});
