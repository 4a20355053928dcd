/**
 * entity-caches.ts — One Cacheable per logical cache identity
 *
 * Identities and TTLs:
 *   training_plan   per-week plans + overview   planTtlMs
 *   weekly_summary  per-week summaries          summaryTtlMs
 *   targets         race targets                userTtlMs
 *   user_cache      profile                     userTtlMs
 *   workouts_v2     workout summaries           workoutsTtlMs
 *   hrv_cache       HRV samples                 workoutsTtlMs
 *   vdot_cache      VDOT history                userTtlMs
 *   workout_uploads see workout-upload-tracker.ts
 */

import { z } from "zod";
import type { SyncConfig } from "../config.js";
import { CacheId, type Cacheable, type CacheEventBus } from "../services/cache-event-bus.js";
import {
  HrvSampleSchema,
  TargetSchema,
  TrainingOverviewSchema,
  UserProfileSchema,
  VdotEntrySchema,
  WeeklyPlanSchema,
  WeeklySummarySchema,
  WorkoutSummarySchema,
  type HrvSample,
  type Target,
  type TrainingOverview,
  type UserProfile,
  type VdotEntry,
  type WeeklyPlan,
  type WeeklySummary,
  type WorkoutSummary,
} from "../types/plan-types.js";
import { KeyedCache, ValueCache } from "./cache-wrappers.js";
import type { Clock, WriteResult } from "./cached-value.js";
import type { KeyValueStore } from "./kv-store.js";
import { WorkoutUploadTracker } from "./workout-upload-tracker.js";

export type CacheTtls = Pick<SyncConfig, "planTtlMs" | "summaryTtlMs" | "userTtlMs" | "workoutsTtlMs">;

export interface EntityCacheOptions {
  store: KeyValueStore;
  bus: CacheEventBus;
  ttls: CacheTtls;
  clock?: Clock;
}

function weekKey(week: number): string {
  return `week_${week}`;
}

// ─── Weekly Plan ────────────────────────────────────────────────

/**
 * Plans keyed by integral week number, plus the training overview, under a
 * single identity: clearing the plan cache clears both.
 */
export class WeeklyPlanCache implements Cacheable {
  readonly cacheIdentifier = CacheId.trainingPlan;
  private readonly plans: KeyedCache<WeeklyPlan>;
  private readonly overview: ValueCache<TrainingOverview>;

  constructor(options: { store: KeyValueStore; ttlMs: number; clock?: Clock; bus?: CacheEventBus }) {
    const inner = { store: options.store, ttlMs: options.ttlMs, clock: options.clock };
    this.plans = new KeyedCache(CacheId.trainingPlan, WeeklyPlanSchema, inner);
    // Kept outside the `cache_training_plan_` prefix the weekly plans are cleared by.
    this.overview = new ValueCache("training_overview", TrainingOverviewSchema, inner);
    options.bus?.register(this);
  }

  getPlan(week: number): WeeklyPlan | null {
    return this.plans.get(weekKey(week));
  }

  hasPlan(week: number): boolean {
    return this.getPlan(week) !== null;
  }

  /** Stored under the plan's own week number. */
  savePlan(plan: WeeklyPlan): WriteResult {
    return this.plans.set(weekKey(plan.weekOfPlan), plan);
  }

  planAge(week: number): number | null {
    return this.plans.age(weekKey(week));
  }

  isPlanExpired(week: number): boolean {
    return this.plans.isEntryExpired(weekKey(week));
  }

  cachedWeeks(): number[] {
    return this.plans
      .keys()
      .map((key) => Number(key.slice("week_".length)))
      .filter((week) => Number.isInteger(week))
      .sort((a, b) => a - b);
  }

  getOverview(): TrainingOverview | null {
    return this.overview.get();
  }

  saveOverview(overview: TrainingOverview): WriteResult {
    return this.overview.set(overview);
  }

  clearCache(): void {
    this.plans.clearCache();
    this.overview.clearCache();
  }

  getCacheSize(): number {
    return this.plans.getCacheSize() + this.overview.getCacheSize();
  }

  isExpired(): boolean {
    return this.plans.isExpired() && this.overview.isExpired();
  }
}

// ─── Weekly Summary ─────────────────────────────────────────────

export class WeeklySummaryCache extends KeyedCache<WeeklySummary> {
  constructor(options: { store: KeyValueStore; ttlMs: number; clock?: Clock; bus?: CacheEventBus }) {
    super(CacheId.weeklySummary, WeeklySummarySchema, options);
  }

  getWeek(week: number): WeeklySummary | null {
    return this.get(weekKey(week));
  }

  saveWeek(summary: WeeklySummary): WriteResult {
    return this.set(weekKey(summary.weekNumber), summary);
  }
}

// ─── Registry of all caches ─────────────────────────────────────

export interface EntityCaches {
  plan: WeeklyPlanCache;
  weeklySummary: WeeklySummaryCache;
  targets: ValueCache<Target[]>;
  user: ValueCache<UserProfile>;
  workouts: ValueCache<WorkoutSummary[]>;
  workoutUploads: WorkoutUploadTracker;
  hrv: ValueCache<HrvSample[]>;
  vdot: ValueCache<VdotEntry[]>;
}

/** Build every cache and register each with `bus`. */
export function createEntityCaches({ store, bus, ttls, clock }: EntityCacheOptions): EntityCaches {
  const base = { store, clock, bus };
  return {
    plan: new WeeklyPlanCache({ ...base, ttlMs: ttls.planTtlMs }),
    weeklySummary: new WeeklySummaryCache({ ...base, ttlMs: ttls.summaryTtlMs }),
    targets: new ValueCache(CacheId.targets, z.array(TargetSchema), { ...base, ttlMs: ttls.userTtlMs }),
    user: new ValueCache(CacheId.user, UserProfileSchema, { ...base, ttlMs: ttls.userTtlMs }),
    workouts: new ValueCache(CacheId.workouts, z.array(WorkoutSummarySchema), { ...base, ttlMs: ttls.workoutsTtlMs }),
    workoutUploads: new WorkoutUploadTracker({ ...base, ttlMs: ttls.workoutsTtlMs }),
    hrv: new ValueCache(CacheId.hrv, z.array(HrvSampleSchema), { ...base, ttlMs: ttls.workoutsTtlMs }),
    vdot: new ValueCache(CacheId.vdot, z.array(VdotEntrySchema), { ...base, ttlMs: ttls.userTtlMs }),
  };
}
