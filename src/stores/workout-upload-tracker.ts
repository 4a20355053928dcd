/**
 * workout-upload-tracker.ts — Which workouts have already been uploaded
 *
 * Workouts are identified by integral epoch seconds plus activity type:
 *   "<startEpochSeconds>_<endEpochSeconds>_<activityType>"
 * and map to the epoch second they were uploaded at.
 */

import { z } from "zod";
import { CacheId, type Cacheable, type CacheEventBus } from "../services/cache-event-bus.js";
import { ValueCache } from "./cache-wrappers.js";
import { systemClock, type Clock, type WriteResult } from "./cached-value.js";
import type { KeyValueStore } from "./kv-store.js";

export interface WorkoutIdentity {
  startEpochSeconds: number;
  endEpochSeconds: number;
  activityType: string;
}

export type UploadRecord = Record<string, number>;

const uploadRecordSchema = z.record(z.string(), z.number().int().nonnegative());

export function stableWorkoutId({ startEpochSeconds, endEpochSeconds, activityType }: WorkoutIdentity): string {
  if (!Number.isInteger(startEpochSeconds) || !Number.isInteger(endEpochSeconds)) {
    throw new RangeError(`workout bounds must be whole epoch seconds, got ${startEpochSeconds}..${endEpochSeconds}`);
  }
  return `${startEpochSeconds}_${endEpochSeconds}_${activityType}`;
}

export class WorkoutUploadTracker implements Cacheable {
  readonly cacheIdentifier = CacheId.workoutUploads;
  private readonly records: ValueCache<UploadRecord>;
  private readonly clock: Clock;

  constructor(options: { store: KeyValueStore; ttlMs: number; clock?: Clock; bus?: CacheEventBus }) {
    this.clock = options.clock ?? systemClock;
    this.records = new ValueCache(CacheId.workoutUploads, uploadRecordSchema, {
      store: options.store,
      ttlMs: options.ttlMs,
      clock: this.clock,
    });
    options.bus?.register(this);
  }

  markUploaded(workout: WorkoutIdentity, uploadedAtEpochSeconds?: number): WriteResult {
    const at = uploadedAtEpochSeconds ?? Math.floor(this.clock() / 1000);
    return this.records.set({ ...this.all(), [stableWorkoutId(workout)]: at });
  }

  isUploaded(workout: WorkoutIdentity): boolean {
    return this.uploadedAt(workout) !== null;
  }

  uploadedAt(workout: WorkoutIdentity): number | null {
    return this.all()[stableWorkoutId(workout)] ?? null;
  }

  all(): UploadRecord {
    return this.records.get() ?? {};
  }

  clearCache(): void {
    this.records.clearCache();
  }

  getCacheSize(): number {
    return this.records.getCacheSize();
  }

  isExpired(): boolean {
    return this.records.isExpired();
  }
}
