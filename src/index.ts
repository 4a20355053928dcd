/**
 * index.ts — Public entry point
 */

export { createSyncContext } from "./app-context.js";
export type { SyncContext, SyncContextOptions } from "./app-context.js";
export { DEFAULT_DB_PATH, DEFAULT_TTL_SECONDS, resolveConfig } from "./config.js";
export type { SyncConfig } from "./config.js";
export {
  CancellationError,
  ErrorCode,
  PlanServiceError,
  StorageError,
  classifyError,
  isCancellation,
  toErrorInfo,
} from "./errors.js";
export type { ErrorCodeValue, ErrorInfo, PlanServiceErrorKind } from "./errors.js";
export { log } from "./logger.js";

export {
  CACHE_DEPENDENCIES,
  CacheEventBus,
  CacheId,
  DATA_DOMAINS,
  Invalidation,
  describeReason,
} from "./services/cache-event-bus.js";
export type {
  CacheEventListener,
  CacheIdentity,
  CacheStatus,
  Cacheable,
  DataDomain,
  DependencyMap,
  InvalidationReason,
} from "./services/cache-event-bus.js";
export { TaskCoordinator, createCancellationToken } from "./services/task-coordinator.js";
export type { CancellationToken, TaskOperation, TaskOutcome } from "./services/task-coordinator.js";
export { createTrackedLongRunningWork, withLongRunningWork } from "./services/long-running-work.js";
export type { LongRunningWork, TrackedLongRunningWork, WorkToken } from "./services/long-running-work.js";
export * from "./services/plan-sync/index.js";

export { CachedValue, systemClock } from "./stores/cached-value.js";
export type { Clock, PayloadSchema, WriteResult } from "./stores/cached-value.js";
export { KeyedCache, ValueCache } from "./stores/cache-wrappers.js";
export { WeeklyPlanCache, WeeklySummaryCache, createEntityCaches } from "./stores/entity-caches.js";
export type { CacheTtls, EntityCaches } from "./stores/entity-caches.js";
export { WorkoutUploadTracker, stableWorkoutId } from "./stores/workout-upload-tracker.js";
export type { WorkoutIdentity } from "./stores/workout-upload-tracker.js";
export { createMemoryKeyValueStore } from "./stores/kv-store.js";
export type { KeyValueStore } from "./stores/kv-store.js";
export { createSqliteKeyValueStore } from "./stores/sqlite-kv-store.js";
export type { SqliteKeyValueStore } from "./stores/sqlite-kv-store.js";
export * from "./types/plan-types.js";
