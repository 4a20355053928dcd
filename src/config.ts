/**
 * config.ts — Unified Configuration Resolution
 *
 * Single source of truth for all configuration. Priority chain:
 *   1. Environment variable
 *   2. Default                 ← lowest
 *
 * Rules:
 * - All configuration resolves through `resolveConfig()`
 * - No `process.env` reads outside this file (except logger bootstrap)
 * - Config object is fully typed
 */

import { resolveLevel } from "./logger.js";

// ─── Configuration Interface ────────────────────────────────────

export interface SyncConfig {
  // ── System ──────────────────────────────────────────────────
  /** Node environment (production, development, test) */
  nodeEnv: string;
  isTest: boolean;
  isDev: boolean;

  // ── Storage ─────────────────────────────────────────────────
  /** SQLite file backing the key-value store (":memory:" for volatile) */
  dbPath: string;

  // ── Cache TTLs (milliseconds) ───────────────────────────────
  planTtlMs: number;
  summaryTtlMs: number;
  userTtlMs: number;
  workoutsTtlMs: number;

  // ── Logging ─────────────────────────────────────────────────
  /** Log level (silent, debug, info, warn, error) */
  logLevel: string;
  /** Whether to use pretty-printed logs */
  logPretty: boolean;
}

export const DEFAULT_DB_PATH = ".plan-sync/cache.db";

/** Default TTLs, in seconds. */
export const DEFAULT_TTL_SECONDS = {
  plan: 1800,
  summary: 3600,
  user: 3600,
  workouts: 1800,
} as const;

// ─── Resolution Helpers ─────────────────────────────────────────

/**
 * Parse a TTL given in seconds into milliseconds.
 * Empty or missing values fall back to the default; anything that is not a
 * positive integer is rejected.
 */
function resolveTtlMs(env: NodeJS.ProcessEnv, name: string, fallbackSeconds: number): number {
  const raw = (env[name] ?? "").trim();
  if (raw === "") return fallbackSeconds * 1000;
  const seconds = Number(raw);
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw new Error(`${name} must be a positive whole number of seconds, got: ${raw}`);
  }
  return seconds * 1000;
}

function resolveLogPretty(env: NodeJS.ProcessEnv, isTest: boolean, isDev: boolean): boolean {
  if (isTest) return false;
  return (
    env.PLANSYNC_LOG_PRETTY === "true" ||
    (env.PLANSYNC_LOG_PRETTY !== "false" && isDev)
  );
}

// ─── Main Resolution Function ───────────────────────────────────

/**
 * Resolve complete configuration.
 *
 * @param env - Environment to read (defaults to process.env; tests pass their own)
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const nodeEnv = env.NODE_ENV || "development";
  const isTest = nodeEnv === "test" || env.VITEST === "true";
  const isDev = nodeEnv !== "production" && !isTest;

  const dbPath = (env.PLANSYNC_DB_PATH ?? "").trim() || DEFAULT_DB_PATH;

  return {
    nodeEnv,
    isTest,
    isDev,
    dbPath,
    planTtlMs: resolveTtlMs(env, "PLANSYNC_PLAN_TTL_SECONDS", DEFAULT_TTL_SECONDS.plan),
    summaryTtlMs: resolveTtlMs(env, "PLANSYNC_SUMMARY_TTL_SECONDS", DEFAULT_TTL_SECONDS.summary),
    userTtlMs: resolveTtlMs(env, "PLANSYNC_USER_TTL_SECONDS", DEFAULT_TTL_SECONDS.user),
    workoutsTtlMs: resolveTtlMs(env, "PLANSYNC_WORKOUTS_TTL_SECONDS", DEFAULT_TTL_SECONDS.workouts),
    logLevel: resolveLevel(env),
    logPretty: resolveLogPretty(env, isTest, isDev),
  };
}
