/**
 * logger.ts — pino loggers for plan-sync
 *
 *   PLANSYNC_LOG_LEVEL   explicit level; wins over everything else
 *   PLANSYNC_DEBUG       "true" (or any value but "false"/"0") forces debug
 *   PLANSYNC_LOG_PRETTY  "true"/"false" overrides the development default
 *
 * Every line carries `service` and, for the `log.*` children, `subsystem`.
 */

import pino from "pino";
import type { Logger } from "pino";

function isTestEnv(env: NodeJS.ProcessEnv): boolean {
  return env.NODE_ENV === "test" || env.VITEST === "true";
}

export function resolveLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.PLANSYNC_LOG_LEVEL) return env.PLANSYNC_LOG_LEVEL;

  const debugEnv = (env.PLANSYNC_DEBUG || "").trim().toLowerCase();
  if (debugEnv && debugEnv !== "false" && debugEnv !== "0") return "debug";

  if (isTestEnv(env)) return "silent";
  return env.NODE_ENV === "production" ? "info" : "debug";
}

/** pino-pretty in development unless PLANSYNC_LOG_PRETTY says otherwise; JSON lines elsewhere. */
export function resolveTransport(env: NodeJS.ProcessEnv = process.env): pino.TransportSingleOptions | undefined {
  if (isTestEnv(env)) return undefined;
  const pretty = env.PLANSYNC_LOG_PRETTY;
  const wantPretty = pretty === "true" || (pretty !== "false" && env.NODE_ENV !== "production");
  if (!wantPretty) return undefined;
  return {
    target: "pino-pretty",
    options: { colorize: true, translateTime: "HH:MM:ss.l", ignore: "pid,hostname" },
  };
}

const transport = resolveTransport();

export const rootLogger: Logger = pino({
  level: resolveLevel(),
  ...(transport ? { transport } : {}),
  base: { service: "plan-sync" },
  timestamp: pino.stdTimeFunctions.isoTime,
  // User profiles are cached; keep addresses out of log lines.
  redact: { paths: ["email", "*.email"], censor: "[REDACTED]" },
});

export const log = {
  boot: rootLogger.child({ subsystem: "boot" }),
  storage: rootLogger.child({ subsystem: "storage" }),
  cache: rootLogger.child({ subsystem: "cache" }),
  tasks: rootLogger.child({ subsystem: "tasks" }),
  plan: rootLogger.child({ subsystem: "plan" }),
  root: rootLogger,
};

export type { Logger };
