/**
 * training-week.ts — Monday-based training-week arithmetic
 *
 * Week 1 is the Monday-to-Sunday week containing the plan's start. All
 * arithmetic is on integral UTC epoch days.
 */

const DAY_MS = 86_400_000;
const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

/** Epoch milliseconds for an ISO-8601 timestamp (with or without fractional seconds), or null. */
export function parseIsoTimestamp(value: string): number | null {
  if (!ISO_DATE_PREFIX.test(value)) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

export function toEpochDay(epochMs: number): number {
  return Math.floor(epochMs / DAY_MS);
}

/** Epoch day of the Monday starting the week that contains `epochDay`. */
export function mondayOf(epochDay: number): number {
  // Epoch day 0 (1970-01-01) was a Thursday.
  const sinceMonday = (((epochDay + 3) % 7) + 7) % 7;
  return epochDay - sinceMonday;
}

/**
 * Training week containing `nowMs` for a plan created at `createdAt`.
 * Never less than 1; null when `createdAt` cannot be parsed.
 */
export function calculateCurrentTrainingWeek(createdAt: string, nowMs: number): number | null {
  const startMs = parseIsoTimestamp(createdAt);
  if (startMs === null) return null;
  const startMonday = mondayOf(toEpochDay(startMs));
  const todayMonday = mondayOf(toEpochDay(nowMs));
  return Math.max(Math.floor((todayMonday - startMonday) / 7) + 1, 1);
}

export interface WeekDateInfo {
  week: number;
  startEpochDay: number;
  endEpochDay: number;
  /** YYYY-MM-DD, UTC */
  startDate: string;
  endDate: string;
}

/** Calendar bounds of training week `week`. */
export function weekDateInfo(createdAt: string, week: number): WeekDateInfo | null {
  const startMs = parseIsoTimestamp(createdAt);
  if (startMs === null || !Number.isInteger(week) || week < 1) return null;
  const startEpochDay = mondayOf(toEpochDay(startMs)) + (week - 1) * 7;
  const endEpochDay = startEpochDay + 6;
  return {
    week,
    startEpochDay,
    endEpochDay,
    startDate: formatEpochDay(startEpochDay),
    endDate: formatEpochDay(endEpochDay),
  };
}

function formatEpochDay(epochDay: number): string {
  return new Date(epochDay * DAY_MS).toISOString().slice(0, 10);
}
