/**
 * training-week.test.ts — Monday-based week arithmetic
 */

import { describe, it, expect } from "vitest";
import {
  calculateCurrentTrainingWeek,
  mondayOf,
  parseIsoTimestamp,
  toEpochDay,
  weekDateInfo,
} from "../src/services/plan-sync/training-week.js";
import { NOW_MS } from "./helpers/fakes.js";

describe("mondayOf", () => {
  it("finds the Monday on or before an epoch day", () => {
    expect(mondayOf(0)).toBe(-3); // 1970-01-01 was a Thursday
    expect(mondayOf(-1)).toBe(-3);
    expect(mondayOf(toEpochDay(Date.UTC(2024, 0, 1)))).toBe(19723);
    expect(mondayOf(toEpochDay(Date.UTC(2024, 0, 7, 23, 59)))).toBe(19723);
    expect(mondayOf(toEpochDay(Date.UTC(2024, 0, 8)))).toBe(19730);
  });
});

describe("calculateCurrentTrainingWeek", () => {
  it("counts Monday-based weeks since the plan started", () => {
    expect(calculateCurrentTrainingWeek("2024-01-01T08:00:00Z", NOW_MS)).toBe(2);
  });

  it("moves to week 2 at Monday even when the plan started on a Sunday", () => {
    expect(calculateCurrentTrainingWeek("2024-01-07T20:00:00Z", Date.UTC(2024, 0, 7, 22))).toBe(1);
    expect(calculateCurrentTrainingWeek("2024-01-07T20:00:00Z", Date.UTC(2024, 0, 8, 1))).toBe(2);
  });

  it("accepts fractional seconds", () => {
    expect(calculateCurrentTrainingWeek("2024-01-01T08:00:00.123Z", Date.UTC(2024, 0, 29))).toBe(5);
  });

  it("never returns less than 1", () => {
    expect(calculateCurrentTrainingWeek("2024-03-01T00:00:00Z", NOW_MS)).toBe(1);
  });

  it("returns null for an unreadable start", () => {
    expect(calculateCurrentTrainingWeek("", NOW_MS)).toBeNull();
    expect(calculateCurrentTrainingWeek("next tuesday", NOW_MS)).toBeNull();
    expect(parseIsoTimestamp("2024-13-45T00:00:00Z")).toBeNull();
  });
});

describe("weekDateInfo", () => {
  it("gives the Monday-to-Sunday bounds of a week", () => {
    expect(weekDateInfo("2024-01-03T10:00:00Z", 2)).toEqual({
      week: 2,
      startEpochDay: 19730,
      endEpochDay: 19736,
      startDate: "2024-01-08",
      endDate: "2024-01-14",
    });
  });

  it("rejects week numbers below 1", () => {
    expect(weekDateInfo("2024-01-03T10:00:00Z", 0)).toBeNull();
  });
});
