/**
 * plan-status.test.ts — Pure plan-state derivation
 */

import { describe, it, expect } from "vitest";
import { availableWeeks, derivePlanStatus } from "../src/services/plan-sync/plan-status.js";
import type { WeeklyPlan } from "../src/types/plan-types.js";

function plan(week: number): WeeklyPlan {
  return {
    id: `ov-1_${week}`,
    purpose: "base",
    weekOfPlan: week,
    totalWeeks: 4,
    totalDistanceKm: 25,
    designReason: null,
    days: [],
    createdAt: null,
  };
}

describe("derivePlanStatus", () => {
  it("is completed past the horizon regardless of cache", () => {
    expect(derivePlanStatus({ selectedWeek: 5, currentTrainingWeek: 5, totalWeeks: 4, cachedPlan: plan(5) })).toEqual({
      kind: "completed",
    });
  });

  it("is ready with a cached plan for the selected week", () => {
    expect(derivePlanStatus({ selectedWeek: 3, currentTrainingWeek: 3, totalWeeks: 4, cachedPlan: plan(3) })).toEqual({
      kind: "ready",
      plan: plan(3),
    });
  });

  it("ignores a cached plan for another week", () => {
    expect(derivePlanStatus({ selectedWeek: 3, currentTrainingWeek: 3, totalWeeks: 4, cachedPlan: plan(2) })).toBeNull();
  });

  it("is noPlan for a past week without cache", () => {
    expect(derivePlanStatus({ selectedWeek: 1, currentTrainingWeek: 2, totalWeeks: 4, cachedPlan: null })).toEqual({
      kind: "noPlan",
    });
  });

  it("needs a fetch for the current week without cache", () => {
    expect(derivePlanStatus({ selectedWeek: 2, currentTrainingWeek: 2, totalWeeks: 4, cachedPlan: null })).toBeNull();
  });

  it("never reports completed before the horizon is known", () => {
    expect(derivePlanStatus({ selectedWeek: 9, currentTrainingWeek: 9, totalWeeks: null, cachedPlan: null })).toBeNull();
  });
});

describe("availableWeeks", () => {
  it("spans week 1 through the current week", () => {
    expect(availableWeeks(3)).toEqual([1, 2, 3]);
    expect(availableWeeks(0)).toEqual([1]);
  });
});
