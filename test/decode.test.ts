/**
 * decode.test.ts — Wire bodies to cached model types
 */

import { describe, it, expect } from "vitest";
import { ErrorCode, classifyError } from "../src/errors.js";
import { decodeCreateAck, decodeTrainingOverview, decodeWeeklyPlan } from "../src/services/plan-sync/decode.js";
import { wireOverview, wirePlan } from "./helpers/fakes.js";

const expectedPlan = {
  id: "ov-1_2",
  purpose: "Week 2 base",
  weekOfPlan: 2,
  totalWeeks: 4,
  totalDistanceKm: 22,
  designReason: ["build aerobic base"],
  days: [{ dayIndex: "1", dayTarget: "Easy run", trainingType: "easy_run", reason: null, tips: "Keep it relaxed" }],
  createdAt: "2024-01-01T08:00:00Z",
};

describe("decodeWeeklyPlan", () => {
  it("maps snake_case fields", () => {
    expect(decodeWeeklyPlan(wirePlan(2))).toEqual(expectedPlan);
  });

  it("unwraps a { data } envelope", () => {
    expect(decodeWeeklyPlan({ data: wirePlan(2) })).toEqual(expectedPlan);
  });

  it("fills absent optional fields with null", () => {
    const body = wirePlan(2);
    delete body.design_reason;
    delete body.created_at;

    const decoded = decodeWeeklyPlan(body);
    expect(decoded.designReason).toBeNull();
    expect(decoded.createdAt).toBeNull();
  });

  it("throws a decode-class error for an invalid body", () => {
    let thrown: unknown;
    try {
      decodeWeeklyPlan(wirePlan(0));
    } catch (err) {
      thrown = err;
    }
    expect(classifyError(thrown)).toBe(ErrorCode.DECODE);
  });
});

describe("decodeTrainingOverview", () => {
  it("maps fields and defaults the race id", () => {
    const body = wireOverview();
    delete body.main_race_id;

    expect(decodeTrainingOverview({ data: body })).toEqual({
      id: "ov-1",
      mainRaceId: "",
      trainingPlanName: "Spring 10K",
      totalWeeks: 4,
      createdAt: "2024-01-01T08:00:00Z",
    });
  });
});

describe("decodeCreateAck", () => {
  it("accepts an empty or wrapped acknowledgement", () => {
    expect(decodeCreateAck(null)).toEqual({});
    expect(decodeCreateAck({ data: { id: "ov-1_3" } })).toEqual({ id: "ov-1_3" });
  });

  it("rejects a non-object body", () => {
    expect(() => decodeCreateAck("created")).toThrow();
  });
});
