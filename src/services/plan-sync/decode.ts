/**
 * decode.ts — Wire shapes (snake_case) → cached model types
 *
 * Responses may arrive bare or wrapped as `{ data: … }`.
 * A body that fails validation throws ZodError, classified as DECODE.
 */

import { z } from "zod";
import type { TrainingOverview, WeeklyPlan } from "../../types/plan-types.js";

const wireDaySchema = z.object({
  // Some servers send the index as a number.
  day_index: z.union([z.string(), z.number().int()]).transform(String),
  day_target: z.string(),
  training_type: z.string(),
  reason: z.string().nullish(),
  tips: z.string().nullish(),
});

const wirePlanSchema = z.object({
  id: z.string().min(1),
  purpose: z.string(),
  week_of_plan: z.number().int().positive(),
  total_weeks: z.number().int().positive(),
  total_distance_km: z.number().nonnegative(),
  design_reason: z.array(z.string()).nullish(),
  days: z.array(wireDaySchema),
  created_at: z.string().nullish(),
});

const wireOverviewSchema = z.object({
  id: z.string().min(1),
  main_race_id: z.string().default(""),
  training_plan_name: z.string(),
  total_weeks: z.number().int().positive(),
  created_at: z.string().min(1),
});

const wireAckSchema = z.object({ id: z.string().optional() }).passthrough();

function unwrap(body: unknown): unknown {
  if (typeof body === "object" && body !== null && "data" in body) {
    return body.data;
  }
  return body;
}

export function decodeWeeklyPlan(body: unknown): WeeklyPlan {
  const wire = wirePlanSchema.parse(unwrap(body));
  return {
    id: wire.id,
    purpose: wire.purpose,
    weekOfPlan: wire.week_of_plan,
    totalWeeks: wire.total_weeks,
    totalDistanceKm: wire.total_distance_km,
    designReason: wire.design_reason ?? null,
    days: wire.days.map((day) => ({
      dayIndex: day.day_index,
      dayTarget: day.day_target,
      trainingType: day.training_type,
      reason: day.reason ?? null,
      tips: day.tips ?? null,
    })),
    createdAt: wire.created_at ?? null,
  };
}

export function decodeTrainingOverview(body: unknown): TrainingOverview {
  const wire = wireOverviewSchema.parse(unwrap(body));
  return {
    id: wire.id,
    mainRaceId: wire.main_race_id,
    trainingPlanName: wire.training_plan_name,
    totalWeeks: wire.total_weeks,
    createdAt: wire.created_at,
  };
}

/** createPlan acknowledgement; only checks that it is an object. */
export function decodeCreateAck(body: unknown): { id?: string } {
  return wireAckSchema.parse(unwrap(body) ?? {});
}
