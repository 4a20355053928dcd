/**
 * plan-types.ts — Value types held by the caches
 *
 * Each cache stores one of these shapes and nothing else; the zod schemas
 * double as the decode step for cached bytes. Time-indexed values carry
 * integral epoch numbers (ms, seconds or days), never Date objects.
 */

import { z } from "zod";

// ─── Training Plan ──────────────────────────────────────────────

export const TrainingDaySchema = z.object({
  dayIndex: z.string().min(1),
  dayTarget: z.string(),
  trainingType: z.string(),
  reason: z.string().nullable(),
  tips: z.string().nullable(),
});

export type TrainingDay = z.infer<typeof TrainingDaySchema>;

export const WeeklyPlanSchema = z.object({
  id: z.string().min(1),
  purpose: z.string(),
  weekOfPlan: z.number().int().positive(),
  totalWeeks: z.number().int().positive(),
  totalDistanceKm: z.number().nonnegative(),
  designReason: z.array(z.string()).nullable(),
  days: z.array(TrainingDaySchema),
  /** ISO-8601, as sent by the server */
  createdAt: z.string().nullable(),
});

export type WeeklyPlan = z.infer<typeof WeeklyPlanSchema>;

export const TrainingOverviewSchema = z.object({
  id: z.string().min(1),
  mainRaceId: z.string(),
  trainingPlanName: z.string(),
  totalWeeks: z.number().int().positive(),
  /** ISO-8601 plan start; week 1 is the Monday-based week containing it */
  createdAt: z.string().min(1),
});

export type TrainingOverview = z.infer<typeof TrainingOverviewSchema>;

// ─── Other cached entities ──────────────────────────────────────

export const WeeklySummarySchema = z.object({
  weekNumber: z.number().int().positive(),
  distanceKm: z.number().nonnegative(),
  completionPercentage: z.number().min(0).max(100),
  summary: z.string(),
});

export type WeeklySummary = z.infer<typeof WeeklySummarySchema>;

export const TargetSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  distanceKm: z.number().positive(),
  targetTimeSeconds: z.number().int().positive(),
  /** Race day, epoch days (UTC) */
  raceEpochDay: z.number().int(),
  isMainRace: z.boolean(),
});

export type Target = z.infer<typeof TargetSchema>;

export const UserProfileSchema = z.object({
  id: z.string().min(1),
  displayName: z.string(),
  email: z.string().email(),
  currentVdot: z.number().positive().nullable(),
});

export type UserProfile = z.infer<typeof UserProfileSchema>;

export const WorkoutSummarySchema = z.object({
  id: z.string().min(1),
  activityType: z.string(),
  startEpochSeconds: z.number().int(),
  endEpochSeconds: z.number().int(),
  distanceKm: z.number().nonnegative().nullable(),
  durationSeconds: z.number().int().nonnegative(),
});

export type WorkoutSummary = z.infer<typeof WorkoutSummarySchema>;

export const HrvSampleSchema = z.object({
  epochDay: z.number().int(),
  rmssdMs: z.number().positive(),
});

export type HrvSample = z.infer<typeof HrvSampleSchema>;

export const VdotEntrySchema = z.object({
  epochDay: z.number().int(),
  vdot: z.number().positive(),
});

export type VdotEntry = z.infer<typeof VdotEntrySchema>;
