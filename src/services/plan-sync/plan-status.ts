/**
 * plan-status.ts — Published plan state and its pure derivations
 */

import type { ErrorInfo } from "../../errors.js";
import type { TrainingOverview, WeeklyPlan } from "../../types/plan-types.js";

export type PlanSyncState =
  | { kind: "loading" }
  | { kind: "noPlan" }
  | { kind: "ready"; plan: WeeklyPlan }
  | { kind: "completed" }
  | { kind: "error"; error: ErrorInfo };

export const PlanSyncStates = {
  loading: (): PlanSyncState => ({ kind: "loading" }),
  noPlan: (): PlanSyncState => ({ kind: "noPlan" }),
  ready: (plan: WeeklyPlan): PlanSyncState => ({ kind: "ready", plan }),
  completed: (): PlanSyncState => ({ kind: "completed" }),
  error: (error: ErrorInfo): PlanSyncState => ({ kind: "error", error }),
};

/** Everything the UI reads. Mutated only by the controller. */
export interface PlanSyncSnapshot {
  status: PlanSyncState;
  selectedWeek: number;
  currentTrainingWeek: number;
  /** null until an overview is known */
  totalWeeks: number | null;
  /** [1, currentTrainingWeek] */
  availableWeeks: number[];
  overview: TrainingOverview | null;
  /** Epoch ms of the last successful plan fetch */
  lastSyncedAt: number | null;
  /** Background refresh failure while a cached plan stays on screen */
  syncError: ErrorInfo | null;
}

export function initialSnapshot(): PlanSyncSnapshot {
  return {
    status: PlanSyncStates.loading(),
    selectedWeek: 1,
    currentTrainingWeek: 1,
    totalWeeks: null,
    availableWeeks: [1],
    overview: null,
    lastSyncedAt: null,
    syncError: null,
  };
}

export interface PlanStatusInputs {
  selectedWeek: number;
  currentTrainingWeek: number;
  totalWeeks: number | null;
  cachedPlan: WeeklyPlan | null;
}

/**
 * State implied by the inputs alone, or null when a fetch must decide.
 *
 *   selectedWeek > totalWeeks          → completed (cache ignored)
 *   cached plan for selectedWeek       → ready
 *   selectedWeek < currentTrainingWeek → noPlan
 */
export function derivePlanStatus({
  selectedWeek,
  currentTrainingWeek,
  totalWeeks,
  cachedPlan,
}: PlanStatusInputs): PlanSyncState | null {
  if (totalWeeks !== null && selectedWeek > totalWeeks) return PlanSyncStates.completed();
  if (cachedPlan !== null && cachedPlan.weekOfPlan === selectedWeek) return PlanSyncStates.ready(cachedPlan);
  if (selectedWeek < currentTrainingWeek) return PlanSyncStates.noPlan();
  return null;
}

export function availableWeeks(currentTrainingWeek: number): number[] {
  const last = Math.max(1, Math.floor(currentTrainingWeek));
  return Array.from({ length: last }, (_, i) => i + 1);
}
