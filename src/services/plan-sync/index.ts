export { PlanSyncController, PlanTaskId } from "./plan-sync-controller.js";
export type { GenerateStep, PlanSyncControllerOptions, PlanSyncStore } from "./plan-sync-controller.js";
export { PlanSyncStates, availableWeeks, derivePlanStatus, initialSnapshot } from "./plan-status.js";
export type { PlanStatusInputs, PlanSyncSnapshot, PlanSyncState } from "./plan-status.js";
export { planIdFor } from "./plan-service.js";
export type { PlanService } from "./plan-service.js";
export { decodeCreateAck, decodeTrainingOverview, decodeWeeklyPlan } from "./decode.js";
export { calculateCurrentTrainingWeek, mondayOf, parseIsoTimestamp, toEpochDay, weekDateInfo } from "./training-week.js";
export type { WeekDateInfo } from "./training-week.js";
