/**
 * plan-service.ts — Remote plan endpoints consumed by the controller
 *
 * Implementations own transport. They resolve with the raw response body
 * (decoded by the controller) and reject with PlanServiceError, so that
 * "not found" stays distinguishable from transport failures.
 */

export interface PlanService {
  /** Overview of the active training plan. */
  fetchOverview(signal: AbortSignal): Promise<unknown>;
  /** One weekly plan by composite id `<overviewId>_<week>`. */
  fetchPlan(planId: string, signal: AbortSignal): Promise<unknown>;
  /** Ask the server to generate the plan for `targetWeek`. Resolves with an acknowledgement. */
  createPlan(targetWeek: number, signal: AbortSignal): Promise<unknown>;
}

export function planIdFor(overviewId: string, week: number): string {
  return `${overviewId}_${week}`;
}
