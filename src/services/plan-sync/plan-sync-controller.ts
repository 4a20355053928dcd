/**
 * plan-sync-controller.ts — Weekly-plan sync state machine
 *
 * Offline-first reads of the weekly training plan. Cached data is published
 * at once; a named task then fetches fresh data and writes it through.
 *
 * Task ids:
 *   load_training_overview       overview (initialize)
 *   load_weekly_plan             cold start / refresh of the selected week
 *   load_weekly_plan_week_<n>    week switch; one id per week
 *   generate_weekly_plan         create + fetch a new week
 *
 * Publication rules:
 * - A fetched plan is published only while `selectedWeek` still equals its
 *   week. It is cached either way.
 * - NOT_FOUND → noPlan. Other failures → error, unless the cached plan for
 *   that week is already on screen; then `syncError` is set and the plan stays.
 * - Canceled bodies rethrow and publish nothing.
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import { ErrorCode, isCancellation, toErrorInfo } from "../../errors.js";
import { log } from "../../logger.js";
import { systemClock, type Clock } from "../../stores/cached-value.js";
import type { WeeklyPlanCache } from "../../stores/entity-caches.js";
import type { TrainingOverview, WeeklyPlan } from "../../types/plan-types.js";
import { Invalidation, type CacheEventBus } from "../cache-event-bus.js";
import { withLongRunningWork, type LongRunningWork } from "../long-running-work.js";
import { TaskCoordinator, type CancellationToken } from "../task-coordinator.js";
import { decodeCreateAck, decodeTrainingOverview, decodeWeeklyPlan } from "./decode.js";
import {
  PlanSyncStates,
  availableWeeks,
  derivePlanStatus,
  initialSnapshot,
  type PlanSyncSnapshot,
} from "./plan-status.js";
import { planIdFor, type PlanService } from "./plan-service.js";
import { calculateCurrentTrainingWeek } from "./training-week.js";

export const PlanTaskId = {
  loadOverview: "load_training_overview",
  loadWeeklyPlan: "load_weekly_plan",
  loadWeek: (week: number): string => `load_weekly_plan_week_${week}`,
  generate: "generate_weekly_plan",
} as const;

export type GenerateStep = "create" | "fetch" | "decode";

/** Read-only view of the published snapshot. */
export type PlanSyncStore = Pick<StoreApi<PlanSyncSnapshot>, "getState" | "subscribe">;

export interface PlanSyncControllerOptions {
  service: PlanService;
  planCache: WeeklyPlanCache;
  bus: CacheEventBus;
  longRunningWork: LongRunningWork;
  clock?: Clock;
  coordinator?: TaskCoordinator;
}

export class PlanSyncController {
  readonly state: PlanSyncStore;
  private readonly store: StoreApi<PlanSyncSnapshot>;
  private readonly service: PlanService;
  private readonly planCache: WeeklyPlanCache;
  private readonly bus: CacheEventBus;
  private readonly work: LongRunningWork;
  private readonly clock: Clock;
  private readonly tasks: TaskCoordinator;
  private readonly detachBus: () => void;

  constructor(options: PlanSyncControllerOptions) {
    this.service = options.service;
    this.planCache = options.planCache;
    this.bus = options.bus;
    this.work = options.longRunningWork;
    this.clock = options.clock ?? systemClock;
    this.tasks = options.coordinator ?? new TaskCoordinator("PlanSyncController");
    this.store = createStore<PlanSyncSnapshot>()(() => initialSnapshot());
    this.state = this.store;

    this.detachBus = this.bus.addListener((reason) => {
      if (reason.kind === "userLogout") this.reset();
    });
  }

  get snapshot(): PlanSyncSnapshot {
    return this.store.getState();
  }

  // ─── Operations ───────────────────────────────────────────────

  /** Resolve the overview (cache first), select the current week and load it. */
  async initialize(): Promise<void> {
    const overview = this.planCache.getOverview() ?? (await this.fetchOverview());
    if (!overview) return;
    this.applyOverview(overview);
    await this.loadWeeklyPlan();
  }

  /** Publish what the cache knows for the selected week, then revalidate it. */
  async loadWeeklyPlan(): Promise<void> {
    if (!this.snapshot.overview) {
      await this.initialize();
      return;
    }
    const week = this.snapshot.selectedWeek;
    const derived = this.publishDerived(week);
    if (derived === "completed") return;
    await this.tasks.execute(PlanTaskId.loadWeeklyPlan, (token) => this.fetchWeek(week, token));
  }

  /** Re-issue load_weekly_plan; a refresh still in flight is canceled. */
  refresh(): Promise<void> {
    log.plan.debug({ week: this.snapshot.selectedWeek }, "plan:refresh");
    return this.loadWeeklyPlan();
  }

  async selectWeek(week: number): Promise<void> {
    if (!Number.isInteger(week) || week < 1) {
      log.plan.warn({ week }, "plan:selectWeek ignored: not a positive whole week");
      return;
    }
    const derived = this.publishDerived(week);
    if (derived === "completed") return;
    if (derived === "ready" && !this.planCache.isPlanExpired(week)) return;
    if (!this.snapshot.overview) return;
    await this.tasks.execute(PlanTaskId.loadWeek(week), (token) => this.fetchWeek(week, token));
  }

  /**
   * Ask the service to create `targetWeek` (default: the week after the
   * selected one), then fetch and cache it. Holds a long-running-work token
   * for the whole flow. Resolves with the plan, or null.
   */
  async generateNextWeek(targetWeek?: number): Promise<WeeklyPlan | null> {
    const { overview, selectedWeek, totalWeeks } = this.snapshot;
    const week = targetWeek ?? selectedWeek + 1;
    if (!overview) {
      log.plan.warn({ week }, "plan:generate skipped: no training overview");
      this.store.setState({ status: PlanSyncStates.noPlan() });
      return null;
    }
    if (totalWeeks !== null && week > totalWeeks) {
      this.store.setState({ selectedWeek: week, status: PlanSyncStates.completed(), syncError: null });
      return null;
    }

    this.store.setState({ selectedWeek: week, status: PlanSyncStates.loading(), syncError: null });

    const plan = await withLongRunningWork(this.work, PlanTaskId.generate, () =>
      this.tasks.execute(PlanTaskId.generate, (token) => this.generateWeek(overview, week, token)),
    );
    return plan ?? null;
  }

  /** Cancel every task and stop listening to the bus. */
  dispose(): void {
    this.tasks.dispose();
    this.detachBus();
    log.plan.debug("plan:dispose");
  }

  /** Resolves once no task body is running. */
  whenIdle(): Promise<void> {
    return this.tasks.whenIdle();
  }

  isRunning(taskId: string): boolean {
    return this.tasks.isRunning(taskId);
  }

  // ─── Task bodies ──────────────────────────────────────────────

  private async fetchOverview(): Promise<TrainingOverview | null> {
    this.store.setState({ status: PlanSyncStates.loading() });
    const overview = await this.tasks.execute(PlanTaskId.loadOverview, async (token) => {
      try {
        const body = await this.service.fetchOverview(token.signal);
        token.throwIfCancelled();
        const fresh = decodeTrainingOverview(body);
        this.planCache.saveOverview(fresh);
        return fresh;
      } catch (err) {
        if (token.isCancelled || isCancellation(err)) throw err;
        const info = toErrorInfo(err, "overview");
        log.plan.warn({ err, code: info.code }, "plan:overview failed");
        this.store.setState({
          status: info.code === ErrorCode.NOT_FOUND ? PlanSyncStates.noPlan() : PlanSyncStates.error(info),
        });
        return null;
      }
    });
    return overview ?? null;
  }

  private async fetchWeek(week: number, token: CancellationToken): Promise<WeeklyPlan | null> {
    const overview = this.snapshot.overview;
    if (!overview) return null;
    try {
      const body = await this.service.fetchPlan(planIdFor(overview.id, week), token.signal);
      token.throwIfCancelled();
      const plan = decodeWeeklyPlan(body);
      this.writeThrough(plan);
      if (plan.weekOfPlan !== week || this.snapshot.selectedWeek !== week) {
        log.plan.debug({ week, selectedWeek: this.snapshot.selectedWeek }, "plan:fetch stale: not published");
        return plan;
      }
      this.store.setState({ status: PlanSyncStates.ready(plan), lastSyncedAt: this.clock(), syncError: null });
      return plan;
    } catch (err) {
      if (token.isCancelled || isCancellation(err)) throw err;
      this.reportFetchFailure(week, err);
      return null;
    }
  }

  private async generateWeek(
    overview: TrainingOverview,
    week: number,
    token: CancellationToken,
  ): Promise<WeeklyPlan | null> {
    let step: GenerateStep = "create";
    try {
      decodeCreateAck(await this.service.createPlan(week, token.signal));
      token.throwIfCancelled();

      step = "fetch";
      const body = await this.service.fetchPlan(planIdFor(overview.id, week), token.signal);
      token.throwIfCancelled();

      step = "decode";
      const plan = decodeWeeklyPlan(body);
      this.writeThrough(plan);
      if (this.snapshot.selectedWeek === plan.weekOfPlan) {
        this.store.setState({ status: PlanSyncStates.ready(plan), lastSyncedAt: this.clock(), syncError: null });
      }
      log.plan.info({ week, planId: plan.id }, "plan:generated");
      return plan;
    } catch (err) {
      if (token.isCancelled || isCancellation(err)) throw err;
      const info = toErrorInfo(err, step);
      log.plan.error({ err, week, step, code: info.code }, "plan:generate failed");
      if (this.snapshot.selectedWeek === week) {
        this.store.setState({ status: PlanSyncStates.error(info) });
      }
      return null;
    }
  }

  // ─── Internals ────────────────────────────────────────────────

  private applyOverview(overview: TrainingOverview): void {
    const computed = calculateCurrentTrainingWeek(overview.createdAt, this.clock());
    if (computed === null) {
      log.plan.warn({ createdAt: overview.createdAt }, "plan:overview createdAt unreadable: assuming week 1");
    }
    const currentTrainingWeek = computed ?? 1;
    this.store.setState({
      overview,
      totalWeeks: overview.totalWeeks,
      currentTrainingWeek,
      availableWeeks: availableWeeks(currentTrainingWeek),
      selectedWeek: currentTrainingWeek,
    });
  }

  /**
   * Select `week` and publish its cache-derived state (loading when
   * undecided) in one update.
   */
  private publishDerived(week: number): PlanSyncSnapshot["status"]["kind"] {
    const { currentTrainingWeek, totalWeeks } = this.snapshot;
    const derived = derivePlanStatus({
      selectedWeek: week,
      currentTrainingWeek,
      totalWeeks,
      cachedPlan: this.planCache.getPlan(week),
    });
    const status = derived ?? PlanSyncStates.loading();
    this.store.setState({ selectedWeek: week, status, syncError: null });
    return status.kind;
  }

  private writeThrough(plan: WeeklyPlan): void {
    const result = this.planCache.savePlan(plan);
    if (!result.ok) return;
    this.bus.invalidate(Invalidation.dataChanged("trainingPlan"), { source: this.planCache.cacheIdentifier });
  }

  private reportFetchFailure(week: number, err: unknown): void {
    const info = toErrorInfo(err, "fetch");
    log.plan.warn({ err, week, code: info.code }, "plan:fetch failed");

    const { selectedWeek, status } = this.snapshot;
    if (selectedWeek !== week) return;
    if (status.kind === "ready" && status.plan.weekOfPlan === week) {
      this.store.setState({ syncError: info });
      return;
    }
    this.store.setState({
      status: info.code === ErrorCode.NOT_FOUND ? PlanSyncStates.noPlan() : PlanSyncStates.error(info),
    });
  }

  private reset(): void {
    this.tasks.cancelAll();
    this.store.setState(initialSnapshot(), true);
    log.plan.info("plan:reset: user logged out");
  }
}
