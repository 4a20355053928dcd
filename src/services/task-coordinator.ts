/**
 * task-coordinator.ts — Named, deduplicated, cancellable async operations
 *
 * One coordinator per owner (a controller). For each operation id at most
 * one body runs at a time:
 *
 *   execute("load", body)   → cancels a running "load", waits for it to
 *                             settle, then runs the new body
 *
 * Outcomes are disjoint:
 *   completed → value returned
 *   canceled  → undefined, logged at debug, never an error
 *   failed    → undefined, logged with { taskId, owner, err }; not re-thrown
 *
 * Cancellation is cooperative. Bodies receive a CancellationToken and must
 * check it after every suspension point, before mutating any state.
 *
 * Owners call dispose() (or cancelAll()) at teardown; a body still awaiting
 * the network otherwise keeps the owner reachable.
 */

import { CancellationError, isCancellation } from "../errors.js";
import { log, type Logger } from "../logger.js";

// ─── Types ──────────────────────────────────────────────────────

export interface CancellationToken {
  readonly signal: AbortSignal;
  readonly isCancelled: boolean;
  /** Throws CancellationError once cancellation was requested. */
  throwIfCancelled(): void;
  /** Run `fn` when cancellation is requested. Returns a disposer. */
  onCancel(fn: () => void): () => void;
}

export type TaskOperation<T> = (token: CancellationToken) => Promise<T>;

export type TaskOutcome<T> =
  | { status: "completed"; value: T }
  | { status: "canceled" }
  | { status: "failed"; error: unknown };

interface TaskEntry {
  controller: AbortController;
  /** Resolves when the body has finished, whatever the outcome. Never rejects. */
  settled: Promise<void>;
}

// ─── Cancellation Token ─────────────────────────────────────────

export function createCancellationToken(signal: AbortSignal): CancellationToken {
  return {
    signal,
    get isCancelled() {
      return signal.aborted;
    },
    throwIfCancelled() {
      if (signal.aborted) throw new CancellationError();
    },
    onCancel(fn: () => void) {
      if (signal.aborted) {
        fn();
        return () => {};
      }
      signal.addEventListener("abort", fn, { once: true });
      return () => signal.removeEventListener("abort", fn);
    },
  };
}

// ─── TaskCoordinator ────────────────────────────────────────────

export class TaskCoordinator {
  readonly owner: string;
  private readonly tasks = new Map<string, TaskEntry>();
  /** Every body not yet settled, including canceled ones still tearing down. */
  private readonly pending = new Set<Promise<void>>();
  private readonly logger: Logger;
  private disposed = false;

  constructor(owner: string, logger: Logger = log.tasks) {
    this.owner = owner;
    this.logger = logger;
  }

  /** Run `operation` as the only live execution of `id`. */
  async execute<T>(id: string, operation: TaskOperation<T>): Promise<T | undefined> {
    const outcome = await this.run(id, operation);
    return outcome.status === "completed" ? outcome.value : undefined;
  }

  /** Like execute(), but reports which of the three outcomes happened. */
  run<T>(id: string, operation: TaskOperation<T>): Promise<TaskOutcome<T>> {
    if (id.trim() === "") {
      this.logger.error({ owner: this.owner }, "task:rejected: empty task id");
      return Promise.resolve({ status: "failed", error: new Error("task id must not be empty") });
    }
    if (this.disposed) {
      this.logger.debug({ taskId: id, owner: this.owner }, "task:rejected: coordinator disposed");
      return Promise.resolve({ status: "canceled" });
    }

    const previous = this.tasks.get(id);
    if (previous) {
      this.logger.debug({ taskId: id, owner: this.owner }, "task:preempt");
      previous.controller.abort(new CancellationError("preempted by a newer execution"));
    }

    const controller = new AbortController();
    const outcome = this.runBody(id, controller, previous?.settled, operation);
    const settled = outcome.then(() => undefined);

    this.tasks.set(id, { controller, settled });
    this.pending.add(settled);
    void settled.then(() => {
      this.pending.delete(settled);
      if (this.tasks.get(id)?.controller === controller) {
        this.tasks.delete(id);
      }
    });

    return outcome;
  }

  /** Cancel `id` if it is running. The body settles on its own. */
  cancel(id: string): void {
    const entry = this.tasks.get(id);
    if (!entry) return;
    this.tasks.delete(id);
    if (!entry.controller.signal.aborted) {
      entry.controller.abort(new CancellationError());
      this.logger.debug({ taskId: id, owner: this.owner }, "task:cancel");
    }
    // Keep the id blocked until the canceled body has torn down.
    this.trackTeardown(id, entry);
  }

  cancelAll(): void {
    const ids = [...this.tasks.keys()];
    for (const id of ids) this.cancel(id);
    if (ids.length > 0) {
      this.logger.info({ owner: this.owner, canceled: ids.length }, "task:cancelAll");
    }
  }

  /** Cancel everything and refuse further work. */
  dispose(): void {
    this.disposed = true;
    this.cancelAll();
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** True while a non-canceled execution of `id` is registered. */
  isRunning(id: string): boolean {
    const entry = this.tasks.get(id);
    return entry !== undefined && !entry.controller.signal.aborted;
  }

  activeIds(): string[] {
    return [...this.tasks.entries()]
      .filter(([, entry]) => !entry.controller.signal.aborted)
      .map(([id]) => id);
  }

  /** Bodies that have not settled yet. */
  get size(): number {
    return this.pending.size;
  }

  /** Resolves once every body started so far has settled. */
  async whenIdle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  // ─── Internals ────────────────────────────────────────────────

  private readonly teardowns = new Map<string, Promise<void>>();

  private trackTeardown(id: string, entry: TaskEntry): void {
    this.teardowns.set(id, entry.settled);
    void entry.settled.then(() => {
      if (this.teardowns.get(id) === entry.settled) this.teardowns.delete(id);
    });
  }

  private async runBody<T>(
    id: string,
    controller: AbortController,
    previous: Promise<void> | undefined,
    operation: TaskOperation<T>,
  ): Promise<TaskOutcome<T>> {
    // Always yield once so the entry is registered before the body starts.
    await previous;
    const teardown = this.teardowns.get(id);
    if (teardown) await teardown;

    const token = createCancellationToken(controller.signal);
    if (token.isCancelled) {
      this.logger.debug({ taskId: id, owner: this.owner }, "task:canceled before start");
      return { status: "canceled" };
    }

    const startedAt = Date.now();
    this.logger.debug({ taskId: id, owner: this.owner }, "task:start");
    try {
      const value = await operation(token);
      if (token.isCancelled) {
        this.logger.debug({ taskId: id, owner: this.owner }, "task:canceled: result discarded");
        return { status: "canceled" };
      }
      this.logger.debug({ taskId: id, owner: this.owner, durationMs: Date.now() - startedAt }, "task:completed");
      return { status: "completed", value };
    } catch (err) {
      if (token.isCancelled || isCancellation(err)) {
        this.logger.debug({ taskId: id, owner: this.owner }, "task:canceled");
        return { status: "canceled" };
      }
      this.logger.error({ err, taskId: id, owner: this.owner }, "task:failed");
      return { status: "failed", error: err };
    }
  }
}
