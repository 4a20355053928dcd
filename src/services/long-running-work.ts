/**
 * long-running-work.ts — Background-execution token handling
 *
 * The host platform may grant a short extension of execution time while a
 * multi-step flow finishes. The grant is modelled as a token that must be
 * ended exactly once, on every exit path.
 */

import { log } from "../logger.js";

export interface WorkToken {
  readonly id: number;
  readonly name: string;
}

export interface LongRunningWork {
  begin(name: string): WorkToken;
  end(token: WorkToken): void;
}

/**
 * Run `fn` while holding a token. The token is ended exactly once whether
 * `fn` resolves, throws, or is canceled.
 */
export async function withLongRunningWork<T>(
  work: LongRunningWork,
  name: string,
  fn: () => Promise<T>,
): Promise<T> {
  const token = work.begin(name);
  let ended = false;
  const release = (): void => {
    if (ended) return;
    ended = true;
    try {
      work.end(token);
    } catch (err) {
      log.plan.error({ err, work: name, tokenId: token.id }, "work:end failed");
    }
  };

  try {
    return await fn();
  } finally {
    release();
  }
}

export interface TrackedLongRunningWork extends LongRunningWork {
  /** Tokens begun and not yet ended. */
  outstanding(): WorkToken[];
  /** Total tokens begun. */
  readonly begun: number;
}

/**
 * In-process implementation. Counts outstanding tokens; a second end() for
 * the same token is ignored and logged.
 */
export function createTrackedLongRunningWork(): TrackedLongRunningWork {
  const open = new Map<number, WorkToken>();
  let nextId = 1;

  return {
    begin(name: string): WorkToken {
      const token: WorkToken = { id: nextId++, name };
      open.set(token.id, token);
      log.plan.debug({ work: name, tokenId: token.id }, "work:begin");
      return token;
    },

    end(token: WorkToken): void {
      if (!open.delete(token.id)) {
        log.plan.warn({ work: token.name, tokenId: token.id }, "work:end ignored: token not open");
        return;
      }
      log.plan.debug({ work: token.name, tokenId: token.id }, "work:end");
    },

    outstanding(): WorkToken[] {
      return [...open.values()];
    },

    get begun(): number {
      return nextId - 1;
    },
  };
}
