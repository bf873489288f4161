/**
 * Bounded pool of async lanes, one project per lane at a time.
 * Purpose: parallelize independent projects while keeping everything below a project sequential.
 * Assumptions: workers share nothing mutable; a ConfigError is fatal for the whole run,
 *   anything else thrown by a worker only fails its own item.
 * Usage: const results = await runAll(projects, (p, signal) => runProject(p, signal), { workers: 4, describe });
 */

import { ConfigError, RunAbortedError, WorkerCrashError } from "../../../core/errors.js";
import { actionResult, type Result } from "../../../core/result.js";

// =============================================================================
// TYPES
// =============================================================================

export type PoolWorker<T> = (item: T, signal: AbortSignal) => Promise<Result>;

export type WorkerPoolOptions<T> = {
  workers: number;
  /** Subject used in crash messages, e.g. the project path. */
  describe: (item: T) => string;
  /** Aborting it stops dispatching and cancels in-flight commands. */
  signal?: AbortSignal;
  onCrash?: (item: T, error: WorkerCrashError) => void;
};

// =============================================================================
// POOL
// =============================================================================

/** Results come back in item order, whatever order the lanes finished in. */
export async function runAll<T>(
  items: readonly T[],
  worker: PoolWorker<T>,
  opts: WorkerPoolOptions<T>,
): Promise<Result[]> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort();
  opts.signal?.addEventListener("abort", forwardAbort, { once: true });
  if (opts.signal?.aborted) controller.abort();

  const results = new Map<number, Result>();
  const state: { fatal: ConfigError | null; next: number } = { fatal: null, next: 0 };

  const lane = async (): Promise<void> => {
    while (!controller.signal.aborted && state.next < items.length) {
      const index = state.next;
      state.next += 1;
      const item = items[index];

      try {
        results.set(index, await worker(item, controller.signal));
      } catch (err) {
        if (err instanceof ConfigError) {
          if (state.fatal === null) {
            state.fatal = err;
          }
          controller.abort();
          return;
        }
        if (err instanceof RunAbortedError && controller.signal.aborted) {
          return;
        }

        const crash = new WorkerCrashError(opts.describe(item), err);
        opts.onCrash?.(item, crash);
        results.set(index, actionResult("FAIL", `FAIL: ${crash.subject}, ${crash.message}`));
      }
    }
  };

  const laneCount = Math.max(1, Math.min(opts.workers, items.length));
  try {
    await Promise.all(Array.from({ length: laneCount }, () => lane()));
  } finally {
    opts.signal?.removeEventListener("abort", forwardAbort);
  }

  if (state.fatal) throw state.fatal;

  const ordered: Result[] = [];
  for (let index = 0; index < items.length; index += 1) {
    const result = results.get(index);
    if (!result) {
      throw new RunAbortedError(`Run aborted before ${opts.describe(items[index])} finished`);
    }
    ordered.push(result);
  }
  return ordered;
}
