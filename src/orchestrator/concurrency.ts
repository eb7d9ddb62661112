// ── Dependency-Gated Concurrent Execution ───────────────────────────────────

export interface GatedTask<K extends string, T> {
  readonly id: K;
  /** Ids that must settle first. Ids absent from the task list are ignored. */
  readonly dependsOn: readonly K[];
  readonly run: () => Promise<T>;
}

/**
 * Options for `runWithConcurrency()`.
 */
export interface ConcurrencyOptions<K extends string, T> {
  readonly tasks: readonly GatedTask<K, T>[];
  /** Maximum number of tasks running simultaneously. Must be >= 1. */
  readonly maxConcurrency: number;
  /** Stops new launches when aborted. In-flight tasks are awaited. */
  readonly signal?: AbortSignal;
  /** Converts a rejected task into a result. */
  readonly onError: (id: K, error: unknown) => T;
}

export interface ConcurrencyResult<K extends string, T> {
  /** Results keyed by task id, for every task that was started. */
  readonly results: ReadonlyMap<K, T>;
  /** Tasks never launched, in input order. */
  readonly notStarted: readonly K[];
  /** True if the signal stopped launches before every task started. */
  readonly aborted: boolean;
}

/**
 * Execute tasks with bounded concurrency.
 *
 * - Launches the first pending task (input order) whose dependencies have
 *   settled, up to `maxConcurrency` at a time
 * - With `maxConcurrency` 1 and a topologically ordered list this is a
 *   plain sequential run in input order
 * - A failed task never stops the others
 * - Never throws
 */
export async function runWithConcurrency<K extends string, T>(
  options: ConcurrencyOptions<K, T>,
): Promise<ConcurrencyResult<K, T>> {
  const { tasks, maxConcurrency, signal, onError } = options;
  const results = new Map<K, T>();

  // ── Edge cases ───────────────────────────────────────────────────────

  if (tasks.length === 0) {
    return { results, notStarted: [], aborted: false };
  }

  if (signal?.aborted) {
    return { results, notStarted: tasks.map((t) => t.id), aborted: true };
  }

  const limit = Math.max(1, Math.min(maxConcurrency, tasks.length));
  const known = new Set(tasks.map((t) => t.id));
  const settled = new Set<K>();
  const pending = [...tasks];
  let running = 0;

  const isReady = (task: GatedTask<K, T>): boolean =>
    task.dependsOn.every((dep) => !known.has(dep) || settled.has(dep));

  // ── Execution ────────────────────────────────────────────────────────

  return new Promise<ConcurrencyResult<K, T>>((resolve) => {
    const tryResolve = (): void => {
      if (running > 0) return;
      resolve({
        results,
        notStarted: pending.map((t) => t.id),
        aborted: pending.length > 0 && (signal?.aborted ?? false),
      });
    };

    const onSettled = (id: K, result: T): void => {
      running--;
      settled.add(id);
      results.set(id, result);
      launchNext();
      tryResolve();
    };

    const launchNext = (): void => {
      while (running < limit && !(signal?.aborted ?? false)) {
        const index = pending.findIndex(isReady);
        if (index === -1) break;
        const [task] = pending.splice(index, 1);
        if (task === undefined) break;

        running++;
        task.run().then(
          (result) => onSettled(task.id, result),
          (error: unknown) => onSettled(task.id, onError(task.id, error)),
        );
      }
    };

    launchNext();
    tryResolve();
  });
}
