export type PoolTask<T> = (signal: AbortSignal) => Promise<T>;

export type PoolResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

export type PoolOutcome<T> =
  | { status: "completed"; results: PoolResult<T>[] }
  | { status: "cancelled" };

/**
 * Runs tasks with at most `concurrency` in flight. Results keep task order
 * regardless of completion order. Once `signal` aborts no further task is
 * started and the pool reports cancellation without waiting for running
 * tasks; their late results are discarded.
 */
export const runTaskPool = async <T>({
  tasks,
  concurrency,
  signal = new AbortController().signal,
}: {
  tasks: readonly PoolTask<T>[];
  concurrency: number;
  signal?: AbortSignal;
}): Promise<PoolOutcome<T>> => {
  if (signal.aborted) return { status: "cancelled" };

  const results = new Array<PoolResult<T> | undefined>(tasks.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < tasks.length && !signal.aborted) {
      const index = next;
      next += 1;
      const task = tasks[index];
      try {
        results[index] = { ok: true, value: await task(signal) };
      } catch (error) {
        results[index] = { ok: false, error };
      }
    }
  };

  const workerCount = Math.max(1, Math.min(concurrency, tasks.length));
  const workers = Promise.all(Array.from({ length: workerCount }, () => worker()));
  const { aborted, detach } = abortPromise(signal);
  try {
    await Promise.race([workers, aborted]);
  } finally {
    detach();
  }

  if (signal.aborted) return { status: "cancelled" };
  return {
    status: "completed",
    results: results.filter((result): result is PoolResult<T> => result !== undefined),
  };
};

const abortPromise = (signal: AbortSignal): { aborted: Promise<void>; detach: () => void } => {
  let onAbort = () => {};
  const aborted = new Promise<void>((resolve) => {
    onAbort = () => resolve();
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return { aborted, detach: () => signal.removeEventListener("abort", onAbort) };
};
