/**
 * Timer helpers shared by the retry loop, the rate limiter and the scheduler
 */

/**
 * Sleep for `ms` milliseconds, waking early (without error) if `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Outcome of racing a promise against a deadline
 */
export type DeadlineResult<T> =
  | { readonly settled: true; readonly value: T }
  | { readonly settled: false };

/**
 * Wait for `promise` at most `ms` milliseconds
 *
 * The promise is not cancelled when the deadline wins; whatever it resolves
 * to later is dropped. Rejections propagate.
 */
export async function raceDeadline<T>(promise: Promise<T>, ms: number): Promise<DeadlineResult<T>> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<DeadlineResult<T>>((resolve) => {
    timer = setTimeout(() => resolve({ settled: false }), ms);
  });

  try {
    return await Promise.race([
      promise.then((value): DeadlineResult<T> => ({ settled: true, value })),
      deadline,
    ]);
  } finally {
    clearTimeout(timer);
  }
}
