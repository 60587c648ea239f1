// shared/clock.ts — Time source for the polling loops

export interface Clock {
  now(): number;
  /** Resolves after `ms`, or early (without rejecting) when `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      signal?.addEventListener("abort", onAbort, {
        once: true,
      });
    }),
};

/**
 * Race `work` against a clock deadline. Returns null on timeout. The losing
 * sleep is cancelled so no timer outlives the call.
 */
export async function withDeadline<T>(clock: Clock, ms: number, work: Promise<T>): Promise<T | null> {
  const cancel = new AbortController();
  try {
    const winner = await Promise.race([
      work.then((value) => ({
        value,
      })),
      clock.sleep(Math.max(0, ms), cancel.signal).then((): null => null),
    ]);
    return winner === null ? null : winner.value;
  } finally {
    cancel.abort();
  }
}
