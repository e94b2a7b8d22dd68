/**
 * Timed suspension that can be interrupted through an AbortSignal.
 */

/** Signature of the wait used at every suspension point. Injected in tests. */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Longest delay a single timer accepts; Node fires longer ones after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Resolve after `ms` milliseconds, or reject with the signal's reason as
 * soon as it aborts. An already-aborted signal rejects without waiting.
 * Waits longer than MAX_TIMER_MS run as a chain of timers.
 */
export const sleep: Sleeper = (ms, signal) => {
  if (signal?.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise<void>((resolve, reject) => {
    let remaining = ms;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const schedule = (): void => {
      const chunk = Math.min(remaining, MAX_TIMER_MS);
      remaining -= chunk;
      timer = setTimeout(() => {
        if (remaining > 0) {
          schedule();
          return;
        }
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, chunk);
    };

    schedule();
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};
