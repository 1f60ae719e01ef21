// src/util/clock.ts

export interface Clock {
  now(): Date;
}

export type CancelTimer = () => void;

/**
 * Timer seam: the debouncer, catalog backoff and sweeper never call
 * setTimeout directly, so tests can drive them with simulated time.
 */
export interface Scheduler {
  setTimer(delayMs: number, fn: () => void): CancelTimer;
  setRepeating(intervalMs: number, fn: () => void): CancelTimer;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export const systemScheduler: Scheduler = {
  setTimer(delayMs, fn) {
    const handle = setTimeout(fn, delayMs);
    return () => clearTimeout(handle);
  },
  setRepeating(intervalMs, fn) {
    const handle = setInterval(fn, intervalMs);
    handle.unref();
    return () => clearInterval(handle);
  },
};

export function sleep(scheduler: Scheduler, ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      cancel();
      reject(signal?.reason);
    };
    const cancel = scheduler.setTimer(ms, () => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    });
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
