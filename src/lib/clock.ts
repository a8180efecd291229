import { setTimeout as delay } from "node:timers/promises";

/**
 * Source of time for the scheduler and the batch runner.
 *
 * `sleep` rejects once `signal` is aborted so a sleeping scheduler can be
 * stopped without waiting out the interval.
 */
export interface Clock {
  now(): Date;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/** Wall-clock implementation backed by Node timers. */
export const systemClock: Clock = {
  now: () => new Date(),
  sleep: async (ms, signal) => {
    await delay(ms, undefined, { signal });
  },
};
