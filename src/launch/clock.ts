import { setTimeout as delay } from "node:timers/promises";

/**
 * Time source and the only way the launch engine suspends.
 * Injected so tests run on virtual time.
 */
export interface Clock {
  now(): number;
  /** Rejects with CancelledError as soon as `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/** Thrown when the caller's AbortSignal fires during a suspension. */
export class CancelledError extends Error {
  readonly name = "CancelledError" as const;
  constructor(message = "Operation cancelled") {
    super(message);
  }
}

/** Longest delay a Node timer honours; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const systemClock: Clock = {
  now: () => Date.now(),
  async sleep(ms, signal) {
    if (ms > MAX_TIMER_DELAY_MS) {
      throw new RangeError(`sleep of ${ms}ms exceeds the ${MAX_TIMER_DELAY_MS}ms timer limit`);
    }
    if (signal?.aborted) throw new CancelledError();
    try {
      await delay(ms, undefined, { signal });
    } catch (err) {
      if (signal?.aborted) throw new CancelledError();
      throw err;
    }
  },
};
