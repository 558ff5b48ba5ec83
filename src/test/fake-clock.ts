import { CancelledError, type Clock } from "../launch/clock.js";

/**
 * Virtual time for tests. `sleep` resolves at once, advances `now()` by the
 * requested amount and records it in `sleeps`.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  /** Runs after time has advanced, before sleep resolves. Abort a controller here to cancel mid-sleep. */
  onSleep: ((ms: number) => void) | null = null;

  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new CancelledError();
    this.sleeps.push(ms);
    this.current += ms;
    this.onSleep?.(ms);
    if (signal?.aborted) throw new CancelledError();
  }
}
