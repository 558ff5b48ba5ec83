import { logger } from "../config/logger.js";
import { CancelledError, type Clock, MAX_TIMER_DELAY_MS, systemClock } from "./clock.js";
import { classifyError, type ErrorClassifier, toRemoteError } from "./error-classifier.js";
import type { InstanceProvider } from "./instance-provider.js";
import { ignoreLaunchEvent, type LaunchEventSink } from "./launch-events.js";
import type {
  CancelledFailure,
  FatalErrorFailure,
  InstanceFailedFailure,
  InstanceHandle,
  PollConfig,
  PollTimeoutFailure,
} from "./types.js";

export type PollResult =
  | { ok: true; handle: InstanceHandle; elapsedMs: number }
  | { ok: false; failure: PollTimeoutFailure | InstanceFailedFailure | FatalErrorFailure | CancelledFailure };

export interface ReadinessPollerOptions {
  classify?: ErrorClassifier;
  clock?: Clock;
  onEvent?: LaunchEventSink;
}

/** An instance is usable once it is active and has an address to connect to. */
export function isReady(handle: InstanceHandle): boolean {
  return handle.status === "active" && handle.ip !== null;
}

/**
 * Polls one instance at a fixed interval until it is ready, fails, the
 * time budget runs out or the caller cancels.
 */
export class ReadinessPoller {
  private readonly classify: ErrorClassifier;
  private readonly clock: Clock;
  private readonly onEvent: LaunchEventSink;

  constructor(
    private readonly provider: Pick<InstanceProvider, "getStatus">,
    options: ReadinessPollerOptions = {},
  ) {
    this.classify = options.classify ?? ((error) => classifyError(error));
    this.clock = options.clock ?? systemClock;
    this.onEvent = options.onEvent ?? ignoreLaunchEvent;
  }

  async waitReady(handle: InstanceHandle, config: PollConfig, signal?: AbortSignal): Promise<PollResult> {
    const instanceId = handle.id;
    const startedAt = this.clock.now();
    const cancelled = (): PollResult => ({
      ok: false,
      failure: { reason: "cancelled", phase: "poll", instanceId },
    });

    let last = handle;
    const timedOut = (elapsedMs: number): PollResult => ({
      ok: false,
      failure: {
        reason: "poll_timeout",
        phase: "poll",
        instanceId,
        lastStatus: last.status,
        elapsedMs,
        timeoutMs: config.timeoutMs,
      },
    });

    while (true) {
      if (signal?.aborted) return cancelled();

      // A status call may run past the deadline by at most one interval.
      const callBudgetMs = Math.min(
        Math.max(config.timeoutMs - (this.clock.now() - startedAt), config.intervalMs),
        MAX_TIMER_DELAY_MS,
      );
      const deadline = AbortSignal.timeout(callBudgetMs);
      const callSignal = signal ? AbortSignal.any([signal, deadline]) : deadline;

      let current: InstanceHandle | null = null;
      try {
        current = await this.provider.getStatus(instanceId, callSignal);
      } catch (err) {
        if (signal?.aborted) return cancelled();
        if (deadline.aborted) return timedOut(this.clock.now() - startedAt);
        const error = this.classify(toRemoteError(err));
        if (!error.retryable) {
          return { ok: false, failure: { reason: "fatal_error", phase: "poll", error, instanceId } };
        }
        logger.warn(`Status check for ${instanceId} failed, will retry`, { code: error.code, message: error.message });
      }

      const elapsedMs = this.clock.now() - startedAt;

      if (current) {
        last = current;
        this.onEvent({ type: "poll_tick", instanceId, status: current.status, ip: current.ip, elapsedMs });
        if (isReady(current)) return { ok: true, handle: current, elapsedMs };
        if (current.status === "terminated" || current.status === "unhealthy") {
          return { ok: false, failure: { reason: "instance_failed", phase: "poll", instanceId, status: current.status } };
        }
      }

      if (elapsedMs >= config.timeoutMs) return timedOut(elapsedMs);

      // Clamp so the last check lands on the deadline.
      const waitMs = Math.min(config.intervalMs, config.timeoutMs - elapsedMs);
      try {
        await this.clock.sleep(waitMs, signal);
      } catch (err) {
        if (err instanceof CancelledError) return cancelled();
        throw err;
      }
    }
  }
}
