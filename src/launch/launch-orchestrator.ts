import { nextDelay, withJitter } from "./backoff-policy.js";
import { CancelledError, type Clock, systemClock } from "./clock.js";
import { classifyError, type ErrorClassifier, toRemoteError } from "./error-classifier.js";
import type { InstanceProvider } from "./instance-provider.js";
import { ignoreLaunchEvent, type LaunchEventSink } from "./launch-events.js";
import type {
  CancelledFailure,
  FatalErrorFailure,
  InstanceHandle,
  LaunchRequest,
  RetriesExhaustedFailure,
  RetryConfig,
} from "./types.js";

// ---------------------------------------------------------------------------
// State machine
// ---------------------------------------------------------------------------

export const LAUNCH_STATES = [
  "idle",
  "attempting",
  "backoff",
  "succeeded",
  "fatal_failed",
  "retries_exhausted",
  "cancelled",
] as const;

export type LaunchState = (typeof LAUNCH_STATES)[number];

/**
 * ```
 * idle       → attempting, cancelled
 * attempting → succeeded, backoff, fatal_failed, retries_exhausted, cancelled
 * backoff    → attempting, cancelled
 * ```
 * The other four states are terminal.
 */
export const LAUNCH_TRANSITIONS: Record<LaunchState, readonly LaunchState[]> = {
  idle: ["attempting", "cancelled"],
  attempting: ["succeeded", "backoff", "fatal_failed", "retries_exhausted", "cancelled"],
  backoff: ["attempting", "cancelled"],
  succeeded: [],
  fatal_failed: [],
  retries_exhausted: [],
  cancelled: [],
};

export function isValidLaunchTransition(from: LaunchState, to: LaunchState): boolean {
  return LAUNCH_TRANSITIONS[from].includes(to);
}

export class InvalidLaunchTransitionError extends Error {
  readonly name = "InvalidLaunchTransitionError" as const;
  constructor(from: LaunchState, to: LaunchState) {
    super(`Invalid launch transition: ${from} → ${to}`);
  }
}

/** Mutable bookkeeping for one launch() call. Never shared. */
interface AttemptState {
  state: LaunchState;
  /** Failed calls so far; also the exponent for the next backoff. */
  attempt: number;
  delayMs: number;
  elapsedMs: number;
}

function moveTo(attemptState: AttemptState, next: LaunchState): void {
  if (!isValidLaunchTransition(attemptState.state, next)) {
    throw new InvalidLaunchTransitionError(attemptState.state, next);
  }
  attemptState.state = next;
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export type LaunchAttemptResult =
  | { ok: true; handle: InstanceHandle; attempts: number }
  | { ok: false; failure: FatalErrorFailure | RetriesExhaustedFailure | CancelledFailure; attempts: number };

export interface LaunchOrchestratorOptions {
  classify?: ErrorClassifier;
  clock?: Clock;
  onEvent?: LaunchEventSink;
  /** Source for jitter; only consulted when jitterRatio > 0. */
  random?: () => number;
}

/**
 * Drives remote launch calls until one succeeds, a non-retryable error
 * arrives, retries run out or the caller cancels.
 *
 * Holds no per-launch state: concurrent launch() calls are independent.
 */
export class LaunchOrchestrator {
  private readonly classify: ErrorClassifier;
  private readonly clock: Clock;
  private readonly onEvent: LaunchEventSink;
  private readonly random: () => number;

  constructor(
    private readonly provider: Pick<InstanceProvider, "launch">,
    options: LaunchOrchestratorOptions = {},
  ) {
    this.classify = options.classify ?? ((error) => classifyError(error));
    this.clock = options.clock ?? systemClock;
    this.onEvent = options.onEvent ?? ignoreLaunchEvent;
    this.random = options.random ?? Math.random;
  }

  async launch(request: LaunchRequest, config: RetryConfig, signal?: AbortSignal): Promise<LaunchAttemptResult> {
    const startedAt = this.clock.now();
    const attemptState: AttemptState = { state: "idle", attempt: 0, delayMs: 0, elapsedMs: 0 };

    const cancelled = (): LaunchAttemptResult => {
      moveTo(attemptState, "cancelled");
      return {
        ok: false,
        failure: { reason: "cancelled", phase: "launch", instanceId: null },
        attempts: attemptState.attempt,
      };
    };

    while (true) {
      if (signal?.aborted) return cancelled();

      moveTo(attemptState, "attempting");
      const call = attemptState.attempt + 1;
      this.onEvent({ type: "attempt_started", attempt: call });

      let handle: InstanceHandle;
      try {
        handle = await this.provider.launch(request, signal);
      } catch (err) {
        if (signal?.aborted) {
          attemptState.attempt = call;
          return cancelled();
        }

        const error = this.classify(toRemoteError(err));

        if (!error.retryable) {
          moveTo(attemptState, "fatal_failed");
          return {
            ok: false,
            failure: { reason: "fatal_error", phase: "launch", error, instanceId: null },
            attempts: call,
          };
        }

        if (attemptState.attempt >= config.maxAttempts) {
          moveTo(attemptState, "retries_exhausted");
          return {
            ok: false,
            failure: { reason: "retries_exhausted", phase: "launch", error, attempts: call },
            attempts: call,
          };
        }

        attemptState.delayMs = withJitter(nextDelay(attemptState.attempt, config), config, this.random);
        attemptState.elapsedMs = this.clock.now() - startedAt;
        moveTo(attemptState, "backoff");
        this.onEvent({
          type: "retry_scheduled",
          retry: call,
          maxRetries: config.maxAttempts,
          delayMs: attemptState.delayMs,
          elapsedMs: attemptState.elapsedMs,
          error,
        });

        try {
          await this.clock.sleep(attemptState.delayMs, signal);
        } catch (sleepErr) {
          if (sleepErr instanceof CancelledError) {
            attemptState.attempt = call;
            return cancelled();
          }
          throw sleepErr;
        }

        attemptState.attempt = call;
        continue;
      }

      moveTo(attemptState, "succeeded");
      this.onEvent({ type: "launched", instanceId: handle.id, attempts: call });
      return { ok: true, handle, attempts: call };
    }
  }
}
