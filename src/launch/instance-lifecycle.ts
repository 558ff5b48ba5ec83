import type { Clock } from "./clock.js";
import type { ErrorClassifier } from "./error-classifier.js";
import type { InstanceProvider } from "./instance-provider.js";
import { ignoreLaunchEvent, type LaunchEventSink } from "./launch-events.js";
import { type LaunchAttemptResult, LaunchOrchestrator } from "./launch-orchestrator.js";
import { ReadinessPoller } from "./readiness-poller.js";
import type { InstanceHandle, LaunchOutcome, LaunchRequest, PollConfig, RetryConfig } from "./types.js";

export interface InstanceLifecycleOptions {
  classify?: ErrorClassifier;
  clock?: Clock;
  onEvent?: LaunchEventSink;
  random?: () => number;
}

/**
 * Entry point for callers: launch with retry, then wait for readiness.
 *
 * The outcome is either a ready instance or the first terminal failure,
 * exactly as the orchestrator or poller reported it.
 */
export class InstanceLifecycle {
  private readonly orchestrator: LaunchOrchestrator;
  private readonly poller: ReadinessPoller;
  private readonly onEvent: LaunchEventSink;

  constructor(
    private readonly provider: InstanceProvider,
    options: InstanceLifecycleOptions = {},
  ) {
    this.onEvent = options.onEvent ?? ignoreLaunchEvent;
    this.orchestrator = new LaunchOrchestrator(provider, options);
    this.poller = new ReadinessPoller(provider, options);
  }

  async bringUp(
    request: LaunchRequest,
    retryConfig: RetryConfig,
    pollConfig: PollConfig,
    signal?: AbortSignal,
  ): Promise<LaunchOutcome> {
    const launched = await this.orchestrator.launch(request, retryConfig, signal);
    if (!launched.ok) {
      return this.settle({ status: "failed", failure: launched.failure, attempts: launched.attempts });
    }

    const polled = await this.poller.waitReady(launched.handle, pollConfig, signal);
    return this.settle(
      polled.ok
        ? { status: "ready", instance: polled.handle, attempts: launched.attempts }
        : { status: "failed", failure: polled.failure, attempts: launched.attempts },
    );
  }

  /** Launch with retry but skip the readiness wait. */
  launch(request: LaunchRequest, retryConfig: RetryConfig, signal?: AbortSignal): Promise<LaunchAttemptResult> {
    return this.orchestrator.launch(request, retryConfig, signal);
  }

  /** Wait for an instance launched earlier, e.g. by `up --no-wait`. */
  async waitReady(instanceId: string, pollConfig: PollConfig, signal?: AbortSignal): Promise<LaunchOutcome> {
    const polled = await this.poller.waitReady({ id: instanceId, status: "unknown", ip: null }, pollConfig, signal);
    return this.settle(
      polled.ok
        ? { status: "ready", instance: polled.handle, attempts: 0 }
        : { status: "failed", failure: polled.failure, attempts: 0 },
    );
  }

  /** No retry: a failed terminate is reported to the caller as-is. */
  terminate(instanceIds: readonly string[]): Promise<InstanceHandle[]> {
    return this.provider.terminate(instanceIds);
  }

  private settle(outcome: LaunchOutcome): LaunchOutcome {
    if (outcome.status === "ready") {
      this.onEvent({ type: "ready", instance: outcome.instance, attempts: outcome.attempts });
    } else {
      this.onEvent({ type: "failed", failure: outcome.failure, attempts: outcome.attempts });
    }
    return outcome;
  }
}
