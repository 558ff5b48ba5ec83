import { beforeEach, describe, expect, it, vi } from "vitest";
import { FakeClock } from "../test/fake-clock.js";
import { createClassifier } from "./error-classifier.js";
import type { InstanceProvider } from "./instance-provider.js";
import type { LaunchEvent } from "./launch-events.js";
import {
  InvalidLaunchTransitionError,
  isValidLaunchTransition,
  LAUNCH_STATES,
  LAUNCH_TRANSITIONS,
  LaunchOrchestrator,
} from "./launch-orchestrator.js";
import { createLaunchRequest } from "./launch-request.js";
import type { InstanceHandle, RetryConfig } from "./types.js";

vi.mock("../config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const CAPACITY = {
  code: "instance-operations/launch/insufficient-capacity",
  message: "Not enough capacity to fulfill launch request.",
  status: 400,
};
const QUOTA = { code: "global/quota-exceeded", message: "Quota exceeded", status: 400 };
const AUTH = { code: "global/invalid-api-key", message: "API key was invalid, expired, or deleted.", status: 401 };

const BOOTING: InstanceHandle = { id: "inst-0a1b2c", status: "booting", ip: null };

const request = createLaunchRequest({ region: "us-east-1", instanceType: "gpu_1x_a10", sshKeyName: "laptop" });

const retryConfig: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 5_000,
  maxDelayMs: 20_000,
  multiplier: 1.5,
  jitterRatio: 0,
};

function makeProvider() {
  return { launch: vi.fn<InstanceProvider["launch"]>() };
}

describe("launch transitions", () => {
  it("lists a transition entry for every state", () => {
    for (const state of LAUNCH_STATES) {
      expect(LAUNCH_TRANSITIONS[state]).toBeDefined();
    }
  });

  it("allows backoff only between attempts", () => {
    expect(isValidLaunchTransition("attempting", "backoff")).toBe(true);
    expect(isValidLaunchTransition("backoff", "attempting")).toBe(true);
    expect(isValidLaunchTransition("idle", "backoff")).toBe(false);
  });

  it("treats outcomes as terminal", () => {
    expect(isValidLaunchTransition("succeeded", "attempting")).toBe(false);
    expect(isValidLaunchTransition("retries_exhausted", "attempting")).toBe(false);
  });

  it("names both ends in the transition error", () => {
    expect(new InvalidLaunchTransitionError("succeeded", "backoff").message).toBe(
      "Invalid launch transition: succeeded → backoff",
    );
  });
});

describe("LaunchOrchestrator", () => {
  let provider: ReturnType<typeof makeProvider>;
  let clock: FakeClock;

  beforeEach(() => {
    provider = makeProvider();
    clock = new FakeClock();
  });

  it("returns the handle from a first-try success without sleeping", async () => {
    provider.launch.mockResolvedValue(BOOTING);
    const orchestrator = new LaunchOrchestrator(provider, { clock });

    const result = await orchestrator.launch(request, retryConfig);

    expect(result).toEqual({ ok: true, handle: BOOTING, attempts: 1 });
    expect(provider.launch).toHaveBeenCalledOnce();
    expect(provider.launch).toHaveBeenCalledWith(request, undefined);
    expect(clock.sleeps).toEqual([]);
  });

  it("backs off 5s, 7.5s and 11.25s before succeeding on the fourth call", async () => {
    provider.launch
      .mockRejectedValueOnce(CAPACITY)
      .mockRejectedValueOnce(CAPACITY)
      .mockRejectedValueOnce(CAPACITY)
      .mockResolvedValueOnce(BOOTING);
    const orchestrator = new LaunchOrchestrator(provider, { clock });

    const result = await orchestrator.launch(request, retryConfig);

    expect(result).toEqual({ ok: true, handle: BOOTING, attempts: 4 });
    expect(clock.sleeps).toEqual([5_000, 7_500, 11_250]);
    expect(provider.launch).toHaveBeenCalledTimes(4);
  });

  it("gives up after maxAttempts retries without an extra call", async () => {
    provider.launch.mockRejectedValue(CAPACITY);
    const orchestrator = new LaunchOrchestrator(provider, { clock });

    const result = await orchestrator.launch(request, retryConfig);

    expect(provider.launch).toHaveBeenCalledTimes(4);
    expect(clock.sleeps).toEqual([5_000, 7_500, 11_250]);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.attempts).toBe(4);
    expect(result.failure).toEqual({
      reason: "retries_exhausted",
      phase: "launch",
      attempts: 4,
      error: {
        kind: "capacity",
        code: CAPACITY.code,
        message: CAPACITY.message,
        suggestion: null,
        retryable: true,
      },
    });
  });

  it("fails on the first capacity error when maxAttempts is 0", async () => {
    provider.launch.mockRejectedValue(CAPACITY);
    const orchestrator = new LaunchOrchestrator(provider, { clock });

    const result = await orchestrator.launch(request, { ...retryConfig, maxAttempts: 0 });

    expect(provider.launch).toHaveBeenCalledOnce();
    expect(clock.sleeps).toEqual([]);
    expect(result.ok || result.failure.reason).toBe("retries_exhausted");
  });

  it("stops at once on a quota error", async () => {
    provider.launch.mockRejectedValue(QUOTA);
    const orchestrator = new LaunchOrchestrator(provider, { clock });

    const result = await orchestrator.launch(request, { ...retryConfig, maxAttempts: 50 });

    expect(provider.launch).toHaveBeenCalledOnce();
    expect(clock.sleeps).toEqual([]);
    expect(result).toEqual({
      ok: false,
      attempts: 1,
      failure: {
        reason: "fatal_error",
        phase: "launch",
        instanceId: null,
        error: { kind: "quota", code: QUOTA.code, message: QUOTA.message, suggestion: null, retryable: false },
      },
    });
  });

  it("never retries an auth error, even after capacity retries", async () => {
    provider.launch.mockRejectedValueOnce(CAPACITY).mockRejectedValueOnce(AUTH);
    const orchestrator = new LaunchOrchestrator(provider, { clock });

    const result = await orchestrator.launch(request, retryConfig);

    expect(provider.launch).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([5_000]);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.reason).toBe("fatal_error");
    expect(result.attempts).toBe(2);
  });

  it("treats a transport failure as a fatal unknown error", async () => {
    provider.launch.mockRejectedValue(new Error("socket hang up"));
    const orchestrator = new LaunchOrchestrator(provider, { clock });

    const result = await orchestrator.launch(request, retryConfig);

    expect(result.ok).toBe(false);
    if (result.ok || result.failure.reason !== "fatal_error") throw new Error("expected fatal_error");
    expect(result.failure.error.kind).toBe("unknown");
    expect(result.failure.error.code).toBe("global/unknown");
    expect(result.failure.error.message).toBe("socket hang up");
  });

  it("retries unknown errors when the classifier policy says so", async () => {
    provider.launch.mockRejectedValueOnce(new Error("socket hang up")).mockResolvedValueOnce(BOOTING);
    const orchestrator = new LaunchOrchestrator(provider, {
      clock,
      classify: createClassifier({ retryable: { unknown: true } }),
    });

    const result = await orchestrator.launch(request, retryConfig);

    expect(result).toEqual({ ok: true, handle: BOOTING, attempts: 2 });
  });

  it("applies jitter when configured", async () => {
    provider.launch.mockRejectedValueOnce(CAPACITY).mockResolvedValueOnce(BOOTING);
    const orchestrator = new LaunchOrchestrator(provider, { clock, random: () => 0.5 });

    await orchestrator.launch(request, { ...retryConfig, jitterRatio: 0.5 });

    expect(clock.sleeps).toEqual([6_250]);
  });

  it("reports progress through events", async () => {
    provider.launch.mockRejectedValueOnce(CAPACITY).mockResolvedValueOnce(BOOTING);
    const events: LaunchEvent[] = [];
    const orchestrator = new LaunchOrchestrator(provider, { clock, onEvent: (event) => events.push(event) });

    await orchestrator.launch(request, retryConfig);

    expect(events).toEqual([
      { type: "attempt_started", attempt: 1 },
      {
        type: "retry_scheduled",
        retry: 1,
        maxRetries: 3,
        delayMs: 5_000,
        elapsedMs: 0,
        error: {
          kind: "capacity",
          code: CAPACITY.code,
          message: CAPACITY.message,
          suggestion: null,
          retryable: true,
        },
      },
      { type: "attempt_started", attempt: 2 },
      { type: "launched", instanceId: BOOTING.id, attempts: 2 },
    ]);
  });

  it("reports elapsed time on later retries", async () => {
    provider.launch.mockRejectedValueOnce(CAPACITY).mockRejectedValueOnce(CAPACITY).mockResolvedValueOnce(BOOTING);
    const events: LaunchEvent[] = [];
    const orchestrator = new LaunchOrchestrator(provider, { clock, onEvent: (event) => events.push(event) });

    await orchestrator.launch(request, retryConfig);

    const elapsed = events.flatMap((event) => (event.type === "retry_scheduled" ? [event.elapsedMs] : []));
    expect(elapsed).toEqual([0, 5_000]);
  });

  describe("cancellation", () => {
    it("makes no call when the signal is already aborted", async () => {
      const controller = new AbortController();
      controller.abort();
      const orchestrator = new LaunchOrchestrator(provider, { clock });

      const result = await orchestrator.launch(request, retryConfig, controller.signal);

      expect(provider.launch).not.toHaveBeenCalled();
      expect(result).toEqual({
        ok: false,
        attempts: 0,
        failure: { reason: "cancelled", phase: "launch", instanceId: null },
      });
    });

    it("stops during backoff", async () => {
      provider.launch.mockRejectedValue(CAPACITY);
      const controller = new AbortController();
      clock.onSleep = () => controller.abort();
      const orchestrator = new LaunchOrchestrator(provider, { clock });

      const result = await orchestrator.launch(request, retryConfig, controller.signal);

      expect(provider.launch).toHaveBeenCalledOnce();
      expect(result).toEqual({
        ok: false,
        attempts: 1,
        failure: { reason: "cancelled", phase: "launch", instanceId: null },
      });
    });

    it("reports cancellation rather than the error of an aborted call", async () => {
      const controller = new AbortController();
      provider.launch.mockImplementation(async () => {
        controller.abort();
        throw new Error("This operation was aborted");
      });
      const orchestrator = new LaunchOrchestrator(provider, { clock });

      const result = await orchestrator.launch(request, retryConfig, controller.signal);

      expect(result.ok || result.failure.reason).toBe("cancelled");
      expect(result.attempts).toBe(1);
    });

    it("passes the signal to the provider", async () => {
      provider.launch.mockResolvedValue(BOOTING);
      const controller = new AbortController();
      const orchestrator = new LaunchOrchestrator(provider, { clock });

      await orchestrator.launch(request, retryConfig, controller.signal);

      expect(provider.launch).toHaveBeenCalledWith(request, controller.signal);
    });
  });

  it("keeps concurrent launches independent", async () => {
    const other = createLaunchRequest({ region: "us-west-1", instanceType: "gpu_1x_a10", sshKeyName: "laptop" });
    provider.launch.mockImplementation(async (req) => {
      if (req.region === "us-east-1") throw QUOTA;
      return BOOTING;
    });
    const orchestrator = new LaunchOrchestrator(provider, { clock });

    const [east, west] = await Promise.all([
      orchestrator.launch(request, retryConfig),
      orchestrator.launch(other, retryConfig),
    ]);

    expect(east.ok).toBe(false);
    expect(west).toEqual({ ok: true, handle: BOOTING, attempts: 1 });
  });
});
