import { beforeEach, describe, expect, it, vi } from "vitest";
import { logger } from "../config/logger.js";
import { fanOut, type LaunchEvent, logLaunchEvent } from "./launch-events.js";

vi.mock("../config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

describe("logLaunchEvent", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("logs scheduled retries at info with the error kind", () => {
    logLaunchEvent({
      type: "retry_scheduled",
      retry: 2,
      maxRetries: 20,
      delayMs: 7_500,
      elapsedMs: 5_000,
      error: {
        kind: "capacity",
        code: "instance-operations/launch/insufficient-capacity",
        message: "Not enough capacity",
        suggestion: null,
        retryable: true,
      },
    });

    expect(logger.info).toHaveBeenCalledWith("Retrying launch in 7500ms", {
      retry: 2,
      maxRetries: 20,
      kind: "capacity",
      code: "instance-operations/launch/insufficient-capacity",
    });
  });

  it("logs poll ticks at debug", () => {
    logLaunchEvent({ type: "poll_tick", instanceId: "inst-1", status: "booting", ip: null, elapsedMs: 5_000 });

    expect(logger.debug).toHaveBeenCalledWith("Instance inst-1 is booting", { ip: null, elapsedMs: 5_000 });
  });

  it("logs failures at warn", () => {
    logLaunchEvent({
      type: "failed",
      attempts: 1,
      failure: { reason: "cancelled", phase: "launch", instanceId: null },
    });

    expect(logger.warn).toHaveBeenCalledWith("Launch failed: cancelled", { phase: "launch", attempts: 1 });
  });
});

describe("fanOut", () => {
  it("delivers each event to every sink in order", () => {
    const seen: string[] = [];
    const sink = fanOut(
      (event) => seen.push(`a:${event.type}`),
      (event) => seen.push(`b:${event.type}`),
    );
    const event: LaunchEvent = { type: "attempt_started", attempt: 1 };

    sink(event);

    expect(seen).toEqual(["a:attempt_started", "b:attempt_started"]);
  });
});
