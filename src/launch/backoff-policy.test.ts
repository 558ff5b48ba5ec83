import { describe, expect, it } from "vitest";
import { nextDelay, withJitter } from "./backoff-policy.js";

const config = { initialDelayMs: 5_000, maxDelayMs: 20_000, multiplier: 1.5 };

describe("nextDelay", () => {
  it("starts at the initial delay", () => {
    expect(nextDelay(0, config)).toBe(5_000);
  });

  it("grows geometrically", () => {
    expect(nextDelay(1, config)).toBe(7_500);
    expect(nextDelay(2, config)).toBe(11_250);
    expect(nextDelay(3, config)).toBe(16_875);
  });

  it("saturates at the maximum", () => {
    expect(nextDelay(4, config)).toBe(20_000);
    expect(nextDelay(500, config)).toBe(20_000);
    expect(nextDelay(100_000, config)).toBe(20_000);
  });

  it("stays within bounds and never decreases", () => {
    let previous = 0;
    for (let attempt = 0; attempt < 50; attempt++) {
      const delay = nextDelay(attempt, config);
      expect(delay).toBeGreaterThanOrEqual(config.initialDelayMs);
      expect(delay).toBeLessThanOrEqual(config.maxDelayMs);
      expect(delay).toBeGreaterThanOrEqual(previous);
      previous = delay;
    }
  });

  it("is constant when the multiplier is 1", () => {
    const flat = { ...config, multiplier: 1 };
    expect(nextDelay(0, flat)).toBe(5_000);
    expect(nextDelay(7, flat)).toBe(5_000);
  });

  it("rejects negative or fractional attempts", () => {
    expect(() => nextDelay(-1, config)).toThrow(RangeError);
    expect(() => nextDelay(1.5, config)).toThrow("attempt must be a non-negative integer");
  });
});

describe("withJitter", () => {
  it("returns the delay unchanged when jitter is disabled", () => {
    expect(withJitter(5_000, { jitterRatio: 0, maxDelayMs: 20_000 }, () => 0.9)).toBe(5_000);
  });

  it("stretches by a random fraction of the ratio", () => {
    expect(withJitter(5_000, { jitterRatio: 0.5, maxDelayMs: 20_000 }, () => 0.5)).toBe(6_250);
  });

  it("never exceeds the maximum delay", () => {
    expect(withJitter(18_000, { jitterRatio: 1, maxDelayMs: 20_000 }, () => 0.99)).toBe(20_000);
  });

  it("never shortens a delay", () => {
    expect(withJitter(5_000, { jitterRatio: 0.3, maxDelayMs: 20_000 }, () => 0)).toBe(5_000);
  });
});
