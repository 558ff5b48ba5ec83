import type { RetryConfig } from "./types.js";

/**
 * Delay before retry number `attempt + 1`, where attempt 0 is the first launch call.
 *
 *   delay = min(initialDelayMs * multiplier^attempt, maxDelayMs)
 *
 * Non-decreasing in `attempt` and saturates at `maxDelayMs`.
 */
export function nextDelay(attempt: number, config: Pick<RetryConfig, "initialDelayMs" | "maxDelayMs" | "multiplier">): number {
  if (!Number.isInteger(attempt) || attempt < 0) {
    throw new RangeError(`attempt must be a non-negative integer (got ${attempt})`);
  }
  const grown = config.initialDelayMs * config.multiplier ** attempt;
  // multiplier^attempt overflows to Infinity long before attempt does
  return Math.min(grown, config.maxDelayMs);
}

/**
 * Stretch a delay by up to `jitterRatio` of itself, never past `maxDelayMs`.
 * Only ever lengthens, so the lower bound of nextDelay still holds.
 */
export function withJitter(
  delayMs: number,
  config: Pick<RetryConfig, "jitterRatio" | "maxDelayMs">,
  random: () => number = Math.random,
): number {
  if (config.jitterRatio <= 0) return delayMs;
  const stretched = delayMs + delayMs * config.jitterRatio * random();
  return Math.min(stretched, Math.max(delayMs, config.maxDelayMs));
}
