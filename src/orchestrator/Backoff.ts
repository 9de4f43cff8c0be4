// Retry delay computation: capped exponential backoff with additive jitter

import type { RetryConfig } from "../types/index.js";

/**
 * Delay before re-enqueueing a task whose attempt number `attempt` failed.
 *
 * delay = min(maxDelayMs, baseDelayMs * 2^attempt + jitter), jitter in [0, baseDelayMs).
 * The jitter stays below one base step, so successive delays never decrease.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: Pick<RetryConfig, "baseDelayMs" | "maxDelayMs">,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt);
  const exponential = policy.baseDelayMs * 2 ** exponent;
  const jitter = Math.floor(Math.min(Math.max(random(), 0), 0.999999) * policy.baseDelayMs);
  return Math.min(policy.maxDelayMs, exponential + jitter);
}
