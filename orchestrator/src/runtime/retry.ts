import { RetryPolicy } from "../types/game";

export const defaultRetryPolicy: RetryPolicy = {
  retries: 0,
  delayMs: 2_000,
  backoff: "fixed",
  maxDelayMs: 60_000,
};

/** Delay before retry number `retry` (1-based). */
export function retryDelayMs(policy: RetryPolicy, retry: number): number {
  if (policy.backoff === "fixed") {
    return policy.delayMs;
  }
  const delay = policy.delayMs * 2 ** Math.max(0, retry - 1);
  return Math.min(delay, policy.maxDelayMs);
}
