export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

// Task retry delay: base × 2^count, capped. Pure, so the schedule is reproducible.
// count is the retry count after the failed attempt was recorded (1 for the first retry).
export function retryDelay(count: number, policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>): number {
  const delay = policy.baseDelayMs * Math.pow(2, Math.max(0, count));
  return Math.min(delay, policy.maxDelayMs);
}

// Reconnect backoff for infrastructure errors: 1s → 2s → 4s ... capped at maxInterval.
// attempt is 1-indexed; attempt=1 waits initialIntervalMs.
export function calculateBackOff(
  attempt: number,
  initialIntervalMs: number = 1000,
  backoffMultiplier: number = 2.0,
  maxInterval: number = 30000,
  random: () => number = Math.random,
): number {
  let delay = initialIntervalMs * Math.pow(backoffMultiplier, attempt - 1);
  delay = Math.min(delay, maxInterval);
  // ±10% jitter so restarted listeners don't reconnect in lockstep
  const jitter = delay * 0.1;
  const randomJitter = random() * jitter * 2 - jitter;
  return Math.floor(delay + randomJitter);
}
