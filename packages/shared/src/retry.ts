export type RetryPolicy = {
  /** Total attempts, first call included. Values below 1 are treated as 1. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
  isRetryable: (err: unknown) => boolean;
};

export type RetryEvent = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
};

export type RetryHooks = {
  onRetry?: (event: RetryEvent) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

export function sleep(ms: number) {
  return new Promise<void>((r) => setTimeout(r, ms));
}

/** Exponential backoff: base * 2^(attempt-1) plus jitter, capped at maxDelayMs. */
export function backoffDelay(
  policy: Pick<RetryPolicy, "baseDelayMs" | "maxDelayMs" | "jitterMs">,
  attempt: number,
  random: () => number = Math.random,
): number {
  const exp = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  const jitter = Math.floor(random() * policy.jitterMs);
  return Math.min(exp + jitter, policy.maxDelayMs);
}

export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  const wait = hooks.sleep ?? sleep;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || !policy.isRetryable(err)) throw err;
      const delayMs = backoffDelay(policy, attempt, hooks.random);
      hooks.onRetry?.({ attempt, maxAttempts, delayMs, error: err });
      await wait(delayMs);
    }
  }
}
