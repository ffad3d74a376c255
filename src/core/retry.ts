export interface RetryPolicy {
  maxAttempts: number;
  /** Delay after the given failed attempt (1-based), before the next one. */
  delayMs(attempt: number): number;
}

export interface RetryHooks {
  onAttemptFailed?(error: unknown, attempt: number, willRetry: boolean): void;
  sleep?(ms: number): Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** `stepMs × attempt` between attempts: 2 s, 4 s, ... for the default step. */
export function linearBackoff(maxAttempts: number, stepMs: number): RetryPolicy {
  return {
    maxAttempts: Math.max(1, maxAttempts),
    delayMs: (attempt) => stepMs * attempt,
  };
}

export async function withRetry<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  hooks: RetryHooks = {},
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      const willRetry = attempt < maxAttempts;
      hooks.onAttemptFailed?.(error, attempt, willRetry);
      if (!willRetry) {
        throw error;
      }
      await wait(policy.delayMs(attempt));
    }
  }
}
