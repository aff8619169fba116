export interface BackoffOptions {
  /** Total attempts, including the first */
  attempts: number;
  baseDelayMs: number;
  /** Upper bound of the random jitter added to each delay */
  jitterMs?: number;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run `fn`, retrying with exponential backoff (`base * 2^(attempt-1)` plus
 * jitter). The last error is rethrown once attempts run out.
 */
export async function withBackoff<T>(
  fn: () => Promise<T>,
  options: BackoffOptions,
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= options.attempts) throw error;
      const delayMs =
        options.baseDelayMs * 2 ** (attempt - 1) +
        Math.random() * (options.jitterMs ?? 0);
      options.onRetry?.(attempt, delayMs, error);
      await sleep(delayMs);
    }
  }
}
