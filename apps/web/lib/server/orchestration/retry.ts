export interface RetryPolicy {
  maxAttempts: number;
  backoffBaseMs: number;
  maxBackoffMs?: number;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const delay = policy.backoffBaseMs * 2 ** (attempt - 1);
  return policy.maxBackoffMs === undefined ? delay : Math.min(delay, policy.maxBackoffMs);
}

export interface RetryHooks {
  isRetryable(error: unknown): boolean;
  onRetry?(error: unknown, attempt: number, delayMs: number): void;
  sleep?: Sleep;
  signal?: AbortSignal;
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks
): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const wait = hooks.sleep ?? sleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !hooks.isRetryable(error) || hooks.signal?.aborted) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, policy);
      hooks.onRetry?.(error, attempt, delayMs);
      await wait(delayMs, hooks.signal);
    }
  }
}
