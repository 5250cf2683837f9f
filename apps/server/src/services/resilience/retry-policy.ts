import { CancelledError, isTransientError } from '@server/core/errors';
import type { IConfig, RetryPolicy } from '@server/core/interfaces';

export function retryPolicyFromConfig(config: IConfig): RetryPolicy {
  return {
    maxAttempts: config.get<number>('resilience.retry.maxAttempts', 3),
    initialDelayMs: config.get<number>('resilience.retry.initialDelayMs', 1000),
    maxDelayMs: config.get<number>('resilience.retry.maxDelayMs', 30000),
    multiplier: config.get<number>('resilience.retry.multiplier', 2),
    jitter: config.get<number>('resilience.retry.jitter', 0.1),
  };
}

/**
 * Delay before retry number `attempt` (1 = first retry).
 */
export function computeRetryDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const base = Math.min(policy.initialDelayMs * Math.pow(policy.multiplier, attempt - 1), policy.maxDelayMs);
  const spread = base * policy.jitter * (2 * random() - 1);
  return Math.max(0, Math.round(base + spread));
}

export function shouldRetry(
  policy: RetryPolicy,
  attempt: number,
  error: unknown,
  hasEmittedOutput: boolean
): boolean {
  return attempt < policy.maxAttempts && !hasEmittedOutput && isTransientError(error);
}

/**
 * Resolves after `ms`, or rejects with CancelledError as soon as the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError());
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
