import {
  ClickInterceptedError,
  ElementNotFoundError,
  StaleElementError,
  toErrorMessage,
} from '../errors';

export interface RetryPolicy {
  /** Total attempts including the first. */
  maxAttempts: number;
  /** Pause between attempts in ms. */
  delayMs: number;
  isRetryable: (err: unknown) => boolean;
}

export interface RetryInfo {
  attempt: number;
  maxAttempts: number;
  error: unknown;
  delayMs: number;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Errors caused by page dynamics rather than a wrong selector: the element
 * was re-rendered, covered, or not there yet.
 */
export function isTransientElementError(err: unknown): boolean {
  if (
    err instanceof StaleElementError ||
    err instanceof ClickInterceptedError ||
    err instanceof ElementNotFoundError
  ) {
    return true;
  }
  const message = toErrorMessage(err);
  return (
    message.includes('stale') ||
    message.includes('detached') ||
    message.includes('Element is not attached')
  );
}

export function elementRetryPolicy(maxAttempts: number, delayMs: number): RetryPolicy {
  return { maxAttempts, delayMs, isRetryable: isTransientElementError };
}

/**
 * Run `operation` until it succeeds, the error is not retryable, or the
 * attempts run out. The last error is rethrown as is.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  onRetry?: (info: RetryInfo) => void,
): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || !policy.isRetryable(err)) {
        throw err;
      }
      onRetry?.({ attempt, maxAttempts, error: err, delayMs: policy.delayMs });
      if (policy.delayMs > 0) {
        await sleep(policy.delayMs);
      }
    }
  }
}
