import { describe, expect, test, vi } from 'vitest';
import {
  ClickInterceptedError,
  ElementNotFoundError,
  ExtractionError,
  StaleElementError,
  WaitTimeoutError,
} from '../../../src/errors';
import { elementRetryPolicy, isTransientElementError, withRetry } from '../../../src/engine/retry';

const policy = elementRetryPolicy(3, 0);

describe('isTransientElementError', () => {
  test('stale, intercepted and not-found elements are retryable', () => {
    expect(isTransientElementError(new StaleElementError('#a'))).toBe(true);
    expect(isTransientElementError(new ClickInterceptedError('#a'))).toBe(true);
    expect(isTransientElementError(new ElementNotFoundError('#a', 100))).toBe(true);
  });

  test('detached-element messages from other sources are retryable', () => {
    expect(isTransientElementError(new Error('Element is not attached to the DOM'))).toBe(true);
    expect(isTransientElementError(new Error('node is detached'))).toBe(true);
  });

  test('URL waits and extraction failures are not', () => {
    expect(isTransientElementError(new WaitTimeoutError('URL containing "/sides"', 100))).toBe(false);
    expect(isTransientElementError(new ExtractionError('https://cards.test/x', []))).toBe(false);
    expect(isTransientElementError('boom')).toBe(false);
  });
});

describe('withRetry', () => {
  test('returns the first successful result', async () => {
    const op = vi.fn(async (attempt: number) => `done on ${attempt}`);

    await expect(withRetry(op, policy)).resolves.toBe('done on 1');
    expect(op).toHaveBeenCalledTimes(1);
  });

  test('succeeds on attempt 2 after a stale element', async () => {
    const onRetry = vi.fn();
    const op = vi.fn(async (attempt: number) => {
      if (attempt === 1) throw new StaleElementError('#magic-scan');
      return 'clicked';
    });

    await expect(withRetry(op, policy, onRetry)).resolves.toBe('clicked');
    expect(op).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toMatchObject({ attempt: 1, maxAttempts: 3, delayMs: 0 });
  });

  test('rethrows the last error once attempts run out', async () => {
    const op = vi.fn(async (attempt: number): Promise<string> => {
      throw new StaleElementError('#magic-scan', `stale on ${attempt}`);
    });

    await expect(withRetry(op, policy)).rejects.toThrow('stale on 3');
    expect(op).toHaveBeenCalledTimes(3);
  });

  test('does not retry errors the policy rejects', async () => {
    const op = vi.fn(async (): Promise<string> => {
      throw new WaitTimeoutError('URL containing "/upload"', 100);
    });

    await expect(withRetry(op, policy)).rejects.toThrow(WaitTimeoutError);
    expect(op).toHaveBeenCalledTimes(1);
  });

  test('treats maxAttempts below 1 as a single attempt', async () => {
    const op = vi.fn(async (): Promise<string> => {
      throw new StaleElementError('#a');
    });

    await expect(withRetry(op, elementRetryPolicy(0, 0))).rejects.toThrow(StaleElementError);
    expect(op).toHaveBeenCalledTimes(1);
  });
});
