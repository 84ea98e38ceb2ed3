import { errors } from 'playwright';
import { describe, expect, test } from 'vitest';
import { createSession } from '../../../src/adapters';
import { MockBrowserSession } from '../../../src/adapters/mock';
import { readLocatorText, translatePlaywrightError, type ReadableLocator } from '../../../src/adapters/playwright';
import {
  ClickInterceptedError,
  ElementNotFoundError,
  StaleElementError,
  WaitTimeoutError,
} from '../../../src/errors';

describe('translatePlaywrightError', () => {
  test('detached elements become StaleElementError', () => {
    const err = translatePlaywrightError(new Error('Element is not attached to the DOM'), '#go', 100);

    expect(err).toBeInstanceOf(StaleElementError);
    expect(err.message).toBe('Element is not attached to the DOM');
  });

  test('covered elements become ClickInterceptedError', () => {
    const err = translatePlaywrightError(
      new Error('<div class="overlay"></div> intercepts pointer events'),
      '#go',
      100,
    );

    expect(err).toBeInstanceOf(ClickInterceptedError);
  });

  test('timeouts become ElementNotFoundError', () => {
    const err = translatePlaywrightError(new errors.TimeoutError('Timeout 100ms exceeded.'), '#go', 100);

    expect(err).toBeInstanceOf(ElementNotFoundError);
    expect(err.message).toBe('Timed out after 100ms waiting for element: #go');
  });

  test('other errors pass through', () => {
    const original = new Error('net::ERR_CONNECTION_REFUSED');

    expect(translatePlaywrightError(original, '#go', 100)).toBe(original);
    expect(translatePlaywrightError('boom', '#go', 100).message).toBe('boom');
  });
});

describe('readLocatorText', () => {
  function locator(value: string, text: string | null): ReadableLocator {
    return {
      inputValue: async () => value,
      textContent: async () => text,
    };
  }

  test('reads the live value of a form field', async () => {
    expect(await readLocatorText(locator(' B-42 ', 'stale markup'), true, 100)).toBe('B-42');
  });

  test('falls back to text when the field is empty or not a field', async () => {
    expect(await readLocatorText(locator('', ' B-43 '), true, 100)).toBe('B-43');
    expect(await readLocatorText(locator('B-44', ' Batch B-45 '), false, 100)).toBe('Batch B-45');
    expect(await readLocatorText(locator('', null), false, 100)).toBe('');
  });
});

describe('MockBrowserSession', () => {
  test('clicks move the URL and redirects apply on navigate', async () => {
    const session = new MockBrowserSession({
      elements: { '#next': { navigatesTo: 'https://cards.test/two' } },
      redirects: { 'https://cards.test/': 'https://cards.test/login' },
    });

    await session.navigate('https://cards.test/');
    expect(await session.currentUrl()).toBe('https://cards.test/login');

    await session.click(await session.find('#next', { timeoutMs: 10 }));
    expect(await session.currentUrl()).toBe('https://cards.test/two');
  });

  test('types into a field while reporting its kind', async () => {
    const session = new MockBrowserSession({ elements: { '#name': {} } });

    await session.type(await session.find('#name', { timeoutMs: 10 }), 'set-1');

    expect(session.kind).toBe('mock');
    expect(session.callsFor('type')).toEqual([{ action: 'type', selector: '#name', value: 'set-1' }]);
  });

  test('missing elements and URLs fail like a real session', async () => {
    const session = new MockBrowserSession({ startUrl: 'https://cards.test/a' });

    await expect(session.find('#nope', { timeoutMs: 10 })).rejects.toThrow(ElementNotFoundError);
    await expect(session.waitForUrl('/b', 10)).rejects.toThrow(WaitTimeoutError);
  });

  test('scheduled failures fire the requested number of times', async () => {
    const session = new MockBrowserSession({ elements: { '#go': {} } });
    session.failNext('click', '#go', 2, () => new StaleElementError('#go'));
    const el = await session.find('#go', { timeoutMs: 10 });

    await expect(session.click(el)).rejects.toThrow(StaleElementError);
    await expect(session.click(el)).rejects.toThrow(StaleElementError);
    await expect(session.click(el)).resolves.toBeUndefined();
    expect(session.callsFor('click')).toHaveLength(3);
  });
});

describe('createSession', () => {
  test('builds a mock session without launching a browser', async () => {
    const session = await createSession({ type: 'mock', mock: { startUrl: 'https://cards.test/x' } });

    expect(session.kind).toBe('mock');
    expect(await session.currentUrl()).toBe('https://cards.test/x');
  });
});
