import { chromium, errors, type Browser, type Locator, type Page } from 'playwright';
import {
  ClickInterceptedError,
  ElementNotFoundError,
  StaleElementError,
  WaitTimeoutError,
  toErrorMessage,
} from '../errors';
import type {
  BrowserSession,
  FindOptions,
  PageElement,
  SelectMode,
  SessionLaunchOptions,
} from './types';

const DEFAULT_VIEWPORT = { width: 1920, height: 1080 };
const DEFAULT_ARGS = ['--disable-blink-features=AutomationControlled', '--disable-dev-shm-usage'];

/** Time allowed for a custom dropdown's option list to render after opening it. */
const OPTION_LIST_TIMEOUT_MS = 5_000;

const FORM_FIELDS = 'input, textarea, select';

/**
 * Map Playwright failures onto the error taxonomy the retry policy reads.
 * Playwright reports detached and covered elements inside its error text.
 */
export function translatePlaywrightError(err: unknown, selector: string, timeoutMs: number): Error {
  const message = toErrorMessage(err);

  if (/not attached to the DOM|element is detached|stale/i.test(message)) {
    return new StaleElementError(selector, message);
  }
  if (/intercepts pointer events/i.test(message)) {
    return new ClickInterceptedError(selector, message);
  }
  if (err instanceof errors.TimeoutError) {
    return new ElementNotFoundError(selector, timeoutMs);
  }
  return err instanceof Error ? err : new Error(message);
}

/** The part of a Locator that readText needs. */
export interface ReadableLocator {
  inputValue(options?: { timeout?: number }): Promise<string>;
  textContent(options?: { timeout?: number }): Promise<string | null>;
}

/**
 * Live value of a form field, else the element's text. `isField` says whether
 * the element is an input, textarea or select.
 */
export async function readLocatorText(locator: ReadableLocator, isField: boolean, timeoutMs: number): Promise<string> {
  if (isField) {
    const value = (await locator.inputValue({ timeout: timeoutMs })).trim();
    if (value) return value;
  }
  const text = await locator.textContent({ timeout: timeoutMs });
  return (text ?? '').trim();
}

export class PlaywrightSession implements BrowserSession {
  readonly kind = 'playwright' as const;

  private constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    private readonly navigationTimeoutMs: number,
    private readonly actionTimeoutMs: number,
  ) {}

  static async launch(options: SessionLaunchOptions = {}): Promise<PlaywrightSession> {
    const browser = await chromium.launch({
      headless: options.headless ?? false,
      args: options.args ?? DEFAULT_ARGS,
      timeout: 30_000,
    });
    const context = await browser.newContext({ viewport: options.viewport ?? DEFAULT_VIEWPORT });
    const page = await context.newPage();
    const navigationTimeoutMs = options.navigationTimeoutMs ?? 30_000;
    page.setDefaultNavigationTimeout(navigationTimeoutMs);
    return new PlaywrightSession(browser, page, navigationTimeoutMs, options.actionTimeoutMs ?? 15_000);
  }

  async navigate(url: string, timeoutMs?: number): Promise<void> {
    const timeout = timeoutMs ?? this.navigationTimeoutMs;
    try {
      await this.page.goto(url, { timeout, waitUntil: 'domcontentloaded' });
    } catch (err) {
      if (err instanceof errors.TimeoutError) {
        throw new WaitTimeoutError(`page load of ${url}`, timeout, this.page.url());
      }
      throw err;
    }
  }

  async currentUrl(): Promise<string> {
    return this.page.url();
  }

  async waitForUrl(fragment: string, timeoutMs: number): Promise<void> {
    try {
      await this.page.waitForURL((url) => url.href.includes(fragment), { timeout: timeoutMs });
    } catch (err) {
      if (err instanceof errors.TimeoutError) {
        throw new WaitTimeoutError(`URL containing "${fragment}"`, timeoutMs, this.page.url());
      }
      throw err;
    }
  }

  async find(selector: string, options: FindOptions): Promise<PageElement> {
    const locator = this.page.locator(selector).first();
    try {
      await locator.waitFor({ state: options.state ?? 'visible', timeout: options.timeoutMs });
    } catch (err) {
      throw translatePlaywrightError(err, selector, options.timeoutMs);
    }
    return { selector };
  }

  async click(element: PageElement): Promise<void> {
    await this.run(element, async (locator) => {
      await locator.scrollIntoViewIfNeeded({ timeout: this.actionTimeoutMs });
      await locator.click({ timeout: this.actionTimeoutMs });
    });
  }

  async type(element: PageElement, text: string): Promise<void> {
    await this.run(element, (locator) => locator.fill(text, { timeout: this.actionTimeoutMs }));
  }

  async select(element: PageElement, value: string, mode: SelectMode): Promise<void> {
    if (mode === 'native') {
      // String values match either an option's value or its label
      await this.run(element, async (locator) => {
        await locator.selectOption(value, { timeout: this.actionTimeoutMs });
      });
      return;
    }

    await this.click(element);
    const option = this.page
      .getByRole('option', { name: value, exact: true })
      .or(this.page.getByText(value, { exact: true }))
      .first();
    try {
      await option.waitFor({ state: 'visible', timeout: OPTION_LIST_TIMEOUT_MS });
      await option.click({ timeout: this.actionTimeoutMs });
    } catch (err) {
      throw translatePlaywrightError(err, `${element.selector} >> option "${value}"`, OPTION_LIST_TIMEOUT_MS);
    }
  }

  async upload(element: PageElement, filePaths: string[]): Promise<void> {
    await this.run(element, (locator) => locator.setInputFiles(filePaths, { timeout: this.actionTimeoutMs }));
  }

  async readText(element: PageElement): Promise<string> {
    return this.run(element, async (locator) => {
      const isField = (await locator.and(this.page.locator(FORM_FIELDS)).count()) > 0;
      return readLocatorText(locator, isField, this.actionTimeoutMs);
    });
  }

  async close(): Promise<void> {
    await this.browser.close();
  }

  private async run<T>(element: PageElement, action: (locator: Locator) => Promise<T>): Promise<T> {
    const locator = this.page.locator(element.selector).first();
    try {
      return await action(locator);
    } catch (err) {
      throw translatePlaywrightError(err, element.selector, this.actionTimeoutMs);
    }
  }
}
