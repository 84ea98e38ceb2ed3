import { ElementNotFoundError, WaitTimeoutError } from '../errors';
import type { BrowserSession, FindOptions, PageElement, SelectMode } from './types';

export type MockAction = 'navigate' | 'find' | 'click' | 'type' | 'select' | 'upload' | 'readText';

export interface MockCall {
  action: MockAction;
  selector?: string;
  value?: string | string[];
  mode?: SelectMode;
}

export interface MockElementConfig {
  /** Returned by readText() */
  text?: string;
  /** URL the page moves to when this element is clicked */
  navigatesTo?: string;
}

export interface MockSessionConfig {
  /** Elements present on every page, keyed by selector */
  elements?: Record<string, MockElementConfig>;
  /** URL the session starts on (default: about:blank) */
  startUrl?: string;
  /** Map of navigated URL -> URL actually landed on (redirects) */
  redirects?: Record<string, string>;
}

interface ScheduledFailure {
  action: MockAction;
  selector?: string;
  remaining: number;
  error: () => Error;
}

/**
 * In-process stand-in for a browser session, for unit tests.
 * Does NOT launch a browser: elements are a fixed map, clicks may move the
 * URL, and failures can be scheduled per action and selector.
 */
export class MockBrowserSession implements BrowserSession {
  readonly kind = 'mock' as const;
  readonly calls: MockCall[] = [];
  private elements: Map<string, MockElementConfig>;
  private redirects: Record<string, string>;
  private url: string;
  private failures: ScheduledFailure[] = [];
  private closed = false;

  constructor(config: MockSessionConfig = {}) {
    this.elements = new Map(Object.entries(config.elements ?? {}));
    this.redirects = config.redirects ?? {};
    this.url = config.startUrl ?? 'about:blank';
  }

  // -- Test controls --

  /** Make the next `times` matching calls throw the error built by `error`. */
  failNext(action: MockAction, selector: string | undefined, times: number, error: () => Error): this {
    this.failures.push({ action, selector, remaining: times, error });
    return this;
  }

  setElement(selector: string, config: MockElementConfig = {}): this {
    this.elements.set(selector, config);
    return this;
  }

  removeElement(selector: string): this {
    this.elements.delete(selector);
    return this;
  }

  setUrl(url: string): this {
    this.url = url;
    return this;
  }

  isClosed(): boolean {
    return this.closed;
  }

  callsFor(action: MockAction): MockCall[] {
    return this.calls.filter((call) => call.action === action);
  }

  // -- BrowserSession --

  async navigate(url: string): Promise<void> {
    this.record({ action: 'navigate', value: url });
    this.url = this.redirects[url] ?? url;
  }

  async currentUrl(): Promise<string> {
    return this.url;
  }

  async waitForUrl(fragment: string, timeoutMs: number): Promise<void> {
    if (!this.url.includes(fragment)) {
      throw new WaitTimeoutError(`URL containing "${fragment}"`, timeoutMs, this.url);
    }
  }

  async find(selector: string, options: FindOptions): Promise<PageElement> {
    this.record({ action: 'find', selector });
    if (!this.elements.has(selector)) {
      throw new ElementNotFoundError(selector, options.timeoutMs);
    }
    return { selector };
  }

  async click(element: PageElement): Promise<void> {
    this.record({ action: 'click', selector: element.selector });
    const target = this.elements.get(element.selector)?.navigatesTo;
    if (target) this.url = target;
  }

  async type(element: PageElement, text: string): Promise<void> {
    this.record({ action: 'type', selector: element.selector, value: text });
  }

  async select(element: PageElement, value: string, mode: SelectMode): Promise<void> {
    this.record({ action: 'select', selector: element.selector, value, mode });
  }

  async upload(element: PageElement, filePaths: string[]): Promise<void> {
    this.record({ action: 'upload', selector: element.selector, value: [...filePaths] });
  }

  async readText(element: PageElement): Promise<string> {
    this.record({ action: 'readText', selector: element.selector });
    return this.elements.get(element.selector)?.text ?? '';
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Log the call, then throw if a scheduled failure matches it. */
  private record(call: MockCall): void {
    this.calls.push(call);
    const failure = this.failures.find(
      (f) =>
        f.remaining > 0 &&
        f.action === call.action &&
        (f.selector === undefined || f.selector === call.selector),
    );
    if (failure) {
      failure.remaining--;
      throw failure.error();
    }
  }
}
