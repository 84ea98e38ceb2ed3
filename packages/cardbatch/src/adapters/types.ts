/**
 * Abstraction over the browser that drives the target site.
 *
 * The sequencer and its steps only see this interface. Only the Playwright
 * session imports from playwright directly.
 */
export interface BrowserSession {
  /** Which implementation is driving the page */
  readonly kind: SessionType;

  // -- Navigation --

  navigate(url: string, timeoutMs?: number): Promise<void>;

  currentUrl(): Promise<string>;

  /** Resolve once the current URL contains `fragment`; throws WaitTimeoutError otherwise. */
  waitForUrl(fragment: string, timeoutMs: number): Promise<void>;

  // -- Elements --

  /**
   * Wait for an element matching `selector`. Throws ElementNotFoundError on timeout.
   * With state "attached" the element need not be visible (hidden file inputs).
   */
  find(selector: string, options: FindOptions): Promise<PageElement>;

  click(element: PageElement): Promise<void>;

  /** Replace the element's current value with `text`. */
  type(element: PageElement, text: string): Promise<void>;

  /**
   * Choose an option. "native" drives a <select> by label or value; "custom"
   * opens the control and clicks the option whose visible text matches.
   */
  select(element: PageElement, value: string, mode: SelectMode): Promise<void>;

  upload(element: PageElement, filePaths: string[]): Promise<void>;

  /** A form field's current value, or the element's text content when it has none. */
  readText(element: PageElement): Promise<string>;

  // -- Lifecycle --

  close(): Promise<void>;
}

export type SessionType = 'playwright' | 'mock';

export type SelectMode = 'native' | 'custom';

export type ElementState = 'visible' | 'attached';

export interface FindOptions {
  timeoutMs: number;
  /** Default: "visible" */
  state?: ElementState;
}

/** Handle to a located element. Sessions re-resolve it by selector on every use. */
export interface PageElement {
  readonly selector: string;
}

export interface SessionLaunchOptions {
  headless?: boolean;
  viewport?: { width: number; height: number };
  args?: string[];
  /** Default timeout for navigations in ms */
  navigationTimeoutMs?: number;
  /** Timeout for clicks, fills and uploads on an element already found, in ms */
  actionTimeoutMs?: number;
}
