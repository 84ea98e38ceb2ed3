import { MockBrowserSession, type MockSessionConfig } from './mock';
import { PlaywrightSession } from './playwright';
import type { BrowserSession, SessionLaunchOptions, SessionType } from './types';

export type {
  BrowserSession,
  ElementState,
  FindOptions,
  PageElement,
  SelectMode,
  SessionLaunchOptions,
  SessionType,
} from './types';
export { PlaywrightSession, translatePlaywrightError } from './playwright';
export { MockBrowserSession } from './mock';
export type { MockAction, MockCall, MockElementConfig, MockSessionConfig } from './mock';

export interface CreateSessionOptions extends SessionLaunchOptions {
  type?: SessionType;
  mock?: MockSessionConfig;
}

/** Open a browser session of the requested type (default: playwright). */
export async function createSession(options: CreateSessionOptions = {}): Promise<BrowserSession> {
  const type = options.type ?? 'playwright';

  switch (type) {
    case 'playwright':
      return PlaywrightSession.launch(options);
    case 'mock':
      return new MockBrowserSession(options.mock);
    default: {
      const exhaustive: never = type;
      throw new Error(`Unknown session type: ${String(exhaustive)}`);
    }
  }
}
