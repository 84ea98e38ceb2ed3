import type { BrowserSession } from '../adapters/types';
import { ExtractionError } from '../errors';
import type { Logger } from '../monitoring/logger';

export interface BatchIdResult {
  batchId: string;
  /** 'url' or the selector the id was read from */
  source: string;
}

/** First capture group of `pattern` applied to `url`, or null. */
export function batchIdFromUrl(url: string, pattern: string): string | null {
  const match = new RegExp(pattern).exec(url);
  const captured = match?.[1]?.trim();
  return captured ? captured : null;
}

/**
 * Read the id of the batch just created. The URL is tried first; each
 * fallback selector is then read in order and the first non-empty value wins.
 */
export async function extractBatchId(
  session: BrowserSession,
  options: { urlPattern: string; fallbackSelectors: string[]; timeoutMs: number; logger?: Logger },
): Promise<BatchIdResult> {
  const url = await session.currentUrl();
  const fromUrl = batchIdFromUrl(url, options.urlPattern);
  if (fromUrl) {
    return { batchId: fromUrl, source: 'url' };
  }

  options.logger?.debug('Batch id not in URL, trying fallback selectors', { url });

  for (const selector of options.fallbackSelectors) {
    try {
      const element = await session.find(selector, { timeoutMs: options.timeoutMs, state: 'attached' });
      const text = (await session.readText(element)).trim();
      if (text) {
        return { batchId: text, source: selector };
      }
    } catch (err) {
      options.logger?.debug('Batch id fallback selector missed', {
        selector,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  throw new ExtractionError(url, options.fallbackSelectors);
}
