/**
 * Article Fetcher
 *
 * Loads one article in its own page and returns the rendered HTML
 */

import { errors } from 'playwright';
import { createPage, navigateTo, closePage } from './browser.js';
import { withRetry } from '../utils/retry.js';
import type { RenderedDocument, RetryConfig } from '../types/index.js';

export interface ArticleFetcher {
  fetch(url: string): Promise<RenderedDocument>;
}

/**
 * Timeouts and network-level failures are worth another attempt;
 * anything else (bad URL, closed browser) fails the same way again.
 */
export function isTransientLoadError(error: Error): boolean {
  return error instanceof errors.TimeoutError || error.message.includes('net::ERR_');
}

export class BrowserArticleFetcher implements ArticleFetcher {
  constructor(private readonly retry: Partial<RetryConfig> = {}) {}

  async fetch(url: string): Promise<RenderedDocument> {
    return withRetry(
      async () => {
        const page = await createPage();
        try {
          await navigateTo(page, url, { waitUntil: 'domcontentloaded' });
          return { url: page.url(), html: await page.content() };
        } finally {
          await closePage(page);
        }
      },
      { ...this.retry, context: { url }, isRetryable: isTransientLoadError }
    );
  }
}
