import { beforeEach, describe, expect, it, vi } from 'vitest';
import { errors } from 'playwright';
import type { Page } from 'playwright';
import { BrowserArticleFetcher, isTransientLoadError } from '../article-fetcher.js';
import { closePage, createPage, navigateTo } from '../browser.js';

vi.mock('../browser.js', () => ({
  createPage: vi.fn(),
  navigateTo: vi.fn(),
  closePage: vi.fn(),
}));

const ARTICLE_URL = 'https://www.kp.ru/online/news/1/';

function fakePage(): Page {
  // Only url() and content() are read by the fetcher
  return {
    url: () => ARTICLE_URL,
    content: async () => '<html><body>ok</body></html>',
  } as unknown as Page;
}

describe('BrowserArticleFetcher', () => {
  beforeEach(() => {
    vi.resetAllMocks();
    vi.mocked(createPage).mockImplementation(async () => fakePage());
    vi.mocked(closePage).mockResolvedValue(undefined);
  });

  it('retries a timed out navigation in a fresh page', async () => {
    vi.mocked(navigateTo)
      .mockRejectedValueOnce(new errors.TimeoutError('Timeout 60000ms exceeded'))
      .mockResolvedValueOnce(undefined);

    const document = await new BrowserArticleFetcher({ maxAttempts: 2, initialDelayMs: 0 }).fetch(ARTICLE_URL);

    expect(document).toEqual({ url: ARTICLE_URL, html: '<html><body>ok</body></html>' });
    expect(createPage).toHaveBeenCalledTimes(2);
    expect(closePage).toHaveBeenCalledTimes(2);
  });

  it('does not retry errors that would repeat', async () => {
    vi.mocked(navigateTo).mockRejectedValue(
      new Error('Protocol error (Page.navigate): Cannot navigate to invalid URL')
    );

    await expect(
      new BrowserArticleFetcher({ maxAttempts: 2, initialDelayMs: 0 }).fetch(ARTICLE_URL)
    ).rejects.toThrow('Cannot navigate to invalid URL');
    expect(createPage).toHaveBeenCalledTimes(1);
    expect(closePage).toHaveBeenCalledTimes(1);
  });
});

describe('isTransientLoadError', () => {
  it('accepts timeouts and network errors only', () => {
    expect(isTransientLoadError(new errors.TimeoutError('Timeout 60000ms exceeded'))).toBe(true);
    expect(isTransientLoadError(new Error('net::ERR_CONNECTION_RESET at https://www.kp.ru/'))).toBe(true);
    expect(isTransientLoadError(new Error('Target page, context or browser has been closed'))).toBe(false);
  });
});
