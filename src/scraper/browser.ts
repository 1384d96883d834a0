/**
 * Playwright Browser Factory
 *
 * Manages browser lifecycle for listing traversal and article fetching
 */

import { chromium } from 'playwright';
import type { Browser, BrowserContext, Page } from 'playwright';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';

let browser: Browser | null = null;
let context: BrowserContext | null = null;

/**
 * Initialize browser instance
 */
export async function initBrowser(): Promise<Browser> {
  if (browser) {
    logger.debug('Browser already initialized');
    return browser;
  }

  const { headless, userAgent, timeout } = config.scraper;

  logger.info({ headless }, 'Launching browser');

  browser = await chromium.launch({
    headless,
    // Required for Docker/containerized environments
    args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage', '--disable-gpu'],
  });

  context = await browser.newContext({
    userAgent,
    viewport: { width: 1920, height: 1080 },
    locale: 'ru-RU',
    timezoneId: 'Europe/Moscow',
    javaScriptEnabled: true,
    extraHTTPHeaders: {
      'Accept-Language': 'ru-RU,ru;q=0.9,en-US;q=0.8,en;q=0.7',
      Accept:
        'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
    },
  });

  context.setDefaultTimeout(timeout);
  context.setDefaultNavigationTimeout(timeout);

  logger.info('Browser initialized successfully');
  return browser;
}

/**
 * Get or create a new page
 */
export async function createPage(): Promise<Page> {
  if (!context) {
    await initBrowser();
  }

  if (!context) {
    throw new Error('Failed to initialize browser context');
  }

  const page = await context.newPage();

  // Images are fetched separately, media and fonts are never needed
  await page.route('**/*', (route) => {
    const resourceType = route.request().resourceType();
    const blockedTypes = ['media', 'font', 'image'];

    if (blockedTypes.includes(resourceType)) {
      return route.abort();
    }
    return route.continue();
  });

  return page;
}

/**
 * Navigate to URL
 */
export async function navigateTo(
  page: Page,
  url: string,
  options: { waitUntil?: 'load' | 'domcontentloaded' | 'networkidle' } = {}
): Promise<void> {
  const waitUntil = options.waitUntil ?? 'domcontentloaded';

  logger.debug({ url, waitUntil }, 'Navigating to URL');

  try {
    await page.goto(url, { waitUntil });
    logger.debug({ url }, 'Navigation successful');
  } catch (error) {
    logger.debug({ url, error }, 'Navigation failed');
    throw error;
  }
}

/**
 * Close a page
 */
export async function closePage(page: Page): Promise<void> {
  try {
    await page.close();
  } catch (error) {
    logger.warn({ error }, 'Error closing page');
  }
}

/**
 * Close browser and cleanup
 */
export async function closeBrowser(): Promise<void> {
  if (context) {
    try {
      await context.close();
    } catch (error) {
      logger.warn({ error }, 'Error closing context');
    }
    context = null;
  }

  if (browser) {
    try {
      await browser.close();
      logger.info('Browser closed');
    } catch (error) {
      logger.warn({ error }, 'Error closing browser');
    }
    browser = null;
  }
}

export type { Browser, BrowserContext, Page };
