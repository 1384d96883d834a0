/**
 * Playwright page exposed as a ListingSession
 */

import type { Page } from 'playwright';
import type { ListingSession } from './types.js';

export class PlaywrightListingSession implements ListingSession {
  constructor(private readonly page: Page) {}

  async hrefs(selector: string): Promise<string[]> {
    return this.page.$$eval(selector, (elements) =>
      elements.map((element) => (element instanceof HTMLAnchorElement ? element.href : ''))
    );
  }

  async count(selector: string): Promise<number> {
    return this.page.locator(selector).count();
  }

  async click(selector: string, options: { timeout: number; force: boolean }): Promise<void> {
    await this.page.locator(selector).first().click(options);
  }

  async scrollIntoView(selector: string, options: { timeout: number }): Promise<void> {
    await this.page.locator(selector).first().scrollIntoViewIfNeeded(options);
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
  }

  async pressKey(key: string): Promise<void> {
    await this.page.keyboard.press(key);
  }

  async waitForSelector(selector: string, options: { timeout: number }): Promise<void> {
    await this.page.waitForSelector(selector, options);
  }

  async waitForCountChange(
    selector: string,
    previous: number,
    options: { timeout: number }
  ): Promise<void> {
    await this.page.waitForFunction(
      ({ selector: linkSelector, previous: previousCount }) =>
        document.querySelectorAll(linkSelector).length !== previousCount,
      { selector, previous },
      options
    );
  }

  async waitForTimeout(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}
