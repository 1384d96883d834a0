/**
 * Scraper Module
 *
 * Listing traversal and article page loading
 */

export {
  ListingHarvester,
  DEFAULT_SELECTORS,
  DEFAULT_TIMEOUTS,
  absorbLocations,
  recordRound,
  createHarvestState,
  type HarvesterOptions,
} from './harvester.js';

export { PlaywrightListingSession } from './listing-session.js';

export { BrowserArticleFetcher, type ArticleFetcher } from './article-fetcher.js';

// Browser utilities
export { initBrowser, closeBrowser, createPage, navigateTo, closePage } from './browser.js';

export type {
  ListingSession,
  ListingSelectors,
  HarvestTimeouts,
  HarvestState,
  HarvestReport,
  HarvestStopReason,
} from './types.js';
