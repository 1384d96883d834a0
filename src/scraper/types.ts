/**
 * Scraper Types
 */

import type { ArticleLocation } from '../types/index.js';

/**
 * Live, rendered listing page driven by the harvester.
 * Every selector-based action targets the first matching element.
 */
export interface ListingSession {
  /** Absolute `href` of every element matching the selector, in DOM order */
  hrefs(selector: string): Promise<string[]>;
  count(selector: string): Promise<number>;
  click(selector: string, options: { timeout: number; force: boolean }): Promise<void>;
  scrollIntoView(selector: string, options: { timeout: number }): Promise<void>;
  scrollToBottom(): Promise<void>;
  pressKey(key: string): Promise<void>;
  waitForSelector(selector: string, options: { timeout: number }): Promise<void>;
  /** Resolves once the number of matches differs from `previous`; rejects on timeout */
  waitForCountChange(selector: string, previous: number, options: { timeout: number }): Promise<void>;
  waitForTimeout(ms: number): Promise<void>;
  close(): Promise<void>;
}

export interface ListingSelectors {
  /** Article links on the listing page */
  articleLinks: string;
  /** The "show more" control */
  revealControl: string;
  /** Consent banners and popups that can swallow clicks, tried in order */
  overlayButtons: readonly string[];
}

export interface HarvestTimeouts {
  controlAppearMs: number;
  scrollMs: number;
  clickMs: number;
  overlayClickMs: number;
  contentChangeMs: number;
  settleMs: number;
}

export interface HarvestState {
  seen: Set<ArticleLocation>;
  ordered: ArticleLocation[];
  clickCount: number;
  stallCount: number;
}

export type HarvestStopReason =
  | 'target-reached'
  | 'control-missing'
  | 'control-unresponsive'
  | 'stalled'
  | 'click-limit';

export interface HarvestReport {
  locations: ArticleLocation[];
  clicks: number;
  stalls: number;
  stopReason: HarvestStopReason;
}
