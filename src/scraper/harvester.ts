/**
 * Listing Harvester
 *
 * Clicks the listing's "show more" control until enough unique article
 * links are rendered, the control disappears, or progress stalls.
 * Links are always re-read from the live DOM: new items are injected
 * client-side and never appear in the initial document.
 */

import { logger } from '../utils/logger.js';
import { attempt, describeError } from '../utils/attempt.js';
import { normalizeLocation } from '../utils/text.js';
import type {
  HarvestReport,
  HarvestState,
  HarvestStopReason,
  HarvestTimeouts,
  ListingSelectors,
  ListingSession,
} from './types.js';

const log = logger.child({ component: 'harvester' });

export const DEFAULT_SELECTORS: ListingSelectors = {
  articleLinks: "a[href*='/online/news/']",
  revealControl: "button:has-text('Показать еще'), button:has-text('Показать ещё')",
  overlayButtons: [
    "button:has-text('Принять')",
    "button:has-text('Согласен')",
    "button:has-text('Согласиться')",
    "button:has-text('ОК')",
  ],
};

export const DEFAULT_TIMEOUTS: HarvestTimeouts = {
  controlAppearMs: 30_000,
  scrollMs: 10_000,
  clickMs: 10_000,
  overlayClickMs: 1_500,
  contentChangeMs: 25_000,
  settleMs: 600,
};

const PROGRESS_LOG_EVERY = 10;

export interface HarvesterOptions {
  maxClicks?: number;
  stallLimit?: number;
  selectors?: Partial<ListingSelectors>;
  timeouts?: Partial<HarvestTimeouts>;
}

export function createHarvestState(): HarvestState {
  return { seen: new Set(), ordered: [], clickCount: 0, stallCount: 0 };
}

/**
 * Add unseen locations in the given order until `targetCount` is reached.
 * Returns how many were added.
 */
export function absorbLocations(
  state: HarvestState,
  hrefs: readonly string[],
  targetCount: number
): number {
  let added = 0;

  for (const href of hrefs) {
    if (state.ordered.length >= targetCount) {
      break;
    }

    const location = normalizeLocation(href);
    if (!location || state.seen.has(location)) {
      continue;
    }

    state.seen.add(location);
    state.ordered.push(location);
    added++;
  }

  return added;
}

/**
 * Update the stall counter after one discovery round
 */
export function recordRound(state: HarvestState, added: number): void {
  state.stallCount = added === 0 ? state.stallCount + 1 : 0;
}

export class ListingHarvester {
  private readonly maxClicks: number;
  private readonly stallLimit: number;
  private readonly selectors: ListingSelectors;
  private readonly timeouts: HarvestTimeouts;

  constructor(options: HarvesterOptions = {}) {
    this.maxClicks = options.maxClicks ?? 10_000;
    this.stallLimit = options.stallLimit ?? 10;
    this.selectors = { ...DEFAULT_SELECTORS, ...options.selectors };
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts };
  }

  /**
   * Collect up to `targetCount` unique article locations in discovery order.
   * The session is closed before returning, whatever the outcome.
   */
  async harvest(session: ListingSession, targetCount: number): Promise<HarvestReport> {
    const state = createHarvestState();

    try {
      const stopReason = await this.traverse(session, state, targetCount);

      log.info(
        {
          collected: state.ordered.length,
          requested: targetCount,
          clicks: state.clickCount,
          stalls: state.stallCount,
          stopReason,
        },
        'Listing traversal finished'
      );

      return {
        locations: state.ordered.slice(0, targetCount),
        clicks: state.clickCount,
        stalls: state.stallCount,
        stopReason,
      };
    } finally {
      const closed = await attempt(() => session.close());
      if (!closed.ok) {
        log.warn({ error: describeError(closed.error) }, 'Error closing listing session');
      }
    }
  }

  private async traverse(
    session: ListingSession,
    state: HarvestState,
    targetCount: number
  ): Promise<HarvestStopReason> {
    const appeared = await attempt(() =>
      session.waitForSelector(this.selectors.revealControl, {
        timeout: this.timeouts.controlAppearMs,
      })
    );
    if (!appeared.ok) {
      log.debug('Reveal control did not appear, collecting what is rendered');
    }

    await this.collect(session, state, targetCount);
    log.debug({ collected: state.ordered.length }, 'Initial links collected');

    for (;;) {
      if (state.ordered.length >= targetCount) {
        return 'target-reached';
      }
      if (state.clickCount >= this.maxClicks) {
        return 'click-limit';
      }
      if (state.stallCount >= this.stallLimit) {
        return 'stalled';
      }

      const counts = await attempt(async () => ({
        links: await session.count(this.selectors.articleLinks),
        controls: await session.count(this.selectors.revealControl),
      }));
      if (!counts.ok) {
        log.warn({ error: describeError(counts.error) }, 'Could not inspect the listing');
        return 'control-unresponsive';
      }

      if (counts.value.controls === 0) {
        return 'control-missing';
      }

      if (!(await this.reveal(session, counts.value.links))) {
        return 'control-unresponsive';
      }
      state.clickCount++;

      recordRound(state, await this.collect(session, state, targetCount));

      if (state.clickCount % PROGRESS_LOG_EVERY === 0) {
        log.info(
          {
            collected: state.ordered.length,
            requested: targetCount,
            clicks: state.clickCount,
            stalls: state.stallCount,
          },
          'Harvest progress'
        );
      }
    }
  }

  /**
   * Read the rendered links and absorb unseen ones. A failed read adds nothing.
   */
  private async collect(
    session: ListingSession,
    state: HarvestState,
    targetCount: number
  ): Promise<number> {
    const hrefs = await attempt(() => session.hrefs(this.selectors.articleLinks));
    if (!hrefs.ok) {
      log.warn({ error: describeError(hrefs.error) }, 'Could not read listing links');
      return 0;
    }
    return absorbLocations(state, hrefs.value, targetCount);
  }

  /**
   * Bring the control into view, click it and wait for the list to grow.
   * Returns false when the control cannot be interacted with.
   */
  private async reveal(session: ListingSession, previousCount: number): Promise<boolean> {
    const { revealControl, articleLinks } = this.selectors;

    await this.dismissOverlays(session);

    const scrolled = await attempt(() =>
      session.scrollIntoView(revealControl, { timeout: this.timeouts.scrollMs })
    );
    if (!scrolled.ok) {
      const fallback = await attempt(() => session.scrollToBottom());
      if (!fallback.ok) {
        log.warn({ error: describeError(fallback.error) }, 'Could not scroll to reveal control');
        return false;
      }
    }

    const clicked = await attempt(() =>
      session.click(revealControl, { timeout: this.timeouts.clickMs, force: true })
    );
    if (!clicked.ok) {
      log.warn({ error: describeError(clicked.error) }, 'Reveal control click failed');
      return false;
    }

    // The list may be replaced rather than extended, so an unchanged count is tolerated
    const changed = await attempt(() =>
      session.waitForCountChange(articleLinks, previousCount, {
        timeout: this.timeouts.contentChangeMs,
      })
    );
    if (!changed.ok) {
      log.debug({ previousCount }, 'Link count unchanged after reveal');
    }

    await attempt(() => session.waitForTimeout(this.timeouts.settleMs));
    return true;
  }

  private async dismissOverlays(session: ListingSession): Promise<void> {
    await attempt(() => session.pressKey('Escape'));

    for (const selector of this.selectors.overlayButtons) {
      const dismissed = await attempt(async () => {
        if ((await session.count(selector)) === 0) {
          return false;
        }
        await session.click(selector, { timeout: this.timeouts.overlayClickMs, force: true });
        return true;
      });

      if (dismissed.ok && dismissed.value) {
        log.debug({ selector }, 'Overlay dismissed');
        break;
      }
    }
  }
}
