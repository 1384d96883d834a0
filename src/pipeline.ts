/**
 * Main Pipeline
 *
 * Orchestrates one harvesting run:
 * 1. Traverse the listing and collect article locations
 * 2. Load and extract every article (bounded concurrency, spaced starts)
 * 3. Run each record through the stages in order: photo, then storage
 */

import pLimit from 'p-limit';
import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { RateLimiter } from './utils/rate-limiter.js';
import { describeError } from './utils/attempt.js';
import {
  ListingHarvester,
  PlaywrightListingSession,
  BrowserArticleFetcher,
  initBrowser,
  createPage,
  navigateTo,
  closeBrowser,
} from './scraper/index.js';
import type { ArticleFetcher, HarvestReport } from './scraper/index.js';
import { extractArticle } from './extractor/index.js';
import { PhotoProcessor, HttpImageFetcher } from './photos/index.js';
import { ArticleSink } from './db/sink.js';
import type { ArticleStore } from './db/types.js';
import type { ArticleLocation, ArticleRecord, PipelineResult, RecordStage } from './types/index.js';

/**
 * Pipeline options
 */
export interface PipelineOptions {
  targetCount?: number;
  maxClicks?: number;
  stallLimit?: number;
  /** Run everything except storage writes */
  dryRun?: boolean;
}

export interface ProcessOptions {
  fetcher: ArticleFetcher;
  stages: readonly RecordStage[];
  concurrency: number;
  requestDelayMs: number;
}

export interface ProcessSummary {
  extracted: number;
  photos: number;
  completed: number;
  errors: number;
}

export interface PreparedStages {
  stages: RecordStage[];
  /** Absent on a dry run */
  sink: ArticleSink | null;
}

/**
 * Build the record stages. Storage is prepared (schema, unique index) only
 * when it will be written to.
 */
export async function prepareStages(
  store: ArticleStore,
  photos: RecordStage,
  dryRun: boolean
): Promise<PreparedStages> {
  if (dryRun) {
    logger.info('Dry run: storage stage disabled');
    return { stages: [photos], sink: null };
  }

  const sink = new ArticleSink(store);
  await sink.open();
  logger.info({ storedArticles: await store.count() }, 'Article store ready');

  return { stages: [photos, sink], sink };
}

/**
 * Apply stages in ascending order, each receiving the previous stage's output
 */
export async function runStages(
  record: ArticleRecord,
  stages: readonly RecordStage[]
): Promise<ArticleRecord> {
  const ordered = [...stages].sort((a, b) => a.order - b.order);

  let current = record;
  for (const stage of ordered) {
    current = await stage.process(current);
  }
  return current;
}

/**
 * Fetch, extract and stage every location. A failure only affects its own location.
 */
export async function processLocations(
  locations: readonly ArticleLocation[],
  options: ProcessOptions
): Promise<ProcessSummary> {
  const limit = pLimit(options.concurrency);
  const limiter = new RateLimiter(options.requestDelayMs);
  const summary: ProcessSummary = { extracted: 0, photos: 0, completed: 0, errors: 0 };

  const processOne = async (location: ArticleLocation): Promise<void> => {
    await limiter.waitForSlot();

    let record: ArticleRecord;
    try {
      record = extractArticle(await options.fetcher.fetch(location));
      summary.extracted++;
    } catch (error) {
      summary.errors++;
      logger.error({ url: location, error: describeError(error) }, 'Failed to load article');
      return;
    }

    try {
      const result = await runStages(record, options.stages);
      summary.completed++;
      if (result.headerPhotoEncoded) {
        summary.photos++;
      }
      logger.debug({ url: result.sourceUrl, title: result.title.slice(0, 60) }, 'Article processed');
    } catch (error) {
      summary.errors++;
      logger.error({ url: record.sourceUrl, error: describeError(error) }, 'Article stage failed');
    }
  };

  await Promise.all(locations.map((location) => limit(() => processOne(location))));

  return summary;
}

/**
 * Open the listing page in the browser and collect article locations
 */
async function harvestListing(options: Required<Omit<PipelineOptions, 'dryRun'>>): Promise<HarvestReport> {
  const harvester = new ListingHarvester({
    maxClicks: options.maxClicks,
    stallLimit: options.stallLimit,
  });

  const page = await createPage();
  const session = new PlaywrightListingSession(page);

  try {
    await navigateTo(page, config.listing.url, { waitUntil: 'domcontentloaded' });
  } catch (error) {
    await session.close().catch((closeError: unknown) => {
      logger.warn({ error: describeError(closeError) }, 'Error closing listing page');
    });
    throw error;
  }

  return harvester.harvest(session, options.targetCount);
}

/**
 * Run the full pipeline against an open article store
 */
export async function runPipeline(
  store: ArticleStore,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const {
    targetCount = config.listing.targetCount,
    maxClicks = config.listing.maxClicks,
    stallLimit = config.listing.stallLimit,
    dryRun = false,
  } = options;

  const startTime = Date.now();
  const result: PipelineResult = {
    discovered: 0,
    extracted: 0,
    photos: 0,
    inserted: 0,
    replaced: 0,
    errors: 0,
    durationMs: 0,
  };

  logger.info({ listing: config.listing.url, targetCount, maxClicks, stallLimit, dryRun }, 'Starting pipeline');

  const photos = new PhotoProcessor(
    new HttpImageFetcher({ timeout: config.photos.timeout, userAgent: config.scraper.userAgent }),
    { quality: config.photos.quality }
  );
  const { stages, sink } = await prepareStages(store, photos, dryRun);

  try {
    await initBrowser();

    // Step 1: Traverse the listing
    logger.info('Step 1: Collecting article links...');
    const harvest = await harvestListing({ targetCount, maxClicks, stallLimit });
    result.discovered = harvest.locations.length;

    // Step 2-3: Extract, enrich and store
    logger.info({ count: harvest.locations.length }, 'Step 2: Processing articles...');
    const summary = await processLocations(harvest.locations, {
      fetcher: new BrowserArticleFetcher(config.retry),
      stages,
      concurrency: config.scraper.concurrency,
      requestDelayMs: config.scraper.requestDelayMs,
    });

    result.extracted = summary.extracted;
    result.photos = summary.photos;
    result.errors = summary.errors;
    result.inserted = sink?.stats.inserted ?? 0;
    result.replaced = sink?.stats.replaced ?? 0;
    result.durationMs = Date.now() - startTime;

    logger.info({ result }, 'Pipeline complete');
    return result;
  } catch (error) {
    logger.error({ error }, 'Pipeline failed');
    throw error;
  } finally {
    await closeBrowser();
  }
}
