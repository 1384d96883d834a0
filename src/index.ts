#!/usr/bin/env node
/**
 * Article Harvester
 *
 * Collects articles from a "show more" news listing:
 * 1. Clicks through the listing until enough article links are rendered
 * 2. Extracts title, text, dates, keywords and authors from each article
 * 3. Downloads and recompresses the header photo
 * 4. Upserts every article into PostgreSQL, keyed by source URL
 *
 * Usage:
 *   node dist/index.js                    - Harvest with configured defaults
 *   node dist/index.js --limit=50         - Stop after 50 unique articles
 *   node dist/index.js --max-clicks=100   - Cap "show more" clicks
 *   node dist/index.js --stall-limit=5    - Stop after 5 rounds without new links
 *   node dist/index.js --dry-run          - Everything except storage writes
 */

import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { openDatabase } from './db/index.js';
import type { Database } from './db/index.js';
import { PgArticleStore } from './db/queries.js';
import { runPipeline } from './pipeline.js';
import { parseArgs } from './cli.js';

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  logger.info({ env: config.app.env, version: config.app.version }, 'Starting article harvester');

  let database: Database;
  try {
    database = await openDatabase({ url: config.database.url });
  } catch (error) {
    logger.fatal({ error }, 'Failed to connect to database');
    process.exit(1);
  }

  const store = new PgArticleStore(database.pool, config.database.table);

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down...');
    await database.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    const result = await runPipeline(store, options);

    logger.info('Harvest Complete:');
    logger.info(`  ✓ Discovered: ${result.discovered} articles`);
    logger.info(`  ✓ Extracted:  ${result.extracted} articles`);
    logger.info(`  ✓ Photos:     ${result.photos}`);
    logger.info(`  ✓ Inserted:   ${result.inserted}`);
    logger.info(`  ✓ Replaced:   ${result.replaced}`);
    if (result.errors > 0) {
      logger.info(`  ⚠ Errors:     ${result.errors}`);
    }
    logger.info(`  ⏱ Duration:   ${(result.durationMs / 1000).toFixed(1)}s`);
  } catch (error) {
    logger.error({ error }, 'Harvest failed');
    process.exitCode = 1;
  } finally {
    await database.close();
  }
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Application failed');
  process.exit(1);
});
