/**
 * Application configuration
 */

import { env } from './env.js';

export const config = {
  app: {
    name: 'article-harvester',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  listing: {
    url: env.LISTING_URL,
    targetCount: env.HARVEST_TARGET_COUNT,
    maxClicks: env.HARVEST_MAX_CLICKS,
    stallLimit: env.HARVEST_STALL_LIMIT,
  },

  scraper: {
    headless: env.HEADLESS,
    userAgent: env.USER_AGENT,
    timeout: env.NAVIGATION_TIMEOUT_MS,
    concurrency: env.CONCURRENCY,
    requestDelayMs: env.REQUEST_DELAY_MS,
  },

  photos: {
    quality: env.IMAGE_QUALITY,
    timeout: env.IMAGE_TIMEOUT_MS,
  },

  database: {
    url: env.DATABASE_URL,
    table: env.ARTICLES_TABLE,
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },

  retry: {
    maxAttempts: 2,
    initialDelayMs: 1000,
    maxDelayMs: 10000,
    factor: 2,
  },
} as const;

export type Config = typeof config;
export { env, parseEnv } from './env.js';
