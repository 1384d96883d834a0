/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  // Database
  DATABASE_URL: z.string().min(1).default('postgres://localhost:5432/articles'),
  ARTICLES_TABLE: z
    .string()
    .regex(/^[a-z_][a-z0-9_]*$/i, 'ARTICLES_TABLE must be a plain SQL identifier')
    .default('articles'),

  // Listing traversal
  LISTING_URL: z.string().url().default('https://www.kp.ru/online/'),
  HARVEST_TARGET_COUNT: z.coerce.number().int().positive().default(1000),
  HARVEST_MAX_CLICKS: z.coerce.number().int().nonnegative().default(10000),
  HARVEST_STALL_LIMIT: z.coerce.number().int().positive().default(10),

  // Article and image fetching
  CONCURRENCY: z.coerce.number().int().positive().default(8),
  REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(200),
  NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  IMAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  IMAGE_QUALITY: z.coerce.number().int().min(1).max(100).default(35),
  HEADLESS: booleanFlag.default('true'),
  USER_AGENT: z
    .string()
    .default(
      'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
    ),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_FILE: z.string().optional(),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate a set of environment variables, throwing on the first invalid run
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = parseEnv(process.env);
