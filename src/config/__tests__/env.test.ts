import { describe, expect, it } from 'vitest';
import { parseEnv } from '../env.js';

describe('parseEnv', () => {
  it('applies the documented defaults', () => {
    const env = parseEnv({});

    expect(env.HARVEST_TARGET_COUNT).toBe(1000);
    expect(env.HARVEST_MAX_CLICKS).toBe(10000);
    expect(env.HARVEST_STALL_LIMIT).toBe(10);
    expect(env.IMAGE_QUALITY).toBe(35);
    expect(env.CONCURRENCY).toBe(8);
    expect(env.REQUEST_DELAY_MS).toBe(200);
    expect(env.HEADLESS).toBe(true);
    expect(env.ARTICLES_TABLE).toBe('articles');
    expect(env.LISTING_URL).toBe('https://www.kp.ru/online/');
  });

  it('coerces numeric and boolean variables', () => {
    const env = parseEnv({ HARVEST_TARGET_COUNT: '25', HEADLESS: 'false', IMAGE_QUALITY: '80' });

    expect(env.HARVEST_TARGET_COUNT).toBe(25);
    expect(env.HEADLESS).toBe(false);
    expect(env.IMAGE_QUALITY).toBe(80);
  });

  it('rejects malformed configuration', () => {
    expect(() => parseEnv({ IMAGE_QUALITY: '0' })).toThrow('Environment validation failed');
    expect(() => parseEnv({ HARVEST_STALL_LIMIT: 'many' })).toThrow('Environment validation failed');
    expect(() => parseEnv({ ARTICLES_TABLE: 'articles; DROP TABLE x' })).toThrow(
      'Environment validation failed'
    );
  });
});
