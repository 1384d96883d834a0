/**
 * PostgreSQL Database Connection
 *
 * The pool is opened once by the entry point and passed to whoever needs it.
 */

import pg from 'pg';
import type { Pool } from 'pg';
import { logger } from '../utils/logger.js';

export interface DatabaseOptions {
  url: string;
  max?: number;
  connectionTimeoutMillis?: number;
}

export interface Database {
  pool: Pool;
  close(): Promise<void>;
}

/**
 * Create the pool and verify a connection can be made.
 * Throws when the server is unreachable.
 */
export async function openDatabase(options: DatabaseOptions): Promise<Database> {
  const pool = new pg.Pool({
    connectionString: options.url,
    max: options.max ?? 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: options.connectionTimeoutMillis ?? 5000,
  });

  pool.on('error', (error) => {
    logger.error({ error }, 'Idle database client error');
  });

  try {
    const client = await pool.connect();
    try {
      await client.query('SELECT 1');
    } finally {
      client.release();
    }
    logger.info('Database connection established');
  } catch (error) {
    await pool.end().catch((endError: unknown) => {
      logger.warn({ error: endError }, 'Error closing pool after failed connect');
    });
    throw error;
  }

  let closed = false;

  return {
    pool,
    async close(): Promise<void> {
      if (closed) {
        return;
      }
      closed = true;
      await pool.end();
      logger.info('Database connection pool closed');
    },
  };
}

export type { Pool };
