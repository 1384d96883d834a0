/**
 * PostgreSQL Article Store
 */

import type { Pool } from 'pg';
import { ARTICLE_COLUMNS, articlesSchema, uniqueIndex } from './schema.js';
import type { ArticleColumn } from './schema.js';
import { DuplicateKeyError } from './types.js';
import type { ArticleStore, UniqueKey } from './types.js';
import type { StoredDocument } from '../types/index.js';
import { logger } from '../utils/logger.js';

const UNIQUE_VIOLATION = '23505';

const KEY_COLUMNS: Record<UniqueKey, ArticleColumn> = {
  sourceUrl: 'source_url',
};

const COLUMN_LIST = ARTICLE_COLUMNS.join(', ');
const PLACEHOLDERS = ARTICLE_COLUMNS.map((_, index) => `$${index + 1}`).join(', ');
const REPLACE_ASSIGNMENTS = ARTICLE_COLUMNS.filter((column) => column !== 'source_url')
  .map((column) => `${column} = EXCLUDED.${column}`)
  .join(', ');

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION
  );
}

/**
 * Row values in ARTICLE_COLUMNS order
 */
function toRow(doc: StoredDocument): unknown[] {
  return [
    doc.sourceUrl,
    doc.title,
    doc.description,
    doc.articleText,
    doc.publicationDatetime,
    doc.keywords,
    doc.authors,
    doc.headerPhotoUrl,
    doc.headerPhotoEncoded,
    doc.parsedAtUtc,
  ];
}

export class PgArticleStore implements ArticleStore {
  constructor(
    private readonly pool: Pool,
    private readonly table: string = 'articles'
  ) {}

  async ensureUniqueIndex(key: UniqueKey): Promise<void> {
    const column = KEY_COLUMNS[key];
    await this.pool.query(articlesSchema(this.table));
    await this.pool.query(uniqueIndex(this.table, column));
    logger.info({ table: this.table, key, column }, 'Article schema and unique index ready');
  }

  async insertOne(doc: StoredDocument): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO ${this.table} (${COLUMN_LIST}) VALUES (${PLACEHOLDERS})`,
        toRow(doc)
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateKeyError('sourceUrl', doc.sourceUrl, { cause: error });
      }
      throw error;
    }
  }

  async replaceOne(
    filter: Pick<StoredDocument, UniqueKey>,
    doc: StoredDocument,
    options: { upsert: boolean }
  ): Promise<void> {
    const row = toRow({ ...doc, sourceUrl: filter.sourceUrl });

    if (options.upsert) {
      await this.pool.query(
        `INSERT INTO ${this.table} (${COLUMN_LIST}) VALUES (${PLACEHOLDERS})
         ON CONFLICT (source_url) DO UPDATE SET ${REPLACE_ASSIGNMENTS}`,
        row
      );
      return;
    }

    const assignments = ARTICLE_COLUMNS.map((column, index) => `${column} = $${index + 1}`).join(', ');
    await this.pool.query(`UPDATE ${this.table} SET ${assignments} WHERE source_url = $1`, row);
  }

  async count(): Promise<number> {
    const result = await this.pool.query<{ total: string }>(
      `SELECT COUNT(*) AS total FROM ${this.table}`
    );
    return Number(result.rows[0]?.total ?? 0);
  }
}
