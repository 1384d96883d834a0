/**
 * PostgreSQL schema for harvested articles
 */

/**
 * Articles table. Safe to run repeatedly.
 */
export function articlesSchema(table: string): string {
  return `
-- ═══════════════════════════════════════════════════════════════════════════════
-- Articles Table
-- One row per article, identified by its source URL
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS ${table} (
  id BIGSERIAL PRIMARY KEY,
  source_url TEXT NOT NULL,
  title TEXT NOT NULL DEFAULT '',
  description TEXT NOT NULL DEFAULT '',
  article_text TEXT NOT NULL DEFAULT '',
  publication_datetime TEXT NOT NULL DEFAULT '',
  keywords TEXT[] NOT NULL DEFAULT '{}',
  authors TEXT[] NOT NULL DEFAULT '{}',
  header_photo_url TEXT,
  header_photo_base64 TEXT,
  parsed_at_utc TIMESTAMPTZ NOT NULL
);
`;
}

/**
 * Unique index enforcing one row per value of `column`
 */
export function uniqueIndex(table: string, column: ArticleColumn): string {
  return `CREATE UNIQUE INDEX IF NOT EXISTS ${table}_${column}_key ON ${table} (${column});`;
}

/**
 * Column order shared by every write
 */
export const ARTICLE_COLUMNS = [
  'source_url',
  'title',
  'description',
  'article_text',
  'publication_datetime',
  'keywords',
  'authors',
  'header_photo_url',
  'header_photo_base64',
  'parsed_at_utc',
] as const;

export type ArticleColumn = (typeof ARTICLE_COLUMNS)[number];
