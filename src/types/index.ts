/**
 * Core types for the article harvester
 */

/**
 * Absolute article URL without its query string; identity key for dedup and storage
 */
export type ArticleLocation = string;

export interface ArticleRecord {
  title: string;
  description: string;
  articleText: string;
  publicationDatetime: string;
  keywords: string[];
  authors: string[];
  sourceUrl: ArticleLocation;
  headerPhotoUrl: string | null;
  headerPhotoEncoded: string | null;
}

export interface StoredDocument extends ArticleRecord {
  parsedAtUtc: string;
}

/**
 * A fully rendered article page as returned by the browser
 */
export interface RenderedDocument {
  url: string;
  html: string;
}

/**
 * A processing step applied to every extracted record.
 * Stages run in ascending `order`; each sees the record returned by the previous one.
 */
export interface RecordStage {
  readonly name: string;
  readonly order: number;
  process(record: ArticleRecord): Promise<ArticleRecord>;
}

export interface PipelineResult {
  discovered: number;
  extracted: number;
  photos: number;
  inserted: number;
  replaced: number;
  errors: number;
  durationMs: number;
}

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}
