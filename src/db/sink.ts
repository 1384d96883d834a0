/**
 * Article Sink
 *
 * Keeps exactly one stored document per source URL. A repeat parse of the
 * same URL replaces the stored document entirely.
 */

import { logger } from '../utils/logger.js';
import { DuplicateKeyError } from './types.js';
import type { ArticleStore, StoreOutcome } from './types.js';
import type { ArticleRecord, RecordStage, StoredDocument } from '../types/index.js';

const log = logger.child({ component: 'sink' });

export function toStoredDocument(record: ArticleRecord, parsedAt: Date): StoredDocument {
  return {
    title: record.title,
    description: record.description,
    articleText: record.articleText,
    publicationDatetime: record.publicationDatetime,
    keywords: record.keywords,
    authors: record.authors,
    sourceUrl: record.sourceUrl,
    headerPhotoUrl: record.headerPhotoUrl ?? null,
    headerPhotoEncoded: record.headerPhotoEncoded ?? null,
    parsedAtUtc: parsedAt.toISOString(),
  };
}

export class ArticleSink implements RecordStage {
  readonly name = 'storage';
  readonly order = 200;
  readonly stats = { inserted: 0, replaced: 0, failed: 0 };
  private ready: Promise<void> | null = null;

  constructor(
    private readonly documents: ArticleStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Create the unique index on sourceUrl. Runs once; later calls reuse the result.
   */
  open(): Promise<void> {
    if (!this.ready) {
      this.ready = this.documents.ensureUniqueIndex('sourceUrl').catch((error: unknown) => {
        this.ready = null;
        throw error;
      });
    }
    return this.ready;
  }

  async store(record: ArticleRecord): Promise<StoreOutcome> {
    const doc = toStoredDocument(record, this.clock());

    try {
      await this.open();

      try {
        await this.documents.insertOne(doc);
        this.stats.inserted++;
        log.debug({ sourceUrl: doc.sourceUrl }, 'Article inserted');
        return { ok: true, action: 'inserted' };
      } catch (error) {
        if (!(error instanceof DuplicateKeyError)) {
          throw error;
        }
      }

      await this.documents.replaceOne({ sourceUrl: doc.sourceUrl }, doc, { upsert: true });
      this.stats.replaced++;
      log.debug({ sourceUrl: doc.sourceUrl }, 'Article replaced');
      return { ok: true, action: 'replaced' };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.stats.failed++;
      log.error({ error: failure, sourceUrl: doc.sourceUrl }, 'Failed to store article');
      return { ok: false, error: failure };
    }
  }

  /**
   * Stage adapter: storage failures are raised so the pipeline counts them
   */
  async process(record: ArticleRecord): Promise<ArticleRecord> {
    const outcome = await this.store(record);
    if (!outcome.ok) {
      throw outcome.error;
    }
    return record;
  }
}
