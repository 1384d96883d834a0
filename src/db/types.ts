/**
 * Storage types
 */

import type { StoredDocument } from '../types/index.js';

export type UniqueKey = 'sourceUrl';

/**
 * Document store holding one StoredDocument per source URL
 */
export interface ArticleStore {
  ensureUniqueIndex(key: UniqueKey): Promise<void>;
  /** Throws DuplicateKeyError when a document with the same source URL exists */
  insertOne(doc: StoredDocument): Promise<void>;
  /** Replace the whole document matching the filter, inserting it when absent */
  replaceOne(
    filter: Pick<StoredDocument, UniqueKey>,
    doc: StoredDocument,
    options: { upsert: boolean }
  ): Promise<void>;
  count(): Promise<number>;
}

export class DuplicateKeyError extends Error {
  constructor(
    readonly key: UniqueKey,
    readonly value: string,
    options?: { cause?: unknown }
  ) {
    super(`Duplicate ${key}: ${value}`, options);
    this.name = 'DuplicateKeyError';
  }
}

export type StoreOutcome =
  | { ok: true; action: 'inserted' | 'replaced' }
  | { ok: false; error: Error };
