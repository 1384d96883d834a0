import { describe, expect, it, vi } from 'vitest';
import { prepareStages, processLocations, runStages } from '../pipeline.js';
import { ArticleSink } from '../db/sink.js';
import type { ArticleStore } from '../db/types.js';
import type { ArticleFetcher } from '../scraper/index.js';
import type { ArticleRecord, RecordStage, RenderedDocument } from '../types/index.js';

function articleHtml(title: string, photo?: string): string {
  const image = photo ? `<meta property="og:image" content="${photo}">` : '';
  return `<html><head>${image}</head><body><h1>${title}</h1></body></html>`;
}

class FakeArticleFetcher implements ArticleFetcher {
  readonly requested: string[] = [];

  constructor(private readonly pages: Record<string, string>) {}

  async fetch(url: string): Promise<RenderedDocument> {
    this.requested.push(url);
    const html = this.pages[url];
    if (html === undefined) {
      throw new Error(`net::ERR_NAME_NOT_RESOLVED at ${url}`);
    }
    return { url, html };
  }
}

function recordingStage(
  name: string,
  order: number,
  trace: string[],
  transform: (record: ArticleRecord) => ArticleRecord = (record) => record
): RecordStage {
  return {
    name,
    order,
    async process(record) {
      trace.push(`${name}:${record.title}`);
      return transform(record);
    },
  };
}

describe('runStages', () => {
  it('runs stages by ascending order whatever the list order', async () => {
    const trace: string[] = [];
    const storage = recordingStage('storage', 200, trace);
    const photo = recordingStage('photo', 100, trace, (record) => ({
      ...record,
      title: `${record.title}+photo`,
    }));
    const record: ArticleRecord = {
      title: 'T',
      description: '',
      articleText: '',
      publicationDatetime: '',
      keywords: [],
      authors: [],
      sourceUrl: 'https://www.kp.ru/online/news/1/',
      headerPhotoUrl: null,
      headerPhotoEncoded: null,
    };

    const result = await runStages(record, [storage, photo]);

    expect(trace).toEqual(['photo:T', 'storage:T+photo']);
    expect(result.title).toBe('T+photo');
  });
});

describe('processLocations', () => {
  it('isolates per-article failures', async () => {
    const fetcher = new FakeArticleFetcher({
      'https://www.kp.ru/online/news/1/': articleHtml('One', 'https://img.example.com/1.jpg'),
      'https://www.kp.ru/online/news/2/': articleHtml('Two'),
      'https://www.kp.ru/online/news/4/': articleHtml('Broken'),
    });
    const trace: string[] = [];
    const photo = recordingStage('photo', 100, trace, (record) => ({
      ...record,
      headerPhotoEncoded: record.headerPhotoUrl ? 'AAAA' : null,
    }));
    const storage: RecordStage = {
      name: 'storage',
      order: 200,
      process: vi.fn(async (record: ArticleRecord) => {
        if (record.title === 'Broken') {
          throw new Error('disk full');
        }
        return record;
      }),
    };

    const summary = await processLocations(
      [
        'https://www.kp.ru/online/news/1/',
        'https://www.kp.ru/online/news/2/',
        'https://www.kp.ru/online/news/3/',
        'https://www.kp.ru/online/news/4/',
      ],
      { fetcher, stages: [storage, photo], concurrency: 2, requestDelayMs: 0 }
    );

    expect(summary).toEqual({ extracted: 3, photos: 1, completed: 2, errors: 2 });
    expect(fetcher.requested).toHaveLength(4);
    expect(storage.process).toHaveBeenCalledTimes(3);
    expect([...trace].sort()).toEqual(['photo:Broken', 'photo:One', 'photo:Two']);
  });

  it('does nothing for an empty harvest', async () => {
    const fetcher = new FakeArticleFetcher({});

    const summary = await processLocations([], {
      fetcher,
      stages: [],
      concurrency: 8,
      requestDelayMs: 200,
    });

    expect(summary).toEqual({ extracted: 0, photos: 0, completed: 0, errors: 0 });
    expect(fetcher.requested).toEqual([]);
  });
});

describe('prepareStages', () => {
  function fakeStore(): ArticleStore {
    return {
      ensureUniqueIndex: vi.fn(async () => undefined),
      insertOne: vi.fn(async () => undefined),
      replaceOne: vi.fn(async () => undefined),
      count: vi.fn(async () => 42),
    };
  }

  it('leaves the store untouched on a dry run', async () => {
    const store = fakeStore();
    const photo = recordingStage('photo', 100, []);

    const prepared = await prepareStages(store, photo, true);

    expect(prepared.stages).toEqual([photo]);
    expect(prepared.sink).toBeNull();
    expect(store.ensureUniqueIndex).not.toHaveBeenCalled();
    expect(store.count).not.toHaveBeenCalled();
  });

  it('prepares the unique index once and appends the storage stage', async () => {
    const store = fakeStore();
    const photo = recordingStage('photo', 100, []);

    const prepared = await prepareStages(store, photo, false);

    expect(prepared.sink).toBeInstanceOf(ArticleSink);
    expect(prepared.stages).toEqual([photo, prepared.sink]);
    expect(store.ensureUniqueIndex).toHaveBeenCalledTimes(1);
    expect(store.ensureUniqueIndex).toHaveBeenCalledWith('sourceUrl');
  });
});
