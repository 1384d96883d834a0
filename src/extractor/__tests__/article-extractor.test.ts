import { describe, expect, it } from 'vitest';
import { extractArticle } from '../article-extractor.js';

const ARTICLE_URL = 'https://www.kp.ru/online/news/5012345/?from=feed';

const fullPage = `<!doctype html>
<html>
<head>
  <meta property="og:title" content="Open Graph title">
  <meta name="description" content="  Short
     description ">
  <meta property="og:description" content="Open Graph description">
  <meta property="article:published_time" content="2024-03-01T10:00:00+03:00">
  <meta property="og:image" content="https://img.example.com/photo.png">
  <meta name="keywords" content="politics, , economy ,sport">
  <meta name="author" content="Anna Ivanova; Petr Petrov &amp; Anna Ivanova, Ivan Sidorov">
</head>
<body>
  <h1>  Main
     headline </h1>
  <time datetime="2024-01-01T00:00:00Z">1 January</time>
  <a href="/tag/ignored/">Ignored tag</a>
  <div data-gtm-el="content-body">
    <p>First   paragraph.</p>
    <div data-wide="true"><p>Related story</p></div>
    <script>var tracking = 1;</script>
    <style>.lead { color: red; }</style>
    <p>Second <b>bold</b> part.</p>
  </div>
  <div data-gtm-el="content-body"><p>Second body is ignored</p></div>
</body>
</html>`;

describe('extractArticle', () => {
  it('uses the primary source of every field', () => {
    const record = extractArticle({ url: ARTICLE_URL, html: fullPage });

    expect(record).toEqual({
      title: 'Main headline',
      description: 'Short description',
      articleText: 'First paragraph.\nSecond\nbold\npart.',
      publicationDatetime: '2024-03-01T10:00:00+03:00',
      keywords: ['politics', 'economy', 'sport'],
      authors: ['Anna Ivanova', 'Petr Petrov', 'Ivan Sidorov'],
      sourceUrl: 'https://www.kp.ru/online/news/5012345/',
      headerPhotoUrl: 'https://img.example.com/photo.png',
      headerPhotoEncoded: null,
    });
  });

  it('falls back to the secondary sources', () => {
    const html = `<html><head>
      <meta property="og:title" content="Fallback title">
      <meta property="og:description" content=" Fallback   description ">
    </head><body>
      <time datetime=" 2024-05-06T07:08:09Z ">6 May</time>
      <a href="/tag/politika/"> Politics </a><a href="/tag/empty/">   </a><a href="/tag/economy/">Economy</a>
      <a href="/online/news/1/">Not a tag</a>
      <div class="article-authors"><span>Anna   Ivanova</span><span class="author-name">Petr Petrov</span></div>
      <div class="Authors">Anna Ivanova</div>
    </body></html>`;

    const record = extractArticle({ url: ARTICLE_URL, html });

    expect(record.title).toBe('Fallback title');
    expect(record.description).toBe('Fallback description');
    expect(record.publicationDatetime).toBe('2024-05-06T07:08:09Z');
    expect(record.keywords).toEqual(['Politics', 'Economy']);
    expect(record.authors).toEqual(['Anna Ivanova', 'Petr Petrov']);
    expect(record.headerPhotoUrl).toBeNull();
  });

  it('treats a whitespace-only heading as empty', () => {
    const html = `<html><head><meta property="og:title" content="From meta"></head>
      <body><h1>   </h1></body></html>`;

    expect(extractArticle({ url: ARTICLE_URL, html }).title).toBe('From meta');
  });

  it('returns empty values when no source is present', () => {
    const record = extractArticle({ url: ARTICLE_URL, html: '<html><body></body></html>' });

    expect(record).toEqual({
      title: '',
      description: '',
      articleText: '',
      publicationDatetime: '',
      keywords: [],
      authors: [],
      sourceUrl: 'https://www.kp.ru/online/news/5012345/',
      headerPhotoUrl: null,
      headerPhotoEncoded: null,
    });
  });

  it('skips nested wide blocks but keeps text after them', () => {
    const html = `<div data-gtm-el="content-body"><div class="lead">Lead<div data-wide="true">Gallery<span>caption</span></div>tail</div></div>`;

    expect(extractArticle({ url: ARTICLE_URL, html }).articleText).toBe('Lead\ntail');
  });

  it('deduplicates authors listed in the meta tag', () => {
    const html = `<html><head><meta name="author" content="A, B; A & C"></head></html>`;

    expect(extractArticle({ url: ARTICLE_URL, html }).authors).toEqual(['A', 'B', 'C']);
  });
});
