/**
 * Article Extractor
 *
 * Maps a rendered article page onto an ArticleRecord. Each field has an
 * ordered list of sources; the first one yielding a non-empty value wins.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { isTag, isText } from 'domhandler';
import type { AnyNode } from 'domhandler';
import { cleanText, normalizeLocation, uniqueInOrder } from '../utils/text.js';
import type { ArticleRecord, RenderedDocument } from '../types/index.js';

const CONTENT_BODY = "div[data-gtm-el='content-body']";
const AUTHOR_REGIONS = "[class*='author'], [class*='Authors'], [class*='authors']";
const TAG_LINKS = "a[href*='/tag/']";
const SKIPPED_TAGS = new Set(['script', 'style']);

type NodeFilter = (node: AnyNode) => boolean;

function metaContent($: CheerioAPI, attribute: 'name' | 'property', key: string): string {
  return cleanText($(`meta[${attribute}='${key}']`).first().attr('content'));
}

/**
 * First non-empty value, or an empty string
 */
function firstOf(...candidates: Array<() => string>): string {
  for (const candidate of candidates) {
    const value = candidate();
    if (value) {
      return value;
    }
  }
  return '';
}

function splitList(value: string, separator: RegExp): string[] {
  return value
    .split(separator)
    .map((part) => cleanText(part))
    .filter(Boolean);
}

/**
 * Text nodes under `root` in document order, descending only into nodes `enter` accepts
 */
function textNodes(root: AnyNode, enter: NodeFilter): string[] {
  const parts: string[] = [];

  const walk = (node: AnyNode): void => {
    if (isText(node)) {
      parts.push(node.data);
      return;
    }
    if (isTag(node) && enter(node)) {
      node.children.forEach(walk);
    }
  };

  if (isTag(root)) {
    root.children.forEach(walk);
  }
  return parts;
}

const notScriptOrStyle: NodeFilter = (node) => isTag(node) && !SKIPPED_TAGS.has(node.name);

const bodyContent: NodeFilter = (node) =>
  notScriptOrStyle(node) &&
  isTag(node) &&
  !(node.name === 'div' && node.attribs['data-wide'] === 'true');

function extractKeywords($: CheerioAPI): string[] {
  const fromMeta = $("meta[name='keywords']").first().attr('content');
  if (fromMeta) {
    return splitList(fromMeta, /,/);
  }

  return $(TAG_LINKS)
    .toArray()
    .map((link) => cleanText($(link).text()))
    .filter(Boolean);
}

function extractAuthors($: CheerioAPI): string[] {
  const fromMeta = $("meta[name='author']").first().attr('content');
  if (fromMeta) {
    return uniqueInOrder(splitList(fromMeta, /[,;&]/));
  }

  const names = $(AUTHOR_REGIONS)
    .toArray()
    .flatMap((region) => textNodes(region, notScriptOrStyle))
    .map((text) => cleanText(text))
    .filter(Boolean);

  return uniqueInOrder(names);
}

function extractArticleText($: CheerioAPI): string {
  const root = $(CONTENT_BODY).first().get(0);
  if (!root) {
    return '';
  }

  return textNodes(root, bodyContent)
    .map((text) => cleanText(text))
    .filter(Boolean)
    .join('\n');
}

/**
 * Extract an ArticleRecord from a rendered page. `headerPhotoEncoded` is left null.
 */
export function extractArticle(document: RenderedDocument): ArticleRecord {
  const $ = cheerio.load(document.html);

  return {
    title: firstOf(
      () => cleanText($('h1').first().text()),
      () => metaContent($, 'property', 'og:title')
    ),
    description: firstOf(
      () => metaContent($, 'name', 'description'),
      () => metaContent($, 'property', 'og:description')
    ),
    articleText: extractArticleText($),
    publicationDatetime: firstOf(
      () => metaContent($, 'property', 'article:published_time'),
      () => cleanText($('time[datetime]').first().attr('datetime'))
    ),
    keywords: extractKeywords($),
    authors: extractAuthors($),
    sourceUrl: normalizeLocation(document.url),
    headerPhotoUrl: metaContent($, 'property', 'og:image') || null,
    headerPhotoEncoded: null,
  };
}
