/**
 * RSS Feed Fetcher
 *
 * Fetches and parses RSS/Atom feeds into entries
 */

import Parser from 'rss-parser';
import { logger } from '../utils/logger.js';
import { isValidDate } from '../utils/date.js';
import type { ContentBlock, Entry, FetchResult } from '../types/index.js';
import type { FeedItemFields, FeedParser, RawFeedItem } from './types.js';

/**
 * Create RSS parser with custom headers
 */
export function createFeedParser(): Parser<Record<string, unknown>, FeedItemFields> {
  return new Parser<Record<string, unknown>, FeedItemFields>({
    headers: {
      'User-Agent':
        'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
      Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
    },
    customFields: {
      item: [['content:encoded', 'contentEncoded'], 'description', 'published', 'updated'],
    },
  });
}

function parseIsoDate(isoDate: string | undefined): Date | undefined {
  if (!isoDate) {
    return undefined;
  }
  const date = new Date(isoDate);
  return isValidDate(date) ? date : undefined;
}

/**
 * Map a parser item to an entry.
 *
 * For an Atom entry rss-parser sets `pubDate` to the ISO form of
 * `published`, else of `updated`, and derives `isoDate` from it. A
 * `pubDate` with no `published` beside it is taken from `updated` and is
 * not a publication date.
 */
export function toEntry(item: RawFeedItem): Entry {
  const updated = item.updated || undefined;
  const pubDateFromUpdated = !item.published && updated !== undefined;
  const published = item.published || (pubDateFromUpdated ? undefined : item.pubDate) || undefined;
  const isoDate = parseIsoDate(item.isoDate);

  const content: ContentBlock[] = [item.contentEncoded, item.content]
    .filter((value): value is string => typeof value === 'string' && value.length > 0)
    .map((value) => ({ value }));

  return {
    title: item.title,
    link: item.link,
    summary: item.summary ?? item.description,
    content,
    published,
    publishedParsed: published ? isoDate : undefined,
    updated,
    updatedParsed: !published && updated ? isoDate : undefined,
  };
}

/**
 * Fetch entries from a single feed. Never rejects: failures come back as
 * `{ ok: false }` with no entries.
 */
export async function fetchFeed(url: string, parser: FeedParser): Promise<FetchResult> {
  try {
    logger.info({ url }, 'Fetching RSS feed');

    const result = await parser.parseURL(url);
    const entries = (result.items ?? []).map(toEntry);

    logger.info({ url, itemCount: entries.length }, 'RSS feed parsed');
    return { ok: true, entries };
  } catch (error) {
    logger.error({ error, url }, 'Failed to fetch RSS feed');
    return {
      ok: false,
      entries: [],
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
