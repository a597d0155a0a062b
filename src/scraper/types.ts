/**
 * Scraper Types
 */

import type Parser from 'rss-parser';

/**
 * Item fields requested from rss-parser on top of its defaults
 */
export interface FeedItemFields {
  contentEncoded?: string;
  description?: string;
  published?: string;
  updated?: string;
}

/**
 * Raw item as returned by rss-parser
 */
export type RawFeedItem = Parser.Item & FeedItemFields;

/**
 * The part of rss-parser the fetcher relies on
 */
export interface FeedParser {
  parseURL(url: string): Promise<{ items: RawFeedItem[] }>;
}
