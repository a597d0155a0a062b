/**
 * Scraper Module
 *
 * Feed list loading and RSS/Atom fetching
 */

export { createFeedParser, fetchFeed, toEntry } from './rss-fetcher.js';

export { loadFeedRegistry, resolveFeeds, sortFeeds } from './feed-registry.js';

export type { FeedParser, RawFeedItem, FeedItemFields } from './types.js';
