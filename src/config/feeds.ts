/**
 * Built-in feeds used when no feed list file can be loaded
 */

import type { Feed } from '../types/index.js';

export const DEFAULT_FEEDS: readonly Feed[] = [
  { name: 'Stacker News', url: 'https://stacker.news/rss' },
  { name: 'Hacker News', url: 'https://news.ycombinator.com/rss' },
  { name: 'Bitcoin Magazine', url: 'https://bitcoinmagazine.com/.rss/full/' },
];
