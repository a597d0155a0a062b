/**
 * Feed Registry
 *
 * Loads the feed list (display name -> URL) from a JSON file
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { DEFAULT_FEEDS } from '../config/feeds.js';
import { logger } from '../utils/logger.js';
import type { Feed, FeedSortMode } from '../types/index.js';

const feedFileSchema = z.record(z.string(), z.string());

function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load feeds from a JSON file. Returns an empty list when the file is
 * missing, unreadable or not an object of string URLs.
 */
export async function loadFeedRegistry(path: string): Promise<Feed[]> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (isFileNotFound(error)) {
      logger.warn({ path }, 'RSS feeds file not found');
    } else {
      logger.warn({ error, path }, 'Failed to read RSS feeds file');
    }
    return [];
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    logger.warn({ error, path }, 'RSS feeds file is not valid JSON');
    return [];
  }

  const parsed = feedFileSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn({ path, issues: parsed.error.issues }, 'RSS feeds file must map names to URLs');
    return [];
  }

  return Object.entries(parsed.data).map(([name, url]) => ({ name, url }));
}

/**
 * Load feeds, substituting `defaults` when none are available
 */
export async function resolveFeeds(path: string, defaults: readonly Feed[] = DEFAULT_FEEDS): Promise<Feed[]> {
  const feeds = await loadFeedRegistry(path);
  if (feeds.length > 0) {
    logger.info({ path, feedCount: feeds.length }, 'Loaded RSS feeds');
    return feeds;
  }

  logger.warn({ path, feedCount: defaults.length }, 'Using default RSS feeds');
  return defaults.map((feed) => ({ ...feed }));
}

function compareNames(a: Feed, b: Feed): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

export function sortFeeds(feeds: readonly Feed[], mode: FeedSortMode): Feed[] {
  switch (mode) {
    case 'asc':
      return [...feeds].sort(compareNames);
    case 'desc':
      return [...feeds].sort((a, b) => compareNames(b, a));
    case 'original':
      return [...feeds];
  }
}
