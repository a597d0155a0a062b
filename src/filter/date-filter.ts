/**
 * Date Filter
 *
 * Keeps entries published within a recency window and orders merged
 * entries newest first
 */

import { logger } from '../utils/logger.js';
import { isValidDate, parseDateText } from '../utils/date.js';
import type { Entry } from '../types/index.js';

const MS_PER_WEEK = 7 * 24 * 60 * 60 * 1000;

type DateSource = (entry: Entry) => Date | undefined;

/**
 * Date sources in priority order; the first that yields a date wins
 */
const DATE_SOURCES: readonly DateSource[] = [
  (entry) => (isValidDate(entry.publishedParsed) ? entry.publishedParsed : undefined),
  (entry) => parseDateText(entry.published),
  (entry) => (isValidDate(entry.updatedParsed) ? entry.updatedParsed : undefined),
  (entry) => parseDateText(entry.updated),
];

/**
 * Resolve the date used for filtering and ordering an entry
 */
export function resolveEffectiveDate(entry: Entry): Date | undefined {
  for (const source of DATE_SOURCES) {
    const date = source(entry);
    if (date) {
      return date;
    }
  }
  return undefined;
}

export function getCutoffDate(weeksAgo: number, now: Date = new Date()): Date {
  return new Date(now.getTime() - weeksAgo * MS_PER_WEEK);
}

/**
 * Keep entries whose effective date is on or after `now - weeksAgo`.
 * Entries without a usable date are dropped. Input order is preserved.
 */
export function filterEntriesByDate(
  entries: readonly Entry[],
  weeksAgo: number,
  now: Date = new Date()
): Entry[] {
  const cutoff = getCutoffDate(weeksAgo, now).getTime();
  const kept: Entry[] = [];
  let undated = 0;

  for (const entry of entries) {
    const date = resolveEffectiveDate(entry);
    if (!date) {
      undated++;
      logger.debug({ title: entry.title, link: entry.link }, 'Skipping entry without a parseable date');
      continue;
    }
    if (date.getTime() >= cutoff) {
      kept.push(entry);
    }
  }

  logger.debug(
    { total: entries.length, kept: kept.length, undated, weeksAgo, cutoff: new Date(cutoff).toISOString() },
    'Entries filtered by date'
  );

  return kept;
}

/**
 * Sort newest first. Undated entries count as the epoch and sink to the end.
 */
export function sortEntriesByDate(entries: readonly Entry[]): Entry[] {
  return entries
    .map((entry) => ({ entry, time: resolveEffectiveDate(entry)?.getTime() ?? 0 }))
    .sort((a, b) => b.time - a.time)
    .map(({ entry }) => entry);
}
