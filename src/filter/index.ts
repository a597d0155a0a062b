/**
 * Filter Module
 *
 * Recency filtering and date ordering of feed entries
 */

export {
  resolveEffectiveDate,
  getCutoffDate,
  filterEntriesByDate,
  sortEntriesByDate,
} from './date-filter.js';
