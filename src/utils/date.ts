/**
 * Date parsing helpers for feed timestamps
 */

// ISO 8601 date or date-time without an offset, e.g. "2024-01-03" or "2024-01-03 10:00:00"
const ISO_WITHOUT_ZONE = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)?$/;

// Trailing zone comment, e.g. "Wed, 03 Jan 2024 10:00:00 -0500 (EST)"
const ZONE_COMMENT = /\s*\([^)]*\)$/;

/**
 * True for a Date holding an actual point in time
 */
export function isValidDate(value: Date | undefined): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

/**
 * Permissive parser for feed date strings (RFC 822/2822, ISO 8601, and
 * anything else Date.parse accepts). Offset-less ISO strings are read as UTC.
 */
export function parseDateText(text: string | undefined): Date | undefined {
  if (!text) {
    return undefined;
  }

  let normalized = text.trim().replace(ZONE_COMMENT, '');
  if (!normalized) {
    return undefined;
  }

  if (ISO_WITHOUT_ZONE.test(normalized)) {
    normalized = normalized.length === 10 ? `${normalized}T00:00:00Z` : `${normalized.replace(' ', 'T')}Z`;
  }

  const ms = Date.parse(normalized);
  return Number.isNaN(ms) ? undefined : new Date(ms);
}
