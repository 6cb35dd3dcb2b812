/**
 * Canonical timestamp handling for validity intervals.
 *
 * Timestamps are persisted as ISO-8601 UTC text with millisecond precision,
 * which sorts the same way as the instants it encodes.
 */

import { ConnectorError } from '../errors/index.js';

/** "YYYY-MM-DD HH:MM:SS[.fff]" without zone, read as UTC */
const LEGACY_TIMESTAMP = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}(\.\d+)?$/;

export function formatTimestamp(date: Date): string {
  return date.toISOString();
}

/** "YYYY-MM-DD HH:MM:SS.fff" in UTC; sorts with the legacy second-precision form */
export function formatSqlTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').replace('Z', '');
}

/**
 * Parse a persisted timestamp. Accepts Date objects (drivers that map
 * timestamp columns), ISO text, the legacy space-separated form and epoch
 * milliseconds.
 */
export function parseTimestamp(value: unknown, field = 'timestamp'): Date {
  let parsed: Date | undefined;

  if (value instanceof Date) {
    parsed = new Date(value.getTime());
  } else if (typeof value === 'string') {
    const text = LEGACY_TIMESTAMP.test(value) ? `${value.replace(' ', 'T')}Z` : value;
    parsed = new Date(text);
  } else if (typeof value === 'number') {
    parsed = new Date(value);
  }

  if (!parsed || Number.isNaN(parsed.getTime())) {
    throw new ConnectorError({
      code: 'READ_FAILED',
      message: `Invalid ${field} value: ${String(value)}`,
      suggestion: 'Store validity timestamps as ISO-8601 text, e.g. 2026-01-19T10:00:00.000Z.',
    });
  }

  return parsed;
}

const END_OF_TIME_DAY = Date.UTC(9999, 11, 31);

/**
 * True for any instant on 9999-12-31, so sentinels written at second
 * precision (9999-12-31 23:59:59) count as open ended too
 */
export function isEndOfTime(date: Date): boolean {
  return date.getTime() >= END_OF_TIME_DAY;
}

/** The later of two instants; undefined counts as the distant past */
export function laterOf(a: Date | undefined, b: Date | undefined): Date | undefined {
  if (!a) return b;
  if (!b) return a;
  return a.getTime() >= b.getTime() ? a : b;
}
