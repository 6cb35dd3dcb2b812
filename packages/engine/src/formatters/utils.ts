/**
 * Formatter Utilities
 */

import type { Record as DataRecord } from '@histrack/core';

function formatValue(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Format business key values for display: the bare value for a single
 * column key, "col=value" pairs for a composite key.
 */
export function formatKey(keyValues: DataRecord): string {
  const entries = Object.entries(keyValues);
  const [first] = entries;
  if (entries.length === 1 && first) {
    return formatValue(first[1]);
  }
  return entries.map(([field, value]) => `${field}=${formatValue(value)}`).join(', ');
}

export function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(2)}s`;
}
