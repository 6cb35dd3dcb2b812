/**
 * Helpers for history table layouts
 */

import { ConnectorError } from '../errors/index.js';
import { DEFAULT_HISTORY_COLUMNS, type HistoryColumns } from '../types/index.js';

/**
 * Fill in default audit column names and check they are distinct
 */
export function resolveHistoryColumns(columns?: Partial<HistoryColumns>): HistoryColumns {
  const resolved: HistoryColumns = { ...DEFAULT_HISTORY_COLUMNS, ...(columns ?? {}) };
  const names = Object.values(resolved);

  if (new Set(names).size !== names.length) {
    throw new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message: `History audit columns must be distinct: ${names.join(', ')}`,
    });
  }

  return resolved;
}

/**
 * Read a current-version flag as stored by any driver (boolean, 0/1, text)
 */
export function parseFlag(value: unknown, field = 'is_current'): boolean {
  if (value === true || value === 1 || value === 1n) return true;
  if (value === false || value === 0 || value === 0n) return false;

  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 't', 'true'].includes(normalized)) return true;
    if (['0', 'f', 'false'].includes(normalized)) return false;
  }

  throw new ConnectorError({
    code: 'READ_FAILED',
    message: `Invalid ${field} value: ${String(value)}`,
    suggestion: 'The current-version flag must be stored as 1/0 or a boolean.',
  });
}
