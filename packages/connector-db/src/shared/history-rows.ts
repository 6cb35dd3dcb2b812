/**
 * Mapping of history table rows to version rows
 */

import type { Record as DataRecord, VersionRow } from '@histrack/core';
import { ConnectorError, omitFields, parseFlag, parseTimestamp, pickFields } from '@histrack/core';
import type { HistoryLayout } from './history-statements.js';

export function rowToVersion(row: DataRecord, layout: HistoryLayout): VersionRow {
  const { rowHash, validFrom, validTo, isCurrent } = layout.columns;
  const hash = row[rowHash];
  const storedValidFrom = row[validFrom];

  if (typeof hash !== 'string' || hash.length === 0) {
    throw new ConnectorError({
      code: 'READ_FAILED',
      message: `History row has no ${rowHash} value`,
      context: { key: pickFields(row, layout.keyFields) },
    });
  }

  return {
    keyValues: pickFields(row, layout.keyFields),
    attributes: omitFields(row, [rowHash, validFrom, validTo, isCurrent]),
    fingerprint: hash,
    validFrom: parseTimestamp(storedValidFrom, validFrom),
    validTo: parseTimestamp(row[validTo], validTo),
    isCurrent: parseFlag(row[isCurrent], isCurrent),
    ...(typeof storedValidFrom === 'string' || storedValidFrom instanceof Date ? { storedValidFrom } : {}),
  };
}

/**
 * Read the single `latest` value of an aggregate query
 */
export function latestFrom(rows: readonly DataRecord[], field: string): Date | undefined {
  const value = rows[0]?.latest;
  if (value === null || value === undefined) return undefined;
  return parseTimestamp(value, field);
}
