/**
 * Versioned history types
 */

import type { Record as DataRecord } from './record.js';

/** Names of the audit columns of a history table */
export interface HistoryColumns {
  /** Fingerprint of the monitored attributes */
  rowHash: string;
  /** Inclusive start of the validity interval */
  validFrom: string;
  /** Exclusive end of the validity interval */
  validTo: string;
  /** Current-version flag */
  isCurrent: string;
}

export const DEFAULT_HISTORY_COLUMNS: Readonly<HistoryColumns> = Object.freeze({
  rowHash: 'row_hash',
  validFrom: 'valid_from',
  validTo: 'valid_to',
  isCurrent: 'is_current',
});

/**
 * How a history table stores validity timestamps as text:
 * `iso` is 2026-01-19T10:00:00.000Z, `sql` is 2026-01-19 10:00:00.000 (UTC).
 */
export type TimestampFormat = 'iso' | 'sql';

/**
 * "Infinite future" sentinel stored in valid_to while a version is current.
 */
export const END_OF_TIME: Date = new Date('9999-12-31T23:59:59.999Z');

/** One historical instance of an entity */
export interface VersionRow {
  /** Business key column values */
  keyValues: DataRecord;
  /** Business attributes as of this version (audit columns excluded) */
  attributes: DataRecord;
  /** Stored fingerprint */
  fingerprint: string;
  validFrom: Date;
  validTo: Date;
  isCurrent: boolean;
  /** valid_from exactly as the store returned it */
  storedValidFrom?: string | Date;
}

/** Arguments for closing the current version of a key */
export interface CloseOutRequest {
  keyValues: DataRecord;
  /** valid_from of the row expected to be current */
  validFrom: Date;
  /** Stored form of validFrom; matched verbatim by the guard when given */
  storedValidFrom?: string | Date;
  /** Timestamp written to valid_to */
  asOf: Date;
}

/** A new version to be inserted */
export interface VersionInsert {
  attributes: DataRecord;
  fingerprint: string;
  validFrom: Date;
  validTo: Date;
}
