/**
 * Delta Classification Types
 */

import type { Record as DataRecord, VersionRow } from '@histrack/core';

/** Outcome of comparing one business key against the current slice */
export type DeltaOutcome = 'new' | 'changed' | 'unchanged' | 'removed';

export const DELTA_OUTCOMES: readonly DeltaOutcome[] = ['new', 'changed', 'unchanged', 'removed'];

interface ClassifiedBase {
  /** Canonical key identity */
  key: string;
  /** Business key column values */
  keyValues: DataRecord;
}

/** Key absent from the current slice */
export interface NewItem extends ClassifiedBase {
  outcome: 'new';
  record: DataRecord;
  fingerprint: string;
}

/** Key present with a different fingerprint */
export interface ChangedItem extends ClassifiedBase {
  outcome: 'changed';
  record: DataRecord;
  fingerprint: string;
  prior: VersionRow;
  /** Monitored attributes whose canonical value differs from the prior version */
  changedAttributes: string[];
}

/** Key present with an equal fingerprint */
export interface UnchangedItem extends ClassifiedBase {
  outcome: 'unchanged';
  record: DataRecord;
  fingerprint: string;
  prior: VersionRow;
}

/** Key current in history but absent from the source */
export interface RemovedItem extends ClassifiedBase {
  outcome: 'removed';
  prior: VersionRow;
}

export type ClassifiedItem = NewItem | ChangedItem | UnchangedItem | RemovedItem;

export type OutcomeCounts = Record<DeltaOutcome, number>;

export interface Classification {
  /** Source keys in source order, then removed keys */
  items: ClassifiedItem[];
  counts: OutcomeCounts;
  /** Number of source records */
  sourceCount: number;
  /** Number of current history rows */
  currentCount: number;
}
