/**
 * Run Types
 */

import type { ClassifiedItem, DeltaOutcome, OutcomeCounts } from './classification.js';

/** Lifecycle of one pass */
export type RunState =
  | 'idle'
  | 'extracting'
  | 'classifying'
  | 'merging'
  | 'committed'
  | 'aborted';

/** Mutations applied for one classified key */
export interface MergeResult {
  key: string;
  outcome: DeltaOutcome;
  /** Rows closed out (0 or 1) */
  closedOut: number;
  /** Rows inserted (0 or 1) */
  inserted: number;
}

export interface MutationCounts {
  closedOut: number;
  inserted: number;
}

/** Result of a committed pass */
export interface RunSummary {
  runId: string;
  state: 'committed';
  /** Boundary timestamp shared by every mutation of the pass */
  asOf: Date;
  counts: OutcomeCounts;
  /** Source records processed */
  totalProcessed: number;
  /** Display keys per outcome */
  keys: Record<DeltaOutcome, string[]>;
  mutations: MutationCounts;
  durationMs: number;
}

/** Result of a classification-only pass */
export interface RunPreview {
  runId: string;
  asOf: Date;
  counts: OutcomeCounts;
  totalProcessed: number;
  keys: Record<DeltaOutcome, string[]>;
  items: ClassifiedItem[];
  durationMs: number;
}
