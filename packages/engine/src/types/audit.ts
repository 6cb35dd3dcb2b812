/**
 * History Audit Types
 */

export type HistoryIssueKind =
  /** More than one row flagged current */
  | 'multiple-current'
  /** Current row whose valid_to is not the sentinel, or an open row not flagged current */
  | 'current-not-open'
  /** valid_to <= valid_from */
  | 'inverted-interval'
  /** Interval starts before the previous one ends */
  | 'overlap'
  /** Interval starts after the previous one ends (expected after a removal and reappearance) */
  | 'gap';

export interface HistoryIssue {
  kind: HistoryIssueKind;
  /** Display key */
  key: string;
  message: string;
  /** valid_from of the offending row */
  validFrom?: Date;
}

export interface HistoryAuditReport {
  keyCount: number;
  versionCount: number;
  currentCount: number;
  issues: HistoryIssue[];
  /** True when no issue other than gaps was found */
  consistent: boolean;
}
