/**
 * History Auditor
 *
 * Checks the temporal shape of a history table: at most one current row per
 * key, current rows open ended, intervals well formed and non-overlapping.
 */

import type { IHistoryStore, VersionRow } from '@histrack/core';
import { isEndOfTime, toKeyFields } from '@histrack/core';
import type { HistoryAuditReport, HistoryIssue } from '../types/index.js';
import { fromStorageError } from '../errors/index.js';
import { encodeKey } from '../fingerprint/index.js';
import { formatKey } from '../formatters/utils.js';

function groupByKey(rows: readonly VersionRow[], keyFields: readonly string[]): Map<string, VersionRow[]> {
  const groups = new Map<string, VersionRow[]>();
  for (const row of rows) {
    const key = encodeKey(row.keyValues, keyFields);
    const group = groups.get(key);
    if (group) {
      group.push(row);
    } else {
      groups.set(key, [row]);
    }
  }
  return groups;
}

function auditKey(versions: readonly VersionRow[], issues: HistoryIssue[]): void {
  const ordered = [...versions].sort((a, b) => a.validFrom.getTime() - b.validFrom.getTime());
  const [first] = ordered;
  if (!first) return;
  const key = formatKey(first.keyValues);

  const current = ordered.filter((row) => row.isCurrent);
  if (current.length > 1) {
    issues.push({
      kind: 'multiple-current',
      key,
      message: `Key ${key} has ${current.length} current rows`,
    });
  }

  let previous: VersionRow | undefined;
  for (const row of ordered) {
    const open = isEndOfTime(row.validTo);
    if (row.isCurrent !== open) {
      issues.push({
        kind: 'current-not-open',
        key,
        validFrom: row.validFrom,
        message: row.isCurrent
          ? `Current row of key ${key} ends at ${row.validTo.toISOString()}`
          : `Row of key ${key} from ${row.validFrom.toISOString()} is open ended but not current`,
      });
    }

    if (row.validTo.getTime() <= row.validFrom.getTime()) {
      issues.push({
        kind: 'inverted-interval',
        key,
        validFrom: row.validFrom,
        message: `Row of key ${key} ends (${row.validTo.toISOString()}) before it starts (${row.validFrom.toISOString()})`,
      });
    }

    if (previous) {
      const previousEnd = previous.validTo.getTime();
      const start = row.validFrom.getTime();
      if (start < previousEnd) {
        issues.push({
          kind: 'overlap',
          key,
          validFrom: row.validFrom,
          message: `Row of key ${key} from ${row.validFrom.toISOString()} overlaps the previous version ending ${previous.validTo.toISOString()}`,
        });
      } else if (start > previousEnd) {
        issues.push({
          kind: 'gap',
          key,
          validFrom: row.validFrom,
          message: `Key ${key} has no version between ${previous.validTo.toISOString()} and ${row.validFrom.toISOString()}`,
        });
      }
    }
    previous = row;
  }
}

/**
 * Audit a set of version rows
 */
export function auditHistory(
  rows: readonly VersionRow[],
  businessKey: string | readonly string[]
): HistoryAuditReport {
  const groups = groupByKey(rows, toKeyFields(businessKey));
  const issues: HistoryIssue[] = [];

  for (const versions of groups.values()) {
    auditKey(versions, issues);
  }

  return {
    keyCount: groups.size,
    versionCount: rows.length,
    currentCount: rows.filter((row) => row.isCurrent).length,
    issues,
    consistent: issues.every((issue) => issue.kind === 'gap'),
  };
}

export class HistoryAuditor {
  constructor(private readonly store: IHistoryStore) {}

  /**
   * Audit the whole table, or one key
   */
  async audit(keyValues?: Parameters<IHistoryStore['fetchVersions']>[0]): Promise<HistoryAuditReport> {
    let rows: VersionRow[];
    try {
      rows = await this.store.fetchVersions(keyValues);
    } catch (err) {
      throw fromStorageError(err, 'Read history versions');
    }
    return auditHistory(rows, this.store.config.businessKey);
  }
}
