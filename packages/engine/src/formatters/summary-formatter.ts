/**
 * Run Summary Formatter
 *
 * Renders run results and audit reports as plain text.
 */

import type {
  DeltaOutcome,
  HistoryAuditReport,
  OutcomeCounts,
  RunPreview,
  RunSummary,
} from '../types/index.js';
import { DELTA_OUTCOMES } from '../types/index.js';
import { formatDuration, formatKey } from './utils.js';

const MAX_KEYS_LISTED = 10;

const OUTCOME_LABELS: Record<DeltaOutcome, string> = {
  new: 'New',
  changed: 'Changed',
  unchanged: 'Unchanged',
  removed: 'Removed',
};

function pushCounts(lines: string[], counts: OutcomeCounts, total: number): void {
  lines.push(`### Summary`);
  lines.push(`- Source Records: ${total}`);
  for (const outcome of DELTA_OUTCOMES) {
    lines.push(`- ${OUTCOME_LABELS[outcome]}: ${counts[outcome]}`);
  }
}

function pushKeys(lines: string[], keys: Record<DeltaOutcome, string[]>): void {
  for (const outcome of ['new', 'changed', 'removed'] as const) {
    const list = keys[outcome];
    if (list.length === 0) continue;
    lines.push('');
    lines.push(`### ${OUTCOME_LABELS[outcome]} Keys`);
    for (const key of list.slice(0, MAX_KEYS_LISTED)) {
      lines.push(`- ${key}`);
    }
    if (list.length > MAX_KEYS_LISTED) {
      lines.push(`... and ${list.length - MAX_KEYS_LISTED} more`);
    }
  }
}

/**
 * Format a committed run
 */
export function formatRunSummary(summary: RunSummary): string {
  const lines: string[] = [];

  lines.push(`## Run ${summary.runId}`);
  lines.push(`As of: ${summary.asOf.toISOString()}`);
  lines.push(`State: ${summary.state}`);
  lines.push(`Duration: ${formatDuration(summary.durationMs)}`);
  lines.push('');
  pushCounts(lines, summary.counts, summary.totalProcessed);
  lines.push(`- Versions Closed: ${summary.mutations.closedOut}`);
  lines.push(`- Versions Inserted: ${summary.mutations.inserted}`);
  pushKeys(lines, summary.keys);

  return lines.join('\n');
}

/**
 * Format a dry run
 */
export function formatRunPreview(preview: RunPreview): string {
  const lines: string[] = [];

  lines.push(`## Dry Run ${preview.runId}`);
  lines.push(`As of: ${preview.asOf.toISOString()}`);
  lines.push(`Duration: ${formatDuration(preview.durationMs)}`);
  lines.push('');
  pushCounts(lines, preview.counts, preview.totalProcessed);

  pushKeys(lines, preview.keys);

  const changed = preview.items.filter((item) => item.outcome === 'changed');
  if (changed.length > 0) {
    lines.push('');
    lines.push(`### Changed Attributes`);
    for (const item of changed.slice(0, MAX_KEYS_LISTED)) {
      lines.push(`- ${formatKey(item.keyValues)}: ${item.changedAttributes.join(', ')}`);
    }
    if (changed.length > MAX_KEYS_LISTED) {
      lines.push(`... and ${changed.length - MAX_KEYS_LISTED} more`);
    }
  }
  lines.push('');
  lines.push('No changes were written.');

  return lines.join('\n');
}

/**
 * Format a history audit report
 */
export function formatAuditReport(report: HistoryAuditReport): string {
  const lines: string[] = [];

  lines.push(`## History Audit`);
  lines.push(`- Keys: ${report.keyCount}`);
  lines.push(`- Versions: ${report.versionCount}`);
  lines.push(`- Current: ${report.currentCount}`);
  lines.push(`- Consistent: ${report.consistent ? 'yes' : 'no'}`);
  lines.push('');

  if (report.issues.length === 0) {
    lines.push(`### Issues`);
    lines.push(`No issues found.`);
    return lines.join('\n');
  }

  lines.push(`### Issues (${report.issues.length})`);
  for (const issue of report.issues.slice(0, 20)) {
    lines.push(`- [${issue.kind}] ${issue.message}`);
  }
  if (report.issues.length > 20) {
    lines.push(`... and ${report.issues.length - 20} more issues`);
  }

  return lines.join('\n');
}
