/**
 * JSON Lines run log
 *
 * One line per committed pass, appended to a file that can be tailed or
 * shipped elsewhere.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import type { RunReporter, RunSummary } from '@histrack/engine';

export type RunLogEntry = {
  run_id: string;
  as_of: string;
  counts: RunSummary['counts'];
  total_processed: number;
  closed_out: number;
  inserted: number;
  duration_ms: number;
};

export function toRunLogEntry(summary: RunSummary): RunLogEntry {
  return {
    run_id: summary.runId,
    as_of: summary.asOf.toISOString(),
    counts: summary.counts,
    total_processed: summary.totalProcessed,
    closed_out: summary.mutations.closedOut,
    inserted: summary.mutations.inserted,
    duration_ms: summary.durationMs,
  };
}

export class JsonlRunReporter implements RunReporter {
  constructor(private readonly filePath: string) {}

  async report(summary: RunSummary): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
    await fs.appendFile(this.filePath, `${JSON.stringify(toRunLogEntry(summary))}\n`, 'utf-8');
  }
}
