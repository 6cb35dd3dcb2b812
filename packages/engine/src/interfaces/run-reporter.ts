import type { RunSummary } from '../types/index.js';

/**
 * Receives the summary of every committed pass. Failures are logged and do
 * not affect the committed run.
 */
export interface RunReporter {
  report(summary: RunSummary): void | Promise<void>;
}
