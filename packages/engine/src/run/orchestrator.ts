/**
 * Run Orchestrator
 *
 * Drives one pass: extract both snapshots, classify, merge in a single
 * transaction, then report.
 */

import { randomUUID } from 'node:crypto';
import type {
  EngineConfig,
  EngineConfigInput,
  IConnector,
  IHistoryStore,
  ISourceReader,
  Record as DataRecord,
  VersionRow,
} from '@histrack/core';
import {
  Logger,
  engineConfigSchema,
  formatZodIssues,
  resolveHistoryColumns,
  toKeyFields,
} from '@histrack/core';
import { DeltaClassifier } from '../changes/index.js';
import { ScdError, fromStorageError } from '../errors/index.js';
import { VersionMerger } from '../versioning/index.js';
import type {
  Classification,
  DeltaOutcome,
  MergeResult,
  RunPreview,
  RunSummary,
} from '../types/index.js';
import type { RunReporter } from '../interfaces/index.js';
import { formatKey } from '../formatters/utils.js';
import { MonotonicClock } from './clock.js';
import { createRunContext, type RunContext } from './run-context.js';
import { RunStateMachine, type RunStateListener } from './run-state.js';
import { withRetries, type RetryConfig } from './retry.js';
import { withTimeout } from './timeout.js';

export interface RunOrchestratorOptions {
  /** As-of source when a pass does not pin one */
  clock?: MonotonicClock;
  /** Retries for transient storage failures (default: a single attempt) */
  retry?: RetryConfig;
  /** Limit on each extraction read */
  extractTimeoutMs?: number;
  /** Check the history table has every configured column before extracting */
  verifyLayout?: boolean;
  logger?: Logger;
  reporter?: RunReporter;
  onStateChange?: RunStateListener;
}

export interface RunOnceOptions {
  /** Pin the pass boundary instead of reading the clock */
  asOf?: Date;
  runId?: string;
  /** Checked between phases up to the start of the merge */
  signal?: AbortSignal;
}

interface Snapshot {
  records: DataRecord[];
  current: VersionRow[];
  boundary: Date | undefined;
}

/**
 * Parse and check an engine configuration.
 *
 * @throws ScdError INVALID_CONFIGURATION
 */
export function parseEngineConfig(input: EngineConfigInput): EngineConfig {
  const parsed = engineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ScdError({
      code: 'INVALID_CONFIGURATION',
      message: formatZodIssues('Invalid engine configuration', parsed.error),
      context: { issues: parsed.error.issues },
    });
  }
  return parsed.data;
}

function isRetryable(err: unknown): boolean {
  return err instanceof ScdError && err.retryable;
}

function groupKeys(classification: Classification): Record<DeltaOutcome, string[]> {
  const keys: Record<DeltaOutcome, string[]> = { new: [], changed: [], unchanged: [], removed: [] };
  for (const item of classification.items) {
    keys[item.outcome].push(formatKey(item.keyValues));
  }
  return keys;
}

export class RunOrchestrator {
  private readonly config: EngineConfig;
  private readonly keyFields: string[];
  private readonly classifier: DeltaClassifier;
  private readonly merger: VersionMerger;
  private readonly clock: MonotonicClock;
  private readonly logger: Logger;

  /**
   * @throws ScdError INVALID_CONFIGURATION if the configuration is invalid or
   * its business key differs from the history store's
   */
  constructor(
    private readonly source: ISourceReader,
    private readonly history: IHistoryStore,
    config: EngineConfigInput,
    private readonly options: RunOrchestratorOptions = {}
  ) {
    this.config = parseEngineConfig(config);
    this.keyFields = toKeyFields(this.config.businessKey);

    const storeKey = toKeyFields(history.config.businessKey);
    if (storeKey.join('\u0000') !== this.keyFields.join('\u0000')) {
      throw new ScdError({
        code: 'INVALID_CONFIGURATION',
        message: `Business key (${this.keyFields.join(', ')}) does not match history table key (${storeKey.join(', ')})`,
        suggestion: 'Configure the same business key columns for the engine and the history table.',
      });
    }

    const auditColumns: string[] = Object.values(resolveHistoryColumns(history.config.columns));
    const clashes = [...this.keyFields, ...this.config.monitoredAttributes].filter((name) => auditColumns.includes(name));
    if (clashes.length > 0) {
      throw new ScdError({
        code: 'INVALID_CONFIGURATION',
        message: `Attributes collide with history audit columns: ${clashes.join(', ')}`,
        suggestion: 'Rename the audit columns through the history store configuration.',
      });
    }

    this.logger = options.logger ?? Logger.silent();
    this.clock = options.clock ?? new MonotonicClock();
    this.classifier = new DeltaClassifier(this.config);
    this.merger = new VersionMerger({ logger: this.logger });
  }

  /**
   * Execute one pass and commit it.
   *
   * @throws ScdError on any failure; nothing is committed in that case
   */
  async runOnce(runOptions: RunOnceOptions = {}): Promise<RunSummary> {
    const startedAt = Date.now();
    const runId = runOptions.runId ?? randomUUID();
    const log = this.logger.child({ runId });
    const machine = new RunStateMachine((next, previous) => {
      log.debug(`Run state ${previous} → ${next}`);
      this.options.onStateChange?.(next, previous);
    });

    try {
      machine.transition('extracting');
      this.checkAborted(runOptions.signal);
      const snapshot = await this.extract(log, runOptions.signal);
      const context = this.contextFor(snapshot, runOptions, runId);

      machine.transition('classifying');
      this.checkAborted(runOptions.signal);
      const classification = this.classify(snapshot, log);
      this.checkAdvances(classification, context, snapshot.boundary);

      // last cancellation point; the merge itself is atomic
      this.checkAborted(runOptions.signal);
      machine.transition('merging');
      const results = await this.merge(classification, context, log);

      machine.transition('committed');
      const summary = this.summarize(classification, results, context, startedAt);
      log.info('Run committed', {
        asOf: context.asOf,
        counts: summary.counts,
        mutations: summary.mutations,
        durationMs: summary.durationMs,
      });

      await this.report(summary, log);
      return summary;
    } catch (err) {
      const phase = machine.state;
      if (!machine.terminal) {
        machine.transition('aborted');
      }
      log.error('Run aborted', { phase, error: err });
      throw err;
    }
  }

  /**
   * Extract and classify without touching the history table
   */
  async preview(runOptions: RunOnceOptions = {}): Promise<RunPreview> {
    const startedAt = Date.now();
    const runId = runOptions.runId ?? randomUUID();
    const log = this.logger.child({ runId, dryRun: true });

    this.checkAborted(runOptions.signal);
    const snapshot = await this.extract(log, runOptions.signal);
    const context = this.contextFor(snapshot, runOptions, runId);
    this.checkAborted(runOptions.signal);
    const classification = this.classify(snapshot, log);
    this.checkAdvances(classification, context, snapshot.boundary);

    return {
      runId,
      asOf: context.asOf,
      counts: classification.counts,
      totalProcessed: classification.sourceCount,
      keys: groupKeys(classification),
      items: classification.items,
      durationMs: Date.now() - startedAt,
    };
  }

  private async extract(log: Logger, signal: AbortSignal | undefined): Promise<Snapshot> {
    this.requireConnected(this.source, 'Source');
    this.requireConnected(this.history, 'History store');

    if (this.options.verifyLayout) {
      await this.verifyHistoryLayout(log);
      this.checkAborted(signal);
    }

    const records = await this.read('Read source snapshot', () => this.source.fetchAll(), log);
    this.checkAborted(signal);
    const current = await this.read('Read current history', () => this.history.fetchCurrent(), log);
    const boundary = await this.read('Read latest history boundary', () => this.history.latestBoundary(), log);

    log.info('Snapshots extracted', { sourceRecords: records.length, currentVersions: current.length });
    return { records, current, boundary };
  }

  private contextFor(snapshot: Snapshot, runOptions: RunOnceOptions, runId: string): RunContext {
    const asOf = runOptions.asOf ?? this.clock.next(snapshot.boundary);
    return createRunContext(asOf, runId);
  }

  /**
   * Refuse an as-of earlier than a boundary already in history when the pass
   * writes anything; its rows would overlap closed intervals. An equal as-of
   * is allowed so that re-running a committed pass stays a no-op.
   */
  private checkAdvances(classification: Classification, context: RunContext, boundary: Date | undefined): void {
    if (!boundary || context.asOf.getTime() >= boundary.getTime()) return;

    const writes = classification.items.filter((item) => item.outcome !== 'unchanged');
    if (writes.length === 0) return;

    const keys = writes.map((item) => formatKey(item.keyValues));
    throw new ScdError({
      code: 'INVARIANT_VIOLATION',
      message: `As-of ${context.asOf.toISOString()} is earlier than the latest history boundary ${boundary.toISOString()}`,
      suggestion: 'Use an as-of at or after the latest boundary, or omit it to take the next instant from the clock.',
      context: { asOf: context.asOf.toISOString(), boundary: boundary.toISOString(), keys: keys.slice(0, 10) },
    });
  }

  private classify(snapshot: Snapshot, log: Logger): Classification {
    const classification = this.classifier.classify(snapshot.records, snapshot.current);

    if (log.isLevelEnabled('debug')) {
      for (const item of classification.items) {
        const extra: Record<string, unknown> = { key: formatKey(item.keyValues) };
        if (item.outcome === 'changed') {
          extra.changedAttributes = item.changedAttributes;
        }
        log.debug(`Classified ${item.outcome}`, extra);
      }
    }

    log.info('Snapshot classified', { counts: classification.counts });
    return classification;
  }

  private async merge(
    classification: Classification,
    context: RunContext,
    log: Logger
  ): Promise<MergeResult[]> {
    return withRetries(
      () => this.merger.applyAll(this.history, classification.items, context),
      this.options.retry,
      isRetryable,
      (err, next) => log.warn('Retrying merge after storage failure', { error: err, ...next })
    );
  }

  private async read<T>(operation: string, fn: () => Promise<T>, log: Logger): Promise<T> {
    return withRetries(
      async () => {
        try {
          return await withTimeout(
            fn(),
            this.options.extractTimeoutMs,
            () =>
              new ScdError({
                code: 'STORAGE_UNAVAILABLE',
                message: `${operation} timed out after ${this.options.extractTimeoutMs}ms`,
                suggestion: 'Increase run.extractTimeoutMs or check the storage latency.',
              })
          );
        } catch (err) {
          throw fromStorageError(err, operation);
        }
      },
      this.options.retry,
      isRetryable,
      (err, next) => log.warn(`Retrying: ${operation}`, { error: err, ...next })
    );
  }

  private async verifyHistoryLayout(log: Logger): Promise<void> {
    const schema = await this.read('Describe history table', () => this.history.getSchema(), log);
    const columns = resolveHistoryColumns(this.history.config.columns);
    const present = new Set(schema.fields.map((field) => field.name));
    const required = [
      ...this.keyFields,
      ...this.config.monitoredAttributes,
      columns.rowHash,
      columns.validFrom,
      columns.validTo,
      columns.isCurrent,
    ];
    const missing = required.filter((name) => !present.has(name));

    if (missing.length > 0) {
      throw new ScdError({
        code: 'INVALID_CONFIGURATION',
        message: `History table '${this.history.config.table}' is missing columns: ${missing.join(', ')}`,
        suggestion: 'Create the missing columns or fix the configured attribute names.',
        context: { table: this.history.config.table, missing },
      });
    }
  }

  private requireConnected(connector: IConnector, label: string): void {
    if (connector.state !== 'connected') {
      throw new ScdError({
        code: 'STORAGE_UNAVAILABLE',
        message: `${label} '${connector.config.id}' is not connected (state: ${connector.state})`,
        suggestion: 'Call connect() before running a pass.',
        retryable: false,
      });
    }
  }

  private checkAborted(signal: AbortSignal | undefined): void {
    if (!signal?.aborted) return;
    const reason: unknown = signal.reason;
    throw new ScdError({
      code: 'RUN_ABORTED',
      message: `Run aborted: ${reason instanceof Error ? reason.message : String(reason ?? 'cancelled')}`,
      cause: reason instanceof Error ? reason : undefined,
    });
  }

  private summarize(
    classification: Classification,
    results: readonly MergeResult[],
    context: RunContext,
    startedAt: number
  ): RunSummary {
    let closedOut = 0;
    let inserted = 0;
    for (const result of results) {
      closedOut += result.closedOut;
      inserted += result.inserted;
    }

    return {
      runId: context.runId,
      state: 'committed',
      asOf: context.asOf,
      counts: classification.counts,
      totalProcessed: classification.sourceCount,
      keys: groupKeys(classification),
      mutations: { closedOut, inserted },
      durationMs: Date.now() - startedAt,
    };
  }

  private async report(summary: RunSummary, log: Logger): Promise<void> {
    const reporter = this.options.reporter;
    if (!reporter) return;

    try {
      await reporter.report(summary);
    } catch (err) {
      log.warn('Run reporter failed; the run is committed', { error: err });
    }
  }
}

/**
 * Execute one pass with a fresh orchestrator
 */
export async function runOnce(
  source: ISourceReader,
  history: IHistoryStore,
  config: EngineConfigInput,
  options: RunOrchestratorOptions & RunOnceOptions = {}
): Promise<RunSummary> {
  const { asOf, runId, signal, ...orchestratorOptions } = options;
  return new RunOrchestrator(source, history, config, orchestratorOptions).runOnce({ asOf, runId, signal });
}
