/**
 * Version Merger
 *
 * Applies classified items to a history table:
 *   new       → insert [asOf, ∞)
 *   changed   → close prior at asOf, insert [asOf, ∞)
 *   unchanged → nothing
 *   removed   → close prior at asOf
 * A changed key's close-out and insert always run in the same transaction.
 */

import type {
  IHistoryStore,
  IHistoryTransaction,
  Logger,
  Record as DataRecord,
  VersionRow,
} from '@histrack/core';
import { END_OF_TIME } from '@histrack/core';
import type { ClassifiedItem, MergeResult } from '../types/index.js';
import { ScdError, fromStorageError } from '../errors/index.js';
import { formatKey } from '../formatters/utils.js';
import type { RunContext } from '../run/run-context.js';
import { withTransaction } from './transaction.js';

export interface VersionMergerOptions {
  logger?: Logger;
}

export class VersionMerger {
  constructor(private readonly options: VersionMergerOptions = {}) {}

  /**
   * Apply every item inside a single transaction. Nothing is written when
   * all items are unchanged.
   */
  async applyAll(
    store: IHistoryStore,
    items: readonly ClassifiedItem[],
    context: RunContext
  ): Promise<MergeResult[]> {
    const pending = items.filter((item) => item.outcome !== 'unchanged');
    if (pending.length === 0) {
      return items.map((item) => emptyResult(item));
    }

    return withTransaction(
      store,
      async (tx) => {
        const results: MergeResult[] = [];
        for (const item of items) {
          results.push(await this.apply(tx, item, context));
        }
        return results;
      },
      this.options.logger
    );
  }

  /**
   * Apply one item within an open transaction.
   *
   * @throws ScdError INVARIANT_VIOLATION if asOf does not advance past the prior version
   * @throws ScdError TRANSACTION_CONFLICT if the prior version is no longer current
   */
  async apply(
    tx: IHistoryTransaction,
    item: ClassifiedItem,
    context: RunContext
  ): Promise<MergeResult> {
    switch (item.outcome) {
      case 'unchanged':
        return emptyResult(item);

      case 'new':
        await this.insert(tx, item.keyValues, item.record, item.fingerprint, context);
        return { key: item.key, outcome: item.outcome, closedOut: 0, inserted: 1 };

      case 'changed':
        await this.closeOut(tx, item.prior, context);
        await this.insert(tx, item.keyValues, item.record, item.fingerprint, context);
        return { key: item.key, outcome: item.outcome, closedOut: 1, inserted: 1 };

      case 'removed':
        await this.closeOut(tx, item.prior, context);
        return { key: item.key, outcome: item.outcome, closedOut: 1, inserted: 0 };
    }
  }

  private async closeOut(
    tx: IHistoryTransaction,
    prior: VersionRow,
    context: RunContext
  ): Promise<void> {
    const key = formatKey(prior.keyValues);

    if (prior.validFrom.getTime() >= context.asOf.getTime()) {
      throw new ScdError({
        code: 'INVARIANT_VIOLATION',
        message: `As-of ${context.asOf.toISOString()} does not advance past the current version of key ${key} (valid from ${prior.validFrom.toISOString()})`,
        suggestion: 'Use a later as-of timestamp; validity intervals must strictly advance per key.',
        context: { key, asOf: context.asOf.toISOString(), validFrom: prior.validFrom.toISOString() },
      });
    }

    let closed: number;
    try {
      closed = await tx.closeOut({
        keyValues: prior.keyValues,
        validFrom: prior.validFrom,
        storedValidFrom: prior.storedValidFrom,
        asOf: context.asOf,
      });
    } catch (err) {
      throw fromStorageError(err, `Close out key ${key}`);
    }

    if (closed !== 1) {
      throw new ScdError({
        code: 'TRANSACTION_CONFLICT',
        message: `Expected to close 1 current version of key ${key}, closed ${closed}`,
        suggestion: 'Another writer changed the history table during the run. Re-run the pass.',
        context: { key, closed },
      });
    }
  }

  private async insert(
    tx: IHistoryTransaction,
    keyValues: DataRecord,
    record: DataRecord,
    fingerprint: string,
    context: RunContext
  ): Promise<void> {
    try {
      await tx.insertVersion({
        attributes: record,
        fingerprint,
        validFrom: context.asOf,
        validTo: END_OF_TIME,
      });
    } catch (err) {
      throw fromStorageError(err, `Insert version of key ${formatKey(keyValues)}`);
    }
  }
}

function emptyResult(item: ClassifiedItem): MergeResult {
  return { key: item.key, outcome: item.outcome, closedOut: 0, inserted: 0 };
}
