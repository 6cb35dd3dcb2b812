/**
 * Transaction scope helper
 */

import type { IHistoryStore, IHistoryTransaction, Logger } from '@histrack/core';
import { fromStorageError } from '../errors/index.js';

/**
 * Run `work` inside one history transaction.
 *
 * Commits when `work` resolves; rolls back when `work` or the commit throws.
 * The original error is rethrown. A failed rollback is logged and does not
 * replace it.
 */
export async function withTransaction<T>(
  store: IHistoryStore,
  work: (tx: IHistoryTransaction) => Promise<T>,
  logger?: Logger
): Promise<T> {
  let tx: IHistoryTransaction;
  try {
    tx = await store.beginTransaction();
  } catch (err) {
    throw fromStorageError(err, 'Begin transaction');
  }

  let result: T;
  try {
    result = await work(tx);
  } catch (err) {
    await rollback(tx, logger);
    throw err;
  }

  try {
    await tx.commit();
  } catch (err) {
    await rollback(tx, logger);
    throw fromStorageError(err, 'Commit transaction');
  }

  return result;
}

async function rollback(tx: IHistoryTransaction, logger?: Logger): Promise<void> {
  try {
    await tx.rollback();
  } catch (rollbackError) {
    logger?.error('Rollback failed', { error: rollbackError });
  }
}
