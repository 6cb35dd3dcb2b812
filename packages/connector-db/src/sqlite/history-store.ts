/**
 * SQLite History Store
 *
 * Validity timestamps are TEXT in ISO-8601 UTC, the current flag an INTEGER.
 */

import type { FieldType } from '@histrack/core';
import { BaseSqlHistoryStore, type SqlHistoryStoreConfig } from '../shared/base-history-store.js';
import type { SqlClient } from '../shared/sql-client.js';
import { SqliteClient, sqliteDialect, type SqliteClientConfig } from './client.js';

export interface SqliteHistoryStoreConfig extends Omit<SqlHistoryStoreConfig, 'schema'>, SqliteClientConfig {
  type: 'sqlite';
}

/** Declared column types by affinity */
export const SQLITE_TYPE_MAP: Readonly<Record<string, FieldType>> = {
  integer: 'integer',
  int: 'integer',
  bigint: 'integer',
  real: 'number',
  double: 'number',
  numeric: 'number',
  decimal: 'number',
  text: 'string',
  varchar: 'string',
  boolean: 'boolean',
  date: 'date',
  datetime: 'datetime',
  timestamp: 'datetime',
};

export class SqliteHistoryStore extends BaseSqlHistoryStore<SqliteHistoryStoreConfig> {
  constructor(config: Omit<SqliteHistoryStoreConfig, 'type'> & { type?: 'sqlite' }) {
    super({ ...config, type: 'sqlite' }, sqliteDialect, SQLITE_TYPE_MAP);
  }

  protected createClient(): SqlClient {
    return new SqliteClient(this.config);
  }
}

/**
 * Factory function to create a SQLite history store
 */
export function createSqliteHistoryStore(config: Omit<SqliteHistoryStoreConfig, 'type'>): SqliteHistoryStore {
  return new SqliteHistoryStore(config);
}
