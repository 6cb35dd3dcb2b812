/**
 * PostgreSQL History Store
 */

import type { FieldType } from '@histrack/core';
import { BaseSqlHistoryStore, type SqlHistoryStoreConfig } from '../shared/base-history-store.js';
import type { SqlClient } from '../shared/sql-client.js';
import { PostgresClient, postgresDialect, type PostgresClientConfig } from './client.js';

export interface PostgresHistoryStoreConfig extends SqlHistoryStoreConfig, PostgresClientConfig {
  type: 'postgresql';
}

/** Map PostgreSQL types to our types */
export const POSTGRES_TYPE_MAP: Readonly<Record<string, FieldType>> = {
  // Numeric
  smallint: 'integer',
  integer: 'integer',
  bigint: 'integer',
  decimal: 'number',
  numeric: 'number',
  real: 'number',
  'double precision': 'number',
  // Text
  'character varying': 'string',
  character: 'string',
  text: 'string',
  uuid: 'string',
  // Boolean
  boolean: 'boolean',
  // Date/Time
  date: 'date',
  'timestamp without time zone': 'datetime',
  'timestamp with time zone': 'datetime',
  // JSON
  json: 'object',
  jsonb: 'object',
  array: 'object',
};

export class PostgresHistoryStore extends BaseSqlHistoryStore<PostgresHistoryStoreConfig> {
  constructor(config: Omit<PostgresHistoryStoreConfig, 'type'> & { type?: 'postgresql' }) {
    super({ ...config, type: 'postgresql' }, postgresDialect, POSTGRES_TYPE_MAP);
  }

  protected createClient(): SqlClient {
    return new PostgresClient(this.config);
  }
}

/**
 * Factory function to create a PostgreSQL history store
 */
export function createPostgresHistoryStore(
  config: Omit<PostgresHistoryStoreConfig, 'type'>
): PostgresHistoryStore {
  return new PostgresHistoryStore(config);
}
