/**
 * MySQL History Store
 *
 * Expects DATETIME(3) validity columns and a TINYINT current flag.
 */

import type { FieldType } from '@histrack/core';
import { BaseSqlHistoryStore, type SqlHistoryStoreConfig } from '../shared/base-history-store.js';
import type { SqlClient } from '../shared/sql-client.js';
import { MySQLClient, mysqlDialect, type MySQLClientConfig } from './client.js';

export interface MySQLHistoryStoreConfig extends SqlHistoryStoreConfig, MySQLClientConfig {
  type: 'mysql';
}

/** Map MySQL types to our types */
export const MYSQL_TYPE_MAP: Readonly<Record<string, FieldType>> = {
  // Numeric
  tinyint: 'integer',
  smallint: 'integer',
  mediumint: 'integer',
  int: 'integer',
  bigint: 'integer',
  decimal: 'number',
  float: 'number',
  double: 'number',
  // Text
  char: 'string',
  varchar: 'string',
  tinytext: 'string',
  text: 'string',
  mediumtext: 'string',
  longtext: 'string',
  enum: 'string',
  // Boolean (MySQL uses tinyint(1))
  bit: 'boolean',
  // Date/Time
  date: 'date',
  datetime: 'datetime',
  timestamp: 'datetime',
  year: 'integer',
  // JSON
  json: 'object',
};

export class MySQLHistoryStore extends BaseSqlHistoryStore<MySQLHistoryStoreConfig> {
  constructor(config: Omit<MySQLHistoryStoreConfig, 'type'> & { type?: 'mysql' }) {
    super({ ...config, type: 'mysql' }, mysqlDialect, MYSQL_TYPE_MAP);
  }

  protected createClient(): SqlClient {
    return new MySQLClient(this.config);
  }
}

/**
 * Factory function to create a MySQL history store
 */
export function createMySQLHistoryStore(config: Omit<MySQLHistoryStoreConfig, 'type'>): MySQLHistoryStore {
  return new MySQLHistoryStore(config);
}
