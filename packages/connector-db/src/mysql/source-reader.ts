/**
 * MySQL Source Reader
 */

import { BaseSqlSourceReader, type SqlSourceConfig } from '../shared/base-source-reader.js';
import type { SqlClient } from '../shared/sql-client.js';
import { MySQLClient, mysqlDialect, type MySQLClientConfig } from './client.js';

export interface MySQLSourceConfig extends SqlSourceConfig, MySQLClientConfig {
  type: 'mysql';
}

export class MySQLSourceReader extends BaseSqlSourceReader<MySQLSourceConfig> {
  constructor(config: Omit<MySQLSourceConfig, 'type'> & { type?: 'mysql' }) {
    super({ ...config, type: 'mysql' }, mysqlDialect);
  }

  protected createClient(): SqlClient {
    return new MySQLClient(this.config);
  }
}

/**
 * Factory function to create a MySQL source reader
 */
export function createMySQLSourceReader(config: Omit<MySQLSourceConfig, 'type'>): MySQLSourceReader {
  return new MySQLSourceReader(config);
}
