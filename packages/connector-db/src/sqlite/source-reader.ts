/**
 * SQLite Source Reader
 */

import { BaseSqlSourceReader, type SqlSourceConfig } from '../shared/base-source-reader.js';
import type { SqlClient } from '../shared/sql-client.js';
import { SqliteClient, sqliteDialect, type SqliteClientConfig } from './client.js';

export interface SqliteSourceConfig extends Omit<SqlSourceConfig, 'schema'>, SqliteClientConfig {
  type: 'sqlite';
}

export class SqliteSourceReader extends BaseSqlSourceReader<SqliteSourceConfig> {
  constructor(config: Omit<SqliteSourceConfig, 'type'> & { type?: 'sqlite' }) {
    super({ ...config, type: 'sqlite' }, sqliteDialect);
  }

  protected createClient(): SqlClient {
    return new SqliteClient(this.config);
  }
}

/**
 * Factory function to create a SQLite source reader
 */
export function createSqliteSourceReader(config: Omit<SqliteSourceConfig, 'type'>): SqliteSourceReader {
  return new SqliteSourceReader(config);
}
