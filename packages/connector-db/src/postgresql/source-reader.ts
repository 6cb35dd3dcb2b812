/**
 * PostgreSQL Source Reader
 */

import { BaseSqlSourceReader, type SqlSourceConfig } from '../shared/base-source-reader.js';
import type { SqlClient } from '../shared/sql-client.js';
import { PostgresClient, postgresDialect, type PostgresClientConfig } from './client.js';

export interface PostgresSourceConfig extends SqlSourceConfig, PostgresClientConfig {
  type: 'postgresql';
}

export class PostgresSourceReader extends BaseSqlSourceReader<PostgresSourceConfig> {
  constructor(config: Omit<PostgresSourceConfig, 'type'> & { type?: 'postgresql' }) {
    super({ ...config, type: 'postgresql' }, postgresDialect);
  }

  protected createClient(): SqlClient {
    return new PostgresClient(this.config);
  }
}

/**
 * Factory function to create a PostgreSQL source reader
 */
export function createPostgresSourceReader(config: Omit<PostgresSourceConfig, 'type'>): PostgresSourceReader {
  return new PostgresSourceReader(config);
}
