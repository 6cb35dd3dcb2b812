/**
 * PostgreSQL Connector
 *
 * Exports for PostgreSQL history tables and source tables.
 */

export { PostgresClient, postgresDialect, classifyPostgresError } from './client.js';
export type { PostgresClientConfig } from './client.js';

export { PostgresHistoryStore, createPostgresHistoryStore, POSTGRES_TYPE_MAP } from './history-store.js';
export type { PostgresHistoryStoreConfig } from './history-store.js';

export { PostgresSourceReader, createPostgresSourceReader } from './source-reader.js';
export type { PostgresSourceConfig } from './source-reader.js';
