/**
 * @histrack/connector-db
 *
 * Database history stores and source readers: PostgreSQL, MySQL, SQLite.
 */

export * from './postgresql/index.js';
export * from './mysql/index.js';
export * from './sqlite/index.js';

export { BaseSqlHistoryStore } from './shared/base-history-store.js';
export type { SqlHistoryStoreConfig } from './shared/base-history-store.js';
export { BaseSqlSourceReader } from './shared/base-source-reader.js';
export type { SqlSourceConfig } from './shared/base-source-reader.js';
export { HistoryStatements } from './shared/history-statements.js';
export type { HistoryLayout, SqlStatement } from './shared/history-statements.js';
export type {
  SqlClient,
  SqlColumn,
  SqlDialect,
  SqlExecutor,
  SqlResult,
  SqlTransaction,
  SqlValue,
} from './shared/sql-client.js';
