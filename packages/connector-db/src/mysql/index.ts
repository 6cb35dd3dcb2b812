/**
 * MySQL Connector
 *
 * Exports for MySQL history tables and source tables.
 */

export { MySQLClient, mysqlDialect, classifyMysqlError } from './client.js';
export type { MySQLClientConfig } from './client.js';

export { MySQLHistoryStore, createMySQLHistoryStore, MYSQL_TYPE_MAP } from './history-store.js';
export type { MySQLHistoryStoreConfig } from './history-store.js';

export { MySQLSourceReader, createMySQLSourceReader } from './source-reader.js';
export type { MySQLSourceConfig } from './source-reader.js';
