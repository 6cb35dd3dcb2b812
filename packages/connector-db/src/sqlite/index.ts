/**
 * SQLite Connector
 */

export { SqliteClient, sqliteDialect, classifySqliteError } from './client.js';
export type { SqliteClientConfig } from './client.js';

export { SqliteHistoryStore, createSqliteHistoryStore, SQLITE_TYPE_MAP } from './history-store.js';
export type { SqliteHistoryStoreConfig } from './history-store.js';

export { SqliteSourceReader, createSqliteSourceReader } from './source-reader.js';
export type { SqliteSourceConfig } from './source-reader.js';
