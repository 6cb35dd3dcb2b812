export type { ConnectorConfig, ConnectionState, IConnector } from './connector.js';
export type { ISourceReader } from './source-reader.js';
export type {
  HistoryStoreConfig,
  IHistoryStore,
  IHistoryTransaction,
} from './history-store.js';
