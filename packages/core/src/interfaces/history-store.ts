/**
 * History Store Interface
 *
 * Read and write access to a versioned history table. All mutations go
 * through an explicit transaction handle.
 */

import type {
  Record,
  Schema,
  HistoryColumns,
  TimestampFormat,
  VersionRow,
  CloseOutRequest,
  VersionInsert,
} from '../types/index.js';
import type { ConnectorConfig, IConnector } from './connector.js';

/** Configuration common to all history stores */
export interface HistoryStoreConfig extends ConnectorConfig {
  /** History table name */
  table: string;
  /** Business key column(s) */
  businessKey: string | string[];
  /** Audit column names (defaults: row_hash, valid_from, valid_to, is_current) */
  columns?: Partial<HistoryColumns>;
  /** Text form of timestamps written to the table (default: iso) */
  timestampFormat?: TimestampFormat;
}

/**
 * Scoped transaction on a history table.
 *
 * Either `commit` or `rollback` ends the scope; the handle must not be used
 * afterwards.
 */
export interface IHistoryTransaction {
  /**
   * Close the current version of a key: valid_to = asOf, current flag off.
   * Only a row that is current and starts at `validFrom` is touched.
   * @returns number of rows closed
   */
  closeOut(request: CloseOutRequest): Promise<number>;

  /** Insert a new version row */
  insertVersion(version: VersionInsert): Promise<void>;

  commit(): Promise<void>;

  rollback(): Promise<void>;
}

export interface IHistoryStore<TConfig extends HistoryStoreConfig = HistoryStoreConfig>
  extends IConnector<TConfig> {
  /**
   * Describe the history table columns
   * @param forceRefresh - Re-read the catalog even if cached
   */
  getSchema(forceRefresh?: boolean): Promise<Schema>;

  /**
   * Rows whose current flag is set. Returned as a list so that duplicate
   * current rows stay visible to the caller.
   */
  fetchCurrent(): Promise<VersionRow[]>;

  /**
   * Every version, optionally restricted to one business key, ordered by
   * key and valid_from.
   */
  fetchVersions(keyValues?: Record): Promise<VersionRow[]>;

  /** Versions valid at `at` (valid_from <= at < valid_to) */
  fetchAt(at: Date): Promise<VersionRow[]>;

  /**
   * Latest interval boundary written so far: the greatest valid_from or
   * closed valid_to. Undefined for an empty table.
   */
  latestBoundary(): Promise<Date | undefined>;

  /** Open a transaction for a merge */
  beginTransaction(): Promise<IHistoryTransaction>;
}
