/**
 * Base SQL Source Reader
 *
 * Reads a whole table (or a projection of it) as the source snapshot.
 */

import type {
  ConnectionState,
  ConnectorConfig,
  ISourceReader,
  Record as DataRecord,
} from '@histrack/core';
import { ConnectorError } from '@histrack/core';
import { errorMessage } from './driver-errors.js';
import { validateColumns, validateIdentifier } from './identifiers.js';
import type { SqlClient, SqlDialect } from './sql-client.js';

export interface SqlSourceConfig extends ConnectorConfig {
  /** Source table */
  table: string;
  /** Database schema (PostgreSQL) */
  schema?: string;
  /** Columns to read (default: all) */
  columns?: string[];
  /** Columns to order the snapshot by */
  orderBy?: string[];
}

export abstract class BaseSqlSourceReader<TConfig extends SqlSourceConfig> implements ISourceReader<TConfig> {
  readonly config: TConfig;
  protected _state: ConnectionState = 'disconnected';
  protected _client: SqlClient | null = null;
  private allowedColumns: Set<string> | null = null;

  constructor(config: TConfig, protected readonly dialect: SqlDialect) {
    validateIdentifier(config.table, 'table');
    if (config.schema !== undefined) validateIdentifier(config.schema, 'schema');
    this.config = config;
  }

  get state(): ConnectionState {
    return this._state;
  }

  protected abstract createClient(): SqlClient;

  async connect(): Promise<void> {
    this._state = 'connecting';

    try {
      this._client = this.createClient();
      await this._client.connect();
      this._state = 'connected';
    } catch (error) {
      this._state = 'error';
      this._client = null;

      if (error instanceof ConnectorError) {
        throw error;
      }

      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `Failed to connect to ${this.dialect.name}: ${errorMessage(error)}`,
        connectorId: this.config.id,
        suggestion: 'Check connection parameters and network connectivity.',
      });
    }
  }

  async disconnect(): Promise<void> {
    if (this._client) {
      await this._client.disconnect();
    }
    this._client = null;
    this.allowedColumns = null;
    this._state = 'disconnected';
  }

  async testConnection(): Promise<boolean> {
    if (!this._client) return false;
    try {
      await this._client.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  async fetchAll(): Promise<DataRecord[]> {
    const client = this.ensureConnected();
    const allowed = await this.getAllowedColumns(client);
    const { columns, orderBy } = this.config;

    if (columns?.length) validateColumns(columns, allowed, 'SELECT');
    if (orderBy?.length) validateColumns(orderBy, allowed, 'ORDER BY');

    const projection = columns?.length ? columns.map((c) => this.dialect.quote(c)).join(', ') : '*';
    let sql = `SELECT ${projection} FROM ${this.dialect.qualify(this.config.table, this.config.schema)}`;
    if (orderBy?.length) {
      sql += ` ORDER BY ${orderBy.map((c) => this.dialect.quote(c)).join(', ')}`;
    }

    const result = await client.query(sql);
    return result.rows;
  }

  private async getAllowedColumns(client: SqlClient): Promise<Set<string>> {
    if (this.allowedColumns) return this.allowedColumns;

    const columns = await client.getColumns(this.config.table, this.config.schema);
    if (columns.length === 0) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `Source table "${this.config.table}" does not exist or has no columns`,
        connectorId: this.config.id,
      });
    }
    this.allowedColumns = new Set(columns.map((c) => c.name));
    return this.allowedColumns;
  }

  protected ensureConnected(): SqlClient {
    if (this._state !== 'connected' || !this._client) {
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: 'Connector is not connected',
        connectorId: this.config.id,
        suggestion: 'Call connect() before performing operations.',
      });
    }
    return this._client;
  }
}
