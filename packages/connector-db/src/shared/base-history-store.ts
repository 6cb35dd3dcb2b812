/**
 * Base History Store
 *
 * IHistoryStore over any SqlClient. Dialects supply the client, the SQL
 * spelling and the native type map.
 */

import type {
  CloseOutRequest,
  ConnectionState,
  FieldDefinition,
  FieldType,
  HistoryStoreConfig,
  IHistoryStore,
  IHistoryTransaction,
  Record as DataRecord,
  Schema,
  VersionInsert,
  VersionRow,
} from '@histrack/core';
import { ConnectorError, laterOf, resolveHistoryColumns, toKeyFields } from '@histrack/core';
import { errorMessage } from './driver-errors.js';
import { latestFrom, rowToVersion } from './history-rows.js';
import { HistoryStatements, type HistoryLayout, type SqlStatement } from './history-statements.js';
import type { SqlClient, SqlDialect, SqlTransaction } from './sql-client.js';

export interface SqlHistoryStoreConfig extends HistoryStoreConfig {
  /** Database schema (PostgreSQL) */
  schema?: string;
}

export abstract class BaseSqlHistoryStore<TConfig extends SqlHistoryStoreConfig>
  implements IHistoryStore<TConfig>
{
  readonly config: TConfig;
  protected _state: ConnectionState = 'disconnected';
  protected _client: SqlClient | null = null;
  private _schema: Schema | null = null;
  protected readonly layout: HistoryLayout;
  private readonly statements: HistoryStatements;

  constructor(
    config: TConfig,
    protected readonly dialect: SqlDialect,
    private readonly typeMap: Readonly<Record<string, FieldType>>
  ) {
    this.config = config;
    this.layout = {
      keyFields: toKeyFields(config.businessKey),
      columns: resolveHistoryColumns(config.columns),
    };
    this.statements = new HistoryStatements(dialect, config.table, this.layout, config.schema, config.timestampFormat);
  }

  get state(): ConnectionState {
    return this._state;
  }

  /** Create the driver client for this store */
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
    this._schema = null;
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

  async getSchema(forceRefresh = false): Promise<Schema> {
    const client = this.ensureConnected();

    if (this._schema && !forceRefresh) {
      return this._schema;
    }

    const columns = await client.getColumns(this.config.table, this.config.schema);
    if (columns.length === 0) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `History table "${this.config.table}" does not exist or has no columns`,
        connectorId: this.config.id,
        suggestion: 'Create the history table with the business key, attribute and audit columns.',
      });
    }

    const fields: FieldDefinition[] = columns.map((col) => ({
      name: col.name,
      type: this.typeMap[col.dataType.toLowerCase()] ?? 'string',
      required: !col.isNullable && !col.columnDefault,
      description: `${col.dataType}${col.isPrimaryKey ? ' (primary key)' : ''}`,
    }));
    const primaryKey = columns.filter((col) => col.isPrimaryKey).map((col) => col.name);

    this._schema = {
      name: this.config.table,
      description: `${this.dialect.name} history table: ${this.config.table}`,
      fields,
      primaryKey: primaryKey.length > 0 ? primaryKey : undefined,
      inferred: true,
    };

    return this._schema;
  }

  async fetchCurrent(): Promise<VersionRow[]> {
    return this.readVersions(this.statements.selectCurrent());
  }

  async fetchVersions(keyValues?: DataRecord): Promise<VersionRow[]> {
    return this.readVersions(this.statements.selectVersions(keyValues));
  }

  async fetchAt(at: Date): Promise<VersionRow[]> {
    return this.readVersions(this.statements.selectAt(at));
  }

  async latestBoundary(): Promise<Date | undefined> {
    const client = this.ensureConnected();
    const { validFrom, validTo } = this.layout.columns;

    const start = this.statements.selectLatestStart();
    const end = this.statements.selectLatestEnd();
    const latestStart = latestFrom((await client.query(start.sql, start.params)).rows, validFrom);
    const latestEnd = latestFrom((await client.query(end.sql, end.params)).rows, validTo);

    return laterOf(latestStart, latestEnd);
  }

  async beginTransaction(): Promise<IHistoryTransaction> {
    const client = this.ensureConnected();
    const schema = await this.getSchema();
    const tableColumns = schema.fields.map((field) => field.name);
    const tx = await client.begin();
    return new SqlHistoryTransaction(tx, this.statements, tableColumns, this.layout);
  }

  private async readVersions(statement: SqlStatement): Promise<VersionRow[]> {
    const client = this.ensureConnected();
    const result = await client.query(statement.sql, statement.params);
    return result.rows.map((row) => rowToVersion(row, this.layout));
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

/**
 * History transaction over a dedicated SQL connection
 */
class SqlHistoryTransaction implements IHistoryTransaction {
  private finished = false;

  constructor(
    private readonly tx: SqlTransaction,
    private readonly statements: HistoryStatements,
    private readonly tableColumns: readonly string[],
    private readonly layout: HistoryLayout
  ) {}

  async closeOut(request: CloseOutRequest): Promise<number> {
    const statement = this.statements.closeOut(request);
    const result = await this.executor().query(statement.sql, statement.params);
    return result.rowCount;
  }

  async insertVersion(version: VersionInsert): Promise<void> {
    const missing = this.layout.keyFields.filter((field) => !this.tableColumns.includes(field));
    if (missing.length > 0) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `History table is missing business key columns: ${missing.join(', ')}`,
      });
    }

    // source columns the history table does not keep are dropped
    const columns = this.tableColumns.filter((column) => Object.hasOwn(version.attributes, column));
    const statement = this.statements.insert(version, columns);
    await this.executor().query(statement.sql, statement.params);
  }

  async commit(): Promise<void> {
    await this.executor().commit();
    this.finished = true;
  }

  async rollback(): Promise<void> {
    if (this.finished) return;
    this.finished = true;
    await this.tx.rollback();
  }

  private executor(): SqlTransaction {
    if (this.finished) {
      throw new ConnectorError({
        code: 'TRANSACTION_FAILED',
        message: 'Transaction is already finished',
      });
    }
    return this.tx;
  }
}
