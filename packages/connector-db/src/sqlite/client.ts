/**
 * SQLite Client
 *
 * Wrapper around better-sqlite3. Statements run synchronously on a single
 * connection; transactions take the write lock up front (BEGIN IMMEDIATE).
 */

import Database from 'better-sqlite3';
import type { ErrorCode } from '@histrack/core';
import { ConnectorError } from '@histrack/core';
import { driverError, errorCode, errorMessage } from '../shared/driver-errors.js';
import { validateIdentifier } from '../shared/identifiers.js';
import {
  isRecord,
  type SqlClient,
  type SqlColumn,
  type SqlDialect,
  type SqlResult,
  type SqlTransaction,
  type SqlValue,
} from '../shared/sql-client.js';

export interface SqliteClientConfig {
  /** Database file path (":memory:" for a private in-memory database) */
  filename: string;
  /** Open read-only; the file must exist */
  readonly?: boolean;
  /** How long to wait for a lock held by another connection (default: 5000ms) */
  busyTimeoutMs?: number;
}

export const sqliteDialect: SqlDialect = {
  name: 'sqlite',
  quote: (identifier) => `"${identifier}"`,
  placeholder: () => '?',
  qualify: (table) => `"${table}"`,
  bindTimestamp: (date) => date.toISOString(),
};

/**
 * Map a better-sqlite3 failure to a connector error code
 */
export function classifySqliteError(error: unknown, fallback: ErrorCode): ErrorCode {
  const code = errorCode(error) ?? '';

  if (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED')) return 'LOCKED';
  if (code.startsWith('SQLITE_CONSTRAINT')) return 'CONFLICT';
  if (code.startsWith('SQLITE_CANTOPEN')) return 'CONNECTION_FAILED';
  if (/no such (table|column)|has no column named/.test(errorMessage(error))) return 'SCHEMA_MISMATCH';

  return fallback;
}

/**
 * better-sqlite3 binds neither booleans nor dates, and binds every number as
 * REAL, which a TEXT column would keep as "1001.0"
 */
function toSqliteValue(value: SqlValue): string | number | bigint | Buffer | null {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number' && Number.isSafeInteger(value)) return BigInt(value);
  if (value instanceof Date) return value.toISOString();
  return value;
}

export class SqliteClient implements SqlClient {
  private db: Database.Database | null = null;

  constructor(private readonly config: SqliteClientConfig) {}

  async connect(): Promise<void> {
    if (this.db) return;
    try {
      this.db = new Database(this.config.filename, {
        readonly: this.config.readonly ?? false,
        fileMustExist: this.config.readonly ?? false,
        timeout: this.config.busyTimeoutMs ?? 5000,
      });
    } catch (error) {
      throw driverError(classifySqliteError(error, 'CONNECTION_FAILED'), 'SQLite open failed', error);
    }
  }

  async disconnect(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  async query(sql: string, params: readonly SqlValue[] = []): Promise<SqlResult> {
    return this.run(sql, params, 'READ_FAILED');
  }

  async getColumns(table: string): Promise<SqlColumn[]> {
    validateIdentifier(table, 'table');

    const result = this.run(
      'SELECT name, type, "notnull" AS not_null, dflt_value, pk FROM pragma_table_info(?) ORDER BY cid',
      [table],
      'READ_FAILED'
    );

    return result.rows.map((row) => ({
      name: String(row.name),
      dataType: String(row.type).toLowerCase(),
      isNullable: Number(row.not_null) === 0,
      columnDefault: row.dflt_value === null || row.dflt_value === undefined ? null : String(row.dflt_value),
      isPrimaryKey: Number(row.pk) > 0,
    }));
  }

  async begin(): Promise<SqlTransaction> {
    this.run('BEGIN IMMEDIATE', [], 'TRANSACTION_FAILED');
    const db = this.database();

    return {
      query: async (sql, params = []) => this.run(sql, params, 'WRITE_FAILED'),
      commit: async () => {
        this.run('COMMIT', [], 'TRANSACTION_FAILED');
      },
      rollback: async () => {
        if (db.inTransaction) {
          this.run('ROLLBACK', [], 'TRANSACTION_FAILED');
        }
      },
    };
  }

  private run(sql: string, params: readonly SqlValue[], fallback: ErrorCode): SqlResult {
    const db = this.database();
    try {
      const statement = db.prepare(sql);
      const bound = params.map(toSqliteValue);

      if (statement.reader) {
        const rows = statement.all(...bound).filter(isRecord);
        return { rows, rowCount: rows.length };
      }

      const info = statement.run(...bound);
      return { rows: [], rowCount: info.changes };
    } catch (error) {
      throw driverError(classifySqliteError(error, fallback), 'SQLite statement failed', error);
    }
  }

  private database(): Database.Database {
    if (!this.db) {
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: 'SQLite database is not open',
        suggestion: 'Call connect() before performing operations.',
      });
    }
    return this.db;
  }
}
