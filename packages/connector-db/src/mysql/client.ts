/**
 * MySQL Client
 *
 * Wrapper around mysql2/promise for history and source access.
 * Uses mysql2 v3.11+ with native ESM and Promise support.
 */

import mysql from 'mysql2/promise';
import type { Pool, PoolConnection } from 'mysql2/promise';
import type { ErrorCode } from '@histrack/core';
import { driverError, errorCode, errorNumber, isNetworkError } from '../shared/driver-errors.js';
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

export interface MySQLClientConfig {
  /** Connection string (alternative to individual params) */
  uri?: string;
  /** Database host */
  host?: string;
  /** Database port */
  port?: number;
  /** Database name */
  database?: string;
  /** Username */
  user?: string;
  /** Password */
  password?: string;
  /** SSL configuration */
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /** Connection pool size */
  connectionLimit?: number;
  /** Give up connecting after this long */
  connectTimeoutMs?: number;
}

/**
 * Timestamps are bound as Date objects. The pool runs with timezone 'Z', so
 * DATETIME(3) columns hold UTC and read back as UTC dates.
 */
export const mysqlDialect: SqlDialect = {
  name: 'mysql',
  quote: (identifier) => `\`${identifier}\``,
  placeholder: () => '?',
  qualify: (table, schema) => (schema ? `\`${schema}\`.\`${table}\`` : `\`${table}\``),
  bindTimestamp: (date) => date,
};

const CONNECTION_CODES = new Set(['PROTOCOL_CONNECTION_LOST', 'ER_CON_COUNT_ERROR', 'ER_ACCESS_DENIED_ERROR', 'ER_BAD_DB_ERROR']);

/**
 * Map a mysql2 failure to a connector error code by server errno
 */
export function classifyMysqlError(error: unknown, fallback: ErrorCode): ErrorCode {
  if (isNetworkError(error)) return 'CONNECTION_FAILED';

  const code = errorCode(error);
  if (code && CONNECTION_CODES.has(code)) return 'CONNECTION_FAILED';

  switch (errorNumber(error)) {
    case 1205: // ER_LOCK_WAIT_TIMEOUT
    case 1213: // ER_LOCK_DEADLOCK
      return 'LOCKED';
    case 1062: // ER_DUP_ENTRY
      return 'CONFLICT';
    case 3024: // ER_QUERY_TIMEOUT
      return 'TIMEOUT';
    case 1146: // ER_NO_SUCH_TABLE
    case 1054: // ER_BAD_FIELD_ERROR
      return 'SCHEMA_MISMATCH';
    default:
      return fallback;
  }
}

/** Rows of a SELECT, or the affected row count of a write */
function toSqlResult(result: unknown): SqlResult {
  if (Array.isArray(result)) {
    const rows = result.filter(isRecord);
    return { rows, rowCount: rows.length };
  }
  if (isRecord(result) && typeof result.affectedRows === 'number') {
    return { rows: [], rowCount: result.affectedRows };
  }
  return { rows: [], rowCount: 0 };
}

export class MySQLClient implements SqlClient {
  private pool: Pool;

  constructor(config: MySQLClientConfig) {
    this.pool = mysql.createPool({
      uri: config.uri,
      host: config.host,
      port: config.port ?? 3306,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? {} : undefined,
      connectionLimit: config.connectionLimit ?? 10,
      connectTimeout: config.connectTimeoutMs,
      waitForConnections: true,
      timezone: 'Z',
      supportBigNumbers: true,
    });
  }

  /**
   * Test connection
   */
  async connect(): Promise<void> {
    try {
      const connection = await this.pool.getConnection();
      connection.release();
    } catch (error) {
      throw driverError(classifyMysqlError(error, 'CONNECTION_FAILED'), 'MySQL connection failed', error);
    }
  }

  /**
   * Close all connections
   */
  async disconnect(): Promise<void> {
    await this.pool.end();
  }

  /**
   * Execute a query on any pooled connection
   */
  async query(sql: string, params: readonly SqlValue[] = []): Promise<SqlResult> {
    try {
      const [result] = await this.pool.execute(sql, [...params]);
      return toSqlResult(result);
    } catch (error) {
      throw driverError(classifyMysqlError(error, 'READ_FAILED'), 'Query failed', error);
    }
  }

  /**
   * Get columns for a table in the given or the current database
   */
  async getColumns(table: string, schema?: string): Promise<SqlColumn[]> {
    // Validate table name to prevent SQL injection
    validateIdentifier(table, 'table');
    if (schema !== undefined) validateIdentifier(schema, 'schema');

    const sql = `
      SELECT
        COLUMN_NAME as name,
        DATA_TYPE as data_type,
        IS_NULLABLE = 'YES' as is_nullable,
        COLUMN_DEFAULT as column_default,
        COLUMN_KEY = 'PRI' as is_primary_key
      FROM INFORMATION_SCHEMA.COLUMNS
      WHERE TABLE_SCHEMA = ${schema === undefined ? 'DATABASE()' : '?'} AND TABLE_NAME = ?
      ORDER BY ORDINAL_POSITION
    `;

    const result = await this.query(sql, schema === undefined ? [table] : [schema, table]);

    return result.rows.map((row) => ({
      name: String(row.name),
      dataType: String(row.data_type),
      isNullable: Number(row.is_nullable) === 1,
      columnDefault: typeof row.column_default === 'string' ? row.column_default : null,
      isPrimaryKey: Number(row.is_primary_key) === 1,
    }));
  }

  /**
   * Open a transaction on a dedicated connection
   */
  async begin(): Promise<SqlTransaction> {
    let connection: PoolConnection;
    try {
      connection = await this.pool.getConnection();
    } catch (error) {
      throw driverError(classifyMysqlError(error, 'CONNECTION_FAILED'), 'MySQL connection failed', error);
    }

    let released = false;
    const release = (): void => {
      if (released) return;
      released = true;
      connection.release();
    };

    try {
      await connection.beginTransaction();
    } catch (error) {
      release();
      throw driverError(classifyMysqlError(error, 'TRANSACTION_FAILED'), 'BEGIN failed', error);
    }

    return {
      query: async (sql, params = []) => {
        try {
          const [result] = await connection.execute(sql, [...params]);
          return toSqlResult(result);
        } catch (error) {
          throw driverError(classifyMysqlError(error, 'WRITE_FAILED'), 'Query failed', error);
        }
      },
      commit: async () => {
        try {
          await connection.commit();
        } catch (error) {
          throw driverError(classifyMysqlError(error, 'TRANSACTION_FAILED'), 'COMMIT failed', error);
        }
        release();
      },
      rollback: async () => {
        try {
          await connection.rollback();
        } catch (error) {
          throw driverError(classifyMysqlError(error, 'TRANSACTION_FAILED'), 'ROLLBACK failed', error);
        } finally {
          release();
        }
      },
    };
  }
}
