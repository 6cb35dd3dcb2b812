/**
 * PostgreSQL Client
 *
 * Wrapper around pg for history and source access.
 * Uses modern pg v8.13+ with native ESM support.
 */

import pg from 'pg';
import type { ErrorCode } from '@histrack/core';
import { driverError, errorCode, isNetworkError } from '../shared/driver-errors.js';
import { validateIdentifier } from '../shared/identifiers.js';
import type {
  SqlClient,
  SqlColumn,
  SqlDialect,
  SqlResult,
  SqlTransaction,
  SqlValue,
} from '../shared/sql-client.js';

const { Pool } = pg;

export interface PostgresClientConfig {
  /** Connection string or individual params */
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  /** SSL mode */
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /** Connection pool size */
  max?: number;
  /** Give up connecting after this long */
  connectionTimeoutMs?: number;
  /** Server-side statement_timeout */
  statementTimeoutMs?: number;
}

export const postgresDialect: SqlDialect = {
  name: 'postgresql',
  quote: (identifier) => `"${identifier}"`,
  placeholder: (index) => `$${index}`,
  qualify: (table, schema = 'public') => `"${schema}"."${table}"`,
  bindTimestamp: (date) => date.toISOString(),
};

/**
 * Map a pg failure to a connector error code by SQLSTATE
 */
export function classifyPostgresError(error: unknown, fallback: ErrorCode): ErrorCode {
  if (isNetworkError(error)) return 'CONNECTION_FAILED';

  const sqlState = errorCode(error);
  if (!sqlState) return fallback;

  switch (sqlState) {
    case '40001': // serialization_failure
    case '23505': // unique_violation
      return 'CONFLICT';
    case '40P01': // deadlock_detected
    case '55P03': // lock_not_available
      return 'LOCKED';
    case '57014': // query_canceled (statement_timeout)
      return 'TIMEOUT';
    case '42P01': // undefined_table
    case '42703': // undefined_column
    case '3F000': // invalid_schema_name
      return 'SCHEMA_MISMATCH';
    case '57P01': // admin_shutdown
    case '57P03': // cannot_connect_now
      return 'CONNECTION_FAILED';
    default:
      return sqlState.startsWith('08') ? 'CONNECTION_FAILED' : fallback;
  }
}

export class PostgresClient implements SqlClient {
  private pool: pg.Pool;

  constructor(config: PostgresClientConfig) {
    this.pool = new Pool({
      connectionString: config.connectionString,
      host: config.host,
      port: config.port ?? 5432,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl,
      max: config.max ?? 10,
      connectionTimeoutMillis: config.connectionTimeoutMs,
      statement_timeout: config.statementTimeoutMs,
    });
  }

  /**
   * Test connection
   */
  async connect(): Promise<void> {
    try {
      const client = await this.pool.connect();
      client.release();
    } catch (error) {
      throw driverError(classifyPostgresError(error, 'CONNECTION_FAILED'), 'PostgreSQL connection failed', error);
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
      const result = await this.pool.query(sql, [...params]);
      return { rows: result.rows, rowCount: result.rowCount ?? 0 };
    } catch (error) {
      throw driverError(classifyPostgresError(error, 'READ_FAILED'), 'Query failed', error);
    }
  }

  /**
   * Get columns for a table
   */
  async getColumns(table: string, schema = 'public'): Promise<SqlColumn[]> {
    // Validate identifiers to prevent SQL injection
    validateIdentifier(schema, 'schema');
    validateIdentifier(table, 'table');

    const sql = `
      SELECT
        c.column_name as name,
        c.data_type as data_type,
        c.is_nullable = 'YES' as is_nullable,
        c.column_default,
        COALESCE(
          (SELECT true FROM information_schema.table_constraints tc
           JOIN information_schema.key_column_usage kcu
             ON tc.constraint_name = kcu.constraint_name
           WHERE tc.table_schema = c.table_schema
             AND tc.table_name = c.table_name
             AND tc.constraint_type = 'PRIMARY KEY'
             AND kcu.column_name = c.column_name
           LIMIT 1), false
        ) as is_primary_key
      FROM information_schema.columns c
      WHERE c.table_schema = $1 AND c.table_name = $2
      ORDER BY c.ordinal_position
    `;

    const result = await this.query(sql, [schema, table]);

    return result.rows.map((row) => ({
      name: String(row.name),
      dataType: String(row.data_type),
      isNullable: row.is_nullable === true,
      columnDefault: typeof row.column_default === 'string' ? row.column_default : null,
      isPrimaryKey: row.is_primary_key === true,
    }));
  }

  /**
   * Open a transaction on a dedicated connection
   */
  async begin(): Promise<SqlTransaction> {
    let client: pg.PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw driverError(classifyPostgresError(error, 'CONNECTION_FAILED'), 'PostgreSQL connection failed', error);
    }

    let released = false;
    const release = (err?: Error): void => {
      if (released) return;
      released = true;
      client.release(err);
    };

    const run = async (sql: string, params: readonly SqlValue[], fallback: ErrorCode, prefix: string) => {
      try {
        const result = await client.query(sql, [...params]);
        return { rows: result.rows, rowCount: result.rowCount ?? 0 };
      } catch (error) {
        throw driverError(classifyPostgresError(error, fallback), prefix, error);
      }
    };

    try {
      await run('BEGIN', [], 'TRANSACTION_FAILED', 'BEGIN failed');
    } catch (error) {
      release(error instanceof Error ? error : undefined);
      throw error;
    }

    return {
      query: (sql, params = []) => run(sql, params, 'WRITE_FAILED', 'Query failed'),
      commit: async () => {
        await run('COMMIT', [], 'TRANSACTION_FAILED', 'COMMIT failed');
        release();
      },
      rollback: async () => {
        try {
          await run('ROLLBACK', [], 'TRANSACTION_FAILED', 'ROLLBACK failed');
          release();
        } catch (error) {
          // drop the connection instead of returning it mid-transaction
          release(error instanceof Error ? error : new Error(String(error)));
          throw error;
        }
      },
    };
  }
}
