/**
 * Driver-neutral SQL access used by the database connectors
 */

import type { Record as DataRecord } from '@histrack/core';

/** Values every supported driver can bind */
export type SqlValue = string | number | bigint | boolean | Date | Buffer | null;

export interface SqlColumn {
  name: string;
  dataType: string;
  isNullable: boolean;
  columnDefault: string | null;
  isPrimaryKey: boolean;
}

export interface SqlResult {
  rows: DataRecord[];
  /** Rows returned, or rows affected by a write */
  rowCount: number;
}

export interface SqlExecutor {
  query(sql: string, params?: readonly SqlValue[]): Promise<SqlResult>;
}

/** Statements on one dedicated connection between BEGIN and COMMIT/ROLLBACK */
export interface SqlTransaction extends SqlExecutor {
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface SqlClient extends SqlExecutor {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  getColumns(table: string, schema?: string): Promise<SqlColumn[]>;
  begin(): Promise<SqlTransaction>;
}

/** How a dialect spells identifiers, placeholders and stored values */
export interface SqlDialect {
  readonly name: 'postgresql' | 'mysql' | 'sqlite';
  quote(identifier: string): string;
  /** Placeholder for the 1-based parameter `index` */
  placeholder(index: number): string;
  /** Table reference, optionally schema qualified */
  qualify(table: string, schema?: string): string;
  /** Validity timestamps as bound to the driver */
  bindTimestamp(date: Date): SqlValue;
}

/**
 * Collects parameters and hands out matching placeholders
 */
export class ParamList {
  readonly values: SqlValue[] = [];

  constructor(private readonly dialect: SqlDialect) {}

  add(value: SqlValue): string {
    this.values.push(value);
    return this.dialect.placeholder(this.values.length);
  }
}

export function isRecord(value: unknown): value is DataRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
