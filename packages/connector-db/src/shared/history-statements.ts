/**
 * SQL for reading and versioning a history table
 *
 * Every value, the current flag and timestamps included, is bound as a
 * parameter. The flag is written as 1/0, which PostgreSQL also accepts for
 * boolean columns.
 */

import type {
  CloseOutRequest,
  HistoryColumns,
  Record as DataRecord,
  TimestampFormat,
  VersionInsert,
} from '@histrack/core';
import { formatSqlTimestamp } from '@histrack/core';
import { validateIdentifier } from './identifiers.js';
import { ParamList, type SqlDialect, type SqlValue } from './sql-client.js';
import { toSqlValue } from './values.js';

export interface HistoryLayout {
  keyFields: string[];
  columns: HistoryColumns;
}

export interface SqlStatement {
  sql: string;
  params: SqlValue[];
}

const CURRENT = 1;
const CLOSED = 0;

export class HistoryStatements {
  private readonly table: string;

  constructor(
    private readonly dialect: SqlDialect,
    table: string,
    private readonly layout: HistoryLayout,
    schema?: string,
    private readonly timestampFormat: TimestampFormat = 'iso'
  ) {
    validateIdentifier(table, 'table');
    if (schema !== undefined) validateIdentifier(schema, 'schema');
    for (const field of layout.keyFields) validateIdentifier(field, 'business key column');
    for (const column of Object.values(layout.columns)) validateIdentifier(column, 'history column');

    this.table = dialect.qualify(table, schema);
  }

  selectCurrent(): SqlStatement {
    const params = new ParamList(this.dialect);
    const { isCurrent } = this.layout.columns;
    const sql = `SELECT * FROM ${this.table} WHERE ${this.q(isCurrent)} = ${params.add(CURRENT)} ORDER BY ${this.keyOrder()}`;
    return { sql, params: params.values };
  }

  selectVersions(keyValues?: DataRecord): SqlStatement {
    const params = new ParamList(this.dialect);
    let sql = `SELECT * FROM ${this.table}`;
    if (keyValues) {
      sql += ` WHERE ${this.keyPredicate(keyValues, params)}`;
    }
    sql += ` ORDER BY ${this.keyOrder()}, ${this.q(this.layout.columns.validFrom)}`;
    return { sql, params: params.values };
  }

  selectAt(at: Date): SqlStatement {
    const params = new ParamList(this.dialect);
    const { validFrom, validTo } = this.layout.columns;
    const bound = this.timestamp(at);
    const sql =
      `SELECT * FROM ${this.table}` +
      ` WHERE ${this.q(validFrom)} <= ${params.add(bound)} AND ${this.q(validTo)} > ${params.add(bound)}` +
      ` ORDER BY ${this.keyOrder()}`;
    return { sql, params: params.values };
  }

  /** Greatest valid_from */
  selectLatestStart(): SqlStatement {
    return {
      sql: `SELECT MAX(${this.q(this.layout.columns.validFrom)}) AS latest FROM ${this.table}`,
      params: [],
    };
  }

  /** Greatest valid_to among closed versions */
  selectLatestEnd(): SqlStatement {
    const params = new ParamList(this.dialect);
    const { validTo, isCurrent } = this.layout.columns;
    const sql = `SELECT MAX(${this.q(validTo)}) AS latest FROM ${this.table} WHERE ${this.q(isCurrent)} = ${params.add(CLOSED)}`;
    return { sql, params: params.values };
  }

  /**
   * Close the current row of a key, guarded on its valid_from so that a
   * concurrent change touches zero rows. The guard binds valid_from as it was
   * read, when known, so rows written in another text form still match.
   */
  closeOut(request: CloseOutRequest): SqlStatement {
    const params = new ParamList(this.dialect);
    const { validFrom, validTo, isCurrent } = this.layout.columns;

    const set = `${this.q(validTo)} = ${params.add(this.timestamp(request.asOf))}, ${this.q(isCurrent)} = ${params.add(CLOSED)}`;
    const where = [
      this.keyPredicate(request.keyValues, params),
      `${this.q(validFrom)} = ${params.add(request.storedValidFrom ?? this.timestamp(request.validFrom))}`,
      `${this.q(isCurrent)} = ${params.add(CURRENT)}`,
    ].join(' AND ');

    return { sql: `UPDATE ${this.table} SET ${set} WHERE ${where}`, params: params.values };
  }

  /**
   * Insert a version. `attributeColumns` lists the business columns to write,
   * in order; audit columns in the attributes are ignored.
   */
  insert(version: VersionInsert, attributeColumns: readonly string[]): SqlStatement {
    const params = new ParamList(this.dialect);
    const { rowHash, validFrom, validTo, isCurrent } = this.layout.columns;
    const audit = new Set<string>([rowHash, validFrom, validTo, isCurrent]);

    const columns: string[] = [];
    const placeholders: string[] = [];
    for (const column of attributeColumns) {
      if (audit.has(column)) continue;
      validateIdentifier(column, 'column');
      columns.push(column);
      placeholders.push(params.add(toSqlValue(version.attributes[column], column)));
    }

    columns.push(rowHash, validFrom, validTo, isCurrent);
    placeholders.push(
      params.add(version.fingerprint),
      params.add(this.timestamp(version.validFrom)),
      params.add(this.timestamp(version.validTo)),
      params.add(CURRENT)
    );

    const sql = `INSERT INTO ${this.table} (${columns.map((c) => this.q(c)).join(', ')}) VALUES (${placeholders.join(', ')})`;
    return { sql, params: params.values };
  }

  private keyPredicate(keyValues: DataRecord, params: ParamList): string {
    return this.layout.keyFields
      .map((field) => `${this.q(field)} = ${params.add(toSqlValue(keyValues[field], field))}`)
      .join(' AND ');
  }

  private keyOrder(): string {
    return this.layout.keyFields.map((field) => this.q(field)).join(', ');
  }

  private timestamp(date: Date): SqlValue {
    return this.timestampFormat === 'sql' ? formatSqlTimestamp(date) : this.dialect.bindTimestamp(date);
  }

  private q(identifier: string): string {
    return this.dialect.quote(identifier);
  }
}
