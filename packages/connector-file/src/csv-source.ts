/**
 * CSV Source
 * Reads a CSV snapshot with a header row
 */

import { parse } from 'csv-parse/sync';
import type { Record } from '@histrack/core';
import { ConnectorError } from '@histrack/core';
import { BaseFileSource, FORBIDDEN_RECORD_KEYS, type FileSourceConfig } from './base-file-source.js';

export interface CsvSourceConfig extends FileSourceConfig {
  type: 'csv';
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Whether first row contains headers (default: true) */
  headers?: boolean;
  /** Quote character (default: '"') */
  quote?: string;
  /** Skip empty lines (default: true) */
  skipEmptyLines?: boolean;
  /** Convert numeric cells to numbers (default: true) */
  castNumbers?: boolean;
  /** Read empty cells as null (default: true) */
  emptyAsNull?: boolean;
}

export class CsvSource extends BaseFileSource<CsvSourceConfig> {
  constructor(config: Omit<CsvSourceConfig, 'type'> & { type?: 'csv' }) {
    super({ ...config, type: 'csv' });
  }

  protected parseContent(content: string): Record[] {
    let parsed: unknown;
    try {
      parsed = parse(content, {
        columns: false, // Parse rows first so we can safely map headers ourselves
        delimiter: this.config.delimiter ?? ',',
        quote: this.config.quote ?? '"',
        skip_empty_lines: this.config.skipEmptyLines !== false,
        trim: true,
        relax_column_count: true,
        cast: this.config.castNumbers !== false,
        cast_date: false,
      });
    } catch (error) {
      throw new ConnectorError({
        code: 'READ_FAILED',
        message: `Invalid CSV: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: this.config.id,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const rows = Array.isArray(parsed) ? parsed.filter((row): row is unknown[] => Array.isArray(row)) : [];
    const [headerRow] = rows;
    if (headerRow === undefined) return [];

    const hasHeaders = this.config.headers !== false;
    const headers = hasHeaders
      ? headerRow.map((h) => String(h ?? ''))
      : Array.from({ length: Math.max(...rows.map((r) => r.length)) }, (_, i) => `Column${i + 1}`);

    this.checkHeaders(headers);

    const emptyAsNull = this.config.emptyAsNull !== false;
    const dataRows = hasHeaders ? rows.slice(1) : rows;

    return dataRows.map((row) => {
      const record: Record = {};
      headers.forEach((header, i) => {
        const value = row[i];
        record[header] = value === undefined || (emptyAsNull && value === '') ? null : value;
      });
      return record;
    });
  }

  private checkHeaders(headers: readonly string[]): void {
    const seen = new Set<string>();

    for (const header of headers) {
      if (FORBIDDEN_RECORD_KEYS.has(header)) {
        throw new ConnectorError({
          code: 'SCHEMA_MISMATCH',
          message: `Unsafe CSV header name: ${header}`,
          connectorId: this.config.id,
          suggestion: 'Rename the column to a safe field name and try again.',
        });
      }
      if (header === '' || seen.has(header)) {
        throw new ConnectorError({
          code: 'SCHEMA_MISMATCH',
          message: header === '' ? 'CSV header has an empty column name' : `Duplicate CSV header name: ${header}`,
          connectorId: this.config.id,
          suggestion: 'Give every column a unique, non-empty header.',
        });
      }
      seen.add(header);
    }
  }
}

/**
 * Factory function to create a CSV source
 */
export function createCsvSource(config: Omit<CsvSourceConfig, 'type'>): CsvSource {
  return new CsvSource(config);
}
