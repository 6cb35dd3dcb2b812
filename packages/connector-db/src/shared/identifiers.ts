import { ConnectorError, SQL_IDENTIFIER } from '@histrack/core';

/**
 * Validate that a string is a safe SQL identifier
 */
export function validateIdentifier(name: string, type: string): void {
  if (!SQL_IDENTIFIER.test(name)) {
    throw new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid ${type} name: "${name}". Must be alphanumeric with underscores, starting with a letter or underscore.`,
      suggestion: `Use only valid SQL identifiers for ${type} names.`,
    });
  }
}

/**
 * Validate column names against a whitelist from the table schema
 */
export function validateColumns(columns: readonly string[], allowedColumns: ReadonlySet<string>, context: string): void {
  for (const col of columns) {
    if (!allowedColumns.has(col)) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `Invalid column "${col}" in ${context}. Column does not exist in table schema.`,
        suggestion: `Valid columns: ${Array.from(allowedColumns).join(', ')}`,
      });
    }
  }
}
