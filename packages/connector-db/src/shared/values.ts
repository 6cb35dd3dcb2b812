import { ConnectorError } from '@histrack/core';
import type { SqlValue } from './sql-client.js';

/**
 * Reduce a record value to something every driver binds. Plain objects and
 * arrays are stored as JSON text.
 */
export function toSqlValue(value: unknown, column: string): SqlValue {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
      return value;
    default:
      break;
  }

  if (value instanceof Date) return value;
  if (Buffer.isBuffer(value)) return value;
  if (value instanceof Uint8Array) return Buffer.from(value);

  if (typeof value === 'object') {
    return JSON.stringify(value, (_key, inner: unknown) =>
      typeof inner === 'bigint' ? inner.toString() : inner
    );
  }

  throw new ConnectorError({
    code: 'WRITE_FAILED',
    message: `Cannot store a ${typeof value} value in column "${column}"`,
  });
}
