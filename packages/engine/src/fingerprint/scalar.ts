/**
 * Conversion of driver values into tagged scalars
 */

import type { Record as DataRecord, Scalar, TypedRecord } from '@histrack/core';
import { hasField } from '@histrack/core';
import { ScdError } from '../errors/index.js';

/**
 * Reduce a driver value to a scalar.
 *
 * - null / undefined → null
 * - string → text
 * - integral number, bigint, boolean (1/0) → integer
 * - other numbers (including NaN and ±Infinity) → real
 * - Date → text (ISO-8601 UTC)
 *
 * @throws ScdError UNSUPPORTED_VALUE for objects, arrays, buffers and invalid dates
 */
export function toScalar(value: unknown, attribute: string): Scalar {
  if (value === null || value === undefined) {
    return { kind: 'null' };
  }

  switch (typeof value) {
    case 'string':
      return { kind: 'text', value };
    case 'bigint':
      return { kind: 'integer', value };
    case 'boolean':
      return { kind: 'integer', value: value ? 1n : 0n };
    case 'number':
      return Number.isInteger(value)
        ? { kind: 'integer', value: BigInt(value) }
        : { kind: 'real', value };
    default:
      break;
  }

  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return { kind: 'text', value: value.toISOString() };
  }

  throw new ScdError({
    code: 'UNSUPPORTED_VALUE',
    message: `Attribute '${attribute}' holds a non-scalar value (${describeType(value)})`,
    suggestion: 'Only text, numbers, booleans, dates and null can be monitored or used as keys.',
    context: { attribute },
  });
}

function describeType(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'invalid date';
  if (value instanceof Uint8Array) return 'binary';
  return typeof value;
}

/**
 * Build the typed view of the named attributes of a record.
 *
 * @throws ScdError MISSING_ATTRIBUTE if the record lacks one of them
 */
export function toTypedRecord(record: DataRecord, attributes: readonly string[]): TypedRecord {
  const typed = new Map<string, Scalar>();

  for (const attribute of attributes) {
    if (!hasField(record, attribute)) {
      throw new ScdError({
        code: 'MISSING_ATTRIBUTE',
        message: `Record is missing attribute '${attribute}'`,
        suggestion: 'The source schema no longer matches the configured attributes. Update the configuration or the source.',
        context: { attribute, available: Object.keys(record) },
      });
    }
    typed.set(attribute, toScalar(record[attribute], attribute));
  }

  return typed;
}
