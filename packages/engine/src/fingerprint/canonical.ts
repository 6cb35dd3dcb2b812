/**
 * Canonical text form of scalars and records.
 *
 * Tokens:
 *   text     t:<value with "\" and "|" backslash-escaped>
 *   number   n:<digits> for integral values, shortest round-trip form otherwise
 *   null     \N
 *
 * Integer and real values that are numerically equal share one token, so a
 * column that switches between 1299 and 1299.0 is not a change. Text "1299"
 * and the number 1299 stay distinct, except in business keys.
 */

import type { Record as DataRecord, Scalar, TypedRecord } from '@histrack/core';
import { hasField } from '@histrack/core';
import { ScdError } from '../errors/index.js';
import { toScalar, toTypedRecord } from './scalar.js';

export const NULL_TOKEN = '\\N';
export const FIELD_SEPARATOR = '|';

function escapeText(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\|/g, '\\|');
}

function canonicalNumber(value: number): string {
  // BigInt also folds -0 into 0
  return Number.isInteger(value) ? BigInt(value).toString() : String(value);
}

export function canonicalScalar(scalar: Scalar): string {
  switch (scalar.kind) {
    case 'text':
      return `t:${escapeText(scalar.value)}`;
    case 'integer':
      return `n:${scalar.value.toString()}`;
    case 'real':
      return `n:${canonicalNumber(scalar.value)}`;
    case 'null':
      return NULL_TOKEN;
  }
}

/**
 * Join the canonical tokens of the given attributes, in order
 */
export function canonicalize(record: TypedRecord, attributes: readonly string[]): string {
  return attributes
    .map((attribute) => {
      const scalar = record.get(attribute);
      if (!scalar) {
        throw new ScdError({
          code: 'MISSING_ATTRIBUTE',
          message: `Record is missing attribute '${attribute}'`,
          context: { attribute },
        });
      }
      return canonicalScalar(scalar);
    })
    .join(FIELD_SEPARATOR);
}

/**
 * Identity of a record's business key, comparable across source and history.
 * Numbers and numeric text are one key space (see canonicalKeyScalar).
 *
 * @throws ScdError MISSING_ATTRIBUTE for absent or null key columns
 */
export function encodeKey(record: DataRecord, keyFields: readonly string[]): string {
  const typed = toTypedRecord(record, keyFields);

  for (const [field, scalar] of typed) {
    if (scalar.kind === 'null') {
      throw new ScdError({
        code: 'MISSING_ATTRIBUTE',
        message: `Business key column '${field}' is null`,
        suggestion: 'Every record needs a non-null business key.',
        context: { attribute: field },
      });
    }
  }

  return [...typed.values()].map(canonicalKeyScalar).join(FIELD_SEPARATOR);
}

const NUMERIC_TEXT = /^-?(0|[1-9]\d*)(\.\d+)?$/;

/**
 * Key token of a scalar. Storage may hand a key back as text or as a number
 * depending on the column type (pg bigint/numeric, SQLite TEXT affinity), so
 * text holding a plain decimal number shares that number's token.
 */
export function canonicalKeyScalar(scalar: Scalar): string {
  if (scalar.kind !== 'text') {
    return canonicalScalar(scalar);
  }

  const match = NUMERIC_TEXT.exec(scalar.value);
  if (!match) {
    return canonicalScalar(scalar);
  }

  const fraction = match[2];
  if (fraction === undefined || /^\.0+$/.test(fraction)) {
    const integral = fraction === undefined ? scalar.value : scalar.value.slice(0, -fraction.length);
    return `n:${BigInt(integral).toString()}`;
  }
  return `n:${canonicalNumber(Number(scalar.value))}`;
}

/**
 * Names of the attributes whose canonical values differ between two records.
 * An attribute missing on either side counts as changed.
 */
export function diffAttributes(
  previous: DataRecord,
  current: DataRecord,
  attributes: readonly string[]
): string[] {
  return attributes.filter((attribute) => {
    if (!hasField(previous, attribute) || !hasField(current, attribute)) {
      return true;
    }
    const before = canonicalScalar(toScalar(previous[attribute], attribute));
    const after = canonicalScalar(toScalar(current[attribute], attribute));
    return before !== after;
  });
}
