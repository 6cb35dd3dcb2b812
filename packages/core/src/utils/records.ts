/**
 * Utility functions for working with records
 */

import type { Record } from '../types/index.js';

/**
 * Normalize a single or composite key definition to a list of field names
 */
export function toKeyFields(key: string | readonly string[]): string[] {
  return typeof key === 'string' ? [key] : [...key];
}

/**
 * Whether the record carries the field (a null value still counts)
 */
export function hasField(record: Record, field: string): boolean {
  return Object.hasOwn(record, field);
}

/**
 * Copy the named fields into a new record, in the given order
 */
export function pickFields(record: Record, fields: readonly string[]): Record {
  const picked: Record = {};
  for (const field of fields) {
    picked[field] = record[field];
  }
  return picked;
}

/**
 * Copy every field except the named ones
 */
export function omitFields(record: Record, fields: readonly string[]): Record {
  const excluded = new Set(fields);
  const out: Record = {};
  for (const [field, value] of Object.entries(record)) {
    if (!excluded.has(field)) out[field] = value;
  }
  return out;
}
