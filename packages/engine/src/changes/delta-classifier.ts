/**
 * Delta Classifier
 *
 * Compares a source snapshot against the current slice of history.
 */

import type { HashAlgorithm, Record as DataRecord, VersionRow } from '@histrack/core';
import { pickFields, toKeyFields } from '@histrack/core';
import type {
  Classification,
  ClassifiedItem,
  OutcomeCounts,
} from '../types/index.js';
import { ScdError } from '../errors/index.js';
import { diffAttributes, encodeKey, fingerprint } from '../fingerprint/index.js';
import { formatKey } from '../formatters/utils.js';
import { CurrentSlice } from './current-slice.js';

export interface ClassifyOptions {
  /** Business key column(s) */
  businessKey: string | readonly string[];
  /** Ordered monitored attributes */
  monitoredAttributes: readonly string[];
  /** Report current keys missing from the source as removed (default: false) */
  detectRemoved?: boolean;
  /** Fingerprint digest (default: sha256) */
  hashAlgorithm?: HashAlgorithm;
}

interface KeyedRecord {
  key: string;
  keyValues: DataRecord;
  record: DataRecord;
}

/**
 * Pure classification of source records against current history rows.
 *
 * Every source key maps to exactly one of new / changed / unchanged; with
 * detectRemoved, current keys absent from the source map to removed.
 * Per-record work is independent, so `classifyRecord` can be fanned out.
 */
export class DeltaClassifier {
  private readonly keyFields: string[];

  constructor(private readonly options: ClassifyOptions) {
    this.keyFields = toKeyFields(options.businessKey);
  }

  /**
   * Classify a full snapshot.
   *
   * @throws ScdError DUPLICATE_KEY if two source records share a key
   * @throws ScdError INVARIANT_VIOLATION if history has two current rows for a key
   * @throws ScdError MISSING_ATTRIBUTE / UNSUPPORTED_VALUE on bad records
   */
  classify(
    sourceRecords: readonly DataRecord[],
    current: CurrentSlice | readonly VersionRow[]
  ): Classification {
    const slice = current instanceof CurrentSlice
      ? current
      : CurrentSlice.fromRows(current, this.keyFields);

    const keyed = this.keyRecords(sourceRecords);
    const items: ClassifiedItem[] = keyed.map((entry) => this.classifyKeyed(entry, slice));

    if (this.options.detectRemoved) {
      const sourceKeys = new Set(keyed.map((entry) => entry.key));
      for (const [key, prior] of slice.entries()) {
        if (!sourceKeys.has(key)) {
          items.push({ outcome: 'removed', key, keyValues: prior.keyValues, prior });
        }
      }
    }

    return {
      items,
      counts: countOutcomes(items),
      sourceCount: sourceRecords.length,
      currentCount: slice.size,
    };
  }

  /**
   * Classify one source record. Duplicate detection is the caller's job.
   */
  classifyRecord(record: DataRecord, slice: CurrentSlice): ClassifiedItem {
    const key = encodeKey(record, this.keyFields);
    return this.classifyKeyed(
      { key, keyValues: pickFields(record, this.keyFields), record },
      slice
    );
  }

  private classifyKeyed(entry: KeyedRecord, slice: CurrentSlice): ClassifiedItem {
    const { monitoredAttributes, hashAlgorithm } = this.options;
    const digest = fingerprint(entry.record, monitoredAttributes, { algorithm: hashAlgorithm });
    const prior = slice.get(entry.key);

    if (!prior) {
      return { outcome: 'new', ...entry, fingerprint: digest };
    }

    if (prior.fingerprint !== digest) {
      return {
        outcome: 'changed',
        ...entry,
        fingerprint: digest,
        prior,
        changedAttributes: diffAttributes(prior.attributes, entry.record, monitoredAttributes),
      };
    }

    return { outcome: 'unchanged', ...entry, fingerprint: digest, prior };
  }

  private keyRecords(sourceRecords: readonly DataRecord[]): KeyedRecord[] {
    const seen = new Map<string, DataRecord>();
    const duplicates = new Map<string, number>();
    const keyed: KeyedRecord[] = [];

    for (const record of sourceRecords) {
      const key = encodeKey(record, this.keyFields);
      const keyValues = pickFields(record, this.keyFields);

      if (seen.has(key)) {
        const display = formatKey(keyValues);
        duplicates.set(display, (duplicates.get(display) ?? 1) + 1);
        continue;
      }

      seen.set(key, record);
      keyed.push({ key, keyValues, record });
    }

    if (duplicates.size > 0) {
      const keys = [...duplicates.keys()];
      throw new ScdError({
        code: 'DUPLICATE_KEY',
        message: `Source has duplicate business keys: ${keys.slice(0, 10).join('; ')}${keys.length > 10 ? ` (and ${keys.length - 10} more)` : ''}`,
        suggestion: `Make '${this.keyFields.join(', ')}' unique in the source or choose a different business key.`,
        context: { keys, occurrences: Object.fromEntries(duplicates) },
      });
    }

    return keyed;
  }
}

export function countOutcomes(items: readonly ClassifiedItem[]): OutcomeCounts {
  const counts: OutcomeCounts = { new: 0, changed: 0, unchanged: 0, removed: 0 };
  for (const item of items) {
    counts[item.outcome]++;
  }
  return counts;
}

/**
 * Classify a snapshot in one call
 */
export function classify(
  sourceRecords: readonly DataRecord[],
  current: CurrentSlice | readonly VersionRow[],
  options: ClassifyOptions
): Classification {
  return new DeltaClassifier(options).classify(sourceRecords, current);
}
