/**
 * Current Slice
 *
 * Index of the current history rows by canonical business key.
 */

import type { VersionRow } from '@histrack/core';
import { isEndOfTime } from '@histrack/core';
import { ScdError } from '../errors/index.js';
import { encodeKey } from '../fingerprint/index.js';
import { formatKey } from '../formatters/utils.js';

export class CurrentSlice {
  private constructor(private readonly rows: ReadonlyMap<string, VersionRow>) {}

  /**
   * Index current rows by key.
   *
   * @throws ScdError INVARIANT_VIOLATION if a row is not current, is not open
   * ended, or shares its key with another current row
   */
  static fromRows(rows: readonly VersionRow[], keyFields: readonly string[]): CurrentSlice {
    const index = new Map<string, VersionRow>();
    const duplicates = new Set<string>();

    for (const row of rows) {
      if (!row.isCurrent || !isEndOfTime(row.validTo)) {
        throw new ScdError({
          code: 'INVARIANT_VIOLATION',
          message: `History row for key ${formatKey(row.keyValues)} is not an open current version`,
          context: {
            key: formatKey(row.keyValues),
            isCurrent: row.isCurrent,
            validTo: row.validTo.toISOString(),
          },
        });
      }

      const key = encodeKey(row.keyValues, keyFields);
      if (index.has(key)) {
        duplicates.add(formatKey(row.keyValues));
        continue;
      }
      index.set(key, row);
    }

    if (duplicates.size > 0) {
      const keys = [...duplicates];
      throw new ScdError({
        code: 'INVARIANT_VIOLATION',
        message: `History has more than one current row for ${keys.length} key(s): ${keys.slice(0, 10).join('; ')}`,
        suggestion: 'Repair the history table so that each key has at most one current row before running again.',
        context: { keys },
      });
    }

    return new CurrentSlice(index);
  }

  get size(): number {
    return this.rows.size;
  }

  get(key: string): VersionRow | undefined {
    return this.rows.get(key);
  }

  has(key: string): boolean {
    return this.rows.has(key);
  }

  entries(): IterableIterator<[string, VersionRow]> {
    return this.rows.entries();
  }
}
