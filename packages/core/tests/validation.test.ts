import { describe, expect, it } from 'vitest';
import { engineConfigSchema, formatZodIssues } from '../src/validation/index.js';
import { parseFlag, resolveHistoryColumns } from '../src/utils/history.js';

describe('engineConfigSchema', () => {
  it('fills in defaults', () => {
    expect(engineConfigSchema.parse({ businessKey: 'id', monitoredAttributes: ['price'] })).toEqual({
      businessKey: 'id',
      monitoredAttributes: ['price'],
      detectRemoved: false,
      hashAlgorithm: 'sha256',
    });
  });

  it('rejects monitored key columns and duplicates', () => {
    const result = engineConfigSchema.safeParse({
      businessKey: ['region', 'sku'],
      monitoredAttributes: ['price', 'sku', 'price'],
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues('Invalid engine configuration', result.error)).toBe(
        [
          'Invalid engine configuration:',
          '- monitoredAttributes: Duplicate monitored attribute: price',
          "- monitoredAttributes.1: Business key column 'sku' cannot be a monitored attribute",
        ].join('\n')
      );
    }
  });

  it('rejects unknown options', () => {
    const result = engineConfigSchema.safeParse({
      businessKey: 'id',
      monitoredAttributes: ['price'],
      detectDeleted: true,
    });
    expect(result.success).toBe(false);
  });
});

describe('resolveHistoryColumns', () => {
  it('overrides defaults by name', () => {
    expect(resolveHistoryColumns({ validFrom: 'effective_from' })).toEqual({
      rowHash: 'row_hash',
      validFrom: 'effective_from',
      validTo: 'valid_to',
      isCurrent: 'is_current',
    });
  });

  it('requires distinct names', () => {
    expect(() => resolveHistoryColumns({ validTo: 'valid_from' })).toThrow(/must be distinct/);
  });
});

describe('parseFlag', () => {
  it('reads driver representations', () => {
    expect([true, 1, 1n, 't', 'TRUE', '1'].map((v) => parseFlag(v))).toEqual([true, true, true, true, true, true]);
    expect([false, 0, 0n, 'f', 'false', '0'].map((v) => parseFlag(v))).toEqual([false, false, false, false, false, false]);
  });

  it('rejects anything else', () => {
    expect(() => parseFlag('yes', 'is_current')).toThrow('Invalid is_current value: yes');
  });
});
