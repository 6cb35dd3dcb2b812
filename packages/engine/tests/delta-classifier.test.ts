import { describe, expect, it } from 'vitest';
import { CurrentSlice, DeltaClassifier, classify } from '../src/changes/index.js';
import { fingerprint } from '../src/fingerprint/index.js';
import type { ClassifiedItem } from '../src/types/index.js';
import { captureError } from './support/errors.js';
import { versionRow } from './support/memory-history-store.js';

const ATTRS = ['name', 'price'];
const T1 = '2024-01-01T00:00:00.000Z';

function current(attributes: { id: number | string; name: string; price: number }) {
  return versionRow(attributes, fingerprint(attributes, ATTRS), T1);
}

function outcomes(items: readonly ClassifiedItem[]): Array<[unknown, string]> {
  return items.map((item) => [item.keyValues.id, item.outcome]);
}

describe('DeltaClassifier', () => {
  const laptop = current({ id: 1, name: 'Laptop', price: 999.99 });
  const history = [
    laptop,
    current({ id: 2, name: 'Mouse', price: 19.5 }),
    current({ id: 3, name: 'Cable', price: 4 }),
  ];

  it('assigns one outcome per source key', () => {
    const result = classify(
      [
        { id: 1, name: 'Laptop', price: 1299.99 },
        { id: 2, name: 'Mouse', price: 19.5 },
        { id: 4, name: 'Dock', price: 150 },
      ],
      history,
      { businessKey: 'id', monitoredAttributes: ATTRS }
    );

    expect(outcomes(result.items)).toEqual([
      [1, 'changed'],
      [2, 'unchanged'],
      [4, 'new'],
    ]);
    expect(result.counts).toEqual({ new: 1, changed: 1, unchanged: 1, removed: 0 });
    expect(result.sourceCount).toBe(3);
    expect(result.currentCount).toBe(3);
  });

  it('reports missing keys as removed only when asked', () => {
    const classifier = new DeltaClassifier({ businessKey: 'id', monitoredAttributes: ATTRS, detectRemoved: true });
    const result = classifier.classify([{ id: 2, name: 'Mouse', price: 19.5 }], history);

    expect(outcomes(result.items)).toEqual([
      [2, 'unchanged'],
      [1, 'removed'],
      [3, 'removed'],
    ]);
    expect(result.counts.removed).toBe(2);
  });

  it('records which monitored attributes changed', () => {
    const [item] = classify([{ id: 1, name: 'Laptop', price: 1299.99 }], history, {
      businessKey: 'id',
      monitoredAttributes: ATTRS,
    }).items;

    expect(item?.outcome).toBe('changed');
    if (item?.outcome === 'changed') {
      expect(item.changedAttributes).toEqual(['price']);
      expect(item.prior.attributes).toEqual({ id: 1, name: 'Laptop', price: 999.99 });
    }
  });

  it('ignores unmonitored attributes', () => {
    const result = classify([{ id: 3, name: 'Cable', price: 4, stock: 12 }], history, {
      businessKey: 'id',
      monitoredAttributes: ATTRS,
    });
    expect(result.counts.unchanged).toBe(1);
  });

  it('treats an empty history as all new', () => {
    const result = classify([{ id: 1, name: 'Laptop', price: 1 }], [], {
      businessKey: 'id',
      monitoredAttributes: ATTRS,
      detectRemoved: true,
    });
    expect(result.counts).toEqual({ new: 1, changed: 0, unchanged: 0, removed: 0 });
  });

  it('matches a key the store returned as text with its numeric source value', () => {
    const stored = current({ id: '1001.0', name: 'Laptop', price: 999.99 });
    const result = classify([{ id: 1001, name: 'Laptop', price: 999.99 }], [stored], {
      businessKey: 'id',
      monitoredAttributes: ATTRS,
    });
    expect(result.items[0]?.outcome).toBe('unchanged');
  });

  it('matches a numeric-text source key with a stored integer key', () => {
    const result = classify([{ id: '1', name: 'Laptop', price: 999.99 }], history, {
      businessKey: 'id',
      monitoredAttributes: ATTRS,
    });
    expect(result.items[0]?.outcome).toBe('unchanged');
  });

  it('supports composite keys', () => {
    const attrs = { region: 'eu', sku: 7, name: 'Laptop', price: 10 };
    const row = versionRow(attrs, fingerprint(attrs, ATTRS), T1, undefined, ['region', 'sku']);
    const result = classify(
      [
        { region: 'eu', sku: 7, name: 'Laptop', price: 10 },
        { region: 'us', sku: 7, name: 'Laptop', price: 10 },
      ],
      [row],
      { businessKey: ['region', 'sku'], monitoredAttributes: ATTRS }
    );
    expect(result.items.map((item) => item.outcome)).toEqual(['unchanged', 'new']);
  });

  it('rejects duplicate source keys', () => {
    const err = captureError(() =>
      classify(
        [
          { id: 5, name: 'a', price: 1 },
          { id: 5, name: 'b', price: 2 },
          { id: 5, name: 'c', price: 3 },
        ],
        [],
        { businessKey: 'id', monitoredAttributes: ATTRS }
      )
    );
    expect(err).toMatchObject({
      code: 'DUPLICATE_KEY',
      context: { keys: ['5'], occurrences: { '5': 3 } },
    });
  });

  it('rejects history with two current rows for a key', () => {
    const err = captureError(() =>
      classify([], [laptop, laptop], {
        businessKey: 'id',
        monitoredAttributes: ATTRS,
      })
    );
    expect(err).toMatchObject({ code: 'INVARIANT_VIOLATION', context: { keys: ['1'] } });
  });

  it('rejects a current slice holding closed rows', () => {
    const closed = versionRow({ id: 1, name: 'Laptop', price: 1 }, 'x', T1, '2024-02-01T00:00:00.000Z');
    const err = captureError(() => CurrentSlice.fromRows([closed], ['id']));
    expect(err).toMatchObject({ code: 'INVARIANT_VIOLATION' });
  });

  it('surfaces missing source attributes', () => {
    const err = captureError(() =>
      classify([{ id: 1, name: 'Laptop' }], history, { businessKey: 'id', monitoredAttributes: ATTRS })
    );
    expect(err).toMatchObject({ code: 'MISSING_ATTRIBUTE', context: { attribute: 'price' } });
  });
});
