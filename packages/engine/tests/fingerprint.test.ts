import { describe, expect, it } from 'vitest';
import {
  canonicalize,
  diffAttributes,
  encodeKey,
  fingerprint,
  hashCanonical,
  toScalar,
  toTypedRecord,
} from '../src/fingerprint/index.js';
import { ScdError } from '../src/errors/index.js';
import { captureError } from './support/errors.js';

const ATTRS = ['name', 'price', 'qty', 'note'];

describe('canonicalize', () => {
  it('joins typed tokens in attribute order', () => {
    const typed = toTypedRecord({ name: 'a|b', price: 12.5, qty: 3, note: null }, ATTRS);
    expect(canonicalize(typed, ATTRS)).toBe('t:a\\|b|n:12.5|n:3|\\N');
  });

  it('escapes backslashes before separators', () => {
    const typed = toTypedRecord({ name: 'c:\\tmp' }, ['name']);
    expect(canonicalize(typed, ['name'])).toBe('t:c:\\\\tmp');
  });
});

describe('toScalar', () => {
  it('maps booleans and bigints to integers', () => {
    expect(toScalar(true, 'flag')).toEqual({ kind: 'integer', value: 1n });
    expect(toScalar(42n, 'n')).toEqual({ kind: 'integer', value: 42n });
  });

  it('renders dates as ISO text', () => {
    expect(toScalar(new Date('2024-03-01T10:00:00Z'), 'at')).toEqual({
      kind: 'text',
      value: '2024-03-01T10:00:00.000Z',
    });
  });

  it('rejects objects and arrays', () => {
    for (const value of [{ a: 1 }, [1, 2], new Date('not a date')]) {
      const err = captureError(() => toScalar(value, 'payload'));
      expect(err).toBeInstanceOf(ScdError);
      expect(err).toMatchObject({ code: 'UNSUPPORTED_VALUE', context: { attribute: 'payload' } });
    }
  });
});

describe('fingerprint', () => {
  const record = { id: 1, name: 'Laptop', price: 999.99, qty: 4, note: null };

  it('is deterministic and hex encoded', () => {
    const first = fingerprint(record, ATTRS);
    expect(first).toMatch(/^[0-9a-f]{64}$/);
    expect(fingerprint({ ...record }, ATTRS)).toBe(first);
  });

  it('uses sha512 when asked', () => {
    expect(fingerprint(record, ATTRS, { algorithm: 'sha512' })).toMatch(/^[0-9a-f]{128}$/);
  });

  it('hashes the canonical text', () => {
    expect(hashCanonical('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    expect(fingerprint(record, [])).toBe(hashCanonical(''));
  });

  it('ignores attributes that are not monitored', () => {
    expect(fingerprint({ ...record, id: 99, extra: 'x' }, ATTRS)).toBe(fingerprint(record, ATTRS));
  });

  it('treats numerically equal integers and reals alike', () => {
    expect(fingerprint({ ...record, qty: 4n }, ATTRS)).toBe(fingerprint(record, ATTRS));
    expect(fingerprint({ flag: true }, ['flag'])).toBe(fingerprint({ flag: 1 }, ['flag']));
  });

  it('distinguishes text from numbers and null from its token', () => {
    expect(fingerprint({ qty: '4' }, ['qty'])).not.toBe(fingerprint({ qty: 4 }, ['qty']));
    expect(fingerprint({ note: '\\N' }, ['note'])).not.toBe(fingerprint({ note: null }, ['note']));
    expect(fingerprint({ note: '' }, ['note'])).not.toBe(fingerprint({ note: null }, ['note']));
  });

  it('does not let a separator shift values between attributes', () => {
    const a = fingerprint({ x: 'p|q', y: 'r' }, ['x', 'y']);
    const b = fingerprint({ x: 'p', y: 'q|r' }, ['x', 'y']);
    expect(a).not.toBe(b);
  });

  it('depends on attribute order', () => {
    expect(fingerprint(record, ['name', 'price'])).not.toBe(fingerprint(record, ['price', 'name']));
  });

  it('fails on a missing attribute', () => {
    const err = captureError(() => fingerprint({ name: 'Laptop' }, ['name', 'price']));
    expect(err).toMatchObject({
      code: 'MISSING_ATTRIBUTE',
      context: { attribute: 'price', available: ['name'] },
    });
  });
});

describe('encodeKey', () => {
  it('gives numeric text the token of the number', () => {
    expect(encodeKey({ id: 1001 }, ['id'])).toBe('n:1001');
    expect(encodeKey({ id: '1001' }, ['id'])).toBe('n:1001');
    expect(encodeKey({ id: '1001.0' }, ['id'])).toBe('n:1001');
    expect(encodeKey({ id: 1001n }, ['id'])).toBe('n:1001');
    expect(encodeKey({ id: '12.50' }, ['id'])).toBe('n:12.5');
    expect(encodeKey({ id: 12.5 }, ['id'])).toBe('n:12.5');
    expect(encodeKey({ id: '-0' }, ['id'])).toBe('n:0');
  });

  it('keeps other text keys as text', () => {
    expect(encodeKey({ id: '007' }, ['id'])).toBe('t:007');
    expect(encodeKey({ id: '1e3' }, ['id'])).toBe('t:1e3');
    expect(encodeKey({ id: 'A-1' }, ['id'])).toBe('t:A-1');
    expect(encodeKey({ id: ' 1' }, ['id'])).toBe('t: 1');
  });

  it('joins composite keys', () => {
    expect(encodeKey({ region: 'eu', sku: 7 }, ['region', 'sku'])).toBe('t:eu|n:7');
  });

  it('rejects null keys', () => {
    const err = captureError(() => encodeKey({ id: null }, ['id']));
    expect(err).toMatchObject({ code: 'MISSING_ATTRIBUTE', context: { attribute: 'id' } });
  });
});

describe('diffAttributes', () => {
  it('lists attributes whose canonical value differs', () => {
    const before = { name: 'Laptop', price: 999.99, qty: 4, note: null };
    const after = { name: 'Laptop', price: 1299.99, qty: 4n, note: 'sale' };
    expect(diffAttributes(before, after, ATTRS)).toEqual(['price', 'note']);
  });

  it('counts a missing attribute as changed', () => {
    expect(diffAttributes({ name: 'a' }, { name: 'a', qty: 1 }, ['name', 'qty'])).toEqual(['qty']);
  });
});
