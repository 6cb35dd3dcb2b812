import { describe, expect, it, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConnectorError } from '@histrack/core';
import { createCsvSource, createJsonSource } from '../src/index.js';

let tmpDir = '';

function fixture(name: string, content: string): string {
  tmpDir = tmpDir || mkdtempSync(join(tmpdir(), 'connector-file-'));
  const filePath = join(tmpDir, name);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

describe('CsvSource', () => {
  it('reads a snapshot with numeric casting and null empty cells', async () => {
    const filePath = fixture('products.csv', 'product_id,name,price,stock\n1,Laptop,999.99,\n2,"Mouse, wireless",19.5,40\n');
    const source = createCsvSource({ id: 'csv', name: 'products', filePath });

    await source.connect();

    expect(await source.fetchAll()).toEqual([
      { product_id: 1, name: 'Laptop', price: 999.99, stock: null },
      { product_id: 2, name: 'Mouse, wireless', price: 19.5, stock: 40 },
    ]);
  });

  it('handles empty files', async () => {
    const source = createCsvSource({ id: 'csv-empty', name: 'empty', filePath: fixture('empty.csv', '') });

    await source.connect();

    expect(await source.fetchAll()).toEqual([]);
  });

  it('honours delimiter and casting options', async () => {
    const filePath = fixture('semicolon.csv', 'sku;qty\n007;\n');
    const source = createCsvSource({
      id: 'csv-semi',
      name: 'semi',
      filePath,
      delimiter: ';',
      castNumbers: false,
      emptyAsNull: false,
    });

    await source.connect();

    expect(await source.fetchAll()).toEqual([{ sku: '007', qty: '' }]);
  });

  it('names columns when the file has no header row', async () => {
    const source = createCsvSource({
      id: 'csv-plain',
      name: 'plain',
      filePath: fixture('plain.csv', 'a,1\nb,2\n'),
      headers: false,
    });

    await source.connect();

    expect(await source.fetchAll()).toEqual([
      { Column1: 'a', Column2: 1 },
      { Column1: 'b', Column2: 2 },
    ]);
  });

  it('tolerates a byte order mark', async () => {
    const source = createCsvSource({ id: 'csv-bom', name: 'bom', filePath: fixture('bom.csv', '\uFEFFid,name\n1,A\n') });

    await source.connect();

    expect(await source.fetchAll()).toEqual([{ id: 1, name: 'A' }]);
  });

  it('rejects unsafe and duplicate headers', async () => {
    const unsafe = createCsvSource({ id: 'csv-proto', name: 'proto', filePath: fixture('proto.csv', '__proto__,id\nx,1\n') });
    const duplicate = createCsvSource({ id: 'csv-dup', name: 'dup', filePath: fixture('dup.csv', 'id,id\n1,2\n') });
    await unsafe.connect();
    await duplicate.connect();

    await expect(unsafe.fetchAll()).rejects.toThrow('Unsafe CSV header name: __proto__');
    await expect(duplicate.fetchAll()).rejects.toThrow('Duplicate CSV header name: id');
  });

  it('re-reads the file on every fetch', async () => {
    const filePath = fixture('live.csv', 'id,v\n1,a\n');
    const source = createCsvSource({ id: 'csv-live', name: 'live', filePath });
    await source.connect();
    await source.fetchAll();

    writeFileSync(filePath, 'id,v\n1,b\n2,c\n', 'utf-8');

    expect(await source.fetchAll()).toEqual([
      { id: 1, v: 'b' },
      { id: 2, v: 'c' },
    ]);
  });

  it('reports a missing file as a configuration error', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'connector-file-'));
    const source = createCsvSource({ id: 'csv-missing', name: 'missing', filePath: join(tmpDir, 'nope.csv') });

    const error = await source.connect().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConnectorError);
    expect(error).toMatchObject({ code: 'CONFIGURATION_ERROR' });
    expect(source.state).toBe('error');
  });

  it('refuses to fetch before connect', async () => {
    const source = createCsvSource({ id: 'csv-idle', name: 'idle', filePath: fixture('idle.csv', 'id\n1\n') });

    await expect(source.fetchAll()).rejects.toMatchObject({ code: 'CONNECTION_FAILED' });
  });
});

describe('JsonSource', () => {
  it('reads a top-level array', async () => {
    const source = createJsonSource({
      id: 'json',
      name: 'products',
      filePath: fixture('products.json', JSON.stringify([{ id: 1, tags: null }, { id: 2, tags: 'x' }])),
    });

    await source.connect();

    expect(await source.fetchAll()).toEqual([
      { id: 1, tags: null },
      { id: 2, tags: 'x' },
    ]);
  });

  it('reads records under a dotted recordsPath', async () => {
    const filePath = fixture('nested.json', JSON.stringify({ data: { items: [{ id: 1, price: 10 }] } }));
    const source = createJsonSource({ id: 'json-nested', name: 'nested', filePath, recordsPath: 'data.items' });

    await source.connect();

    expect(await source.fetchAll()).toEqual([{ id: 1, price: 10 }]);
  });

  it('rejects a path that is not an array', async () => {
    const filePath = fixture('object.json', JSON.stringify({ data: { items: { id: 1 } } }));
    const source = createJsonSource({ id: 'json-obj', name: 'obj', filePath, recordsPath: 'data.items' });

    await source.connect();

    await expect(source.fetchAll()).rejects.toThrow("Path 'data.items' does not contain an array");
  });

  it('rejects array elements that are not objects', async () => {
    const source = createJsonSource({ id: 'json-mixed', name: 'mixed', filePath: fixture('mixed.json', '[{"id":1},2]') });

    await source.connect();

    await expect(source.fetchAll()).rejects.toThrow('Element 1 is not an object');
  });

  it('rejects invalid JSON', async () => {
    const source = createJsonSource({ id: 'json-bad', name: 'bad', filePath: fixture('bad.json', '[{') });

    await source.connect();

    await expect(source.fetchAll()).rejects.toMatchObject({ code: 'READ_FAILED' });
  });

  it('rejects unsafe recordsPath segments up front', () => {
    expect(() =>
      createJsonSource({ id: 'json-proto', name: 'proto', filePath: 'unused.json', recordsPath: 'data.__proto__' })
    ).toThrow('Unsafe recordsPath segment: "__proto__"');
  });
});
