import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import type { ISourceReader } from '@histrack/core';
import { SqliteHistoryStore, type SqliteHistoryStoreConfig } from '@histrack/connector-db';
import { CsvSource, JsonSource } from '@histrack/connector-file';
import { RunOrchestrator } from '@histrack/engine';

const T0 = new Date('2026-01-01T00:00:00.000Z');
const T1 = new Date('2026-02-01T00:00:00.000Z');
const T2 = new Date('2026-03-01T00:00:00.000Z');

const CONFIG = { businessKey: 'sku', monitoredAttributes: ['price'] };

describe('history round trip through SQLite', () => {
  let tmpDir: string;
  let dbPath: string;

  function createTable(ddl: string): void {
    const db = new Database(dbPath);
    db.exec(ddl);
    db.close();
  }

  function query(sql: string): unknown[] {
    const db = new Database(dbPath, { readonly: true });
    try {
      return db.prepare(sql).all();
    } finally {
      db.close();
    }
  }

  async function withConnectors<T>(
    source: ISourceReader,
    historyConfig: Omit<SqliteHistoryStoreConfig, 'type' | 'id' | 'name' | 'filename' | 'businessKey'>,
    run: (orchestrator: RunOrchestrator) => Promise<T>
  ): Promise<T> {
    const history = new SqliteHistoryStore({
      id: 'history',
      name: 'History',
      filename: dbPath,
      businessKey: 'sku',
      ...historyConfig,
    });
    await source.connect();
    await history.connect();
    try {
      return await run(new RunOrchestrator(source, history, CONFIG));
    } finally {
      await history.disconnect();
      await source.disconnect();
    }
  }

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'histrack-round-trip-'));
    dbPath = join(tmpDir, 'history.db');
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('matches numeric CSV keys stored in a TEXT column', async () => {
    createTable(`
      CREATE TABLE product_history (
        sku TEXT NOT NULL, price REAL, row_hash TEXT NOT NULL,
        valid_from TEXT NOT NULL, valid_to TEXT NOT NULL, is_current INTEGER NOT NULL
      )
    `);
    const csvPath = join(tmpDir, 'products.csv');
    writeFileSync(csvPath, 'sku,price\n1001,9.5\n');
    const source = new CsvSource({ id: 'products', name: 'Products', filePath: csvPath });

    const [first, second, third] = await withConnectors(source, { table: 'product_history' }, async (orchestrator) => [
      await orchestrator.runOnce({ asOf: T0 }),
      await orchestrator.runOnce({ asOf: T1 }),
      await orchestrator.runOnce({ asOf: T2 }),
    ]);

    expect(first?.counts).toEqual({ new: 1, changed: 0, unchanged: 0, removed: 0 });
    expect(second?.counts).toEqual({ new: 0, changed: 0, unchanged: 1, removed: 0 });
    expect(second?.mutations).toEqual({ closedOut: 0, inserted: 0 });
    expect(third?.counts.unchanged).toBe(1);
    expect(query('SELECT sku, is_current FROM product_history')).toEqual([{ sku: '1001', is_current: 1 }]);
  });

  it('matches text JSON keys stored in an INTEGER column', async () => {
    createTable(`
      CREATE TABLE product_history (
        sku INTEGER NOT NULL, price REAL, row_hash TEXT NOT NULL,
        valid_from TEXT NOT NULL, valid_to TEXT NOT NULL, is_current INTEGER NOT NULL
      )
    `);
    const jsonPath = join(tmpDir, 'products.json');
    writeFileSync(jsonPath, JSON.stringify([{ sku: '1001', price: 9.5 }]));
    const source = new JsonSource({ id: 'products', name: 'Products', filePath: jsonPath });

    const second = await withConnectors(source, { table: 'product_history' }, async (orchestrator) => {
      await orchestrator.runOnce({ asOf: T0 });
      return orchestrator.runOnce({ asOf: T1 });
    });

    expect(second.counts).toEqual({ new: 0, changed: 0, unchanged: 1, removed: 0 });
    expect(query('SELECT sku FROM product_history')).toEqual([{ sku: 1001 }]);
  });

  it('versions a table kept with space-separated timestamps', async () => {
    createTable(`
      CREATE TABLE sales_history (
        sku INTEGER NOT NULL, price REAL, row_hash TEXT NOT NULL,
        row_start_date TEXT NOT NULL, row_end_date TEXT NOT NULL, is_current INTEGER NOT NULL
      );
      INSERT INTO sales_history VALUES (1, 9.5, 'abc', '2026-01-19 10:00:00', '9999-12-31 23:59:59', 1);
    `);
    const csvPath = join(tmpDir, 'sales.csv');
    writeFileSync(csvPath, 'sku,price\n1,12\n');
    const source = new CsvSource({ id: 'sales', name: 'Sales', filePath: csvPath });

    const summary = await withConnectors(
      source,
      {
        table: 'sales_history',
        columns: { validFrom: 'row_start_date', validTo: 'row_end_date' },
        timestampFormat: 'sql',
      },
      (orchestrator) => orchestrator.runOnce({ asOf: T1 })
    );

    expect(summary.counts).toEqual({ new: 0, changed: 1, unchanged: 0, removed: 0 });
    expect(
      query('SELECT price, row_start_date, row_end_date, is_current FROM sales_history ORDER BY row_start_date')
    ).toEqual([
      { price: 9.5, row_start_date: '2026-01-19 10:00:00', row_end_date: '2026-02-01 00:00:00.000', is_current: 0 },
      { price: 12, row_start_date: '2026-02-01 00:00:00.000', row_end_date: '9999-12-31 23:59:59.999', is_current: 1 },
    ]);
  });
});
