import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ConnectorError, END_OF_TIME } from '@histrack/core';

const T1 = new Date('2024-01-01T00:00:00.000Z');
const T2 = new Date('2024-02-01T00:00:00.000Z');

interface RecordedQuery {
  sql: string;
  params?: unknown[];
}

const { pgPoolQueries, pgClientQueries, mysqlQueries } = vi.hoisted(() => {
  const pgPoolQueries: RecordedQuery[] = [];
  const pgClientQueries: RecordedQuery[] = [];
  const mysqlQueries: RecordedQuery[] = [];
  return { pgPoolQueries, pgClientQueries, mysqlQueries };
});

vi.mock('pg', () => {
  const columns = [
    { name: 'product_id', data_type: 'integer', is_nullable: false, column_default: null, is_primary_key: true },
    { name: 'name', data_type: 'text', is_nullable: true, column_default: null, is_primary_key: false },
    { name: 'price', data_type: 'numeric', is_nullable: true, column_default: null, is_primary_key: false },
    { name: 'row_hash', data_type: 'text', is_nullable: false, column_default: null, is_primary_key: false },
    { name: 'valid_from', data_type: 'timestamp with time zone', is_nullable: false, column_default: null, is_primary_key: true },
    { name: 'valid_to', data_type: 'timestamp with time zone', is_nullable: false, column_default: null, is_primary_key: false },
    { name: 'is_current', data_type: 'boolean', is_nullable: false, column_default: null, is_primary_key: false },
  ];

  class MockClient {
    release = vi.fn();
    query = vi.fn(async (sql: string, params?: unknown[]) => {
      pgClientQueries.push({ sql, params });
      if (sql.startsWith('UPDATE')) {
        const error = Object.assign(new Error('deadlock detected'), { code: '40P01' });
        if (params?.[2] === 99) throw error;
        return { rows: [], rowCount: 1 };
      }
      return { rows: [], rowCount: sql.startsWith('INSERT') ? 1 : null };
    });
  }

  class MockPool {
    connect = vi.fn(async () => new MockClient());
    query = vi.fn(async (sql: string, params?: unknown[]) => {
      if (sql.includes('information_schema.columns')) {
        return { rows: columns, rowCount: columns.length };
      }
      pgPoolQueries.push({ sql, params });
      if (sql.includes('MAX("valid_from")')) {
        return { rows: [{ latest: new Date('2024-01-01T00:00:00.000Z') }], rowCount: 1 };
      }
      if (sql.includes('MAX("valid_to")')) {
        return { rows: [{ latest: null }], rowCount: 1 };
      }
      return {
        rows: [
          {
            product_id: 1,
            name: 'Laptop',
            price: '999.99',
            row_hash: 'abc',
            valid_from: new Date('2024-01-01T00:00:00.000Z'),
            valid_to: new Date('9999-12-31T23:59:59.999Z'),
            is_current: true,
          },
        ],
        rowCount: 1,
      };
    });
    end = vi.fn(async () => {});
  }
  return { default: { Pool: MockPool }, Pool: MockPool };
});

vi.mock('mysql2/promise', () => {
  class MockConnection {
    execute = vi.fn(async (sql: string, params?: unknown[]) => {
      mysqlQueries.push({ sql, params });
      if (sql.startsWith('UPDATE')) return [{ affectedRows: 1 }, []];
      return [[], []];
    });
    beginTransaction = vi.fn(async () => {});
    commit = vi.fn(async () => {});
    rollback = vi.fn(async () => {});
    release = vi.fn();
  }
  class MockPool {
    execute = vi.fn(async (sql: string) => {
      if (sql.includes('INFORMATION_SCHEMA.COLUMNS')) {
        return [
          [
            { name: 'product_id', data_type: 'int', is_nullable: 0, column_default: null, is_primary_key: 1 },
            { name: 'row_hash', data_type: 'char', is_nullable: 0, column_default: null, is_primary_key: 0 },
            { name: 'valid_from', data_type: 'datetime', is_nullable: 0, column_default: null, is_primary_key: 1 },
            { name: 'valid_to', data_type: 'datetime', is_nullable: 0, column_default: null, is_primary_key: 0 },
            { name: 'is_current', data_type: 'tinyint', is_nullable: 0, column_default: null, is_primary_key: 0 },
          ],
          [],
        ];
      }
      return [[], []];
    });
    getConnection = vi.fn(async () => new MockConnection());
    end = vi.fn(async () => {});
  }
  return { default: { createPool: () => new MockPool() } };
});

// Imports after mocks
import { PostgresHistoryStore, classifyPostgresError } from '../src/postgresql/index.js';
import { MySQLHistoryStore, classifyMysqlError } from '../src/mysql/index.js';

describe('PostgresHistoryStore', () => {
  beforeEach(() => {
    pgPoolQueries.length = 0;
    pgClientQueries.length = 0;
  });

  async function connected(): Promise<PostgresHistoryStore> {
    const store = new PostgresHistoryStore({
      id: 'pg-history',
      name: 'Product history',
      table: 'product_history',
      businessKey: 'product_id',
      password: 'test-secret',
    });
    await store.connect();
    return store;
  }

  it('reads current versions with a bound flag', async () => {
    const store = await connected();
    const rows = await store.fetchCurrent();

    expect(pgPoolQueries).toEqual([
      {
        sql: 'SELECT * FROM "public"."product_history" WHERE "is_current" = $1 ORDER BY "product_id"',
        params: [1],
      },
    ]);
    expect(rows).toEqual([
      {
        keyValues: { product_id: 1 },
        attributes: { product_id: 1, name: 'Laptop', price: '999.99' },
        fingerprint: 'abc',
        validFrom: T1,
        validTo: END_OF_TIME,
        isCurrent: true,
        storedValidFrom: T1,
      },
    ]);
  });

  it('reads the latest boundary', async () => {
    const store = await connected();
    await expect(store.latestBoundary()).resolves.toEqual(T1);
    expect(pgPoolQueries[1]).toEqual({
      sql: 'SELECT MAX("valid_to") AS latest FROM "public"."product_history" WHERE "is_current" = $1',
      params: [0],
    });
  });

  it('closes out and inserts on one dedicated connection', async () => {
    const store = await connected();
    const tx = await store.beginTransaction();

    const closed = await tx.closeOut({ keyValues: { product_id: 1 }, validFrom: T1, asOf: T2 });
    await tx.insertVersion({
      attributes: { product_id: 1, name: 'Laptop', price: 1299.99, stock: 5 },
      fingerprint: 'def',
      validFrom: T2,
      validTo: END_OF_TIME,
    });
    await tx.commit();

    expect(closed).toBe(1);
    expect(pgClientQueries).toEqual([
      { sql: 'BEGIN', params: [] },
      {
        sql: 'UPDATE "public"."product_history" SET "valid_to" = $1, "is_current" = $2 WHERE "product_id" = $3 AND "valid_from" = $4 AND "is_current" = $5',
        params: ['2024-02-01T00:00:00.000Z', 0, 1, '2024-01-01T00:00:00.000Z', 1],
      },
      {
        sql: 'INSERT INTO "public"."product_history" ("product_id", "name", "price", "row_hash", "valid_from", "valid_to", "is_current") VALUES ($1, $2, $3, $4, $5, $6, $7)',
        params: [1, 'Laptop', 1299.99, 'def', '2024-02-01T00:00:00.000Z', '9999-12-31T23:59:59.999Z', 1],
      },
      { sql: 'COMMIT', params: [] },
    ]);
  });

  it('classifies deadlocks as lock failures', async () => {
    const store = await connected();
    const tx = await store.beginTransaction();

    const error = await tx.closeOut({ keyValues: { product_id: 99 }, validFrom: T1, asOf: T2 }).catch((err: unknown) => err);
    await tx.rollback();

    expect(error).toBeInstanceOf(ConnectorError);
    expect(error).toMatchObject({ code: 'LOCKED', message: 'Query failed: deadlock detected' });
    expect(pgClientQueries.map((q) => q.sql).at(-1)).toBe('ROLLBACK');
  });

  it('rejects unsafe identifiers before any query', () => {
    expect(
      () =>
        new PostgresHistoryStore({
          id: 'pg',
          name: 'pg',
          table: 'history;DROP TABLE users;',
          businessKey: 'product_id',
        })
    ).toThrow(ConnectorError);
    expect(
      () =>
        new PostgresHistoryStore({
          id: 'pg',
          name: 'pg',
          table: 'product_history',
          businessKey: 'product_id',
          columns: { validTo: 'valid_to" = now() --' },
        })
    ).toThrow(/Invalid history column name/);
  });

  it('maps SQLSTATE codes', () => {
    const withCode = (code: string) => Object.assign(new Error('x'), { code });
    expect(classifyPostgresError(withCode('40001'), 'WRITE_FAILED')).toBe('CONFLICT');
    expect(classifyPostgresError(withCode('57014'), 'READ_FAILED')).toBe('TIMEOUT');
    expect(classifyPostgresError(withCode('08006'), 'READ_FAILED')).toBe('CONNECTION_FAILED');
    expect(classifyPostgresError(withCode('42P01'), 'READ_FAILED')).toBe('SCHEMA_MISMATCH');
    expect(classifyPostgresError(withCode('ECONNREFUSED'), 'READ_FAILED')).toBe('CONNECTION_FAILED');
    expect(classifyPostgresError(withCode('22P02'), 'READ_FAILED')).toBe('READ_FAILED');
  });
});

describe('MySQLHistoryStore', () => {
  beforeEach(() => {
    mysqlQueries.length = 0;
  });

  it('binds timestamps as dates and reads affected rows', async () => {
    const store = new MySQLHistoryStore({
      id: 'mysql-history',
      name: 'Product history',
      table: 'product_history',
      businessKey: 'product_id',
      password: 'test-secret',
    });
    await store.connect();

    const tx = await store.beginTransaction();
    const closed = await tx.closeOut({ keyValues: { product_id: 1 }, validFrom: T1, asOf: T2 });
    await tx.commit();

    expect(closed).toBe(1);
    expect(mysqlQueries).toEqual([
      {
        sql: 'UPDATE `product_history` SET `valid_to` = ?, `is_current` = ? WHERE `product_id` = ? AND `valid_from` = ? AND `is_current` = ?',
        params: [T2, 0, 1, T1, 1],
      },
    ]);
  });

  it('maps server error numbers', () => {
    const withErrno = (errno: number) => Object.assign(new Error('x'), { errno });
    expect(classifyMysqlError(withErrno(1205), 'WRITE_FAILED')).toBe('LOCKED');
    expect(classifyMysqlError(withErrno(1213), 'WRITE_FAILED')).toBe('LOCKED');
    expect(classifyMysqlError(withErrno(1062), 'WRITE_FAILED')).toBe('CONFLICT');
    expect(classifyMysqlError(withErrno(1146), 'READ_FAILED')).toBe('SCHEMA_MISMATCH');
    expect(classifyMysqlError(Object.assign(new Error('x'), { code: 'PROTOCOL_CONNECTION_LOST' }), 'READ_FAILED')).toBe(
      'CONNECTION_FAILED'
    );
  });
});
