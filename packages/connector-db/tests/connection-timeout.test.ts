import { describe, expect, it, vi } from 'vitest';
import { ConnectorError } from '@histrack/core';

vi.mock('../src/postgresql/client.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/postgresql/client.js')>();
  class FailingClient extends actual.PostgresClient {
    async connect(): Promise<void> {
      throw new Error('timeout');
    }
  }
  return { ...actual, PostgresClient: FailingClient };
});

import { createPostgresHistoryStore } from '../src/postgresql/history-store.js';

describe('Database connection error handling', () => {
  it('wraps connection timeouts in ConnectorError', async () => {
    const store = createPostgresHistoryStore({
      id: 'pg',
      name: 'pg',
      table: 'dummy_history',
      businessKey: 'id',
    });

    await expect(store.connect()).rejects.toBeInstanceOf(ConnectorError);
    expect(store.state).toBe('error');
  });
});
