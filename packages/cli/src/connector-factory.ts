/**
 * Build source readers and history stores from config entries
 */

import { resolve } from 'node:path';
import type { IHistoryStore, ISourceReader } from '@histrack/core';
import { CsvSource, JsonSource } from '@histrack/connector-file';
import {
  MySQLHistoryStore,
  MySQLSourceReader,
  PostgresHistoryStore,
  PostgresSourceReader,
  SqliteHistoryStore,
  SqliteSourceReader,
} from '@histrack/connector-db';
import type { HistoryEntry, SourceEntry } from './config.js';

function resolvePath(filePath: string): string {
  return resolve(process.cwd(), filePath);
}

function resolveDatabaseFile(filename: string): string {
  return filename === ':memory:' ? filename : resolvePath(filename);
}

export function createSource(entry: SourceEntry): ISourceReader {
  const name = entry.name || entry.id;

  switch (entry.type) {
    case 'csv':
      return new CsvSource({ ...entry, name, filePath: resolvePath(entry.filePath) });

    case 'json':
      return new JsonSource({ ...entry, name, filePath: resolvePath(entry.filePath) });

    case 'postgresql':
      return new PostgresSourceReader({ ...entry, name });

    case 'mysql':
      return new MySQLSourceReader({ ...entry, name });

    case 'sqlite':
      return new SqliteSourceReader({ ...entry, name, filename: resolveDatabaseFile(entry.filename), readonly: true });

    default: {
      const exhaustive: never = entry;
      throw new Error(`Unknown source type: ${JSON.stringify(exhaustive)}`);
    }
  }
}

/**
 * The history table is keyed by the pipeline's business key
 */
export function createHistoryStore(entry: HistoryEntry, businessKey: string | string[]): IHistoryStore {
  const name = entry.name || entry.id;

  switch (entry.type) {
    case 'postgresql':
      return new PostgresHistoryStore({ ...entry, name, businessKey });

    case 'mysql':
      return new MySQLHistoryStore({ ...entry, name, businessKey });

    case 'sqlite':
      return new SqliteHistoryStore({ ...entry, name, businessKey, filename: resolveDatabaseFile(entry.filename) });

    default: {
      const exhaustive: never = entry;
      throw new Error(`Unknown history type: ${JSON.stringify(exhaustive)}`);
    }
  }
}
