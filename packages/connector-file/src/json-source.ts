/**
 * JSON Source
 * Reads an array of objects, at the root or under a dotted path
 */

import type { Record } from '@histrack/core';
import { ConnectorError } from '@histrack/core';
import { BaseFileSource, FORBIDDEN_RECORD_KEYS, type FileSourceConfig } from './base-file-source.js';

export interface JsonSourceConfig extends FileSourceConfig {
  type: 'json';
  /** JSON path to the records array (e.g., 'data.items') */
  recordsPath?: string;
}

function isRecord(value: unknown): value is Record {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseSafePath(path: string, connectorId: string): string[] {
  const parts = path.split('.');
  if (parts.some((p) => p.length === 0)) {
    throw new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid recordsPath: "${path}"`,
      connectorId,
      suggestion: 'Use dot notation with non-empty segments (e.g., "data.items").',
    });
  }

  for (const part of parts) {
    if (FORBIDDEN_RECORD_KEYS.has(part)) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: `Unsafe recordsPath segment: "${part}"`,
        connectorId,
        suggestion: 'Avoid __proto__/prototype/constructor in recordsPath to prevent prototype pollution.',
      });
    }
  }

  return parts;
}

/**
 * Get nested value from object using dot notation path
 */
function getNestedValue(obj: unknown, path: string, connectorId: string): unknown {
  let current = obj;

  for (const part of parseSafePath(path, connectorId)) {
    if (!isRecord(current) || !Object.hasOwn(current, part)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

export class JsonSource extends BaseFileSource<JsonSourceConfig> {
  constructor(config: Omit<JsonSourceConfig, 'type'> & { type?: 'json' }) {
    super({ ...config, type: 'json' });
    if (config.recordsPath !== undefined) parseSafePath(config.recordsPath, config.id);
  }

  protected parseContent(content: string): Record[] {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConnectorError({
        code: 'READ_FAILED',
        message: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: this.config.id,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const { recordsPath } = this.config;
    const records = recordsPath ? getNestedValue(parsed, recordsPath, this.config.id) : parsed;

    if (!Array.isArray(records)) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: recordsPath
          ? `Path '${recordsPath}' does not contain an array`
          : 'JSON file does not contain an array at root level',
        connectorId: this.config.id,
        suggestion: recordsPath
          ? 'Check that recordsPath points to an array of objects.'
          : 'Either provide a JSON file with an array at root, or specify recordsPath.',
      });
    }

    return records.map((item, index) => {
      if (!isRecord(item)) {
        throw new ConnectorError({
          code: 'SCHEMA_MISMATCH',
          message: `Element ${index} is not an object`,
          connectorId: this.config.id,
        });
      }
      return item;
    });
  }
}

/**
 * Factory function to create a JSON source
 */
export function createJsonSource(config: Omit<JsonSourceConfig, 'type'>): JsonSource {
  return new JsonSource(config);
}
