/**
 * Base class for file-based sources
 * The file is read again on every fetchAll(), so each pass sees the file as it is then.
 */

import { access, readFile } from 'node:fs/promises';
import { constants } from 'node:fs';
import type {
  ConnectionState,
  ConnectorConfig,
  ISourceReader,
  Record,
} from '@histrack/core';
import { ConnectorError } from '@histrack/core';

export interface FileSourceConfig extends ConnectorConfig {
  /** Path to the file */
  filePath: string;
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
}

/** Header or path names that would reach Object.prototype */
export const FORBIDDEN_RECORD_KEYS: ReadonlySet<string> = new Set(['__proto__', 'prototype', 'constructor']);

function fsErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Abstract base class for file sources
 */
export abstract class BaseFileSource<TConfig extends FileSourceConfig>
  implements ISourceReader<TConfig>
{
  readonly config: TConfig;
  protected _state: ConnectionState = 'disconnected';

  constructor(config: TConfig) {
    this.config = config;
  }

  get state(): ConnectionState {
    return this._state;
  }

  async connect(): Promise<void> {
    this._state = 'connecting';

    try {
      await access(this.config.filePath, constants.R_OK);
      this._state = 'connected';
    } catch (error) {
      this._state = 'error';
      throw this.fileError(error);
    }
  }

  async disconnect(): Promise<void> {
    this._state = 'disconnected';
  }

  async testConnection(): Promise<boolean> {
    try {
      await access(this.config.filePath, constants.R_OK);
      return true;
    } catch {
      return false;
    }
  }

  async fetchAll(): Promise<Record[]> {
    this.ensureConnected();

    let content: string;
    try {
      content = await readFile(this.config.filePath, this.config.encoding ?? 'utf-8');
    } catch (error) {
      throw this.fileError(error);
    }

    // Strip UTF-8 BOM
    return this.parseContent(content.replace(/^\uFEFF/, ''));
  }

  protected ensureConnected(): void {
    if (this._state !== 'connected') {
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: 'Connector is not connected',
        connectorId: this.config.id,
        suggestion: 'Call connect() before performing operations.',
      });
    }
  }

  private fileError(error: unknown): ConnectorError {
    switch (fsErrorCode(error)) {
      case 'ENOENT':
        return new ConnectorError({
          code: 'CONFIGURATION_ERROR',
          message: `File not found: ${this.config.filePath}`,
          connectorId: this.config.id,
          suggestion: 'Check that the file path is correct and the file exists.',
        });
      case 'EACCES':
        return new ConnectorError({
          code: 'READ_FAILED',
          message: `Cannot read file: ${this.config.filePath}`,
          connectorId: this.config.id,
          suggestion: 'Check file permissions.',
        });
      default:
        return new ConnectorError({
          code: 'READ_FAILED',
          message: `Failed to read file: ${errorMessage(error)}`,
          connectorId: this.config.id,
          cause: error instanceof Error ? error : undefined,
        });
    }
  }

  /**
   * Parse file content into records (implemented by subclasses)
   */
  protected abstract parseContent(content: string): Record[];
}
