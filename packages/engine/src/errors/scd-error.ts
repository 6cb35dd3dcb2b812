/**
 * Engine Error Types
 */

import { ConnectorError } from '@histrack/core';

export type ScdErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'MISSING_ATTRIBUTE'
  | 'UNSUPPORTED_VALUE'
  | 'DUPLICATE_KEY'
  | 'INVARIANT_VIOLATION'
  | 'STORAGE_UNAVAILABLE'
  | 'TRANSACTION_CONFLICT'
  | 'RUN_ABORTED';

export interface ScdErrorDetails {
  code: ScdErrorCode;
  message: string;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
  /** Overrides the default (only STORAGE_UNAVAILABLE is retryable) */
  retryable?: boolean;
}

export class ScdError extends Error {
  readonly code: ScdErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;
  readonly retryable: boolean;

  constructor(details: ScdErrorDetails) {
    super(details.message);
    this.name = 'ScdError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;
    this.retryable = details.retryable ?? details.code === 'STORAGE_UNAVAILABLE';

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      retryable: this.retryable,
      context: this.context,
    };
  }
}

/**
 * Translate a storage-layer failure into the engine taxonomy.
 *
 * @param error - Anything thrown by a connector
 * @param operation - What the engine was doing, for the message
 */
export function fromStorageError(error: unknown, operation: string): ScdError {
  if (error instanceof ScdError) {
    return error;
  }

  if (error instanceof ConnectorError) {
    const context = { operation, connectorId: error.connectorId, connectorCode: error.code };
    const message = `${operation} failed: ${error.message}`;

    switch (error.code) {
      case 'CONNECTION_FAILED':
      case 'TIMEOUT':
      case 'LOCKED':
        return new ScdError({
          code: 'STORAGE_UNAVAILABLE',
          message,
          suggestion: error.suggestion ?? 'Check that the database is reachable and not locked, then re-run the pass.',
          cause: error,
          context,
        });

      case 'CONFLICT':
      case 'TRANSACTION_FAILED':
        return new ScdError({
          code: 'TRANSACTION_CONFLICT',
          message,
          suggestion: 'Make sure only one run writes to the history table at a time, then re-run the pass.',
          cause: error,
          context,
        });

      case 'SCHEMA_MISMATCH':
      case 'CONFIGURATION_ERROR':
        return new ScdError({
          code: 'INVALID_CONFIGURATION',
          message,
          suggestion: error.suggestion,
          cause: error,
          context,
        });

      default:
        return new ScdError({
          code: 'STORAGE_UNAVAILABLE',
          message,
          suggestion: error.suggestion,
          cause: error,
          context,
          retryable: false,
        });
    }
  }

  return new ScdError({
    code: 'STORAGE_UNAVAILABLE',
    message: `${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
    cause: error instanceof Error ? error : undefined,
    context: { operation },
    retryable: false,
  });
}
