/**
 * Helpers for reading driver error details
 */

import { ConnectorError, type ErrorCode } from '@histrack/core';

/** Socket-level failures any driver can surface */
const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND', 'EHOSTUNREACH']);

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorNumber(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'errno' in error && typeof error.errno === 'number') {
    return error.errno;
  }
  return undefined;
}

export function isNetworkError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && NETWORK_CODES.has(code);
}

const SUGGESTIONS: Partial<Record<ErrorCode, string>> = {
  CONNECTION_FAILED: 'Check host, port, database, user, and password.',
  TIMEOUT: 'The database did not answer in time. Retry later or raise the statement timeout.',
  LOCKED: 'Another session holds a lock on the history table. Retry once it is released.',
  CONFLICT: 'A concurrent write conflicted with this one. Re-run the pass.',
  SCHEMA_MISMATCH: 'Check that the configured table and columns exist.',
};

/**
 * Build a ConnectorError from a classified driver failure
 */
export function driverError(
  code: ErrorCode,
  prefix: string,
  error: unknown,
  connectorId?: string
): ConnectorError {
  if (error instanceof ConnectorError) return error;
  return new ConnectorError({
    code,
    message: `${prefix}: ${errorMessage(error)}`,
    connectorId,
    suggestion: SUGGESTIONS[code],
    cause: error instanceof Error ? error : undefined,
    context: { driverCode: errorCode(error) ?? errorNumber(error) },
  });
}
