/**
 * Custom error types for connectors
 */

export type ErrorCode =
  | 'CONNECTION_FAILED'
  | 'TIMEOUT'
  | 'LOCKED'
  | 'CONFLICT'
  | 'READ_FAILED'
  | 'WRITE_FAILED'
  | 'TRANSACTION_FAILED'
  | 'SCHEMA_MISMATCH'
  | 'CONFIGURATION_ERROR'
  | 'UNSUPPORTED_OPERATION'
  | 'UNKNOWN';

/** Codes for failures that may clear up on their own */
const TRANSIENT_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  'CONNECTION_FAILED',
  'TIMEOUT',
  'LOCKED',
]);

export interface ConnectorErrorDetails {
  /** Error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable message */
  message: string;
  /** Connector ID that raised the error */
  connectorId?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class ConnectorError extends Error {
  readonly code: ErrorCode;
  readonly connectorId?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ConnectorErrorDetails) {
    super(details.message);
    this.name = 'ConnectorError';
    this.code = details.code;
    this.connectorId = details.connectorId;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace(this, ConnectorError);
  }

  /** Whether retrying the operation can reasonably succeed */
  get transient(): boolean {
    return TRANSIENT_CODES.has(this.code);
  }

  /**
   * Structured, actionable error message
   */
  toActionableMessage(): string {
    const parts = [
      `Error [${this.code}]: ${this.message}`,
    ];

    if (this.connectorId) {
      parts.push(`Connector: ${this.connectorId}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  /**
   * Convert to JSON for structured error output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      connectorId: this.connectorId,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Helper to wrap unknown errors as ConnectorError
 */
export function wrapError(
  error: unknown,
  connectorId?: string,
  defaultCode: ErrorCode = 'UNKNOWN'
): ConnectorError {
  if (error instanceof ConnectorError) {
    if (connectorId && !error.connectorId) {
      return new ConnectorError({
        code: error.code,
        message: error.message,
        connectorId,
        suggestion: error.suggestion,
        context: error.context,
        cause: error,
      });
    }
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new ConnectorError({
    code: defaultCode,
    message,
    connectorId,
    cause,
  });
}
