export { ConnectorError, wrapError } from './connector-error.js';
export type { ErrorCode, ConnectorErrorDetails } from './connector-error.js';
