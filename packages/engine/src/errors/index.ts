export { ScdError, fromStorageError } from './scd-error.js';
export type { ScdErrorCode, ScdErrorDetails } from './scd-error.js';
