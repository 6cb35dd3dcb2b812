/**
 * Versioning Module
 */

export { VersionMerger } from './version-merger.js';
export type { VersionMergerOptions } from './version-merger.js';
export { withTransaction } from './transaction.js';
