/**
 * @histrack/engine
 *
 * Change detection and temporal versioning of tabular snapshots.
 * Fingerprints records, classifies them against the current history slice
 * and merges the outcome as closed-out and inserted versions.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Fingerprint Module
export {
  toScalar,
  toTypedRecord,
  NULL_TOKEN,
  FIELD_SEPARATOR,
  canonicalScalar,
  canonicalKeyScalar,
  canonicalize,
  encodeKey,
  diffAttributes,
  fingerprint,
  hashCanonical,
  FINGERPRINT_LENGTH,
} from './fingerprint/index.js';
export type { FingerprintOptions } from './fingerprint/index.js';

// Change Detection Module
import { DeltaClassifier as _DeltaClassifier } from './changes/index.js';
import type { ClassifyOptions } from './changes/index.js';
export { CurrentSlice, DeltaClassifier, classify, countOutcomes } from './changes/index.js';
export type { ClassifyOptions } from './changes/index.js';

// Versioning Module
export { VersionMerger, withTransaction } from './versioning/index.js';
export type { VersionMergerOptions } from './versioning/index.js';

// Run Module
import { RunOrchestrator as _RunOrchestrator } from './run/index.js';
import type { RunOrchestratorOptions } from './run/index.js';
export {
  RunOrchestrator,
  runOnce,
  parseEngineConfig,
  RunStateMachine,
  MonotonicClock,
  systemClock,
  createRunContext,
  withRetries,
  withTimeout,
} from './run/index.js';
export type {
  RunOrchestratorOptions,
  RunOnceOptions,
  RunStateListener,
  Clock,
  RunContext,
  RetryConfig,
  RetryContext,
  RetryListener,
} from './run/index.js';

// Audit Module
import { HistoryAuditor as _HistoryAuditor } from './audit/index.js';
export { HistoryAuditor, auditHistory } from './audit/index.js';

// Formatters
export {
  formatRunSummary,
  formatRunPreview,
  formatAuditReport,
  formatKey,
  formatDuration,
} from './formatters/index.js';

// Errors
export { ScdError, fromStorageError } from './errors/index.js';
export type { ScdErrorCode, ScdErrorDetails } from './errors/index.js';

import type { EngineConfigInput, IHistoryStore, ISourceReader } from '@histrack/core';

/**
 * Factory function to create a DeltaClassifier
 */
export function createDeltaClassifier(options: ClassifyOptions): _DeltaClassifier {
  return new _DeltaClassifier(options);
}

/**
 * Factory function to create a RunOrchestrator
 *
 * @throws ScdError INVALID_CONFIGURATION
 */
export function createRunOrchestrator(
  source: ISourceReader,
  history: IHistoryStore,
  config: EngineConfigInput,
  options?: RunOrchestratorOptions
): _RunOrchestrator {
  return new _RunOrchestrator(source, history, config, options);
}

/**
 * Factory function to create a HistoryAuditor
 */
export function createHistoryAuditor(history: IHistoryStore): _HistoryAuditor {
  return new _HistoryAuditor(history);
}
