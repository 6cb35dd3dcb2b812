/**
 * Run Module
 */

export { RunOrchestrator, runOnce, parseEngineConfig } from './orchestrator.js';
export type { RunOrchestratorOptions, RunOnceOptions } from './orchestrator.js';
export { RunStateMachine } from './run-state.js';
export type { RunStateListener } from './run-state.js';
export { MonotonicClock, systemClock } from './clock.js';
export type { Clock } from './clock.js';
export { createRunContext } from './run-context.js';
export type { RunContext } from './run-context.js';
export { withRetries } from './retry.js';
export type { RetryConfig, RetryContext, RetryListener } from './retry.js';
export { withTimeout } from './timeout.js';
