import { randomUUID } from 'node:crypto';

/**
 * Per-pass context. Every close-out and insert of one pass uses `asOf`.
 */
export interface RunContext {
  readonly runId: string;
  readonly asOf: Date;
}

export function createRunContext(asOf: Date, runId: string = randomUUID()): RunContext {
  return Object.freeze({ runId, asOf: new Date(asOf.getTime()) });
}
