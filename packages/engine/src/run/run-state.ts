import type { RunState } from '../types/index.js';
import { ScdError } from '../errors/index.js';

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  idle: ['extracting', 'aborted'],
  extracting: ['classifying', 'aborted'],
  classifying: ['merging', 'aborted'],
  merging: ['committed', 'aborted'],
  committed: [],
  aborted: [],
};

export type RunStateListener = (next: RunState, previous: RunState) => void;

/**
 * idle → extracting → classifying → merging → committed, or → aborted from
 * any non-terminal state.
 */
export class RunStateMachine {
  private current: RunState = 'idle';
  private readonly trail: RunState[] = ['idle'];

  constructor(private readonly listener?: RunStateListener) {}

  get state(): RunState {
    return this.current;
  }

  /** States visited so far, in order */
  get history(): readonly RunState[] {
    return this.trail;
  }

  get terminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  transition(next: RunState): void {
    const previous = this.current;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new ScdError({
        code: 'INVARIANT_VIOLATION',
        message: `Illegal run state transition: ${previous} → ${next}`,
        context: { from: previous, to: next },
      });
    }
    this.current = next;
    this.trail.push(next);
    this.listener?.(next, previous);
  }
}
