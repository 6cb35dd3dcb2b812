import { describe, expect, it, vi } from 'vitest';
import { MonotonicClock } from '../src/run/clock.js';
import { withRetries } from '../src/run/retry.js';
import { RunStateMachine } from '../src/run/run-state.js';
import { withTimeout } from '../src/run/timeout.js';
import { captureError } from './support/errors.js';

describe('MonotonicClock', () => {
  it('never repeats or goes back', () => {
    const now = new Date('2024-01-01T00:00:00.000Z');
    const clock = new MonotonicClock({ now: () => now });

    const first = clock.next();
    const second = clock.next();

    expect(first.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(second.toISOString()).toBe('2024-01-01T00:00:00.001Z');
  });

  it('moves past the floor', () => {
    const clock = new MonotonicClock({ now: () => new Date('2024-01-01T00:00:00.000Z') });
    expect(clock.next(new Date('2024-05-01T00:00:00.000Z')).toISOString()).toBe('2024-05-01T00:00:00.001Z');
  });
});

describe('RunStateMachine', () => {
  it('rejects illegal transitions', () => {
    const machine = new RunStateMachine();
    const err = captureError(() => machine.transition('merging'));
    expect(err).toMatchObject({ code: 'INVARIANT_VIOLATION', context: { from: 'idle', to: 'merging' } });
  });

  it('treats committed and aborted as terminal', () => {
    const machine = new RunStateMachine();
    machine.transition('aborted');
    expect(machine.terminal).toBe(true);
    expect(machine.history).toEqual(['idle', 'aborted']);
    expect(() => machine.transition('extracting')).toThrow('Illegal run state transition: aborted → extracting');
  });
});

describe('withRetries', () => {
  it('retries until success and reports each retry', async () => {
    const onRetry = vi.fn();
    let calls = 0;

    const result = await withRetries(
      async () => {
        calls++;
        if (calls < 3) throw new Error('flaky');
        return 'ok';
      },
      { attempts: 5, baseDelayMs: 0 },
      () => true,
      onRetry
    );

    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls.map(([, ctx]) => ctx)).toEqual([
      { attempt: 2, attempts: 5, delayMs: undefined },
      { attempt: 3, attempts: 5, delayMs: undefined },
    ]);
  });

  it('sleeps the delay it reports', async () => {
    const random = vi.spyOn(Math, 'random').mockReturnValueOnce(0.9).mockReturnValueOnce(0.1);
    const onRetry = vi.fn();
    const seen: Array<number | undefined> = [];

    try {
      await withRetries(
        async (ctx) => {
          seen.push(ctx.delayMs);
          if (ctx.attempt === 1) throw new Error('flaky');
          return 'ok';
        },
        { attempts: 2, baseDelayMs: 10, jitter: 0.5 },
        () => true,
        onRetry
      );
    } finally {
      random.mockRestore();
    }

    // 10ms * (1 + (0.9 * 2 - 1) * 0.5)
    expect(onRetry.mock.calls.map(([, ctx]) => ctx)).toEqual([{ attempt: 2, attempts: 2, delayMs: 14 }]);
    expect(seen).toEqual([undefined, 14]);
  });

  it('stops on errors that are not retryable', async () => {
    const fn = vi.fn(async () => {
      throw new Error('fatal');
    });
    await expect(withRetries(fn, { attempts: 3 }, () => false)).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  it('rejects slow work', async () => {
    vi.useFakeTimers();
    try {
      const pending = withTimeout(new Promise<string>(() => undefined), 50);
      const assertion = expect(pending).rejects.toMatchObject({
        code: 'STORAGE_UNAVAILABLE',
        message: 'Operation timed out after 50ms',
      });
      await vi.advanceTimersByTimeAsync(50);
      await assertion;
    } finally {
      vi.useRealTimers();
    }
  });

  it('passes through without a limit', async () => {
    await expect(withTimeout(Promise.resolve(1), undefined)).resolves.toBe(1);
  });
});
