/**
 * Time sources for run as-of timestamps
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Hands out strictly increasing instants at millisecond resolution (the
 * resolution timestamps are persisted with), even when the underlying clock
 * stalls or steps back.
 */
export class MonotonicClock {
  private last: number | undefined;

  constructor(private readonly source: Clock = systemClock) {}

  /**
   * Next instant, strictly later than every previous one and than `floor`
   */
  next(floor?: Date): Date {
    let ms = this.source.now().getTime();
    const minimum = Math.max(this.last ?? Number.NEGATIVE_INFINITY, floor?.getTime() ?? Number.NEGATIVE_INFINITY);
    if (ms <= minimum) {
      ms = minimum + 1;
    }
    this.last = ms;
    return new Date(ms);
  }
}
