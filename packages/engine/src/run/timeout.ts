import { ScdError } from '../errors/index.js';

/**
 * Reject with `makeTimeoutError()` if `promise` does not settle within
 * `timeoutMs`. A missing or non-positive timeout disables the limit.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  makeTimeoutError: () => Error = () =>
    new ScdError({ code: 'STORAGE_UNAVAILABLE', message: `Operation timed out after ${timeoutMs}ms` })
): Promise<T> {
  if (!timeoutMs) return promise;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;

  let timeout: NodeJS.Timeout | null = null;
  const timeoutPromise = new Promise<T>((_resolve, reject) => {
    timeout = setTimeout(() => reject(makeTimeoutError()), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeout) clearTimeout(timeout);
  }
}
