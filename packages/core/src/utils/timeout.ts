import { WatchError } from '../errors/watch-error.js';

/**
 * Bound a promise. When the bound lapses first the result rejects with a
 * transient `TIMEOUT` WatchError naming the operation.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  operation = 'Operation'
): Promise<T> {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;

  let timer: NodeJS.Timeout | undefined;
  const lapse = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(
        new WatchError({
          code: 'TIMEOUT',
          message: `${operation} timed out after ${timeoutMs}ms`,
          context: { timeoutMs },
        })
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, lapse]);
  } finally {
    clearTimeout(timer);
  }
}
