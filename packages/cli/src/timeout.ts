import { SchemashiftError } from '@schemashift/core';

/**
 * Race `promise` against a timer. The underlying work is abandoned, not
 * cancelled: a whole-file rewrite has no checkpoint to stop at.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  makeTimeoutError: () => Error = () =>
    new SchemashiftError({ code: 'TIMEOUT', message: 'Operation timed out' })
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
