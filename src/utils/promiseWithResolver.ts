export function promiseWithResolvers<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;

  const promise = new Promise<T>((_resolve, _reject) => {
    resolve = _resolve;
    reject = _reject;
  });

  return { promise, resolve, reject };
}

export const TIMED_OUT: unique symbol = Symbol("timed-out");

/**
 * Race `promise` against a timer. Resolves to TIMED_OUT when the timer wins;
 * the timer is always cleared so nothing is left pending.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number
): Promise<T | typeof TIMED_OUT> {
  const timer = promiseWithResolvers<typeof TIMED_OUT>();
  const handle = setTimeout(() => timer.resolve(TIMED_OUT), timeoutMs);

  try {
    return await Promise.race([promise, timer.promise]);
  } finally {
    clearTimeout(handle);
  }
}
