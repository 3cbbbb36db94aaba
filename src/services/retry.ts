export interface RetryOptions {
  maxAttempts: number;
  /** Milliseconds to wait between attempts. */
  delay: number;
  signal?: AbortSignal;
  /** Decides whether a failed attempt may be followed by another. Defaults to always. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

export const DEFAULT_RETRY_OPTIONS: Readonly<RetryOptions> = Object.freeze({
  maxAttempts: 1,
  delay: 0,
});

/**
 * Run `fn` up to `maxAttempts` times with a fixed delay between attempts.
 * Attempts are sequential. The last error is rethrown unchanged; an abort
 * of `signal` rejects with `signal.reason` at once, even while an attempt
 * that ignores the signal is still pending, and stops further attempts.
 */
export async function retryWithFixedDelay<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = DEFAULT_RETRY_OPTIONS
): Promise<T> {
  const { maxAttempts, delay, signal, shouldRetry = () => true, onRetry } = options;

  for (let attempt = 1; ; attempt++) {
    signal?.throwIfAborted();

    try {
      return await raceAbort(fn(attempt), signal);
    } catch (error) {
      signal?.throwIfAborted();

      if (attempt >= maxAttempts || !shouldRetry(error, attempt)) {
        throw error;
      }

      onRetry?.(error, attempt);
      await sleep(delay, signal);
    }
  }
}

function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    void promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );

    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
