/**
 * Timer helpers shared by the gateway loops and the rate limiters.
 */

/**
 * Milliseconds on a clock that never steps backwards or jumps with the
 * system time. Use it for every internal deadline; Date.now() only for
 * timestamps that leave the process.
 */
export function monotonicNow(): number {
  return performance.now();
}

/** Largest delay setTimeout accepts. */
const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Resolve after `ms`, or as soon as `signal` aborts. Never rejects: callers
 * check the signal (or their own close flag) after waking.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.min(Math.max(0, ms), MAX_TIMEOUT_MS));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Error used to reject a queued waiter whose AbortSignal fired. */
export function abortError(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) {
    return signal.reason;
  }
  const err = new Error('The operation was aborted');
  err.name = 'AbortError';
  return err;
}
