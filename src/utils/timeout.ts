/**
 * Timeout and cancellation for remote calls
 * The wrapped operation receives an AbortSignal that fires on either condition
 */

export class TimeoutError extends Error {
  constructor(message: string = 'Operation timed out') {
    super(message);
    this.name = 'TimeoutError';
  }
}

export class CancelledError extends Error {
  constructor(message: string = 'Operation was cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

/**
 * Runs an operation with a time limit, linked to an optional caller signal
 *
 * Settles as soon as the timer fires or the caller aborts, without waiting for
 * the operation itself: the abandoned promise is left to the aborted signal.
 *
 * @param operation - Receives the signal to pass to the underlying I/O
 * @param ms - Time limit in milliseconds
 * @param parentSignal - Caller cancellation signal
 * @throws TimeoutError when the limit is hit, CancelledError when the caller aborts
 */
export function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  ms: number,
  parentSignal?: AbortSignal
): Promise<T> {
  if (parentSignal?.aborted) {
    return Promise.reject(new CancelledError());
  }

  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const interrupted = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const err = new TimeoutError(`Operation timed out after ${ms}ms`);
      controller.abort(err);
      reject(err);
    }, ms);

    if (parentSignal) {
      onParentAbort = () => {
        const err = new CancelledError();
        controller.abort(err);
        reject(err);
      };
      parentSignal.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  const running = operation(controller.signal);
  // The losing side of the race must not surface as an unhandled rejection
  running.catch(() => undefined);

  return Promise.race([running, interrupted]).finally(() => {
    clearTimeout(timeoutId);
    if (parentSignal && onParentAbort) {
      parentSignal.removeEventListener('abort', onParentAbort);
    }
  });
}

/**
 * Sleeps for the given delay, rejecting with CancelledError if the signal aborts first
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError());
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timeoutId);
      reject(new CancelledError());
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
