/**
 * An error whose message is meant for the user; printed without a stack trace
 */
export class SimpleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SimpleError';
  }
}

/**
 * Thrown when a wait was given up because the operation's AbortSignal fired
 */
export class CancelledError extends Error {
  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class UnsupportedOperationError extends Error {
  constructor(message = 'Operation is not supported.') {
    super(message);
    this.name = 'UnsupportedOperationError';
  }
}

/**
 * Wait for a promise, but give up as soon as the signal is aborted
 *
 * The promise itself keeps running; only the wait is abandoned.
 */
export function waitFor<A>(promise: Promise<A>, signal?: AbortSignal): Promise<A> {
  if (!signal) { return promise; }
  if (signal.aborted) {
    // Still observe the promise so its rejection doesn't go unhandled
    promise.catch(() => undefined);
    return Promise.reject(new CancelledError());
  }

  return new Promise<A>((ok, ko) => {
    const onAbort = () => ko(new CancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(ok, ko).finally(() => signal.removeEventListener('abort', onAbort));
  });
}
