export class TimeoutError extends Error {
  constructor(ms: number) {
    super(`Operation timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Reject with TimeoutError if `promise` has not settled within `ms`.
 * When a controller is given it is aborted on timeout so the work can stop.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, controller?: AbortController): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(ms);
      // reject first so the race settles with the timeout, not the abort
      reject(error);
      controller?.abort(error);
    }, ms);
  });

  return Promise.race([promise, timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}
