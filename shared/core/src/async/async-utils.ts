/**
 * Shared Async Utilities
 *
 * Timeout and cancellation helpers used by the coordinator, the saga and the
 * transaction submitter.
 */

import { TimeoutError } from '@xarb/types';

export { TimeoutError };

/**
 * Race a promise against a deadline.
 *
 * The timer is always cleared, and a late settlement of `promise` after the
 * deadline is ignored.
 *
 * @throws TimeoutError when the deadline passes first
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operationName = 'operation'
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
    return Promise.reject(
      new TypeError(`withTimeout: timeoutMs must be a non-negative finite number, got ${timeoutMs}`)
    );
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      reject(new TimeoutError(operationName, timeoutMs));
    }, timeoutMs);

    promise.then(
      (value) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

/**
 * Like withTimeout, but resolves to `defaultValue` on timeout.
 */
export async function withTimeoutDefault<T>(
  promise: Promise<T>,
  timeoutMs: number,
  defaultValue: T,
  onTimeout?: () => void
): Promise<T> {
  try {
    return await withTimeout(promise, timeoutMs);
  } catch (error) {
    if (error instanceof TimeoutError) {
      onTimeout?.();
      return defaultValue;
    }
    throw error;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Error raised when an AbortSignal fires.
 */
export class AbortedError extends Error {
  constructor(readonly reason: string) {
    super(`Aborted: ${reason}`);
    this.name = 'AbortedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (typeof reason === 'string') return reason;
  if (reason instanceof Error) return reason.message;
  return 'aborted';
}

/**
 * Throw AbortedError if the signal has already fired.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new AbortedError(abortReason(signal));
  }
}

/**
 * Race a promise against an AbortSignal. Rejects with AbortedError when the
 * signal fires first; the listener is removed either way.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new AbortedError(abortReason(signal)));

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new AbortedError(abortReason(signal)));
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
