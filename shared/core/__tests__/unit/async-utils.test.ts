/**
 * Async Utilities Tests
 */

import { jest, describe, it, expect, afterEach } from '@jest/globals';
import {
  AbortedError,
  TimeoutError,
  raceAbort,
  throwIfAborted,
  withTimeout,
  withTimeoutDefault,
} from '../../src/async';

describe('withTimeout', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('should resolve when the promise wins', async () => {
    await expect(withTimeout(Promise.resolve(5), 1000)).resolves.toBe(5);
  });

  it('should reject with TimeoutError when the deadline passes', async () => {
    jest.useFakeTimers();
    const pending = withTimeout(new Promise<number>(() => undefined), 500, 'bridge completion');

    jest.advanceTimersByTime(500);

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(pending).rejects.toThrow('Timeout: bridge completion exceeded 500ms');
  });

  it('should reject invalid timeouts', async () => {
    await expect(withTimeout(Promise.resolve(1), -1)).rejects.toThrow(TypeError);
  });

  it('should fall back to the default on timeout', async () => {
    jest.useFakeTimers();
    const onTimeout = jest.fn();
    const pending = withTimeoutDefault(new Promise<string>(() => undefined), 100, 'fallback', onTimeout);

    jest.advanceTimersByTime(100);

    await expect(pending).resolves.toBe('fallback');
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });
});

describe('abort helpers', () => {
  it('should reject when the signal fires first', async () => {
    const controller = new AbortController();
    const pending = raceAbort(new Promise<number>(() => undefined), controller.signal);

    controller.abort('shutdown');

    await expect(pending).rejects.toEqual(new AbortedError('shutdown'));
  });

  it('should pass values through when not aborted', async () => {
    const controller = new AbortController();
    await expect(raceAbort(Promise.resolve('done'), controller.signal)).resolves.toBe('done');
  });

  it('should throw for an already aborted signal', () => {
    const controller = new AbortController();
    controller.abort(new Error('timed out'));

    expect(() => throwIfAborted(controller.signal)).toThrow('Aborted: timed out');
    expect(() => throwIfAborted(undefined)).not.toThrow();
  });
});
