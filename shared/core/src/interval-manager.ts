/**
 * Interval Manager
 *
 * Named background intervals with one-call cleanup. The execution engine
 * runs its scanning, bridge-cost refresh, pending-transaction watch and
 * reporting loops through this.
 *
 * @example
 * ```typescript
 * const intervals = new IntervalManager(logger);
 * intervals.set('scan', () => this.scanOnce(), 5000);
 * intervals.set('report', () => this.report(), 60000);
 * // on shutdown
 * intervals.clearAll();
 * ```
 */

import type { ILogger } from './logging/types';
import { getErrorMessage } from './resilience/error-handling';

export interface IntervalInfo {
  name: string;
  intervalMs: number;
  createdAt: number;
  invocationCount: number;
  errorCount: number;
}

export interface IntervalManagerStats {
  activeCount: number;
  activeNames: string[];
  intervals: IntervalInfo[];
}

export class IntervalManager {
  private readonly intervals = new Map<string, NodeJS.Timeout>();
  private readonly intervalInfo = new Map<string, IntervalInfo>();

  constructor(private readonly logger: ILogger) {}

  /**
   * Set a named interval, replacing any interval of the same name.
   * Errors thrown or rejected by the callback are logged and counted.
   */
  set(
    name: string,
    callback: () => void | Promise<void>,
    intervalMs: number,
    runImmediately = false
  ): void {
    this.clear(name);

    const info: IntervalInfo = {
      name,
      intervalMs,
      createdAt: Date.now(),
      invocationCount: 0,
      errorCount: 0,
    };

    const onError = (error: unknown): void => {
      info.errorCount++;
      this.logger.error('Interval callback failed', { interval: name, error: getErrorMessage(error) });
    };

    const wrappedCallback = (): void => {
      info.invocationCount++;
      try {
        const result = callback();
        if (result instanceof Promise) {
          result.catch(onError);
        }
      } catch (error) {
        onError(error);
      }
    };

    if (runImmediately) {
      wrappedCallback();
    }

    this.intervals.set(name, setInterval(wrappedCallback, intervalMs));
    this.intervalInfo.set(name, info);
  }

  /**
   * @returns true if the interval existed
   */
  clear(name: string): boolean {
    const intervalId = this.intervals.get(name);
    if (!intervalId) return false;

    clearInterval(intervalId);
    this.intervals.delete(name);
    this.intervalInfo.delete(name);
    return true;
  }

  clearAll(): void {
    for (const intervalId of this.intervals.values()) {
      clearInterval(intervalId);
    }
    this.intervals.clear();
    this.intervalInfo.clear();
  }

  has(name: string): boolean {
    return this.intervals.has(name);
  }

  size(): number {
    return this.intervals.size;
  }

  getNames(): string[] {
    return Array.from(this.intervals.keys());
  }

  getStats(): IntervalManagerStats {
    return {
      activeCount: this.intervals.size,
      activeNames: this.getNames(),
      intervals: Array.from(this.intervalInfo.values(), info => ({ ...info })),
    };
  }
}
