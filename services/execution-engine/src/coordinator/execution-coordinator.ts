/**
 * Execution Coordinator
 *
 * Single-flight gate for trades. Exactly one execution may hold the lock at
 * a time; a second caller is turned away immediately (no queueing), which
 * keeps two trades from spending the same balance or racing on nonces.
 *
 * The lock is taken synchronously in the same tick as the check, so two
 * calls started back to back cannot both pass it. Whatever the callback
 * does (resolve, throw or hang past the timeout) the lock is released and
 * the record is moved into history.
 */

import {
  CircularBuffer,
  TimeoutError,
  getErrorMessage,
  withTimeout,
  withTimeoutDefault,
} from '@xarb/core';
import type { ILogger } from '@xarb/core';
import {
  ExecutionErrorCode,
  createErrorResult,
  createInitialStatistics,
  createSkippedResult,
  formatExecutionError,
} from '@xarb/types';
import type {
  ExecutionRecord,
  ExecutionResult,
  ExecutionStatistics,
  ExecutionStatus,
  Opportunity,
} from '@xarb/types';
import { EXECUTION_TIMEOUT_ABORT_REASON, EXECUTION_TIMEOUT_MS, createServiceLogger } from '../types';
import type { CoordinatedExecutionResult, ExecutionCallback } from '../types';

export interface ExecutionCoordinatorConfig {
  executionTimeoutMs: number;
  /** Finished records kept for inspection */
  historySize: number;
  /** Records returned by getExecutionStatus().recentHistory */
  recentHistoryLimit: number;
}

const DEFAULT_COORDINATOR_CONFIG: ExecutionCoordinatorConfig = {
  executionTimeoutMs: EXECUTION_TIMEOUT_MS,
  historySize: 100,
  recentHistoryLimit: 10,
};

interface ActiveExecution {
  record: ExecutionRecord;
  controller: AbortController;
}

export class ExecutionCoordinator {
  private readonly config: ExecutionCoordinatorConfig;
  private readonly logger: ILogger;

  private lockHeld = false;
  private active: ActiveExecution | null = null;
  private readonly history: CircularBuffer<ExecutionRecord>;
  private readonly statistics: ExecutionStatistics = createInitialStatistics();
  private executionCounter = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(config: Partial<ExecutionCoordinatorConfig> = {}, logger?: ILogger) {
    this.config = { ...DEFAULT_COORDINATOR_CONFIG, ...config };
    this.logger = logger ?? createServiceLogger('execution-coordinator');
    this.history = new CircularBuffer<ExecutionRecord>(this.config.historySize);
  }

  /**
   * Run `callback` under the execution lock.
   *
   * Never throws. A held lock yields `blocked: true` with a `Blocked`
   * result and no side effects beyond the lockViolations counter.
   */
  execute(
    callback: ExecutionCallback,
    opportunity: Opportunity,
    initiator = 'engine'
  ): Promise<CoordinatedExecutionResult> {
    if (this.lockHeld) {
      this.statistics.lockViolations++;
      const holder = this.active?.record.id ?? 'unknown';

      this.logger.warn('Execution blocked: lock held', {
        opportunityId: opportunity.id,
        initiator,
        activeExecutionId: holder,
        lockViolations: this.statistics.lockViolations,
      });

      return Promise.resolve({
        executionId: null,
        blocked: true,
        timedOut: false,
        result: createSkippedResult(
          opportunity.id,
          formatExecutionError(ExecutionErrorCode.LOCK_HELD, `held by ${holder}`),
          opportunity.buyChain,
          opportunity.buyVenue,
          'Blocked'
        ),
      });
    }

    // Taken before any await
    this.lockHeld = true;

    this.executionCounter++;
    const record: ExecutionRecord = {
      id: `exec-${Date.now()}-${this.executionCounter}`,
      initiator,
      opportunity,
      status: 'queued',
      queuedAt: Date.now(),
    };
    const controller = new AbortController();
    this.active = { record, controller };

    return this.run(callback, record, controller);
  }

  /**
   * Abort the in-flight execution, marking it abandoned. The lock is held
   * until the callback unwinds (or its timeout fires).
   *
   * @returns the aborted execution id, or null when idle
   */
  abortActive(reason: string): string | null {
    if (!this.active) {
      return null;
    }

    const { record, controller } = this.active;
    if (record.status === 'executing' || record.status === 'queued') {
      record.status = 'abandoned';
    }
    controller.abort(reason);

    this.logger.warn('Active execution aborted', {
      executionId: record.id,
      opportunityId: record.opportunity.id,
      reason,
    });

    return record.id;
  }

  /**
   * Resolve true once no execution holds the lock, false when `timeoutMs`
   * passes first.
   */
  async waitForIdle(timeoutMs: number): Promise<boolean> {
    if (!this.lockHeld) {
      return true;
    }
    const idle = new Promise<boolean>((resolve) => {
      this.idleWaiters.push(() => resolve(true));
    });
    return withTimeoutDefault(idle, timeoutMs, false);
  }

  isExecutionInProgress(): boolean {
    return this.lockHeld;
  }

  getStatistics(): ExecutionStatistics {
    return { ...this.statistics };
  }

  /** Finished records, oldest first */
  getHistory(): ExecutionRecord[] {
    return this.history.toArray();
  }

  getExecutionStatus(): ExecutionStatus {
    const details = this.active ? [{ ...this.active.record }] : [];
    return {
      lockHeld: this.lockHeld,
      activeExecutions: details.length,
      details,
      statistics: this.getStatistics(),
      recentHistory: this.history.latest(this.config.recentHistoryLimit),
    };
  }

  logStatistics(): void {
    const { totalExecutions, successfulExecutions } = this.statistics;
    this.logger.info('Execution coordinator statistics', {
      ...this.statistics,
      successRate: totalExecutions > 0 ? successfulExecutions / totalExecutions : 0,
      lockHeld: this.lockHeld,
      historySize: this.history.size,
    });
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private async run(
    callback: ExecutionCallback,
    record: ExecutionRecord,
    controller: AbortController
  ): Promise<CoordinatedExecutionResult> {
    const { opportunity } = record;
    let result: ExecutionResult;
    let timedOut = false;
    let settled: Promise<ExecutionResult | null> | undefined;

    record.status = 'executing';
    record.startedAt = Date.now();
    const deadline = record.startedAt + this.config.executionTimeoutMs;
    this.logger.info('Execution started', {
      executionId: record.id,
      opportunityId: opportunity.id,
      initiator: record.initiator,
    });

    const pending = this.invoke(callback, controller.signal, deadline);
    try {
      result = await withTimeout(pending, this.config.executionTimeoutMs, `execution ${record.id}`);
    } catch (error) {
      if (error instanceof TimeoutError) {
        timedOut = true;
        controller.abort(EXECUTION_TIMEOUT_ABORT_REASON);
        settled = pending.then(
          (late) => late,
          () => null
        );
        result = createErrorResult(
          opportunity.id,
          formatExecutionError(ExecutionErrorCode.EXECUTION_TIMEOUT, `${this.config.executionTimeoutMs}ms`),
          opportunity.buyChain,
          opportunity.buyVenue,
          'ExecutionError'
        );
      } else {
        result = createErrorResult(
          opportunity.id,
          formatExecutionError(ExecutionErrorCode.EXECUTION_ERROR, getErrorMessage(error)),
          opportunity.buyChain,
          opportunity.buyVenue,
          'ExecutionError'
        );
      }
    }

    const outcome = this.finish(record, result, timedOut);
    return settled ? { ...outcome, settled } : outcome;
  }

  /**
   * Invoke the callback, turning a synchronous throw into a rejection.
   */
  private async invoke(callback: ExecutionCallback, signal: AbortSignal, deadline: number): Promise<ExecutionResult> {
    return callback(signal, deadline);
  }

  private finish(record: ExecutionRecord, result: ExecutionResult, timedOut: boolean): CoordinatedExecutionResult {
    record.finishedAt = Date.now();
    record.result = result;

    if (timedOut) {
      record.status = 'timed-out';
    } else if (record.status !== 'abandoned') {
      record.status = result.success ? 'succeeded' : 'failed';
    }

    this.statistics.totalExecutions++;
    switch (record.status) {
      case 'succeeded':
        this.statistics.successfulExecutions++;
        break;
      case 'failed':
        this.statistics.failedExecutions++;
        break;
      default:
        this.statistics.abandonedExecutions++;
        break;
    }

    const snapshot: ExecutionRecord = { ...record };
    this.history.pushOverwrite(snapshot);
    this.active = null;
    this.lockHeld = false;

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const wake of waiters) {
      wake();
    }

    const meta = {
      executionId: record.id,
      opportunityId: record.opportunity.id,
      status: record.status,
      durationMs: record.finishedAt - (record.startedAt ?? record.queuedAt),
      failureKind: result.failureKind,
    };
    if (record.status === 'succeeded') {
      this.logger.info('Execution finished', meta);
    } else {
      this.logger.warn('Execution finished without success', { ...meta, error: result.error });
    }

    return {
      executionId: record.id,
      blocked: false,
      timedOut,
      result,
      record: snapshot,
    };
  }
}
