/**
 * ExecutionCoordinator tests
 *
 * Single-flight locking, release on every exit path, shutdown abort and
 * statistics.
 */

import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import { RecordingLogger } from '@xarb/core';
import { createErrorResult, createSuccessResult } from '@xarb/types';
import type { ExecutionResult, Opportunity } from '@xarb/types';
import { createOpportunityInput } from '@xarb/test-utils';
import { ExecutionCoordinator } from '../../src/coordinator/execution-coordinator';
import { createOpportunity } from '../../src/opportunity';
import { EXECUTION_TIMEOUT_ABORT_REASON } from '../../src/types';

function opportunity(): Opportunity {
  return createOpportunity(createOpportunityInput());
}

function succeedWith(opp: Opportunity): ExecutionResult {
  return createSuccessResult(opp.id, '0xabc', opp.buyChain, opp.buyVenue, { actualProfit: 2 });
}

/** A callback that resolves only when `release()` is called */
function deferredCallback(opp: Opportunity): {
  callback: (signal: AbortSignal) => Promise<ExecutionResult>;
  release: () => void;
  signals: AbortSignal[];
} {
  let release: () => void = () => undefined;
  const signals: AbortSignal[] = [];
  const callback = (signal: AbortSignal): Promise<ExecutionResult> => {
    signals.push(signal);
    return new Promise<ExecutionResult>((resolve) => {
      release = () => resolve(succeedWith(opp));
    });
  };
  return { callback, release: () => release(), signals };
}

describe('ExecutionCoordinator', () => {
  let logger: RecordingLogger;
  let coordinator: ExecutionCoordinator;

  beforeEach(() => {
    logger = new RecordingLogger();
    coordinator = new ExecutionCoordinator({ executionTimeoutMs: 50 }, logger);
  });

  describe('locking', () => {
    it('should block a second execution while the first holds the lock', async () => {
      const first = opportunity();
      const second = opportunity();
      const deferred = deferredCallback(first);
      const secondCallback = jest.fn(async (_signal: AbortSignal) => succeedWith(second));

      const running = coordinator.execute(deferred.callback, first);
      const blocked = await coordinator.execute(secondCallback, second);

      expect(blocked.blocked).toBe(true);
      expect(blocked.executionId).toBeNull();
      expect(blocked.result.failureKind).toBe('Blocked');
      expect(blocked.result.error).toMatch(/^\[ERR_LOCK_HELD\]/);
      expect(secondCallback).not.toHaveBeenCalled();
      expect(coordinator.getStatistics().lockViolations).toBe(1);

      deferred.release();
      const done = await running;
      expect(done.blocked).toBe(false);
      expect(done.result.success).toBe(true);
    });

    it('should let exactly one of two back-to-back calls through', async () => {
      const a = opportunity();
      const b = opportunity();

      const results = await Promise.all([
        coordinator.execute(async () => succeedWith(a), a),
        coordinator.execute(async () => succeedWith(b), b),
      ]);

      expect(results.filter((r) => r.blocked)).toHaveLength(1);
      expect(results.filter((r) => !r.blocked)).toHaveLength(1);
      expect(coordinator.getStatistics().lockViolations).toBe(1);
    });

    it('should hold the lock before the callback first awaits', () => {
      const opp = opportunity();
      const deferred = deferredCallback(opp);

      void coordinator.execute(deferred.callback, opp);

      expect(coordinator.isExecutionInProgress()).toBe(true);
      deferred.release();
    });
  });

  describe('release on every exit path', () => {
    it('should release after success', async () => {
      const opp = opportunity();
      const outcome = await coordinator.execute(async () => succeedWith(opp), opp);

      expect(outcome.record?.status).toBe('succeeded');
      expect(coordinator.isExecutionInProgress()).toBe(false);
    });

    it('should release and convert a thrown error', async () => {
      const opp = opportunity();
      const outcome = await coordinator.execute(async () => {
        throw new Error('boom');
      }, opp);

      expect(outcome.result.success).toBe(false);
      expect(outcome.result.failureKind).toBe('ExecutionError');
      expect(outcome.result.error).toBe('[ERR_EXECUTION] Execution error: boom');
      expect(outcome.record?.status).toBe('failed');
      expect(coordinator.isExecutionInProgress()).toBe(false);
    });

    it('should release and convert a synchronous throw', async () => {
      const opp = opportunity();
      const outcome = await coordinator.execute(() => {
        throw new Error('sync boom');
      }, opp);

      expect(outcome.result.error).toBe('[ERR_EXECUTION] Execution error: sync boom');
      expect(coordinator.isExecutionInProgress()).toBe(false);
    });

    it('should time out a hanging callback and abort its signal', async () => {
      const opp = opportunity();
      const signals: AbortSignal[] = [];

      const outcome = await coordinator.execute((signal) => {
        signals.push(signal);
        return new Promise<ExecutionResult>(() => undefined);
      }, opp);

      expect(outcome.timedOut).toBe(true);
      expect(outcome.result.error).toBe('[ERR_EXECUTION_TIMEOUT] Execution timed out: 50ms');
      expect(outcome.record?.status).toBe('timed-out');
      expect(signals[0].aborted).toBe(true);
      expect(coordinator.isExecutionInProgress()).toBe(false);
      expect(coordinator.getStatistics().abandonedExecutions).toBe(1);
    });

    it('should pass the callback its deadline', async () => {
      const opp = opportunity();
      const deadlines: number[] = [];

      const outcome = await coordinator.execute(async (_signal, deadline) => {
        deadlines.push(deadline);
        return succeedWith(opp);
      }, opp);

      expect(deadlines).toEqual([(outcome.record?.startedAt ?? 0) + 50]);
      expect(outcome.settled).toBeUndefined();
    });

    it('should expose the late result of a timed-out callback', async () => {
      const opp = opportunity();
      const reasons: unknown[] = [];
      const late: ExecutionResult = {
        ...createErrorResult(opp.id, 'unwound', opp.buyChain, opp.buyVenue, 'SellFailure'),
        actualProfit: -1.5,
      };

      const outcome = await coordinator.execute(
        (signal) =>
          new Promise<ExecutionResult>((resolve) => {
            signal.addEventListener('abort', () => {
              reasons.push(signal.reason);
              resolve(late);
            });
          }),
        opp
      );

      expect(outcome.timedOut).toBe(true);
      expect(outcome.result.actualProfit).toBeUndefined();
      expect(reasons).toEqual([EXECUTION_TIMEOUT_ABORT_REASON]);
      await expect(outcome.settled).resolves.toBe(late);
    });

    it('should settle to null when a timed-out callback rejects', async () => {
      const opp = opportunity();

      const outcome = await coordinator.execute(
        (signal) =>
          new Promise<ExecutionResult>((_resolve, reject) => {
            signal.addEventListener('abort', () => reject(new Error('late failure')));
          }),
        opp
      );

      await expect(outcome.settled).resolves.toBeNull();
    });

    it('should accept a new execution once the lock is released', async () => {
      const first = opportunity();
      await coordinator.execute(async () => {
        throw new Error('first failed');
      }, first);

      const second = opportunity();
      const outcome = await coordinator.execute(async () => succeedWith(second), second);

      expect(outcome.blocked).toBe(false);
      expect(outcome.result.success).toBe(true);
    });
  });

  describe('abortActive', () => {
    it('should return null when idle', () => {
      expect(coordinator.abortActive('shutdown')).toBeNull();
    });

    it('should abort the signal and mark the execution abandoned', async () => {
      const opp = opportunity();
      const deferred = deferredCallback(opp);
      const running = coordinator.execute(deferred.callback, opp);

      const executionId = coordinator.abortActive('shutdown');

      expect(executionId).toMatch(/^exec-\d+-1$/);
      expect(deferred.signals[0].aborted).toBe(true);

      deferred.release();
      const outcome = await running;
      expect(outcome.record?.status).toBe('abandoned');
      expect(coordinator.getStatistics().abandonedExecutions).toBe(1);
      expect(coordinator.getStatistics().successfulExecutions).toBe(0);
    });
  });

  describe('waitForIdle', () => {
    it('should resolve true immediately when idle', async () => {
      await expect(coordinator.waitForIdle(10)).resolves.toBe(true);
    });

    it('should resolve true once the execution finishes', async () => {
      const opp = opportunity();
      const deferred = deferredCallback(opp);
      const running = coordinator.execute(deferred.callback, opp);

      const idle = coordinator.waitForIdle(1_000);
      deferred.release();

      await expect(idle).resolves.toBe(true);
      await running;
    });

    it('should resolve false when the timeout passes first', async () => {
      const slow = new ExecutionCoordinator({ executionTimeoutMs: 5_000 }, logger);
      const opp = opportunity();
      const deferred = deferredCallback(opp);
      const running = slow.execute(deferred.callback, opp);

      await expect(slow.waitForIdle(10)).resolves.toBe(false);

      deferred.release();
      await running;
    });
  });

  describe('status and history', () => {
    it('should report the active execution while running', async () => {
      const opp = opportunity();
      const deferred = deferredCallback(opp);
      const running = coordinator.execute(deferred.callback, opp, 'operator');

      const status = coordinator.getExecutionStatus();
      expect(status.lockHeld).toBe(true);
      expect(status.activeExecutions).toBe(1);
      expect(status.details[0].initiator).toBe('operator');
      expect(status.details[0].opportunity.id).toBe(opp.id);

      deferred.release();
      await running;

      const after = coordinator.getExecutionStatus();
      expect(after.lockHeld).toBe(false);
      expect(after.activeExecutions).toBe(0);
      expect(after.recentHistory).toHaveLength(1);
    });

    it('should count outcomes by status', async () => {
      const a = opportunity();
      const b = opportunity();
      await coordinator.execute(async () => succeedWith(a), a);
      await coordinator.execute(async () => {
        throw new Error('nope');
      }, b);

      expect(coordinator.getStatistics()).toEqual({
        totalExecutions: 2,
        successfulExecutions: 1,
        failedExecutions: 1,
        abandonedExecutions: 0,
        lockViolations: 0,
      });
      expect(coordinator.getHistory().map((r) => r.opportunity.id)).toEqual([a.id, b.id]);
    });

    it('should keep no more than historySize records', async () => {
      const small = new ExecutionCoordinator({ historySize: 2 }, logger);
      for (let i = 0; i < 3; i++) {
        const opp = opportunity();
        await small.execute(async () => succeedWith(opp), opp);
      }

      expect(small.getHistory().map((r) => r.opportunity.id)).toEqual(['opp-2', 'opp-3']);
    });

    it('should log a warning when blocked', async () => {
      const first = opportunity();
      const deferred = deferredCallback(first);
      const running = coordinator.execute(deferred.callback, first);

      await coordinator.execute(async () => succeedWith(first), opportunity());

      expect(logger.hasLogMatching('warn', 'Execution blocked: lock held')).toBe(true);
      deferred.release();
      await running;
    });
  });
});
