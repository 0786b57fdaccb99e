/**
 * ExecutionEngine tests
 *
 * Batches go through the whole decision path (normalize, rank, gate, risk,
 * execute) against the in-process collaborator harness. Duplicate
 * suppression is switched off so that repeated batches on the default
 * route all reach the gate.
 */

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { RecordingLogger } from '@xarb/core';
import type { StrandedFundsReport } from '@xarb/types';
import {
  FakeOpportunityScanner,
  createCollaboratorHarness,
  createOpportunityInput,
  flushPromises,
  resetFakeHashCounter,
} from '@xarb/test-utils';
import type { CollaboratorHarness } from '@xarb/test-utils';
import { ExecutionEngine } from '../../src/engine';
import type { ExecutionEngineConfig } from '../../src/types';

const QUIET_LOOPS: Partial<ExecutionEngineConfig> = {
  scanIntervalMs: 0,
  bridgeCostRefreshIntervalMs: 0,
  pendingTxWatchIntervalMs: 0,
  reportIntervalMs: 0,
  shutdownTimeoutMs: 1_000,
};

describe('ExecutionEngine', () => {
  let logger: RecordingLogger;
  let harness: CollaboratorHarness;
  let engine: ExecutionEngine;

  function createEngine(
    config: Partial<ExecutionEngineConfig> = {},
    scanner?: FakeOpportunityScanner
  ): ExecutionEngine {
    return new ExecutionEngine(
      {
        chainClients: harness.chainClients,
        dexRouter: harness.dexRouter,
        bridgeProviders: harness.bridgeProviders,
        keyring: harness.keyring,
        priceFeed: harness.priceFeed,
        scanner,
        logger,
      },
      { ...QUIET_LOOPS, filter: { duplicateWindowSec: 0 }, ...config }
    );
  }

  async function untilAwaitingBridge(bridge = 'across'): Promise<void> {
    for (let i = 0; i < 50 && harness.bridge(bridge).awaited.length === 0; i++) {
      await flushPromises();
    }
  }

  beforeEach(() => {
    resetFakeHashCounter();
    logger = new RecordingLogger();
    harness = createCollaboratorHarness();
    engine = createEngine();
  });

  afterEach(async () => {
    await engine.shutdown();
    jest.useRealTimers();
  });

  describe('happy path', () => {
    it('should execute a profitable opportunity end to end', async () => {
      harness.dexRouter.setChainPrice('base', 'USDC', 1.1);

      const { outcomes, executed } = await engine.submitOpportunities([createOpportunityInput()]);

      expect(outcomes).toHaveLength(1);
      expect(outcomes[0].opportunityId).toBe('opp-1');
      expect(outcomes[0].disposition).toBe('executed');
      expect(executed?.success).toBe(true);
      expect(executed?.actualProfit).toBeCloseTo(0.7889002, 6);

      const status = engine.getExecutionStatus();
      expect(status.lockHeld).toBe(false);
      expect(status.statistics.successfulExecutions).toBe(1);
      expect(status.recentHistory[0].status).toBe('succeeded');
      expect(engine.getRiskStatus().counters.consecutiveFailures).toBe(0);
      expect(engine.getBridgeRouteStatus()[0].bridge).toBe('across');
    });

    it('should run only the highest-priority opportunity of a batch', async () => {
      const small = createOpportunityInput({ grossProfitUsd: 8 });
      const large = createOpportunityInput({ grossProfitUsd: 20, sellVenue: 'uniswap_v3' });

      const { outcomes, executed } = await engine.submitOpportunities([small, large]);

      expect(executed?.opportunityId).toBe(large.id);
      expect(outcomes.map((o) => [o.opportunityId, o.disposition])).toEqual([
        [large.id, 'executed'],
        [small.id, 'superseded'],
      ]);
      expect(outcomes[1].reason).toBe('A higher-priority opportunity was taken');
      expect(harness.dexRouter.swaps.filter((s) => s.chain === 'arbitrum')).toHaveLength(1);
    });
  });

  describe('filtering', () => {
    it('should filter malformed input without executing', async () => {
      const { outcomes, executed } = await engine.submitOpportunities([
        { ...createOpportunityInput(), buyPrice: -1 },
      ]);

      expect(executed).toBeUndefined();
      expect(outcomes[0].opportunityId).toBe('opp-1');
      expect(outcomes[0].disposition).toBe('filtered');
      expect(outcomes[0].reason).toMatch(/^\[ERR_INVALID_OPPORTUNITY\] Invalid opportunity format: .*buyPrice/);
    });

    it('should filter stale opportunities at the ranking stage', async () => {
      const { outcomes } = await engine.submitOpportunities([
        createOpportunityInput({ discoveredAt: Date.now() - 60_000 }),
      ]);

      expect(outcomes[0].disposition).toBe('filtered');
      expect(outcomes[0].verdict?.rejectedAt).toBe('freshness');
      expect(engine.getFilterStats().rejected.freshness).toBe(1);
    });

    it('should filter an opportunity the bridge fee makes unprofitable', async () => {
      const { outcomes, executed } = await engine.submitOpportunities([
        createOpportunityInput({ bridgeFeeUsd: 7.5 }),
      ]);

      // 8 gross - 0.25 l2 cross-chain gas - 7.5 bridge fee
      expect(executed).toBeUndefined();
      expect(outcomes[0].disposition).toBe('filtered');
      expect(outcomes[0].reason).toBe(
        '[ERR_UNPROFITABLE] Profit below threshold after costs: Net profit $0.25 below floor $1.00'
      );
      expect(harness.dexRouter.quotes).toHaveLength(0);
    });

    it('should skip an opportunity when the buy chain gas price is unavailable', async () => {
      harness.client('arbitrum').failGasPrice();

      const { outcomes } = await engine.submitOpportunities([createOpportunityInput()]);

      expect(outcomes[0].reason).toBe(
        '[ERR_UNPROFITABLE] Profit below threshold after costs: gas price unavailable on arbitrum'
      );
      expect(logger.hasLogMatching('warn', 'Gas price unavailable, skipping opportunity')).toBe(true);
    });

    it('should not count filtered saga outcomes against the governor', async () => {
      const { executed } = await engine.submitOpportunities([createOpportunityInput({ sellChain: 'optimism' })]);

      expect(executed?.failureKind).toBe('Filtered');
      expect(engine.getRiskStatus().counters.consecutiveFailures).toBe(0);
      expect(engine.getRiskStatus().metrics.totalFailures).toBe(0);
    });
  });

  describe('stranded funds', () => {
    it('should report stranded funds and book the loss', async () => {
      const reports: StrandedFundsReport[] = [];
      engine.onStranded((report) => reports.push(report));
      harness.dexRouter.failQuotesOn('base');

      const { executed } = await engine.submitOpportunities([createOpportunityInput()]);

      expect(executed?.failureKind).toBe('SellFailure');
      expect(reports).toHaveLength(1);
      expect(engine.getStrandedFunds()).toHaveLength(1);
      expect(engine.getStrandedFunds()[0].lastProgressState).toBe('BridgeConfirmed');
      expect(engine.getRiskStatus().counters.consecutiveFailures).toBe(1);
      expect(engine.getRiskStatus().counters.dailyLossUsd).toBeCloseTo(0.56, 10);
    });
  });

  describe('execution timeout', () => {
    it('should report a slow bridge as a bridge timeout under the default timeouts', async () => {
      jest.useFakeTimers();
      harness.bridge('across').setCompletion('pending');

      const running = engine.submitOpportunities([createOpportunityInput()]);
      await untilAwaitingBridge();
      await jest.advanceTimersByTimeAsync(700_000);
      const { executed } = await running;

      // 300s execution timeout - 10s margin - 5s grace
      expect(executed?.failureKind).toBe('BridgeTimeout');
      expect(executed?.error).toBe(
        '[ERR_BRIDGE_TIMEOUT] Bridge timeout: across-transfer-1 still pending after 285000ms'
      );
      expect(engine.getStrandedFunds()[0].reason).toMatch(/BRIDGE_TIMEOUT/);
      expect(engine.getExecutionStatus().recentHistory[0].status).toBe('failed');
      expect(engine.getRiskStatus().counters.dailyLossUsd).toBe(0);
    });

    it('should book the loss a timed-out saga settles with', async () => {
      jest.useFakeTimers();
      harness.dexRouter.holdQuotesOn('base');

      const running = engine.submitOpportunities([createOpportunityInput()]);
      for (let i = 0; i < 50 && !harness.dexRouter.quotes.some((q) => q.chain === 'base'); i++) {
        await flushPromises();
      }
      await jest.advanceTimersByTimeAsync(301_000);
      const { executed } = await running;

      expect(executed?.failureKind).toBe('ExecutionError');
      expect(executed?.error).toBe('[ERR_EXECUTION_TIMEOUT] Execution timed out: 300000ms');
      expect(engine.getExecutionStatus().recentHistory[0].status).toBe('timed-out');
      expect(engine.getStrandedFunds()[0].reason).toBe(
        '[ERR_EXECUTION_TIMEOUT] Execution timed out: USDC on base: Aborted: execution timeout'
      );
      expect(engine.getRiskStatus().counters.consecutiveFailures).toBe(1);
      expect(engine.getRiskStatus().counters.dailyLossUsd).toBeCloseTo(0.56, 10);
      expect(logger.hasLogMatching('info', 'Timed-out execution settled')).toBe(true);
    });
  });

  describe('risk governor', () => {
    it('should halt after consecutive failures and resume after a reset', async () => {
      engine = createEngine({ risk: { maxConsecutiveFailures: 2 } });
      harness.dexRouter.failQuotesOn('arbitrum');

      for (let i = 0; i < 2; i++) {
        const { executed } = await engine.submitOpportunities([createOpportunityInput({ grossProfitUsd: 20 })]);
        expect(executed?.failureKind).toBe('BuyFailure');
      }

      const halted = await engine.submitOpportunities([createOpportunityInput({ grossProfitUsd: 20 })]);

      expect(halted.executed).toBeUndefined();
      expect(halted.outcomes[0].disposition).toBe('risk-halted');
      expect(halted.outcomes[0].reason).toBe(
        '[ERR_RISK_HALT] Trading halted by risk controls: Consecutive failures (2) reached limit (2)'
      );
      expect(halted.outcomes[0].result?.failureKind).toBe('RiskHalt');
      expect(logger.hasLogMatching('warn', 'Batch halted by risk governor')).toBe(true);

      engine.resetRisk();
      const resumed = await engine.submitOpportunities([createOpportunityInput({ grossProfitUsd: 20 })]);

      expect(resumed.outcomes[0].disposition).toBe('executed');
    });

    it('should halt every candidate on emergency stop', async () => {
      engine.emergencyStop('operator');

      const { outcomes } = await engine.submitOpportunities([
        createOpportunityInput(),
        createOpportunityInput({ sellVenue: 'uniswap_v3' }),
      ]);

      expect(outcomes.map((o) => o.disposition)).toEqual(['risk-halted', 'risk-halted']);
      expect(outcomes[0].reason).toBe('[ERR_RISK_HALT] Trading halted by risk controls: Emergency stop: operator');
      expect(harness.dexRouter.quotes).toHaveLength(0);
    });
  });

  describe('execution lock', () => {
    it('should block a batch while another execution holds the lock', async () => {
      harness.bridge('across').setCompletion('hang');
      const first = engine.submitOpportunities([createOpportunityInput()]);
      await untilAwaitingBridge();

      const second = await engine.submitOpportunities([createOpportunityInput({ sellVenue: 'uniswap_v3' })]);

      expect(second.executed).toBeUndefined();
      expect(second.outcomes[0].disposition).toBe('blocked');
      expect(second.outcomes[0].reason).toMatch(
        /^\[ERR_LOCK_HELD\] Execution blocked - trade already in progress: held by exec-\d+-1$/
      );
      expect(engine.getExecutionStatus().statistics.lockViolations).toBe(1);

      await engine.shutdown();
      await first;
    });
  });

  describe('shutdown', () => {
    it('should abort the in-flight saga and report stranded funds', async () => {
      harness.bridge('across').setCompletion('hang');
      const running = engine.submitOpportunities([createOpportunityInput()]);
      await untilAwaitingBridge();

      const report = await engine.shutdown();
      const { executed } = await running;

      expect(report.drained).toBe(true);
      expect(report.abandonedExecutions).toHaveLength(1);
      expect(report.abandonedExecutions[0]).toMatch(/^exec-\d+-1$/);
      expect(report.strandedFunds).toHaveLength(1);
      expect(report.strandedFunds[0].reason).toBe(
        '[ERR_SHUTDOWN] Execution interrupted by shutdown: awaiting bridge across-transfer-1'
      );
      expect(executed?.failureKind).toBe('StrandedFunds');
      expect(engine.getExecutionStatus().statistics.abandonedExecutions).toBe(1);
      expect(logger.hasLogMatching('error', 'ALERT: stranded funds outstanding at shutdown')).toBe(true);
    });

    it('should be idempotent', async () => {
      const first = engine.shutdown();

      expect(engine.shutdown()).toBe(first);
      await expect(first).resolves.toEqual({ strandedFunds: [], abandonedExecutions: [], drained: true });
    });

    it('should block new batches after shutdown', async () => {
      await engine.shutdown();

      const { outcomes } = await engine.submitOpportunities([createOpportunityInput()]);

      expect(outcomes).toEqual([
        { opportunityId: 'opp-1', disposition: 'blocked', reason: '[ERR_SHUTDOWN] Execution interrupted by shutdown' },
      ]);
      expect(() => engine.start()).toThrow('Execution engine has been shut down');
    });
  });

  describe('background loops', () => {
    it('should only start loops with a positive interval', () => {
      engine.start();

      expect(engine.isRunning()).toBe(true);
      const started = logger.getLogs('info').find((entry) => entry.msg === 'Execution engine started');
      expect(started?.meta?.loops).toEqual([]);
      expect(started?.meta?.chains).toEqual(['arbitrum', 'base']);
    });

    it('should scan and submit on the scan interval', async () => {
      jest.useFakeTimers();
      const scanner = new FakeOpportunityScanner();
      engine = createEngine({ scanIntervalMs: 1_000 }, scanner);
      harness.dexRouter.setChainPrice('base', 'USDC', 1.1);
      scanner.push([createOpportunityInput({ grossProfitUsd: 20 })]);

      engine.start();
      await jest.advanceTimersByTimeAsync(1_000);
      for (let i = 0; i < 50 && engine.getExecutionStatus().statistics.totalExecutions === 0; i++) {
        await flushPromises();
      }

      expect(scanner.scanCount).toBe(1);
      const [record] = engine.getExecutionStatus().recentHistory;
      expect(record.initiator).toBe('scanner');
      expect(record.status).toBe('succeeded');
    });

    it('should log a failing scan and keep the loop alive', async () => {
      jest.useFakeTimers();
      const scanner = new FakeOpportunityScanner().failScans();
      engine = createEngine({ scanIntervalMs: 1_000 }, scanner);

      engine.start();
      await jest.advanceTimersByTimeAsync(2_000);

      expect(scanner.scanCount).toBe(2);
      expect(logger.hasLogWithMeta('error', { interval: 'opportunity-scan', error: 'Scanner unavailable' })).toBe(true);
    });
  });
});
