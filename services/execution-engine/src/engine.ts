/**
 * Execution Engine
 *
 * Facade over the execution core. Owns one instance of each component and
 * decides, per submitted batch, which single opportunity (if any) runs:
 *
 * 1. Normalize: invalid inputs are filtered
 * 2. Rank: OpportunityFilter verdicts, highest priority first
 * 3. Gate: ProfitabilityGate on the buy chain's current gas price
 * 4. Risk: the governor may halt the whole batch
 * 5. Execute: the first surviving candidate runs through the coordinator
 *    and the cross-chain saga; the rest are superseded
 *
 * Background loops (scan, bridge cost refresh, pending-tx watch, report)
 * run on an IntervalManager between start() and shutdown().
 */

import { formatUnits } from 'ethers';
import { GAS_TIER_CONFIG } from '@xarb/config';
import { IntervalManager, NonceManager, getErrorMessage, withTimeoutDefault } from '@xarb/core';
import type { ILogger } from '@xarb/core';
import {
  ExecutionErrorCode,
  createSkippedResult,
  formatExecutionError,
} from '@xarb/types';
import type {
  ExecutionResult,
  ExecutionStatus,
  FailureKind,
  FilterVerdict,
  Opportunity,
  StrandedFundsReport,
} from '@xarb/types';
import { ExecutionCoordinator } from './coordinator/execution-coordinator';
import { OpportunityFilter } from './filters/opportunity-filter';
import type { FilterStats } from './filters/opportunity-filter';
import { parseOpportunity } from './opportunity';
import { ProfitabilityGate, classifyChain } from './risk/profitability-gate';
import { createRiskGovernor } from './risk/risk-governor';
import type { RiskGovernor, RiskGovernorStatus } from './risk/risk-governor';
import { BridgeSelector } from './services/bridge-selector';
import type { BridgeRouteStatus } from './services/bridge-selector';
import { SmartBalanceManager } from './services/smart-balance-manager';
import { TransactionSubmitter } from './services/transaction-submitter';
import { CrossChainArbitrageSaga } from './strategies/cross-chain-saga';
import {
  DEFAULT_ENGINE_CONFIG,
  createServiceLogger,
} from './types';
import type {
  BatchSubmissionResult,
  ExecutionEngineConfig,
  ExecutionEngineDeps,
  OpportunityOutcome,
  ShutdownReport,
} from './types';

/** Saga outcomes that are not trades and do not count against the governor */
const NON_TRADE_FAILURES: ReadonlySet<FailureKind> = new Set<FailureKind>(['Filtered', 'Blocked']);

export class ExecutionEngine {
  private readonly config: ExecutionEngineConfig;
  private readonly deps: ExecutionEngineDeps;
  private readonly logger: ILogger;

  private readonly coordinator: ExecutionCoordinator;
  private readonly filter: OpportunityFilter;
  private readonly gate: ProfitabilityGate;
  private readonly governor: RiskGovernor;
  private readonly nonceManager: NonceManager;
  private readonly submitter: TransactionSubmitter;
  private readonly balanceManager: SmartBalanceManager;
  private readonly bridgeSelector: BridgeSelector;
  private readonly saga: CrossChainArbitrageSaga;
  private readonly intervals: IntervalManager;

  private running = false;
  private shuttingDown = false;
  private scanInFlight = false;
  private shutdownReport: Promise<ShutdownReport> | null = null;

  constructor(deps: ExecutionEngineDeps, config: Partial<ExecutionEngineConfig> = {}) {
    this.deps = deps;
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };
    this.logger = deps.logger ?? createServiceLogger('execution-engine');

    const child = (component: string): ILogger => this.logger.child({ component });

    this.coordinator = new ExecutionCoordinator(
      { executionTimeoutMs: this.config.executionTimeoutMs },
      child('execution-coordinator')
    );
    this.filter = new OpportunityFilter(this.config.filter, child('opportunity-filter'));
    this.gate = new ProfitabilityGate(this.config.gasTiers ?? GAS_TIER_CONFIG, child('profitability-gate'));
    this.governor = createRiskGovernor({ ...this.config.risk, logger: child('risk-governor') });
    this.nonceManager = new NonceManager({}, child('nonce-manager'));
    this.submitter = new TransactionSubmitter({
      chainClients: deps.chainClients,
      keyring: deps.keyring,
      priceFeed: deps.priceFeed,
      nonceManager: this.nonceManager,
      transactionTimeoutMs: this.config.transactionTimeoutMs,
      logger: child('transaction-submitter'),
    });
    this.balanceManager = new SmartBalanceManager({
      submitter: this.submitter,
      dexRouter: deps.dexRouter,
      priceFeed: deps.priceFeed,
      config: this.config.balance,
      swapDeadlineSec: this.config.crossChain?.swapDeadlineSec,
      logger: child('smart-balance-manager'),
    });
    this.bridgeSelector = new BridgeSelector({
      providers: deps.bridgeProviders,
      recipientFor: (chain) => this.submitter.getAddress(chain),
      config: this.config.bridgeSelection,
      logger: child('bridge-selector'),
    });
    this.saga = new CrossChainArbitrageSaga({
      submitter: this.submitter,
      balanceManager: this.balanceManager,
      bridgeSelector: this.bridgeSelector,
      dexRouter: deps.dexRouter,
      config: this.config.crossChain,
      completionGraceMs: this.config.bridgeSelection?.completionGraceMs,
      logger: child('cross-chain-saga'),
    });
    this.intervals = new IntervalManager(child('interval-manager'));
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Start the background loops. A loop whose interval is 0 stays off, as
   * does scanning without a scanner.
   */
  start(): void {
    if (this.running) return;
    if (this.shuttingDown) {
      throw new Error('Execution engine has been shut down');
    }
    this.running = true;

    const { scanner } = this.deps;
    if (scanner && this.config.scanIntervalMs > 0) {
      this.intervals.set('opportunity-scan', () => this.scanOnce(), this.config.scanIntervalMs);
    }
    if (this.config.bridgeCostRefreshIntervalMs > 0) {
      this.intervals.set(
        'bridge-cost-refresh',
        async () => {
          await this.bridgeSelector.refreshObservedCosts();
        },
        this.config.bridgeCostRefreshIntervalMs
      );
    }
    if (this.config.pendingTxWatchIntervalMs > 0) {
      this.intervals.set('pending-tx-watch', () => this.watchPendingTransactions(), this.config.pendingTxWatchIntervalMs);
    }
    if (this.config.reportIntervalMs > 0) {
      this.intervals.set('statistics-report', () => this.report(), this.config.reportIntervalMs);
    }

    this.logger.info('Execution engine started', {
      chains: Array.from(this.deps.chainClients.keys()),
      bridges: Array.from(this.deps.bridgeProviders.keys()),
      loops: this.intervals.getNames(),
      riskEnabled: this.governor.isEnabled(),
    });
  }

  /**
   * Stop the loops, abort the in-flight saga and wait for it to unwind, up
   * to the shutdown timeout. Idempotent.
   */
  shutdown(): Promise<ShutdownReport> {
    if (!this.shutdownReport) {
      this.shutdownReport = this.performShutdown();
    }
    return this.shutdownReport;
  }

  private async performShutdown(): Promise<ShutdownReport> {
    this.shuttingDown = true;
    this.running = false;
    this.intervals.clearAll();
    this.logger.info('Execution engine shutting down');

    const abandoned = this.coordinator.abortActive('shutdown');
    let drained = true;
    if (abandoned) {
      drained = await this.coordinator.waitForIdle(this.config.shutdownTimeoutMs);
      if (!drained) {
        this.logger.error('In-flight execution did not unwind before shutdown timeout', {
          executionId: abandoned,
          shutdownTimeoutMs: this.config.shutdownTimeoutMs,
        });
      }
    }

    this.governor.stop();

    const strandedFunds = this.saga.getStrandedFunds();
    for (const report of strandedFunds) {
      this.logger.error('ALERT: stranded funds outstanding at shutdown', {
        opportunityId: report.opportunityId,
        token: report.token,
        amount: report.amount,
        sourceChain: report.sourceChain,
        destChain: report.destChain,
        lastProgressState: report.lastProgressState,
        bridge: report.bridge?.bridge,
        transferId: report.bridge?.transferId,
        reason: report.reason,
      });
    }

    this.coordinator.logStatistics();
    this.logger.info('Execution engine stopped', {
      abandonedExecutions: abandoned ? 1 : 0,
      strandedFunds: strandedFunds.length,
      drained,
    });

    return {
      strandedFunds,
      abandonedExecutions: abandoned ? [abandoned] : [],
      drained,
    };
  }

  isRunning(): boolean {
    return this.running;
  }

  // ===========================================================================
  // Decision path
  // ===========================================================================

  /**
   * Run one batch of scanner output through the decision path. At most one
   * opportunity executes. Never throws.
   */
  async submitOpportunities(batch: readonly unknown[], initiator = 'engine'): Promise<BatchSubmissionResult> {
    const outcomes: OpportunityOutcome[] = [];

    if (this.shuttingDown) {
      const reason = formatExecutionError(ExecutionErrorCode.SHUTDOWN);
      for (const input of batch) {
        const parsed = parseOpportunity(input);
        outcomes.push({
          opportunityId: parsed.ok ? parsed.opportunity.id : parsed.opportunityId,
          disposition: 'blocked',
          reason,
        });
      }
      return { outcomes };
    }

    const valid: Opportunity[] = [];
    for (const input of batch) {
      const parsed = parseOpportunity(input);
      if (parsed.ok) {
        valid.push(parsed.opportunity);
      } else {
        outcomes.push({
          opportunityId: parsed.opportunityId,
          disposition: 'filtered',
          reason: formatExecutionError(ExecutionErrorCode.INVALID_OPPORTUNITY, parsed.error),
        });
      }
    }

    const { accepted, verdicts } = this.filter.rank(valid);
    for (const verdict of verdicts) {
      if (!verdict.shouldExecute) {
        outcomes.push({ opportunityId: verdict.opportunityId, disposition: 'filtered', reason: verdict.reason, verdict });
      }
    }

    let executed: ExecutionResult | undefined;
    let index = 0;
    for (; index < accepted.length && !executed; index++) {
      const { opportunity, verdict } = accepted[index];

      const gateRejection = await this.checkProfitability(opportunity);
      if (gateRejection) {
        outcomes.push({ opportunityId: opportunity.id, disposition: 'filtered', reason: gateRejection, verdict });
        continue;
      }

      if (!this.governor.permits()) {
        const status = this.governor.getStatus();
        const reason = formatExecutionError(ExecutionErrorCode.RISK_HALT, status.haltReason ?? status.state);
        for (const halted of accepted.slice(index)) {
          outcomes.push({
            opportunityId: halted.opportunity.id,
            disposition: 'risk-halted',
            reason,
            verdict: halted.verdict,
            result: createSkippedResult(
              halted.opportunity.id,
              reason,
              halted.opportunity.buyChain,
              halted.opportunity.buyVenue,
              'RiskHalt'
            ),
          });
        }
        this.logger.warn('Batch halted by risk governor', { reason, candidates: accepted.length - index });
        return { outcomes };
      }

      const coordinated = await this.coordinator.execute(
        (signal, deadline) => this.saga.run(opportunity, signal, deadline),
        opportunity,
        initiator
      );

      if (coordinated.blocked) {
        outcomes.push({
          opportunityId: opportunity.id,
          disposition: 'blocked',
          reason: coordinated.result.error,
          verdict,
          result: coordinated.result,
        });
        index++;
        break;
      }

      executed = coordinated.result;
      const settled = coordinated.timedOut && coordinated.settled
        ? await this.awaitLateSettlement(opportunity, coordinated.settled)
        : null;
      this.recordOutcome(opportunity, verdict, executed, settled?.actualProfit);
      outcomes.push({ opportunityId: opportunity.id, disposition: 'executed', verdict, result: executed });
    }

    for (const skipped of accepted.slice(index)) {
      outcomes.push({
        opportunityId: skipped.opportunity.id,
        disposition: 'superseded',
        reason: 'A higher-priority opportunity was taken',
        verdict: skipped.verdict,
      });
    }

    return executed ? { outcomes, executed } : { outcomes };
  }

  /**
   * @returns the rejection reason, or null when the trade clears the gate
   */
  private async checkProfitability(opportunity: Opportunity): Promise<string | null> {
    const chain = opportunity.buyChain;
    if (!this.submitter.hasClient(chain)) {
      return formatExecutionError(ExecutionErrorCode.NO_CLIENT, chain);
    }

    let gasGwei: number;
    try {
      gasGwei = Number(formatUnits(await this.submitter.getClient(chain).getGasPrice(), 'gwei'));
    } catch (error) {
      this.logger.warn('Gas price unavailable, skipping opportunity', {
        opportunityId: opportunity.id,
        chain,
        error: getErrorMessage(error),
      });
      return formatExecutionError(ExecutionErrorCode.UNPROFITABLE, `gas price unavailable on ${chain}`);
    }

    const nativePriceUsd = await this.submitter.nativePriceUsd(chain);
    const decision = this.gate.isProfitable(opportunity, gasGwei, classifyChain(chain), undefined, nativePriceUsd);
    return decision.profitable ? null : formatExecutionError(ExecutionErrorCode.UNPROFITABLE, decision.reason);
  }

  /**
   * After a timeout the saga keeps unwinding on the aborted signal; wait up
   * to the shutdown timeout for what it finally booked.
   */
  private async awaitLateSettlement(
    opportunity: Opportunity,
    settled: Promise<ExecutionResult | null>
  ): Promise<ExecutionResult | null> {
    const late = await withTimeoutDefault(settled, this.config.shutdownTimeoutMs, null, () => {
      this.logger.warn('Timed-out execution did not settle, loss unbooked', {
        opportunityId: opportunity.id,
        waitedMs: this.config.shutdownTimeoutMs,
      });
    });
    if (late) {
      this.logger.info('Timed-out execution settled', {
        opportunityId: opportunity.id,
        failureKind: late.failureKind,
        actualProfit: late.actualProfit,
        error: late.error,
      });
    }
    return late;
  }

  /**
   * @param settledPnlUsd - P&L of a timed-out execution's late result, which
   *   replaces the coordinator's zero
   */
  private recordOutcome(
    opportunity: Opportunity,
    verdict: FilterVerdict,
    result: ExecutionResult,
    settledPnlUsd?: number
  ): void {
    if (result.failureKind && NON_TRADE_FAILURES.has(result.failureKind)) {
      return;
    }

    this.governor.record({ success: result.success, pnlUsd: settledPnlUsd ?? result.actualProfit ?? 0 });

    const executionTimeSec = (result.latencyMs ?? verdict.estimatedExecutionTimeSec * 1000) / 1000;
    this.filter.recordVenueExecution(opportunity.buyVenue, executionTimeSec, result.success);
    if (opportunity.sellVenue !== opportunity.buyVenue) {
      this.filter.recordVenueExecution(opportunity.sellVenue, executionTimeSec, result.success);
    }
  }

  // ===========================================================================
  // Background loops
  // ===========================================================================

  private async scanOnce(): Promise<void> {
    const { scanner } = this.deps;
    if (!scanner || this.scanInFlight || this.shuttingDown) return;
    if (this.coordinator.isExecutionInProgress()) {
      this.logger.debug('Scan skipped: execution in progress');
      return;
    }

    this.scanInFlight = true;
    try {
      const batch = await scanner.scan();
      if (batch.length > 0) {
        await this.submitOpportunities(batch, this.config.initiator);
      }
    } finally {
      this.scanInFlight = false;
    }
  }

  private async watchPendingTransactions(): Promise<void> {
    const dropped = this.nonceManager.cleanupStale();
    if (dropped > 0) {
      this.logger.warn('Dropped stale pending transactions, resyncing nonces', { dropped });
      await this.nonceManager.resync();
    }
  }

  private report(): void {
    this.coordinator.logStatistics();
    const risk = this.governor.getStatus();
    this.logger.info('Engine report', {
      riskState: risk.state,
      consecutiveFailures: risk.counters.consecutiveFailures,
      dailyLossUsd: risk.counters.dailyLossUsd,
      filter: this.filter.getStats(),
      strandedFunds: this.saga.getStrandedFunds().length,
    });
  }

  // ===========================================================================
  // Status and operator controls
  // ===========================================================================

  getExecutionStatus(): ExecutionStatus {
    return this.coordinator.getExecutionStatus();
  }

  getRiskStatus(): RiskGovernorStatus {
    return this.governor.getStatus();
  }

  getStrandedFunds(): StrandedFundsReport[] {
    return this.saga.getStrandedFunds();
  }

  getFilterStats(): FilterStats {
    return this.filter.getStats();
  }

  getBridgeRouteStatus(): BridgeRouteStatus[] {
    return this.bridgeSelector.getRouteStatus();
  }

  onStranded(listener: (report: StrandedFundsReport) => void): this {
    this.saga.onStranded(listener);
    return this;
  }

  /** Lift a risk halt (operator action) */
  resetRisk(): void {
    this.governor.reset();
  }

  emergencyStop(reason: string): void {
    this.governor.emergencyStop(reason);
  }
}
