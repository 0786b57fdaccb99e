/**
 * Cross-Chain Arbitrage Saga
 *
 * Executes one opportunity across two chains:
 * 1. Validate the route and size the trade
 * 2. Fund the buy chain just in time
 * 3. Buy the token with native on the buy chain
 * 4. Bridge the token to the sell chain
 * 5. Wait for the bridge to deliver
 * 6. Sell the token for native on the sell chain
 *
 * ## Failure semantics
 *
 * | Reached      | Failure                       | Saga state     | Failure kind              |
 * |--------------|-------------------------------|----------------|---------------------------|
 * | Pending      | validation                    | Failed         | Filtered / Blocked        |
 * | Validated    | sizing or funding             | Failed         | FundingFailure            |
 * | Funded       | buy                           | Failed         | BuyFailure                |
 * | Bought       | no route, quote, transfer tx  | Failed         | BridgeInitiationFailure   |
 * | Bought       | transfer tx without receipt   | StrandedFunds  | BridgeTimeout             |
 * | Bridged      | timeout or still pending      | StrandedFunds  | BridgeTimeout             |
 * | Bridged      | failed, refunded, shutdown    | StrandedFunds  | StrandedFunds             |
 * | Confirmed    | sell                          | StrandedFunds  | SellFailure               |
 *
 * Once the bridge transaction is mined the saga ends only in Sold or
 * StrandedFunds. A stranded saga books buy gas plus bridge fee as its loss;
 * a bridge timeout books none, since the transfer may still land.
 *
 * Given the coordinator's deadline, the bridge wait ends `deadlineMarginMs`
 * before it, so a slow bridge reports BridgeTimeout rather than being cut
 * off by the execution timeout.
 *
 * Every phase writes a `[CROSS_CHAIN_AUDIT]` line. Stranded results are
 * kept in memory and emitted as `stranded` events.
 */

import { EventEmitter } from 'events';
import { formatUnits, parseUnits } from 'ethers';
import {
  BRIDGE_SELECTION_CONFIG,
  CROSS_CHAIN_CONFIG,
  getNativeAsset,
  getTokenDecimals,
} from '@xarb/config';
import type { CrossChainConfig } from '@xarb/config';
import {
  AbortedError,
  TimeoutError,
  TransactionPendingError,
  getErrorMessage,
  raceAbort,
  throwIfAborted,
  withTimeout,
} from '@xarb/core';
import type { ILogger } from '@xarb/core';
import { ExecutionErrorCode, SAGA_PROGRESS, formatExecutionError } from '@xarb/types';
import type {
  BridgeArtifact,
  BridgeCompletion,
  BridgeQuote,
  CrossChainExecutionResult,
  DexRouter,
  FailureKind,
  Opportunity,
  SagaArtifacts,
  SagaState,
  StrandedFundsReport,
  SwapArtifact,
} from '@xarb/types';
import { opportunityAgeMs, routeKey } from '../opportunity';
import type { BridgeSelection, BridgeSelector } from '../services/bridge-selector';
import { applySlippage } from '../services/smart-balance-manager';
import type { SmartBalanceManager } from '../services/smart-balance-manager';
import type { SubmittedTransaction, TransactionSubmitter } from '../services/transaction-submitter';
import { EXECUTION_TIMEOUT_ABORT_REASON, createServiceLogger } from '../types';

export interface CrossChainArbitrageSagaOptions {
  submitter: TransactionSubmitter;
  balanceManager: SmartBalanceManager;
  bridgeSelector: BridgeSelector;
  dexRouter: DexRouter;
  config?: Partial<CrossChainConfig>;
  /** Extra wait past the bridge timeout (default: BRIDGE_SELECTION_CONFIG.completionGraceMs) */
  completionGraceMs?: number;
  logger?: ILogger;
}

/**
 * Mutable progress of one run. Only `advance` moves `state`.
 */
interface SagaRun {
  opportunity: Opportunity;
  state: SagaState;
  artifacts: SagaArtifacts;
  startedAt: number;
  /** Epoch ms after which the caller stops waiting */
  deadline?: number;
}

/** How long the bridge wait may take */
interface BridgeWait {
  /** Passed to the provider's awaitCompletion */
  completionMs: number;
  /** Hard bound on the whole wait */
  hardMs: number;
}

/**
 * Trade size: the smallest of the hard cap, a share of the buy-chain wallet
 * and a multiple of gross profit (never below the floor).
 */
export function computeTradeSizeUsd(
  grossProfitUsd: number,
  walletTotalUsd: number,
  config: CrossChainConfig = CROSS_CHAIN_CONFIG
): number {
  return Math.min(
    config.maxTradeUsd,
    config.walletPct * walletTotalUsd,
    Math.max(grossProfitUsd * config.profitMultiplier, config.minTradeUsd)
  );
}

export class CrossChainArbitrageSaga extends EventEmitter {
  private readonly submitter: TransactionSubmitter;
  private readonly balanceManager: SmartBalanceManager;
  private readonly bridgeSelector: BridgeSelector;
  private readonly dexRouter: DexRouter;
  private readonly config: CrossChainConfig;
  private readonly completionGraceMs: number;
  private readonly logger: ILogger;

  private readonly activeRoutes = new Set<string>();
  private readonly stranded: StrandedFundsReport[] = [];

  constructor(options: CrossChainArbitrageSagaOptions) {
    super();
    this.submitter = options.submitter;
    this.balanceManager = options.balanceManager;
    this.bridgeSelector = options.bridgeSelector;
    this.dexRouter = options.dexRouter;
    this.config = { ...CROSS_CHAIN_CONFIG, ...options.config };
    this.completionGraceMs = options.completionGraceMs ?? BRIDGE_SELECTION_CONFIG.completionGraceMs;
    this.logger = options.logger ?? createServiceLogger('cross-chain-saga');
  }

  /**
   * Run the saga to a terminal state. Never throws.
   *
   * @param deadline - epoch ms after which the caller gives up; the bridge
   *   wait is shortened to end before it
   */
  async run(opportunity: Opportunity, signal?: AbortSignal, deadline?: number): Promise<CrossChainExecutionResult> {
    const run: SagaRun = {
      opportunity,
      state: 'Pending',
      artifacts: {},
      startedAt: Date.now(),
      deadline,
    };

    const rejection = this.validate(opportunity);
    if (rejection) {
      this.logAudit('REJECTED', opportunity.id, { reason: rejection.error });
      return this.fail(run, rejection.kind, rejection.error);
    }

    const route = routeKey(opportunity);
    this.activeRoutes.add(route);
    try {
      return await this.execute(run, signal);
    } catch (error) {
      // Steps convert their own failures; this only catches faults in the saga itself
      this.logger.error('Cross-chain saga fault', {
        opportunityId: opportunity.id,
        state: run.state,
        error: getErrorMessage(error),
      });
      const message = formatExecutionError(ExecutionErrorCode.EXECUTION_ERROR, getErrorMessage(error));
      return this.isPastBridge(run)
        ? this.strand(run, 'StrandedFunds', message, this.strandedLossUsd(run))
        : this.fail(run, 'ExecutionError', message);
    } finally {
      this.activeRoutes.delete(route);
    }
  }

  isRouteActive(opportunity: Opportunity): boolean {
    return this.activeRoutes.has(routeKey(opportunity));
  }

  getActiveRoutes(): string[] {
    return Array.from(this.activeRoutes);
  }

  getStrandedFunds(): StrandedFundsReport[] {
    return this.stranded.map((report) => ({ ...report }));
  }

  onStranded(listener: (report: StrandedFundsReport) => void): this {
    return this.on('stranded', listener);
  }

  // ===========================================================================
  // Phases
  // ===========================================================================

  private validate(opportunity: Opportunity): { kind: FailureKind; error: string } | null {
    if (opportunity.buyChain === opportunity.sellChain) {
      return {
        kind: 'Filtered',
        error: formatExecutionError(ExecutionErrorCode.SAME_CHAIN, opportunity.buyChain),
      };
    }

    const ageMs = opportunityAgeMs(opportunity);
    if (ageMs > opportunity.executionWindowMs) {
      return {
        kind: 'Filtered',
        error: formatExecutionError(
          ExecutionErrorCode.STALE,
          `age ${ageMs}ms exceeds execution window ${opportunity.executionWindowMs}ms`
        ),
      };
    }

    for (const chain of [opportunity.buyChain, opportunity.sellChain]) {
      if (!this.submitter.hasClient(chain)) {
        return { kind: 'Filtered', error: formatExecutionError(ExecutionErrorCode.NO_CLIENT, chain) };
      }
    }

    if (this.activeRoutes.has(routeKey(opportunity))) {
      return {
        kind: 'Blocked',
        error: formatExecutionError(ExecutionErrorCode.ROUTE_IN_FLIGHT, routeKey(opportunity)),
      };
    }

    return null;
  }

  private async execute(run: SagaRun, signal?: AbortSignal): Promise<CrossChainExecutionResult> {
    const { opportunity } = run;
    this.advance(run, 'Validated');
    this.logAudit('STARTED', opportunity.id, {
      token: opportunity.token,
      buyChain: opportunity.buyChain,
      sellChain: opportunity.sellChain,
      grossProfitUsd: opportunity.grossProfitUsd,
    });

    // Size and fund
    let tradeSizeUsd: number;
    try {
      throwIfAborted(signal);
      const walletTotalUsd = await this.balanceManager.getTotalValueUsd(opportunity.buyChain);
      tradeSizeUsd = computeTradeSizeUsd(opportunity.grossProfitUsd, walletTotalUsd, this.config);
      if (tradeSizeUsd <= 0) {
        return this.fail(
          run,
          'FundingFailure',
          formatExecutionError(ExecutionErrorCode.INSUFFICIENT_BALANCE, `empty wallet on ${opportunity.buyChain}`)
        );
      }
      run.artifacts.tradeSizeUsd = tradeSizeUsd;

      const funding = await this.balanceManager.ensureFunds(tradeSizeUsd, opportunity.buyChain, {
        signal,
        opportunityId: opportunity.id,
      });
      if (!funding.sufficient) {
        this.logAudit('FUNDING_FAILED', opportunity.id, { tradeSizeUsd, error: funding.details.error });
        return this.fail(
          run,
          'FundingFailure',
          funding.details.error ?? formatExecutionError(ExecutionErrorCode.INSUFFICIENT_BALANCE)
        );
      }
      this.logAudit('FUNDED', opportunity.id, {
        tradeSizeUsd,
        conversionExecuted: funding.conversionExecuted,
      });
    } catch (error) {
      return this.fail(run, 'FundingFailure', this.preBridgeError(ExecutionErrorCode.INSUFFICIENT_BALANCE, error));
    }
    this.advance(run, 'Funded');

    // Buy
    try {
      run.artifacts.buy = await this.buy(opportunity, tradeSizeUsd, signal);
    } catch (error) {
      this.logAudit('BUY_FAILED', opportunity.id, { error: getErrorMessage(error) });
      return this.fail(run, 'BuyFailure', this.preBridgeError(ExecutionErrorCode.BUY_FAILED, error));
    }
    this.advance(run, 'Bought');
    this.logAudit('BOUGHT', opportunity.id, {
      txHash: run.artifacts.buy.txHash,
      amountOut: run.artifacts.buy.amountOut,
      gasCostUsd: run.artifacts.buy.gasCostUsd,
    });

    // Bridge
    const selection = this.bridgeSelector.select(opportunity.buyChain, opportunity.sellChain, opportunity.token);
    if (!selection) {
      this.logAudit('BRIDGE_NO_ROUTE', opportunity.id, {});
      return this.fail(
        run,
        'BridgeInitiationFailure',
        formatExecutionError(
          ExecutionErrorCode.NO_ROUTE,
          `${opportunity.buyChain}->${opportunity.sellChain} ${opportunity.token}`
        ),
        run.artifacts.buy.gasCostUsd
      );
    }

    let quote: BridgeQuote;
    try {
      quote = await selection.provider.quote({
        sourceChain: opportunity.buyChain,
        destChain: opportunity.sellChain,
        token: opportunity.token,
        amount: run.artifacts.buy.amountOut,
        recipient: this.submitter.getAddress(opportunity.sellChain),
      });
    } catch (error) {
      this.recordBridgeFailure(selection, opportunity);
      this.logAudit('BRIDGE_QUOTE_FAILED', opportunity.id, { bridge: selection.bridge, error: getErrorMessage(error) });
      return this.fail(
        run,
        'BridgeInitiationFailure',
        this.preBridgeError(ExecutionErrorCode.BRIDGE_QUOTE, error, selection.bridge),
        run.artifacts.buy.gasCostUsd
      );
    }

    try {
      run.artifacts.bridge = await this.initiateBridge(run, selection, quote, tradeSizeUsd, signal);
    } catch (error) {
      const unconfirmed = run.artifacts.bridge;
      if (error instanceof TransactionPendingError && unconfirmed) {
        // Broadcast without a receipt: the transfer may be in flight
        this.logAudit('BRIDGE_UNCONFIRMED', opportunity.id, {
          bridge: selection.bridge,
          transferId: unconfirmed.transferId,
          sourceTxHash: unconfirmed.sourceTxHash,
        });
        return this.strand(
          run,
          'BridgeTimeout',
          formatExecutionError(
            ExecutionErrorCode.BRIDGE_TIMEOUT,
            `${unconfirmed.transferId} source transaction ${unconfirmed.sourceTxHash} unconfirmed: ${error.message}`
          ),
          0
        );
      }
      this.recordBridgeFailure(selection, opportunity);
      this.logAudit('BRIDGE_EXEC_FAILED', opportunity.id, { bridge: selection.bridge, error: getErrorMessage(error) });
      return this.fail(
        run,
        'BridgeInitiationFailure',
        this.preBridgeError(ExecutionErrorCode.BRIDGE_EXEC, error, selection.bridge),
        run.artifacts.buy.gasCostUsd
      );
    }
    this.advance(run, 'Bridged');
    this.logAudit('BRIDGED', opportunity.id, {
      bridge: selection.bridge,
      transferId: run.artifacts.bridge.transferId,
      sourceTxHash: run.artifacts.bridge.sourceTxHash,
      amountSent: run.artifacts.bridge.amountSent,
      feeUsd: run.artifacts.bridge.feeUsd,
    });

    // Await delivery
    const bridgeArtifact = run.artifacts.bridge;
    const wait = this.bridgeWait(run, selection);
    let completion: BridgeCompletion;
    try {
      completion = await withTimeout(
        selection.provider.awaitCompletion(bridgeArtifact.transferId, { timeoutMs: wait.completionMs, signal }),
        wait.hardMs,
        `bridge ${selection.bridge} ${bridgeArtifact.transferId}`
      );
    } catch (error) {
      if (error instanceof AbortedError && error.reason === EXECUTION_TIMEOUT_ABORT_REASON) {
        return this.strand(
          run,
          'BridgeTimeout',
          formatExecutionError(
            ExecutionErrorCode.BRIDGE_TIMEOUT,
            `${bridgeArtifact.transferId} undelivered when the execution timed out`
          ),
          0
        );
      }
      if (error instanceof AbortedError) {
        return this.strand(
          run,
          'StrandedFunds',
          formatExecutionError(ExecutionErrorCode.SHUTDOWN, `awaiting bridge ${bridgeArtifact.transferId}`),
          this.strandedLossUsd(run)
        );
      }
      this.recordBridgeFailure(selection, opportunity);
      const detail = error instanceof TimeoutError
        ? `${bridgeArtifact.transferId} not delivered within ${wait.completionMs}ms`
        : `${bridgeArtifact.transferId}: ${getErrorMessage(error)}`;
      return this.strand(run, 'BridgeTimeout', formatExecutionError(ExecutionErrorCode.BRIDGE_TIMEOUT, detail), 0);
    }

    if (completion.status === 'pending') {
      this.recordBridgeFailure(selection, opportunity);
      return this.strand(
        run,
        'BridgeTimeout',
        formatExecutionError(
          ExecutionErrorCode.BRIDGE_TIMEOUT,
          `${bridgeArtifact.transferId} still pending after ${wait.completionMs}ms`
        ),
        0
      );
    }

    if (completion.status !== 'completed') {
      this.recordBridgeFailure(selection, opportunity);
      return this.strand(
        run,
        'StrandedFunds',
        formatExecutionError(
          ExecutionErrorCode.BRIDGE_FAILED,
          `${bridgeArtifact.transferId} ${completion.status}${completion.error ? `: ${completion.error}` : ''}`
        ),
        this.strandedLossUsd(run)
      );
    }

    this.bridgeSelector.recordSuccess(selection.bridge, opportunity.buyChain, opportunity.sellChain, opportunity.token);
    bridgeArtifact.amountReceived = completion.amountReceived ?? quote.amountOut;
    bridgeArtifact.destTxHash = completion.destTxHash;
    bridgeArtifact.confirmedAt = Date.now();
    this.advance(run, 'BridgeConfirmed');
    this.logAudit('BRIDGE_CONFIRMED', opportunity.id, {
      bridge: selection.bridge,
      amountReceived: bridgeArtifact.amountReceived,
      destTxHash: bridgeArtifact.destTxHash,
      elapsedMs: bridgeArtifact.confirmedAt - bridgeArtifact.initiatedAt,
    });

    // Sell
    try {
      run.artifacts.sell = await this.sell(opportunity, bridgeArtifact.amountReceived, signal);
    } catch (error) {
      this.logAudit('SELL_FAILED', opportunity.id, { error: getErrorMessage(error) });
      return this.strand(
        run,
        'SellFailure',
        formatExecutionError(
          this.abortCode(error) ?? ExecutionErrorCode.SELL_FAILED,
          `${opportunity.token} on ${opportunity.sellChain}: ${getErrorMessage(error)}`
        ),
        this.strandedLossUsd(run)
      );
    }
    this.advance(run, 'Sold');

    return this.succeed(run, run.artifacts.buy, bridgeArtifact, run.artifacts.sell);
  }

  private async buy(opportunity: Opportunity, tradeSizeUsd: number, signal?: AbortSignal): Promise<SwapArtifact> {
    const chain = opportunity.buyChain;
    const native = getNativeAsset(chain);
    const nativePriceUsd = await this.submitter.nativePriceUsd(chain);
    const decimals = getTokenDecimals(native);
    const amountIn = parseUnits((tradeSizeUsd / nativePriceUsd).toFixed(decimals), decimals);

    return this.swap(chain, opportunity.buyVenue, native, opportunity.token, amountIn, tradeSizeUsd, 'buy', signal);
  }

  private async sell(opportunity: Opportunity, amountIn: bigint, signal?: AbortSignal): Promise<SwapArtifact> {
    const chain = opportunity.sellChain;
    const native = getNativeAsset(chain);
    const valueInUsd = Number(formatUnits(amountIn, getTokenDecimals(opportunity.token))) * opportunity.sellPrice;

    const artifact = await this.swap(
      chain, opportunity.sellVenue, opportunity.token, native, amountIn, valueInUsd, 'sell', signal
    );
    const nativePriceUsd = await this.submitter.nativePriceUsd(chain);
    artifact.valueOutUsd = Number(formatUnits(artifact.amountOut, getTokenDecimals(native))) * nativePriceUsd;
    return artifact;
  }

  private async swap(
    chain: string,
    venue: string,
    tokenIn: string,
    tokenOut: string,
    amountIn: bigint,
    valueInUsd: number,
    side: 'buy' | 'sell',
    signal?: AbortSignal
  ): Promise<SwapArtifact> {
    throwIfAborted(signal);
    const quote = await raceAbort(this.dexRouter.quote({ chain, venue, tokenIn, tokenOut, amountIn }), signal);
    const minAmountOut = applySlippage(quote.amountOut, this.config.slippage);

    const tx = await this.dexRouter.swap({
      chain,
      venue,
      tokenIn,
      tokenOut,
      amountIn,
      minAmountOut,
      recipient: this.submitter.getAddress(chain),
      deadline: Math.floor(Date.now() / 1000) + this.config.swapDeadlineSec,
    });
    const receipt = await this.submitter.submit(tx, `${side} ${tokenIn}->${tokenOut}`, signal);

    return {
      chain,
      venue,
      txHash: receipt.hash,
      amountIn,
      // Without decoded logs the slippage floor is the only guaranteed amount
      amountOut: receipt.amountOut ?? minAmountOut,
      valueInUsd,
      gasCostUsd: receipt.gasCostUsd,
    };
  }

  /**
   * Build and submit the source-chain transfer. When the transaction is
   * broadcast but unconfirmed, `run.artifacts.bridge` holds what is known of
   * it before the TransactionPendingError propagates.
   */
  private async initiateBridge(
    run: SagaRun,
    selection: BridgeSelection,
    quote: BridgeQuote,
    tradeSizeUsd: number,
    signal?: AbortSignal
  ): Promise<BridgeArtifact> {
    const { opportunity } = run;
    const transfer = await selection.provider.transfer(quote, this.submitter.getAddress(opportunity.sellChain));

    let receipt: SubmittedTransaction;
    try {
      receipt = await this.submitter.submit(transfer.tx, `bridge ${selection.bridge}`, signal);
    } catch (error) {
      if (error instanceof TransactionPendingError) {
        run.artifacts.bridge = {
          bridge: selection.bridge,
          transferId: transfer.transferId,
          sourceTxHash: error.transactionHash,
          amountSent: quote.amountIn,
          feeUsd: quote.feeUsd,
          gasCostUsd: 0,
          initiatedAt: Date.now(),
        };
      }
      throw error;
    }

    this.bridgeSelector.recordUsage(
      selection.bridge,
      opportunity.buyChain,
      opportunity.sellChain,
      opportunity.token,
      quote.amountIn,
      tradeSizeUsd
    );

    return {
      bridge: selection.bridge,
      transferId: transfer.transferId,
      sourceTxHash: receipt.hash,
      amountSent: quote.amountIn,
      feeUsd: quote.feeUsd + receipt.gasCostUsd,
      gasCostUsd: receipt.gasCostUsd,
      initiatedAt: Date.now(),
    };
  }

  // ===========================================================================
  // State and results
  // ===========================================================================

  private advance(run: SagaRun, next: SagaState): void {
    const from = SAGA_PROGRESS.indexOf(run.state);
    const to = SAGA_PROGRESS.indexOf(next);
    if (to <= from) {
      throw new Error(`Saga ${run.opportunity.id} cannot move from ${run.state} to ${next}`);
    }
    run.state = next;
  }

  /**
   * Wait budget for the bridge: its configured timeout plus grace, cut short
   * to end `deadlineMarginMs` before the run's deadline.
   */
  private bridgeWait(run: SagaRun, selection: BridgeSelection): BridgeWait {
    const full: BridgeWait = {
      completionMs: selection.timeoutMs,
      hardMs: selection.timeoutMs + this.completionGraceMs,
    };
    if (run.deadline === undefined) {
      return full;
    }

    const budgetMs = run.deadline - Date.now() - this.config.deadlineMarginMs;
    if (budgetMs >= full.hardMs) {
      return full;
    }

    const hardMs = Math.max(0, budgetMs);
    this.logger.debug('Bridge wait capped by execution deadline', {
      opportunityId: run.opportunity.id,
      bridge: selection.bridge,
      bridgeTimeoutMs: selection.timeoutMs,
      hardMs,
    });
    return { completionMs: Math.max(0, hardMs - this.completionGraceMs), hardMs };
  }

  private isPastBridge(run: SagaRun): boolean {
    return SAGA_PROGRESS.indexOf(run.state) >= SAGA_PROGRESS.indexOf('Bridged');
  }

  private strandedLossUsd(run: SagaRun): number {
    return (run.artifacts.buy?.gasCostUsd ?? 0) + (run.artifacts.bridge?.feeUsd ?? 0);
  }

  /**
   * Error message for a failure before the bridge; an abort gets its own
   * code whichever step it hit.
   */
  private preBridgeError(code: ExecutionErrorCode, error: unknown, detail?: string): string {
    if (error instanceof AbortedError) {
      return formatExecutionError(this.abortCode(error) ?? code, error.reason);
    }
    const message = getErrorMessage(error);
    return formatExecutionError(code, detail ? `${detail}: ${message}` : message);
  }

  /** Shutdown and execution timeout aborts each get their own code */
  private abortCode(error: unknown): ExecutionErrorCode | null {
    if (!(error instanceof AbortedError)) {
      return null;
    }
    return error.reason === EXECUTION_TIMEOUT_ABORT_REASON
      ? ExecutionErrorCode.EXECUTION_TIMEOUT
      : ExecutionErrorCode.SHUTDOWN;
  }

  private recordBridgeFailure(selection: BridgeSelection, opportunity: Opportunity): void {
    this.bridgeSelector.recordFailure(selection.bridge, opportunity.buyChain, opportunity.sellChain, opportunity.token);
  }

  private fail(run: SagaRun, kind: FailureKind, error: string, lossUsd = 0): CrossChainExecutionResult {
    const { opportunity } = run;
    const lastProgressState = run.state;
    run.state = 'Failed';

    this.logger.warn('Cross-chain saga failed', {
      opportunityId: opportunity.id,
      failureKind: kind,
      lastProgressState,
      error,
    });

    return {
      opportunityId: opportunity.id,
      success: false,
      error,
      failureKind: kind,
      actualProfit: lossUsd > 0 ? -lossUsd : undefined,
      gasCost: this.gasSpentUsd(run.artifacts),
      timestamp: Date.now(),
      chain: opportunity.buyChain,
      dex: opportunity.buyVenue,
      latencyMs: Date.now() - run.startedAt,
      sagaState: 'Failed',
      lastProgressState,
      artifacts: run.artifacts,
      lossUsd: lossUsd > 0 ? lossUsd : undefined,
    };
  }

  private strand(run: SagaRun, kind: FailureKind, error: string, lossUsd: number): CrossChainExecutionResult {
    const { opportunity } = run;
    const lastProgressState = run.state;
    run.state = 'StrandedFunds';

    const report: StrandedFundsReport = {
      opportunityId: opportunity.id,
      token: opportunity.token,
      sourceChain: opportunity.buyChain,
      destChain: opportunity.sellChain,
      lastProgressState,
      reason: error,
      bridge: run.artifacts.bridge ? { ...run.artifacts.bridge } : undefined,
      amount: run.artifacts.bridge?.amountReceived ?? run.artifacts.bridge?.amountSent ?? 0n,
      lossUsd,
      recordedAt: Date.now(),
    };
    this.stranded.push(report);

    this.logger.error(kind === 'BridgeTimeout' ? 'ALERT: bridge transfer timed out' : 'ALERT: funds stranded', {
      opportunityId: opportunity.id,
      failureKind: kind,
      lastProgressState,
      token: report.token,
      amount: report.amount,
      destChain: report.destChain,
      bridge: report.bridge?.bridge,
      transferId: report.bridge?.transferId,
      lossUsd,
      error,
    });
    this.logAudit('STRANDED', opportunity.id, { failureKind: kind, lastProgressState, lossUsd });
    this.emit('stranded', report);

    return {
      opportunityId: opportunity.id,
      success: false,
      error,
      failureKind: kind,
      transactionHash: run.artifacts.bridge?.sourceTxHash,
      actualProfit: lossUsd > 0 ? -lossUsd : undefined,
      gasCost: this.gasSpentUsd(run.artifacts),
      timestamp: Date.now(),
      chain: opportunity.buyChain,
      dex: opportunity.buyVenue,
      latencyMs: Date.now() - run.startedAt,
      sagaState: 'StrandedFunds',
      lastProgressState,
      artifacts: run.artifacts,
      lossUsd,
    };
  }

  private succeed(
    run: SagaRun,
    buy: SwapArtifact,
    bridge: BridgeArtifact,
    sell: SwapArtifact
  ): CrossChainExecutionResult {
    const { opportunity } = run;
    const proceedsUsd = sell.valueOutUsd ?? 0;
    const netProfitUsd = proceedsUsd - buy.valueInUsd - bridge.feeUsd - (buy.gasCostUsd + sell.gasCostUsd);

    this.logAudit('SOLD', opportunity.id, {
      txHash: sell.txHash,
      proceedsUsd,
      tradeSizeUsd: buy.valueInUsd,
      bridgeFeeUsd: bridge.feeUsd,
      netProfitUsd,
    });
    this.logger.info('Cross-chain saga completed', {
      opportunityId: opportunity.id,
      netProfitUsd,
      latencyMs: Date.now() - run.startedAt,
    });

    return {
      opportunityId: opportunity.id,
      success: true,
      transactionHash: sell.txHash,
      actualProfit: netProfitUsd,
      gasCost: this.gasSpentUsd(run.artifacts),
      timestamp: Date.now(),
      chain: opportunity.buyChain,
      dex: opportunity.buyVenue,
      latencyMs: Date.now() - run.startedAt,
      sagaState: 'Sold',
      lastProgressState: 'Sold',
      artifacts: run.artifacts,
    };
  }

  private gasSpentUsd(artifacts: SagaArtifacts): number {
    return (
      (artifacts.buy?.gasCostUsd ?? 0) +
      (artifacts.bridge?.gasCostUsd ?? 0) +
      (artifacts.sell?.gasCostUsd ?? 0)
    );
  }

  private logAudit(phase: string, opportunityId: string, data: Record<string, unknown>): void {
    this.logger.info(`[CROSS_CHAIN_AUDIT] ${phase}`, { opportunityId, ...data });
  }
}
