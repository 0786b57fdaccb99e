/**
 * @xarb/execution-engine
 *
 * Execution core for cross-chain arbitrage: single-flight coordination,
 * opportunity filtering, profitability gating, just-in-time funding, the
 * cross-chain saga and the risk governor, behind the ExecutionEngine facade.
 */

export { ExecutionEngine } from './engine';

export {
  DEFAULT_ENGINE_CONFIG,
  EXECUTION_TIMEOUT_ABORT_REASON,
  EXECUTION_TIMEOUT_MS,
  TRANSACTION_TIMEOUT_MS,
  SHUTDOWN_TIMEOUT_MS,
  createServiceLogger,
  parseEnvTimeout,
} from './types';
export type {
  BatchSubmissionResult,
  CoordinatedExecutionResult,
  ExecutionCallback,
  ExecutionEngineComponentConfig,
  ExecutionEngineConfig,
  ExecutionEngineDeps,
  OpportunityDisposition,
  OpportunityOutcome,
  ShutdownReport,
} from './types';

export {
  OPPORTUNITY_DEFAULTS,
  createOpportunity,
  isCrossChain,
  opportunityAgeMs,
  parseOpportunity,
  routeKey,
} from './opportunity';
export type { OpportunityParseResult } from './opportunity';

export { ExecutionCoordinator } from './coordinator/execution-coordinator';
export type { ExecutionCoordinatorConfig } from './coordinator/execution-coordinator';

export { OpportunityFilter } from './filters/opportunity-filter';
export type { FilterStats, RankResult, RankedOpportunity } from './filters/opportunity-filter';

export * from './risk';

export { TransactionSubmitter } from './services/transaction-submitter';
export type { SubmittedTransaction, TransactionSubmitterOptions } from './services/transaction-submitter';

export { SmartBalanceManager, applySlippage, planConversion } from './services/smart-balance-manager';
export type { EnsureFundsOptions, SmartBalanceManagerOptions } from './services/smart-balance-manager';

export { BridgeSelector, scoreBridge } from './services/bridge-selector';
export type {
  BridgeRouteStatus,
  BridgeSelection,
  BridgeSelectorOptions,
  ObservedBridgeCost,
} from './services/bridge-selector';

export { CrossChainArbitrageSaga, computeTradeSizeUsd } from './strategies/cross-chain-saga';
export type { CrossChainArbitrageSagaOptions } from './strategies/cross-chain-saga';
