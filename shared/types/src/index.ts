// Shared types for the cross-chain execution core

export { TimeoutError } from './common';
export type { ILogger, Timestamp } from './common';

export type {
  OpportunityInput,
  Opportunity,
  FilterStage,
  FilterScores,
  FilterVerdict,
  VenueProfile,
} from './opportunity';

export {
  ExecutionErrorCode,
  formatExecutionError,
  extractErrorCode,
  createErrorResult,
  createSuccessResult,
  createSkippedResult,
  createInitialStatistics,
} from './execution';
export type {
  FailureKind,
  ExecutionResult,
  ExecutionRecordStatus,
  ExecutionRecord,
  ExecutionStatistics,
  ExecutionStatus,
} from './execution';

export { GAS_TIERS } from './risk';
export type { GasTier, ChainClass, OperationClass, RiskCounters, RiskOutcome } from './risk';

export type {
  AssetBalance,
  WalletSnapshot,
  ConversionLeg,
  ConversionPlan,
  FundingDetails,
  FundingResult,
} from './balance';

export { SAGA_PROGRESS } from './saga';
export type {
  SagaState,
  SwapArtifact,
  BridgeArtifact,
  SagaArtifacts,
  CrossChainExecutionResult,
  StrandedFundsReport,
} from './saga';

export type {
  UnsignedTransaction,
  SignableTransaction,
  TxStatus,
  TxReceipt,
  ChainClient,
  SwapRequest,
  SwapQuote,
  SwapBuildRequest,
  DexRouter,
  BridgeQuoteRequest,
  BridgeQuote,
  BridgeTransfer,
  BridgeTransferStatus,
  BridgeCompletion,
  AwaitCompletionOptions,
  BridgeProvider,
  OpportunityScanner,
  WalletKeyring,
  PriceFeed,
} from './collaborators';
