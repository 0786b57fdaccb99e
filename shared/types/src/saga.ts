/**
 * Cross-chain saga types
 */

import type { Timestamp } from './common';
import type { ExecutionResult } from './execution';

/**
 * Position of a cross-chain trade. Progress states are ordered; a saga only
 * moves forward. `Failed` is reachable before `Bridged` only, `StrandedFunds`
 * only after it.
 */
export type SagaState =
  | 'Pending'
  | 'Validated'
  | 'Funded'
  | 'Bought'
  | 'Bridged'
  | 'BridgeConfirmed'
  | 'Sold'
  | 'Failed'
  | 'StrandedFunds';

/** Forward order of the progress states. */
export const SAGA_PROGRESS: readonly SagaState[] = [
  'Pending',
  'Validated',
  'Funded',
  'Bought',
  'Bridged',
  'BridgeConfirmed',
  'Sold',
];

export interface SwapArtifact {
  chain: string;
  venue: string;
  txHash: string;
  amountIn: bigint;
  amountOut: bigint;
  /** Value of the swap input in USD */
  valueInUsd: number;
  /** Value of the swap output in USD, where it was priced */
  valueOutUsd?: number;
  gasCostUsd: number;
}

export interface BridgeArtifact {
  bridge: string;
  transferId: string;
  sourceTxHash: string;
  amountSent: bigint;
  amountReceived?: bigint;
  destTxHash?: string;
  /** Protocol fee plus the source-chain transaction's gas, in USD */
  feeUsd: number;
  /** Gas of the source-chain bridge transaction alone */
  gasCostUsd: number;
  initiatedAt: Timestamp;
  confirmedAt?: Timestamp;
}

export interface SagaArtifacts {
  tradeSizeUsd?: number;
  buy?: SwapArtifact;
  bridge?: BridgeArtifact;
  sell?: SwapArtifact;
}

/**
 * Result of a cross-chain saga run.
 */
export interface CrossChainExecutionResult extends ExecutionResult {
  sagaState: SagaState;
  /** Last progress state reached before a terminal failure */
  lastProgressState: SagaState;
  artifacts: SagaArtifacts;
  /** Loss booked for a stranded trade (fees already spent) */
  lossUsd?: number;
}

/**
 * Capital left outside its source chain, awaiting reconciliation.
 */
export interface StrandedFundsReport {
  opportunityId: string;
  token: string;
  sourceChain: string;
  destChain: string;
  /** State reached before the saga stopped */
  lastProgressState: SagaState;
  reason: string;
  bridge?: BridgeArtifact;
  /** Token amount believed to be held or in flight, in base units */
  amount: bigint;
  lossUsd: number;
  recordedAt: Timestamp;
}
