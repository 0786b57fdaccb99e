/**
 * Execution-related types
 *
 * Shared by the coordinator, the saga and the engine facade.
 */

import type { Timestamp } from './common';
import type { Opportunity } from './opportunity';

// =============================================================================
// Failure Taxonomy
// =============================================================================

/**
 * Classes of failure. Every failure surfaces as a structured result tagged
 * with one of these; none propagate as exceptions past the saga boundary.
 */
export type FailureKind =
  /** Lock held by another execution (policy, not an error) */
  | 'Blocked'
  /** Stale, duplicate, slow or unprofitable opportunity */
  | 'Filtered'
  /** Insufficient convertible balance or conversion failure; nothing left the source chain */
  | 'FundingFailure'
  | 'BuyFailure'
  | 'SellFailure'
  /** Bridge could not be started; funds remain on the source chain */
  | 'BridgeInitiationFailure'
  /** Funds in flight with unknown outcome */
  | 'BridgeTimeout'
  /** Capital confined to the destination chain, needs out-of-band recovery */
  | 'StrandedFunds'
  /** Circuit-breaker veto */
  | 'RiskHalt'
  /** Unexpected fault converted into a result */
  | 'ExecutionError';

/**
 * Standardized error codes for execution.
 */
export enum ExecutionErrorCode {
  // Gate errors
  LOCK_HELD = '[ERR_LOCK_HELD] Execution blocked - trade already in progress',
  RISK_HALT = '[ERR_RISK_HALT] Trading halted by risk controls',
  STALE = '[ERR_STALE] Opportunity too old',
  DUPLICATE = '[ERR_DUPLICATE] Opportunity already seen',
  UNPROFITABLE = '[ERR_UNPROFITABLE] Profit below threshold after costs',
  INVALID_OPPORTUNITY = '[ERR_INVALID_OPPORTUNITY] Invalid opportunity format',
  SAME_CHAIN = '[ERR_SAME_CHAIN] Cross-chain arbitrage requires different chains',
  ROUTE_IN_FLIGHT = '[ERR_ROUTE_IN_FLIGHT] Route already has an execution in flight',
  NO_CLIENT = '[ERR_NO_CLIENT] No chain client for chain',

  // Funding errors
  INSUFFICIENT_BALANCE = '[ERR_INSUFFICIENT_BALANCE] Insufficient convertible balance',
  CONVERSION_FAILED = '[ERR_CONVERSION_FAILED] Balance conversion failed',

  // Swap errors
  BUY_FAILED = '[ERR_BUY_FAILED] Buy transaction failed',
  SELL_FAILED = '[ERR_SELL_FAILED] Sell transaction failed',

  // Bridge errors
  NO_ROUTE = '[ERR_NO_ROUTE] No bridge route available',
  BRIDGE_QUOTE = '[ERR_BRIDGE_QUOTE] Bridge quote failed',
  BRIDGE_EXEC = '[ERR_BRIDGE_EXEC] Bridge execution failed',
  BRIDGE_FAILED = '[ERR_BRIDGE_FAILED] Bridge failed',
  BRIDGE_TIMEOUT = '[ERR_BRIDGE_TIMEOUT] Bridge timeout',

  // Lifecycle errors
  EXECUTION_TIMEOUT = '[ERR_EXECUTION_TIMEOUT] Execution timed out',
  EXECUTION_ERROR = '[ERR_EXECUTION] Execution error',
  SHUTDOWN = '[ERR_SHUTDOWN] Execution interrupted by shutdown',
}

/**
 * Format error code with optional details.
 *
 * @example
 * formatExecutionError(ExecutionErrorCode.NO_ROUTE, 'arbitrum->base USDC');
 * // "[ERR_NO_ROUTE] No bridge route available: arbitrum->base USDC"
 */
export function formatExecutionError(
  code: ExecutionErrorCode,
  details?: string
): string {
  if (!details) {
    return code;
  }
  return `${code}: ${details}`;
}

/**
 * Extract the error code identifier from a formatted error message.
 * @returns The error code identifier (e.g., "ERR_NO_ROUTE") or null if not found
 */
export function extractErrorCode(errorMessage: string): string | null {
  const match = errorMessage.match(/\[ERR_([A-Z_]+)\]/);
  return match ? `ERR_${match[1]}` : null;
}

// =============================================================================
// Execution Result
// =============================================================================

/**
 * Result of an execution attempt.
 */
export interface ExecutionResult {
  opportunityId: string;
  success: boolean;
  transactionHash?: string;
  /** Realized profit in USD (negative for a realized loss) */
  actualProfit?: number;
  /** Gas spent in USD */
  gasCost?: number;
  error?: string;
  failureKind?: FailureKind;
  timestamp: Timestamp;
  chain: string;
  dex: string;
  /** Execution latency in milliseconds */
  latencyMs?: number;
}

/**
 * Create a failed ExecutionResult.
 */
export function createErrorResult(
  opportunityId: string,
  error: string,
  chain: string,
  dex: string,
  failureKind: FailureKind = 'ExecutionError',
  transactionHash?: string
): ExecutionResult {
  return {
    opportunityId,
    success: false,
    error,
    failureKind,
    timestamp: Date.now(),
    chain,
    dex,
    transactionHash,
  };
}

/**
 * Create a successful ExecutionResult.
 */
export function createSuccessResult(
  opportunityId: string,
  transactionHash: string,
  chain: string,
  dex: string,
  options?: {
    actualProfit?: number;
    gasCost?: number;
    latencyMs?: number;
  }
): ExecutionResult {
  return {
    opportunityId,
    success: true,
    transactionHash,
    actualProfit: options?.actualProfit,
    gasCost: options?.gasCost,
    latencyMs: options?.latencyMs,
    timestamp: Date.now(),
    chain,
    dex,
  };
}

/**
 * Create a skipped ExecutionResult (not executed due to filters or risk controls).
 */
export function createSkippedResult(
  opportunityId: string,
  reason: string,
  chain: string,
  dex: string,
  failureKind: FailureKind
): ExecutionResult {
  return {
    opportunityId,
    success: false,
    error: reason,
    failureKind,
    timestamp: Date.now(),
    chain,
    dex,
  };
}

// =============================================================================
// Execution Records
// =============================================================================

export type ExecutionRecordStatus =
  | 'queued'
  | 'executing'
  | 'succeeded'
  | 'failed'
  | 'timed-out'
  | 'abandoned';

/**
 * Lifecycle record of one coordinated execution.
 */
export interface ExecutionRecord {
  id: string;
  initiator: string;
  opportunity: Opportunity;
  status: ExecutionRecordStatus;
  queuedAt: Timestamp;
  startedAt?: Timestamp;
  finishedAt?: Timestamp;
  result?: ExecutionResult;
}

/**
 * Aggregate coordinator statistics.
 */
export interface ExecutionStatistics {
  totalExecutions: number;
  successfulExecutions: number;
  failedExecutions: number;
  /** Timed out or abandoned at shutdown */
  abandonedExecutions: number;
  lockViolations: number;
}

export function createInitialStatistics(): ExecutionStatistics {
  return {
    totalExecutions: 0,
    successfulExecutions: 0,
    failedExecutions: 0,
    abandonedExecutions: 0,
    lockViolations: 0,
  };
}

/**
 * Coordinator status snapshot.
 */
export interface ExecutionStatus {
  lockHeld: boolean;
  activeExecutions: number;
  details: ExecutionRecord[];
  statistics: ExecutionStatistics;
  recentHistory: ExecutionRecord[];
}
