/**
 * Risk and gas types
 */

/**
 * Fee bucket of a chain's current gas price.
 */
export type GasTier = 'ultra_low' | 'low' | 'medium' | 'high' | 'extreme';

/** Tiers in ascending order of gas price. */
export const GAS_TIERS: readonly GasTier[] = ['ultra_low', 'low', 'medium', 'high', 'extreme'];

/**
 * Cheap chains (rollups, sidechains) vs expensive chains (L1).
 * Their tier tables differ by roughly two orders of magnitude.
 */
export type ChainClass = 'l2' | 'mainnet';

/**
 * Operation class used to estimate gas.
 */
export type OperationClass = 'same_chain' | 'cross_chain' | 'flash_loan' | 'complex';

/**
 * Counters the risk governor mutates on every outcome.
 */
export interface RiskCounters {
  consecutiveFailures: number;
  dailyLossUsd: number;
  /** UTC date (YYYY-MM-DD) of the current daily window */
  lastResetDate: string;
}

/**
 * Outcome reported to the risk governor after an execution.
 */
export interface RiskOutcome {
  success: boolean;
  /** Realized profit (positive) or loss (negative) in USD */
  pnlUsd: number;
}
