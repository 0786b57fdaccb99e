/**
 * Opportunity types
 *
 * An opportunity is a detected price discrepancy for one token between two
 * (venue, chain) pairs. Scanners produce loose `OpportunityInput` records;
 * the engine normalizes them once into frozen `Opportunity` records so that
 * no read site needs fallbacks.
 */

import type { Timestamp } from './common';

/**
 * Raw opportunity as produced by an external scanner.
 * Optional fields are resolved to defaults at construction.
 */
export interface OpportunityInput {
  id: string;
  token: string;
  buyChain: string;
  sellChain: string;
  buyVenue: string;
  sellVenue: string;
  buyPrice: number;
  sellPrice: number;
  discoveredAt: Timestamp;
  grossProfitUsd: number;
  /** Price volatility estimate as a fraction (0.05 = 5%) */
  volatility?: number;
  /** How long after discovery the opportunity may still be executed */
  executionWindowMs?: number;
  /** Bridge fee estimated by the scanner, if any */
  bridgeFeeUsd?: number;
}

/**
 * Normalized, immutable opportunity.
 */
export interface Opportunity {
  readonly id: string;
  readonly token: string;
  readonly buyChain: string;
  readonly sellChain: string;
  readonly buyVenue: string;
  readonly sellVenue: string;
  readonly buyPrice: number;
  readonly sellPrice: number;
  readonly discoveredAt: Timestamp;
  readonly grossProfitUsd: number;
  readonly volatility: number;
  readonly executionWindowMs: number;
  readonly bridgeFeeUsd: number;
}

/**
 * Filter stage that rejected an opportunity.
 */
export type FilterStage =
  | 'freshness'
  | 'duplicate'
  | 'profit_decay'
  | 'execution_speed'
  | 'decision';

/**
 * Normalized component scores, each in [0, 1].
 */
export interface FilterScores {
  profit: number;
  speed: number;
  volatility: number;
  freshness: number;
}

/**
 * Outcome of running an opportunity through the filter.
 */
export interface FilterVerdict {
  opportunityId: string;
  shouldExecute: boolean;
  reason: string;
  /** Weighted priority in [0, 1] */
  priorityScore: number;
  estimatedExecutionTimeSec: number;
  profitDecayFactor: number;
  adjustedProfitUsd: number;
  /** Stage that rejected the opportunity (absent when accepted) */
  rejectedAt?: FilterStage;
  scores: FilterScores;
}

/**
 * Learned execution profile of one venue.
 */
export interface VenueProfile {
  /** Average execution time in seconds */
  avgExecutionTimeSec: number;
  /** Success likelihood in [0.1, 0.99] */
  reliability: number;
}
