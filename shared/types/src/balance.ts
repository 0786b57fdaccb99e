/**
 * Wallet balance and funding types
 */

import type { Timestamp } from './common';

/**
 * Balance of one asset held by the trading wallet.
 */
export interface AssetBalance {
  asset: string;
  /** Balance in base units */
  amount: bigint;
  decimals: number;
  usdValue: number;
}

/**
 * Per-asset balances of a wallet on one chain.
 */
export interface WalletSnapshot {
  chain: string;
  address: string;
  nativeAsset: string;
  /** Native balance valued in USD */
  nativeUsd: number;
  nativePriceUsd: number;
  /** Non-native assets keyed by symbol */
  assets: Record<string, AssetBalance>;
  totalUsd: number;
  fetchedAt: Timestamp;
}

/**
 * One conversion step of a plan.
 */
export interface ConversionLeg {
  asset: string;
  amountUsd: number;
}

/**
 * Plan for converting held assets into the trade currency.
 */
export interface ConversionPlan {
  /** First asset to convert (null when nothing is convertible) */
  sourceAsset: string | null;
  targetUsd: number;
  viable: boolean;
  /** Sum of spendable value above each asset's minimum reserve */
  totalAvailableUsd: number;
  /** Amount still missing when the plan is not viable */
  shortfallUsd: number;
  legs: ConversionLeg[];
}

export interface FundingDetails {
  chain: string;
  requiredUsd: number;
  gasReserveUsd: number;
  nativeUsdBefore: number;
  nativeUsdAfter?: number;
  plan?: ConversionPlan;
  conversionTxHashes: string[];
  error?: string;
}

/**
 * Result of a just-in-time funding request.
 */
export interface FundingResult {
  sufficient: boolean;
  conversionExecuted: boolean;
  details: FundingDetails;
}
