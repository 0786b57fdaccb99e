/**
 * Balance and Funding Configuration
 *
 * Conversion priority, per-asset minimum reserves and the wallet snapshot
 * cache TTL used by the just-in-time funding manager.
 */

import reserveData from './data/reserves.json';
import { ReserveFileSchema, validateOrThrow } from './schemas';
import { safeParseFloatBounded, safeParseIntBounded } from './utils/env-parsing';

export interface BalanceConfig {
  /**
   * Priority tiers, lowest-liquidity first and native-adjacent last. Assets
   * in one tier rank equally.
   */
  conversionPriority: readonly (readonly string[])[];
  defaultMinReserveUsd: number;
  assetMinReserveUsd: Readonly<Record<string, number>>;
  cacheTtlMs: number;
  /** Slippage tolerance applied to conversion quotes */
  conversionSlippage: number;
}

export function buildBalanceConfig(env: NodeJS.ProcessEnv = process.env): BalanceConfig {
  const file = validateOrThrow(ReserveFileSchema, reserveData, 'reserves.json');

  return {
    conversionPriority: file.conversionPriority,
    defaultMinReserveUsd: file.defaultMinReserveUsd,
    assetMinReserveUsd: file.assetMinReserveUsd,
    cacheTtlMs: safeParseIntBounded(env.BALANCE_CACHE_TTL_MS, 30_000, 0, 'BALANCE_CACHE_TTL_MS'),
    conversionSlippage: safeParseFloatBounded(
      env.CROSS_CHAIN_SLIPPAGE, 0.03, 0, 0.5, 'CROSS_CHAIN_SLIPPAGE'
    ),
  };
}

export const BALANCE_CONFIG: Readonly<BalanceConfig> = Object.freeze(buildBalanceConfig());

/**
 * Minimum USD value that must stay in `asset` after a conversion.
 */
export function getMinReserveUsd(asset: string, config: BalanceConfig = BALANCE_CONFIG): number {
  return config.assetMinReserveUsd[asset.toUpperCase()] ?? config.defaultMinReserveUsd;
}
