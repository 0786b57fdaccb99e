/**
 * Gas Tier Configuration
 *
 * Gwei ceilings and minimum profit after gas for each chain class, plus the
 * per-operation gas estimates used by the profitability gate.
 *
 * Thresholds in `gas-tiers.json` are USD; a `null` minimum means the tier
 * never trades and resolves to `Infinity` here.
 */

import type { ChainClass, GasTier, OperationClass } from '@xarb/types';
import gasTierData from './data/gas-tiers.json';
import { GasTierFileSchema, validateOrThrow } from './schemas';
import { safeParseFloatBounded } from './utils/env-parsing';

export interface ResolvedGasTier {
  maxGwei: number;
  minProfitUsd: number;
}

export interface GasTierConfig {
  tiers: Readonly<Record<ChainClass, Readonly<Record<GasTier, ResolvedGasTier>>>>;
  /** Gas units per operation, used on mainnet-class chains */
  gasUnits: Readonly<Record<OperationClass, number>>;
  /** Flat USD cost per operation, used on l2-class chains */
  l2FlatCostUsd: Readonly<Record<OperationClass, number>>;
  /** Absolute per-trade floor on net profit */
  minNetProfitUsd: number;
  /** Native price used when the price feed has nothing */
  nativePriceFallbackUsd: number;
}

type TierTable = Record<GasTier, { maxGwei: number; minProfitUsd: number | null }>;

function resolveTiers(table: TierTable): Record<GasTier, ResolvedGasTier> {
  const resolve = (tier: GasTier): ResolvedGasTier => ({
    maxGwei: table[tier].maxGwei,
    minProfitUsd: table[tier].minProfitUsd ?? Infinity,
  });
  return {
    ultra_low: resolve('ultra_low'),
    low: resolve('low'),
    medium: resolve('medium'),
    high: resolve('high'),
    extreme: resolve('extreme'),
  };
}

/**
 * Build the gas tier config from the data table and environment overrides.
 */
export function buildGasTierConfig(env: NodeJS.ProcessEnv = process.env): GasTierConfig {
  const file = validateOrThrow(GasTierFileSchema, gasTierData, 'gas-tiers.json');

  return {
    tiers: {
      mainnet: resolveTiers(file.tiers.mainnet),
      l2: resolveTiers(file.tiers.l2),
    },
    gasUnits: file.gasUnits,
    l2FlatCostUsd: file.l2FlatCostUsd,
    minNetProfitUsd: safeParseFloatBounded(
      env.GATE_MIN_NET_PROFIT_USD, 1.0, 0, 10_000, 'GATE_MIN_NET_PROFIT_USD'
    ),
    nativePriceFallbackUsd: safeParseFloatBounded(
      env.NATIVE_PRICE_FALLBACK_USD, 2500, 0.0001, 1_000_000, 'NATIVE_PRICE_FALLBACK_USD'
    ),
  };
}

export const GAS_TIER_CONFIG: Readonly<GasTierConfig> = Object.freeze(buildGasTierConfig());
