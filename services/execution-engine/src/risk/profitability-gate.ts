/**
 * Profitability Gate
 *
 * Final profit check before a trade takes the execution slot: classify the
 * chain's current gas price into a tier, estimate the trade's gas cost, and
 * require the net profit to clear both the absolute floor and the tier's
 * minimum.
 *
 * Tier tables differ by chain class. Cheap chains are charged a flat USD
 * cost per operation; expensive chains are charged gas units at the
 * current gwei and native price.
 */

import { GAS_TIER_CONFIG, getChainProfile } from '@xarb/config';
import type { GasTierConfig } from '@xarb/config';
import type { ILogger } from '@xarb/core';
import { GAS_TIERS } from '@xarb/types';
import type { ChainClass, GasTier, OperationClass, Opportunity } from '@xarb/types';
import { createServiceLogger } from '../types';

export interface ProfitabilityDecision {
  profitable: boolean;
  netProfitUsd: number;
  gasCostUsd: number;
  bridgeFeeUsd: number;
  tier: GasTier;
  minProfitForTier: number;
  reason: string;
}

/**
 * First tier whose ceiling is at or above `gasGwei`, else `extreme`.
 */
export function categorizeGas(
  gasGwei: number,
  chainClass: ChainClass,
  config: Readonly<GasTierConfig> = GAS_TIER_CONFIG
): GasTier {
  const table = config.tiers[chainClass];
  for (const tier of GAS_TIERS) {
    if (gasGwei <= table[tier].maxGwei) {
      return tier;
    }
  }
  return 'extreme';
}

/**
 * Chain class from the chain profiles; unknown chains are treated as
 * expensive.
 */
export function classifyChain(chain: string): ChainClass {
  return getChainProfile(chain)?.chainClass ?? 'mainnet';
}

export function inferOperation(opportunity: Opportunity): OperationClass {
  return opportunity.buyChain === opportunity.sellChain ? 'same_chain' : 'cross_chain';
}

export class ProfitabilityGate {
  private readonly config: Readonly<GasTierConfig>;
  private readonly logger: ILogger;

  constructor(config: Readonly<GasTierConfig> = GAS_TIER_CONFIG, logger?: ILogger) {
    this.config = config;
    this.logger = logger ?? createServiceLogger('profitability-gate');
  }

  /**
   * @param nativePriceUsd - price of the chain's native asset; the configured
   *   fallback is used when absent or not positive
   */
  isProfitable(
    opportunity: Opportunity,
    gasGwei: number,
    chainClass: ChainClass,
    operation: OperationClass = inferOperation(opportunity),
    nativePriceUsd?: number
  ): ProfitabilityDecision {
    const tier = categorizeGas(gasGwei, chainClass, this.config);
    const minProfitForTier = this.config.tiers[chainClass][tier].minProfitUsd;
    const gasCostUsd = this.estimateGasCostUsd(gasGwei, chainClass, operation, nativePriceUsd);
    const bridgeFeeUsd = opportunity.bridgeFeeUsd;
    const netProfitUsd = opportunity.grossProfitUsd - gasCostUsd - bridgeFeeUsd;
    const floor = this.config.minNetProfitUsd;

    let profitable = true;
    let reason: string;
    if (netProfitUsd < floor) {
      profitable = false;
      reason = `Net profit $${netProfitUsd.toFixed(2)} below floor $${floor.toFixed(2)}`;
    } else if (netProfitUsd < minProfitForTier) {
      profitable = false;
      reason = Number.isFinite(minProfitForTier)
        ? `Net profit $${netProfitUsd.toFixed(2)} below ${tier} tier minimum $${minProfitForTier.toFixed(2)}`
        : `Gas tier ${tier} does not trade`;
    } else {
      reason = `Net profit $${netProfitUsd.toFixed(2)} clears ${tier} tier minimum $${minProfitForTier.toFixed(2)}`;
    }

    const decision: ProfitabilityDecision = {
      profitable,
      netProfitUsd,
      gasCostUsd,
      bridgeFeeUsd,
      tier,
      minProfitForTier,
      reason,
    };

    this.logger.debug('Profitability decision', {
      opportunityId: opportunity.id,
      chainClass,
      operation,
      gasGwei,
      ...decision,
    });

    return decision;
  }

  estimateGasCostUsd(
    gasGwei: number,
    chainClass: ChainClass,
    operation: OperationClass,
    nativePriceUsd?: number
  ): number {
    if (chainClass === 'l2') {
      return this.config.l2FlatCostUsd[operation];
    }
    const price = nativePriceUsd !== undefined && nativePriceUsd > 0
      ? nativePriceUsd
      : this.config.nativePriceFallbackUsd;
    return this.config.gasUnits[operation] * gasGwei * 1e-9 * price;
  }
}
