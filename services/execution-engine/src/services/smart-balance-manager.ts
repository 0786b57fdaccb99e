/**
 * Smart Balance Manager
 *
 * Just-in-time funding for the buy leg of a trade. The wallet keeps most of
 * its value in whatever assets it holds on each chain; when the native
 * balance cannot cover a trade plus the chain's gas reserve, other assets
 * are converted to native right before the trade.
 *
 * Snapshots are cached per chain for `cacheTtlMs` and refreshed after every
 * conversion. A conversion never spends an asset below its configured
 * minimum reserve.
 */

import { formatUnits } from 'ethers';
import {
  BALANCE_CONFIG,
  CROSS_CHAIN_CONFIG,
  getChainProfile,
  getMinReserveUsd,
  getNativeAsset,
  getTokenDecimals,
} from '@xarb/config';
import type { BalanceConfig } from '@xarb/config';
import { getErrorMessage } from '@xarb/core';
import type { ILogger } from '@xarb/core';
import { ExecutionErrorCode, formatExecutionError } from '@xarb/types';
import type {
  AssetBalance,
  ConversionLeg,
  ConversionPlan,
  DexRouter,
  FundingDetails,
  FundingResult,
  PriceFeed,
  WalletSnapshot,
} from '@xarb/types';
import { createServiceLogger } from '../types';
import type { TransactionSubmitter } from './transaction-submitter';

export interface EnsureFundsOptions {
  forceRefresh?: boolean;
  signal?: AbortSignal;
  /** For log correlation */
  opportunityId?: string;
}

export interface SmartBalanceManagerOptions {
  submitter: TransactionSubmitter;
  dexRouter: DexRouter;
  priceFeed: PriceFeed;
  config?: Partial<BalanceConfig>;
  /** Swap deadline for conversions (default: CROSS_CHAIN_SWAP_DEADLINE) */
  swapDeadlineSec?: number;
  logger?: ILogger;
}

const SLIPPAGE_BPS_SCALE = 10_000;
const RATIO_SCALE = 1_000_000;

/**
 * Build a plan covering `targetUsd` from the snapshot's non-native assets.
 *
 * Assets are considered tier by tier in conversion priority, each only down
 * to its minimum reserve. The smallest asset covering the whole target alone,
 * within the first tier that has one, is used; otherwise assets are combined
 * in priority order; otherwise the plan is not viable and reports the
 * shortfall.
 */
export function planConversion(
  snapshot: WalletSnapshot,
  targetUsd: number,
  config: BalanceConfig = BALANCE_CONFIG
): ConversionPlan {
  const tiers: ConversionLeg[][] = config.conversionPriority.map((tier) =>
    tier.flatMap((asset) => {
      const balance = snapshot.assets[asset];
      const available = balance ? Math.max(0, balance.usdValue - getMinReserveUsd(asset, config)) : 0;
      return available > 0 ? [{ asset, amountUsd: available }] : [];
    })
  );
  const candidates = tiers.flat();
  const totalAvailableUsd = candidates.reduce((sum, c) => sum + c.amountUsd, 0);

  let single: ConversionLeg | undefined;
  for (const tier of tiers) {
    for (const candidate of tier) {
      if (candidate.amountUsd >= targetUsd && (!single || candidate.amountUsd < single.amountUsd)) {
        single = candidate;
      }
    }
    if (single) break;
  }
  if (single) {
    return {
      sourceAsset: single.asset,
      targetUsd,
      viable: true,
      totalAvailableUsd,
      shortfallUsd: 0,
      legs: [{ asset: single.asset, amountUsd: targetUsd }],
    };
  }

  if (totalAvailableUsd >= targetUsd) {
    const legs: ConversionLeg[] = [];
    let remaining = targetUsd;
    for (const candidate of candidates) {
      if (remaining <= 0) break;
      const amountUsd = Math.min(candidate.amountUsd, remaining);
      legs.push({ asset: candidate.asset, amountUsd });
      remaining -= amountUsd;
    }
    return {
      sourceAsset: legs[0]?.asset ?? null,
      targetUsd,
      viable: true,
      totalAvailableUsd,
      shortfallUsd: 0,
      legs,
    };
  }

  return {
    sourceAsset: candidates[0]?.asset ?? null,
    targetUsd,
    viable: false,
    totalAvailableUsd,
    shortfallUsd: targetUsd - totalAvailableUsd,
    legs: [],
  };
}

export class SmartBalanceManager {
  private readonly submitter: TransactionSubmitter;
  private readonly dexRouter: DexRouter;
  private readonly priceFeed: PriceFeed;
  private readonly config: BalanceConfig;
  private readonly swapDeadlineSec: number;
  private readonly logger: ILogger;
  private readonly snapshots = new Map<string, WalletSnapshot>();

  constructor(options: SmartBalanceManagerOptions) {
    this.submitter = options.submitter;
    this.dexRouter = options.dexRouter;
    this.priceFeed = options.priceFeed;
    this.config = { ...BALANCE_CONFIG, ...options.config };
    this.swapDeadlineSec = options.swapDeadlineSec ?? CROSS_CHAIN_CONFIG.swapDeadlineSec;
    this.logger = options.logger ?? createServiceLogger('smart-balance-manager');
  }

  /**
   * Make sure the native balance covers `requiredUsd` plus the chain's gas
   * reserve, converting other assets when it does not. Never throws.
   */
  async ensureFunds(requiredUsd: number, chain: string, options: EnsureFundsOptions = {}): Promise<FundingResult> {
    const details: FundingDetails = {
      chain,
      requiredUsd,
      gasReserveUsd: 0,
      nativeUsdBefore: 0,
      conversionTxHashes: [],
    };

    let snapshot: WalletSnapshot;
    try {
      snapshot = await this.getSnapshot(chain, options.forceRefresh ?? false);
    } catch (error) {
      details.error = formatExecutionError(
        ExecutionErrorCode.INSUFFICIENT_BALANCE,
        `balance read failed on ${chain}: ${getErrorMessage(error)}`
      );
      this.logger.error('Balance snapshot failed', { chain, error: getErrorMessage(error) });
      return { sufficient: false, conversionExecuted: false, details };
    }

    details.gasReserveUsd = this.gasReserveUsd(snapshot);
    details.nativeUsdBefore = snapshot.nativeUsd;
    const neededUsd = requiredUsd + details.gasReserveUsd;

    if (snapshot.nativeUsd >= neededUsd) {
      return { sufficient: true, conversionExecuted: false, details };
    }

    // Convert enough that the slippage floor still covers the shortfall
    const shortfallUsd = neededUsd - snapshot.nativeUsd;
    const plan = planConversion(snapshot, shortfallUsd / (1 - this.config.conversionSlippage), this.config);
    details.plan = plan;

    this.logger.info('Native balance short, planning conversion', {
      opportunityId: options.opportunityId,
      chain,
      requiredUsd,
      gasReserveUsd: details.gasReserveUsd,
      nativeUsd: snapshot.nativeUsd,
      shortfallUsd,
      viable: plan.viable,
      legs: plan.legs,
    });

    if (!plan.viable) {
      details.error = formatExecutionError(
        ExecutionErrorCode.INSUFFICIENT_BALANCE,
        `short $${plan.shortfallUsd.toFixed(2)} on ${chain} (available $${plan.totalAvailableUsd.toFixed(2)})`
      );
      return { sufficient: false, conversionExecuted: false, details };
    }

    for (const leg of plan.legs) {
      try {
        const hash = await this.executeLeg(snapshot, leg, options.signal);
        details.conversionTxHashes.push(hash);
      } catch (error) {
        this.invalidate(chain);
        details.error = formatExecutionError(
          ExecutionErrorCode.CONVERSION_FAILED,
          `${leg.asset} -> ${snapshot.nativeAsset} on ${chain}: ${getErrorMessage(error)}`
        );
        this.logger.error('Balance conversion failed', {
          opportunityId: options.opportunityId,
          chain,
          asset: leg.asset,
          amountUsd: leg.amountUsd,
          error: getErrorMessage(error),
        });
        return { sufficient: false, conversionExecuted: details.conversionTxHashes.length > 0, details };
      }
    }

    this.invalidate(chain);

    try {
      const refreshed = await this.getSnapshot(chain, true);
      details.nativeUsdAfter = refreshed.nativeUsd;
    } catch (error) {
      details.error = formatExecutionError(
        ExecutionErrorCode.INSUFFICIENT_BALANCE,
        `balance re-check failed on ${chain}: ${getErrorMessage(error)}`
      );
      return { sufficient: false, conversionExecuted: true, details };
    }

    const sufficient = details.nativeUsdAfter >= neededUsd;
    if (!sufficient) {
      details.error = formatExecutionError(
        ExecutionErrorCode.INSUFFICIENT_BALANCE,
        `native $${details.nativeUsdAfter.toFixed(2)} after conversion, need $${neededUsd.toFixed(2)}`
      );
    }

    this.logger.info('Conversion complete', {
      opportunityId: options.opportunityId,
      chain,
      sufficient,
      nativeUsdAfter: details.nativeUsdAfter,
      txHashes: details.conversionTxHashes,
    });

    return { sufficient, conversionExecuted: true, details };
  }

  /**
   * Cached snapshot, refreshed when older than the TTL or when forced.
   */
  async getSnapshot(chain: string, forceRefresh = false): Promise<WalletSnapshot> {
    const cached = this.snapshots.get(chain);
    if (!forceRefresh && cached && Date.now() - cached.fetchedAt < this.config.cacheTtlMs) {
      return cached;
    }

    const snapshot = await this.fetchSnapshot(chain);
    this.snapshots.set(chain, snapshot);
    return snapshot;
  }

  /** Drop one chain's cached snapshot, or all of them */
  invalidate(chain?: string): void {
    if (chain === undefined) {
      this.snapshots.clear();
    } else {
      this.snapshots.delete(chain);
    }
  }

  async getTotalValueUsd(chain: string): Promise<number> {
    return (await this.getSnapshot(chain)).totalUsd;
  }

  gasReserveUsd(snapshot: WalletSnapshot): number {
    return (getChainProfile(snapshot.chain)?.gasReserveNative ?? 0) * snapshot.nativePriceUsd;
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private async fetchSnapshot(chain: string): Promise<WalletSnapshot> {
    const client = this.submitter.getClient(chain);
    const address = this.submitter.getAddress(chain);
    const nativeAsset = getNativeAsset(chain);

    const nativeAmount = await client.getNativeBalance(address);
    const nativePriceUsd = await this.submitter.nativePriceUsd(chain);
    const nativeUsd = Number(formatUnits(nativeAmount, getTokenDecimals(nativeAsset))) * nativePriceUsd;

    const assets: Record<string, AssetBalance> = {};
    let assetsUsd = 0;
    for (const asset of getChainProfile(chain)?.assets ?? []) {
      const amount = await client.getTokenBalance(address, asset);
      if (amount === 0n) continue;

      const decimals = getTokenDecimals(asset);
      let usdValue = 0;
      try {
        usdValue = Number(formatUnits(amount, decimals)) * (await this.priceFeed.getUsdPrice(chain, asset));
      } catch (error) {
        this.logger.warn('Asset price unavailable, valuing at zero', {
          chain,
          asset,
          error: getErrorMessage(error),
        });
      }

      assets[asset] = { asset, amount, decimals, usdValue };
      assetsUsd += usdValue;
    }

    return {
      chain,
      address,
      nativeAsset,
      nativeUsd,
      nativePriceUsd,
      assets,
      totalUsd: nativeUsd + assetsUsd,
      fetchedAt: Date.now(),
    };
  }

  /**
   * Swap `leg.amountUsd` worth of the asset to native.
   *
   * @returns the conversion transaction hash
   */
  private async executeLeg(snapshot: WalletSnapshot, leg: ConversionLeg, signal?: AbortSignal): Promise<string> {
    const balance = snapshot.assets[leg.asset];
    if (!balance || balance.usdValue <= 0) {
      throw new Error(`No ${leg.asset} balance to convert`);
    }

    const ratio = Math.min(1, leg.amountUsd / balance.usdValue);
    const amountIn = (balance.amount * BigInt(Math.ceil(ratio * RATIO_SCALE))) / BigInt(RATIO_SCALE);
    const venue = getChainProfile(snapshot.chain)?.conversionVenue ?? 'uniswap_v3';

    const quote = await this.dexRouter.quote({
      chain: snapshot.chain,
      venue,
      tokenIn: leg.asset,
      tokenOut: snapshot.nativeAsset,
      amountIn,
    });
    const minAmountOut = applySlippage(quote.amountOut, this.config.conversionSlippage);

    const tx = await this.dexRouter.swap({
      chain: snapshot.chain,
      venue,
      tokenIn: leg.asset,
      tokenOut: snapshot.nativeAsset,
      amountIn,
      minAmountOut,
      recipient: snapshot.address,
      deadline: Math.floor(Date.now() / 1000) + this.swapDeadlineSec,
    });

    const receipt = await this.submitter.submit(tx, `convert ${leg.asset}->${snapshot.nativeAsset}`, signal);
    return receipt.hash;
  }
}

/**
 * amount * (1 - slippage), rounded down to whole base units.
 */
export function applySlippage(amount: bigint, slippage: number): bigint {
  const keepBps = BigInt(Math.round((1 - slippage) * SLIPPAGE_BPS_SCALE));
  return (amount * keepBps) / BigInt(SLIPPAGE_BPS_SCALE);
}
