/**
 * SmartBalanceManager tests
 *
 * Conversion planning, just-in-time funding and snapshot caching.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { parseEther, parseUnits } from 'ethers';
import { BALANCE_CONFIG } from '@xarb/config';
import { NonceManager, RecordingLogger } from '@xarb/core';
import type { AssetBalance, WalletSnapshot } from '@xarb/types';
import { FakePriceFeed, createCollaboratorHarness, resetFakeHashCounter } from '@xarb/test-utils';
import type { CollaboratorHarness } from '@xarb/test-utils';
import { SmartBalanceManager, applySlippage, planConversion } from '../../src/services/smart-balance-manager';
import { TransactionSubmitter } from '../../src/services/transaction-submitter';

function snapshotWith(assetsUsd: Record<string, number>): WalletSnapshot {
  const assets: Record<string, AssetBalance> = {};
  for (const [asset, usdValue] of Object.entries(assetsUsd)) {
    assets[asset] = { asset, amount: parseUnits(String(usdValue), 6), decimals: 6, usdValue };
  }
  return {
    chain: 'arbitrum',
    address: '0x1111111111111111111111111111111111111111',
    nativeAsset: 'ETH',
    nativeUsd: 0,
    nativePriceUsd: 2000,
    assets,
    totalUsd: Object.values(assetsUsd).reduce((sum, v) => sum + v, 0),
    fetchedAt: Date.now(),
  };
}

describe('applySlippage', () => {
  it('should keep (1 - slippage) of the amount, rounded down', () => {
    expect(applySlippage(40_000_000n, 0.03)).toBe(38_800_000n);
    expect(applySlippage(999n, 0.03)).toBe(969n);
    expect(applySlippage(1_000n, 0)).toBe(1_000n);
  });
});

describe('planConversion', () => {
  it('should use the smallest asset that covers the target alone', () => {
    const plan = planConversion(snapshotWith({ USDC: 100, DAI: 50 }), 30, BALANCE_CONFIG);

    expect(plan.viable).toBe(true);
    expect(plan.sourceAsset).toBe('DAI');
    expect(plan.legs).toEqual([{ asset: 'DAI', amountUsd: 30 }]);
    // DAI 50 - 5 reserve, USDC 100 - 10 reserve
    expect(plan.totalAvailableUsd).toBe(135);
  });

  it('should prefer the smaller sufficient asset within a tier over listed order', () => {
    // DAI 80 - 5 reserve, USDT 40 - 10 reserve
    const plan = planConversion(snapshotWith({ DAI: 80, USDT: 40 }), 25, BALANCE_CONFIG);

    expect(plan.sourceAsset).toBe('USDT');
    expect(plan.legs).toEqual([{ asset: 'USDT', amountUsd: 25 }]);
    expect(plan.totalAvailableUsd).toBe(105);
  });

  it('should take a sufficient asset from a higher tier even when a lower tier has a smaller one', () => {
    const plan = planConversion(snapshotWith({ ARB: 100, USDC: 40 }), 25, BALANCE_CONFIG);

    expect(plan.sourceAsset).toBe('ARB');
    expect(plan.legs).toEqual([{ asset: 'ARB', amountUsd: 25 }]);
  });

  it('should fall through to the next tier when no asset in the first suffices', () => {
    const plan = planConversion(snapshotWith({ ARB: 10, USDC: 40 }), 25, BALANCE_CONFIG);

    expect(plan.sourceAsset).toBe('USDC');
    expect(plan.legs).toEqual([{ asset: 'USDC', amountUsd: 25 }]);
    // ARB 10 - 2 reserve, USDC 40 - 10 reserve
    expect(plan.totalAvailableUsd).toBe(38);
  });

  it('should combine assets in priority order when none suffices alone', () => {
    const plan = planConversion(snapshotWith({ ARB: 15, USDC: 30 }), 30, BALANCE_CONFIG);

    expect(plan.viable).toBe(true);
    expect(plan.sourceAsset).toBe('ARB');
    expect(plan.legs).toEqual([
      { asset: 'ARB', amountUsd: 13 },
      { asset: 'USDC', amountUsd: 17 },
    ]);
  });

  it('should never plan below an asset minimum reserve', () => {
    const plan = planConversion(snapshotWith({ USDC: 12 }), 5, BALANCE_CONFIG);

    expect(plan.viable).toBe(false);
    expect(plan.totalAvailableUsd).toBe(2);
    expect(plan.shortfallUsd).toBe(3);
    expect(plan.legs).toEqual([]);
  });

  it('should report no source when nothing is convertible', () => {
    const plan = planConversion(snapshotWith({}), 10, BALANCE_CONFIG);

    expect(plan.sourceAsset).toBeNull();
    expect(plan.shortfallUsd).toBe(10);
  });

  it('should skip assets outside the conversion priority list', () => {
    const plan = planConversion(snapshotWith({ WBTC: 500 }), 10, BALANCE_CONFIG);

    expect(plan.viable).toBe(false);
    expect(plan.totalAvailableUsd).toBe(0);
  });
});

describe('SmartBalanceManager', () => {
  let logger: RecordingLogger;
  let harness: CollaboratorHarness;
  let submitter: TransactionSubmitter;
  let manager: SmartBalanceManager;

  beforeEach(() => {
    resetFakeHashCounter();
    logger = new RecordingLogger();
    harness = createCollaboratorHarness({ nativeBalance: '0.01' });
    submitter = new TransactionSubmitter({
      chainClients: harness.chainClients,
      keyring: harness.keyring,
      priceFeed: harness.priceFeed,
      nonceManager: new NonceManager({}, logger),
      logger,
    });
    manager = new SmartBalanceManager({
      submitter,
      dexRouter: harness.dexRouter,
      priceFeed: harness.priceFeed,
      logger,
    });
  });

  describe('ensureFunds', () => {
    it('should not convert when native covers the trade and gas reserve', async () => {
      harness.client('arbitrum').setNativeBalance(harness.address, parseEther('0.25'));

      const result = await manager.ensureFunds(40, 'arbitrum');

      expect(result.sufficient).toBe(true);
      expect(result.conversionExecuted).toBe(false);
      expect(result.details.gasReserveUsd).toBe(10);
      expect(result.details.nativeUsdBefore).toBe(500);
      expect(harness.dexRouter.swaps).toHaveLength(0);
    });

    it('should convert just enough USDC to cover the shortfall after slippage', async () => {
      harness.client('arbitrum').setTokenBalance(harness.address, 'USDC', 100_000_000n);

      const result = await manager.ensureFunds(40, 'arbitrum');

      // need 40 + 10 reserve, have 20: convert 30 / 0.97
      expect(result.sufficient).toBe(true);
      expect(result.conversionExecuted).toBe(true);
      expect(result.details.plan?.legs).toHaveLength(1);
      expect(result.details.plan?.legs[0].asset).toBe('USDC');
      expect(result.details.plan?.legs[0].amountUsd).toBeCloseTo(30.927835, 5);
      expect(result.details.conversionTxHashes).toHaveLength(1);

      const swap = harness.dexRouter.swaps[0];
      expect(swap.tokenIn).toBe('USDC');
      expect(swap.tokenOut).toBe('ETH');
      expect(swap.venue).toBe('uniswap_v3');
      expect(swap.amountIn).toBe(30_927_900n);

      expect(harness.client('arbitrum').tokenBalanceOf(harness.address, 'USDC')).toBe(69_072_100n);
      expect(result.details.nativeUsdAfter).toBeCloseTo(50.000063, 4);
    });

    it('should report the shortfall when balances cannot cover the trade', async () => {
      harness.client('arbitrum').setTokenBalance(harness.address, 'USDC', 20_000_000n);

      const result = await manager.ensureFunds(40, 'arbitrum');

      expect(result.sufficient).toBe(false);
      expect(result.conversionExecuted).toBe(false);
      expect(result.details.error).toBe(
        '[ERR_INSUFFICIENT_BALANCE] Insufficient convertible balance: short $20.93 on arbitrum (available $10.00)'
      );
      expect(harness.dexRouter.swaps).toHaveLength(0);
    });

    it('should report a failed conversion without throwing', async () => {
      harness.client('arbitrum').setTokenBalance(harness.address, 'USDC', 100_000_000n);
      harness.dexRouter.failSwapsOn('arbitrum');

      const result = await manager.ensureFunds(40, 'arbitrum');

      expect(result.sufficient).toBe(false);
      expect(result.conversionExecuted).toBe(false);
      expect(result.details.error).toBe(
        '[ERR_CONVERSION_FAILED] Balance conversion failed: USDC -> ETH on arbitrum: Swap route unavailable on arbitrum'
      );
      expect(logger.hasLogMatching('error', 'Balance conversion failed')).toBe(true);
    });

    it('should report an unreadable chain as insufficient', async () => {
      const result = await manager.ensureFunds(10, 'polygon');

      expect(result.sufficient).toBe(false);
      expect(result.details.error).toBe(
        '[ERR_INSUFFICIENT_BALANCE] Insufficient convertible balance: ' +
          'balance read failed on polygon: No chain client for chain: polygon'
      );
    });
  });

  describe('snapshots', () => {
    it('should value native and token balances', async () => {
      harness.client('arbitrum').setTokenBalance(harness.address, 'USDC', 100_000_000n);

      const snapshot = await manager.getSnapshot('arbitrum');

      expect(snapshot.nativeAsset).toBe('ETH');
      expect(snapshot.nativeUsd).toBe(20);
      expect(snapshot.assets.USDC).toEqual({ asset: 'USDC', amount: 100_000_000n, decimals: 6, usdValue: 100 });
      expect(Object.keys(snapshot.assets)).toEqual(['USDC']);
      expect(snapshot.totalUsd).toBe(120);
      expect(manager.gasReserveUsd(snapshot)).toBe(10);
      await expect(manager.getTotalValueUsd('arbitrum')).resolves.toBe(120);
    });

    it('should serve cached snapshots until forced or invalidated', async () => {
      await manager.getSnapshot('arbitrum');
      const lookupsAfterFirst = harness.priceFeed.lookups;

      await manager.getSnapshot('arbitrum');
      expect(harness.priceFeed.lookups).toBe(lookupsAfterFirst);

      await manager.getSnapshot('arbitrum', true);
      expect(harness.priceFeed.lookups).toBe(lookupsAfterFirst + 1);

      manager.invalidate('arbitrum');
      await manager.getSnapshot('arbitrum');
      expect(harness.priceFeed.lookups).toBe(lookupsAfterFirst + 2);
    });

    it('should value an unpriced asset at zero and warn', async () => {
      const unpriced = new SmartBalanceManager({
        submitter,
        dexRouter: harness.dexRouter,
        priceFeed: new FakePriceFeed({ ETH: 2000 }),
        logger,
      });
      harness.client('arbitrum').setTokenBalance(harness.address, 'USDC', 100_000_000n);

      const snapshot = await unpriced.getSnapshot('arbitrum');

      expect(snapshot.assets.USDC.usdValue).toBe(0);
      expect(snapshot.totalUsd).toBe(20);
      expect(logger.hasLogMatching('warn', 'Asset price unavailable, valuing at zero')).toBe(true);
    });
  });
});
