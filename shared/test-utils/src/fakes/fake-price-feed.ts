/**
 * In-process PriceFeed with fixed USD prices per asset symbol.
 */

import type { PriceFeed } from '@xarb/types';

export const DEFAULT_FAKE_PRICES: Readonly<Record<string, number>> = {
  ETH: 2000,
  WETH: 2000,
  MATIC: 0.8,
  USDC: 1,
  USDT: 1,
  DAI: 1,
  ARB: 1,
  OP: 2,
  WBTC: 60000,
};

export class FakePriceFeed implements PriceFeed {
  private readonly prices = new Map<string, number>();
  /** Number of getUsdPrice calls */
  lookups = 0;

  constructor(prices: Record<string, number> = DEFAULT_FAKE_PRICES) {
    for (const [asset, price] of Object.entries(prices)) {
      this.prices.set(asset.toUpperCase(), price);
    }
  }

  setPrice(asset: string, price: number): this {
    this.prices.set(asset.toUpperCase(), price);
    return this;
  }

  async getUsdPrice(chain: string, asset: string): Promise<number> {
    this.lookups++;
    const price = this.prices.get(asset.toUpperCase());
    if (price === undefined) {
      throw new Error(`No price for ${asset} on ${chain}`);
    }
    return price;
  }

  /** Synchronous lookup for test arithmetic */
  priceOf(asset: string): number {
    return this.prices.get(asset.toUpperCase()) ?? 0;
  }
}
