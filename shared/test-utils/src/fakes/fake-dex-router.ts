/**
 * In-process DexRouter
 *
 * Quotes at USD parity using the price feed (optionally skewed per chain)
 * and encodes swaps as readable payloads:
 * `swap:<venue>:<tokenIn>:<tokenOut>:<amountIn>:<minAmountOut>`.
 */

import { formatUnits, parseUnits } from 'ethers';
import { getNativeAsset, getTokenDecimals } from '@xarb/config';
import type {
  DexRouter,
  SwapBuildRequest,
  SwapQuote,
  SwapRequest,
  UnsignedTransaction,
} from '@xarb/types';
import type { FakeChainClient } from './fake-chain-client';
import type { FakePriceFeed } from './fake-price-feed';

export const FAKE_ROUTER_ADDRESS = '0x2222222222222222222222222222222222222222';

export interface DecodedSwap {
  venue: string;
  tokenIn: string;
  tokenOut: string;
  amountIn: bigint;
  minAmountOut: bigint;
}

export class FakeDexRouter implements DexRouter {
  readonly quotes: SwapRequest[] = [];
  readonly swaps: SwapBuildRequest[] = [];

  private readonly chainPrices = new Map<string, number>();
  private readonly quoteErrors = new Map<string, Error>();
  private readonly swapErrors = new Map<string, Error>();
  private readonly heldChains = new Set<string>();

  constructor(private readonly prices: FakePriceFeed) {}

  /** Override an asset's price on one chain only */
  setChainPrice(chain: string, asset: string, price: number): this {
    this.chainPrices.set(`${chain}:${asset.toUpperCase()}`, price);
    return this;
  }

  failQuotesOn(chain: string, error: Error = new Error(`Quote unavailable on ${chain}`)): this {
    this.quoteErrors.set(chain, error);
    return this;
  }

  failSwapsOn(chain: string, error: Error = new Error(`Swap route unavailable on ${chain}`)): this {
    this.swapErrors.set(chain, error);
    return this;
  }

  /** Quotes on this chain never settle, like an unresponsive aggregator */
  holdQuotesOn(chain: string): this {
    this.heldChains.add(chain);
    return this;
  }

  clearFailures(): this {
    this.quoteErrors.clear();
    this.swapErrors.clear();
    this.heldChains.clear();
    return this;
  }

  async quote(request: SwapRequest): Promise<SwapQuote> {
    this.quotes.push(request);
    if (this.heldChains.has(request.chain)) {
      return new Promise<SwapQuote>(() => undefined);
    }
    const error = this.quoteErrors.get(request.chain);
    if (error) {
      throw error;
    }
    return { ...request, amountOut: this.convert(request) };
  }

  async swap(request: SwapBuildRequest): Promise<UnsignedTransaction> {
    this.swaps.push(request);
    const error = this.swapErrors.get(request.chain);
    if (error) {
      throw error;
    }

    const native = getNativeAsset(request.chain);
    return {
      chain: request.chain,
      to: FAKE_ROUTER_ADDRESS,
      data: [
        'swap',
        request.venue,
        request.tokenIn,
        request.tokenOut,
        request.amountIn.toString(),
        request.minAmountOut.toString(),
      ].join(':'),
      value: request.tokenIn === native ? request.amountIn : 0n,
      gasLimit: 300000n,
    };
  }

  /**
   * Apply successful swaps to the client's balances: the input is debited
   * and `minAmountOut` credited.
   */
  settleOn(client: FakeChainClient, address: string): this {
    client.onSubmit((signedTx) => {
      const swap = decodeSwap(signedTx);
      if (!swap) return;
      const native = getNativeAsset(client.chain);
      this.applyDelta(client, address, swap.tokenIn, -swap.amountIn, native);
      this.applyDelta(client, address, swap.tokenOut, swap.minAmountOut, native);
    });
    return this;
  }

  private applyDelta(
    client: FakeChainClient,
    address: string,
    asset: string,
    delta: bigint,
    native: string
  ): void {
    if (asset === native) {
      client.setNativeBalance(address, client.nativeBalanceOf(address) + delta);
    } else {
      client.setTokenBalance(address, asset, client.tokenBalanceOf(address, asset) + delta);
    }
  }

  private convert(request: SwapRequest): bigint {
    const decimalsIn = getTokenDecimals(request.tokenIn);
    const decimalsOut = getTokenDecimals(request.tokenOut);
    const valueUsd = Number(formatUnits(request.amountIn, decimalsIn)) * this.priceOn(request.chain, request.tokenIn);
    const amountOut = valueUsd / this.priceOn(request.chain, request.tokenOut);
    return parseUnits(amountOut.toFixed(decimalsOut), decimalsOut);
  }

  private priceOn(chain: string, asset: string): number {
    return this.chainPrices.get(`${chain}:${asset.toUpperCase()}`) ?? this.prices.priceOf(asset);
  }
}

/**
 * Decode a swap from a FakeWalletKeyring payload wrapping a FakeDexRouter
 * transaction.
 */
export function decodeSwap(signedTx: string): DecodedSwap | null {
  const parts = signedTx.split(':');
  const swapAt = parts.indexOf('swap');
  if (swapAt < 0 || parts.length < swapAt + 6) {
    return null;
  }
  return {
    venue: parts[swapAt + 1],
    tokenIn: parts[swapAt + 2],
    tokenOut: parts[swapAt + 3],
    amountIn: BigInt(parts[swapAt + 4]),
    minAmountOut: BigInt(parts[swapAt + 5]),
  };
}
