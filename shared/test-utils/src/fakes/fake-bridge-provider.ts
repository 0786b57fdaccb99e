/**
 * In-process BridgeProvider with a scripted completion outcome.
 */

import { AbortedError, abortReason } from '@xarb/core';
import type {
  AwaitCompletionOptions,
  BridgeCompletion,
  BridgeProvider,
  BridgeQuote,
  BridgeQuoteRequest,
  BridgeTransfer,
} from '@xarb/types';

export const FAKE_BRIDGE_ADDRESS = '0x3333333333333333333333333333333333333333';

/**
 * How awaitCompletion behaves.
 *
 * - `completed` / `failed` / `refunded`: resolve immediately with that status
 * - `pending`: resolve `pending` once options.timeoutMs elapses
 * - `hang`: never settle on its own (only an abort ends the wait)
 */
export type FakeCompletionMode = 'completed' | 'failed' | 'refunded' | 'pending' | 'hang';

export interface FakeBridgeProviderOptions {
  /** Protocol fee in USD quoted for every transfer (default: 0.5) */
  feeUsd?: number;
  /** Share of the amount lost to fees, in basis points (default: 5) */
  feeBps?: bigint;
  estimatedTimeSec?: number;
  completion?: FakeCompletionMode;
}

export class FakeBridgeProvider implements BridgeProvider {
  readonly name: string;
  readonly quoteRequests: BridgeQuoteRequest[] = [];
  readonly transfers: BridgeQuote[] = [];
  readonly awaited: string[] = [];

  private readonly feeUsd: number;
  private readonly feeBps: bigint;
  private readonly estimatedTimeSec: number;
  private completion: FakeCompletionMode;
  private quoteError: Error | null = null;
  private transferError: Error | null = null;
  private transferCounter = 0;

  constructor(name: string, options: FakeBridgeProviderOptions = {}) {
    this.name = name;
    this.feeUsd = options.feeUsd ?? 0.5;
    this.feeBps = options.feeBps ?? 5n;
    this.estimatedTimeSec = options.estimatedTimeSec ?? 120;
    this.completion = options.completion ?? 'completed';
  }

  setCompletion(mode: FakeCompletionMode): this {
    this.completion = mode;
    return this;
  }

  failQuotes(error: Error | null = new Error(`${this.name} quote unavailable`)): this {
    this.quoteError = error;
    return this;
  }

  failTransfers(error: Error | null = new Error(`${this.name} transfer rejected`)): this {
    this.transferError = error;
    return this;
  }

  async quote(request: BridgeQuoteRequest): Promise<BridgeQuote> {
    this.quoteRequests.push(request);
    if (this.quoteError) {
      throw this.quoteError;
    }
    return {
      bridge: this.name,
      sourceChain: request.sourceChain,
      destChain: request.destChain,
      token: request.token,
      amountIn: request.amount,
      amountOut: this.amountAfterFee(request.amount),
      feeUsd: this.feeUsd,
      estimatedTimeSec: this.estimatedTimeSec,
      expiresAt: Date.now() + 60_000,
    };
  }

  async transfer(quote: BridgeQuote, recipient: string): Promise<BridgeTransfer> {
    if (this.transferError) {
      throw this.transferError;
    }
    this.transfers.push(quote);
    this.transferCounter++;
    const transferId = `${this.name}-transfer-${this.transferCounter}`;

    return {
      transferId,
      tx: {
        chain: quote.sourceChain,
        to: FAKE_BRIDGE_ADDRESS,
        data: ['bridge', this.name, transferId, quote.destChain, recipient, quote.amountIn.toString()].join(':'),
        value: 0n,
        gasLimit: 250000n,
      },
    };
  }

  awaitCompletion(transferId: string, options: AwaitCompletionOptions): Promise<BridgeCompletion> {
    this.awaited.push(transferId);
    const quote = this.transfers.find((_q, index) => transferId === `${this.name}-transfer-${index + 1}`);

    switch (this.completion) {
      case 'completed':
        return Promise.resolve({
          status: 'completed',
          amountReceived: quote?.amountOut,
          destTxHash: `0xdest-${transferId}`,
        });
      case 'failed':
        return Promise.resolve({ status: 'failed', error: 'Relayer rejected transfer' });
      case 'refunded':
        return Promise.resolve({ status: 'refunded', error: 'Transfer refunded on source chain' });
      case 'pending':
        return this.waitFor(options, { status: 'pending' });
      case 'hang':
        return this.waitFor(options, null);
    }
  }

  private amountAfterFee(amount: bigint): bigint {
    return (amount * (10_000n - this.feeBps)) / 10_000n;
  }

  /**
   * Settle with `result` after the timeout (never, when null). An abort on
   * the signal rejects with AbortedError.
   */
  private waitFor(options: AwaitCompletionOptions, result: BridgeCompletion | null): Promise<BridgeCompletion> {
    return new Promise<BridgeCompletion>((resolve, reject) => {
      const { signal } = options;
      let timer: NodeJS.Timeout | undefined;

      const onAbort = (): void => {
        if (timer) clearTimeout(timer);
        reject(new AbortedError(signal ? abortReason(signal) : 'aborted'));
      };

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      if (result) {
        timer = setTimeout(() => {
          signal?.removeEventListener('abort', onAbort);
          resolve(result);
        }, options.timeoutMs);
      }
    });
  }
}
