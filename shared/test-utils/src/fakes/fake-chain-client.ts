/**
 * In-process ChainClient
 *
 * Holds balances in memory, hands out deterministic transaction hashes and
 * lets a test script the next receipts. Submitted transactions can settle
 * balance changes through `onSubmit` listeners.
 */

import { parseUnits } from 'ethers';
import type { ChainClient, TxReceipt } from '@xarb/types';
import { fakeTxHash } from '../helpers/async-helpers';

/**
 * What happens to the next submitted transaction.
 *
 * - `success`: mined with status success
 * - `revert`: mined with status reverted
 * - `no-receipt`: waitForReceipt resolves null
 * - `reject`: submitSignedTx throws
 */
export type FakeTxOutcome = 'success' | 'revert' | 'no-receipt' | 'reject';

export interface FakeChainClientOptions {
  /** Gas price in gwei (default: 0.1) */
  gasPriceGwei?: number;
  /** Gas used per receipt (default: 150000) */
  gasUsed?: bigint;
  /** Starting transaction count for every address (default: 0) */
  startingNonce?: number;
  /** Starting block number (default: 1000) */
  blockNumber?: number;
}

export type SubmitListener = (signedTx: string, txHash: string) => void;

let globalHashCounter = 0;

export class FakeChainClient implements ChainClient {
  readonly chain: string;

  /** Signed payloads in submission order */
  readonly submitted: string[] = [];

  private readonly nativeBalances = new Map<string, bigint>();
  private readonly tokenBalances = new Map<string, bigint>();
  private readonly txCounts = new Map<string, number>();
  private readonly receipts = new Map<string, TxReceipt | null>();
  private readonly outcomes: FakeTxOutcome[] = [];
  private readonly listeners: SubmitListener[] = [];
  private gasPrice: bigint;
  private readonly gasUsed: bigint;
  private readonly startingNonce: number;
  private blockNumber: number;
  private gasPriceError: Error | null = null;

  constructor(chain: string, options: FakeChainClientOptions = {}) {
    this.chain = chain;
    this.gasPrice = parseUnits(String(options.gasPriceGwei ?? 0.1), 'gwei');
    this.gasUsed = options.gasUsed ?? 150000n;
    this.startingNonce = options.startingNonce ?? 0;
    this.blockNumber = options.blockNumber ?? 1000;
  }

  // ===========================================================================
  // Scripting
  // ===========================================================================

  setNativeBalance(address: string, amount: bigint): this {
    this.nativeBalances.set(address.toLowerCase(), amount);
    return this;
  }

  setTokenBalance(address: string, asset: string, amount: bigint): this {
    this.tokenBalances.set(this.tokenKey(address, asset), amount);
    return this;
  }

  nativeBalanceOf(address: string): bigint {
    return this.nativeBalances.get(address.toLowerCase()) ?? 0n;
  }

  tokenBalanceOf(address: string, asset: string): bigint {
    return this.tokenBalances.get(this.tokenKey(address, asset)) ?? 0n;
  }

  setGasPriceGwei(gwei: number): this {
    this.gasPrice = parseUnits(String(gwei), 'gwei');
    return this;
  }

  failGasPrice(error: Error | null): this {
    this.gasPriceError = error;
    return this;
  }

  /**
   * Queue outcomes for the next submissions, consumed in order. Once the
   * queue is empty every transaction succeeds.
   */
  queueOutcomes(...outcomes: FakeTxOutcome[]): this {
    this.outcomes.push(...outcomes);
    return this;
  }

  onSubmit(listener: SubmitListener): this {
    this.listeners.push(listener);
    return this;
  }

  // ===========================================================================
  // ChainClient
  // ===========================================================================

  async getNativeBalance(address: string): Promise<bigint> {
    return this.nativeBalanceOf(address);
  }

  async getTokenBalance(address: string, asset: string): Promise<bigint> {
    return this.tokenBalanceOf(address, asset);
  }

  async getTransactionCount(address: string, _blockTag: 'latest' | 'pending'): Promise<number> {
    return this.txCounts.get(address.toLowerCase()) ?? this.startingNonce;
  }

  async getGasPrice(): Promise<bigint> {
    if (this.gasPriceError) {
      throw this.gasPriceError;
    }
    return this.gasPrice;
  }

  async submitSignedTx(signedTx: string): Promise<string> {
    const outcome = this.outcomes.shift() ?? 'success';
    if (outcome === 'reject') {
      throw new Error(`Fake ${this.chain} node rejected transaction`);
    }

    globalHashCounter++;
    const hash = fakeTxHash(globalHashCounter);
    this.submitted.push(signedTx);

    const sender = parseSender(signedTx);
    if (sender) {
      this.txCounts.set(sender, (this.txCounts.get(sender) ?? this.startingNonce) + 1);
    }

    if (outcome === 'no-receipt') {
      this.receipts.set(hash, null);
    } else {
      this.blockNumber++;
      this.receipts.set(hash, {
        hash,
        status: outcome === 'revert' ? 'reverted' : 'success',
        blockNumber: this.blockNumber,
        gasUsed: this.gasUsed,
        effectiveGasPrice: this.gasPrice,
      });
      if (outcome === 'success') {
        for (const listener of this.listeners) {
          listener(signedTx, hash);
        }
      }
    }

    return hash;
  }

  async waitForReceipt(txHash: string, _timeoutMs: number): Promise<TxReceipt | null> {
    return this.receipts.get(txHash) ?? null;
  }

  private tokenKey(address: string, asset: string): string {
    return `${address.toLowerCase()}:${asset.toUpperCase()}`;
  }
}

/**
 * Recover the sender from a FakeWalletKeyring payload.
 */
function parseSender(signedTx: string): string | null {
  const parts = signedTx.split(':');
  return parts.length > 2 && parts[0] === 'signed' ? parts[2].toLowerCase() : null;
}

export function resetFakeHashCounter(): void {
  globalHashCounter = 0;
}
