/**
 * Transaction Submitter
 *
 * Turns an unsigned transaction into a mined receipt: allocate a nonce,
 * sign through the keyring, broadcast, wait for the receipt under the
 * transaction timeout, then settle the nonce. Every swap and bridge
 * transaction of a trade goes through here.
 */

import { formatEther } from 'ethers';
import { GAS_TIER_CONFIG, getNativeAsset } from '@xarb/config';
import {
  ErrorCode,
  ExecutionError,
  NonceManager,
  TimeoutError,
  TransactionPendingError,
  TransactionRevertedError,
  getErrorMessage,
  throwIfAborted,
  withTimeout,
} from '@xarb/core';
import type { ILogger } from '@xarb/core';
import type { ChainClient, PriceFeed, TxReceipt, UnsignedTransaction, WalletKeyring } from '@xarb/types';
import { TRANSACTION_TIMEOUT_MS, createServiceLogger } from '../types';

export interface SubmittedTransaction extends TxReceipt {
  chain: string;
  label: string;
  nonce: number;
  /** gasUsed * effectiveGasPrice */
  gasCostWei: bigint;
  gasCostUsd: number;
}

export interface TransactionSubmitterOptions {
  chainClients: ReadonlyMap<string, ChainClient>;
  keyring: WalletKeyring;
  priceFeed: PriceFeed;
  nonceManager: NonceManager;
  transactionTimeoutMs?: number;
  logger?: ILogger;
}

export class TransactionSubmitter {
  private readonly chainClients: ReadonlyMap<string, ChainClient>;
  private readonly keyring: WalletKeyring;
  private readonly priceFeed: PriceFeed;
  private readonly nonceManager: NonceManager;
  private readonly transactionTimeoutMs: number;
  private readonly logger: ILogger;

  constructor(options: TransactionSubmitterOptions) {
    this.chainClients = options.chainClients;
    this.keyring = options.keyring;
    this.priceFeed = options.priceFeed;
    this.nonceManager = options.nonceManager;
    this.transactionTimeoutMs = options.transactionTimeoutMs ?? TRANSACTION_TIMEOUT_MS;
    this.logger = options.logger ?? createServiceLogger('transaction-submitter');

    for (const [chain, client] of this.chainClients) {
      if (!this.nonceManager.isRegistered(chain)) {
        this.nonceManager.registerSigner(chain, this.keyring.getAddress(chain), client);
      }
    }
  }

  getClient(chain: string): ChainClient {
    const client = this.chainClients.get(chain);
    if (!client) {
      throw new ExecutionError(`No chain client for chain: ${chain}`, {
        code: ErrorCode.INVALID_STATE,
        chain,
      });
    }
    return client;
  }

  hasClient(chain: string): boolean {
    return this.chainClients.has(chain);
  }

  getAddress(chain: string): string {
    return this.keyring.getAddress(chain);
  }

  /**
   * Sign, broadcast and wait for `tx`.
   *
   * @throws TransactionRevertedError when the receipt reports a revert
   * @throws ExecutionError when signing or broadcasting fails
   * @throws TransactionPendingError when the transaction was broadcast but
   *   no receipt appeared within the transaction timeout
   */
  async submit(tx: UnsignedTransaction, label: string, signal?: AbortSignal): Promise<SubmittedTransaction> {
    const { chain } = tx;
    const client = this.getClient(chain);
    throwIfAborted(signal);

    const nonce = await this.nonceManager.getNextNonce(chain);

    let hash: string;
    try {
      const signed = await this.keyring.signTransaction({ ...tx, nonce });
      hash = await client.submitSignedTx(signed);
    } catch (error) {
      this.nonceManager.failTransaction(chain, nonce, getErrorMessage(error));
      throw new ExecutionError(`Failed to submit ${label}: ${getErrorMessage(error)}`, {
        code: ErrorCode.INVALID_TRANSACTION,
        chain,
        cause: error,
      });
    }

    this.logger.debug('Transaction submitted', { chain, label, nonce, hash });

    let receipt: TxReceipt | null;
    try {
      receipt = await withTimeout(
        client.waitForReceipt(hash, this.transactionTimeoutMs),
        this.transactionTimeoutMs,
        `receipt ${label}`
      );
    } catch (error) {
      this.nonceManager.failTransaction(chain, nonce, getErrorMessage(error));
      throw new TransactionPendingError(
        `No receipt for ${label}: ${getErrorMessage(error)}`,
        chain,
        hash,
        error instanceof TimeoutError ? ErrorCode.RPC_TIMEOUT : ErrorCode.RPC_ERROR,
        error
      );
    }

    if (!receipt) {
      // May still mine; the next allocation re-syncs from the chain
      this.nonceManager.failTransaction(chain, nonce, 'receipt timeout');
      throw new TransactionPendingError(`No receipt for ${label} within ${this.transactionTimeoutMs}ms`, chain, hash);
    }

    // Mined either way, so the nonce is spent
    this.nonceManager.confirmTransaction(chain, nonce, hash);

    if (receipt.status === 'reverted') {
      this.logger.warn('Transaction reverted', { chain, label, hash, gasUsed: receipt.gasUsed });
      throw new TransactionRevertedError(chain, hash, receipt.gasUsed, label);
    }

    const gasCostWei = receipt.gasUsed * receipt.effectiveGasPrice;
    const gasCostUsd = await this.gasCostUsd(chain, gasCostWei);

    this.logger.info('Transaction confirmed', {
      chain,
      label,
      hash,
      blockNumber: receipt.blockNumber,
      gasUsed: receipt.gasUsed,
      gasCostUsd,
    });

    return { ...receipt, chain, label, nonce, gasCostWei, gasCostUsd };
  }

  /**
   * USD value of `wei` of the chain's native asset. Falls back to the
   * configured native price when the feed fails.
   */
  async gasCostUsd(chain: string, wei: bigint): Promise<number> {
    return Number(formatEther(wei)) * (await this.nativePriceUsd(chain));
  }

  async nativePriceUsd(chain: string): Promise<number> {
    try {
      return await this.priceFeed.getUsdPrice(chain, getNativeAsset(chain));
    } catch (error) {
      this.logger.warn('Native price unavailable, using fallback', {
        chain,
        fallbackUsd: GAS_TIER_CONFIG.nativePriceFallbackUsd,
        error: getErrorMessage(error),
      });
      return GAS_TIER_CONFIG.nativePriceFallbackUsd;
    }
  }
}
