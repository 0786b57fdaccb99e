/**
 * External collaborator contracts
 *
 * The execution core never talks to RPC nodes, DEX contracts, bridge APIs or
 * key material directly. Each capability is injected behind one of these
 * interfaces so the saga can be driven by real adapters or in-process fakes.
 */

import type { OpportunityInput } from './opportunity';

// =============================================================================
// Transactions
// =============================================================================

/**
 * Encoded transaction awaiting a nonce and a signature.
 */
export interface UnsignedTransaction {
  chain: string;
  to: string;
  data: string;
  /** Native value in wei */
  value: bigint;
  gasLimit?: bigint;
}

export interface SignableTransaction extends UnsignedTransaction {
  nonce: number;
}

export type TxStatus = 'success' | 'reverted';

export interface TxReceipt {
  hash: string;
  status: TxStatus;
  blockNumber: number;
  gasUsed: bigint;
  /** Effective gas price in wei */
  effectiveGasPrice: bigint;
  /** Output amount decoded from swap logs, when the client can decode it */
  amountOut?: bigint;
}

// =============================================================================
// Chain Client
// =============================================================================

/**
 * Wire-level access to one chain.
 */
export interface ChainClient {
  readonly chain: string;
  /** Native balance in wei */
  getNativeBalance(address: string): Promise<bigint>;
  /** Token balance in base units */
  getTokenBalance(address: string, asset: string): Promise<bigint>;
  getTransactionCount(address: string, blockTag: 'latest' | 'pending'): Promise<number>;
  /** Current gas price in wei */
  getGasPrice(): Promise<bigint>;
  /** Broadcast a signed transaction, returning its hash */
  submitSignedTx(signedTx: string): Promise<string>;
  /** Resolve the receipt, or null when none appeared within timeoutMs */
  waitForReceipt(txHash: string, timeoutMs: number): Promise<TxReceipt | null>;
}

// =============================================================================
// DEX Router
// =============================================================================

export interface SwapRequest {
  chain: string;
  venue: string;
  tokenIn: string;
  tokenOut: string;
  /** Input amount in base units of tokenIn */
  amountIn: bigint;
}

export interface SwapQuote extends SwapRequest {
  /** Expected output in base units of tokenOut */
  amountOut: bigint;
}

export interface SwapBuildRequest extends SwapRequest {
  minAmountOut: bigint;
  recipient: string;
  /** Unix seconds */
  deadline: number;
}

/**
 * Venue-aware swap quoting and encoding.
 */
export interface DexRouter {
  quote(request: SwapRequest): Promise<SwapQuote>;
  /** Encode a swap into an unsigned transaction */
  swap(request: SwapBuildRequest): Promise<UnsignedTransaction>;
}

// =============================================================================
// Bridge Provider
// =============================================================================

export interface BridgeQuoteRequest {
  sourceChain: string;
  destChain: string;
  token: string;
  amount: bigint;
  recipient: string;
}

export interface BridgeQuote {
  bridge: string;
  sourceChain: string;
  destChain: string;
  token: string;
  amountIn: bigint;
  /** Expected amount delivered on the destination chain */
  amountOut: bigint;
  feeUsd: number;
  estimatedTimeSec: number;
  expiresAt: number;
}

export interface BridgeTransfer {
  transferId: string;
  tx: UnsignedTransaction;
}

export type BridgeTransferStatus = 'pending' | 'completed' | 'failed' | 'refunded';

export interface BridgeCompletion {
  status: BridgeTransferStatus;
  amountReceived?: bigint;
  destTxHash?: string;
  error?: string;
}

export interface AwaitCompletionOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * One bridge protocol's transfer API.
 */
export interface BridgeProvider {
  readonly name: string;
  quote(request: BridgeQuoteRequest): Promise<BridgeQuote>;
  /** Build the source-chain transaction for a quoted transfer */
  transfer(quote: BridgeQuote, recipient: string): Promise<BridgeTransfer>;
  /**
   * Wait for the transfer to settle on the destination chain. Resolves with
   * status 'pending' when the timeout passes first.
   */
  awaitCompletion(transferId: string, options: AwaitCompletionOptions): Promise<BridgeCompletion>;
}

// =============================================================================
// Discovery, Custody, Pricing
// =============================================================================

export interface OpportunityScanner {
  scan(): Promise<OpportunityInput[]>;
}

/**
 * Signing-only access to wallet keys.
 */
export interface WalletKeyring {
  getAddress(chain: string): string;
  signTransaction(tx: SignableTransaction): Promise<string>;
}

export interface PriceFeed {
  getUsdPrice(chain: string, asset: string): Promise<number>;
}
