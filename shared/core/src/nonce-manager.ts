/**
 * Nonce Manager
 *
 * Tracks pending nonces per chain so that back-to-back transactions (a
 * funding conversion followed by a buy, a bridge deposit followed by a
 * resubmission) never collide.
 *
 * Nonces are fetched fresh from the chain when the local view is uncertain:
 * first use, after a failed transaction, or once the last sync is older than
 * `syncIntervalMs`. Otherwise the last issued nonce + 1 is used. A resync
 * never moves the next nonce below one already issued, except after the
 * local state was reset because pending transactions were dropped.
 */

import { createPinoLogger } from './logging/pino-logger';
import type { ILogger } from './logging/types';
import { getErrorMessage } from './resilience/error-handling';

// =============================================================================
// Types
// =============================================================================

/**
 * Anything able to report an account's transaction count.
 * ChainClient satisfies this.
 */
export interface NonceSource {
  getTransactionCount(address: string, blockTag: 'latest' | 'pending'): Promise<number>;
}

interface PendingTransaction {
  nonce: number;
  hash?: string;
  timestamp: number;
  status: 'pending' | 'confirmed';
}

interface ChainNonceState {
  /** Lowest nonce not yet confirmed; -1 when unknown */
  confirmedNonce: number;
  /** Next nonce to issue; -1 when unknown */
  pendingNonce: number;
  lastSync: number;
  pendingTxs: Map<number, PendingTransaction>;
  /** Waiters for the per-chain lock, in arrival order */
  lockQueue: Array<() => void>;
  isLocked: boolean;
}

export interface NonceManagerConfig {
  /** Resync with the chain after this long (ms). Default: 30000 */
  syncIntervalMs: number;
  /** Pending transactions older than this are dropped (ms). Default: 300000 */
  pendingTimeoutMs: number;
  /** Max pending transactions per chain. Default: 10 */
  maxPendingPerChain: number;
}

export interface NonceState {
  confirmed: number;
  pending: number;
  pendingCount: number;
  lastSync: number;
}

const DEFAULT_CONFIG: NonceManagerConfig = {
  syncIntervalMs: 30000,
  pendingTimeoutMs: 300000,
  maxPendingPerChain: 10,
};

// =============================================================================
// NonceManager Implementation
// =============================================================================

export class NonceManager {
  private readonly config: NonceManagerConfig;
  private readonly logger: ILogger;
  private readonly chainStates = new Map<string, ChainNonceState>();
  private readonly sources = new Map<string, NonceSource>();
  private readonly addresses = new Map<string, string>();

  constructor(config: Partial<NonceManagerConfig> = {}, logger?: ILogger) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = logger ?? createPinoLogger('nonce-manager');
  }

  /**
   * Register the signing address used on a chain.
   */
  registerSigner(chain: string, address: string, source: NonceSource): void {
    this.sources.set(chain, source);
    this.addresses.set(chain, address);
    this.chainStates.set(chain, {
      confirmedNonce: -1,
      pendingNonce: -1,
      lastSync: 0,
      pendingTxs: new Map(),
      lockQueue: [],
      isLocked: false,
    });

    this.logger.info('Signer registered for nonce management', {
      chain,
      address: address.slice(0, 10) + '...',
    });
  }

  isRegistered(chain: string): boolean {
    return this.chainStates.has(chain);
  }

  /**
   * Allocate the next nonce for a chain. Concurrent callers are served in order.
   */
  async getNextNonce(chain: string): Promise<number> {
    const state = this.requireState(chain);

    await this.acquireLock(state);
    try {
      if (state.pendingNonce === -1 || Date.now() - state.lastSync > this.config.syncIntervalMs) {
        await this.syncNonce(chain, state);
      }

      this.dropTimedOut(chain, state);

      if (state.pendingTxs.size >= this.config.maxPendingPerChain) {
        throw new Error(`Max pending transactions (${this.config.maxPendingPerChain}) reached for ${chain}`);
      }

      const nonce = state.pendingNonce;
      state.pendingNonce++;
      state.pendingTxs.set(nonce, { nonce, timestamp: Date.now(), status: 'pending' });

      this.logger.debug('Nonce allocated', { chain, nonce, pending: state.pendingTxs.size });
      return nonce;
    } finally {
      this.releaseLock(state);
    }
  }

  /**
   * Mark a nonce as mined. Out-of-order confirmations are held until the
   * lower nonces confirm.
   */
  confirmTransaction(chain: string, nonce: number, hash: string): void {
    const state = this.chainStates.get(chain);
    const tx = state?.pendingTxs.get(nonce);
    if (!state || !tx) return;

    tx.status = 'confirmed';
    tx.hash = hash;

    if (nonce <= state.confirmedNonce || state.confirmedNonce === -1) {
      state.pendingTxs.delete(nonce);
      state.confirmedNonce = Math.max(state.confirmedNonce, nonce + 1);
    }
    this.advanceConfirmedNonce(state);

    this.logger.debug('Transaction confirmed', { chain, nonce, hash: hash.slice(0, 10) + '...' });
  }

  /**
   * Mark a nonce as never to be mined. When it was the lowest outstanding
   * nonce the chain will not accept later ones, so the next allocation
   * resyncs from the chain.
   */
  failTransaction(chain: string, nonce: number, error: string): void {
    const state = this.chainStates.get(chain);
    if (!state || !state.pendingTxs.has(nonce)) return;

    state.pendingTxs.delete(nonce);
    this.logger.warn('Transaction failed', { chain, nonce, error });

    let lowestPending = Infinity;
    for (const key of state.pendingTxs.keys()) {
      if (key < lowestPending) lowestPending = key;
    }

    if (nonce < lowestPending) {
      state.confirmedNonce = -1;
      state.pendingNonce = -1;
      this.logger.info('Nonce state reset due to failed transaction', { chain, nonce });
    }
  }

  /**
   * Drop pending transactions older than `pendingTimeoutMs` on every chain.
   *
   * @returns Number of transactions dropped
   */
  cleanupStale(): number {
    let dropped = 0;
    for (const [chain, state] of this.chainStates) {
      dropped += this.dropTimedOut(chain, state);
    }
    return dropped;
  }

  /**
   * Resync chains with the network. Failures are logged per chain.
   */
  async resync(chains: string[] = Array.from(this.chainStates.keys())): Promise<void> {
    await Promise.all(chains.map(async (chain) => {
      const state = this.chainStates.get(chain);
      if (!state) return;

      await this.acquireLock(state);
      try {
        await this.syncNonce(chain, state);
      } catch (error) {
        this.logger.error('Failed to sync nonce', { chain, error: getErrorMessage(error) });
      } finally {
        this.releaseLock(state);
      }
    }));
  }

  /**
   * Forget all local state for a chain and resync.
   */
  async resetChain(chain: string): Promise<void> {
    const state = this.chainStates.get(chain);
    if (!state) return;

    state.pendingTxs.clear();
    state.confirmedNonce = -1;
    state.pendingNonce = -1;
    state.lastSync = 0;

    await this.resync([chain]);
    this.logger.info('Chain nonce state reset', { chain, newNonce: state.confirmedNonce });
  }

  getState(chain: string): NonceState | null {
    const state = this.chainStates.get(chain);
    if (!state) return null;

    let pendingCount = 0;
    for (const tx of state.pendingTxs.values()) {
      if (tx.status === 'pending') pendingCount++;
    }

    return {
      confirmed: state.confirmedNonce,
      pending: state.pendingNonce,
      pendingCount,
      lastSync: state.lastSync,
    };
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private requireState(chain: string): ChainNonceState {
    const state = this.chainStates.get(chain);
    if (!state) {
      throw new Error(`No signer registered for chain: ${chain}`);
    }
    return state;
  }

  /**
   * Always queue first; the head of an idle queue takes the lock at once.
   */
  private acquireLock(state: ChainNonceState): Promise<void> {
    return new Promise<void>((resolve) => {
      state.lockQueue.push(resolve);
      if (state.lockQueue.length === 1 && !state.isLocked) {
        state.isLocked = true;
        state.lockQueue.shift();
        resolve();
      }
    });
  }

  /**
   * Hand the lock straight to the next waiter, or free it.
   */
  private releaseLock(state: ChainNonceState): void {
    const nextWaiter = state.lockQueue.shift();
    if (nextWaiter) {
      setImmediate(nextWaiter);
    } else {
      state.isLocked = false;
    }
  }

  private async syncNonce(chain: string, state: ChainNonceState): Promise<void> {
    const source = this.sources.get(chain);
    const address = this.addresses.get(chain);
    if (!source || !address) {
      throw new Error(`No signer registered for chain: ${chain}`);
    }

    const networkNonce = await source.getTransactionCount(address, 'pending');

    state.confirmedNonce = networkNonce;
    state.pendingNonce = Math.max(state.pendingNonce, networkNonce);
    state.lastSync = Date.now();

    this.logger.debug('Nonce synced', { chain, nonce: networkNonce, next: state.pendingNonce });
  }

  private dropTimedOut(chain: string, state: ChainNonceState): number {
    const now = Date.now();
    const timedOut: number[] = [];

    for (const [nonce, tx] of state.pendingTxs) {
      if (tx.status === 'pending' && now - tx.timestamp > this.config.pendingTimeoutMs) {
        timedOut.push(nonce);
      }
    }
    if (timedOut.length === 0) return 0;

    this.logger.warn('Cleaning up timed out transactions', { chain, count: timedOut.length });
    for (const nonce of timedOut) {
      state.pendingTxs.delete(nonce);
    }

    // The chain may have dropped them; take its word on the next allocation
    state.confirmedNonce = -1;
    state.pendingNonce = -1;
    return timedOut.length;
  }

  private advanceConfirmedNonce(state: ChainNonceState): void {
    while (state.pendingTxs.get(state.confirmedNonce)?.status === 'confirmed') {
      state.pendingTxs.delete(state.confirmedNonce);
      state.confirmedNonce++;
    }
  }
}
