/**
 * Nonce Manager Unit Tests
 *
 * Sequential allocation under concurrency, confirmation ordering, and
 * resync after failures or dropped transactions.
 */

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { NonceManager } from '../../src/nonce-manager';
import { RecordingLogger } from '../../src/logging';

class FakeNonceSource {
  nonce = 0;
  calls = 0;
  failWith: Error | null = null;

  async getTransactionCount(_address: string, _blockTag: 'latest' | 'pending'): Promise<number> {
    this.calls++;
    if (this.failWith) throw this.failWith;
    return this.nonce;
  }
}

const ADDRESS = '0x1234567890123456789012345678901234567890';

describe('NonceManager', () => {
  let nonceManager: NonceManager;
  let source: FakeNonceSource;
  let logger: RecordingLogger;

  beforeEach(() => {
    logger = new RecordingLogger();
    source = new FakeNonceSource();
    nonceManager = new NonceManager(
      { syncIntervalMs: 60000, pendingTimeoutMs: 5000, maxPendingPerChain: 5 },
      logger
    );
    nonceManager.registerSigner('arbitrum', ADDRESS, source);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('allocation', () => {
    it('should allocate sequential nonces starting from the chain count', async () => {
      source.nonce = 7;

      expect(await nonceManager.getNextNonce('arbitrum')).toBe(7);
      expect(await nonceManager.getNextNonce('arbitrum')).toBe(8);
      expect(await nonceManager.getNextNonce('arbitrum')).toBe(9);
      expect(source.calls).toBe(1);
    });

    it('should hand out distinct nonces to concurrent callers', async () => {
      const nonces = await Promise.all([
        nonceManager.getNextNonce('arbitrum'),
        nonceManager.getNextNonce('arbitrum'),
        nonceManager.getNextNonce('arbitrum'),
      ]);

      expect(nonces).toEqual([0, 1, 2]);
    });

    it('should enforce the pending limit', async () => {
      for (let i = 0; i < 5; i++) {
        await nonceManager.getNextNonce('arbitrum');
      }

      await expect(nonceManager.getNextNonce('arbitrum')).rejects.toThrow(
        'Max pending transactions (5) reached for arbitrum'
      );
    });

    it('should reject unregistered chains', async () => {
      await expect(nonceManager.getNextNonce('base')).rejects.toThrow(
        'No signer registered for chain: base'
      );
    });

    it('should propagate a failed first sync', async () => {
      source.failWith = new Error('connection refused');

      await expect(nonceManager.getNextNonce('arbitrum')).rejects.toThrow('connection refused');
      expect(nonceManager.getState('arbitrum')?.pending).toBe(-1);
    });

    it('should never go below an issued nonce when the chain lags', async () => {
      await nonceManager.getNextNonce('arbitrum');
      await nonceManager.getNextNonce('arbitrum');

      source.nonce = 0;
      await nonceManager.resync();

      expect(await nonceManager.getNextNonce('arbitrum')).toBe(2);
    });
  });

  describe('confirmation', () => {
    it('should advance past confirmed nonces in order', async () => {
      const n0 = await nonceManager.getNextNonce('arbitrum');
      const n1 = await nonceManager.getNextNonce('arbitrum');

      nonceManager.confirmTransaction('arbitrum', n1, '0xbbbbbbbbbbbb');
      expect(nonceManager.getState('arbitrum')).toMatchObject({ confirmed: 0, pendingCount: 1 });

      nonceManager.confirmTransaction('arbitrum', n0, '0xaaaaaaaaaaaa');
      expect(nonceManager.getState('arbitrum')).toMatchObject({ confirmed: 2, pending: 2, pendingCount: 0 });
    });
  });

  describe('failure handling', () => {
    it('should resync after the lowest pending nonce fails', async () => {
      const n0 = await nonceManager.getNextNonce('arbitrum');
      await nonceManager.getNextNonce('arbitrum');

      nonceManager.failTransaction('arbitrum', n0, 'reverted');
      expect(nonceManager.getState('arbitrum')?.pending).toBe(-1);

      source.nonce = 1;
      expect(await nonceManager.getNextNonce('arbitrum')).toBe(1);
      expect(source.calls).toBe(2);
    });

    it('should keep local state when a higher nonce fails', async () => {
      await nonceManager.getNextNonce('arbitrum');
      const n1 = await nonceManager.getNextNonce('arbitrum');

      nonceManager.failTransaction('arbitrum', n1, 'dropped');

      expect(nonceManager.getState('arbitrum')?.pending).toBe(2);
    });

    it('should drop stale pending transactions and resync', async () => {
      const start = Date.now();
      await nonceManager.getNextNonce('arbitrum');
      await nonceManager.getNextNonce('arbitrum');

      jest.spyOn(Date, 'now').mockReturnValue(start + 10_000);

      expect(nonceManager.cleanupStale()).toBe(2);
      expect(nonceManager.getState('arbitrum')).toMatchObject({ pending: -1, pendingCount: 0 });
      expect(logger.hasLogMatching('warn', 'Cleaning up timed out transactions')).toBe(true);
    });

    it('should log and continue when a background resync fails', async () => {
      source.failWith = new Error('rate limited');

      await nonceManager.resync();

      expect(logger.hasLogWithMeta('error', { chain: 'arbitrum', error: 'rate limited' })).toBe(true);
    });

    it('should reset a chain from the network', async () => {
      await nonceManager.getNextNonce('arbitrum');
      source.nonce = 4;

      await nonceManager.resetChain('arbitrum');

      expect(nonceManager.getState('arbitrum')).toMatchObject({ confirmed: 4, pending: 4, pendingCount: 0 });
    });
  });
});
