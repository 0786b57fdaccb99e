/**
 * In-process WalletKeyring. Signing produces a readable payload, not a real
 * signature: `signed:<chain>:<address>:<nonce>:<to>:<value>:<data>`.
 */

import type { SignableTransaction, WalletKeyring } from '@xarb/types';

export const FAKE_WALLET_ADDRESS = '0x1111111111111111111111111111111111111111';

export class FakeWalletKeyring implements WalletKeyring {
  /** Every transaction passed to signTransaction, in order */
  readonly signed: SignableTransaction[] = [];

  private signError: Error | null = null;

  constructor(private readonly address: string = FAKE_WALLET_ADDRESS) {}

  getAddress(_chain: string): string {
    return this.address;
  }

  failSigning(error: Error | null): this {
    this.signError = error;
    return this;
  }

  async signTransaction(tx: SignableTransaction): Promise<string> {
    if (this.signError) {
      throw this.signError;
    }
    this.signed.push(tx);
    return `signed:${tx.chain}:${this.address}:${tx.nonce}:${tx.to}:${tx.value}:${tx.data}`;
  }
}
