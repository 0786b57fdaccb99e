/**
 * Collaborator Harness
 *
 * Wires one of every fake collaborator together: a funded wallet on each
 * chain, a router whose swaps settle into the fake balances, and one fake
 * provider per bridge.
 *
 * @example
 * ```typescript
 * const harness = createCollaboratorHarness();
 * harness.bridge('across').setCompletion('pending');
 * harness.client('base').queueOutcomes('revert');
 * ```
 */

import { parseEther } from 'ethers';
import { FakeChainClient } from '../fakes/fake-chain-client';
import { FakeDexRouter } from '../fakes/fake-dex-router';
import { FakeBridgeProvider } from '../fakes/fake-bridge-provider';
import type { FakeBridgeProviderOptions } from '../fakes/fake-bridge-provider';
import { FakeWalletKeyring, FAKE_WALLET_ADDRESS } from '../fakes/fake-wallet-keyring';
import { FakePriceFeed } from '../fakes/fake-price-feed';
import { FakeOpportunityScanner } from '../fakes/fake-opportunity-scanner';

export interface CollaboratorHarnessOptions {
  /** Default: arbitrum and base */
  chains?: string[];
  /** Native balance per chain in ether units (default: '0.25') */
  nativeBalance?: string;
  /** Default: across, orbiter, synapse */
  bridges?: string[];
  bridgeOptions?: FakeBridgeProviderOptions;
  /** Gas price on every chain in gwei (default: 0.1) */
  gasPriceGwei?: number;
}

export interface CollaboratorHarness {
  address: string;
  keyring: FakeWalletKeyring;
  priceFeed: FakePriceFeed;
  dexRouter: FakeDexRouter;
  scanner: FakeOpportunityScanner;
  chainClients: Map<string, FakeChainClient>;
  bridgeProviders: Map<string, FakeBridgeProvider>;
  client(chain: string): FakeChainClient;
  bridge(name: string): FakeBridgeProvider;
}

export function createCollaboratorHarness(options: CollaboratorHarnessOptions = {}): CollaboratorHarness {
  const chains = options.chains ?? ['arbitrum', 'base'];
  const bridges = options.bridges ?? ['across', 'orbiter', 'synapse'];
  const address = FAKE_WALLET_ADDRESS;

  const keyring = new FakeWalletKeyring(address);
  const priceFeed = new FakePriceFeed();
  const dexRouter = new FakeDexRouter(priceFeed);
  const scanner = new FakeOpportunityScanner();

  const chainClients = new Map<string, FakeChainClient>();
  for (const chain of chains) {
    const client = new FakeChainClient(chain, { gasPriceGwei: options.gasPriceGwei ?? 0.1 });
    client.setNativeBalance(address, parseEther(options.nativeBalance ?? '0.25'));
    dexRouter.settleOn(client, address);
    chainClients.set(chain, client);
  }

  const bridgeProviders = new Map<string, FakeBridgeProvider>();
  for (const name of bridges) {
    bridgeProviders.set(name, new FakeBridgeProvider(name, options.bridgeOptions));
  }

  return {
    address,
    keyring,
    priceFeed,
    dexRouter,
    scanner,
    chainClients,
    bridgeProviders,
    client(chain: string): FakeChainClient {
      const client = chainClients.get(chain);
      if (!client) {
        throw new Error(`No fake client for chain: ${chain}`);
      }
      return client;
    },
    bridge(name: string): FakeBridgeProvider {
      const provider = bridgeProviders.get(name);
      if (!provider) {
        throw new Error(`No fake bridge provider: ${name}`);
      }
      return provider;
    },
  };
}
