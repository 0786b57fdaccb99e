export { FakeChainClient, resetFakeHashCounter } from './fake-chain-client';
export type { FakeChainClientOptions, FakeTxOutcome, SubmitListener } from './fake-chain-client';
export { FakeDexRouter, FAKE_ROUTER_ADDRESS, decodeSwap } from './fake-dex-router';
export type { DecodedSwap } from './fake-dex-router';
export { FakeBridgeProvider, FAKE_BRIDGE_ADDRESS } from './fake-bridge-provider';
export type { FakeBridgeProviderOptions, FakeCompletionMode } from './fake-bridge-provider';
export { FakeWalletKeyring, FAKE_WALLET_ADDRESS } from './fake-wallet-keyring';
export { FakePriceFeed, DEFAULT_FAKE_PRICES } from './fake-price-feed';
export { FakeOpportunityScanner } from './fake-opportunity-scanner';
