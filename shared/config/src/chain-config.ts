/**
 * Chain Profiles
 *
 * Per-chain execution metadata (chain class, native asset, gas reserve,
 * conversion venue) and token decimals, loaded from JSON and validated once.
 */

import chainsData from './data/chains.json';
import tokensData from './data/tokens.json';
import {
  ChainProfilesSchema,
  TokenDecimalsSchema,
  validateOrThrow,
  type ChainProfile,
} from './schemas';

export type { ChainProfile };

export const CHAIN_PROFILES: Readonly<Record<string, ChainProfile>> = Object.freeze(
  validateOrThrow(ChainProfilesSchema, chainsData, 'chains.json')
);

export const TOKEN_DECIMALS: Readonly<Record<string, number>> = Object.freeze(
  validateOrThrow(TokenDecimalsSchema, tokensData, 'tokens.json')
);

const DEFAULT_DECIMALS = 18;

/**
 * Get a chain profile, or undefined for chains that are not configured.
 */
export function getChainProfile(chain: string): ChainProfile | undefined {
  return CHAIN_PROFILES[chain.toLowerCase()];
}

/**
 * Native asset symbol of a chain. Unknown chains are assumed ETH-native.
 */
export function getNativeAsset(chain: string): string {
  return getChainProfile(chain)?.nativeAsset ?? 'ETH';
}

/**
 * Decimals of a token symbol (18 when unknown).
 */
export function getTokenDecimals(asset: string): number {
  return TOKEN_DECIMALS[asset.toUpperCase()] ?? DEFAULT_DECIMALS;
}

export function getConfiguredChains(): string[] {
  return Object.keys(CHAIN_PROFILES);
}
