/**
 * Shared configuration for the execution core.
 *
 * - chain-config.ts: chain profiles and token decimals
 * - gas-tier-config.ts: gas tiers and per-operation gas estimates
 * - filter-config.ts: opportunity filter thresholds and venue seed profiles
 * - bridge-config.ts: bridge profiles and selection parameters
 * - balance-config.ts: conversion priority and minimum reserves
 * - risk-config.ts: circuit-breaker limits and trade sizing
 * - schemas/: zod schemas and validation helpers
 */

export {
  CHAIN_PROFILES,
  TOKEN_DECIMALS,
  getChainProfile,
  getNativeAsset,
  getTokenDecimals,
  getConfiguredChains,
} from './chain-config';
export type { ChainProfile } from './chain-config';

export { GAS_TIER_CONFIG, buildGasTierConfig } from './gas-tier-config';
export type { GasTierConfig, ResolvedGasTier } from './gas-tier-config';

export { FILTER_CONFIG, VENUE_PROFILES, buildFilterConfig } from './filter-config';
export type { FilterConfig, PriorityWeights } from './filter-config';

export {
  BRIDGE_PROFILES,
  BRIDGE_SELECTION_CONFIG,
  buildBridgeSelectionConfig,
  getBridgesForRoute,
} from './bridge-config';
export type { BridgeProfile, BridgeSelectionConfig } from './bridge-config';

export { BALANCE_CONFIG, buildBalanceConfig, getMinReserveUsd } from './balance-config';
export type { BalanceConfig } from './balance-config';

export {
  RISK_CONFIG,
  CROSS_CHAIN_CONFIG,
  buildRiskConfig,
  buildCrossChainConfig,
} from './risk-config';
export type { RiskConfig, CrossChainConfig } from './risk-config';

export {
  OpportunityInputSchema,
  validateWithDetails,
  validateOrThrow,
  createValidator,
  validateOpportunityInput,
} from './schemas';
export type { ValidationResult, ValidatedOpportunityInput } from './schemas';

export {
  safeParseFloat,
  safeParseFloatBounded,
  safeParseIntBounded,
  safeParseBool,
} from './utils/env-parsing';
