/**
 * Capital Risk Management Configuration
 *
 * Circuit-breaker limits and cross-chain trade sizing.
 */

import { safeParseBool, safeParseFloatBounded, safeParseIntBounded } from './utils/env-parsing';

export interface RiskConfig {
  /** Master switch; a disabled governor permits everything */
  enabled: boolean;
  /** Consecutive failed trades before trading halts */
  maxConsecutiveFailures: number;
  /** Realized loss in a UTC day before trading halts */
  maxDailyLossUsd: number;
  /** Hour (UTC) at which the daily loss window rolls over */
  dailyResetHourUtc: number;
}

export interface CrossChainConfig {
  maxTradeUsd: number;
  minTradeUsd: number;
  /** Largest fraction of the buy-chain wallet a single trade may use */
  walletPct: number;
  /** Trade size target as a multiple of gross profit */
  profitMultiplier: number;
  slippage: number;
  /** Swap deadline after the transaction is built */
  swapDeadlineSec: number;
  /** Time kept back from the execution deadline when capping the bridge wait */
  deadlineMarginMs: number;
}

export function buildRiskConfig(env: NodeJS.ProcessEnv = process.env): RiskConfig {
  return {
    enabled: safeParseBool(env.RISK_MANAGEMENT_ENABLED, true),
    maxConsecutiveFailures: safeParseIntBounded(
      env.RISK_MAX_CONSECUTIVE_FAILURES, 3, 1, 'RISK_MAX_CONSECUTIVE_FAILURES'
    ),
    maxDailyLossUsd: safeParseFloatBounded(
      env.RISK_MAX_DAILY_LOSS_USD, 100, 0.01, 1_000_000, 'RISK_MAX_DAILY_LOSS_USD'
    ),
    dailyResetHourUtc: 0,
  };
}

export function buildCrossChainConfig(env: NodeJS.ProcessEnv = process.env): CrossChainConfig {
  return {
    maxTradeUsd: safeParseFloatBounded(env.CROSS_CHAIN_MAX_TRADE_USD, 40, 1, 1_000_000, 'CROSS_CHAIN_MAX_TRADE_USD'),
    minTradeUsd: safeParseFloatBounded(env.CROSS_CHAIN_MIN_TRADE_USD, 20, 0, 1_000_000, 'CROSS_CHAIN_MIN_TRADE_USD'),
    walletPct: safeParseFloatBounded(env.CROSS_CHAIN_WALLET_PCT, 0.1, 0.001, 1, 'CROSS_CHAIN_WALLET_PCT'),
    profitMultiplier: 10,
    slippage: safeParseFloatBounded(env.CROSS_CHAIN_SLIPPAGE, 0.03, 0, 0.5, 'CROSS_CHAIN_SLIPPAGE'),
    swapDeadlineSec: 300,
    deadlineMarginMs: 10_000,
  };
}

export const RISK_CONFIG: Readonly<RiskConfig> = Object.freeze(buildRiskConfig());

export const CROSS_CHAIN_CONFIG: Readonly<CrossChainConfig> = Object.freeze(buildCrossChainConfig());
