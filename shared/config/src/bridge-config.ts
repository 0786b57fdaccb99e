/**
 * Bridge Configuration
 *
 * Static bridge profiles (fee, speed, timeout, supported chains and tokens)
 * and the scoring and cooldown parameters used for bridge selection.
 *
 * Fees are percentages of the transferred amount (0.05 = 0.05%).
 */

import bridgeData from './data/bridges.json';
import { BridgeProfilesSchema, validateOrThrow, type BridgeProfile } from './schemas';
import { safeParseIntBounded } from './utils/env-parsing';

export type { BridgeProfile };

export const BRIDGE_PROFILES: Readonly<Record<string, BridgeProfile>> = Object.freeze(
  validateOrThrow(BridgeProfilesSchema, bridgeData, 'bridges.json')
);

export interface BridgeSelectionConfig {
  feeWeight: number;
  speedWeight: number;
  /** Fee percentage at which the fee score reaches zero */
  maxFeePct: number;
  /** Transfer time at which the speed score reaches zero */
  maxSpeedMinutes: number;
  /** Consecutive failures on one route before it is cooled down */
  maxConsecutiveFailures: number;
  cooldownMs: number;
  /** Extra time past the bridge timeout before a wait is abandoned */
  completionGraceMs: number;
  /** Routes unused for longer than this are not re-quoted */
  observedCostTtlMs: number;
}

export function buildBridgeSelectionConfig(env: NodeJS.ProcessEnv = process.env): BridgeSelectionConfig {
  return {
    feeWeight: 0.6,
    speedWeight: 0.4,
    maxFeePct: 0.2,
    maxSpeedMinutes: 10,
    maxConsecutiveFailures: safeParseIntBounded(
      env.BRIDGE_MAX_CONSECUTIVE_FAILURES, 3, 1, 'BRIDGE_MAX_CONSECUTIVE_FAILURES'
    ),
    cooldownMs: safeParseIntBounded(env.BRIDGE_COOLDOWN_MS, 5 * 60 * 1000, 1000, 'BRIDGE_COOLDOWN_MS'),
    completionGraceMs: 5000,
    observedCostTtlMs: 60 * 60 * 1000,
  };
}

export const BRIDGE_SELECTION_CONFIG: Readonly<BridgeSelectionConfig> = Object.freeze(
  buildBridgeSelectionConfig()
);

/**
 * Bridges able to move `token` between the two chains, enabled ones only.
 */
export function getBridgesForRoute(sourceChain: string, destChain: string, token: string): string[] {
  const src = sourceChain.toLowerCase();
  const dst = destChain.toLowerCase();
  const symbol = token.toUpperCase();

  return Object.entries(BRIDGE_PROFILES)
    .filter(([, profile]) =>
      profile.enabled &&
      profile.chains.includes(src) &&
      profile.chains.includes(dst) &&
      profile.tokens.includes(symbol)
    )
    .map(([name]) => name);
}
