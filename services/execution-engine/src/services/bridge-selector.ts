/**
 * Bridge Selector
 *
 * Picks the bridge for a cross-chain transfer. Candidates are the enabled
 * bridge profiles that support the chain pair and token, have a provider
 * registered and are not cooled down. Each is scored on fee and speed:
 *
 *   score = feeWeight * (1 - feePct / maxFeePct) + speedWeight * (1 - minutes / maxSpeedMinutes)
 *
 * Fee and speed come from the static profile until the route has been
 * re-quoted by refreshObservedCosts(); fresh observations replace them.
 *
 * A bridge that fails `maxConsecutiveFailures` times in a row on a route is
 * skipped on that route for `cooldownMs`.
 */

import {
  BRIDGE_PROFILES,
  BRIDGE_SELECTION_CONFIG,
  getBridgesForRoute,
} from '@xarb/config';
import type { BridgeSelectionConfig } from '@xarb/config';
import { getErrorMessage } from '@xarb/core';
import type { ILogger } from '@xarb/core';
import type { BridgeProvider } from '@xarb/types';
import { createServiceLogger } from '../types';

export interface BridgeSelection {
  bridge: string;
  provider: BridgeProvider;
  score: number;
  feePct: number;
  speedMinutes: number;
  /** How long to wait for completion before the transfer counts as timed out */
  timeoutMs: number;
  /** Whether fee and speed came from a fresh quote rather than the profile */
  observed: boolean;
}

export interface ObservedBridgeCost {
  feePct: number;
  feeUsd: number;
  speedMinutes: number;
  observedAt: number;
}

export interface BridgeRouteStatus {
  bridge: string;
  sourceChain: string;
  destChain: string;
  token: string;
  consecutiveFailures: number;
  /** null when the route is usable */
  cooldownUntil: number | null;
  lastUsedAt: number | null;
  lastAmountUsd: number | null;
  observed: ObservedBridgeCost | null;
}

export interface BridgeSelectorOptions {
  providers: ReadonlyMap<string, BridgeProvider>;
  /** Wallet address on a chain, used as the recipient of refresh quotes */
  recipientFor: (chain: string) => string;
  config?: Partial<BridgeSelectionConfig>;
  logger?: ILogger;
}

interface RouteState {
  bridge: string;
  sourceChain: string;
  destChain: string;
  token: string;
  consecutiveFailures: number;
  cooledDownAt: number;
  lastUsedAt: number | null;
  lastAmount: bigint | null;
  lastAmountUsd: number | null;
  observed: ObservedBridgeCost | null;
}

const FEE_PCT_SCALE = 1_000_000n;

/**
 * Weighted fee/speed score, each component clamped to [0, 1].
 */
export function scoreBridge(
  feePct: number,
  speedMinutes: number,
  config: BridgeSelectionConfig = BRIDGE_SELECTION_CONFIG
): number {
  const feeScore = clamp01(1 - feePct / config.maxFeePct);
  const speedScore = clamp01(1 - speedMinutes / config.maxSpeedMinutes);
  return config.feeWeight * feeScore + config.speedWeight * speedScore;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export class BridgeSelector {
  private readonly providers: ReadonlyMap<string, BridgeProvider>;
  private readonly recipientFor: (chain: string) => string;
  private readonly config: BridgeSelectionConfig;
  private readonly logger: ILogger;
  private readonly routes = new Map<string, RouteState>();

  constructor(options: BridgeSelectorOptions) {
    this.providers = options.providers;
    this.recipientFor = options.recipientFor;
    this.config = { ...BRIDGE_SELECTION_CONFIG, ...options.config };
    this.logger = options.logger ?? createServiceLogger('bridge-selector');
  }

  /**
   * Best bridge for the route, or null when no candidate remains.
   */
  select(sourceChain: string, destChain: string, token: string): BridgeSelection | null {
    let best: BridgeSelection | null = null;

    for (const bridge of getBridgesForRoute(sourceChain, destChain, token)) {
      const provider = this.providers.get(bridge);
      const profile = BRIDGE_PROFILES[bridge];
      if (!provider || !profile) continue;
      if (this.isCooledDown(bridge, sourceChain, destChain, token)) continue;

      const observed = this.freshObservation(bridge, sourceChain, destChain, token);
      const feePct = observed?.feePct ?? profile.feePct;
      const speedMinutes = observed?.speedMinutes ?? profile.speedMinutes;
      const score = scoreBridge(feePct, speedMinutes, this.config);

      if (!best || score > best.score) {
        best = {
          bridge,
          provider,
          score,
          feePct,
          speedMinutes,
          timeoutMs: profile.timeoutMinutes * 60_000,
          observed: observed !== null,
        };
      }
    }

    if (best) {
      this.logger.debug('Bridge selected', {
        bridge: best.bridge,
        route: `${sourceChain}->${destChain}`,
        token,
        score: best.score,
      });
    }
    return best;
  }

  /** Mark the route as used so refreshObservedCosts() keeps it current */
  recordUsage(
    bridge: string,
    sourceChain: string,
    destChain: string,
    token: string,
    amount: bigint,
    amountUsd: number
  ): void {
    const state = this.state(bridge, sourceChain, destChain, token);
    state.lastUsedAt = Date.now();
    state.lastAmount = amount;
    state.lastAmountUsd = amountUsd;
  }

  recordSuccess(bridge: string, sourceChain: string, destChain: string, token: string): void {
    const state = this.state(bridge, sourceChain, destChain, token);
    state.consecutiveFailures = 0;
    state.cooledDownAt = 0;
  }

  recordFailure(bridge: string, sourceChain: string, destChain: string, token: string): void {
    const state = this.state(bridge, sourceChain, destChain, token);
    state.consecutiveFailures++;

    if (state.consecutiveFailures >= this.config.maxConsecutiveFailures && state.cooledDownAt === 0) {
      state.cooledDownAt = Date.now();
      this.logger.warn('Bridge route cooling down', {
        bridge,
        route: `${sourceChain}->${destChain}`,
        token,
        failures: state.consecutiveFailures,
        cooldownMs: this.config.cooldownMs,
      });
    }
  }

  isCooledDown(bridge: string, sourceChain: string, destChain: string, token: string): boolean {
    const state = this.routes.get(routeKey(bridge, sourceChain, destChain, token));
    if (!state || state.cooledDownAt === 0) return false;

    if (Date.now() - state.cooledDownAt >= this.config.cooldownMs) {
      state.cooledDownAt = 0;
      state.consecutiveFailures = 0;
      this.logger.info('Bridge route cooldown expired', {
        bridge,
        route: `${sourceChain}->${destChain}`,
        token,
      });
      return false;
    }
    return true;
  }

  /**
   * Re-quote every route used within `observedCostTtlMs` at its last trade
   * size. A failed quote keeps the previous observation.
   *
   * @returns number of routes refreshed
   */
  async refreshObservedCosts(): Promise<number> {
    const now = Date.now();
    let refreshed = 0;

    for (const state of this.routes.values()) {
      if (state.lastUsedAt === null || state.lastAmount === null) continue;
      if (now - state.lastUsedAt > this.config.observedCostTtlMs) continue;

      const provider = this.providers.get(state.bridge);
      if (!provider) continue;

      try {
        const quote = await provider.quote({
          sourceChain: state.sourceChain,
          destChain: state.destChain,
          token: state.token,
          amount: state.lastAmount,
          recipient: this.recipientFor(state.destChain),
        });

        const feePct = quote.amountIn > 0n
          ? Number(((quote.amountIn - quote.amountOut) * FEE_PCT_SCALE) / quote.amountIn) / 10_000
          : 0;
        state.observed = {
          feePct,
          feeUsd: quote.feeUsd,
          speedMinutes: quote.estimatedTimeSec / 60,
          observedAt: Date.now(),
        };
        refreshed++;
      } catch (error) {
        this.logger.warn('Bridge cost refresh failed', {
          bridge: state.bridge,
          route: `${state.sourceChain}->${state.destChain}`,
          token: state.token,
          error: getErrorMessage(error),
        });
      }
    }

    if (refreshed > 0) {
      this.logger.debug('Bridge costs refreshed', { routes: refreshed });
    }
    return refreshed;
  }

  getRouteStatus(): BridgeRouteStatus[] {
    return Array.from(this.routes.values(), (state) => ({
      bridge: state.bridge,
      sourceChain: state.sourceChain,
      destChain: state.destChain,
      token: state.token,
      consecutiveFailures: state.consecutiveFailures,
      cooldownUntil: state.cooledDownAt === 0 ? null : state.cooledDownAt + this.config.cooldownMs,
      lastUsedAt: state.lastUsedAt,
      lastAmountUsd: state.lastAmountUsd,
      observed: state.observed ? { ...state.observed } : null,
    }));
  }

  private freshObservation(
    bridge: string,
    sourceChain: string,
    destChain: string,
    token: string
  ): ObservedBridgeCost | null {
    const observed = this.routes.get(routeKey(bridge, sourceChain, destChain, token))?.observed;
    if (!observed || Date.now() - observed.observedAt > this.config.observedCostTtlMs) {
      return null;
    }
    return observed;
  }

  private state(bridge: string, sourceChain: string, destChain: string, token: string): RouteState {
    const key = routeKey(bridge, sourceChain, destChain, token);
    let state = this.routes.get(key);
    if (!state) {
      state = {
        bridge,
        sourceChain: sourceChain.toLowerCase(),
        destChain: destChain.toLowerCase(),
        token: token.toUpperCase(),
        consecutiveFailures: 0,
        cooledDownAt: 0,
        lastUsedAt: null,
        lastAmount: null,
        lastAmountUsd: null,
        observed: null,
      };
      this.routes.set(key, state);
    }
    return state;
  }
}

function routeKey(bridge: string, sourceChain: string, destChain: string, token: string): string {
  return `${bridge}:${sourceChain.toLowerCase()}->${destChain.toLowerCase()}:${token.toUpperCase()}`;
}
