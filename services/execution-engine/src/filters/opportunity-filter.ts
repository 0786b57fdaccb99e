/**
 * Opportunity Filter
 *
 * Staged, short-circuiting scorer deciding whether an opportunity is still
 * worth executing:
 *
 * 1. Freshness: stale opportunities and recently accepted routes are dropped
 * 2. Profit decay: gross profit shrinks with age, faster when volatile
 * 3. Execution speed: estimated from learned venue profiles
 * 4. Volatility fit
 * 5. Weighted priority
 *
 * Only the duplicate check is stateful, and only accepted opportunities are
 * remembered, so `assess()` of the same input is deterministic while venue
 * profiles are unchanged.
 */

import { FILTER_CONFIG, VENUE_PROFILES } from '@xarb/config';
import type { FilterConfig } from '@xarb/config';
import type { ILogger } from '@xarb/core';
import { ExecutionErrorCode, formatExecutionError } from '@xarb/types';
import type {
  FilterScores,
  FilterStage,
  FilterVerdict,
  Opportunity,
  VenueProfile,
} from '@xarb/types';
import { createServiceLogger } from '../types';

export interface RankedOpportunity {
  opportunity: Opportunity;
  verdict: FilterVerdict;
}

export interface RankResult {
  /** Accepted opportunities, highest priority first */
  accepted: RankedOpportunity[];
  /** Every verdict, in input order */
  verdicts: FilterVerdict[];
}

export interface FilterStats {
  evaluated: number;
  accepted: number;
  rejected: Record<FilterStage, number>;
  trackedKeys: number;
}

const EMPTY_SCORES: FilterScores = Object.freeze({ profit: 0, speed: 0, volatility: 0, freshness: 0 });

function createRejectionCounters(): Record<FilterStage, number> {
  return { freshness: 0, duplicate: 0, profit_decay: 0, execution_speed: 0, decision: 0 };
}

export class OpportunityFilter {
  private readonly config: FilterConfig;
  private readonly logger: ILogger;
  private readonly venueProfiles = new Map<string, VenueProfile>();
  /** Route key -> time last accepted; insertion order is eviction order */
  private readonly seen = new Map<string, number>();

  private evaluated = 0;
  private accepted = 0;
  private rejected = createRejectionCounters();

  constructor(
    config: Partial<FilterConfig> = {},
    logger?: ILogger,
    seedProfiles: Readonly<Record<string, Readonly<VenueProfile>>> = VENUE_PROFILES
  ) {
    this.config = { ...FILTER_CONFIG, ...config };
    this.logger = logger ?? createServiceLogger('opportunity-filter');
    for (const [venue, profile] of Object.entries(seedProfiles)) {
      this.venueProfiles.set(venue.toLowerCase(), { ...profile });
    }
  }

  /**
   * Score an opportunity, apply the duplicate check, and remember it when
   * accepted.
   */
  filter(opportunity: Opportunity, now: number = Date.now()): FilterVerdict {
    const verdict = this.evaluate(opportunity, now, true);

    this.evaluated++;
    if (verdict.shouldExecute) {
      this.accepted++;
      this.markSeen(this.duplicateKey(opportunity), now);
    } else if (verdict.rejectedAt) {
      this.rejected[verdict.rejectedAt]++;
    }

    this.logger.debug('Opportunity filtered', {
      opportunityId: opportunity.id,
      shouldExecute: verdict.shouldExecute,
      priorityScore: verdict.priorityScore,
      rejectedAt: verdict.rejectedAt,
    });

    return verdict;
  }

  /**
   * Score without touching filter state (no duplicate check, no counters).
   */
  assess(opportunity: Opportunity, now: number = Date.now()): FilterVerdict {
    return this.evaluate(opportunity, now, false);
  }

  /**
   * Filter a batch. Input order decides which of two same-route
   * opportunities counts as the duplicate.
   */
  rank(batch: readonly Opportunity[], now: number = Date.now()): RankResult {
    const verdicts: FilterVerdict[] = [];
    const accepted: RankedOpportunity[] = [];

    for (const opportunity of batch) {
      const verdict = this.filter(opportunity, now);
      verdicts.push(verdict);
      if (verdict.shouldExecute) {
        accepted.push({ opportunity, verdict });
      }
    }

    accepted.sort((a, b) =>
      b.verdict.priorityScore - a.verdict.priorityScore ||
      b.verdict.adjustedProfitUsd - a.verdict.adjustedProfitUsd
    );

    return { accepted, verdicts };
  }

  /**
   * Fold an observed execution into the venue's profile.
   */
  recordVenueExecution(venue: string, executionTimeSec: number, success: boolean): VenueProfile {
    const key = venue.toLowerCase();
    const current = this.venueProfiles.get(key) ?? { ...this.config.unknownVenue };
    const { learningRate, reliabilityStepUp, reliabilityStepDown, minReliability, maxReliability } = this.config;

    const updated: VenueProfile = {
      avgExecutionTimeSec: (1 - learningRate) * current.avgExecutionTimeSec + learningRate * executionTimeSec,
      reliability: Math.min(
        maxReliability,
        Math.max(minReliability, current.reliability + (success ? reliabilityStepUp : -reliabilityStepDown))
      ),
    };
    this.venueProfiles.set(key, updated);
    return { ...updated };
  }

  getVenueProfile(venue: string): VenueProfile {
    const profile = this.venueProfiles.get(venue.toLowerCase()) ?? this.config.unknownVenue;
    return { ...profile };
  }

  getStats(): FilterStats {
    return {
      evaluated: this.evaluated,
      accepted: this.accepted,
      rejected: { ...this.rejected },
      trackedKeys: this.seen.size,
    };
  }

  /** Forget seen routes and counters. Venue profiles are kept. */
  reset(): void {
    this.seen.clear();
    this.evaluated = 0;
    this.accepted = 0;
    this.rejected = createRejectionCounters();
  }

  // ===========================================================================
  // Stages
  // ===========================================================================

  private evaluate(opportunity: Opportunity, now: number, checkDuplicates: boolean): FilterVerdict {
    const cfg = this.config;
    const ageSec = Math.max(0, (now - opportunity.discoveredAt) / 1000);

    // Stage 1: freshness
    if (ageSec > cfg.maxAgeSec) {
      return this.reject(
        opportunity,
        'freshness',
        formatExecutionError(ExecutionErrorCode.STALE, `age ${ageSec.toFixed(1)}s exceeds ${cfg.maxAgeSec}s`)
      );
    }

    if (checkDuplicates) {
      const lastSeen = this.seen.get(this.duplicateKey(opportunity));
      if (lastSeen !== undefined && now - lastSeen < cfg.duplicateWindowSec * 1000) {
        return this.reject(
          opportunity,
          'duplicate',
          formatExecutionError(
            ExecutionErrorCode.DUPLICATE,
            `${this.duplicateKey(opportunity)} accepted ${((now - lastSeen) / 1000).toFixed(1)}s ago`
          )
        );
      }
    }

    // Stage 2: profit decay
    const profitDecayFactor = this.decayFactor(ageSec, opportunity.volatility);
    const adjustedProfitUsd = opportunity.grossProfitUsd * profitDecayFactor;
    if (adjustedProfitUsd < cfg.minProfitAfterDecayUsd) {
      return this.reject(
        opportunity,
        'profit_decay',
        formatExecutionError(
          ExecutionErrorCode.UNPROFITABLE,
          `decayed profit $${adjustedProfitUsd.toFixed(2)} below $${cfg.minProfitAfterDecayUsd}`
        ),
        { profitDecayFactor, adjustedProfitUsd }
      );
    }

    // Stage 3: execution speed
    const buy = this.getVenueProfile(opportunity.buyVenue);
    const sell = this.getVenueProfile(opportunity.sellVenue);
    const estimatedExecutionTimeSec = buy.avgExecutionTimeSec + sell.avgExecutionTimeSec + cfg.executionOverheadSec;
    if (estimatedExecutionTimeSec > cfg.maxExecutionTimeSec) {
      return this.reject(
        opportunity,
        'execution_speed',
        `Estimated execution ${estimatedExecutionTimeSec.toFixed(1)}s exceeds ${cfg.maxExecutionTimeSec}s`,
        { profitDecayFactor, adjustedProfitUsd, estimatedExecutionTimeSec }
      );
    }
    const avgReliability = (buy.reliability + sell.reliability) / 2;
    const speed = Math.max(0, 1 - estimatedExecutionTimeSec / cfg.speedScoreHorizonSec) * avgReliability;

    // Stage 4: volatility fit
    const volatility = this.volatilityScore(opportunity.volatility);

    // Stage 5: priority
    const scores: FilterScores = {
      profit: Math.min(1, adjustedProfitUsd / cfg.profitScoreCapUsd),
      speed,
      volatility,
      freshness: Math.max(0, 1 - ageSec / cfg.maxAgeSec),
    };
    const priorityScore =
      cfg.weights.profit * scores.profit +
      cfg.weights.speed * scores.speed +
      cfg.weights.volatility * scores.volatility +
      cfg.weights.freshness * scores.freshness;

    const failures: string[] = [];
    if (priorityScore < cfg.minPriorityScore) {
      failures.push(`priority ${priorityScore.toFixed(3)} < ${cfg.minPriorityScore}`);
    }
    if (speed < cfg.minSpeedScore) {
      failures.push(`speed score ${speed.toFixed(3)} < ${cfg.minSpeedScore}`);
    }

    const base = {
      opportunityId: opportunity.id,
      priorityScore,
      estimatedExecutionTimeSec,
      profitDecayFactor,
      adjustedProfitUsd,
      scores,
    };

    if (failures.length > 0) {
      return { ...base, shouldExecute: false, reason: failures.join('; '), rejectedAt: 'decision' };
    }

    return {
      ...base,
      shouldExecute: true,
      reason: `priority ${priorityScore.toFixed(3)}, adjusted profit $${adjustedProfitUsd.toFixed(2)}`,
    };
  }

  /**
   * max(minDecayFactor, 1 - baseRate * (1 + multiplier * volatility) * age)
   */
  private decayFactor(ageSec: number, volatility: number): number {
    const { baseDecayRate, volatilityDecayMultiplier, minDecayFactor } = this.config;
    const decayRate = baseDecayRate * (1 + volatilityDecayMultiplier * volatility);
    return Math.max(minDecayFactor, 1 - decayRate * ageSec);
  }

  private volatilityScore(volatility: number): number {
    const cfg = this.config;
    if (volatility < cfg.optimalVolatilityMin) {
      return cfg.lowVolatilityScore;
    }
    if (volatility <= cfg.optimalVolatilityMax) {
      return 1;
    }
    return Math.max(
      cfg.minHighVolatilityScore,
      1 - (volatility - cfg.optimalVolatilityMax) * cfg.highVolatilityPenalty
    );
  }

  private reject(
    opportunity: Opportunity,
    stage: FilterStage,
    reason: string,
    partial: Partial<Pick<FilterVerdict, 'profitDecayFactor' | 'adjustedProfitUsd' | 'estimatedExecutionTimeSec'>> = {}
  ): FilterVerdict {
    return {
      opportunityId: opportunity.id,
      shouldExecute: false,
      reason,
      priorityScore: 0,
      estimatedExecutionTimeSec: partial.estimatedExecutionTimeSec ?? 0,
      profitDecayFactor: partial.profitDecayFactor ?? 0,
      adjustedProfitUsd: partial.adjustedProfitUsd ?? 0,
      rejectedAt: stage,
      scores: { ...EMPTY_SCORES },
    };
  }

  private duplicateKey(opportunity: Opportunity): string {
    return `${opportunity.token}:${opportunity.buyVenue}:${opportunity.sellVenue}`;
  }

  private markSeen(key: string, now: number): void {
    this.seen.delete(key);
    this.seen.set(key, now);
    while (this.seen.size > this.config.maxTrackedKeys) {
      const oldest = this.seen.keys().next();
      if (oldest.done) break;
      this.seen.delete(oldest.value);
    }
  }
}
