/**
 * Opportunity Filter Configuration
 *
 * Thresholds and weights for the staged opportunity filter, and the seed
 * execution profiles of known venues.
 */

import type { VenueProfile } from '@xarb/types';
import venueData from './data/venue-profiles.json';
import { VenueProfilesSchema, validateOrThrow } from './schemas';
import { safeParseFloatBounded, safeParseIntBounded } from './utils/env-parsing';

export interface PriorityWeights {
  profit: number;
  speed: number;
  volatility: number;
  freshness: number;
}

export interface FilterConfig {
  /** Opportunities older than this are stale */
  maxAgeSec: number;
  /** Window in which the same route counts as a duplicate */
  duplicateWindowSec: number;
  /** Seen-map capacity; oldest keys are evicted first */
  maxTrackedKeys: number;

  /** Decay per second before the volatility multiplier */
  baseDecayRate: number;
  volatilityDecayMultiplier: number;
  minDecayFactor: number;
  minProfitAfterDecayUsd: number;

  /** Fixed overhead added to both venues' execution times */
  executionOverheadSec: number;
  maxExecutionTimeSec: number;
  /** Execution time at which the speed score reaches zero */
  speedScoreHorizonSec: number;
  minSpeedScore: number;
  unknownVenue: VenueProfile;

  optimalVolatilityMin: number;
  optimalVolatilityMax: number;
  lowVolatilityScore: number;
  highVolatilityPenalty: number;
  minHighVolatilityScore: number;

  /** Profit at which the profit score saturates */
  profitScoreCapUsd: number;
  weights: PriorityWeights;
  minPriorityScore: number;

  /** EMA learning rate for venue execution times */
  learningRate: number;
  reliabilityStepUp: number;
  reliabilityStepDown: number;
  minReliability: number;
  maxReliability: number;
}

export function buildFilterConfig(env: NodeJS.ProcessEnv = process.env): FilterConfig {
  return {
    maxAgeSec: safeParseFloatBounded(env.FILTER_MAX_AGE_SEC, 30, 1, 3600, 'FILTER_MAX_AGE_SEC'),
    duplicateWindowSec: 5,
    maxTrackedKeys: safeParseIntBounded(env.FILTER_MAX_TRACKED_KEYS, 1000, 10, 'FILTER_MAX_TRACKED_KEYS'),

    baseDecayRate: 0.05,
    volatilityDecayMultiplier: 10,
    minDecayFactor: 0.1,
    minProfitAfterDecayUsd: safeParseFloatBounded(
      env.FILTER_MIN_PROFIT_AFTER_DECAY_USD, 1.0, 0, 10_000, 'FILTER_MIN_PROFIT_AFTER_DECAY_USD'
    ),

    executionOverheadSec: 2.0,
    maxExecutionTimeSec: 15,
    speedScoreHorizonSec: 20,
    minSpeedScore: 0.3,
    unknownVenue: { avgExecutionTimeSec: 8.0, reliability: 0.5 },

    optimalVolatilityMin: 0.02,
    optimalVolatilityMax: 0.15,
    lowVolatilityScore: 0.6,
    highVolatilityPenalty: 5,
    minHighVolatilityScore: 0.2,

    profitScoreCapUsd: 50,
    weights: { profit: 0.4, speed: 0.3, volatility: 0.2, freshness: 0.1 },
    minPriorityScore: 0.5,

    learningRate: 0.2,
    reliabilityStepUp: 0.01,
    reliabilityStepDown: 0.05,
    minReliability: 0.1,
    maxReliability: 0.99,
  };
}

export const FILTER_CONFIG: Readonly<FilterConfig> = Object.freeze(buildFilterConfig());

/**
 * Seed venue profiles. Callers copy these before mutating.
 */
export const VENUE_PROFILES: Readonly<Record<string, Readonly<VenueProfile>>> = Object.freeze(
  validateOrThrow(VenueProfilesSchema, venueData, 'venue-profiles.json')
);
