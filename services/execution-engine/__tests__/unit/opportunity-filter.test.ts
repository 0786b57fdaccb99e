/**
 * OpportunityFilter tests
 *
 * Stage-by-stage rejection, priority scoring, duplicate suppression and
 * venue profile learning.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { RecordingLogger } from '@xarb/core';
import type { Opportunity } from '@xarb/types';
import { createOpportunityInput } from '@xarb/test-utils';
import type { OpportunityInputOverrides } from '@xarb/test-utils';
import { OpportunityFilter } from '../../src/filters/opportunity-filter';
import { createOpportunity } from '../../src/opportunity';

const NOW = 1_700_000_000_000;

function opportunity(overrides: OpportunityInputOverrides = {}): Opportunity {
  return createOpportunity(createOpportunityInput({ discoveredAt: NOW, ...overrides }));
}

describe('OpportunityFilter', () => {
  let logger: RecordingLogger;
  let filter: OpportunityFilter;

  beforeEach(() => {
    logger = new RecordingLogger();
    filter = new OpportunityFilter({}, logger);
  });

  describe('freshness', () => {
    it('should reject an opportunity older than maxAgeSec', () => {
      const strict = new OpportunityFilter({ maxAgeSec: 15 }, logger);

      const verdict = strict.filter(opportunity(), NOW + 20_000);

      expect(verdict.shouldExecute).toBe(false);
      expect(verdict.rejectedAt).toBe('freshness');
      expect(verdict.reason).toBe('[ERR_STALE] Opportunity too old: age 20.0s exceeds 15s');
      expect(verdict.priorityScore).toBe(0);
    });

    it('should reject a route accepted within the duplicate window', () => {
      expect(filter.filter(opportunity(), NOW).shouldExecute).toBe(true);

      const verdict = filter.filter(opportunity(), NOW + 1_000);

      expect(verdict.rejectedAt).toBe('duplicate');
      expect(verdict.reason).toBe(
        '[ERR_DUPLICATE] Opportunity already seen: USDC:uniswap_v3:sushiswap accepted 1.0s ago'
      );
    });

    it('should accept the route again once the window has passed', () => {
      filter.filter(opportunity(), NOW);

      const verdict = filter.filter(opportunity({ discoveredAt: NOW + 6_000 }), NOW + 6_000);

      expect(verdict.shouldExecute).toBe(true);
    });

    it('should not remember rejected opportunities', () => {
      filter.filter(opportunity({ grossProfitUsd: 0.5 }), NOW);

      expect(filter.filter(opportunity(), NOW).shouldExecute).toBe(true);
    });

    it('should evict the oldest route beyond maxTrackedKeys', () => {
      const small = new OpportunityFilter({ maxTrackedKeys: 2 }, logger);
      small.filter(opportunity({ sellVenue: 'sushiswap' }), NOW);
      small.filter(opportunity({ sellVenue: 'uniswap_v3' }), NOW);
      small.filter(opportunity({ sellVenue: 'camelot', grossProfitUsd: 20 }), NOW);

      expect(small.getStats().trackedKeys).toBe(2);
      expect(small.filter(opportunity({ sellVenue: 'sushiswap' }), NOW).shouldExecute).toBe(true);
    });
  });

  describe('profit decay', () => {
    it('should leave a fresh opportunity undecayed', () => {
      const verdict = filter.assess(opportunity(), NOW);

      expect(verdict.profitDecayFactor).toBe(1);
      expect(verdict.adjustedProfitUsd).toBe(8);
    });

    it('should decay faster with volatility', () => {
      const calm = filter.assess(opportunity({ volatility: 0.02 }), NOW + 4_000);
      const wild = filter.assess(opportunity({ volatility: 0.1 }), NOW + 4_000);

      // 1 - 0.05 * (1 + 10 * v) * 4
      expect(calm.profitDecayFactor).toBeCloseTo(0.76, 10);
      expect(wild.profitDecayFactor).toBeCloseTo(0.6, 10);
    });

    it('should never increase with age', () => {
      const factors: number[] = [];
      for (let ageSec = 0; ageSec <= 20; ageSec++) {
        factors.push(filter.assess(opportunity({ grossProfitUsd: 500 }), NOW + ageSec * 1_000).profitDecayFactor);
      }

      for (let i = 1; i < factors.length; i++) {
        expect(factors[i]).toBeLessThanOrEqual(factors[i - 1]);
      }
      expect(factors[20]).toBe(0.1);
    });

    it('should reject when the decayed profit falls below the minimum', () => {
      const verdict = filter.filter(opportunity({ grossProfitUsd: 3 }), NOW + 10_000);

      expect(verdict.rejectedAt).toBe('profit_decay');
      expect(verdict.reason).toBe(
        '[ERR_UNPROFITABLE] Profit below threshold after costs: decayed profit $0.75 below $1'
      );
      expect(verdict.adjustedProfitUsd).toBeCloseTo(0.75, 10);
    });
  });

  describe('execution speed', () => {
    it('should estimate from both venue profiles plus overhead', () => {
      const verdict = filter.assess(opportunity(), NOW);

      // uniswap_v3 2.5s + sushiswap 3.0s + 2.0s overhead
      expect(verdict.estimatedExecutionTimeSec).toBe(7.5);
      // (1 - 7.5 / 20) * (0.95 + 0.9) / 2
      expect(verdict.scores.speed).toBeCloseTo(0.578125, 10);
    });

    it('should reject venues too slow to execute in time', () => {
      const verdict = filter.filter(opportunity({ buyVenue: 'newdex', sellVenue: 'otherdex' }), NOW);

      expect(verdict.rejectedAt).toBe('execution_speed');
      expect(verdict.reason).toBe('Estimated execution 18.0s exceeds 15s');
    });
  });

  describe('volatility fit', () => {
    it('should give full marks inside the optimal band', () => {
      expect(filter.assess(opportunity({ volatility: 0.05 }), NOW).scores.volatility).toBe(1);
    });

    it('should score low volatility at the flat low score', () => {
      expect(filter.assess(opportunity({ volatility: 0.01 }), NOW).scores.volatility).toBe(0.6);
    });

    it('should penalize volatility above the band', () => {
      // 1 - (0.3 - 0.15) * 5
      expect(filter.assess(opportunity({ volatility: 0.3 }), NOW).scores.volatility).toBeCloseTo(0.25, 10);
      expect(filter.assess(opportunity({ volatility: 0.9 }), NOW).scores.volatility).toBe(0.2);
    });
  });

  describe('priority decision', () => {
    it('should accept a fresh opportunity with the weighted score', () => {
      const verdict = filter.filter(opportunity(), NOW);

      // 0.4 * 0.16 + 0.3 * 0.578125 + 0.2 * 1 + 0.1 * 1
      expect(verdict.shouldExecute).toBe(true);
      expect(verdict.priorityScore).toBeCloseTo(0.5374375, 10);
      expect(verdict.rejectedAt).toBeUndefined();
      expect(verdict.reason).toBe('priority 0.537, adjusted profit $8.00');
    });

    it('should reject a priority below the minimum', () => {
      const verdict = filter.filter(opportunity(), NOW + 10_000);

      expect(verdict.shouldExecute).toBe(false);
      expect(verdict.rejectedAt).toBe('decision');
      expect(verdict.reason).toBe('priority 0.456 < 0.5');
    });

    it('should give identical verdicts for repeated assessments', () => {
      const opp = opportunity();

      expect(filter.assess(opp, NOW + 2_000)).toEqual(filter.assess(opp, NOW + 2_000));
    });
  });

  describe('rank', () => {
    it('should order accepted opportunities by priority', () => {
      const small = opportunity({ grossProfitUsd: 8 });
      const large = opportunity({ grossProfitUsd: 20, sellVenue: 'uniswap_v3' });
      const stale = opportunity({ discoveredAt: NOW - 60_000 });

      const ranked = filter.rank([small, large, stale], NOW);

      expect(ranked.accepted.map((r) => r.opportunity.id)).toEqual([large.id, small.id]);
      expect(ranked.verdicts.map((v) => v.opportunityId)).toEqual([small.id, large.id, stale.id]);
      expect(ranked.verdicts[2].rejectedAt).toBe('freshness');
    });

    it('should treat the later of two same-route opportunities as the duplicate', () => {
      const first = opportunity();
      const second = opportunity({ grossProfitUsd: 30 });

      const ranked = filter.rank([first, second], NOW);

      expect(ranked.accepted.map((r) => r.opportunity.id)).toEqual([first.id]);
      expect(ranked.verdicts[1].rejectedAt).toBe('duplicate');
    });
  });

  describe('venue learning', () => {
    it('should move execution time by the learning rate and step reliability', () => {
      const profile = filter.recordVenueExecution('Uniswap_V3', 5, true);

      // 0.8 * 2.5 + 0.2 * 5
      expect(profile.avgExecutionTimeSec).toBeCloseTo(3, 10);
      expect(profile.reliability).toBeCloseTo(0.96, 10);
      expect(filter.getVenueProfile('uniswap_v3')).toEqual(profile);
    });

    it('should start unknown venues from the default profile', () => {
      const profile = filter.recordVenueExecution('newdex', 3, false);

      expect(profile.avgExecutionTimeSec).toBeCloseTo(7, 10);
      expect(profile.reliability).toBeCloseTo(0.45, 10);
    });

    it('should clamp reliability to its bounds', () => {
      for (let i = 0; i < 30; i++) {
        filter.recordVenueExecution('sushiswap', 3, false);
      }
      expect(filter.getVenueProfile('sushiswap').reliability).toBe(0.1);

      for (let i = 0; i < 200; i++) {
        filter.recordVenueExecution('sushiswap', 3, true);
      }
      expect(filter.getVenueProfile('sushiswap').reliability).toBe(0.99);
    });

    it('should not let callers mutate stored profiles', () => {
      const profile = filter.getVenueProfile('uniswap_v3');
      profile.reliability = 0;

      expect(filter.getVenueProfile('uniswap_v3').reliability).toBe(0.95);
    });
  });

  describe('stats', () => {
    it('should count evaluations by stage and reset them', () => {
      filter.filter(opportunity(), NOW);
      filter.filter(opportunity(), NOW);
      filter.filter(opportunity({ discoveredAt: NOW - 60_000 }), NOW);

      expect(filter.getStats()).toEqual({
        evaluated: 3,
        accepted: 1,
        rejected: { freshness: 1, duplicate: 1, profit_decay: 0, execution_speed: 0, decision: 0 },
        trackedKeys: 1,
      });

      filter.reset();
      expect(filter.getStats().evaluated).toBe(0);
      expect(filter.getStats().trackedKeys).toBe(0);
    });

    it('should not count assess() calls', () => {
      filter.assess(opportunity(), NOW);
      expect(filter.getStats().evaluated).toBe(0);
    });
  });
});
