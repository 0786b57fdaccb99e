/**
 * Opportunity normalization tests
 */

import { describe, it, expect } from '@jest/globals';
import { ValidationError } from '@xarb/core';
import { createOpportunityInput } from '@xarb/test-utils';
import {
  OPPORTUNITY_DEFAULTS,
  createOpportunity,
  isCrossChain,
  opportunityAgeMs,
  parseOpportunity,
  routeKey,
} from '../../src/opportunity';

describe('parseOpportunity', () => {
  it('should normalize casing and fill defaults', () => {
    const input = createOpportunityInput({
      token: 'usdc',
      buyChain: 'Arbitrum',
      sellChain: 'BASE',
      buyVenue: 'Uniswap_V3',
      volatility: undefined,
    });

    const parsed = parseOpportunity(input);

    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.opportunity.token).toBe('USDC');
    expect(parsed.opportunity.buyChain).toBe('arbitrum');
    expect(parsed.opportunity.sellChain).toBe('base');
    expect(parsed.opportunity.buyVenue).toBe('uniswap_v3');
    expect(parsed.opportunity.volatility).toBe(OPPORTUNITY_DEFAULTS.volatility);
    expect(parsed.opportunity.executionWindowMs).toBe(300_000);
    expect(parsed.opportunity.bridgeFeeUsd).toBe(0);
  });

  it('should freeze the normalized record', () => {
    const parsed = parseOpportunity(createOpportunityInput());

    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(Object.isFrozen(parsed.opportunity)).toBe(true);
  });

  it('should report the failing field and keep the id', () => {
    const parsed = parseOpportunity({ ...createOpportunityInput(), buyPrice: -1 });

    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.opportunityId).toBe('opp-1');
    expect(parsed.error).toContain('buyPrice');
  });

  it('should use "unknown" when the input has no id', () => {
    const parsed = parseOpportunity({ token: 'USDC' });

    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.opportunityId).toBe('unknown');
  });

  it('should reject non-objects', () => {
    expect(parseOpportunity(null).ok).toBe(false);
    expect(parseOpportunity('opp').ok).toBe(false);
  });
});

describe('createOpportunity', () => {
  it('should throw ValidationError for invalid input', () => {
    expect(() => createOpportunity({ id: 'bad' })).toThrow(ValidationError);
  });

  it('should return the parsed opportunity', () => {
    const opportunity = createOpportunity(createOpportunityInput({ grossProfitUsd: 12 }));
    expect(opportunity.grossProfitUsd).toBe(12);
  });
});

describe('route helpers', () => {
  it('should key routes by token and chain pair', () => {
    const opportunity = createOpportunity(createOpportunityInput());
    expect(routeKey(opportunity)).toBe('USDC:arbitrum->base');
    expect(isCrossChain(opportunity)).toBe(true);
  });

  it('should treat matching chains as same-chain', () => {
    const opportunity = createOpportunity(createOpportunityInput({ sellChain: 'arbitrum' }));
    expect(isCrossChain(opportunity)).toBe(false);
  });

  it('should never report a negative age', () => {
    const opportunity = createOpportunity(createOpportunityInput({ discoveredAt: 10_000 }));
    expect(opportunityAgeMs(opportunity, 12_500)).toBe(2_500);
    expect(opportunityAgeMs(opportunity, 9_000)).toBe(0);
  });
});
