/**
 * Opportunity normalization
 *
 * Scanner output is validated and normalized exactly once. Downstream code
 * reads the frozen record without fallbacks.
 */

import { OpportunityInputSchema, validateWithDetails } from '@xarb/config';
import { ValidationError } from '@xarb/core';
import type { Opportunity } from '@xarb/types';

export const OPPORTUNITY_DEFAULTS = Object.freeze({
  volatility: 0.05,
  executionWindowMs: 5 * 60 * 1000,
  bridgeFeeUsd: 0,
});

export type OpportunityParseResult =
  | { ok: true; opportunity: Opportunity }
  | { ok: false; opportunityId: string; error: string };

/**
 * Validate scanner output and build a frozen Opportunity. Chains and venues
 * are lowercased, the token symbol uppercased.
 */
export function parseOpportunity(input: unknown): OpportunityParseResult {
  const validation = validateWithDetails(OpportunityInputSchema, input);

  if (!validation.success || !validation.data) {
    const detail = (validation.errors ?? [])
      .map((e) => (e.path ? `${e.path}: ${e.message}` : e.message))
      .join('; ');
    return { ok: false, opportunityId: extractId(input), error: detail || 'invalid opportunity' };
  }

  const data = validation.data;
  const opportunity: Opportunity = Object.freeze({
    id: data.id,
    token: data.token.toUpperCase(),
    buyChain: data.buyChain.toLowerCase(),
    sellChain: data.sellChain.toLowerCase(),
    buyVenue: data.buyVenue.toLowerCase(),
    sellVenue: data.sellVenue.toLowerCase(),
    buyPrice: data.buyPrice,
    sellPrice: data.sellPrice,
    discoveredAt: data.discoveredAt,
    grossProfitUsd: data.grossProfitUsd,
    volatility: data.volatility ?? OPPORTUNITY_DEFAULTS.volatility,
    executionWindowMs: data.executionWindowMs ?? OPPORTUNITY_DEFAULTS.executionWindowMs,
    bridgeFeeUsd: data.bridgeFeeUsd ?? OPPORTUNITY_DEFAULTS.bridgeFeeUsd,
  });

  return { ok: true, opportunity };
}

/**
 * Like parseOpportunity, but throws.
 *
 * @throws ValidationError when the input does not describe an opportunity
 */
export function createOpportunity(input: unknown): Opportunity {
  const parsed = parseOpportunity(input);
  if (!parsed.ok) {
    throw new ValidationError(`Invalid opportunity ${parsed.opportunityId}: ${parsed.error}`, {
      field: 'opportunity',
      context: { opportunityId: parsed.opportunityId },
    });
  }
  return parsed.opportunity;
}

export function isCrossChain(opportunity: Opportunity): boolean {
  return opportunity.buyChain !== opportunity.sellChain;
}

/**
 * Key identifying a token moving between two chains. At most one execution
 * per route is in flight.
 */
export function routeKey(opportunity: Opportunity): string {
  return `${opportunity.token}:${opportunity.buyChain}->${opportunity.sellChain}`;
}

export function opportunityAgeMs(opportunity: Opportunity, now: number = Date.now()): number {
  return Math.max(0, now - opportunity.discoveredAt);
}

function extractId(input: unknown): string {
  if (typeof input === 'object' && input !== null && 'id' in input && typeof input.id === 'string' && input.id) {
    return input.id;
  }
  return 'unknown';
}
