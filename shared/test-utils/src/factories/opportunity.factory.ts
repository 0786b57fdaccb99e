/**
 * Opportunity Test Factory
 *
 * Builds scanner-shaped OpportunityInput records with defaults for a
 * USDC arbitrum -> base route that every fake collaborator supports.
 */

import type { OpportunityInput } from '@xarb/types';

export type OpportunityInputOverrides = Partial<OpportunityInput>;

let opportunityCounter = 0;

/**
 * Create an OpportunityInput. Ids are sequential (`opp-1`, `opp-2`, ...)
 * and reset before each test by the jest setup file.
 */
export function createOpportunityInput(overrides: OpportunityInputOverrides = {}): OpportunityInput {
  opportunityCounter++;

  return {
    id: `opp-${opportunityCounter}`,
    token: 'USDC',
    buyChain: 'arbitrum',
    sellChain: 'base',
    buyVenue: 'uniswap_v3',
    sellVenue: 'sushiswap',
    buyPrice: 0.998,
    sellPrice: 1.004,
    discoveredAt: Date.now(),
    grossProfitUsd: 8,
    volatility: 0.05,
    ...overrides,
  };
}

export function createOpportunityInputs(
  count: number,
  overrides: OpportunityInputOverrides = {}
): OpportunityInput[] {
  return Array.from({ length: count }, () => createOpportunityInput(overrides));
}

export function resetOpportunityFactory(): void {
  opportunityCounter = 0;
}
