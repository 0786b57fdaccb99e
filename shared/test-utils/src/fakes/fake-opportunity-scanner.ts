/**
 * In-process OpportunityScanner that replays queued batches.
 */

import type { OpportunityInput, OpportunityScanner } from '@xarb/types';

export class FakeOpportunityScanner implements OpportunityScanner {
  scanCount = 0;

  private readonly batches: OpportunityInput[][] = [];
  private scanError: Error | null = null;

  /** Queue a batch for a later scan(); an empty queue yields [] */
  push(batch: OpportunityInput[]): this {
    this.batches.push(batch);
    return this;
  }

  failScans(error: Error | null = new Error('Scanner unavailable')): this {
    this.scanError = error;
    return this;
  }

  async scan(): Promise<OpportunityInput[]> {
    this.scanCount++;
    if (this.scanError) {
      throw this.scanError;
    }
    return this.batches.shift() ?? [];
  }
}
