/**
 * Test Utilities for the Execution Core
 *
 * In-process fakes of every external collaborator, an opportunity factory
 * and environment helpers. Nothing here opens a socket.
 *
 * ```typescript
 * import {
 *   createCollaboratorHarness,
 *   createOpportunityInput,
 *   FakeBridgeProvider,
 *   withEnv,
 * } from '@xarb/test-utils';
 * ```
 */

// Fakes
export * from './fakes';

// Harnesses
export { createCollaboratorHarness } from './harnesses/collaborator-harness';
export type { CollaboratorHarness, CollaboratorHarnessOptions } from './harnesses/collaborator-harness';

// Factories
export {
  createOpportunityInput,
  createOpportunityInputs,
  resetOpportunityFactory,
} from './factories/opportunity.factory';
export type { OpportunityInputOverrides } from './factories/opportunity.factory';

// Helpers
export { flushPromises, fakeTxHash, fakeAddress } from './helpers/async-helpers';
export { setupTestEnv, restoreEnv, withEnv } from './setup/env-setup';
export type { TestEnvironment } from './setup/env-setup';
