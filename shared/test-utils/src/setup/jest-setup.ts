/**
 * Jest Setup File
 *
 * Runs before each test file (setupFilesAfterEnv in the root jest config).
 */

import { afterAll, afterEach, beforeAll, beforeEach, jest } from '@jest/globals';
import { resetLoggerCache } from '@xarb/core';
import { setupTestEnv, restoreEnv } from './env-setup';
import { resetOpportunityFactory } from '../factories/opportunity.factory';

beforeAll(() => {
  setupTestEnv();
});

beforeEach(() => {
  // Deterministic opportunity ids per test
  resetOpportunityFactory();
});

afterEach(() => {
  resetLoggerCache();
  jest.clearAllMocks();
  jest.useRealTimers();
});

afterAll(() => {
  restoreEnv();
});

if (process.env.DEBUG_TESTS === 'true') {
  jest.setTimeout(300000);
}

