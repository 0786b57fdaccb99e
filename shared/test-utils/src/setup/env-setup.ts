/**
 * Test Environment Setup
 *
 * Isolated environment variable management for tests. Config objects read
 * process.env when built, so tests that exercise env parsing go through
 * `withEnv` instead of mutating process.env directly.
 */

const originalEnv: NodeJS.ProcessEnv = { ...process.env };

export interface TestEnvironment {
  NODE_ENV: string;
  LOG_LEVEL: string;
  LOG_FORMAT: string;
  [key: string]: string;
}

const defaultTestEnv: TestEnvironment = {
  NODE_ENV: 'test',
  // Keep test output quiet; RecordingLogger is used for assertions
  LOG_LEVEL: 'error',
  LOG_FORMAT: 'json',
};

/**
 * Apply the default test environment plus optional overrides.
 */
export function setupTestEnv(overrides: Partial<TestEnvironment> = {}): void {
  const env = { ...defaultTestEnv, ...overrides };

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      process.env[key] = value;
    }
  }
}

/**
 * Restore the environment captured when this module loaded.
 */
export function restoreEnv(): void {
  for (const key of Object.keys(process.env)) {
    if (!(key in originalEnv)) {
      delete process.env[key];
    }
  }
  Object.assign(process.env, originalEnv);
}

/**
 * Run `fn` with temporary environment changes. An `undefined` value unsets
 * the variable for the duration of the call.
 */
export async function withEnv<T>(
  envOverrides: Record<string, string | undefined>,
  fn: () => T | Promise<T>
): Promise<T> {
  const backup: Record<string, string | undefined> = {};

  for (const [key, value] of Object.entries(envOverrides)) {
    backup[key] = process.env[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  try {
    return await fn();
  } finally {
    for (const [key, value] of Object.entries(backup)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}
