/**
 * Async helpers for fake-timer tests.
 */

/**
 * Let pending promise callbacks run. Under fake timers an awaited chain
 * settles through several microtask hops before its next timer exists.
 */
export async function flushPromises(rounds = 20): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}

/**
 * Deterministic 32-byte hash for a sequence number.
 */
export function fakeTxHash(id: number): string {
  return `0x${id.toString(16).padStart(64, '0')}`;
}

/**
 * Deterministic 20-byte address with a readable prefix.
 */
export function fakeAddress(prefix: string, id = 1): string {
  const hexPrefix = Buffer.from(prefix).toString('hex');
  return `0x${hexPrefix}${id.toString(16).padStart(40 - hexPrefix.length, '0')}`.slice(0, 42);
}
