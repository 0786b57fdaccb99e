import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  safeParseFloat,
  safeParseFloatBounded,
  safeParseIntBounded,
  safeParseBool,
} from '../../src/utils/env-parsing';

describe('env parsing', () => {
  let warnSpy: jest.SpiedFunction<typeof console.warn>;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it('safeParseFloat should return the default for missing or garbage values', () => {
    expect(safeParseFloat(undefined, 2)).toBe(2);
    expect(safeParseFloat('', 2)).toBe(2);
    expect(safeParseFloat('abc', 2)).toBe(2);
    expect(safeParseFloat('0', 2)).toBe(0);
  });

  it('safeParseFloatBounded should reject out-of-range values with a warning', () => {
    expect(safeParseFloatBounded('7', 1, 0, 5, 'X')).toBe(1);
    expect(warnSpy).toHaveBeenCalledWith('[CONFIG] Value for X (7) out of range [0, 5] - using default');
    expect(safeParseFloatBounded('4.5', 1, 0, 5)).toBe(4.5);
  });

  it('safeParseIntBounded should clamp to the minimum', () => {
    expect(safeParseIntBounded('-3', 10, 1, 'Y')).toBe(1);
    expect(safeParseIntBounded('oops', 10, 1, 'Y')).toBe(10);
    expect(warnSpy).toHaveBeenCalledTimes(2);
  });

  it('safeParseBool should accept only literal true and false', () => {
    expect(safeParseBool('true', false)).toBe(true);
    expect(safeParseBool('false', true)).toBe(false);
    expect(safeParseBool('yes', false)).toBe(false);
  });
});
