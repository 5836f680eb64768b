/**
 * Tests for number utilities
 */

import { isFiniteNumber, isInteger, roundTo } from './index';

describe('isFiniteNumber', () => {
  it('should accept finite numbers', () => {
    expect(isFiniteNumber(0)).toBe(true);
    expect(isFiniteNumber(-12.5)).toBe(true);
  });

  it('should reject NaN and Infinity', () => {
    expect(isFiniteNumber(NaN)).toBe(false);
    expect(isFiniteNumber(Infinity)).toBe(false);
    expect(isFiniteNumber(-Infinity)).toBe(false);
  });

  it('should not coerce strings or null', () => {
    expect(isFiniteNumber('5')).toBe(false);
    expect(isFiniteNumber(null)).toBe(false);
    expect(isFiniteNumber(undefined)).toBe(false);
  });
});

describe('isInteger', () => {
  it('should accept whole numbers', () => {
    expect(isInteger(3600)).toBe(true);
    expect(isInteger(-1)).toBe(true);
  });

  it('should reject fractions and non-numbers', () => {
    expect(isInteger(1.5)).toBe(false);
    expect(isInteger('3')).toBe(false);
    expect(isInteger(NaN)).toBe(false);
  });
});

describe('roundTo', () => {
  it('should round to the requested decimals', () => {
    expect(roundTo(4.2345, 2)).toBe(4.23);
    expect(roundTo(4.235, 1)).toBe(4.2);
    expect(roundTo(-2.75, 0)).toBe(-3);
  });
});
