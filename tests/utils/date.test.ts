import { describe, it, expect } from 'vitest';
import { parseExpiry, daysToExpiry, daysToYears, timeToExpiryYears } from '../../src/utils/date.js';
import { InvalidInputError } from '../../src/core/errors.js';

describe('date utilities', () => {
  it('parses yyyy-MM-dd expiries', () => {
    const expiry = parseExpiry('2024-03-15');
    expect(expiry.getFullYear()).toBe(2024);
    expect(expiry.getMonth()).toBe(2);
    expect(expiry.getDate()).toBe(15);
  });

  it('rejects other formats', () => {
    expect(() => parseExpiry('15/03/2024')).toThrow(InvalidInputError);
    expect(() => parseExpiry('2024-02-30')).toThrow(InvalidInputError);
  });

  it('counts calendar days across a leap February', () => {
    expect(daysToExpiry(new Date(2024, 2, 15, 9, 30), new Date(2024, 1, 2, 16, 0))).toBe(42);
  });

  it('goes negative after expiry', () => {
    expect(daysToExpiry(new Date(2024, 0, 1), new Date(2024, 0, 5))).toBe(-4);
  });

  it('converts days to years', () => {
    expect(daysToYears(730).toNumber()).toBe(2);
    expect(daysToYears(90, 360).toNumber()).toBe(0.25);
  });

  it('computes time to expiry in years', () => {
    const t = timeToExpiryYears(new Date(2024, 2, 15), new Date(2024, 1, 2));
    expect(t.toNumber()).toBeCloseTo(42 / 365, 12);
  });
});
