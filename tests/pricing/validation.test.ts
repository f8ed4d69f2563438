import { describe, it, expect } from 'vitest';
import { parseMarketInputs, ensureFinite, assertValidMarketInputs } from '../../src/pricing/validation.js';
import { InvalidInputError, NumericDegenerateError } from '../../src/core/errors.js';
import { Decimal } from '../../src/utils/decimal.js';
import { makeInputs, thrownBy } from '../fixtures.js';

describe('parseMarketInputs', () => {
  it('accepts numbers and numeric strings', () => {
    const inputs = parseMarketInputs({
      spot: '819.42',
      strike: 1020,
      riskFreeRate: '0',
      timeToExpiry: 0.5,
      volatility: ' 0.3 ',
    });

    expect(inputs.spot.toString()).toBe('819.42');
    expect(inputs.strike.toString()).toBe('1020');
    expect(inputs.riskFreeRate.isZero()).toBe(true);
    expect(inputs.timeToExpiry.toString()).toBe('0.5');
    expect(inputs.volatility.toString()).toBe('0.3');
  });

  it('accepts a negative rate', () => {
    const inputs = parseMarketInputs({ spot: 100, strike: 100, riskFreeRate: -0.02, timeToExpiry: 1, volatility: 0.2 });
    expect(inputs.riskFreeRate.toNumber()).toBe(-0.02);
  });

  it('rejects non-numeric text', () => {
    const error = thrownBy(() =>
      parseMarketInputs({ spot: 'abc', strike: 100, riskFreeRate: 0, timeToExpiry: 1, volatility: 0.2 })
    );
    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error).toMatchObject({ field: 'spot' });
  });

  it('rejects a missing field', () => {
    const error = thrownBy(() => parseMarketInputs({ spot: 100, strike: 100, riskFreeRate: 0, timeToExpiry: 1 }));
    expect(error).toMatchObject({ field: 'volatility', code: 'INVALID_INPUT' });
  });

  it('rejects zero volatility and zero time', () => {
    expect(() =>
      parseMarketInputs({ spot: 100, strike: 100, riskFreeRate: 0, timeToExpiry: 1, volatility: 0 })
    ).toThrow(InvalidInputError);
    expect(() =>
      parseMarketInputs({ spot: 100, strike: 100, riskFreeRate: 0, timeToExpiry: '0', volatility: 0.2 })
    ).toThrow(InvalidInputError);
  });

  it('rejects infinite values', () => {
    expect(() =>
      parseMarketInputs({ spot: Infinity, strike: 100, riskFreeRate: 0, timeToExpiry: 1, volatility: 0.2 })
    ).toThrow(InvalidInputError);
  });

  it('rejects something that is not an object', () => {
    expect(thrownBy(() => parseMarketInputs(null))).toMatchObject({ field: 'inputs' });
  });
});

describe('assertValidMarketInputs', () => {
  it('passes valid inputs', () => {
    expect(() => assertValidMarketInputs(makeInputs(100, 90, 0.01, 0.25, 0.3))).not.toThrow();
  });

  it('rejects a negative strike', () => {
    expect(() => assertValidMarketInputs(makeInputs(100, -90, 0.01, 0.25, 0.3))).toThrow(
      'Invalid input strike: must be greater than zero, got -90'
    );
  });
});

describe('ensureFinite', () => {
  it('returns finite values unchanged', () => {
    const value = new Decimal('1.5');
    expect(ensureFinite(value, 'x')).toBe(value);
  });

  it('rejects NaN and infinity', () => {
    expect(() => ensureFinite(new Decimal(NaN), 'x')).toThrow(NumericDegenerateError);
    expect(() => ensureFinite(new Decimal(-Infinity), 'x')).toThrow(NumericDegenerateError);
  });

  it('rejects values that overflow a double', () => {
    expect(() => ensureFinite(new Decimal('1e400'), 'callPrice')).toThrow(
      'Numeric degenerate result for callPrice: 1e+400'
    );
  });
});
