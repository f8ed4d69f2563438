import { Decimal } from '../src/utils/decimal.js';
import type { MarketInputs } from '../src/core/types.js';

export function makeInputs(
  spot: number,
  strike: number,
  riskFreeRate: number,
  timeToExpiry: number | Decimal,
  volatility: number
): MarketInputs {
  return {
    spot: new Decimal(spot),
    strike: new Decimal(strike),
    riskFreeRate: new Decimal(riskFreeRate),
    timeToExpiry: new Decimal(timeToExpiry),
    volatility: new Decimal(volatility),
  };
}

// 42 calendar days, high volatility, strike well above spot
export const REFERENCE = makeInputs(819.42, 1020, 0.01, new Decimal(42).dividedBy(365), 0.6966);

// One-year at-the-money textbook case
export const ATM = makeInputs(100, 100, 0.05, 1, 0.2);

/**
 * Run fn and return what it throws
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}
