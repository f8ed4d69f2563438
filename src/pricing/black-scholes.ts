/**
 * Black-Scholes Options Pricing
 *
 * Implements the Black-Scholes-Merton model for European options.
 * d1/d2 are computed once and shared by the pricer and the Greeks.
 */

import { PRICING } from '../core/constants.js';
import { Decimal, decimalMax } from '../utils/decimal.js';
import { normCDF } from './distribution.js';
import { assertValidAuxiliaries, assertValidMarketInputs, ensureFinite } from './validation.js';
import type { AuxiliaryQuantities, MarketInputs, OptionPrices, ParityCheck } from '../core/types.js';

// ============================================================================
// AUXILIARY QUANTITIES
// ============================================================================

/**
 * Calculate d1 and d2 parameters
 *
 * @throws InvalidInputError when S, K, t or σ is not a positive finite value
 * @throws NumericDegenerateError when d1 or d2 is not finite
 */
export function calculateD1D2(inputs: MarketInputs): AuxiliaryQuantities {
  assertValidMarketInputs(inputs);

  const { spot, strike, timeToExpiry, riskFreeRate, volatility } = inputs;
  const volSqrtT = volatility.times(timeToExpiry.sqrt());

  // d1 = (ln(S/K) + (r + σ²/2) * T) / (σ * √T)
  const logSK = spot.dividedBy(strike).ln();
  const rPlusHalfVol2 = riskFreeRate.plus(volatility.times(volatility).dividedBy(2));
  const numerator = logSK.plus(rPlusHalfVol2.times(timeToExpiry));

  const d1 = ensureFinite(numerator.dividedBy(volSqrtT), 'd1');
  const d2 = ensureFinite(d1.minus(volSqrtT), 'd2');

  return { d1, d2 };
}

/**
 * Discount factor e^(-rT)
 */
export function discountFactor(inputs: MarketInputs): Decimal {
  return inputs.riskFreeRate.negated().times(inputs.timeToExpiry).exp();
}

// ============================================================================
// PRICES
// ============================================================================

/**
 * Calculate call option price using Black-Scholes
 */
export function calculateCallPrice(inputs: MarketInputs, auxiliaries: AuxiliaryQuantities): Decimal {
  assertValidMarketInputs(inputs);
  assertValidAuxiliaries(auxiliaries);

  const { spot, strike } = inputs;
  const { d1, d2 } = auxiliaries;

  // C = N(d1) * S - N(d2) * K * e^(-rT)
  const price = normCDF(d1).times(spot).minus(normCDF(d2).times(strike).times(discountFactor(inputs)));

  return ensureFinite(price, 'callPrice', { d1: d1.toString(), d2: d2.toString() });
}

/**
 * Calculate put option price using Black-Scholes
 */
export function calculatePutPrice(inputs: MarketInputs, auxiliaries: AuxiliaryQuantities): Decimal {
  assertValidMarketInputs(inputs);
  assertValidAuxiliaries(auxiliaries);

  const { spot, strike } = inputs;
  const { d1, d2 } = auxiliaries;

  // P = -N(-d1) * S + N(-d2) * K * e^(-rT)
  const price = normCDF(d1.negated()).times(spot).negated()
    .plus(normCDF(d2.negated()).times(strike).times(discountFactor(inputs)));

  return ensureFinite(price, 'putPrice', { d1: d1.toString(), d2: d2.toString() });
}

/**
 * Calculate call and put prices from shared d1/d2
 */
export function calculatePrices(inputs: MarketInputs, auxiliaries: AuxiliaryQuantities): OptionPrices {
  return {
    call: calculateCallPrice(inputs, auxiliaries),
    put: calculatePutPrice(inputs, auxiliaries),
  };
}

// ============================================================================
// SELF-CONSISTENCY
// ============================================================================

/**
 * Check put-call parity: C - P = S - K * e^(-rT)
 */
export function checkPutCallParity(inputs: MarketInputs, prices: OptionPrices): ParityCheck {
  const forwardStrike = inputs.strike.times(discountFactor(inputs));
  const residual = prices.call.minus(prices.put).minus(inputs.spot.minus(forwardStrike));
  const tolerance = decimalMax(inputs.spot, forwardStrike).times(PRICING.PARITY_RELATIVE_TOLERANCE);

  return {
    residual,
    tolerance,
    holds: residual.abs().lessThanOrEqualTo(tolerance),
  };
}
