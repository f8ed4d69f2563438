/**
 * Option Greeks: Delta, Gamma, Theta
 *
 * Each Greek is computed from the shared d1/d2 of calculateD1D2.
 * Contract type dispatch is exhaustive; unknown values throw.
 */

import { InvalidContractTypeError, InvalidInputError } from '../core/errors.js';
import { CONTRACT_TYPES } from '../core/types.js';
import { Decimal, isFiniteDecimal } from '../utils/decimal.js';
import { discountFactor } from './black-scholes.js';
import { normCDF, normPDF } from './distribution.js';
import { assertValidAuxiliaries, assertValidMarketInputs, ensureFinite } from './validation.js';
import type { AuxiliaryQuantities, ContractType, Greeks, MarketInputs } from '../core/types.js';

// ============================================================================
// CONTRACT TYPE GUARDS
// ============================================================================

export function isContractType(value: unknown): value is ContractType {
  return CONTRACT_TYPES.some(contractType => contractType === value);
}

function unknownContractType(value: never): never {
  throw new InvalidContractTypeError(value);
}

// ============================================================================
// DELTA
// ============================================================================

/**
 * Delta from an explicit d1: call N(d1), put -N(-d1)
 */
export function calculateDelta(d1: Decimal, contractType: ContractType): Decimal {
  if (!isFiniteDecimal(d1)) {
    throw new InvalidInputError('d1', `must be finite, got ${d1.toString()}`);
  }

  switch (contractType) {
    case 'CALL':
      return normCDF(d1);
    case 'PUT':
      return normCDF(d1.negated()).negated();
    default:
      return unknownContractType(contractType);
  }
}

// ============================================================================
// GAMMA
// ============================================================================

/**
 * Gamma (same for call and put)
 *
 * Γ = K * e^(-rT) * n(d2) / (S² * σ * √T)
 *
 * The discount exponent is the risk-free rate r used by every other formula.
 */
export function calculateGamma(inputs: MarketInputs, d2: Decimal): Decimal {
  assertValidMarketInputs(inputs);
  if (!isFiniteDecimal(d2)) {
    throw new InvalidInputError('d2', `must be finite, got ${d2.toString()}`);
  }

  const { spot, strike, volatility, timeToExpiry } = inputs;
  const numerator = strike.times(discountFactor(inputs)).times(normPDF(d2));
  const denominator = spot.times(spot).times(volatility).times(timeToExpiry.sqrt());

  return ensureFinite(numerator.dividedBy(denominator), 'gamma', { d2: d2.toString() });
}

// ============================================================================
// THETA
// ============================================================================

/**
 * Theta per year
 *
 * call: -(S σ n(d1)) / (2√T) - r K e^(-rT) N(d2)
 * put:  -(S σ n(-d1)) / (2√T) + r K e^(-rT) N(-d2)
 */
export function calculateTheta(
  inputs: MarketInputs,
  auxiliaries: AuxiliaryQuantities,
  contractType: ContractType
): Decimal {
  assertValidMarketInputs(inputs);
  assertValidAuxiliaries(auxiliaries);

  const { spot, strike, volatility, riskFreeRate, timeToExpiry } = inputs;
  const { d1, d2 } = auxiliaries;
  const twoSqrtT = timeToExpiry.sqrt().times(2);
  const rKDiscount = riskFreeRate.times(strike).times(discountFactor(inputs));

  let theta: Decimal;
  switch (contractType) {
    case 'CALL': {
      const decay = spot.times(volatility).times(normPDF(d1)).dividedBy(twoSqrtT).negated();
      theta = decay.minus(rKDiscount.times(normCDF(d2)));
      break;
    }
    case 'PUT': {
      const decay = spot.times(volatility).times(normPDF(d1.negated())).dividedBy(twoSqrtT).negated();
      theta = decay.plus(rKDiscount.times(normCDF(d2.negated())));
      break;
    }
    default:
      return unknownContractType(contractType);
  }

  return ensureFinite(theta, 'theta', { contractType, d1: d1.toString(), d2: d2.toString() });
}

// ============================================================================
// ALL GREEKS
// ============================================================================

/**
 * Calculate Delta, Gamma and Theta for one contract type
 */
export function calculateGreeks(
  inputs: MarketInputs,
  auxiliaries: AuxiliaryQuantities,
  contractType: ContractType
): Greeks {
  return {
    delta: calculateDelta(auxiliaries.d1, contractType),
    gamma: calculateGamma(inputs, auxiliaries.d2),
    theta: calculateTheta(inputs, auxiliaries, contractType),
  };
}
