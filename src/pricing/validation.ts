/**
 * Input validation and result guards for the pricing functions
 */

import { z } from 'zod';
import { InvalidInputError, NumericDegenerateError } from '../core/errors.js';
import { Decimal, isFiniteDecimal, isPositive } from '../utils/decimal.js';
import type { AuxiliaryQuantities, MarketInputs } from '../core/types.js';

// ============================================================================
// RAW INPUT PARSING
// ============================================================================

const numeric = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number());

const positiveNumeric = numeric.pipe(z.number().finite().positive());

/**
 * Schema for market inputs arriving as plain numbers or numeric strings
 */
export const marketInputsSchema = z.object({
  spot: positiveNumeric,
  strike: positiveNumeric,
  riskFreeRate: numeric.pipe(z.number().finite()),
  timeToExpiry: positiveNumeric,
  volatility: positiveNumeric,
});

export type RawMarketInputs = z.input<typeof marketInputsSchema>;

/**
 * Validate untyped market inputs and convert them to Decimals
 */
export function parseMarketInputs(raw: unknown): MarketInputs {
  const result = marketInputsSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || 'inputs'}: ${issue.message}`);
    const field = result.error.issues[0]?.path.join('.') || 'inputs';
    throw new InvalidInputError(field, issues.join('; '), { issues });
  }

  const { spot, strike, riskFreeRate, timeToExpiry, volatility } = result.data;
  return {
    spot: new Decimal(spot),
    strike: new Decimal(strike),
    riskFreeRate: new Decimal(riskFreeRate),
    timeToExpiry: new Decimal(timeToExpiry),
    volatility: new Decimal(volatility),
  };
}

// ============================================================================
// DECIMAL INPUT GUARDS
// ============================================================================

const POSITIVE_FIELDS = ['spot', 'strike', 'timeToExpiry', 'volatility'] as const;

/**
 * Reject inputs for which ln(S/K), √t or division by σ√t is undefined
 */
export function assertValidMarketInputs(inputs: MarketInputs): void {
  for (const field of POSITIVE_FIELDS) {
    const value = inputs[field];
    if (!isFiniteDecimal(value)) {
      throw new InvalidInputError(field, `must be finite, got ${value.toString()}`);
    }
    if (!isPositive(value)) {
      throw new InvalidInputError(field, `must be greater than zero, got ${value.toString()}`);
    }
  }

  if (!isFiniteDecimal(inputs.riskFreeRate)) {
    throw new InvalidInputError('riskFreeRate', `must be finite, got ${inputs.riskFreeRate.toString()}`);
  }
}

/**
 * Reject d1/d2 values that did not come from a successful calculateD1D2
 */
export function assertValidAuxiliaries(auxiliaries: AuxiliaryQuantities): void {
  if (!isFiniteDecimal(auxiliaries.d1)) {
    throw new InvalidInputError('d1', `must be finite, got ${auxiliaries.d1.toString()}`);
  }
  if (!isFiniteDecimal(auxiliaries.d2)) {
    throw new InvalidInputError('d2', `must be finite, got ${auxiliaries.d2.toString()}`);
  }
}

// ============================================================================
// RESULT GUARDS
// ============================================================================

/**
 * Return value unchanged, or fail if it is NaN, infinite, or overflows a double
 */
export function ensureFinite(
  value: Decimal,
  quantity: string,
  context?: Record<string, unknown>
): Decimal {
  if (!isFiniteDecimal(value)) {
    throw new NumericDegenerateError(quantity, value.toString(), context);
  }
  return value;
}
