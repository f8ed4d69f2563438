/**
 * Decimal.js Utilities for the Black-Scholes Greeks Calculator
 *
 * CRITICAL: Always use Decimal for model quantities.
 * Only convert to number at the Φ boundary and for display.
 */

import Decimal from 'decimal.js';

// Re-export Decimal class and type for use throughout the codebase
export { Decimal };

// Configure Decimal.js for pricing calculations
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -9,
  toExpPos: 21,
});

// ============================================================================
// CONVERSION UTILITIES
// ============================================================================

/**
 * Convert number to Decimal safely
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  if (value instanceof Decimal) {
    return value;
  }
  return new Decimal(value);
}

/**
 * Convert Decimal to number (use with caution, only for display and Φ)
 */
export function toNumber(value: Decimal): number {
  return value.toNumber();
}

/**
 * Convert Decimal to formatted string for display
 */
export function formatDecimal(value: Decimal, decimals = 2): string {
  return value.toFixed(decimals);
}

// ============================================================================
// COMPARISON UTILITIES
// ============================================================================

/**
 * Get the maximum of multiple decimals
 */
export function decimalMax(...values: Decimal[]): Decimal {
  return values.reduce((max, val) => Decimal.max(max, val));
}

// ============================================================================
// SERIALIZATION
// ============================================================================

/**
 * Stringify object with Decimal support (Decimal.toJSON yields its string form)
 */
export function stringifyWithDecimal(obj: unknown, space?: number): string {
  return JSON.stringify(obj, null, space);
}

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Check that a Decimal is finite and also representable as a finite double
 */
export function isFiniteDecimal(value: Decimal): boolean {
  return value.isFinite() && Number.isFinite(value.toNumber());
}

/**
 * Check if value is strictly positive
 */
export function isPositive(value: Decimal): boolean {
  return value.isPositive() && !value.isZero();
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const ONE = new Decimal(1);
export const TWO = new Decimal(2);
