/**
 * Date Utilities for the Black-Scholes Greeks Calculator
 *
 * Converts expiry dates and day counts into time to expiry in years.
 */

import { parse, isValid, differenceInCalendarDays, startOfDay } from 'date-fns';
import { PRICING } from '../core/constants.js';
import { InvalidInputError } from '../core/errors.js';
import { Decimal } from './decimal.js';

const EXPIRY_FORMAT = 'yyyy-MM-dd';

/**
 * Parse an expiry date string (e.g., "2024-03-15")
 */
export function parseExpiry(expiryStr: string): Date {
  const parsed = parse(expiryStr, EXPIRY_FORMAT, new Date());
  if (!isValid(parsed)) {
    throw new InvalidInputError('expiry', `expected ${EXPIRY_FORMAT}, got "${expiryStr}"`);
  }
  return parsed;
}

/**
 * Calendar days from reference date to expiry (negative once expired)
 */
export function daysToExpiry(expiry: Date, referenceDate: Date = new Date()): number {
  return differenceInCalendarDays(startOfDay(expiry), startOfDay(referenceDate));
}

/**
 * Convert a day count into years
 */
export function daysToYears(days: number | Decimal, daysInYear: number = PRICING.DAYS_IN_YEAR): Decimal {
  return new Decimal(days).dividedBy(daysInYear);
}

/**
 * Calculate time to expiry in years (for Black-Scholes)
 *
 * No floor is applied: an expired or same-day date yields t <= 0,
 * which the pricing functions reject.
 */
export function timeToExpiryYears(
  expiry: Date,
  referenceDate: Date = new Date(),
  daysInYear: number = PRICING.DAYS_IN_YEAR
): Decimal {
  return daysToYears(daysToExpiry(expiry, referenceDate), daysInYear);
}
