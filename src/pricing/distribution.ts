/**
 * Standard Normal Distribution
 *
 * Φ comes from the mathjs error function; φ is evaluated in Decimal.
 */

import { erf } from 'mathjs';
import { Decimal, ONE, TWO, toNumber } from '../utils/decimal.js';

const SQRT_2 = TWO.sqrt();
const SQRT_2PI = TWO.times(Decimal.acos(-1)).sqrt();

/**
 * Standard normal cumulative distribution function (CDF)
 * Φ(x) = (1 + erf(x / √2)) / 2
 */
export function normCDF(x: Decimal): Decimal {
  const z = toNumber(x.dividedBy(SQRT_2));
  return ONE.plus(erf(z)).dividedBy(2);
}

/**
 * Standard normal probability density function (PDF)
 */
export function normPDF(x: Decimal): Decimal {
  const exponent = x.negated().times(x).dividedBy(2);
  return exponent.exp().dividedBy(SQRT_2PI);
}
