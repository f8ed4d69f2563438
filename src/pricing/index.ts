/**
 * Options Pricing Module Exports
 */

// Normal distribution
export { normCDF, normPDF } from './distribution.js';

// Black-Scholes
export {
  calculateD1D2,
  discountFactor,
  calculateCallPrice,
  calculatePutPrice,
  calculatePrices,
  checkPutCallParity,
} from './black-scholes.js';

// Greeks
export {
  isContractType,
  calculateDelta,
  calculateGamma,
  calculateTheta,
  calculateGreeks,
} from './greeks.js';

// Validation
export {
  marketInputsSchema,
  parseMarketInputs,
  assertValidMarketInputs,
  ensureFinite,
} from './validation.js';
export type { RawMarketInputs } from './validation.js';

// Pipeline
export { evaluateOption } from './evaluate.js';
