/**
 * Full evaluation pipeline: d1/d2 once, then prices and Greeks for both contracts
 */

import { pricingLogger, createTimer } from '../utils/logger.js';
import { calculateD1D2, calculatePrices, checkPutCallParity } from './black-scholes.js';
import { calculateGreeks } from './greeks.js';
import type { MarketInputs, OptionEvaluation } from '../core/types.js';

export function evaluateOption(inputs: MarketInputs): OptionEvaluation {
  const done = createTimer('Option evaluation');

  const auxiliaries = calculateD1D2(inputs);
  const prices = calculatePrices(inputs, auxiliaries);
  const parity = checkPutCallParity(inputs, prices);

  if (!parity.holds) {
    pricingLogger.warn('Put-call parity residual exceeds tolerance', {
      residual: parity.residual.toString(),
      tolerance: parity.tolerance.toString(),
    });
  }

  const evaluation: OptionEvaluation = {
    inputs,
    auxiliaries,
    prices,
    parity,
    greeks: {
      CALL: calculateGreeks(inputs, auxiliaries, 'CALL'),
      PUT: calculateGreeks(inputs, auxiliaries, 'PUT'),
    },
  };

  pricingLogger.debug('Option evaluated', {
    spot: inputs.spot.toString(),
    strike: inputs.strike.toString(),
    d1: auxiliaries.d1.toString(),
    d2: auxiliaries.d2.toString(),
    call: prices.call.toString(),
    put: prices.put.toString(),
  });
  done();

  return evaluation;
}
