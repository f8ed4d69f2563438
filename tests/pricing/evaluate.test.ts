import { describe, it, expect } from 'vitest';
import { evaluateOption } from '../../src/pricing/evaluate.js';
import { calculateD1D2, calculatePrices } from '../../src/pricing/black-scholes.js';
import { getScenario } from '../../src/scenarios/index.js';
import { InvalidInputError } from '../../src/core/errors.js';
import { REFERENCE, makeInputs } from '../fixtures.js';

describe('evaluateOption', () => {
  it('evaluates the reference scenario end to end', () => {
    const evaluation = evaluateOption(REFERENCE);

    expect(evaluation.auxiliaries.d1.toNumber()).toBeCloseTo(-0.803609, 4);
    expect(evaluation.auxiliaries.d2.toNumber()).toBeCloseTo(-1.039908, 4);
    expect(evaluation.greeks.CALL.delta.toNumber()).toBeCloseTo(0.210811, 4);
    expect(evaluation.greeks.PUT.delta.toNumber()).toBeCloseTo(-0.789189, 4);
    expect(evaluation.greeks.CALL.gamma.toNumber()).toBeCloseTo(0.0014918, 6);
    expect(evaluation.greeks.CALL.theta.dividedBy(365).times(100).toNumber()).toBeCloseTo(-67.000172, 4);
    expect(evaluation.greeks.PUT.theta.dividedBy(365).times(100).toNumber()).toBeCloseTo(-64.208865, 4);
    expect(evaluation.parity.holds).toBe(true);
  });

  it('shares one d1/d2 between prices and greeks', () => {
    const evaluation = evaluateOption(REFERENCE);
    const prices = calculatePrices(REFERENCE, calculateD1D2(REFERENCE));

    expect(evaluation.prices.call.equals(prices.call)).toBe(true);
    expect(evaluation.prices.put.equals(prices.put)).toBe(true);
    expect(evaluation.greeks.CALL.gamma.equals(evaluation.greeks.PUT.gamma)).toBe(true);
  });

  it('agrees with the bundled reference scenario', () => {
    const { inputs } = getScenario('reference');
    const evaluation = evaluateOption(inputs);
    expect(evaluation.greeks.CALL.delta.toNumber()).toBeCloseTo(0.210811, 4);
    expect(evaluation.prices.call.toNumber()).toBeCloseTo(20.742917, 4);
  });

  it('rejects invalid inputs before computing anything', () => {
    expect(() => evaluateOption(makeInputs(100, 100, 0.05, 1, 0))).toThrow(InvalidInputError);
  });
});
