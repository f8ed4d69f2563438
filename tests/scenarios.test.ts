import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadScenarios, getScenario, defaultScenariosPath } from '../src/scenarios/index.js';
import { ScenarioError, ScenarioNotFoundError } from '../src/core/errors.js';
import { thrownBy } from './fixtures.js';

describe('bundled scenarios', () => {
  it('lives in data/scenarios.json', () => {
    expect(defaultScenariosPath().endsWith(join('data', 'scenarios.json'))).toBe(true);
  });

  it('loads every named scenario', () => {
    expect(loadScenarios().map(s => s.name)).toEqual(['reference', 'atm-one-year', 'zero-rate']);
  });

  it('converts days to expiry into years', () => {
    const { inputs, description } = getScenario('reference');
    expect(inputs.spot.toNumber()).toBe(819.42);
    expect(inputs.strike.toNumber()).toBe(1020);
    expect(inputs.riskFreeRate.toNumber()).toBe(0.01);
    expect(inputs.volatility.toNumber()).toBe(0.6966);
    expect(inputs.timeToExpiry.toNumber()).toBeCloseTo(42 / 365, 12);
    expect(description).toContain('42 days');
  });

  it('honours a different day count', () => {
    const { inputs } = getScenario('reference', { daysInYear: 360 });
    expect(inputs.timeToExpiry.toNumber()).toBeCloseTo(42 / 360, 12);
  });

  it('reports unknown names with the available ones', () => {
    const error = thrownBy(() => getScenario('missing'));
    expect(error).toBeInstanceOf(ScenarioNotFoundError);
    expect(error).toMatchObject({ context: { name: 'missing', available: ['reference', 'atm-one-year', 'zero-rate'] } });
  });
});

describe('custom scenario files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'bs-greeks-scenarios-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(content: unknown): string {
    const path = join(dir, 'scenarios.json');
    writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content));
    return path;
  }

  const base = { name: 'custom', spot: 50, strike: 55, riskFreeRate: 0.02, volatility: 0.4 };

  it('accepts time to expiry in years', () => {
    const path = write({ scenarios: [{ ...base, timeToExpiry: 0.75 }] });
    const [scenario] = loadScenarios({ path });
    expect(scenario?.inputs.timeToExpiry.toString()).toBe('0.75');
  });

  it('requires exactly one expiry field', () => {
    const both = write({ scenarios: [{ ...base, timeToExpiry: 1, daysToExpiry: 30 }] });
    expect(() => loadScenarios({ path: both })).toThrow(/exactly one of timeToExpiry or daysToExpiry/);

    const neither = write({ scenarios: [base] });
    expect(() => loadScenarios({ path: neither })).toThrow(ScenarioError);
  });

  it('rejects invalid market inputs', () => {
    const path = write({ scenarios: [{ ...base, name: 'bad', volatility: 0, timeToExpiry: 1 }] });
    expect(() => loadScenarios({ path })).toThrow(/Invalid inputs in scenario bad/);
  });

  it('rejects malformed JSON', () => {
    const path = write('{ "scenarios": [');
    expect(() => loadScenarios({ path })).toThrow(/Failed to read scenario file/);
  });

  it('rejects a missing file', () => {
    expect(() => loadScenarios({ path: join(dir, 'nope.json') })).toThrow(/Scenario file not found/);
  });
});
