/**
 * Example Scenarios
 *
 * Named market input sets read from a JSON file and injected into the
 * pricing functions. The bundled file lives at data/scenarios.json.
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import { fileURLToPath } from 'url';
import { PRICING, SCENARIOS } from '../core/constants.js';
import { ScenarioError, ScenarioNotFoundError, isPricingSystemError } from '../core/errors.js';
import { parseMarketInputs } from '../pricing/validation.js';
import { daysToYears } from '../utils/date.js';
import { scenarioLogger } from '../utils/logger.js';
import type { Scenario } from '../core/types.js';

// ============================================================================
// FILE SCHEMA
// ============================================================================

const scenarioEntrySchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    spot: z.number(),
    strike: z.number(),
    riskFreeRate: z.number(),
    volatility: z.number(),
    timeToExpiry: z.number().optional(),
    daysToExpiry: z.number().optional(),
  })
  .refine(
    entry => (entry.timeToExpiry === undefined) !== (entry.daysToExpiry === undefined),
    { message: 'exactly one of timeToExpiry or daysToExpiry is required' }
  );

const scenarioFileSchema = z.object({
  scenarios: z.array(scenarioEntrySchema).min(1),
});

type ScenarioEntry = z.infer<typeof scenarioEntrySchema>;

export interface ScenarioOptions {
  path?: string;
  daysInYear?: number;
}

// ============================================================================
// LOADING
// ============================================================================

/**
 * Path of the scenario file shipped with the package
 */
export function defaultScenariosPath(): string {
  return fileURLToPath(new URL(SCENARIOS.DEFAULT_FILE, import.meta.url));
}

/**
 * Load and validate every scenario in a scenario file
 */
export function loadScenarios(options: ScenarioOptions = {}): Scenario[] {
  const path = options.path ?? defaultScenariosPath();
  const daysInYear = options.daysInYear ?? PRICING.DAYS_IN_YEAR;

  if (!existsSync(path)) {
    throw new ScenarioError(`Scenario file not found: ${path}`, { path });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ScenarioError(`Failed to read scenario file: ${path}`, { path, reason: String(error) });
  }

  const result = scenarioFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ScenarioError(`Invalid scenario file ${path}:\n${issues.join('\n')}`, { path, issues });
  }

  const scenarios = result.data.scenarios.map(entry => toScenario(entry, daysInYear));
  scenarioLogger.debug(`Loaded ${scenarios.length} scenarios`, { path });

  return scenarios;
}

/**
 * Find a scenario by name
 */
export function getScenario(name: string, options: ScenarioOptions = {}): Scenario {
  const scenarios = loadScenarios(options);
  const scenario = scenarios.find(s => s.name === name);

  if (!scenario) {
    throw new ScenarioNotFoundError(name, scenarios.map(s => s.name));
  }

  return scenario;
}

function toScenario(entry: ScenarioEntry, daysInYear: number): Scenario {
  const timeToExpiry = entry.daysToExpiry !== undefined
    ? daysToYears(entry.daysToExpiry, daysInYear).toString()
    : entry.timeToExpiry;

  try {
    return {
      name: entry.name,
      description: entry.description,
      inputs: parseMarketInputs({
        spot: entry.spot,
        strike: entry.strike,
        riskFreeRate: entry.riskFreeRate,
        timeToExpiry,
        volatility: entry.volatility,
      }),
    };
  } catch (error) {
    if (isPricingSystemError(error)) {
      throw new ScenarioError(`Invalid inputs in scenario ${entry.name}: ${error.message}`, {
        name: entry.name,
        code: error.code,
      });
    }
    throw error;
  }
}
