/**
 * Configuration Management for the Black-Scholes Greeks Calculator
 *
 * Loads configuration from environment variables and config files.
 * Validates configuration using Zod schemas.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { ConfigurationError, InvalidConfigError } from '../core/errors.js';
import { PRICING, DISPLAY } from '../core/constants.js';
import { configLogger } from '../utils/logger.js';
import type { SystemConfig } from '../core/types.js';

// Load environment variables
dotenv.config();

// ============================================================================
// CONFIGURATION SCHEMA
// ============================================================================

const pricingConfigSchema = z.object({
  defaultRiskFreeRate: z.number().min(-1).max(1).default(PRICING.DEFAULT_RISK_FREE_RATE),
  daysInYear: z.number().int().min(360).max(366).default(PRICING.DAYS_IN_YEAR),
});

const displayConfigSchema = z.object({
  thetaScale: z.number().positive().default(DISPLAY.THETA_SCALE),
  decimals: z.number().int().min(0).max(12).default(DISPLAY.DECIMALS),
});

const scenariosConfigSchema = z.object({
  path: z.string().min(1).optional(),
});

const systemConfigSchema = z.object({
  pricing: pricingConfigSchema.default({}),
  display: displayConfigSchema.default({}),
  scenarios: scenariosConfigSchema.default({}),
});

// ============================================================================
// CONFIGURATION LOADING
// ============================================================================

let cachedConfig: SystemConfig | null = null;

/**
 * Load configuration from environment and config file.
 * Precedence: environment > config file > schema defaults.
 */
export function loadConfig(forceReload = false): SystemConfig {
  if (cachedConfig && !forceReload) {
    return cachedConfig;
  }

  configLogger.debug('Loading configuration...');

  const envConfig: Record<string, unknown> = {
    pricing: {
      defaultRiskFreeRate: parseEnvNumber('PRICING_RISK_FREE_RATE'),
      daysInYear: parseEnvNumber('PRICING_DAYS_IN_YEAR'),
    },
    display: {
      thetaScale: parseEnvNumber('DISPLAY_THETA_SCALE'),
      decimals: parseEnvNumber('DISPLAY_DECIMALS'),
    },
    scenarios: {
      path: process.env['SCENARIOS_PATH'],
    },
  };

  let rawConfig: Record<string, unknown> = {};

  // Load config file if exists
  const configPath = process.env['CONFIG_PATH'] ?? './config/default.json';
  if (existsSync(configPath)) {
    try {
      const fileConfig: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
      if (isRecord(fileConfig)) {
        rawConfig = fileConfig;
        configLogger.debug(`Loaded config file: ${configPath}`);
      } else {
        configLogger.warn(`Ignoring config file without a top-level object: ${configPath}`);
      }
    } catch (error) {
      configLogger.warn(`Failed to load config file: ${configPath}`, { error: String(error) });
    }
  }

  rawConfig = deepMerge(rawConfig, envConfig);

  // Validate
  const result = systemConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration:\n${errors.join('\n')}`, { issues: errors });
  }

  cachedConfig = result.data;

  configLogger.debug('Configuration loaded', {
    defaultRiskFreeRate: cachedConfig.pricing.defaultRiskFreeRate,
    daysInYear: cachedConfig.pricing.daysInYear,
    thetaScale: cachedConfig.display.thetaScale,
  });

  return cachedConfig;
}

/**
 * Get current config (throws if not loaded)
 */
export function getConfig(): SystemConfig {
  if (!cachedConfig) {
    throw new ConfigurationError('Configuration not loaded. Call loadConfig() first.');
  }
  return cachedConfig;
}

/**
 * Drop the cached configuration
 */
export function resetConfig(): void {
  cachedConfig = null;
}

// ============================================================================
// UTILITY FUNCTIONS
// ============================================================================

function parseEnvNumber(key: string): number | undefined {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') return undefined;
  const num = Number(value);
  if (isNaN(num)) {
    throw new InvalidConfigError(key, value, 'not a number');
  }
  return num;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge source over target; undefined source values leave the target untouched
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (sourceValue === undefined) continue;

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}
