/**
 * Core Type Definitions for the Black-Scholes Greeks Calculator
 *
 * All model quantities are Decimal. Never use plain numbers for prices.
 */

import type { Decimal } from '../utils/decimal.js';

// ============================================================================
// CONTRACT TYPES
// ============================================================================

export const CONTRACT_TYPES = ['CALL', 'PUT'] as const;

export type ContractType = (typeof CONTRACT_TYPES)[number];

// ============================================================================
// MODEL INPUTS & OUTPUTS
// ============================================================================

/**
 * Market inputs for a single Black-Scholes evaluation
 */
export interface MarketInputs {
  spot: Decimal;
  strike: Decimal;
  riskFreeRate: Decimal;    // As decimal, e.g., 0.01 for 1%
  timeToExpiry: Decimal;    // In years
  volatility: Decimal;      // As decimal, e.g., 0.6966 for 69.66%
}

/**
 * Standardized quantities shared by the price and Greek formulas
 */
export interface AuxiliaryQuantities {
  readonly d1: Decimal;
  readonly d2: Decimal;
}

export interface OptionPrices {
  call: Decimal;
  put: Decimal;
}

/**
 * Option Greeks
 */
export interface Greeks {
  delta: Decimal;
  gamma: Decimal;
  theta: Decimal;     // Per year; per-day scaling happens at display time
}

/**
 * Put-call parity check result
 */
export interface ParityCheck {
  residual: Decimal;    // (C - P) - (S - K·e^(-rT))
  tolerance: Decimal;
  holds: boolean;
}

/**
 * Everything computed for one set of market inputs
 */
export interface OptionEvaluation {
  inputs: MarketInputs;
  auxiliaries: AuxiliaryQuantities;
  prices: OptionPrices;
  parity: ParityCheck;
  greeks: Record<ContractType, Greeks>;
}

// ============================================================================
// SCENARIOS
// ============================================================================

export interface Scenario {
  name: string;
  description?: string;
  inputs: MarketInputs;
}

// ============================================================================
// CONFIGURATION TYPES
// ============================================================================

export interface PricingConfig {
  defaultRiskFreeRate: number;
  daysInYear: number;
}

export interface DisplayConfig {
  thetaScale: number;
  decimals: number;
}

export interface ScenariosConfig {
  path?: string;
}

export interface SystemConfig {
  pricing: PricingConfig;
  display: DisplayConfig;
  scenarios: ScenariosConfig;
}
