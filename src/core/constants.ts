/**
 * Constants for the Black-Scholes Greeks Calculator
 */

// ============================================================================
// OPTIONS PRICING CONSTANTS
// ============================================================================

export const PRICING = {
  // Risk-free rate used when a caller gives none
  DEFAULT_RISK_FREE_RATE: 0.01,  // 1%

  // Days in year for theta and days-to-expiry conversion
  DAYS_IN_YEAR: 365,

  // Put-call parity tolerance, relative to max(S, K·e^(-rT))
  PARITY_RELATIVE_TOLERANCE: '1e-9',
} as const;

// ============================================================================
// DISPLAY CONSTANTS
// ============================================================================

export const DISPLAY = {
  THETA_SCALE: 100,
  DECIMALS: 6,
} as const;

// ============================================================================
// SCENARIO CONSTANTS
// ============================================================================

export const SCENARIOS = {
  DEFAULT_NAME: 'reference',
  DEFAULT_FILE: '../../data/scenarios.json',  // Relative to src/scenarios/
} as const;

// ============================================================================
// LOGGING CONSTANTS
// ============================================================================

export const LOGGING = {
  DEFAULT_LEVEL: 'info',
  FILE_MAX_SIZE: '10485760',  // 10 MB
  FILE_MAX_FILES: 10,
  LOG_DIR: './logs/',
} as const;
