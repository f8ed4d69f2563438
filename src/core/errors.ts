/**
 * Custom Error Classes for the Black-Scholes Greeks Calculator
 *
 * Typed errors so callers can tell "invalid input" from "computed result".
 */

/**
 * Base class for all calculator errors
 */
export class PricingSystemError extends Error {
  public readonly code: string;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'PricingSystemError';
    this.code = code;
    this.timestamp = new Date();
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
    };
  }
}

// ============================================================================
// PRICING ERRORS
// ============================================================================

export class InvalidInputError extends PricingSystemError {
  public readonly field: string;

  constructor(field: string, reason: string, context?: Record<string, unknown>) {
    super(`Invalid input ${field}: ${reason}`, 'INVALID_INPUT', { field, reason, ...context });
    this.name = 'InvalidInputError';
    this.field = field;
  }
}

export class InvalidContractTypeError extends PricingSystemError {
  constructor(value: unknown) {
    super(
      `Invalid contract type: ${String(value)} (expected CALL or PUT)`,
      'INVALID_CONTRACT_TYPE',
      { value: String(value) }
    );
    this.name = 'InvalidContractTypeError';
  }
}

export class NumericDegenerateError extends PricingSystemError {
  public readonly quantity: string;

  constructor(quantity: string, value: string, context?: Record<string, unknown>) {
    super(
      `Numeric degenerate result for ${quantity}: ${value}`,
      'NUMERIC_DEGENERATE',
      { quantity, value, ...context }
    );
    this.name = 'NumericDegenerateError';
    this.quantity = quantity;
  }
}

// ============================================================================
// SCENARIO ERRORS
// ============================================================================

export class ScenarioError extends PricingSystemError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SCENARIO_ERROR', context);
    this.name = 'ScenarioError';
  }
}

export class ScenarioNotFoundError extends ScenarioError {
  constructor(name: string, available: string[]) {
    super(`Scenario not found: ${name}`, { name, available });
    this.name = 'ScenarioNotFoundError';
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends PricingSystemError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

export class InvalidConfigError extends ConfigurationError {
  constructor(key: string, value: unknown, reason: string) {
    super(`Invalid configuration for ${key}: ${reason}`, { key, value, reason });
    this.name = 'InvalidConfigError';
  }
}

// ============================================================================
// ERROR UTILITY FUNCTIONS
// ============================================================================

/**
 * Check if an error is a calculator error
 */
export function isPricingSystemError(error: unknown): error is PricingSystemError {
  return error instanceof PricingSystemError;
}

/**
 * Wrap unknown errors in PricingSystemError
 */
export function wrapError(error: unknown, defaultMessage = 'Unknown error'): PricingSystemError {
  if (isPricingSystemError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new PricingSystemError(error.message, 'WRAPPED_ERROR', {
      originalName: error.name,
      originalStack: error.stack,
    });
  }

  return new PricingSystemError(defaultMessage, 'UNKNOWN_ERROR', {
    originalError: String(error),
  });
}
