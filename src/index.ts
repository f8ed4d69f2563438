/**
 * Black-Scholes Greeks Calculator - Library Entry Point
 *
 * Prices European options and computes Delta, Gamma and Theta.
 * Compute d1/d2 once with calculateD1D2, then pass them to the pricer
 * and the Greek functions, or call evaluateOption for everything at once.
 */

export * from './pricing/index.js';

export {
  loadScenarios,
  getScenario,
  defaultScenariosPath,
} from './scenarios/index.js';
export type { ScenarioOptions } from './scenarios/index.js';

export { loadConfig, getConfig, resetConfig } from './config/index.js';

export {
  PricingSystemError,
  InvalidInputError,
  InvalidContractTypeError,
  NumericDegenerateError,
  ScenarioError,
  ScenarioNotFoundError,
  ConfigurationError,
  InvalidConfigError,
  isPricingSystemError,
  wrapError,
} from './core/errors.js';

export { CONTRACT_TYPES } from './core/types.js';
export type {
  ContractType,
  MarketInputs,
  AuxiliaryQuantities,
  OptionPrices,
  Greeks,
  ParityCheck,
  OptionEvaluation,
  Scenario,
  SystemConfig,
} from './core/types.js';

export { Decimal, toDecimal } from './utils/decimal.js';
