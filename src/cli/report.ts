/**
 * Report building and rendering for the CLI
 *
 * Per-day and display scaling of theta happens here, never in the pricing core.
 */

import Table from 'cli-table3';
import chalk from 'chalk';
import { CONTRACT_TYPES } from '../core/types.js';
import { Decimal, formatDecimal, stringifyWithDecimal } from '../utils/decimal.js';
import type { ContractType, MarketInputs, OptionEvaluation } from '../core/types.js';

export interface ReportOptions {
  daysInYear: number;
  thetaScale: number;
  decimals: number;
}

export interface GreeksReport {
  delta: Decimal;
  gamma: Decimal;
  thetaAnnual: Decimal;
  thetaPerDay: Decimal;
  thetaDisplay: Decimal;    // Per-day theta times the display scale
}

export interface EvaluationReport {
  title: string;
  description?: string;
  inputs: MarketInputs;
  d1: Decimal;
  d2: Decimal;
  callPrice: Decimal;
  putPrice: Decimal;
  parityResidual: Decimal;
  parityHolds: boolean;
  greeks: Record<ContractType, GreeksReport>;
}

// ============================================================================
// THETA SCALING
// ============================================================================

export function thetaPerDay(theta: Decimal, daysInYear: number): Decimal {
  return theta.dividedBy(daysInYear);
}

export function thetaForDisplay(theta: Decimal, daysInYear: number, thetaScale: number): Decimal {
  return thetaPerDay(theta, daysInYear).times(thetaScale);
}

// ============================================================================
// BUILDING
// ============================================================================

export function buildReport(
  title: string,
  evaluation: OptionEvaluation,
  options: ReportOptions,
  description?: string
): EvaluationReport {
  const greeksFor = (contractType: ContractType): GreeksReport => {
    const { delta, gamma, theta } = evaluation.greeks[contractType];
    return {
      delta,
      gamma,
      thetaAnnual: theta,
      thetaPerDay: thetaPerDay(theta, options.daysInYear),
      thetaDisplay: thetaForDisplay(theta, options.daysInYear, options.thetaScale),
    };
  };

  return {
    title,
    description,
    inputs: evaluation.inputs,
    d1: evaluation.auxiliaries.d1,
    d2: evaluation.auxiliaries.d2,
    callPrice: evaluation.prices.call,
    putPrice: evaluation.prices.put,
    parityResidual: evaluation.parity.residual,
    parityHolds: evaluation.parity.holds,
    greeks: {
      CALL: greeksFor('CALL'),
      PUT: greeksFor('PUT'),
    },
  };
}

// ============================================================================
// RENDERING
// ============================================================================

/**
 * Render a report as coloured tables
 */
export function renderReport(report: EvaluationReport, options: ReportOptions): string {
  const fmt = (value: Decimal): string => formatDecimal(value, options.decimals);
  const signed = (value: Decimal): string =>
    value.isNegative() ? chalk.red(fmt(value)) : chalk.green(fmt(value));

  const inputs = new Table({ head: ['Spot', 'Strike', 'Rate', 'Years', 'Vol'] });
  inputs.push([
    report.inputs.spot.toString(),
    report.inputs.strike.toString(),
    report.inputs.riskFreeRate.toString(),
    fmt(report.inputs.timeToExpiry),
    report.inputs.volatility.toString(),
  ]);

  const model = new Table({ head: ['d1', 'd2', 'Call', 'Put', 'Parity residual'] });
  model.push([
    fmt(report.d1),
    fmt(report.d2),
    chalk.bold(fmt(report.callPrice)),
    chalk.bold(fmt(report.putPrice)),
    report.parityHolds ? chalk.gray(report.parityResidual.toExponential(2)) : chalk.red(report.parityResidual.toExponential(2)),
  ]);

  const greeks = new Table({
    head: ['', 'Delta', 'Gamma', 'Theta/yr', 'Theta/day', `Theta/day x${options.thetaScale}`],
  });
  for (const contractType of CONTRACT_TYPES) {
    const g = report.greeks[contractType];
    greeks.push([
      chalk.cyan(contractType),
      signed(g.delta),
      fmt(g.gamma),
      signed(g.thetaAnnual),
      signed(g.thetaPerDay),
      signed(g.thetaDisplay),
    ]);
  }

  const header = chalk.bold(report.title) + (report.description ? chalk.gray(` - ${report.description}`) : '');

  return [header, inputs.toString(), model.toString(), greeks.toString()].join('\n');
}

/**
 * Render a report as JSON (Decimals as strings)
 */
export function reportToJSON(report: EvaluationReport): string {
  return stringifyWithDecimal(report, 2);
}
