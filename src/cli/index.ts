/**
 * CLI Interface for the Black-Scholes Greeks Calculator
 */

import { Command } from 'commander';
import Table from 'cli-table3';
import chalk from 'chalk';
import { loadConfig } from '../config/index.js';
import { InvalidInputError, wrapError } from '../core/errors.js';
import { SCENARIOS } from '../core/constants.js';
import { evaluateOption } from '../pricing/evaluate.js';
import { parseMarketInputs } from '../pricing/validation.js';
import { getScenario, loadScenarios } from '../scenarios/index.js';
import { daysToYears, parseExpiry, timeToExpiryYears } from '../utils/date.js';
import { cliLogger, logError, setLogLevel } from '../utils/logger.js';
import { buildReport, renderReport, reportToJSON } from './report.js';
import type { ReportOptions } from './report.js';
import type { Scenario, SystemConfig } from '../core/types.js';

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
  setExitCode: (code: number) => void;
}

interface QuoteOptions {
  spot: string;
  strike: string;
  vol: string;
  rate?: string;
  years?: string;
  days?: string;
  expiry?: string;
  json?: boolean;
}

interface ExampleOptions {
  json?: boolean;
}

const defaultIO: CliIO = {
  out: text => process.stdout.write(`${text}\n`),
  err: text => process.stderr.write(`${text}\n`),
  setExitCode: code => {
    process.exitCode = code;
  },
};

/**
 * Build the commander program; IO is injectable for tests
 */
export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name('bs-greeks')
    .description('Black-Scholes price, Delta, Gamma and Theta for European options')
    .version('1.0.0')
    .option('--log-level <level>', 'log level (error, warn, info, debug)')
    .hook('preAction', thisCommand => {
      const { logLevel } = thisCommand.opts<{ logLevel?: string }>();
      if (logLevel) setLogLevel(logLevel);
    });

  program
    .command('quote')
    .description('Price one option from explicit market inputs')
    .requiredOption('--spot <number>', 'spot price S')
    .requiredOption('--strike <number>', 'strike price K')
    .requiredOption('--vol <number>', 'implied volatility as decimal, e.g. 0.25')
    .option('--rate <number>', 'risk-free rate as decimal (default from config)')
    .option('--years <number>', 'time to expiry in years')
    .option('--days <number>', 'calendar days to expiry')
    .option('--expiry <yyyy-MM-dd>', 'expiry date')
    .option('--json', 'print JSON instead of tables')
    .action((options: QuoteOptions) =>
      runAction(io, () => {
        const config = loadConfig();
        const inputs = parseMarketInputs({
          spot: options.spot,
          strike: options.strike,
          riskFreeRate: options.rate ?? config.pricing.defaultRiskFreeRate,
          timeToExpiry: resolveTimeToExpiry(options, config),
          volatility: options.vol,
        });

        const title = `S=${inputs.spot.toString()} K=${inputs.strike.toString()}`;
        printEvaluation(io, { name: title, inputs }, config, options.json);
      })
    );

  program
    .command('example')
    .description('Evaluate a named example scenario')
    .argument('[name]', 'scenario name', SCENARIOS.DEFAULT_NAME)
    .option('--json', 'print JSON instead of tables')
    .action((name: string, options: ExampleOptions) =>
      runAction(io, () => {
        const config = loadConfig();
        const scenario = getScenario(name, {
          path: config.scenarios.path,
          daysInYear: config.pricing.daysInYear,
        });
        printEvaluation(io, scenario, config, options.json);
      })
    );

  program
    .command('scenarios')
    .description('List the available example scenarios')
    .action(() =>
      runAction(io, () => {
        const config = loadConfig();
        const scenarios = loadScenarios({
          path: config.scenarios.path,
          daysInYear: config.pricing.daysInYear,
        });

        const table = new Table({ head: ['Name', 'Spot', 'Strike', 'Rate', 'Years', 'Vol', 'Description'] });
        for (const s of scenarios) {
          table.push([
            chalk.cyan(s.name),
            s.inputs.spot.toString(),
            s.inputs.strike.toString(),
            s.inputs.riskFreeRate.toString(),
            s.inputs.timeToExpiry.toFixed(6),
            s.inputs.volatility.toString(),
            s.description ?? '',
          ]);
        }
        io.out(table.toString());
      })
    );

  return program;
}

// ============================================================================
// HELPERS
// ============================================================================

function resolveTimeToExpiry(options: QuoteOptions, config: SystemConfig): string {
  const given = [options.years, options.days, options.expiry].filter(v => v !== undefined);
  if (given.length !== 1) {
    throw new InvalidInputError('timeToExpiry', 'provide exactly one of --years, --days or --expiry');
  }

  if (options.years !== undefined) {
    return options.years;
  }
  if (options.days !== undefined) {
    const days = Number(options.days);
    if (isNaN(days)) {
      throw new InvalidInputError('days', `not a number: ${options.days}`);
    }
    return daysToYears(days, config.pricing.daysInYear).toString();
  }
  if (options.expiry !== undefined) {
    return timeToExpiryYears(parseExpiry(options.expiry), new Date(), config.pricing.daysInYear).toString();
  }

  throw new InvalidInputError('timeToExpiry', 'missing');
}

function printEvaluation(io: CliIO, scenario: Scenario, config: SystemConfig, json = false): void {
  const reportOptions: ReportOptions = {
    daysInYear: config.pricing.daysInYear,
    thetaScale: config.display.thetaScale,
    decimals: config.display.decimals,
  };

  const evaluation = evaluateOption(scenario.inputs);
  const report = buildReport(scenario.name, evaluation, reportOptions, scenario.description);

  io.out(json ? reportToJSON(report) : renderReport(report, reportOptions));
}

function runAction(io: CliIO, action: () => void): void {
  try {
    action();
  } catch (error) {
    const wrapped = wrapError(error);
    logError(wrapped);
    io.err(chalk.red(`Error [${wrapped.code}]: ${wrapped.message}`));
    io.setExitCode(1);
  }
}

export async function runCLI(argv: string[] = process.argv, io: CliIO = defaultIO): Promise<void> {
  cliLogger.debug('Starting CLI', { args: argv.slice(2) });
  await createProgram(io).parseAsync(argv);
}
