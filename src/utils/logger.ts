/**
 * Logging Configuration for the Black-Scholes Greeks Calculator
 *
 * Uses Winston for structured logging with file rotation.
 */

import { join } from 'path';
import winston from 'winston';
import { LOGGING } from '../core/constants.js';
import type { PricingSystemError } from '../core/errors.js';

// ============================================================================
// LOG FORMATS
// ============================================================================

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${level}] ${String(message)}${metaStr}`;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.json()
);

// ============================================================================
// LOGGER INSTANCE
// ============================================================================

export const logger = winston.createLogger({
  level: process.env['LOG_LEVEL'] ?? LOGGING.DEFAULT_LEVEL,
  defaultMeta: { service: 'bs-greeks' },
  transports: [
    // Console goes to stderr so report output on stdout stays clean
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    }),
  ],
});

let fileLoggingEnabled = false;

/**
 * Attach the rotating file transports. Called by the executable only;
 * importing the library never touches the filesystem.
 */
export function enableFileLogging(logDir: string = LOGGING.LOG_DIR): void {
  if (fileLoggingEnabled) return;
  fileLoggingEnabled = true;

  logger.add(
    new winston.transports.File({
      filename: join(logDir, 'error.log'),
      level: 'error',
      format: fileFormat,
      maxsize: parseInt(LOGGING.FILE_MAX_SIZE),
      maxFiles: LOGGING.FILE_MAX_FILES,
    })
  );

  logger.add(
    new winston.transports.File({
      filename: join(logDir, 'combined.log'),
      format: fileFormat,
      maxsize: parseInt(LOGGING.FILE_MAX_SIZE),
      maxFiles: LOGGING.FILE_MAX_FILES,
    })
  );
}

// ============================================================================
// SPECIALIZED LOGGERS
// ============================================================================

/**
 * Pricing logger - for d1/d2, price and Greek evaluations
 */
export const pricingLogger = logger.child({ component: 'pricing' });

export const configLogger = logger.child({ component: 'config' });

export const scenarioLogger = logger.child({ component: 'scenarios' });

export const cliLogger = logger.child({ component: 'cli' });

// ============================================================================
// LOGGING UTILITIES
// ============================================================================

/**
 * Log a calculator error with full context
 */
export function logError(error: PricingSystemError): void {
  logger.error(error.message, {
    code: error.code,
    context: error.context,
    stack: error.stack,
  });
}

/**
 * Create a performance timer
 */
export function createTimer(operation: string): () => void {
  const start = performance.now();
  return () => {
    const duration = performance.now() - start;
    logger.debug(`${operation} completed`, { durationMs: duration.toFixed(2) });
  };
}

// ============================================================================
// LOG LEVEL CONTROL
// ============================================================================

/**
 * Set log level at runtime
 */
export function setLogLevel(level: string): void {
  logger.level = level;
  logger.debug(`Log level set to ${level}`);
}
