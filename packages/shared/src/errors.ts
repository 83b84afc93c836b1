/**
 * Structured errors for the backtester
 *
 * Configuration and data problems are fatal and raised before the
 * simulation loop starts. Arithmetic degeneracies never throw.
 */

import type { ZodError } from 'zod';

export const BACKTEST_ERROR_CODES = {
  CONFIG_INVALID: 'CONFIG_INVALID',
  DATA_INVALID_FORMAT: 'DATA_INVALID_FORMAT',
  DATA_INVALID_ORDER: 'DATA_INVALID_ORDER',
  DATA_NOT_FOUND: 'DATA_NOT_FOUND',
} as const;

export type BacktestErrorCode = (typeof BACKTEST_ERROR_CODES)[keyof typeof BACKTEST_ERROR_CODES];

export type ErrorDetails = Record<string, unknown>;

export class BacktestError extends Error {
  public readonly code: BacktestErrorCode;
  public readonly details?: ErrorDetails;

  constructor(code: BacktestErrorCode, message: string, details?: ErrorDetails) {
    super(message);
    this.name = 'BacktestError';
    this.code = code;
    this.details = details;
  }

  toJSON(): { name: string; code: BacktestErrorCode; message: string; details?: ErrorDetails } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Invalid run configuration (capital, commission, indicator windows, missing bar fields)
 */
export class ConfigurationError extends BacktestError {
  constructor(message: string, details?: ErrorDetails) {
    super(BACKTEST_ERROR_CODES.CONFIG_INVALID, message, details);
    this.name = 'ConfigurationError';
  }

  /**
   * Build from a failed zod parse
   */
  static fromZod(context: string, error: ZodError): ConfigurationError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');
    return new ConfigurationError(`${context}: ${summary}`, { issues });
  }
}

/**
 * Market data that cannot be ingested (ordering, unreadable source)
 */
export class MarketDataError extends BacktestError {
  constructor(
    message: string,
    details?: ErrorDetails,
    code: BacktestErrorCode = BACKTEST_ERROR_CODES.DATA_INVALID_ORDER
  ) {
    super(code, message, details);
    this.name = 'MarketDataError';
  }
}

export function isBacktestError(error: unknown): error is BacktestError {
  return error instanceof BacktestError;
}
