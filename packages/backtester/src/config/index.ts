/**
 * Environment configuration
 *
 * Reads execution, analytics and logging settings from environment
 * variables. Unset variables fall back to the defaults; set but invalid
 * values are configuration errors.
 */

import { z } from 'zod';
import {
  AnalyticsConfigSchema,
  ConfigurationError,
  DEFAULT_ANALYTICS_CONFIG,
  DEFAULT_EXECUTION_CONFIG,
  ExecutionConfigSchema,
  LOG_LEVELS,
  createLogger,
  type AnalyticsConfig,
  type ExecutionConfig,
  type LogLevel,
  type Logger,
} from '@barsim/shared';
import { parseStrategyConfig, type StrategyConfig, type StrategyKind } from '../strategies/index.js';

export interface AppConfig {
  execution: ExecutionConfig;
  analytics: AnalyticsConfig;
  logLevel: LogLevel;
}

type Env = Readonly<Record<string, string | undefined>>;

const EnvSchema = z.object({
  INITIAL_CAPITAL: z.coerce.number().default(DEFAULT_EXECUTION_CONFIG.initialCapital),
  COMMISSION_RATE: z.coerce.number().default(DEFAULT_EXECUTION_CONFIG.commissionRate),
  POSITION_SIZE: z.coerce.number().default(DEFAULT_EXECUTION_CONFIG.positionSizeFraction),
  FILL_TIMING: z.enum(['close', 'next_open']).default(DEFAULT_EXECUTION_CONFIG.fillTiming),
  RISK_FREE_RATE: z.coerce.number().default(DEFAULT_ANALYTICS_CONFIG.riskFreeRate),
  TRADING_DAYS: z.coerce.number().default(DEFAULT_ANALYTICS_CONFIG.tradingDaysPerYear),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

/** Empty strings count as unset */
function compact(env: Env): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

/**
 * Build the run configuration from environment variables
 *
 * @throws ConfigurationError for unparsable or out-of-range values
 */
export function loadConfigFromEnv(env: Env = process.env): AppConfig {
  const parsedEnv = EnvSchema.safeParse(compact(env));
  if (!parsedEnv.success) {
    throw ConfigurationError.fromZod('Invalid environment', parsedEnv.error);
  }
  const vars = parsedEnv.data;

  const execution = ExecutionConfigSchema.safeParse({
    initialCapital: vars.INITIAL_CAPITAL,
    commissionRate: vars.COMMISSION_RATE,
    positionSizeFraction: vars.POSITION_SIZE,
    fillTiming: vars.FILL_TIMING,
  });
  if (!execution.success) {
    throw ConfigurationError.fromZod('Invalid execution configuration', execution.error);
  }

  const analytics = AnalyticsConfigSchema.safeParse({
    riskFreeRate: vars.RISK_FREE_RATE,
    tradingDaysPerYear: vars.TRADING_DAYS,
  });
  if (!analytics.success) {
    throw ConfigurationError.fromZod('Invalid analytics configuration', analytics.error);
  }

  return {
    execution: execution.data,
    analytics: analytics.data,
    logLevel: vars.LOG_LEVEL,
  };
}

/**
 * Console logger at the configured level
 */
export function createAppLogger(config: AppConfig, service: string = 'backtester'): Logger {
  return createLogger({ service, level: config.logLevel });
}

/** Environment variable per strategy parameter */
const STRATEGY_ENV: Record<StrategyKind, Record<string, string>> = {
  ma_crossover: { fastPeriod: 'FAST_PERIOD', slowPeriod: 'SLOW_PERIOD' },
  rsi: { period: 'RSI_PERIOD', lower: 'RSI_LOWER', upper: 'RSI_UPPER' },
  bollinger: { period: 'BB_PERIOD', stdMultiplier: 'BB_STD' },
  momentum: { rocPeriod: 'ROC_PERIOD', rocThreshold: 'ROC_THRESHOLD', trendPeriod: 'TREND_PERIOD' },
};

/**
 * Strategy parameters from environment variables, defaults for the rest
 */
export function strategyConfigFromEnv(kind: StrategyKind, env: Env = process.env): StrategyConfig {
  const params: Record<string, unknown> = { kind };
  for (const [param, variable] of Object.entries(STRATEGY_ENV[kind])) {
    const raw = env[variable]?.trim();
    if (raw) {
      params[param] = Number(raw);
    }
  }
  return parseStrategyConfig(params);
}
