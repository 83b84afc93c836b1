#!/usr/bin/env npx tsx
/**
 * Backtest Script
 *
 * Usage:
 *   DATA_FILE=data/AAPL_1d.csv STRATEGY=rsi npx tsx src/scripts/run-backtest.ts
 *   DATA_FILE=data/AAPL_1d.csv STRATEGY=all npx tsx src/scripts/run-backtest.ts
 *   STRATEGY=list npx tsx src/scripts/run-backtest.ts
 *
 * Environment variables:
 *   DATA_FILE - OHLCV CSV file (required unless STRATEGY=list)
 *   STRATEGY - ma_crossover, rsi, bollinger, momentum, all or list (default: ma_crossover)
 *   FROM / TO - Date bounds, YYYY-MM-DD (default: whole file)
 *   TIMESTAMP_FORMAT - unix_s, unix_ms or iso (default: unix_s)
 *   ASSET - Label for reports and file names (default: DATA_FILE name)
 *   FAST_PERIOD, SLOW_PERIOD - MA Crossover parameters
 *   RSI_PERIOD, RSI_LOWER, RSI_UPPER - RSI parameters
 *   BB_PERIOD, BB_STD - Bollinger Bands parameters
 *   ROC_PERIOD, ROC_THRESHOLD, TREND_PERIOD - Momentum parameters
 *   INITIAL_CAPITAL, COMMISSION_RATE, POSITION_SIZE, FILL_TIMING - Execution
 *   RISK_FREE_RATE, TRADING_DAYS - Analytics
 *   JSON - Save results to JSON (default: false)
 *   OUTPUT_DIR - Where JSON files go (default: ./analysis-output)
 *   LOG_LEVEL - error, warn, info or debug (default: info)
 */

import * as path from 'path';
import { createLogger, isBacktestError, loadEnvFromRoot, type Logger } from '@barsim/shared';
import {
  exportToJSON,
  filterBarsByDate,
  generateFilename,
  loadBarsFromCSV,
  printComparison,
  printPerformanceReport,
  printStrategyList,
  runBacktests,
  type TimestampFormat,
} from '../backtest/index.js';
import { buildReport } from '../analytics/index.js';
import { isStrategyKind, listStrategies, STRATEGY_KINDS } from '../strategies/index.js';
import { createAppLogger, loadConfigFromEnv, strategyConfigFromEnv, type AppConfig } from '../config/index.js';

loadEnvFromRoot();

const TIMESTAMP_FORMATS: readonly TimestampFormat[] = ['unix_s', 'unix_ms', 'iso'];

function parseDate(value: string | undefined): Date | undefined {
  return value ? new Date(`${value}T00:00:00Z`) : undefined;
}

function main(config: AppConfig, logger: Logger): void {
  const strategyArg = process.env.STRATEGY ?? 'ma_crossover';

  if (strategyArg === 'list') {
    printStrategyList(listStrategies());
    return;
  }

  const kinds = strategyArg === 'all' ? STRATEGY_KINDS : [strategyArg].filter(isStrategyKind);
  if (kinds.length === 0) {
    logger.error(`Unknown strategy "${strategyArg}"`, { available: [...STRATEGY_KINDS, 'all', 'list'] });
    process.exitCode = 1;
    return;
  }

  const dataFile = process.env.DATA_FILE;
  if (!dataFile) {
    logger.error('DATA_FILE is required');
    process.exitCode = 1;
    return;
  }

  const asset = process.env.ASSET ?? path.basename(dataFile, path.extname(dataFile));
  const timestampFormat = TIMESTAMP_FORMATS.find((format) => format === process.env.TIMESTAMP_FORMAT) ?? 'unix_s';

  logger.info('Loading data', { file: dataFile, asset, timestampFormat });
  const bars = filterBarsByDate(loadBarsFromCSV(dataFile, { timestampFormat }), {
    from: parseDate(process.env.FROM),
    to: parseDate(process.env.TO),
  });
  logger.info(`Loaded ${bars.length} bars`);

  const jobs = kinds.map((kind) => ({ strategy: strategyConfigFromEnv(kind) }));
  const results = runBacktests(bars, jobs, config.execution, { logger, asset });
  const reports = results.map((result) => buildReport(result, config.analytics));

  if (reports.length === 1) {
    reports.forEach(printPerformanceReport);
  } else {
    printComparison(reports);
  }

  if (process.env.JSON === 'true') {
    const outputDir = process.env.OUTPUT_DIR ?? path.join(process.cwd(), 'analysis-output');
    results.forEach((result, i) => {
      const report = reports[i];
      if (!report) return;
      const outputPath = exportToJSON(result, report, path.join(outputDir, generateFilename(result)), {
        includeEquityCurve: true,
        includeSignals: true,
      });
      logger.info('Saved JSON report', { path: outputPath });
    });
  }
}

function reportFailure(logger: Logger, error: unknown): void {
  if (isBacktestError(error)) {
    logger.error(error.message, { code: error.code, details: error.details });
  } else {
    logger.error('Backtest failed', { error: error instanceof Error ? error.message : String(error) });
  }
  process.exitCode = 1;
}

function start(): void {
  let config: AppConfig;
  try {
    config = loadConfigFromEnv();
  } catch (error) {
    reportFailure(createLogger({ service: 'backtester' }), error);
    return;
  }

  const logger = createAppLogger(config);
  try {
    main(config, logger);
  } catch (error) {
    reportFailure(logger, error);
  }
}

start();
