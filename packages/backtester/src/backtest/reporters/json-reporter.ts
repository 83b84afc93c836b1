/**
 * JSON Reporter for Backtest Results
 *
 * Exports a run and its performance report to JSON. A profit factor of
 * Infinity is written as the string "Infinity".
 */

import * as fs from 'fs';
import * as path from 'path';
import type { PerformanceReport } from '../../analytics/index.js';
import type { BacktestResult } from '../types.js';

/**
 * Options for JSON export
 */
export interface JSONExportOptions {
  /** Pretty print with indentation */
  pretty?: boolean;
  /** Include individual trades */
  includeTrades?: boolean;
  /** Include the equity curve */
  includeEquityCurve?: boolean;
  /** Include the signal log */
  includeSignals?: boolean;
  /** Include indicator series */
  includeIndicators?: boolean;
}

const DEFAULT_OPTIONS: Required<JSONExportOptions> = {
  pretty: true,
  includeTrades: true,
  includeEquityCurve: false,
  includeSignals: false,
  includeIndicators: false,
};

/**
 * Non-finite numbers become strings so JSON.stringify keeps them
 */
function serializeNumber(n: number): number | string {
  return Number.isFinite(n) ? n : String(n);
}

/**
 * Convert a run and its report to a JSON-serializable object
 */
export function toJSON(
  result: BacktestResult,
  report: PerformanceReport,
  options?: JSONExportOptions
): Record<string, unknown> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const { trades: _trades, equityCurve: _equityCurve, dateRange, strategyName, asset, ...metrics } = report;

  const json: Record<string, unknown> = {
    metadata: {
      strategyName,
      asset: asset ?? null,
      executedAt: result.executedAt.toISOString(),
      executionTimeMs: result.executionTimeMs,
    },
    config: {
      strategy: result.strategy,
      execution: result.execution,
    },
    dateRange: {
      from: dateRange.from.toISOString(),
      to: dateRange.to.toISOString(),
      barCount: dateRange.barCount,
    },
    metrics: { ...metrics, profitFactor: serializeNumber(metrics.profitFactor) },
  };

  if (opts.includeTrades) {
    json.trades = result.trades;
  } else {
    json.tradeCount = result.trades.length;
  }

  if (opts.includeEquityCurve) {
    json.equityCurve = result.equityCurve;
  }

  if (opts.includeSignals) {
    json.signals = result.signals;
  }

  if (opts.includeIndicators) {
    json.indicators = result.indicatorSeries;
  }

  return json;
}

/**
 * Export to a JSON file, creating the directory when needed
 */
export function exportToJSON(
  result: BacktestResult,
  report: PerformanceReport,
  outputPath: string,
  options?: JSONExportOptions
): string {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const json = toJSON(result, report, opts);

  const content = opts.pretty ? JSON.stringify(json, null, 2) : JSON.stringify(json);

  const dir = path.dirname(outputPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  fs.writeFileSync(outputPath, content, 'utf-8');

  return outputPath;
}

/**
 * Generate default filename for a run
 */
export function generateFilename(result: BacktestResult): string {
  const [date, rest] = result.executedAt.toISOString().split('T');
  const time = rest?.split('.')[0]?.replace(/:/g, '');
  const prefix = result.asset ? `backtest_${result.asset}_` : 'backtest_';
  return `${prefix}${result.strategy.kind}_${date}_${time}.json`;
}
