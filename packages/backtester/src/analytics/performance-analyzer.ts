/**
 * Performance Analyzer
 *
 * Pure functions from an equity curve and trade log to risk/return
 * statistics. Every ratio is derived from the equity curve; constants such
 * as the risk-free rate come in through `AnalyticsConfig`.
 *
 * Degenerate inputs resolve to 0. The only non-finite value a report may
 * carry is `profitFactor = Infinity` (winning trades, no losing ones).
 */

import type { AnalyticsConfig, EquityPoint, Trade } from '@barsim/shared';
import type { BacktestResult } from '../backtest/types.js';

// =============================================================================
// TYPES
// =============================================================================

export interface PerformanceMetrics {
  /** % */
  totalReturn: number;
  /** Compounded annual return, % */
  annualReturn: number;
  /** Annualized stddev of daily returns, % */
  volatility: number;
  sharpeRatio: number;
  sortinoRatio: number;
  calmarRatio: number;
  /** Largest peak-to-trough decline, % (always <= 0) */
  maxDrawdown: number;
  /** Longest run of bars below the running peak */
  drawdownDuration: number;
  /** % of trades with pnl > 0 */
  winRate: number;
  /** Gross profit / gross loss; Infinity when nothing was lost */
  profitFactor: number;
  recoveryFactor: number;
  /** Best daily return, % */
  bestDay: number;
  /** Worst daily return, % */
  worstDay: number;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  grossProfit: number;
  /** Absolute sum of losing trades */
  grossLoss: number;
}

/**
 * Output of a finished run, ready for reporters
 */
export interface PerformanceReport extends PerformanceMetrics {
  strategyName: string;
  asset?: string;
  initialValue: number;
  finalValue: number;
  totalProfit: number;
  trades: Trade[];
  equityCurve: EquityPoint[];
  dateRange: BacktestResult['dateRange'];
}

// =============================================================================
// STATISTICS HELPERS
// =============================================================================

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Sample standard deviation (n - 1). Zero with fewer than two values.
 */
export function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const squared = values.reduce((sum, v) => sum + (v - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

function finiteOrZero(value: number): number {
  return Number.isFinite(value) ? value : 0;
}

/**
 * equity[t] / equity[t-1] - 1 for t = 1..N-1
 */
export function dailyReturns(equityCurve: readonly EquityPoint[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < equityCurve.length; i++) {
    const prev = equityCurve[i - 1];
    const curr = equityCurve[i];
    if (prev && curr) {
      returns.push(finiteOrZero(curr.value / prev.value - 1));
    }
  }
  return returns;
}

export interface DrawdownStats {
  /** % (<= 0) */
  maxDrawdown: number;
  /** Bars */
  duration: number;
}

/**
 * Drawdown on the compounded return curve, starting from 1
 */
export function drawdownStats(returns: readonly number[]): DrawdownStats {
  let cum = 1;
  let peak = 1;
  let maxDrawdown = 0;
  let run = 0;
  let duration = 0;

  for (const r of returns) {
    cum *= 1 + r;
    peak = Math.max(peak, cum);

    if (cum < peak) {
      maxDrawdown = Math.min(maxDrawdown, (cum - peak) / peak);
      run++;
      duration = Math.max(duration, run);
    } else {
      run = 0;
    }
  }

  return { maxDrawdown: finiteOrZero(maxDrawdown * 100), duration };
}

/**
 * Gross profit over gross loss: Infinity with no losses, 0 with neither
 */
export function profitFactor(grossProfit: number, grossLoss: number): number {
  if (grossLoss > 0) return grossProfit / grossLoss;
  return grossProfit > 0 ? Infinity : 0;
}

// =============================================================================
// ANALYZER
// =============================================================================

/**
 * Compute every metric for one run
 */
export function analyzePerformance(
  equityCurve: readonly EquityPoint[],
  trades: readonly Trade[],
  config: AnalyticsConfig
): PerformanceMetrics {
  const { riskFreeRate, tradingDaysPerYear } = config;
  const returns = dailyReturns(equityCurve);
  const hasReturns = equityCurve.length >= 2;

  const first = equityCurve[0];
  const last = equityCurve[equityCurve.length - 1];
  const totalReturn = first && last && hasReturns ? finiteOrZero((last.value / first.value - 1) * 100) : 0;

  const years = (equityCurve.length - 1) / tradingDaysPerYear;
  const annualReturn =
    years > 0 ? finiteOrZero(((1 + totalReturn / 100) ** (1 / years) - 1) * 100) : 0;

  const avgReturn = mean(returns);
  const stdDev = sampleStdDev(returns);
  const sqrtDays = Math.sqrt(tradingDaysPerYear);
  const excessReturn = avgReturn - riskFreeRate / tradingDaysPerYear;

  const volatility = hasReturns ? stdDev * sqrtDays * 100 : 0;
  const sharpeRatio = hasReturns && stdDev > 0 ? finiteOrZero((excessReturn / stdDev) * sqrtDays) : 0;

  const downsideStdDev = sampleStdDev(returns.filter((r) => r < 0));
  const sortinoRatio =
    hasReturns && downsideStdDev > 0 ? finiteOrZero((excessReturn / downsideStdDev) * sqrtDays) : 0;

  const { maxDrawdown, duration } = hasReturns ? drawdownStats(returns) : { maxDrawdown: 0, duration: 0 };
  const drawdownFraction = Math.abs(maxDrawdown / 100);
  const calmarRatio = drawdownFraction > 0 ? finiteOrZero(annualReturn / 100 / drawdownFraction) : 0;
  const recoveryFactor = drawdownFraction > 0 ? finiteOrZero(totalReturn / 100 / drawdownFraction) : 0;

  let bestDay = 0;
  let worstDay = 0;
  for (const [i, r] of returns.entries()) {
    if (i === 0 || r > bestDay) bestDay = r;
    if (i === 0 || r < worstDay) worstDay = r;
  }

  const winners = trades.filter((t) => t.pnl > 0);
  const losers = trades.filter((t) => t.pnl < 0);
  const grossProfit = winners.reduce((sum, t) => sum + t.pnl, 0);
  const grossLoss = Math.abs(losers.reduce((sum, t) => sum + t.pnl, 0));

  return {
    totalReturn,
    annualReturn,
    volatility,
    sharpeRatio,
    sortinoRatio,
    calmarRatio,
    maxDrawdown,
    drawdownDuration: duration,
    winRate: trades.length > 0 ? (winners.length / trades.length) * 100 : 0,
    profitFactor: profitFactor(grossProfit, grossLoss),
    recoveryFactor,
    bestDay: bestDay * 100,
    worstDay: worstDay * 100,
    totalTrades: trades.length,
    winningTrades: winners.length,
    losingTrades: losers.length,
    grossProfit,
    grossLoss,
  };
}

/**
 * Combine a finished run and its metrics into the reporting structure
 */
export function buildReport(result: BacktestResult, config: AnalyticsConfig): PerformanceReport {
  const metrics = analyzePerformance(result.equityCurve, result.trades, config);
  const initialValue = result.execution.initialCapital;

  return {
    strategyName: result.strategyName,
    asset: result.asset,
    initialValue,
    finalValue: result.finalValue,
    totalProfit: result.finalValue - initialValue,
    ...metrics,
    trades: result.trades,
    equityCurve: result.equityCurve,
    dateRange: result.dateRange,
  };
}
