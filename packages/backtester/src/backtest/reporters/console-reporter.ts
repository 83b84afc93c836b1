/**
 * Console Reporter for Backtest Results
 *
 * Pretty-prints performance reports to the console.
 */

import type { PerformanceMetrics, PerformanceReport } from '../../analytics/index.js';
import type { StrategyInfo } from '../../strategies/index.js';

/**
 * Format a number with fixed decimals
 */
function fmt(n: number, decimals: number = 2): string {
  return n.toFixed(decimals);
}

/**
 * Format currency
 */
function fmtCurrency(n: number): string {
  return `$${fmt(n)}`;
}

/**
 * Format percentage
 */
function fmtPct(n: number): string {
  return `${fmt(n)}%`;
}

function fmtProfitFactor(n: number): string {
  return n === Infinity ? '∞' : fmt(n);
}

/**
 * Create a horizontal line
 */
function line(char: string = '─', length: number = 60): string {
  return char.repeat(length);
}

function fmtDate(date: Date): string {
  return date.toISOString().split('T')[0] ?? '';
}

/**
 * Metrics summary block
 */
export function formatPerformanceSummary(metrics: PerformanceMetrics): string {
  const lines = [
    line('='),
    'PERFORMANCE ANALYSIS SUMMARY',
    line('='),
    `Total Return:              ${fmtPct(metrics.totalReturn)}`,
    `Annual Return:             ${fmtPct(metrics.annualReturn)}`,
    `Volatility (Annual):       ${fmtPct(metrics.volatility)}`,
    '',
    'Risk-Adjusted Metrics:',
    `  Sharpe Ratio:            ${fmt(metrics.sharpeRatio)}`,
    `  Sortino Ratio:           ${fmt(metrics.sortinoRatio)}`,
    `  Calmar Ratio:            ${fmt(metrics.calmarRatio)}`,
    '',
    'Drawdown Metrics:',
    `  Max Drawdown:            ${fmtPct(metrics.maxDrawdown)}`,
    `  Max DD Duration (bars):  ${metrics.drawdownDuration}`,
    '',
    'Trade Metrics:',
    `  Win Rate:                ${fmtPct(metrics.winRate)}`,
    `  Profit Factor:           ${fmtProfitFactor(metrics.profitFactor)}`,
    `  Recovery Factor:         ${fmt(metrics.recoveryFactor)}`,
    '',
    'Daily Range:',
    `  Best Day:                ${fmtPct(metrics.bestDay)}`,
    `  Worst Day:               ${fmtPct(metrics.worstDay)}`,
    line('='),
  ];
  return lines.join('\n');
}

/**
 * Print a full report to the console
 */
export function printPerformanceReport(report: PerformanceReport): void {
  const { dateRange } = report;

  console.log('\n' + line('═'));
  console.log(`  BACKTEST RESULT: ${report.strategyName}${report.asset ? ` (${report.asset})` : ''}`);
  console.log(line('═'));

  console.log('\n📊 PERIOD');
  console.log(line());
  console.log(`  Period:       ${fmtDate(dateRange.from)} → ${fmtDate(dateRange.to)}`);
  console.log(`  Bars:         ${dateRange.barCount.toLocaleString()}`);

  console.log('\n💰 CAPITAL');
  console.log(line());
  console.log(`  Initial:      ${fmtCurrency(report.initialValue)}`);
  console.log(`  Final:        ${fmtCurrency(report.finalValue)}`);
  console.log(`  Profit:       ${fmtCurrency(report.totalProfit)}`);

  console.log('\n📈 TRADES');
  console.log(line());
  console.log(`  Trades:       ${report.totalTrades} (${report.winningTrades}W / ${report.losingTrades}L)`);
  console.log(`  Gross Profit: ${fmtCurrency(report.grossProfit)}`);
  console.log(`  Gross Loss:   ${fmtCurrency(report.grossLoss)}`);

  console.log('\n' + formatPerformanceSummary(report) + '\n');
}

/**
 * One comparison row per strategy
 */
export function formatComparisonRow(report: PerformanceReport): string {
  return [
    report.strategyName.padEnd(18),
    fmtPct(report.totalReturn).padStart(10),
    fmt(report.sharpeRatio).padStart(8),
    fmtPct(report.maxDrawdown).padStart(10),
    fmtPct(report.winRate).padStart(9),
    fmtProfitFactor(report.profitFactor).padStart(7),
    String(report.totalTrades).padStart(7),
  ].join(' ');
}

/**
 * Print a side-by-side strategy comparison, best total return first
 */
export function printComparison(reports: readonly PerformanceReport[]): void {
  const header = [
    'Strategy'.padEnd(18),
    'Return'.padStart(10),
    'Sharpe'.padStart(8),
    'Max DD'.padStart(10),
    'Win Rate'.padStart(9),
    'PF'.padStart(7),
    'Trades'.padStart(7),
  ].join(' ');

  console.log('\n' + line('═', header.length));
  console.log('  STRATEGY COMPARISON');
  console.log(line('═', header.length));
  console.log(header);
  console.log(line('─', header.length));

  [...reports]
    .sort((a, b) => b.totalReturn - a.totalReturn)
    .forEach((report) => console.log(formatComparisonRow(report)));

  console.log(line('═', header.length) + '\n');
}

/**
 * Print the available strategies and their defaults
 */
export function printStrategyList(strategies: readonly StrategyInfo[]): void {
  console.log('\n📋 AVAILABLE STRATEGIES');
  console.log(line());
  for (const strategy of strategies) {
    const { kind: _kind, ...params } = strategy.defaults;
    console.log(`  ${strategy.kind.padEnd(14)} ${strategy.name}`);
    console.log(`  ${''.padEnd(14)} ${strategy.description}`);
    console.log(`  ${''.padEnd(14)} defaults: ${JSON.stringify(params)}`);
  }
  console.log('');
}

/**
 * Print a compact one-line summary
 */
export function printCompactSummary(report: PerformanceReport): void {
  console.log(
    `${report.strategyName} | ` +
      `${report.totalTrades} trades | ` +
      `${fmtPct(report.winRate)} WR | ` +
      `${fmtCurrency(report.totalProfit)} P&L | ` +
      `PF ${fmtProfitFactor(report.profitFactor)} | ` +
      `DD ${fmtPct(report.maxDrawdown)}`
  );
}
