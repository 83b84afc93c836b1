/**
 * @barsim/backtester
 *
 * Bar-by-bar strategy simulation with indicator, strategy, execution and
 * analytics stages.
 */

export * from './indicators/index.js';
export * from './strategies/index.js';
export * from './execution/index.js';
export * from './backtest/index.js';
export * from './analytics/index.js';
export * from './config/index.js';
