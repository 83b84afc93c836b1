/**
 * Backtest Module
 */

export * from './types.js';
export { BacktestRun, runBacktest, runBacktests } from './backtest-engine.js';
export * from './data/index.js';
export * from './reporters/index.js';
