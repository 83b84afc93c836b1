/**
 * Backtest Reporters
 */

export {
  formatPerformanceSummary,
  formatComparisonRow,
  printPerformanceReport,
  printComparison,
  printStrategyList,
  printCompactSummary,
} from './console-reporter.js';

export { toJSON, exportToJSON, generateFilename, type JSONExportOptions } from './json-reporter.js';
