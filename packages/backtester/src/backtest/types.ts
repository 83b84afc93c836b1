/**
 * Types for the Backtest Orchestrator
 */

import type {
  DateRange,
  EquityPoint,
  ExecutionConfig,
  ExecutionConfigInput,
  Logger,
  Trade,
} from '@barsim/shared';
import type { IndicatorValue } from '../indicators/index.js';
import type { StrategyConfig, StrategyConfigInput } from '../strategies/index.js';

// =============================================================================
// RUN LIFECYCLE
// =============================================================================

export type BacktestPhase = 'INIT' | 'RUNNING' | 'FINALIZING' | 'DONE';

export interface BacktestOptions {
  /** Defaults to a silent logger */
  logger?: Logger;
  /** Instrument label carried onto the result, e.g. the CSV file's ticker */
  asset?: string;
}

// =============================================================================
// SIGNAL LOG
// =============================================================================

/**
 * Non-HOLD strategy decision and whether the broker applied it
 */
export interface SignalRecord {
  /** Index of the bar that produced the signal */
  index: number;
  timestamp: number;
  signal: 'BUY' | 'SELL';
  /** Close of the signalling bar */
  price: number;
  executed: boolean;
  /** Fill price, when executed */
  fillPrice?: number;
}

// =============================================================================
// RESULT
// =============================================================================

export interface BacktestResult {
  strategyName: string;
  asset?: string;
  strategy: StrategyConfig;
  execution: ExecutionConfig;
  finalValue: number;
  trades: Trade[];
  /** One point per bar */
  equityCurve: EquityPoint[];
  signals: SignalRecord[];
  /** Indicator values aligned one-to-one with bars */
  indicatorSeries: Record<string, IndicatorValue[]>;
  dateRange: DateRange;
  executedAt: Date;
  executionTimeMs: number;
}

/**
 * One configuration in a multi-strategy comparison
 */
export interface BacktestJob {
  strategy: StrategyConfigInput;
  /** Overrides on top of the shared execution config */
  execution?: Partial<ExecutionConfigInput>;
}
