/**
 * Backtest Orchestrator
 *
 * Drives one strategy over a bar sequence:
 *
 *   INIT -> RUNNING (one step per bar) -> FINALIZING (force close) -> DONE
 *
 * Each step fills any pending next-open order, updates the indicators,
 * asks the strategy for a signal, applies it at the broker and appends an
 * equity point. No step reads a bar beyond the current index.
 */

import {
  ConfigurationError,
  ExecutionConfigSchema,
  createSilentLogger,
  type Bar,
  type EquityPoint,
  type ExecutionConfig,
  type ExecutionConfigInput,
  type Fill,
  type Logger,
  type Position,
  type Trade,
} from '@barsim/shared';
import { IndicatorEngine, type IndicatorSnapshot } from '../indicators/index.js';
import {
  decideSignal,
  getStrategyName,
  parseStrategyConfig,
  requiredIndicators,
  type StrategyConfig,
  type StrategyConfigInput,
} from '../strategies/index.js';
import { SimulatedBroker } from '../execution/index.js';
import type {
  BacktestJob,
  BacktestOptions,
  BacktestPhase,
  BacktestResult,
  SignalRecord,
} from './types.js';

/**
 * A single backtest run. Configuration is validated on construction,
 * so a run that exists can always complete.
 */
export class BacktestRun {
  readonly strategy: StrategyConfig;
  readonly execution: ExecutionConfig;
  readonly strategyName: string;
  readonly asset?: string;

  private readonly bars: readonly Bar[];
  private readonly logger: Logger;
  private currentPhase: BacktestPhase = 'INIT';
  private result: BacktestResult | null = null;

  constructor(
    bars: readonly Bar[],
    strategy: StrategyConfigInput,
    execution: ExecutionConfigInput,
    options: BacktestOptions = {}
  ) {
    if (bars.length === 0) {
      throw new ConfigurationError('Backtest needs at least one bar');
    }

    const parsedExecution = ExecutionConfigSchema.safeParse(execution);
    if (!parsedExecution.success) {
      throw ConfigurationError.fromZod('Invalid execution configuration', parsedExecution.error);
    }

    this.strategy = parseStrategyConfig(strategy);
    this.execution = parsedExecution.data;
    this.strategyName = getStrategyName(this.strategy);
    this.bars = bars;
    this.asset = options.asset;

    const maxPeriod = IndicatorEngine.maxPeriod(requiredIndicators(this.strategy));
    if (maxPeriod >= bars.length) {
      throw new ConfigurationError(
        `Indicator period ${maxPeriod} must be shorter than the ${bars.length} available bars`,
        { maxPeriod, barCount: bars.length }
      );
    }

    this.logger = (options.logger ?? createSilentLogger('backtester')).child({
      strategy: this.strategyName,
    });
  }

  get phase(): BacktestPhase {
    return this.currentPhase;
  }

  /**
   * Run to completion. Calling again returns the same result.
   */
  run(): BacktestResult {
    if (this.result) {
      return this.result;
    }

    const startTime = Date.now();
    const { bars, strategy, execution } = this;

    const broker = new SimulatedBroker(execution);
    const indicators = new IndicatorEngine(requiredIndicators(strategy));
    const equityCurve: EquityPoint[] = [];
    const signals: SignalRecord[] = [];

    broker.on('position:opened', (position: Position, fill: Fill) => {
      this.logger.debug('Position opened', {
        timestamp: fill.timestamp,
        price: fill.price,
        size: position.size,
        commission: fill.commission,
      });
    });
    broker.on('position:closed', (trade: Trade) => {
      this.logger.debug('Position closed', {
        timestamp: trade.exitTimestamp,
        price: trade.exitPrice,
        pnl: trade.pnl,
        reason: trade.exitReason,
      });
    });

    this.transition('RUNNING');

    let previous: IndicatorSnapshot | null = null;
    let pending: SignalRecord | null = null;

    for (const [index, bar] of bars.entries()) {
      if (pending) {
        this.applySignal(broker, pending, bar, index, bar.open);
        pending = null;
      }

      const current = indicators.update(bar.close);
      const signal = decideSignal(strategy, {
        current,
        previous,
        bar,
        inPosition: broker.inPosition,
      });

      if (signal !== 'HOLD') {
        const record: SignalRecord = {
          index,
          timestamp: bar.timestamp,
          signal,
          price: bar.close,
          executed: false,
        };
        signals.push(record);

        if (execution.fillTiming === 'close') {
          this.applySignal(broker, record, bar, index, bar.close);
        } else {
          pending = record;
        }
      }

      equityCurve.push({ timestamp: bar.timestamp, value: broker.markToMarket(bar.close) });
      previous = current;
    }

    this.transition('FINALIZING');

    if (pending !== null) {
      this.logger.debug('Dropping signal from the final bar', { timestamp: bars[bars.length - 1]?.timestamp });
    }

    const lastIndex = bars.length - 1;
    const lastBar = bars[lastIndex];
    const lastPoint = equityCurve[lastIndex];
    if (lastBar && lastPoint) {
      broker.forceClose(lastBar, lastIndex);
      lastPoint.value = broker.cash;
    }

    const firstBar = bars[0];
    const trades = broker.getTrades();
    const result: BacktestResult = {
      strategyName: this.strategyName,
      asset: this.asset,
      strategy,
      execution,
      finalValue: broker.cash,
      trades,
      equityCurve,
      signals,
      indicatorSeries: Object.fromEntries(indicators.getAllSeries()),
      dateRange: {
        from: new Date((firstBar?.timestamp ?? 0) * 1000),
        to: new Date((lastBar?.timestamp ?? 0) * 1000),
        barCount: bars.length,
      },
      executedAt: new Date(),
      executionTimeMs: Date.now() - startTime,
    };

    this.result = result;
    this.transition('DONE');

    this.logger.info('Backtest complete', {
      bars: bars.length,
      trades: trades.length,
      finalValue: result.finalValue,
      executionTimeMs: result.executionTimeMs,
    });

    return result;
  }

  private applySignal(broker: SimulatedBroker, record: SignalRecord, bar: Bar, index: number, price: number): void {
    const fill = broker.apply(record.signal, bar, index, price);
    if (fill) {
      record.executed = true;
      record.fillPrice = fill.price;
    }
  }

  private transition(next: BacktestPhase): void {
    this.logger.debug('Phase change', { from: this.currentPhase, to: next });
    this.currentPhase = next;
  }
}

/**
 * Run one strategy over the bars
 *
 * @throws ConfigurationError when the bars or configuration are invalid
 */
export function runBacktest(
  bars: readonly Bar[],
  strategy: StrategyConfigInput,
  execution: ExecutionConfigInput,
  options: BacktestOptions = {}
): BacktestResult {
  return new BacktestRun(bars, strategy, execution, options).run();
}

/**
 * Run independent configurations over the same bars
 */
export function runBacktests(
  bars: readonly Bar[],
  jobs: readonly BacktestJob[],
  execution: ExecutionConfigInput,
  options: BacktestOptions = {}
): BacktestResult[] {
  return jobs.map((job) =>
    runBacktest(bars, job.strategy, { ...execution, ...job.execution }, options)
  );
}
