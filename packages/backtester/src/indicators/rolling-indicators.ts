/**
 * Rolling Technical Indicators
 *
 * Streaming indicators fed one close at a time, each over its own
 * rolling window. RSI uses plain averages, not Wilder smoothing.
 *
 * Every indicator returns `null` until its window is full.
 */

import { ConfigurationError } from '@barsim/shared';

// =============================================================================
// TYPES
// =============================================================================

export type IndicatorSpec =
  | { type: 'sma'; period: number }
  | { type: 'bollinger'; period: number; stdDev: number }
  | { type: 'rsi'; period: number }
  | { type: 'roc'; period: number };

export interface BollingerValue {
  middle: number;
  upper: number;
  lower: number;
}

/** `null` means not ready (warm-up not complete) */
export type IndicatorValue = number | BollingerValue | null;

export interface RollingIndicator {
  readonly spec: IndicatorSpec;
  /** Bars needed before the first value */
  readonly warmupBars: number;
  nextValue(close: number): IndicatorValue;
}

// =============================================================================
// ROLLING WINDOW
// =============================================================================

/**
 * Fixed-size FIFO window
 */
export class RollingWindow {
  private readonly items: number[] = [];

  constructor(readonly capacity: number) {}

  push(value: number): void {
    this.items.push(value);
    if (this.items.length > this.capacity) {
      this.items.shift();
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isFull(): boolean {
    return this.items.length === this.capacity;
  }

  /** Oldest value still in the window */
  get oldest(): number | undefined {
    return this.items[0];
  }

  values(): readonly number[] {
    return this.items;
  }
}

// =============================================================================
// INDICATORS
// =============================================================================

/**
 * Mean and population standard deviation of a window, taken as
 * deviations from its oldest value. A constant window yields that value
 * with zero spread, exactly.
 */
function windowStats(values: readonly number[]): { mean: number; stdDev: number } {
  const ref = values[0];
  if (ref === undefined) return { mean: NaN, stdDev: NaN };

  let sum = 0;
  for (const value of values) sum += value - ref;
  const meanDeviation = sum / values.length;

  let squares = 0;
  for (const value of values) {
    const d = value - ref - meanDeviation;
    squares += d * d;
  }

  return { mean: ref + meanDeviation, stdDev: Math.sqrt(squares / values.length) };
}

/**
 * Simple Moving Average
 */
export class SmaIndicator implements RollingIndicator {
  readonly spec: IndicatorSpec;
  readonly warmupBars: number;
  private readonly closes: RollingWindow;

  constructor(readonly period: number) {
    this.spec = { type: 'sma', period };
    this.warmupBars = period;
    this.closes = new RollingWindow(period);
  }

  nextValue(close: number): number | null {
    this.closes.push(close);
    if (!this.closes.isFull) return null;
    return windowStats(this.closes.values()).mean;
  }
}

/**
 * Bollinger Bands (population standard deviation)
 */
export class BollingerIndicator implements RollingIndicator {
  readonly spec: IndicatorSpec;
  readonly warmupBars: number;
  private readonly closes: RollingWindow;

  constructor(readonly period: number, readonly stdDev: number) {
    this.spec = { type: 'bollinger', period, stdDev };
    this.warmupBars = period;
    this.closes = new RollingWindow(period);
  }

  nextValue(close: number): BollingerValue | null {
    this.closes.push(close);
    if (!this.closes.isFull) return null;

    const { mean, stdDev } = windowStats(this.closes.values());
    const width = this.stdDev * stdDev;
    return { middle: mean, upper: mean + width, lower: mean - width };
  }
}

/**
 * Relative Strength Index with simple (non-smoothed) averages
 */
export class RsiIndicator implements RollingIndicator {
  readonly spec: IndicatorSpec;
  readonly warmupBars: number;
  private readonly changes: RollingWindow;
  private previousClose: number | null = null;

  constructor(readonly period: number) {
    this.spec = { type: 'rsi', period };
    this.warmupBars = period + 1;
    this.changes = new RollingWindow(period);
  }

  nextValue(close: number): number | null {
    if (this.previousClose !== null) {
      this.changes.push(close - this.previousClose);
    }
    this.previousClose = close;

    if (!this.changes.isFull) return null;

    let gains = 0;
    let losses = 0;
    for (const change of this.changes.values()) {
      if (change > 0) gains += change;
      else losses += Math.abs(change);
    }

    const avgGain = gains / this.period;
    const avgLoss = losses / this.period;

    if (avgLoss === 0) return 100;

    const rs = avgGain / avgLoss;
    return 100 - 100 / (1 + rs);
  }
}

/**
 * Rate of Change in %
 */
export class RocIndicator implements RollingIndicator {
  readonly spec: IndicatorSpec;
  readonly warmupBars: number;
  private readonly closes: RollingWindow;

  constructor(readonly period: number) {
    this.spec = { type: 'roc', period };
    this.warmupBars = period + 1;
    this.closes = new RollingWindow(period + 1);
  }

  nextValue(close: number): number | null {
    this.closes.push(close);
    const past = this.closes.oldest;
    if (!this.closes.isFull || past === undefined) return null;
    return ((close - past) / past) * 100;
  }
}

// =============================================================================
// FACTORY & HELPERS
// =============================================================================

/**
 * Bars an indicator needs before it produces a value
 */
export function warmupBarsFor(spec: IndicatorSpec): number {
  switch (spec.type) {
    case 'sma':
    case 'bollinger':
      return spec.period;
    case 'rsi':
    case 'roc':
      return spec.period + 1;
  }
}

export function createIndicator(spec: IndicatorSpec): RollingIndicator {
  if (!Number.isInteger(spec.period) || spec.period < 1) {
    throw new ConfigurationError(`Indicator ${spec.type} needs a positive integer period`, {
      spec,
    });
  }

  switch (spec.type) {
    case 'sma':
      return new SmaIndicator(spec.period);
    case 'bollinger':
      return new BollingerIndicator(spec.period, spec.stdDev);
    case 'rsi':
      return new RsiIndicator(spec.period);
    case 'roc':
      return new RocIndicator(spec.period);
  }
}

export function isBollingerValue(value: IndicatorValue | undefined): value is BollingerValue {
  return typeof value === 'object' && value !== null;
}

/**
 * Check if a series crosses above a line between two consecutive bars
 */
export function crossesAbove(
  previous: number,
  current: number,
  previousLine: number,
  currentLine: number
): boolean {
  return previous <= previousLine && current > currentLine;
}

/**
 * Check if a series crosses below a line between two consecutive bars
 */
export function crossesBelow(
  previous: number,
  current: number,
  previousLine: number,
  currentLine: number
): boolean {
  return previous >= previousLine && current < currentLine;
}
