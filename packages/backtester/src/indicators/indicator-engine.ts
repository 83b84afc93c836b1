/**
 * Indicator Engine
 *
 * Owns one rolling indicator per named spec and advances all of them
 * bar by bar. Every indicator series stays aligned one-to-one with the
 * bars seen so far; values before warm-up are `null`.
 */

import {
  createIndicator,
  warmupBarsFor,
  type IndicatorSpec,
  type IndicatorValue,
  type RollingIndicator,
} from './rolling-indicators.js';

/** Named indicator specs, e.g. `{ fast: { type: 'sma', period: 10 } }` */
export type IndicatorSpecMap = Readonly<Record<string, IndicatorSpec>>;

/** Indicator values as of one bar, keyed like the spec map */
export type IndicatorSnapshot = Readonly<Record<string, IndicatorValue>>;

export class IndicatorEngine {
  private readonly indicators = new Map<string, RollingIndicator>();
  private readonly series = new Map<string, IndicatorValue[]>();
  private latest: IndicatorSnapshot | null = null;
  private barCount = 0;

  constructor(readonly specs: IndicatorSpecMap) {
    for (const [key, spec] of Object.entries(specs)) {
      this.indicators.set(key, createIndicator(spec));
      this.series.set(key, []);
    }
  }

  /**
   * Feed the next close and return the snapshot for that bar
   */
  update(close: number): IndicatorSnapshot {
    const snapshot: Record<string, IndicatorValue> = {};

    for (const [key, indicator] of this.indicators) {
      const value = indicator.nextValue(close);
      snapshot[key] = value;
      this.series.get(key)?.push(value);
    }

    this.barCount++;
    this.latest = snapshot;
    return snapshot;
  }

  /** Snapshot of the last processed bar */
  get current(): IndicatorSnapshot | null {
    return this.latest;
  }

  get barsProcessed(): number {
    return this.barCount;
  }

  /** True once every indicator has produced a value */
  get isReady(): boolean {
    return this.barCount >= this.warmupBars;
  }

  /** Bars needed until every indicator is ready */
  get warmupBars(): number {
    return IndicatorEngine.warmupBars(this.specs);
  }

  getSeries(key: string): readonly IndicatorValue[] {
    return this.series.get(key) ?? [];
  }

  getAllSeries(): Map<string, IndicatorValue[]> {
    return new Map(Array.from(this.series, ([key, values]) => [key, [...values]]));
  }

  static warmupBars(specs: IndicatorSpecMap): number {
    return Object.values(specs).reduce((max, spec) => Math.max(max, warmupBarsFor(spec)), 0);
  }

  /** Longest lookback period among the specs */
  static maxPeriod(specs: IndicatorSpecMap): number {
    return Object.values(specs).reduce((max, spec) => Math.max(max, spec.period), 0);
  }
}
