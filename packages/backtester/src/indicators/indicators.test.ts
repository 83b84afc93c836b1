/**
 * Tests for Rolling Indicators and the Indicator Engine
 */

import { describe, it, expect } from 'vitest';
import {
  SmaIndicator,
  BollingerIndicator,
  RsiIndicator,
  RocIndicator,
  RollingWindow,
  IndicatorEngine,
  createIndicator,
  crossesAbove,
  crossesBelow,
  isBollingerValue,
  type IndicatorValue,
  type RollingIndicator,
} from './index.js';
import { ConfigurationError } from '@barsim/shared';

/**
 * Helper: feed closes and collect every output
 */
function feed(indicator: RollingIndicator, closes: number[]): IndicatorValue[] {
  return closes.map((close) => indicator.nextValue(close));
}

describe('RollingWindow', () => {
  it('should evict the oldest value once full', () => {
    const window = new RollingWindow(3);
    [1, 2, 3, 4].forEach((v) => window.push(v));

    expect(window.isFull).toBe(true);
    expect(window.values()).toEqual([2, 3, 4]);
    expect(window.oldest).toBe(2);
  });
});

describe('SMA Indicator', () => {
  it('should return null until the window is full', () => {
    const values = feed(new SmaIndicator(3), [100, 110, 120]);
    expect(values).toEqual([null, null, 110]);
  });

  it('should only use last N closes', () => {
    const values = feed(new SmaIndicator(3), [50, 60, 100, 110, 120]);
    expect(values.slice(2)).toEqual([70, 90, 110]);
  });

  it.each([100.1, 0.3, 57.7])('should return exactly %s on a flat series', (price) => {
    const values = feed(new SmaIndicator(20), Array<number>(25).fill(price));
    expect(values.slice(19)).toEqual(Array<number>(6).fill(price));
  });
});

describe('Bollinger Bands', () => {
  it('should return null when not enough data', () => {
    const values = feed(new BollingerIndicator(20, 2), [100, 105]);
    expect(values).toEqual([null, null]);
  });

  it('should collapse the bands on a constant series', () => {
    const values = feed(new BollingerIndicator(20, 2), Array<number>(20).fill(100));
    const last = values[19];

    expect(isBollingerValue(last)).toBe(true);
    if (!isBollingerValue(last)) return;
    expect(last.middle).toBe(100);
    expect(last.upper).toBe(100);
    expect(last.lower).toBe(100);
  });

  it.each([100.1, 0.3, 57.7])('should collapse the bands exactly at %s', (price) => {
    const values = feed(new BollingerIndicator(20, 2), Array<number>(25).fill(price));

    for (const value of values.slice(19)) {
      expect(value).toEqual({ middle: price, upper: price, lower: price });
    }
  });

  it('should use the population standard deviation', () => {
    // mean 3, variance (4 + 1 + 0 + 1 + 4) / 5 = 2
    const values = feed(new BollingerIndicator(5, 2), [1, 2, 3, 4, 5]);
    const last = values[4];

    if (!isBollingerValue(last)) throw new Error('expected bands');
    expect(last.middle).toBeCloseTo(3, 10);
    expect(last.upper).toBeCloseTo(3 + 2 * Math.SQRT2, 8);
    expect(last.lower).toBeCloseTo(3 - 2 * Math.SQRT2, 8);
  });
});

describe('RSI Indicator', () => {
  it('should need period + 1 closes', () => {
    const rsi = new RsiIndicator(3);
    expect(rsi.warmupBars).toBe(4);
    expect(feed(rsi, [10, 11, 12])).toEqual([null, null, null]);
  });

  it('should average gains and losses without smoothing', () => {
    // changes +1, +1, -1 -> RS = (2/3) / (1/3) = 2
    const values = feed(new RsiIndicator(3), [10, 11, 12, 11]);
    expect(values[3]).toBeCloseTo(100 - 100 / 3, 10);
  });

  it('should drop changes that left the window', () => {
    // changes +10, -8, -1, +1 -> window [-8, -1, +1], RS = 1/9
    const values = feed(new RsiIndicator(3), [10, 20, 12, 11, 12]);
    expect(values[4]).toBeCloseTo(10, 10);
  });

  it('should return 100 when there are no losses', () => {
    expect(feed(new RsiIndicator(3), [1, 2, 3, 4])[3]).toBe(100);
    expect(feed(new RsiIndicator(3), [5, 5, 5, 5])[3]).toBe(100);
  });

  it('should return 50 for a sideways market', () => {
    const values = feed(new RsiIndicator(4), [100, 101, 100, 101, 100]);
    expect(values[4]).toBeCloseTo(50, 10);
  });
});

describe('ROC Indicator', () => {
  it('should compare against the close n bars back', () => {
    const values = feed(new RocIndicator(2), [100, 105, 110, 99]);

    expect(values[0]).toBeNull();
    expect(values[1]).toBeNull();
    expect(values[2]).toBeCloseTo(10, 10);
    expect(values[3]).toBeCloseTo(((99 - 105) / 105) * 100, 10);
  });
});

describe('createIndicator', () => {
  it('should reject non-positive periods', () => {
    expect(() => createIndicator({ type: 'sma', period: 0 })).toThrow(ConfigurationError);
    expect(() => createIndicator({ type: 'rsi', period: 2.5 })).toThrow(ConfigurationError);
  });
});

describe('IndicatorEngine', () => {
  it('should keep every series aligned with the bars', () => {
    const engine = new IndicatorEngine({
      fast: { type: 'sma', period: 2 },
      momentum: { type: 'roc', period: 3 },
    });

    const closes = [10, 12, 14, 16, 18];
    const snapshots = closes.map((c) => engine.update(c));

    expect(engine.barsProcessed).toBe(5);
    expect(engine.getSeries('fast')).toHaveLength(5);
    expect(engine.getSeries('momentum')).toHaveLength(5);
    expect(engine.getSeries('fast')).toEqual([null, 11, 13, 15, 17]);
    expect(snapshots[2]).toEqual({ fast: 13, momentum: null });
    expect(snapshots[3]?.momentum).toBeCloseTo(60, 10);
  });

  it('should report warm-up as the slowest indicator', () => {
    const engine = new IndicatorEngine({
      fast: { type: 'sma', period: 5 },
      rsi: { type: 'rsi', period: 5 },
    });

    expect(engine.warmupBars).toBe(6);
    expect(IndicatorEngine.maxPeriod(engine.specs)).toBe(5);

    [1, 2, 3, 4, 5].forEach((c) => engine.update(c));
    expect(engine.isReady).toBe(false);
    engine.update(6);
    expect(engine.isReady).toBe(true);
  });

  it('should return an empty series for unknown keys', () => {
    const engine = new IndicatorEngine({ fast: { type: 'sma', period: 2 } });
    expect(engine.getSeries('missing')).toEqual([]);
  });
});

describe('Crossovers', () => {
  it('should detect a cross above only when the previous bar was at or below', () => {
    expect(crossesAbove(9, 11, 10, 10)).toBe(true);
    expect(crossesAbove(10, 11, 10, 10)).toBe(true);
    expect(crossesAbove(11, 12, 10, 10)).toBe(false);
  });

  it('should detect a cross below only when the previous bar was at or above', () => {
    expect(crossesBelow(11, 9, 10, 10)).toBe(true);
    expect(crossesBelow(10, 9, 10, 10)).toBe(true);
    expect(crossesBelow(9, 8, 10, 10)).toBe(false);
  });
});
