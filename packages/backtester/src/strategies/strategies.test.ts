/**
 * Tests for the Strategy Engine
 */

import { describe, it, expect } from 'vitest';
import type { Bar } from '@barsim/shared';
import { ConfigurationError } from '@barsim/shared';
import type { IndicatorSnapshot } from '../indicators/index.js';
import {
  decideSignal,
  requiredIndicators,
  listStrategies,
  parseStrategyConfig,
  getStrategyName,
  isStrategyKind,
  STRATEGY_KINDS,
  type DecisionInput,
  type StrategyConfig,
} from './index.js';

function bar(close: number): Bar {
  return { timestamp: 1_700_000_000, open: close, high: close, low: close, close, volume: 1000 };
}

function input(
  current: IndicatorSnapshot,
  options: { previous?: IndicatorSnapshot | null; close?: number; inPosition?: boolean } = {}
): DecisionInput {
  return {
    current,
    previous: options.previous ?? null,
    bar: bar(options.close ?? 100),
    inPosition: options.inPosition ?? false,
  };
}

describe('MA Crossover Strategy', () => {
  const config: StrategyConfig = { kind: 'ma_crossover', fastPeriod: 3, slowPeriod: 5 };

  it('should BUY when fast crosses above slow', () => {
    const signal = decideSignal(
      config,
      input({ fast: 101, slow: 100 }, { previous: { fast: 99, slow: 100 } })
    );
    expect(signal).toBe('BUY');
  });

  it('should treat a touch on the previous bar as a cross', () => {
    const signal = decideSignal(
      config,
      input({ fast: 101, slow: 100 }, { previous: { fast: 100, slow: 100 } })
    );
    expect(signal).toBe('BUY');
  });

  it('should SELL when fast crosses below slow', () => {
    const signal = decideSignal(
      config,
      input({ fast: 99, slow: 100 }, { previous: { fast: 101, slow: 100 } })
    );
    expect(signal).toBe('SELL');
  });

  it('should HOLD while fast stays above slow', () => {
    const signal = decideSignal(
      config,
      input({ fast: 105, slow: 100 }, { previous: { fast: 104, slow: 100 } })
    );
    expect(signal).toBe('HOLD');
  });

  it('should HOLD when the previous snapshot is missing or not ready', () => {
    expect(decideSignal(config, input({ fast: 101, slow: 100 }))).toBe('HOLD');
    expect(
      decideSignal(config, input({ fast: 101, slow: 100 }, { previous: { fast: 99, slow: null } }))
    ).toBe('HOLD');
  });
});

describe('RSI Strategy', () => {
  const config: StrategyConfig = { kind: 'rsi', period: 14, lower: 30, upper: 70 };

  it('should BUY when oversold and flat', () => {
    expect(decideSignal(config, input({ rsi: 25 }))).toBe('BUY');
  });

  it('should not BUY when already positioned', () => {
    expect(decideSignal(config, input({ rsi: 25 }, { inPosition: true }))).toBe('HOLD');
  });

  it('should SELL when overbought and positioned', () => {
    expect(decideSignal(config, input({ rsi: 75 }, { inPosition: true }))).toBe('SELL');
    expect(decideSignal(config, input({ rsi: 75 }))).toBe('HOLD');
  });

  it('should use strict thresholds', () => {
    expect(decideSignal(config, input({ rsi: 30 }))).toBe('HOLD');
    expect(decideSignal(config, input({ rsi: 70 }, { inPosition: true }))).toBe('HOLD');
  });

  it('should HOLD before warm-up', () => {
    expect(decideSignal(config, input({ rsi: null }))).toBe('HOLD');
  });
});

describe('Bollinger Bands Strategy', () => {
  const config: StrategyConfig = { kind: 'bollinger', period: 20, stdMultiplier: 2 };
  const bands = { middle: 100, upper: 110, lower: 90 };

  it('should BUY at the lower band when flat', () => {
    expect(decideSignal(config, input({ bands }, { close: 90 }))).toBe('BUY');
    expect(decideSignal(config, input({ bands }, { close: 85 }))).toBe('BUY');
  });

  it('should SELL at the upper band when positioned', () => {
    expect(decideSignal(config, input({ bands }, { close: 110, inPosition: true }))).toBe('SELL');
  });

  it('should HOLD inside the bands', () => {
    expect(decideSignal(config, input({ bands }, { close: 100 }))).toBe('HOLD');
    expect(decideSignal(config, input({ bands }, { close: 100, inPosition: true }))).toBe('HOLD');
  });

  it('should prefer BUY when collapsed bands satisfy both conditions', () => {
    const collapsed = { middle: 100, upper: 100, lower: 100 };
    expect(decideSignal(config, input({ bands: collapsed }, { close: 100 }))).toBe('BUY');
    expect(
      decideSignal(config, input({ bands: collapsed }, { close: 100, inPosition: true }))
    ).toBe('SELL');
  });

  it('should HOLD when the bands are not ready', () => {
    expect(decideSignal(config, input({ bands: null }, { close: 50 }))).toBe('HOLD');
  });
});

describe('Momentum Strategy', () => {
  const config: StrategyConfig = {
    kind: 'momentum',
    rocPeriod: 10,
    rocThreshold: 0.5,
    trendPeriod: 20,
  };

  it('should BUY on strong momentum above trend', () => {
    expect(decideSignal(config, input({ roc: 1.2, trend: 95 }, { close: 100 }))).toBe('BUY');
  });

  it('should not BUY below trend', () => {
    expect(decideSignal(config, input({ roc: 1.2, trend: 105 }, { close: 100 }))).toBe('HOLD');
  });

  it('should SELL when momentum reverses', () => {
    const signal = decideSignal(
      config,
      input({ roc: -0.8, trend: 95 }, { close: 100, inPosition: true })
    );
    expect(signal).toBe('SELL');
  });

  it('should SELL when price drops below trend', () => {
    const signal = decideSignal(
      config,
      input({ roc: 0.2, trend: 105 }, { close: 100, inPosition: true })
    );
    expect(signal).toBe('SELL');
  });

  it('should HOLD while positioned with intact momentum', () => {
    const signal = decideSignal(
      config,
      input({ roc: 1.2, trend: 95 }, { close: 100, inPosition: true })
    );
    expect(signal).toBe('HOLD');
  });

  it('should HOLD when any input is not ready', () => {
    expect(decideSignal(config, input({ roc: 1.2, trend: null }, { close: 100 }))).toBe('HOLD');
  });
});

describe('Strategy registry', () => {
  it('should map each strategy to its indicators', () => {
    expect(requiredIndicators({ kind: 'ma_crossover', fastPeriod: 3, slowPeriod: 5 })).toEqual({
      fast: { type: 'sma', period: 3 },
      slow: { type: 'sma', period: 5 },
    });
    expect(requiredIndicators({ kind: 'bollinger', period: 20, stdMultiplier: 2 })).toEqual({
      bands: { type: 'bollinger', period: 20, stdDev: 2 },
    });
  });

  it('should list every strategy with its defaults', () => {
    const strategies = listStrategies();

    expect(strategies.map((s) => s.kind)).toEqual([...STRATEGY_KINDS]);
    expect(strategies.find((s) => s.kind === 'rsi')?.defaults).toEqual({
      kind: 'rsi',
      period: 14,
      lower: 30,
      upper: 70,
    });
  });

  it('should fill defaults when parsing a config', () => {
    expect(parseStrategyConfig({ kind: 'momentum' })).toEqual({
      kind: 'momentum',
      rocPeriod: 10,
      rocThreshold: 0.5,
      trendPeriod: 20,
    });
    expect(parseStrategyConfig({ kind: 'ma_crossover', fastPeriod: 5 })).toEqual({
      kind: 'ma_crossover',
      fastPeriod: 5,
      slowPeriod: 30,
    });
  });

  it('should reject unknown kinds and invalid parameters', () => {
    expect(() => parseStrategyConfig({ kind: 'grid' })).toThrow(ConfigurationError);
    expect(() => parseStrategyConfig({ kind: 'rsi', period: 0 })).toThrow(ConfigurationError);
    expect(() => parseStrategyConfig({ kind: 'bollinger', period: 'x' })).toThrow(ConfigurationError);
  });

  it('should resolve display names and kinds', () => {
    expect(getStrategyName({ kind: 'bollinger', period: 20, stdMultiplier: 2 })).toBe('Bollinger Bands');
    expect(isStrategyKind('rsi')).toBe(true);
    expect(isStrategyKind('grid')).toBe(false);
  });
});
