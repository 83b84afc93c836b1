/**
 * Moving Average Crossover
 *
 * BUY:  fast SMA crosses above slow SMA
 * SELL: fast SMA crosses below slow SMA
 *
 * Crossovers need both bars' values, so the first ready bar never signals.
 */

import type { Signal } from '@barsim/shared';
import { crossesAbove, crossesBelow } from '../indicators/index.js';
import { readNumber } from './snapshot-readers.js';
import type { MACrossoverConfig } from './strategy.schema.js';
import type { DecisionInput, StrategyDefinition } from './types.js';

export const maCrossoverStrategy: StrategyDefinition<MACrossoverConfig> = {
  kind: 'ma_crossover',
  name: 'MA Crossover',
  description: 'Buy when the fast SMA crosses above the slow SMA, sell when it crosses below',
  defaults: { kind: 'ma_crossover', fastPeriod: 10, slowPeriod: 30 },

  indicators(config) {
    return {
      fast: { type: 'sma', period: config.fastPeriod },
      slow: { type: 'sma', period: config.slowPeriod },
    };
  },

  decide(_config, { current, previous }: DecisionInput): Signal {
    const fast = readNumber(current, 'fast');
    const slow = readNumber(current, 'slow');
    const prevFast = readNumber(previous, 'fast');
    const prevSlow = readNumber(previous, 'slow');

    if (fast === null || slow === null || prevFast === null || prevSlow === null) {
      return 'HOLD';
    }

    if (crossesAbove(prevFast, fast, prevSlow, slow)) return 'BUY';
    if (crossesBelow(prevFast, fast, prevSlow, slow)) return 'SELL';
    return 'HOLD';
  },
};
