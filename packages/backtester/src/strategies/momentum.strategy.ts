/**
 * Momentum (Rate of Change)
 *
 * BUY:  ROC above the threshold and close above the trend SMA, while flat
 * SELL: ROC below -threshold or close below the trend SMA, while positioned
 */

import type { Signal } from '@barsim/shared';
import { readNumber } from './snapshot-readers.js';
import type { MomentumConfig } from './strategy.schema.js';
import type { DecisionInput, StrategyDefinition } from './types.js';

export const momentumStrategy: StrategyDefinition<MomentumConfig> = {
  kind: 'momentum',
  name: 'Momentum',
  description: 'Buy on positive rate of change above the trend SMA, sell when momentum or trend fails',
  defaults: { kind: 'momentum', rocPeriod: 10, rocThreshold: 0.5, trendPeriod: 20 },

  indicators(config) {
    return {
      roc: { type: 'roc', period: config.rocPeriod },
      trend: { type: 'sma', period: config.trendPeriod },
    };
  },

  decide(config, { current, bar, inPosition }: DecisionInput): Signal {
    const roc = readNumber(current, 'roc');
    const trend = readNumber(current, 'trend');
    if (roc === null || trend === null) return 'HOLD';

    const close = bar.close;

    if (roc > config.rocThreshold && close > trend && !inPosition) return 'BUY';
    if ((roc < -config.rocThreshold || close < trend) && inPosition) return 'SELL';
    return 'HOLD';
  },
};
