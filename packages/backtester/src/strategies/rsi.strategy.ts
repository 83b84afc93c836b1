/**
 * RSI Mean Reversion
 *
 * BUY:  RSI below the lower threshold while flat (oversold)
 * SELL: RSI above the upper threshold while positioned (overbought)
 */

import type { Signal } from '@barsim/shared';
import { readNumber } from './snapshot-readers.js';
import type { RsiConfig } from './strategy.schema.js';
import type { DecisionInput, StrategyDefinition } from './types.js';

export const rsiStrategy: StrategyDefinition<RsiConfig> = {
  kind: 'rsi',
  name: 'RSI',
  description: 'Buy when RSI is oversold, sell when it is overbought',
  defaults: { kind: 'rsi', period: 14, lower: 30, upper: 70 },

  indicators(config) {
    return {
      rsi: { type: 'rsi', period: config.period },
    };
  },

  decide(config, { current, inPosition }: DecisionInput): Signal {
    const rsi = readNumber(current, 'rsi');
    if (rsi === null) return 'HOLD';

    if (rsi < config.lower && !inPosition) return 'BUY';
    if (rsi > config.upper && inPosition) return 'SELL';
    return 'HOLD';
  },
};
