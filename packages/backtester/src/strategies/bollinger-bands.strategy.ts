/**
 * Bollinger Bands Mean Reversion
 *
 * BUY:  close touches or breaks the lower band while flat
 * SELL: close touches or breaks the upper band while positioned
 *
 * On a flat series the bands collapse onto the close and both raw
 * conditions hold; the BUY branch is checked first.
 */

import type { Signal } from '@barsim/shared';
import { readBands } from './snapshot-readers.js';
import type { BollingerConfig } from './strategy.schema.js';
import type { DecisionInput, StrategyDefinition } from './types.js';

export const bollingerBandsStrategy: StrategyDefinition<BollingerConfig> = {
  kind: 'bollinger',
  name: 'Bollinger Bands',
  description: 'Buy at the lower band, sell at the upper band',
  defaults: { kind: 'bollinger', period: 20, stdMultiplier: 2 },

  indicators(config) {
    return {
      bands: { type: 'bollinger', period: config.period, stdDev: config.stdMultiplier },
    };
  },

  decide(_config, { current, bar, inPosition }: DecisionInput): Signal {
    const bands = readBands(current, 'bands');
    if (bands === null) return 'HOLD';

    if (bar.close <= bands.lower && !inPosition) return 'BUY';
    if (bar.close >= bands.upper && inPosition) return 'SELL';
    return 'HOLD';
  },
};
