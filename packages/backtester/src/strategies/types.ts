/**
 * Strategy Engine Types
 *
 * A strategy is a pure decision function over indicator values. It owns
 * no state; the orchestrator hands it the current and previous snapshot.
 */

import type { Bar, Signal } from '@barsim/shared';
import type { IndicatorSnapshot, IndicatorSpecMap } from '../indicators/index.js';
import type { StrategyConfig } from './strategy.schema.js';

export interface DecisionInput {
  /** Indicator values at the current bar */
  current: IndicatorSnapshot;
  /** Indicator values at the previous bar (null on the first bar) */
  previous: IndicatorSnapshot | null;
  bar: Bar;
  inPosition: boolean;
}

export interface StrategyDefinition<C extends StrategyConfig> {
  kind: C['kind'];
  name: string;
  description: string;
  defaults: C;
  /** Named indicators the decision reads */
  indicators(config: C): IndicatorSpecMap;
  decide(config: C, input: DecisionInput): Signal;
}
