/**
 * Strategy Engine
 *
 * Closed set of strategy variants, dispatched on `config.kind`.
 */

import type { Signal } from '@barsim/shared';
import { ConfigurationError } from '@barsim/shared';
import type { IndicatorSpecMap } from '../indicators/index.js';
import { maCrossoverStrategy } from './ma-crossover.strategy.js';
import { rsiStrategy } from './rsi.strategy.js';
import { bollingerBandsStrategy } from './bollinger-bands.strategy.js';
import { momentumStrategy } from './momentum.strategy.js';
import {
  StrategyConfigSchema,
  STRATEGY_KINDS,
  type StrategyConfig,
  type StrategyKind,
} from './strategy.schema.js';
import type { DecisionInput, StrategyDefinition } from './types.js';

export * from './strategy.schema.js';
export type { DecisionInput, StrategyDefinition } from './types.js';
export { readNumber, readBands } from './snapshot-readers.js';
export { maCrossoverStrategy, rsiStrategy, bollingerBandsStrategy, momentumStrategy };

export type StrategyRegistry = {
  [K in StrategyKind]: StrategyDefinition<Extract<StrategyConfig, { kind: K }>>;
};

export const STRATEGIES: StrategyRegistry = {
  ma_crossover: maCrossoverStrategy,
  rsi: rsiStrategy,
  bollinger: bollingerBandsStrategy,
  momentum: momentumStrategy,
};

/**
 * Evaluate one bar for the configured strategy
 */
export function decideSignal(config: StrategyConfig, input: DecisionInput): Signal {
  switch (config.kind) {
    case 'ma_crossover':
      return STRATEGIES.ma_crossover.decide(config, input);
    case 'rsi':
      return STRATEGIES.rsi.decide(config, input);
    case 'bollinger':
      return STRATEGIES.bollinger.decide(config, input);
    case 'momentum':
      return STRATEGIES.momentum.decide(config, input);
  }
}

/**
 * Indicators the configured strategy needs
 */
export function requiredIndicators(config: StrategyConfig): IndicatorSpecMap {
  switch (config.kind) {
    case 'ma_crossover':
      return STRATEGIES.ma_crossover.indicators(config);
    case 'rsi':
      return STRATEGIES.rsi.indicators(config);
    case 'bollinger':
      return STRATEGIES.bollinger.indicators(config);
    case 'momentum':
      return STRATEGIES.momentum.indicators(config);
  }
}

export function getStrategyName(config: StrategyConfig): string {
  return STRATEGIES[config.kind].name;
}

/**
 * Validate a strategy configuration and fill default parameters
 */
export function parseStrategyConfig(input: unknown): StrategyConfig {
  const parsed = StrategyConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw ConfigurationError.fromZod('Invalid strategy configuration', parsed.error);
  }
  return parsed.data;
}

export function isStrategyKind(value: string): value is StrategyKind {
  return STRATEGY_KINDS.some((kind) => kind === value);
}

export interface StrategyInfo {
  kind: StrategyKind;
  name: string;
  description: string;
  defaults: StrategyConfig;
}

/**
 * Available strategies with their default parameters
 */
export function listStrategies(): StrategyInfo[] {
  return STRATEGY_KINDS.map((kind) => {
    const { name, description, defaults } = STRATEGIES[kind];
    return { kind, name, description, defaults };
  });
}
