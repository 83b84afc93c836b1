import { z } from 'zod';

const period = z.number().int().positive();

export const MACrossoverConfigSchema = z.object({
  kind: z.literal('ma_crossover'),
  fastPeriod: period.default(10),
  slowPeriod: period.default(30),
});

export const RsiConfigSchema = z.object({
  kind: z.literal('rsi'),
  period: period.default(14),
  lower: z.number().min(0).max(100).default(30),
  upper: z.number().min(0).max(100).default(70),
});

export const BollingerConfigSchema = z.object({
  kind: z.literal('bollinger'),
  period: period.default(20),
  stdMultiplier: z.number().nonnegative().finite().default(2),
});

export const MomentumConfigSchema = z.object({
  kind: z.literal('momentum'),
  rocPeriod: period.default(10),
  rocThreshold: z.number().nonnegative().finite().default(0.5),
  trendPeriod: period.default(20),
});

/**
 * Strategy configuration, discriminated on `kind`
 */
export const StrategyConfigSchema = z.discriminatedUnion('kind', [
  MACrossoverConfigSchema,
  RsiConfigSchema,
  BollingerConfigSchema,
  MomentumConfigSchema,
]);

export type MACrossoverConfig = z.infer<typeof MACrossoverConfigSchema>;
export type RsiConfig = z.infer<typeof RsiConfigSchema>;
export type BollingerConfig = z.infer<typeof BollingerConfigSchema>;
export type MomentumConfig = z.infer<typeof MomentumConfigSchema>;

export type StrategyConfig = z.infer<typeof StrategyConfigSchema>;
/** Config as accepted from callers (parameters may be omitted) */
export type StrategyConfigInput = z.input<typeof StrategyConfigSchema>;
export type StrategyKind = StrategyConfig['kind'];

export const STRATEGY_KINDS: readonly StrategyKind[] = ['ma_crossover', 'rsi', 'bollinger', 'momentum'];
