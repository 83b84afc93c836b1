import { z } from 'zod';

/**
 * Fill timing schema
 */
export const FillTimingSchema = z.enum(['close', 'next_open']);

/**
 * Broker / execution configuration schema
 */
export const ExecutionConfigSchema = z.object({
  initialCapital: z.number().positive().finite(),
  commissionRate: z.number().nonnegative().finite(),
  positionSizeFraction: z.number().gt(0).lte(1),
  fillTiming: FillTimingSchema.default('close'),
});

/**
 * Performance analytics configuration schema
 */
export const AnalyticsConfigSchema = z.object({
  riskFreeRate: z.number().finite(),
  tradingDaysPerYear: z.number().int().positive(),
});

export type ExecutionConfig = z.infer<typeof ExecutionConfigSchema>;
export type AnalyticsConfig = z.infer<typeof AnalyticsConfigSchema>;
/** Execution config as accepted from callers (fillTiming may be omitted) */
export type ExecutionConfigInput = z.input<typeof ExecutionConfigSchema>;

export const DEFAULT_EXECUTION_CONFIG: ExecutionConfig = {
  initialCapital: 100_000,
  commissionRate: 0.0005,
  positionSizeFraction: 0.95,
  fillTiming: 'close',
};

export const DEFAULT_ANALYTICS_CONFIG: AnalyticsConfig = {
  riskFreeRate: 0.065,
  tradingDaysPerYear: 252,
};
