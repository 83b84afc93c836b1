import { z } from 'zod';

/**
 * Zod schema for Bar validation
 */
export const BarSchema = z.object({
  timestamp: z.number().int().nonnegative(),
  open: z.number().positive().finite(),
  high: z.number().positive().finite(),
  low: z.number().positive().finite(),
  close: z.number().positive().finite(),
  volume: z.number().nonnegative().finite(),
});
