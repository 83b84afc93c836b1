/**
 * Zod schemas for runtime validation
 */

export * from './bar.schema.js';
export * from './execution.schema.js';
