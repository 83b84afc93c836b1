/**
 * @barsim/shared - Shared types, schemas, and utilities
 *
 * This package contains code shared between the backtester and its scripts.
 */

export * from './types/index.js';
export * from './schemas/index.js';
export * from './errors.js';
export * from './logger.js';
export * from './utils/load-env.js';
