/**
 * Shared types for barsim
 */

export * from './market.js';
export * from './trade.js';
