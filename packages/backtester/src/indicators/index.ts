/**
 * Technical Indicators
 */

export * from './rolling-indicators.js';
export * from './indicator-engine.js';
