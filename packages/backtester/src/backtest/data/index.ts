/**
 * Market data loading
 */

export * from './market-feed.js';
export * from './csv-loader.js';
