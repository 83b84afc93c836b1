export * from './performance-analyzer.js';
