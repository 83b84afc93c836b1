export * from './simulated-broker.js';
