/**
 * Backtest Data Module
 */

export * from './candle-repository.js';
export * from './in-memory-repository.js';
export * from './csv-loader.js';
export * from './csv-repository.js';
