export * from './candle.schema.js';
