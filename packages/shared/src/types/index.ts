export * from './market.js';
export * from './trade.js';
