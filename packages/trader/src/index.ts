/**
 * @kline-bot/trader - Multi-timeframe signal engine and backtest simulator
 */

// Errors
export * from './errors.js';

// Configuration
export * from './config/strategy-config.js';
export * from './config/backtest-config.js';

// Indicators
export * from './indicators/index.js';

// Analysis
export * from './analysis/index.js';

// Strategy
export * from './strategy/index.js';

// Backtest
export * from './backtest/index.js';

// Services
export { SignalService, type SignalServiceOptions, type SignalEvaluation } from './services/signal.service.js';

// Utils
export { resampleCandles, aggregateChunk } from './utils/candle-aggregator.js';
export { runTaskGroup, type TaskGroupOptions } from './utils/task-group.js';
