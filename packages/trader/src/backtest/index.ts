/**
 * Backtest Engine
 *
 * Replays 5m klines per symbol against a signal source, with 15m/1h/4h
 * context, and reports merged trades and metrics.
 *
 * @example
 * ```typescript
 * import { BacktestEngine, InMemoryCandleRepository, formatMetrics } from '@kline-bot/trader';
 *
 * const engine = new BacktestEngine({ config: createBacktestConfig(), repository: new InMemoryCandleRepository(candles) });
 * const results = await engine.runBacktest(start, end, ['BTCUSDT']);
 * console.log(formatMetrics(results));
 * ```
 */

// Types
export type {
  SignalSource,
  SymbolStatus,
  SymbolRun,
  SymbolOutcome,
  SymbolReport,
  BacktestResults,
  RunBacktestOptions,
} from './types.js';

// Engine
export { BacktestEngine, type BacktestEngineOptions } from './backtest-engine.js';
export { SymbolSimulator, INSUFFICIENT_WARMUP, type SimulationWindow, type SymbolSimulatorDeps } from './symbol-simulator.js';
export { ResultAggregator } from './result-aggregator.js';

// Trade execution and metrics
export * from './trade-execution.js';
export * from './metrics.js';

// Data
export * from './data/index.js';
