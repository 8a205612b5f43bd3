export * from './types.js';
export { DirectionalStrategy, createDefaultAnalyzers, MIN_VOLUME_RATIO, RSI_LOWER_BOUND, RSI_UPPER_BOUND } from './directional-strategy.js';
export { LongStrategy } from './long-strategy.js';
export { ShortStrategy } from './short-strategy.js';
export { StrategyManager, DEFAULT_REVERSAL_DELTA, type PositionSnapshot, type StrategyManagerOptions } from './strategy-manager.js';
