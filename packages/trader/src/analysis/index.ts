/**
 * Analysis Module Exports
 *
 * Dimensional analyzers consumed by the strategy evaluators
 */

export * from './types.js';
export { clamp01, toBias } from './math.js';
export { VolumeAnalyzer, DEFAULT_VOLUME_CONFIG, volumeFrameConfidence, type VolumeAnalyzerConfig } from './volume-analyzer.js';
export {
  TechnicalAnalyzer,
  DEFAULT_TECHNICAL_CONFIG,
  technicalFrameConfidence,
  type TechnicalAnalyzerConfig,
} from './technical-analyzer.js';
export {
  PriceAnalyzer,
  DEFAULT_PRICE_CONFIG,
  alignmentScore,
  decayedMomentum,
  relativeChangeVolatility,
  type PriceAnalyzerConfig,
} from './price-analyzer.js';
export { PatternAnalyzer, DEFAULT_PATTERN_CONFIG, type PatternAnalyzerConfig } from './pattern-analyzer.js';
