/**
 * Analyzer output records
 *
 * Every analyzer reports a confidence in [0, 1] and a directional signal,
 * plus the auxiliary fields the strategy evaluators read.
 */

import type { Bias, Timeframe } from '@kline-bot/shared';
import type { EMACrossover } from '../indicators/index.js';

// ============================================================================
// TYPES
// ============================================================================

export interface AnalyzerOutput {
  /** Normalized confidence in [0, 1] */
  confidence: number;
  signal: Bias;
}

export type TimeframeWeights<T extends Timeframe = Timeframe> = Readonly<Record<T, number>>;

/**
 * Volume
 */
export type VolumeTimeframe = Extract<Timeframe, '5m' | '15m' | '1h'>;

export interface VolumeFrameAnalysis {
  /** Current volume over the 1.1^i weighted window average */
  volumeRatio: number;
  /** Current trade count over the previous candle's */
  tradeRatio: number;
  tradeCount: number;
  avgTradeSize: number;
  /** Fraction of volume up-ticks across the window */
  trendStrength: number;
  confidence: number;
}

export interface VolumeAnalysis extends AnalyzerOutput {
  volumeRatio: number;
  tradeRatio: number;
  tradeCount: number;
  avgTradeSize: number;
  trendStrength: number;
  timeframes: Record<VolumeTimeframe, VolumeFrameAnalysis>;
}

/**
 * Technical (EMA + RSI)
 */
export interface EMAState {
  fast: number;
  slow: number;
  /** 1 when fast EMA is above slow, -1 below */
  direction: Bias;
  /** Relative change of the fast EMA over the last bar */
  slope: number;
  strength: number;
  crossover: EMACrossover | null;
}

export interface RSIState {
  value: number;
  signal: number;
  histogram: number;
  /** Side of the signal line */
  trend: Bias;
  /** |rsi - 50| / 50 */
  strength: number;
  crossAbove: boolean;
  crossBelow: boolean;
}

export interface TechnicalFrameAnalysis extends AnalyzerOutput {
  ema: EMAState;
  rsi: RSIState;
}

export interface TechnicalAnalysis extends AnalyzerOutput {
  /** 5m detail */
  ema: EMAState;
  /** 5m detail */
  rsi: RSIState;
  timeframes: Record<Timeframe, TechnicalFrameAnalysis>;
}

/**
 * Price momentum
 */
export interface PriceAnalysis extends AnalyzerOutput {
  momentum: Record<Timeframe, number>;
  weightedMomentum: number;
  /** 1.0 / 0.8 / 0.6 / 0 depending on which timeframes agree */
  alignment: number;
  volatility: number;
}

/**
 * Candlestick patterns
 */
export type PatternType =
  | 'higher_lows'
  | 'lower_highs'
  | 'bullish_engulfing'
  | 'bearish_engulfing'
  | 'bullish_pin_bar'
  | 'bearish_pin_bar'
  | 'none';

export interface PatternAnalysis extends AnalyzerOutput {
  pattern: PatternType;
  strength: number;
}
