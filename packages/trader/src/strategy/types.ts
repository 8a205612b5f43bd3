/**
 * Strategy result types
 */

import type { Direction, TimeframeCandles } from '@kline-bot/shared';
import type { PatternAnalysis, PriceAnalysis, TechnicalAnalysis, VolumeAnalysis } from '../analysis/index.js';

export type InvalidReason =
  | 'insufficient data'
  | 'conditions not met'
  | 'low confidence'
  | 'no valid setup found'
  | 'no reversal setup found'
  | 'insufficient confidence for reversal';

/**
 * Analyzer outputs a strategy decided on
 */
export interface StrategyAnalysis {
  volume: VolumeAnalysis;
  technical: TechnicalAnalysis;
  price: PriceAnalysis;
  /** Informational; does not move confidence */
  pattern: PatternAnalysis | null;
}

export interface ValidStrategyResult {
  isValid: true;
  direction: Direction;
  entryPrice: number;
  stopLoss: number;
  takeProfit: number;
  confidence: number;
  analysis: StrategyAnalysis;
}

export interface InvalidStrategyResult {
  isValid: false;
  reason: InvalidReason;
  confidence: 0;
  analysis?: StrategyAnalysis;
}

export type StrategyResult = ValidStrategyResult | InvalidStrategyResult;

/**
 * Anything that produces a decision from multi-timeframe candles
 */
export interface Strategy {
  readonly direction: Direction;
  analyze(frames: TimeframeCandles): StrategyResult;
}

/**
 * Analyzer set a strategy reads from
 */
export interface StrategyAnalyzers {
  volume: { analyze(frames: TimeframeCandles): VolumeAnalysis | null };
  technical: { analyze(frames: TimeframeCandles): TechnicalAnalysis | null };
  price: { analyze(frames: TimeframeCandles): PriceAnalysis | null };
  pattern: { analyze(frames: TimeframeCandles): PatternAnalysis | null };
}

export function invalid(reason: InvalidReason, analysis?: StrategyAnalysis): InvalidStrategyResult {
  return analysis ? { isValid: false, reason, confidence: 0, analysis } : { isValid: false, reason, confidence: 0 };
}
