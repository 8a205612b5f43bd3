/**
 * Technical Analyzer
 *
 * EMA trend (fast vs slow) and RSI momentum per timeframe, blended with
 * fixed timeframe weights. The 5m timeframe supplies the EMA/RSI detail the
 * strategies validate against.
 */

import { TIMEFRAMES, type Candle, type Timeframe, type TimeframeCandles } from '@kline-bot/shared';
import {
  calculateEMA,
  calculateRSI,
  closesOf,
  crossesAbove,
  crossesBelow,
  describeEMAMove,
  emaCrossover,
} from '../indicators/index.js';
import { clamp01, toBias } from './math.js';
import type { AnalyzerOutput, EMAState, RSIState, TechnicalAnalysis, TechnicalFrameAnalysis, TimeframeWeights } from './types.js';

export interface TechnicalAnalyzerConfig {
  fastPeriod: number;
  slowPeriod: number;
  rsiPeriod: number;
  rsiSmoothPeriod: number;
  weights: TimeframeWeights;
  /** Weighted signal must exceed this magnitude */
  signalThreshold: number;
}

export const DEFAULT_TECHNICAL_CONFIG: TechnicalAnalyzerConfig = Object.freeze({
  fastPeriod: 8,
  slowPeriod: 21,
  rsiPeriod: 14,
  rsiSmoothPeriod: 3,
  weights: Object.freeze({ '5m': 0.3, '15m': 0.35, '1h': 0.2, '4h': 0.15 }),
  signalThreshold: 0.2,
});

const EMA_WEIGHT = 0.4;
const RSI_WEIGHT = 0.4;
const ALIGNMENT_BONUS = 0.2;
const NEUTRAL_RSI_LOW = 45;
const NEUTRAL_RSI_HIGH = 55;
const NEUTRAL_RSI_DAMPING = 0.8;

/**
 * Confidence of one timeframe.
 * EMA and RSI strength each contribute up to 0.4, agreement adds 0.2,
 * and an RSI in the 45-55 band is damped.
 */
export function technicalFrameConfidence(emaStrength: number, rsi: number, signal: AnalyzerOutput['signal']): number {
  let confidence = EMA_WEIGHT * clamp01(emaStrength) + RSI_WEIGHT * clamp01(Math.abs(rsi - 50) / 50);
  if (signal !== 0) confidence += ALIGNMENT_BONUS;
  if (rsi >= NEUTRAL_RSI_LOW && rsi <= NEUTRAL_RSI_HIGH) confidence *= NEUTRAL_RSI_DAMPING;
  return clamp01(confidence);
}

export class TechnicalAnalyzer {
  constructor(private readonly config: TechnicalAnalyzerConfig = DEFAULT_TECHNICAL_CONFIG) {}

  /**
   * Returns null when any timeframe is too short for the slow EMA or the RSI signal line
   */
  analyze(frames: TimeframeCandles): TechnicalAnalysis | null {
    const timeframes: Partial<Record<Timeframe, TechnicalFrameAnalysis>> = {};
    let weightedSignal = 0;
    let confidence = 0;

    for (const tf of TIMEFRAMES) {
      const frame = this.analyzeFrame(frames[tf]);
      if (!frame) return null;
      timeframes[tf] = frame;
      weightedSignal += frame.signal * this.config.weights[tf];
      confidence += frame.confidence * this.config.weights[tf];
    }

    const m5 = timeframes['5m'];
    const m15 = timeframes['15m'];
    const h1 = timeframes['1h'];
    const h4 = timeframes['4h'];
    if (!m5 || !m15 || !h1 || !h4) return null;

    return {
      confidence: clamp01(confidence),
      signal: toBias(weightedSignal, this.config.signalThreshold),
      ema: m5.ema,
      rsi: m5.rsi,
      timeframes: { '5m': m5, '15m': m15, '1h': h1, '4h': h4 },
    };
  }

  analyzeFrame(candles: readonly Candle[]): TechnicalFrameAnalysis | null {
    const { fastPeriod, slowPeriod, rsiPeriod, rsiSmoothPeriod } = this.config;
    const closes = closesOf(candles);
    const last = closes.length - 1;
    if (last < 1) return null;

    const fast = calculateEMA(closes, fastPeriod);
    const slow = calculateEMA(closes, slowPeriod);
    const rsi = calculateRSI(closes, rsiPeriod, rsiSmoothPeriod);
    if (!fast || !slow || !rsi) return null;

    const fastNow = fast[last];
    const fastPrev = fast[last - 1];
    const slowNow = slow[last];
    const rsiNow = rsi.rsi[last];
    const rsiPrev = rsi.rsi[last - 1];
    const signalNow = rsi.signal[last];
    const signalPrev = rsi.signal[last - 1];
    if (
      fastNow === undefined ||
      fastPrev === undefined ||
      slowNow === undefined ||
      rsiNow === undefined ||
      rsiPrev === undefined ||
      signalNow === undefined ||
      signalPrev === undefined
    ) {
      return null;
    }

    const move = describeEMAMove(fastPrev, fastNow);
    const ema: EMAState = {
      fast: fastNow,
      slow: slowNow,
      direction: toBias(fastNow - slowNow),
      slope: move.slope,
      strength: move.strength,
      crossover: emaCrossover(fast, slow),
    };

    const rsiState: RSIState = {
      value: rsiNow,
      signal: signalNow,
      histogram: rsiNow - signalNow,
      trend: toBias(rsiNow - signalNow),
      strength: Math.abs(rsiNow - 50) / 50,
      crossAbove: crossesAbove(rsi.rsi, rsi.signal, last),
      crossBelow: crossesBelow(rsi.rsi, rsi.signal, last),
    };

    let signal: AnalyzerOutput['signal'] = 0;
    if (ema.direction > 0 && rsiNow > 50) signal = 1;
    else if (ema.direction < 0 && rsiNow < 50) signal = -1;

    return {
      confidence: technicalFrameConfidence(ema.strength, rsiNow, signal),
      signal,
      ema,
      rsi: rsiState,
    };
  }
}
