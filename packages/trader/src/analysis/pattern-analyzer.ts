/**
 * Pattern Analyzer
 *
 * Looks at the last three 5m candles. Three-bar structures win over
 * two-bar engulfing, which wins over single-bar pin bars.
 */

import type { Candle, TimeframeCandles } from '@kline-bot/shared';
import { clamp01 } from './math.js';
import type { PatternAnalysis } from './types.js';

export interface PatternAnalyzerConfig {
  /** Minimum absolute price move for a pattern to count */
  minHeight: number;
}

export const DEFAULT_PATTERN_CONFIG: PatternAnalyzerConfig = Object.freeze({
  minHeight: 0.001,
});

const NO_PATTERN: PatternAnalysis = Object.freeze({ pattern: 'none', signal: 0, confidence: 0, strength: 0 });

function detected(pattern: PatternAnalysis['pattern'], signal: PatternAnalysis['signal'], strength: number): PatternAnalysis {
  const bounded = clamp01(strength);
  return { pattern, signal, strength: bounded, confidence: bounded };
}

function body(candle: Candle): number {
  return Math.abs(candle.close - candle.open);
}

export class PatternAnalyzer {
  constructor(private readonly config: PatternAnalyzerConfig = DEFAULT_PATTERN_CONFIG) {}

  /**
   * Returns null with fewer than three 5m candles
   */
  analyze(frames: Pick<TimeframeCandles, '5m'>): PatternAnalysis | null {
    const candles = frames['5m'];
    const c0 = candles[candles.length - 1];
    const c1 = candles[candles.length - 2];
    const c2 = candles[candles.length - 3];
    if (!c0 || !c1 || !c2) return null;

    return this.threeBar(c2, c1, c0) ?? this.engulfing(c1, c0) ?? this.pinBar(c0) ?? NO_PATTERN;
  }

  private threeBar(c2: Candle, c1: Candle, c0: Candle): PatternAnalysis | null {
    const { minHeight } = this.config;

    if (c0.low > c1.low && c1.low > c2.low && c0.low - c2.low >= minHeight) {
      return detected('higher_lows', 1, Math.min(((c0.low - c2.low) / c2.low) * 10, 1));
    }
    if (c0.high < c1.high && c1.high < c2.high && c2.high - c0.high >= minHeight) {
      return detected('lower_highs', -1, Math.min(((c2.high - c0.high) / c2.high) * 10, 1));
    }
    return null;
  }

  private engulfing(prev: Candle, curr: Candle): PatternAnalysis | null {
    const currBody = body(curr);
    if (currBody < this.config.minHeight) return null;

    const prevBody = body(prev);
    const strength = prevBody > 0 ? Math.min(currBody / prevBody, 1) : 1;

    if (prev.close < prev.open && curr.open < prev.close && curr.close > prev.open) {
      return detected('bullish_engulfing', 1, strength);
    }
    if (prev.close > prev.open && curr.open > prev.close && curr.close < prev.open) {
      return detected('bearish_engulfing', -1, strength);
    }
    return null;
  }

  private pinBar(candle: Candle): PatternAnalysis | null {
    const range = candle.high - candle.low;
    if (range < this.config.minHeight) return null;

    const candleBody = body(candle);
    if (candleBody >= range * 0.3) return null;

    const lowerWick = Math.min(candle.open, candle.close) - candle.low;
    const upperWick = candle.high - Math.max(candle.open, candle.close);

    if (lowerWick > range * 0.6) {
      return detected('bullish_pin_bar', 1, lowerWick / range);
    }
    if (upperWick > range * 0.6) {
      return detected('bearish_pin_bar', -1, upperWick / range);
    }
    return null;
  }
}
