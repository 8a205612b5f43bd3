/**
 * Price Analyzer
 *
 * Decay-weighted momentum per timeframe, an alignment score for how far up
 * the timeframe ladder the direction agrees, and short-term volatility.
 */

import { TIMEFRAMES, type Timeframe, type TimeframeCandles } from '@kline-bot/shared';
import { closesOf } from '../indicators/index.js';
import { clamp01, populationStdDev, relativeChanges, toBias } from './math.js';
import type { PriceAnalysis, TimeframeWeights } from './types.js';

export interface PriceAnalyzerConfig {
  windows: Readonly<Record<Timeframe, number>>;
  weights: TimeframeWeights;
  /** Weight multiplier per step back from the newest change */
  decay: number;
  /** 5m candles used for volatility */
  volatilityWindow: number;
  signalThreshold: number;
}

export const DEFAULT_PRICE_CONFIG: PriceAnalyzerConfig = Object.freeze({
  windows: Object.freeze({ '5m': 12, '15m': 12, '1h': 6, '4h': 6 }),
  weights: Object.freeze({ '5m': 0.15, '15m': 0.25, '1h': 0.35, '4h': 0.25 }),
  decay: 0.9,
  volatilityWindow: 12,
  signalThreshold: 0.001,
});

/**
 * Weighted mean of relative close changes; the newest change has weight 1
 */
export function decayedMomentum(closes: readonly number[], decay: number): number {
  const changes = relativeChanges(closes);
  let weighted = 0;
  let total = 0;
  let weight = 1;
  for (let i = changes.length - 1; i >= 0; i--) {
    weighted += changes[i] * weight;
    total += weight;
    weight *= decay;
  }
  return total > 0 ? weighted / total : 0;
}

/**
 * Population standard deviation of relative close changes
 */
export function relativeChangeVolatility(closes: readonly number[]): number {
  return populationStdDev(relativeChanges(closes));
}

/**
 * 1.0 when every timeframe agrees, 0.8 when 15m/1h/4h do, 0.6 when 1h/4h do
 */
export function alignmentScore(momentum: Readonly<Record<Timeframe, number>>): number {
  const m5 = toBias(momentum['5m']);
  const m15 = toBias(momentum['15m']);
  const h1 = toBias(momentum['1h']);
  const h4 = toBias(momentum['4h']);

  if (h1 === 0 || h1 !== h4) return 0;
  if (m15 !== h1) return 0.6;
  if (m5 !== h1) return 0.8;
  return 1;
}

export class PriceAnalyzer {
  constructor(private readonly config: PriceAnalyzerConfig = DEFAULT_PRICE_CONFIG) {}

  /**
   * Returns null when any timeframe has fewer candles than its window
   */
  analyze(frames: TimeframeCandles): PriceAnalysis | null {
    const momentum: Record<Timeframe, number> = { '5m': 0, '15m': 0, '1h': 0, '4h': 0 };
    let weightedMomentum = 0;

    for (const tf of TIMEFRAMES) {
      const window = this.config.windows[tf];
      const candles = frames[tf];
      if (window < 2 || candles.length < window) return null;

      momentum[tf] = decayedMomentum(closesOf(candles.slice(-window)), this.config.decay);
      weightedMomentum += momentum[tf] * this.config.weights[tf];
    }

    const volatilityCandles = frames['5m'].slice(-this.config.volatilityWindow);
    if (volatilityCandles.length < this.config.volatilityWindow) return null;
    const volatility = relativeChangeVolatility(closesOf(volatilityCandles));

    const alignment = alignmentScore(momentum);

    return {
      confidence: clamp01(alignment * Math.max(0, 1 - volatility)),
      signal: toBias(weightedMomentum, this.config.signalThreshold),
      momentum,
      weightedMomentum,
      alignment,
      volatility,
    };
  }
}
