/**
 * Volume Analyzer
 *
 * Scores volume expansion across 5m, 15m and 1h. A timeframe scores high
 * when the current candle trades well above its recent weighted average,
 * trade count jumps, trades are large, and volume has been building.
 */

import type { Candle, TimeframeCandles } from '@kline-bot/shared';
import { clamp01 } from './math.js';
import type { TimeframeWeights, VolumeAnalysis, VolumeFrameAnalysis, VolumeTimeframe } from './types.js';

export interface VolumeAnalyzerConfig {
  /** Candles per timeframe window */
  windows: Readonly<Record<VolumeTimeframe, number>>;
  weights: TimeframeWeights<VolumeTimeframe>;
  /** Growth of the window weights from oldest to newest */
  weightGrowth: number;
}

export const DEFAULT_VOLUME_CONFIG: VolumeAnalyzerConfig = Object.freeze({
  windows: Object.freeze({ '5m': 12, '15m': 12, '1h': 6 }),
  weights: Object.freeze({ '5m': 0.35, '15m': 0.45, '1h': 0.2 }),
  weightGrowth: 1.1,
});

const VOLUME_TIMEFRAMES: readonly VolumeTimeframe[] = ['5m', '15m', '1h'];

// Component ranges: (value - floor) / span, clipped to [0, 1]
const VOLUME_RATIO_FLOOR = 1.3;
const VOLUME_RATIO_SPAN = 0.7;
const TRADE_RATIO_FLOOR = 1.2;
const TRADE_RATIO_SPAN = 0.8;
const TRADE_SIZE_SCALE = 1000;

/**
 * Confidence of one timeframe from its ratios
 */
export function volumeFrameConfidence(
  volumeRatio: number,
  tradeRatio: number,
  avgTradeSize: number,
  trendStrength: number
): number {
  const volumeScore = clamp01((volumeRatio - VOLUME_RATIO_FLOOR) / VOLUME_RATIO_SPAN);
  const tradeScore = clamp01((tradeRatio - TRADE_RATIO_FLOOR) / TRADE_RATIO_SPAN);
  const sizeScore = clamp01(avgTradeSize / TRADE_SIZE_SCALE);
  return clamp01(volumeScore * 0.4 + tradeScore * 0.2 + sizeScore * 0.1 + clamp01(trendStrength) * 0.3);
}

export class VolumeAnalyzer {
  constructor(private readonly config: VolumeAnalyzerConfig = DEFAULT_VOLUME_CONFIG) {}

  /**
   * Returns null when any timeframe has fewer candles than its window
   */
  analyze(frames: TimeframeCandles): VolumeAnalysis | null {
    const timeframes: Partial<Record<VolumeTimeframe, VolumeFrameAnalysis>> = {};

    for (const tf of VOLUME_TIMEFRAMES) {
      const frame = this.analyzeFrame(frames[tf], this.config.windows[tf]);
      if (!frame) return null;
      timeframes[tf] = frame;
    }

    const m5 = timeframes['5m'];
    const m15 = timeframes['15m'];
    const h1 = timeframes['1h'];
    if (!m5 || !m15 || !h1) return null;

    const { weights } = this.config;
    const confidence = clamp01(
      m5.confidence * weights['5m'] + m15.confidence * weights['15m'] + h1.confidence * weights['1h']
    );

    const current = frames['5m'][frames['5m'].length - 1];
    let signal: VolumeAnalysis['signal'] = 0;
    if (current && m5.volumeRatio >= 1) {
      if (current.close > current.open) signal = 1;
      else if (current.close < current.open) signal = -1;
    }

    return {
      confidence,
      signal,
      volumeRatio: m5.volumeRatio,
      tradeRatio: m5.tradeRatio,
      tradeCount: m5.tradeCount,
      avgTradeSize: m5.avgTradeSize,
      trendStrength: m5.trendStrength,
      timeframes: { '5m': m5, '15m': m15, '1h': h1 },
    };
  }

  private analyzeFrame(candles: readonly Candle[], window: number): VolumeFrameAnalysis | null {
    if (window < 2 || candles.length < window) return null;

    const recent = candles.slice(-window);
    const current = recent[recent.length - 1];
    const previous = recent[recent.length - 2];
    if (!current || !previous) return null;

    let weightedSum = 0;
    let weightTotal = 0;
    let upTicks = 0;
    recent.forEach((candle, i) => {
      const weight = Math.pow(this.config.weightGrowth, i);
      weightedSum += candle.volume * weight;
      weightTotal += weight;
      const prior = recent[i - 1];
      if (prior && candle.volume > prior.volume) upTicks++;
    });

    const avgVolume = weightTotal > 0 ? weightedSum / weightTotal : 0;
    const volumeRatio = avgVolume > 0 ? current.volume / avgVolume : 0;
    const tradeRatio = previous.tradeCount > 0 ? current.tradeCount / previous.tradeCount : 0;
    const avgTradeSize = current.tradeCount > 0 ? current.volume / current.tradeCount : 0;
    const trendStrength = upTicks / (recent.length - 1);

    return {
      volumeRatio,
      tradeRatio,
      tradeCount: current.tradeCount,
      avgTradeSize,
      trendStrength,
      confidence: volumeFrameConfidence(volumeRatio, tradeRatio, avgTradeSize, trendStrength),
    };
  }
}
