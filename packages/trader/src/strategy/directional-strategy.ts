/**
 * Directional Strategy
 *
 * Shared evaluation for the long and short sides:
 * 1. Run the analyzers (any missing timeframe -> insufficient data)
 * 2. Side-specific validation
 * 3. Weighted confidence with modifiers
 * 4. Threshold, then entry / stop / target from the latest 5m close
 */

import type { Direction, TimeframeCandles } from '@kline-bot/shared';
import {
  PatternAnalyzer,
  PriceAnalyzer,
  TechnicalAnalyzer,
  VolumeAnalyzer,
  clamp01,
  type TechnicalAnalysis,
} from '../analysis/index.js';
import { DEFAULT_STRATEGY_CONFIG, type StrategyConfig } from '../config/strategy-config.js';
import { invalid, type Strategy, type StrategyAnalysis, type StrategyAnalyzers, type StrategyResult } from './types.js';

/** RSI must sit strictly inside this band */
export const RSI_LOWER_BOUND = 25;
export const RSI_UPPER_BOUND = 75;
export const MIN_VOLUME_RATIO = 0.45;

const VOLUME_SURGE_RATIO = 2.0;
const VOLUME_SURGE_BOOST = 1.1;
const CROSS_BOOST = 1.1;
const HIGH_VOLATILITY = 0.8;
const HIGH_VOLATILITY_DAMPING = 0.9;

export function createDefaultAnalyzers(): StrategyAnalyzers {
  return {
    volume: new VolumeAnalyzer(),
    technical: new TechnicalAnalyzer(),
    price: new PriceAnalyzer(),
    pattern: new PatternAnalyzer(),
  };
}

export abstract class DirectionalStrategy implements Strategy {
  abstract readonly direction: Direction;

  constructor(
    protected readonly config: StrategyConfig = DEFAULT_STRATEGY_CONFIG,
    protected readonly analyzers: StrategyAnalyzers = createDefaultAnalyzers()
  ) {}

  /** Side-specific entry conditions */
  protected abstract meetsConditions(analysis: StrategyAnalysis): boolean;

  /** RSI signal-line cross in this side's direction, confirmed by the EMA trend */
  protected abstract hasAlignedCross(technical: TechnicalAnalysis): boolean;

  protected abstract levels(entryPrice: number): { stopLoss: number; takeProfit: number };

  getConfig(): StrategyConfig {
    return this.config;
  }

  analyze(frames: TimeframeCandles): StrategyResult {
    const volume = this.analyzers.volume.analyze(frames);
    const technical = this.analyzers.technical.analyze(frames);
    const price = this.analyzers.price.analyze(frames);
    const latest = frames['5m'][frames['5m'].length - 1];
    if (!volume || !technical || !price || !latest) {
      return invalid('insufficient data');
    }

    const analysis: StrategyAnalysis = {
      volume,
      technical,
      price,
      pattern: this.analyzers.pattern.analyze(frames),
    };

    if (!this.meetsConditions(analysis)) {
      return invalid('conditions not met', analysis);
    }

    const confidence = this.scoreConfidence(analysis);
    if (confidence < this.config.minConfidence) {
      return invalid('low confidence', analysis);
    }

    const entryPrice = latest.close;
    return {
      isValid: true,
      direction: this.direction,
      entryPrice,
      ...this.levels(entryPrice),
      confidence,
      analysis,
    };
  }

  /**
   * Weighted analyzer confidence, then modifiers, clamped to [0, 1]
   */
  scoreConfidence(analysis: StrategyAnalysis): number {
    const { weights } = this.config;
    let confidence =
      analysis.volume.confidence * weights.volume +
      analysis.technical.confidence * weights.technical +
      analysis.price.confidence * weights.price;

    if (analysis.volume.volumeRatio > VOLUME_SURGE_RATIO) confidence *= VOLUME_SURGE_BOOST;
    if (this.hasAlignedCross(analysis.technical)) confidence *= CROSS_BOOST;
    if (analysis.price.volatility > HIGH_VOLATILITY) confidence *= HIGH_VOLATILITY_DAMPING;

    return clamp01(confidence);
  }

  protected commonConditions(analysis: StrategyAnalysis): boolean {
    const rsi = analysis.technical.rsi.value;
    return rsi > RSI_LOWER_BOUND && rsi < RSI_UPPER_BOUND && analysis.volume.volumeRatio > MIN_VOLUME_RATIO;
  }
}
