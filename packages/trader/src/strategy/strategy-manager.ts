/**
 * Strategy Manager
 *
 * Flat: evaluates both sides and keeps the stronger valid setup (long wins ties).
 * In a position: evaluates only the opposite side and requires the new
 * confidence to beat the open position's by `reversalDelta`.
 */

import { oppositeSide, type Position, type TimeframeCandles } from '@kline-bot/shared';
import { DEFAULT_STRATEGY_CONFIG, type StrategyConfig } from '../config/strategy-config.js';
import { LongStrategy } from './long-strategy.js';
import { ShortStrategy } from './short-strategy.js';
import { invalid, type Strategy, type StrategyAnalyzers, type StrategyResult } from './types.js';
import { createDefaultAnalyzers } from './directional-strategy.js';

export const DEFAULT_REVERSAL_DELTA = 0.1;

export interface StrategyManagerOptions {
  strategy?: StrategyConfig;
  /** Margin a reversal must clear over the open position's confidence */
  reversalDelta?: number;
  analyzers?: StrategyAnalyzers;
}

/**
 * Open position as far as the manager is concerned
 */
export type PositionSnapshot = Pick<Position, 'side' | 'confidence'>;

export class StrategyManager {
  private readonly long: Strategy;
  private readonly short: Strategy;
  readonly reversalDelta: number;

  constructor(options: StrategyManagerOptions = {}) {
    const config = options.strategy ?? DEFAULT_STRATEGY_CONFIG;
    const analyzers = options.analyzers ?? createDefaultAnalyzers();
    this.long = new LongStrategy(config, analyzers);
    this.short = new ShortStrategy(config, analyzers);
    this.reversalDelta = options.reversalDelta ?? DEFAULT_REVERSAL_DELTA;
  }

  analyze(position: PositionSnapshot | null, frames: TimeframeCandles): StrategyResult {
    if (position) {
      return this.analyzeReversal(position, frames);
    }

    const long = this.long.analyze(frames);
    const short = this.short.analyze(frames);

    if (long.isValid && short.isValid) {
      return short.confidence > long.confidence ? short : long;
    }
    if (long.isValid) return long;
    if (short.isValid) return short;
    return invalid('no valid setup found');
  }

  private analyzeReversal(position: PositionSnapshot, frames: TimeframeCandles): StrategyResult {
    const strategy = oppositeSide(position.side) === 'long' ? this.long : this.short;
    const result = strategy.analyze(frames);

    if (!result.isValid) {
      return invalid('no reversal setup found', result.analysis);
    }
    if (result.confidence > position.confidence + this.reversalDelta) {
      return result;
    }
    return invalid('insufficient confidence for reversal', result.analysis);
  }
}
