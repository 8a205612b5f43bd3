/**
 * Short Strategy
 *
 * Mirror of the long side: non-rising EMA and no bullish price momentum.
 */

import type { TechnicalAnalysis } from '../analysis/index.js';
import { DirectionalStrategy } from './directional-strategy.js';
import type { StrategyAnalysis } from './types.js';

export class ShortStrategy extends DirectionalStrategy {
  readonly direction = 'short' as const;

  protected meetsConditions(analysis: StrategyAnalysis): boolean {
    const { ema } = analysis.technical;
    return (
      this.commonConditions(analysis) &&
      (ema.direction <= 0 || ema.slope < 0) &&
      analysis.price.signal <= 0
    );
  }

  protected hasAlignedCross(technical: TechnicalAnalysis): boolean {
    return technical.rsi.crossBelow && technical.ema.direction < 0;
  }

  protected levels(entryPrice: number): { stopLoss: number; takeProfit: number } {
    return {
      stopLoss: entryPrice * (1 + this.config.stopLoss),
      takeProfit: entryPrice * (1 - this.config.targetProfit),
    };
  }
}
