/**
 * Exponential Moving Average
 *
 * Full-series and streaming variants. Series are index-aligned with the input
 * prices and hold `undefined` until the lookback is filled.
 */

import { SMA } from 'technicalindicators';
import type { Bias } from '@kline-bot/shared';

export type IndicatorSeries = Array<number | undefined>;

/** Slope below this magnitude counts as flat */
export const EMA_FLAT_SLOPE = 0.0001;

export interface EMAPoint {
  value: number;
  /** Relative change against the previous EMA value */
  slope: number;
  direction: Bias;
  /** min(|slope| * 100, 1) */
  strength: number;
}

export interface EMACrossover {
  crossed: boolean;
  direction: Bias;
  /** |fast - slow| / slow at the latest point */
  strength: number;
}

export function isValidPeriod(period: number): boolean {
  return Number.isInteger(period) && period > 0;
}

/**
 * EMA over a full price series.
 * Seeded with the simple mean of the first `period` prices, k = 2 / (period + 1).
 * Returns null when period is invalid or there are fewer than `period` prices.
 */
export function calculateEMA(prices: readonly number[], period: number): IndicatorSeries | null {
  if (!isValidPeriod(period) || prices.length < period) return null;

  const seed = SMA.calculate({ period, values: prices.slice(0, period) })[0];
  if (seed === undefined) return null;

  const k = 2 / (period + 1);
  const result: IndicatorSeries = new Array<number | undefined>(prices.length).fill(undefined);
  result[period - 1] = seed;

  let prev = seed;
  for (let i = period; i < prices.length; i++) {
    prev = (prices[i] - prev) * k + prev;
    result[i] = prev;
  }

  return result;
}

/**
 * One streaming EMA step. Returns null for an invalid period.
 */
export function nextEMA(price: number, prevEma: number, period: number): number | null {
  if (!isValidPeriod(period)) return null;
  const k = 2 / (period + 1);
  return (price - prevEma) * k + prevEma;
}

/**
 * Streaming EMA step with slope, direction and strength
 */
export function emaPoint(price: number, prevEma: number, period: number): EMAPoint | null {
  const value = nextEMA(price, prevEma, period);
  if (value === null) return null;
  return describeEMAMove(prevEma, value);
}

/**
 * Slope, direction and strength of a move from one EMA value to the next
 */
export function describeEMAMove(prev: number, value: number): EMAPoint {
  const slope = prev !== 0 ? (value - prev) / prev : 0;
  let direction: Bias = 0;
  if (Math.abs(slope) > EMA_FLAT_SLOPE) {
    direction = slope > 0 ? 1 : -1;
  }
  return {
    value,
    slope,
    direction,
    strength: Math.min(Math.abs(slope) * 100, 1),
  };
}

/**
 * Crossover of a fast EMA over a slow one at the last two points.
 * Bullish when fast moves from <= slow to > slow, bearish mirrored.
 */
export function emaCrossover(fast: IndicatorSeries, slow: IndicatorSeries): EMACrossover | null {
  const last = Math.min(fast.length, slow.length) - 1;
  if (last < 1) return null;

  const currFast = fast[last];
  const currSlow = slow[last];
  const prevFast = fast[last - 1];
  const prevSlow = slow[last - 1];
  if (currFast === undefined || currSlow === undefined || prevFast === undefined || prevSlow === undefined) {
    return null;
  }

  const strength = currSlow !== 0 ? Math.abs((currFast - currSlow) / currSlow) : 0;

  if (prevFast <= prevSlow && currFast > currSlow) {
    return { crossed: true, direction: 1, strength };
  }
  if (prevFast >= prevSlow && currFast < currSlow) {
    return { crossed: true, direction: -1, strength };
  }
  return { crossed: false, direction: 0, strength };
}
