/**
 * Tests for Technical Indicators
 *
 * Values below are worked by hand from the recurrences.
 */

import { describe, it, expect } from 'vitest';
import {
  calculateEMA,
  nextEMA,
  emaPoint,
  emaCrossover,
  calculateRSI,
  nextRSI,
  calculateMACD,
  nextMACD,
  calculateBollingerBands,
  bollingerPoint,
  getLatest,
  crossesAbove,
  crossesBelow,
  type IndicatorSeries,
} from './index.js';

// =============================================================================
// HELPERS
// =============================================================================

function expectSeriesCloseTo(actual: IndicatorSeries | undefined, expected: IndicatorSeries): void {
  expect(actual).toBeDefined();
  expect(actual?.length).toBe(expected.length);
  expected.forEach((value, i) => {
    const got = actual?.[i];
    if (value === undefined) {
      expect(got).toBeUndefined();
    } else {
      expect(got).toBeCloseTo(value, 6);
    }
  });
}

/**
 * Deterministic pseudo-random walk
 */
function randomWalk(length: number, seed: number): number[] {
  let state = seed;
  const next = (): number => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
  const prices = [100];
  for (let i = 1; i < length; i++) {
    prices.push(prices[i - 1] * (1 + (next() - 0.5) * 0.04));
  }
  return prices;
}

// =============================================================================
// EMA
// =============================================================================

describe('EMA', () => {
  it('seeds with the simple mean and follows the recurrence', () => {
    expect(calculateEMA([1, 2, 3, 4, 5], 3)).toEqual([undefined, undefined, 2, 3, 4]);
  });

  it('returns null for insufficient data or a bad period', () => {
    expect(calculateEMA([1, 2], 3)).toBeNull();
    expect(calculateEMA([1, 2, 3], 0)).toBeNull();
    expect(calculateEMA([1, 2, 3], -2)).toBeNull();
  });

  it('holds a single seed value when length equals period', () => {
    expect(calculateEMA([2, 4, 6], 3)).toEqual([undefined, undefined, 4]);
  });

  it('satisfies ema[i] = (p[i] - ema[i-1]) * k + ema[i-1]', () => {
    const prices = randomWalk(60, 7);
    const period = 10;
    const ema = calculateEMA(prices, period);
    const k = 2 / (period + 1);

    for (let i = period; i < prices.length; i++) {
      const prev = ema?.[i - 1];
      expect(prev).toBeDefined();
      if (prev === undefined) continue;
      expect(ema?.[i]).toBeCloseTo((prices[i] - prev) * k + prev, 10);
    }
  });

  it('streams the same value as the full series', () => {
    expect(nextEMA(4, 2, 3)).toBe(3);
    expect(nextEMA(4, 2, 0)).toBeNull();
  });

  it('reports slope, direction and strength for a point update', () => {
    const up = emaPoint(101, 100, 1);
    expect(up?.value).toBe(101);
    expect(up?.slope).toBeCloseTo(0.01, 10);
    expect(up?.direction).toBe(1);
    expect(up?.strength).toBeCloseTo(1, 10);

    const flat = emaPoint(100.001, 100, 1);
    expect(flat?.direction).toBe(0);

    const down = emaPoint(99.9, 100, 1);
    expect(down?.direction).toBe(-1);
    expect(down?.strength).toBeCloseTo(0.1, 6);
  });

  it('detects crossovers at the last two points', () => {
    expect(emaCrossover([undefined, 1, 3], [undefined, 2, 2])).toEqual({ crossed: true, direction: 1, strength: 0.5 });
    expect(emaCrossover([3, 1], [2, 2])).toEqual({ crossed: true, direction: -1, strength: 0.5 });
    expect(emaCrossover([3, 4], [2, 2])).toEqual({ crossed: false, direction: 0, strength: 1 });
    expect(emaCrossover([undefined, 4], [2, 2])).toBeNull();
    expect(emaCrossover([4], [2])).toBeNull();
  });
});

// =============================================================================
// RSI
// =============================================================================

describe('RSI', () => {
  it('returns 100 for a monotonic rise', () => {
    const result = calculateRSI([1, 2, 3], 2);
    expect(result?.rsi).toEqual([undefined, undefined, 100]);
    // Only one RSI value, too short for the signal line
    expect(result?.signal).toEqual([undefined, undefined, undefined]);
  });

  it('returns 0 for a monotonic fall', () => {
    const result = calculateRSI([5, 4, 3, 2], 2);
    expect(result?.rsi).toEqual([undefined, undefined, 0, 0]);
  });

  it('returns null when there are fewer than period + 1 prices', () => {
    expect(calculateRSI([1, 2], 2)).toBeNull();
    expect(calculateRSI([1, 2, 3], 0)).toBeNull();
    expect(calculateRSI([1, 2, 3], 2, 0)).toBeNull();
  });

  it('smooths gains and losses with the EMA', () => {
    // gains  [0, 1, 0, 2] -> ema(2) [-, 0.5, 0.1667, 1.3889]
    // losses [0, 0, 1, 0] -> ema(2) [-, 0,   0.6667, 0.2222]
    const result = calculateRSI([10, 11, 10, 12], 2, 2);
    expectSeriesCloseTo(result?.rsi, [undefined, undefined, 20, 86.2068966]);
    expectSeriesCloseTo(result?.signal, [undefined, undefined, undefined, 53.1034483]);
    expectSeriesCloseTo(result?.histogram, [undefined, undefined, undefined, 33.1034483]);
  });

  it('stays within [0, 100]', () => {
    const result = calculateRSI(randomWalk(300, 42), 14);
    const defined = result?.rsi.filter((v): v is number => v !== undefined) ?? [];
    expect(defined.length).toBe(300 - 14);
    for (const value of defined) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(100);
    }
  });

  it('defines divergence once the lookback reaches back into the RSI', () => {
    const result = calculateRSI(randomWalk(40, 3), 14);
    result?.divergence.forEach((value, i) => {
      if (i < 19) {
        expect(value).toBeUndefined();
      } else {
        expect([-1, 0, 1]).toContain(value);
      }
    });
  });

  it('flags a bullish divergence when price falls while RSI rises', () => {
    // RSI sits at 0 through the sell-off, then recovers while price stays lower
    const prices = [100, 90, 80, 70, 60, 50, 55, 52, 54];
    const result = calculateRSI(prices, 2, 1);
    expect(getLatest(result?.divergence ?? [])).toBe(1);
  });

  it('streams one step from previous averages', () => {
    const step = nextRSI(12, 10, 0.5, 0.5, 3);
    expect(step?.gainEma).toBe(1.25);
    expect(step?.lossEma).toBe(0.25);
    expect(step?.rsi).toBeCloseTo(83.333333, 5);
  });
});

// =============================================================================
// MACD
// =============================================================================

describe('MACD', () => {
  it('aligns macd, signal and histogram', () => {
    const result = calculateMACD([1, 2, 3, 4, 5], 2, 3, 2);
    expectSeriesCloseTo(result?.macd, [undefined, undefined, 0.5, 0.5, 0.5]);
    expectSeriesCloseTo(result?.signal, [undefined, undefined, undefined, 0.5, 0.5]);
    expectSeriesCloseTo(result?.histogram, [undefined, undefined, undefined, 0, 0]);
  });

  it('rejects invalid configurations and short input', () => {
    expect(calculateMACD([1, 2, 3, 4, 5], 3, 3, 2)).toBeNull();
    expect(calculateMACD([1, 2, 3, 4, 5], 0, 3, 2)).toBeNull();
    expect(calculateMACD([1, 2, 3, 4, 5], 2, 3, 0)).toBeNull();
    expect(calculateMACD([1, 2, 3], 2, 3, 2)).toBeNull();
  });

  it('uses the 12/26/9 defaults', () => {
    const prices = randomWalk(34, 11);
    const result = calculateMACD(prices);
    expect(result?.macd[24]).toBeUndefined();
    expect(result?.macd[25]).toBeDefined();
    expect(result?.histogram[32]).toBeUndefined();
    expect(result?.histogram[33]).toBeDefined();
    expect(calculateMACD(prices.slice(0, 33))).toBeNull();
  });

  it('streams the next step from the previous state', () => {
    const step = nextMACD(5, { fastEma: 3.5, slowEma: 3, signalEma: 0.5 }, 2, 3, 2);
    expect(step?.fastEma).toBeCloseTo(4.5, 10);
    expect(step?.slowEma).toBeCloseTo(4, 10);
    expect(step?.macd).toBeCloseTo(0.5, 10);
    expect(step?.signalEma).toBeCloseTo(0.5, 10);
    expect(step?.histogram).toBeCloseTo(0, 10);
  });
});

// =============================================================================
// BOLLINGER BANDS
// =============================================================================

describe('Bollinger Bands', () => {
  const std = Math.sqrt(2 / 3);

  it('uses the rolling mean and population deviation', () => {
    const result = calculateBollingerBands([1, 2, 3, 4, 5], 3, 2);
    expectSeriesCloseTo(result?.middle, [undefined, undefined, 2, 3, 4]);
    expectSeriesCloseTo(result?.upper, [undefined, undefined, 2 + 2 * std, 3 + 2 * std, 4 + 2 * std]);
    expectSeriesCloseTo(result?.lower, [undefined, undefined, 2 - 2 * std, 3 - 2 * std, 4 - 2 * std]);
    expect(result?.width[4]).toBeCloseTo((4 * std) / 4, 6);
  });

  it('places the first band at the end of the first full window', () => {
    // mean 5, population deviation 2
    const result = calculateBollingerBands([2, 4, 4, 4, 5, 5, 7, 9], 8, 2);
    expect(result?.upper.slice(0, 7)).toEqual(new Array(7).fill(undefined));
    expect(result?.middle[7]).toBeCloseTo(5, 10);
    expect(result?.upper[7]).toBeCloseTo(9, 10);
    expect(result?.lower[7]).toBeCloseTo(1, 10);
    expect(result?.width[7]).toBeCloseTo(1.6, 10);
  });

  it('computes the trailing window point', () => {
    const point = bollingerPoint([1, 2, 3, 4, 5], 3, 2);
    expect(point?.middle).toBeCloseTo(4, 10);
    expect(point?.upper).toBeCloseTo(4 + 2 * std, 10);
    expect(point?.width).toBeCloseTo(std, 10);
  });

  it('collapses to the mean for constant prices', () => {
    expect(bollingerPoint([7, 7, 7, 7], 4, 2)).toEqual({ upper: 7, middle: 7, lower: 7, width: 0 });
  });

  it('returns null for short input or a bad period', () => {
    expect(calculateBollingerBands([1, 2], 3)).toBeNull();
    expect(bollingerPoint([1, 2, 3], 0)).toBeNull();
    expect(bollingerPoint([1, 2, 3], 3, -1)).toBeNull();
  });
});

// =============================================================================
// HELPERS
// =============================================================================

describe('series helpers', () => {
  it('gets the latest value', () => {
    expect(getLatest([1, 2])).toBe(2);
    expect(getLatest([1, undefined])).toBeNull();
    expect(getLatest([])).toBeNull();
  });

  it('detects crosses against a line or a constant', () => {
    expect(crossesAbove([1, 3], [2, 2], 1)).toBe(true);
    expect(crossesAbove([3, 4], [2, 2], 1)).toBe(false);
    expect(crossesBelow([3, 1], 2, 1)).toBe(true);
    expect(crossesBelow([undefined, 1], 2, 1)).toBe(false);
    expect(crossesAbove([1, 3], 2, 0)).toBe(false);
  });
});
