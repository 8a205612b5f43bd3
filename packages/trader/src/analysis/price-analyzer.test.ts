import { describe, it, expect } from 'vitest';
import type { Timeframe } from '@kline-bot/shared';
import { PriceAnalyzer, alignmentScore, decayedMomentum, relativeChangeVolatility } from './price-analyzer.js';
import { buildFrames, geometricCloses, seriesFromCloses } from '../testing/candle-factory.js';

function momentumFrames(ratios: Record<Timeframe, number>) {
  return buildFrames((timeframe) => seriesFromCloses(geometricCloses(100, ratios[timeframe], 12), { timeframe }));
}

describe('PriceAnalyzer', () => {
  const analyzer = new PriceAnalyzer();

  it('gives full confidence when every timeframe rises smoothly', () => {
    const result = analyzer.analyze(momentumFrames({ '5m': 1.01, '15m': 1.01, '1h': 1.01, '4h': 1.01 }));

    expect(result?.alignment).toBe(1);
    expect(result?.momentum['1h']).toBeCloseTo(0.01, 10);
    expect(result?.weightedMomentum).toBeCloseTo(0.01, 10);
    expect(result?.volatility).toBeCloseTo(0, 10);
    expect(result?.confidence).toBeCloseTo(1, 8);
    expect(result?.signal).toBe(1);
  });

  it('drops to 0.8 when only 5m disagrees', () => {
    const result = analyzer.analyze(momentumFrames({ '5m': 0.99, '15m': 1.01, '1h': 1.01, '4h': 1.01 }));

    expect(result?.alignment).toBe(0.8);
    // 0.15 * -0.01 + 0.85 * 0.01
    expect(result?.weightedMomentum).toBeCloseTo(0.007, 10);
    expect(result?.confidence).toBeCloseTo(0.8, 8);
  });

  it('drops to 0.6 when only 1h and 4h agree', () => {
    const result = analyzer.analyze(momentumFrames({ '5m': 0.99, '15m': 0.99, '1h': 1.01, '4h': 1.01 }));
    expect(result?.alignment).toBe(0.6);
    expect(result?.signal).toBe(1);
  });

  it('has no confidence when 1h and 4h disagree', () => {
    const result = analyzer.analyze(momentumFrames({ '5m': 1.01, '15m': 1.01, '1h': 0.99, '4h': 1.01 }));
    expect(result?.alignment).toBe(0);
    expect(result?.confidence).toBe(0);
    // 0.15 + 0.25 - 0.35 + 0.25 = 0.30 of a 1% move
    expect(result?.weightedMomentum).toBeCloseTo(0.003, 10);
    expect(result?.signal).toBe(1);
  });

  it('loses all confidence once volatility reaches 1', () => {
    const frames = momentumFrames({ '5m': 1.01, '15m': 1.01, '1h': 1.01, '4h': 1.01 });
    const choppy = [100, 250, 100, 250, 100, 250, 100, 250, 100, 250, 100, 250];
    const result = analyzer.analyze({ ...frames, '5m': seriesFromCloses(choppy) });

    expect(result?.volatility).toBeGreaterThan(1);
    expect(result?.confidence).toBe(0);
  });

  it('stays neutral inside the momentum threshold', () => {
    const flat = buildFrames((timeframe) => seriesFromCloses(new Array<number>(12).fill(100), { timeframe }));
    const result = analyzer.analyze(flat);
    expect(result?.signal).toBe(0);
    expect(result?.alignment).toBe(0);
  });

  it('returns null when a timeframe is shorter than its window', () => {
    const frames = momentumFrames({ '5m': 1.01, '15m': 1.01, '1h': 1.01, '4h': 1.01 });
    expect(analyzer.analyze({ ...frames, '4h': frames['4h'].slice(0, 5) })).toBeNull();
  });
});

describe('price helpers', () => {
  it('weights the newest change most', () => {
    expect(decayedMomentum([100, 110, 121], 0.9)).toBeCloseTo(0.1, 10);
    // (-0.1 * 1 + 0.1 * 0.9) / 1.9
    expect(decayedMomentum([100, 110, 99], 0.9)).toBeCloseTo(-0.01 / 1.9, 10);
    expect(decayedMomentum([100], 0.9)).toBe(0);
  });

  it('measures volatility as the deviation of relative changes', () => {
    expect(relativeChangeVolatility([100, 110, 99])).toBeCloseTo(0.1, 10);
    expect(relativeChangeVolatility([100, 100, 100])).toBe(0);
  });

  it('scores alignment up the timeframe ladder', () => {
    expect(alignmentScore({ '5m': -1, '15m': -1, '1h': -1, '4h': -1 })).toBe(1);
    expect(alignmentScore({ '5m': 1, '15m': -1, '1h': -1, '4h': -1 })).toBe(0.8);
    expect(alignmentScore({ '5m': 0, '15m': 1, '1h': -1, '4h': -1 })).toBe(0.6);
    expect(alignmentScore({ '5m': 1, '15m': 1, '1h': 0, '4h': 0 })).toBe(0);
  });
});
