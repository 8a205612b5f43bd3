/**
 * Tests for Backtest Metrics
 */

import { describe, it, expect } from 'vitest';
import type { Trade } from '@kline-bot/shared';
import {
  buildEquityCurve,
  calculateMaxDrawdown,
  calculateMetrics,
  calculateSharpeRatio,
  equityReturns,
  formatMetrics,
} from './metrics.js';

function trade(pnl: number, closeTime: number): Trade {
  return {
    id: `T-${closeTime}`,
    symbol: 'TESTUSDT',
    side: 'long',
    size: 1,
    leverage: 1,
    entryPrice: 100,
    stopLossPrice: 99,
    takeProfitPrice: 101,
    confidence: 0.8,
    openTime: closeTime - 1,
    closeTime,
    exitPrice: 100 + pnl,
    status: 'closed',
    pnl,
    exitReason: pnl > 0 ? 'take_profit' : 'stop_loss',
  };
}

describe('buildEquityCurve', () => {
  it('replays pnl from the initial balance', () => {
    expect(buildEquityCurve([trade(1, 10), trade(-2, 20), trade(3, 30)], 10)).toEqual([
      { timestamp: 10, balance: 11 },
      { timestamp: 20, balance: 9 },
      { timestamp: 30, balance: 12 },
    ]);
  });

  it('floors the balance at zero', () => {
    expect(buildEquityCurve([trade(-5, 10), trade(2, 20)], 1).map((p) => p.balance)).toEqual([0, 2]);
  });
});

describe('calculateMaxDrawdown', () => {
  it('measures from the running peak', () => {
    const curve = buildEquityCurve([trade(1, 10), trade(-2, 20), trade(3, 30)], 10);
    expect(calculateMaxDrawdown(curve, 10)).toBeCloseTo(2 / 11, 12);
  });

  it('starts the peak at the initial balance', () => {
    expect(calculateMaxDrawdown([{ timestamp: 1, balance: 8 }], 10)).toBeCloseTo(0.2, 12);
    expect(calculateMaxDrawdown([], 10)).toBe(0);
  });
});

describe('calculateSharpeRatio', () => {
  it('annualizes mean over sample deviation', () => {
    const curve = buildEquityCurve([trade(1, 10), trade(-2, 20), trade(3, 30)], 10);
    const returns = equityReturns(curve, 10);
    expect(returns[0]).toBeCloseTo(0.1, 12);
    expect(returns[1]).toBeCloseTo(-2 / 11, 12);
    expect(returns[2]).toBeCloseTo(1 / 3, 12);
    expect(calculateSharpeRatio(returns)).toBeCloseTo(5.159385207, 6);
  });

  it('is zero for fewer than two returns or no variance', () => {
    expect(calculateSharpeRatio([])).toBe(0);
    expect(calculateSharpeRatio([0.05])).toBe(0);
    expect(calculateSharpeRatio([0.01, 0.01, 0.01])).toBe(0);
  });

  it('skips steps from a zero balance', () => {
    const curve = buildEquityCurve([trade(-5, 10), trade(2, 20)], 1);
    expect(equityReturns(curve, 1)).toEqual([-1]);
  });
});

describe('calculateMetrics', () => {
  it('summarizes the trade set', () => {
    const { metrics, equityCurve } = calculateMetrics([trade(1, 10), trade(-2, 20), trade(3, 30)], 10);
    expect(equityCurve).toHaveLength(3);
    expect(metrics.totalTrades).toBe(3);
    expect(metrics.winningTrades).toBe(2);
    expect(metrics.losingTrades).toBe(1);
    expect(metrics.winRate).toBeCloseTo(2 / 3, 12);
    expect(metrics.averagePnl).toBeCloseTo(2 / 3, 12);
    expect(metrics.finalBalance).toBe(12);
    expect(metrics.maxDrawdown).toBeCloseTo(2 / 11, 12);
  });

  it('counts a zero-pnl trade as losing', () => {
    const { metrics } = calculateMetrics([trade(0, 10)], 10);
    expect(metrics.winningTrades).toBe(0);
    expect(metrics.losingTrades).toBe(1);
  });

  it('returns zeros without trades', () => {
    const { metrics, equityCurve } = calculateMetrics([], 10);
    expect(equityCurve).toEqual([]);
    expect(metrics).toEqual({
      totalTrades: 0,
      winningTrades: 0,
      losingTrades: 0,
      winRate: 0,
      averagePnl: 0,
      maxDrawdown: 0,
      finalBalance: 10,
      sharpeRatio: 0,
    });
  });

  it('formats a summary', () => {
    const { metrics } = calculateMetrics([trade(1, 10)], 10);
    expect(formatMetrics(metrics).split('\n')[0]).toBe('Trades: 1 (1W / 0L)');
    expect(formatMetrics(metrics).split('\n')[1]).toBe('Win Rate: 100.0%');
  });
});
