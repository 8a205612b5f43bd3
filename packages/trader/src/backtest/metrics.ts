/**
 * Backtest Metrics
 *
 * Computed once from the complete trade set: trades are replayed in close
 * order from the initial balance to build the equity curve.
 */

import type { EquityPoint, Trade } from '@kline-bot/shared';

export const TRADING_DAYS_PER_YEAR = 252;

export interface BacktestMetrics {
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  winRate: number;
  averagePnl: number;
  /** Largest peak-to-trough fall as a fraction of the peak */
  maxDrawdown: number;
  finalBalance: number;
  sharpeRatio: number;
}

// =============================================================================
// EQUITY CURVE
// =============================================================================

/**
 * One point per close, balance floored at 0. Trades must already be in close order.
 */
export function buildEquityCurve(trades: readonly Trade[], initialBalance: number): EquityPoint[] {
  let balance = initialBalance;
  return trades.map((trade) => {
    balance = Math.max(0, balance + trade.pnl);
    return { timestamp: trade.closeTime, balance };
  });
}

export function calculateMaxDrawdown(curve: readonly EquityPoint[], initialBalance: number): number {
  let peak = initialBalance;
  let maxDrawdown = 0;

  for (const point of curve) {
    if (point.balance > peak) peak = point.balance;
    if (peak > 0) {
      maxDrawdown = Math.max(maxDrawdown, (peak - point.balance) / peak);
    }
  }

  return maxDrawdown;
}

/**
 * Step returns along the curve, starting from the initial balance.
 * Steps from a zero balance are skipped.
 */
export function equityReturns(curve: readonly EquityPoint[], initialBalance: number): number[] {
  const returns: number[] = [];
  let prev = initialBalance;
  for (const point of curve) {
    if (prev > 0) returns.push((point.balance - prev) / prev);
    prev = point.balance;
  }
  return returns;
}

/**
 * Annualized Sharpe: mean * 252 / (sample std * sqrt(252)).
 * 0 with fewer than two returns or no variance.
 */
export function calculateSharpeRatio(returns: readonly number[]): number {
  if (returns.length < 2) return 0;

  const mean = returns.reduce((sum, r) => sum + r, 0) / returns.length;
  const variance = returns.reduce((sum, r) => sum + (r - mean) ** 2, 0) / (returns.length - 1);
  const std = Math.sqrt(variance);
  // relative tolerance: equal returns can leave rounding noise in the variance
  if (std <= Math.abs(mean) * 1e-12) return 0;

  return (mean * TRADING_DAYS_PER_YEAR) / (std * Math.sqrt(TRADING_DAYS_PER_YEAR));
}

// =============================================================================
// METRICS CALCULATION
// =============================================================================

export function calculateMetrics(
  trades: readonly Trade[],
  initialBalance: number
): { metrics: BacktestMetrics; equityCurve: EquityPoint[] } {
  const equityCurve = buildEquityCurve(trades, initialBalance);
  const totalTrades = trades.length;
  const winningTrades = trades.filter((t) => t.pnl > 0).length;
  const totalPnl = trades.reduce((sum, t) => sum + t.pnl, 0);
  const last = equityCurve[equityCurve.length - 1];

  return {
    metrics: {
      totalTrades,
      winningTrades,
      losingTrades: totalTrades - winningTrades,
      winRate: totalTrades > 0 ? winningTrades / totalTrades : 0,
      averagePnl: totalTrades > 0 ? totalPnl / totalTrades : 0,
      maxDrawdown: calculateMaxDrawdown(equityCurve, initialBalance),
      finalBalance: last ? last.balance : initialBalance,
      sharpeRatio: calculateSharpeRatio(equityReturns(equityCurve, initialBalance)),
    },
    equityCurve,
  };
}

/**
 * Format metrics for display
 */
export function formatMetrics(metrics: BacktestMetrics): string {
  return [
    `Trades: ${metrics.totalTrades} (${metrics.winningTrades}W / ${metrics.losingTrades}L)`,
    `Win Rate: ${(metrics.winRate * 100).toFixed(1)}%`,
    `Avg PnL: ${metrics.averagePnl.toFixed(4)}`,
    `Final Balance: ${metrics.finalBalance.toFixed(2)}`,
    `Max Drawdown: ${(metrics.maxDrawdown * 100).toFixed(2)}%`,
    `Sharpe: ${metrics.sharpeRatio.toFixed(2)}`,
  ].join('\n');
}
