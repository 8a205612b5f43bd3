/**
 * Result Aggregator
 *
 * Single owner of the merged results. Symbol runs are collected as they
 * finish; metrics are computed once every symbol has reported.
 */

import type { Trade } from '@kline-bot/shared';
import { calculateMetrics } from './metrics.js';
import type { BacktestResults, SymbolReport, SymbolRun, SymbolStatus } from './types.js';

export class ResultAggregator {
  private readonly reports = new Map<string, SymbolReport>();
  private readonly trades = new Map<string, Trade[]>();

  /**
   * @param symbols Requested order; used for report order and close-time ties
   */
  constructor(
    private readonly symbols: readonly string[],
    private readonly initialBalance: number
  ) {}

  addRun(status: Extract<SymbolStatus, 'completed' | 'cancelled'>, run: SymbolRun): void {
    this.trades.set(run.symbol, [...run.trades]);
    this.reports.set(run.symbol, {
      symbol: run.symbol,
      status,
      trades: run.trades.length,
      candlesProcessed: run.candlesProcessed,
      openPosition: run.openPosition,
    });
  }

  addSkipped(symbol: string, status: Extract<SymbolStatus, 'skipped' | 'failed' | 'cancelled'>, reason: string): void {
    this.reports.set(symbol, { symbol, status, reason, trades: 0, candlesProcessed: 0, openPosition: null });
  }

  /**
   * Trades in close order; ties by symbol order, then open time
   */
  mergedTrades(): Trade[] {
    const rank = new Map(this.symbols.map((symbol, i) => [symbol, i]));
    const merged = [...this.trades.values()].flat();
    return merged.sort(
      (a, b) =>
        a.closeTime - b.closeTime ||
        (rank.get(a.symbol) ?? Number.MAX_SAFE_INTEGER) - (rank.get(b.symbol) ?? Number.MAX_SAFE_INTEGER) ||
        a.openTime - b.openTime
    );
  }

  finalize(): BacktestResults {
    const trades = this.mergedTrades();
    const { metrics, equityCurve } = calculateMetrics(trades, this.initialBalance);
    const symbols = this.symbols.map(
      (symbol): SymbolReport =>
        this.reports.get(symbol) ?? {
          symbol,
          status: 'cancelled',
          reason: 'not started',
          trades: 0,
          candlesProcessed: 0,
          openPosition: null,
        }
    );
    return { ...metrics, trades, equityCurve, symbols };
  }
}
