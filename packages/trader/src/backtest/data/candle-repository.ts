/**
 * Data access seams
 *
 * The engine only reads through these interfaces. Storage, exchange clients
 * and their retry policies live behind them.
 */

import type { Candle, Position, Timeframe } from '@kline-bot/shared';

export interface CandleRepository {
  /**
   * Candles of one series with openTime in [start, end], ascending.
   * Gaps are allowed.
   */
  getCandles(symbol: string, timeframe: Timeframe, start: number, end: number): Promise<Candle[]>;
}

export interface PositionReader {
  getOpenPosition(symbol: string): Promise<Position | null>;
}

/**
 * Sort ascending by openTime and drop repeated openTimes (first one wins)
 */
export function normalizeSeries(candles: readonly Candle[]): Candle[] {
  const sorted = [...candles].sort((a, b) => a.openTime - b.openTime);
  return sorted.filter((candle, i) => {
    const prev = sorted[i - 1];
    return !prev || prev.openTime !== candle.openTime;
  });
}
