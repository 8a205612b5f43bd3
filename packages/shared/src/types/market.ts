/**
 * Market data types
 */

/**
 * Candle intervals the signal engine works with.
 * The 5m series drives the simulation clock.
 */
export type Timeframe = '5m' | '15m' | '1h' | '4h';

export const TIMEFRAMES: readonly Timeframe[] = ['5m', '15m', '1h', '4h'];

/** Interval length in milliseconds */
export const TIMEFRAME_MS: Record<Timeframe, number> = {
  '5m': 5 * 60_000,
  '15m': 15 * 60_000,
  '1h': 60 * 60_000,
  '4h': 4 * 60 * 60_000,
};

/**
 * Represents an OHLCV candle (kline)
 */
export interface Candle {
  /** Trading pair (e.g., "BTCUSDT") */
  symbol: string;
  timeframe: Timeframe;
  /** Candle start time (Unix epoch milliseconds) */
  openTime: number;
  /** Candle end time (Unix epoch milliseconds) */
  closeTime: number;
  open: number;
  high: number;
  low: number;
  close: number;
  /** Base asset volume */
  volume: number;
  /** Number of trades aggregated into this candle */
  tradeCount: number;
}

/**
 * Candle series per timeframe, each sorted ascending by openTime
 */
export type TimeframeCandles = Record<Timeframe, readonly Candle[]>;
