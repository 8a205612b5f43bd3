/**
 * Candle Aggregator
 *
 * Builds higher timeframes from a lower one, e.g. 5m -> 15m / 1h / 4h.
 * Candles are bucketed by open time; incomplete buckets are dropped.
 */

import { TIMEFRAME_MS, type Candle, type Timeframe } from '@kline-bot/shared';

/**
 * Aggregate a chunk of candles into a single candle
 */
export function aggregateChunk(chunk: readonly Candle[], timeframe: Timeframe, openTime: number): Candle {
  const first = chunk[0];
  const last = chunk[chunk.length - 1];
  if (!first || !last) {
    throw new Error('Cannot aggregate empty chunk');
  }

  return {
    symbol: first.symbol,
    timeframe,
    openTime,
    closeTime: openTime + TIMEFRAME_MS[timeframe] - 1,
    open: first.open,
    high: Math.max(...chunk.map((c) => c.high)),
    low: Math.min(...chunk.map((c) => c.low)),
    close: last.close,
    volume: chunk.reduce((sum, c) => sum + c.volume, 0),
    tradeCount: chunk.reduce((sum, c) => sum + c.tradeCount, 0),
  };
}

/**
 * Resample an ascending series into `target`.
 *
 * @example
 * ```typescript
 * const candles1h = resampleCandles(candles5m, '1h');
 * ```
 */
export function resampleCandles(candles: readonly Candle[], target: Timeframe): Candle[] {
  const first = candles[0];
  if (!first) return [];

  const sourceMs = TIMEFRAME_MS[first.timeframe];
  const targetMs = TIMEFRAME_MS[target];
  if (targetMs <= sourceMs || targetMs % sourceMs !== 0) {
    throw new Error(`Cannot resample ${first.timeframe} into ${target}`);
  }
  const perBucket = targetMs / sourceMs;

  const aggregated: Candle[] = [];
  let bucketStart = Math.floor(first.openTime / targetMs) * targetMs;
  let chunk: Candle[] = [];

  const flush = (): void => {
    if (chunk.length === perBucket) {
      aggregated.push(aggregateChunk(chunk, target, bucketStart));
    }
    chunk = [];
  };

  for (const candle of candles) {
    const start = Math.floor(candle.openTime / targetMs) * targetMs;
    if (start !== bucketStart) {
      flush();
      bucketStart = start;
    }
    chunk.push(candle);
  }
  flush();

  return aggregated;
}
