/**
 * In-memory data access
 *
 * Backs tests and embedding: candles are kept per (symbol, timeframe)
 * and filtered by range on read.
 */

import { CandleSeriesSchema, type Candle, type Position, type Timeframe } from '@kline-bot/shared';
import { normalizeSeries, type CandleRepository, type PositionReader } from './candle-repository.js';

function seriesKey(symbol: string, timeframe: Timeframe): string {
  return `${symbol}:${timeframe}`;
}

export class InMemoryCandleRepository implements CandleRepository {
  private readonly series = new Map<string, Candle[]>();

  constructor(candles: readonly Candle[] = []) {
    this.add(candles);
  }

  /**
   * Add candles; series are re-sorted, de-duplicated and validated.
   * Nothing is stored when any series is invalid.
   */
  add(candles: readonly Candle[]): void {
    const grouped = new Map<string, Candle[]>();
    for (const candle of candles) {
      const key = seriesKey(candle.symbol, candle.timeframe);
      const group = grouped.get(key) ?? [...(this.series.get(key) ?? [])];
      group.push(candle);
      grouped.set(key, group);
    }
    const validated = new Map<string, Candle[]>();
    for (const [key, group] of grouped) {
      const parsed = CandleSeriesSchema.safeParse(normalizeSeries(group));
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid candle series ${key}: ${issues.join('; ')}`);
      }
      validated.set(key, parsed.data);
    }
    for (const [key, series] of validated) {
      this.series.set(key, series);
    }
  }

  async getCandles(symbol: string, timeframe: Timeframe, start: number, end: number): Promise<Candle[]> {
    const series = this.series.get(seriesKey(symbol, timeframe)) ?? [];
    return series.filter((c) => c.openTime >= start && c.openTime <= end);
  }
}

export class InMemoryPositionStore implements PositionReader {
  private readonly positions = new Map<string, Position>();

  async getOpenPosition(symbol: string): Promise<Position | null> {
    const position = this.positions.get(symbol);
    return position && position.status === 'open' ? position : null;
  }

  save(position: Position): void {
    this.positions.set(position.symbol, position);
  }

  clear(symbol: string): void {
    this.positions.delete(symbol);
  }
}
