/**
 * CSV Candle Repository
 *
 * Serves candles from a directory of `<SYMBOL>_<timeframe>.csv` files. When a
 * higher timeframe file is missing, it is built from the 5m file.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Candle, Logger, Timeframe } from '@kline-bot/shared';
import { resampleCandles } from '../../utils/candle-aggregator.js';
import { normalizeSeries, type CandleRepository } from './candle-repository.js';
import { csvFileName, loadCandlesFromCSV, type CSVLoadOptions } from './csv-loader.js';

export interface CsvRepositoryOptions {
  dataDir: string;
  /** Column and format options shared by every file */
  csv?: Omit<CSVLoadOptions, 'symbol' | 'timeframe' | 'logger'>;
  logger?: Logger;
}

export class CsvCandleRepository implements CandleRepository {
  private readonly cache = new Map<string, Promise<Candle[]>>();

  constructor(private readonly options: CsvRepositoryOptions) {}

  async getCandles(symbol: string, timeframe: Timeframe, start: number, end: number): Promise<Candle[]> {
    const series = await this.loadSeries(symbol, timeframe);
    return series.filter((c) => c.openTime >= start && c.openTime <= end);
  }

  private loadSeries(symbol: string, timeframe: Timeframe): Promise<Candle[]> {
    const key = `${symbol}:${timeframe}`;
    let pending = this.cache.get(key);
    if (!pending) {
      pending = this.readSeries(symbol, timeframe);
      this.cache.set(key, pending);
    }
    return pending;
  }

  private async readSeries(symbol: string, timeframe: Timeframe): Promise<Candle[]> {
    const filePath = path.join(this.options.dataDir, csvFileName(symbol, timeframe));

    if (fs.existsSync(filePath)) {
      const candles = await loadCandlesFromCSV(filePath, {
        ...this.options.csv,
        symbol,
        timeframe,
        logger: this.options.logger,
      });
      this.options.logger?.debug('Loaded CSV series', { symbol, timeframe, candles: candles.length });
      return normalizeSeries(candles);
    }

    if (timeframe === '5m') {
      throw new Error(`No 5m data for ${symbol}: ${filePath} not found`);
    }

    const base = await this.loadSeries(symbol, '5m');
    const resampled = resampleCandles(base, timeframe);
    this.options.logger?.debug('Resampled series from 5m', { symbol, timeframe, candles: resampled.length });
    return resampled;
  }
}
