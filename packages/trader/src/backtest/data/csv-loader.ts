/**
 * CSV Loader for Backtest Engine
 *
 * Reads kline CSV exports (one file per symbol and timeframe). Column names
 * are configurable; rows that fail candle validation are skipped or rejected.
 */

import * as fs from 'fs';
import * as path from 'path';
import { CandleSchema, TIMEFRAME_MS, type Candle, type Logger, type Timeframe } from '@kline-bot/shared';

/**
 * CSV parsing options
 */
export interface CSVLoadOptions {
  symbol: string;
  timeframe: Timeframe;
  /** Column name or index for open time (default: 'open_time') */
  timestampColumn?: string | number;
  openColumn?: string | number;
  highColumn?: string | number;
  lowColumn?: string | number;
  closeColumn?: string | number;
  volumeColumn?: string | number;
  /** Column name or index for trade count (default: 'trades') */
  tradeCountColumn?: string | number;
  /** Close time column; derived from the timeframe when absent */
  closeTimeColumn?: string | number;
  /** Delimiter (default: ',') */
  delimiter?: string;
  /** Has header row (default: true) */
  hasHeader?: boolean;
  /** Timestamp format: 'unix_s', 'unix_ms', 'iso' (default: 'unix_ms') */
  timestampFormat?: 'unix_s' | 'unix_ms' | 'iso';
  /** Skip rows with invalid data (default: true) */
  skipInvalid?: boolean;
  logger?: Logger;
}

type ColumnOptions = Required<Omit<CSVLoadOptions, 'symbol' | 'timeframe' | 'logger' | 'closeTimeColumn'>>;

const DEFAULT_OPTIONS: ColumnOptions = {
  timestampColumn: 'open_time',
  openColumn: 'open',
  highColumn: 'high',
  lowColumn: 'low',
  closeColumn: 'close',
  volumeColumn: 'volume',
  tradeCountColumn: 'trades',
  delimiter: ',',
  hasHeader: true,
  timestampFormat: 'unix_ms',
  skipInvalid: true,
};

/**
 * Parse a CSV line handling quoted values
 */
export function parseCSVLine(line: string, delimiter: string): string[] {
  const result: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const char of line) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === delimiter && !inQuotes) {
      result.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  result.push(current.trim());
  return result;
}

/**
 * Get column index from header or use numeric index
 */
function getColumnIndex(column: string | number, headers: string[]): number {
  if (typeof column === 'number') {
    return column;
  }

  const index = headers.findIndex((h) => h.toLowerCase() === column.toLowerCase());
  if (index === -1) {
    throw new Error(`Column "${column}" not found in headers: ${headers.join(', ')}`);
  }
  return index;
}

/**
 * Parse timestamp to epoch milliseconds
 */
function parseTimestamp(value: string, format: 'unix_s' | 'unix_ms' | 'iso'): number {
  switch (format) {
    case 'unix_s':
      return parseInt(value, 10) * 1000;
    case 'unix_ms':
      return parseInt(value, 10);
    case 'iso':
      return new Date(value).getTime();
  }
}

/**
 * Parse CSV content into validated candles, sorted by openTime
 */
export function parseCandlesCSV(content: string, options: CSVLoadOptions): Candle[] {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const lines = content.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const firstLine = lines[0];
  if (firstLine === undefined) {
    return [];
  }

  const firstRow = parseCSVLine(firstLine, opts.delimiter);
  const headers = opts.hasHeader ? firstRow : firstRow.map((_, i) => i.toString());
  const dataStartIndex = opts.hasHeader ? 1 : 0;

  const columns = {
    openTime: getColumnIndex(opts.timestampColumn, headers),
    open: getColumnIndex(opts.openColumn, headers),
    high: getColumnIndex(opts.highColumn, headers),
    low: getColumnIndex(opts.lowColumn, headers),
    close: getColumnIndex(opts.closeColumn, headers),
    volume: getColumnIndex(opts.volumeColumn, headers),
    tradeCount: getColumnIndex(opts.tradeCountColumn, headers),
    closeTime: options.closeTimeColumn === undefined ? null : getColumnIndex(options.closeTimeColumn, headers),
  };

  const candles: Candle[] = [];
  let skipped = 0;

  for (let i = dataStartIndex; i < lines.length; i++) {
    const values = parseCSVLine(lines[i], opts.delimiter);
    const cell = (index: number): string => values[index] ?? '';

    const openTime = parseTimestamp(cell(columns.openTime), opts.timestampFormat);
    const parsed = CandleSchema.safeParse({
      symbol: opts.symbol,
      timeframe: opts.timeframe,
      openTime,
      closeTime:
        columns.closeTime === null
          ? openTime + TIMEFRAME_MS[opts.timeframe] - 1
          : parseTimestamp(cell(columns.closeTime), opts.timestampFormat),
      open: parseFloat(cell(columns.open)),
      high: parseFloat(cell(columns.high)),
      low: parseFloat(cell(columns.low)),
      close: parseFloat(cell(columns.close)),
      volume: parseFloat(cell(columns.volume)),
      tradeCount: parseInt(cell(columns.tradeCount), 10),
    });

    if (!parsed.success) {
      if (!opts.skipInvalid) {
        throw new Error(`Invalid candle on line ${i + 1}: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
      }
      skipped++;
      continue;
    }
    candles.push(parsed.data);
  }

  if (skipped > 0) {
    options.logger?.warn('Skipped invalid CSV rows', { symbol: opts.symbol, timeframe: opts.timeframe, skipped });
  }

  return candles.sort((a, b) => a.openTime - b.openTime);
}

/**
 * Load candles from a CSV file
 */
export async function loadCandlesFromCSV(filePath: string, options: CSVLoadOptions): Promise<Candle[]> {
  const absolutePath = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);
  const content = await fs.promises.readFile(absolutePath, 'utf-8');
  return parseCandlesCSV(content, options);
}

/**
 * File name for one series: <SYMBOL>_<timeframe>.csv
 */
export function csvFileName(symbol: string, timeframe: Timeframe): string {
  return `${symbol}_${timeframe}.csv`;
}
