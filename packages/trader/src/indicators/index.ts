/**
 * Technical Indicators
 *
 * Pure functions over price arrays. Results are index-aligned with the input
 * and `null` means the input was too short or a parameter was invalid.
 */

import type { Candle } from '@kline-bot/shared';
import type { IndicatorSeries } from './ema.js';

export * from './ema.js';
export * from './rsi.js';
export * from './macd.js';
export * from './bollinger.js';

export type CandleField = 'open' | 'high' | 'low' | 'close' | 'volume';

/**
 * Extract values from candles
 */
export function extractValues(candles: readonly Candle[], field: CandleField = 'close'): number[] {
  return candles.map((c) => c[field]);
}

export function closesOf(candles: readonly Candle[]): number[] {
  return extractValues(candles, 'close');
}

/**
 * Get latest indicator value
 */
export function getLatest<T>(values: ReadonlyArray<T | undefined>): T | null {
  return values.length > 0 ? (values[values.length - 1] ?? null) : null;
}

/**
 * Check if a series crosses above a line at `index`
 */
export function crossesAbove(values: IndicatorSeries, line: IndicatorSeries | number, index: number): boolean {
  if (index === 0 || index >= values.length) return false;

  const current = values[index];
  const previous = values[index - 1];
  if (current === undefined || previous === undefined) return false;

  const currentLine = typeof line === 'number' ? line : line[index];
  const previousLine = typeof line === 'number' ? line : line[index - 1];
  if (currentLine === undefined || previousLine === undefined) return false;

  return previous <= previousLine && current > currentLine;
}

/**
 * Check if a series crosses below a line at `index`
 */
export function crossesBelow(values: IndicatorSeries, line: IndicatorSeries | number, index: number): boolean {
  if (index === 0 || index >= values.length) return false;

  const current = values[index];
  const previous = values[index - 1];
  if (current === undefined || previous === undefined) return false;

  const currentLine = typeof line === 'number' ? line : line[index];
  const previousLine = typeof line === 'number' ? line : line[index - 1];
  if (currentLine === undefined || previousLine === undefined) return false;

  return previous >= previousLine && current < currentLine;
}
