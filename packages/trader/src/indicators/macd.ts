/**
 * MACD (Moving Average Convergence Divergence)
 */

import { calculateEMA, isValidPeriod, nextEMA, type IndicatorSeries } from './ema.js';

export interface MACDResult {
  macd: IndicatorSeries;
  signal: IndicatorSeries;
  histogram: IndicatorSeries;
}

export interface MACDState {
  fastEma: number;
  slowEma: number;
  signalEma: number;
}

export interface MACDStep extends MACDState {
  macd: number;
  histogram: number;
}

function isValidMACDConfig(fast: number, slow: number, signal: number): boolean {
  return isValidPeriod(fast) && isValidPeriod(slow) && isValidPeriod(signal) && slow > fast;
}

/**
 * MACD line = EMA(fast) - EMA(slow), defined from index slow - 1.
 * Signal = EMA(signal) of the MACD line, histogram defined from slow + signal - 2.
 * Returns null for invalid periods or fewer than slow + signal - 1 prices.
 */
export function calculateMACD(
  prices: readonly number[],
  fastPeriod: number = 12,
  slowPeriod: number = 26,
  signalPeriod: number = 9
): MACDResult | null {
  if (!isValidMACDConfig(fastPeriod, slowPeriod, signalPeriod)) return null;
  if (prices.length < slowPeriod + signalPeriod - 1) return null;

  const fast = calculateEMA(prices, fastPeriod);
  const slow = calculateEMA(prices, slowPeriod);
  if (!fast || !slow) return null;

  const macd: IndicatorSeries = prices.map((_, i) => {
    const f = fast[i];
    const s = slow[i];
    return f !== undefined && s !== undefined ? f - s : undefined;
  });

  const macdValues = macd.slice(slowPeriod - 1).filter((v): v is number => v !== undefined);
  const signalValues = calculateEMA(macdValues, signalPeriod);
  if (!signalValues) return null;

  const signal: IndicatorSeries = new Array<number | undefined>(prices.length).fill(undefined);
  signalValues.forEach((value, j) => {
    signal[slowPeriod - 1 + j] = value;
  });

  const histogram: IndicatorSeries = macd.map((value, i) => {
    const line = signal[i];
    return value !== undefined && line !== undefined ? value - line : undefined;
  });

  return { macd, signal, histogram };
}

/**
 * One streaming MACD step from the previous EMA state
 */
export function nextMACD(
  price: number,
  prev: MACDState,
  fastPeriod: number = 12,
  slowPeriod: number = 26,
  signalPeriod: number = 9
): MACDStep | null {
  if (!isValidMACDConfig(fastPeriod, slowPeriod, signalPeriod)) return null;

  const fastEma = nextEMA(price, prev.fastEma, fastPeriod);
  const slowEma = nextEMA(price, prev.slowEma, slowPeriod);
  if (fastEma === null || slowEma === null) return null;

  const macd = fastEma - slowEma;
  const signalEma = nextEMA(macd, prev.signalEma, signalPeriod);
  if (signalEma === null) return null;

  return { fastEma, slowEma, signalEma, macd, histogram: macd - signalEma };
}
