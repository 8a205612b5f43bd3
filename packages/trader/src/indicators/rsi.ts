/**
 * Relative Strength Index
 *
 * Gains and losses are smoothed with the EMA recurrence from ema.ts, so the
 * first RSI value sits at index `period`. The signal line is an EMA of the
 * RSI itself.
 */

import { calculateEMA, isValidPeriod, nextEMA, type IndicatorSeries } from './ema.js';

/** Lookback for price/RSI divergence */
export const RSI_DIVERGENCE_LOOKBACK = 5;

export interface RSIResult {
  rsi: IndicatorSeries;
  signal: IndicatorSeries;
  histogram: IndicatorSeries;
  /** 1 bullish divergence, -1 bearish, 0 none */
  divergence: IndicatorSeries;
}

export interface RSIStep {
  rsi: number;
  gainEma: number;
  lossEma: number;
}

export function rsiFromAverages(avgGain: number, avgLoss: number): number {
  if (avgLoss === 0) return 100;
  return 100 - 100 / (1 + avgGain / avgLoss);
}

/**
 * RSI over a full price series.
 * Returns null when a period is invalid or there are fewer than period + 1 prices.
 */
export function calculateRSI(
  prices: readonly number[],
  period: number = 14,
  smoothPeriod: number = 3
): RSIResult | null {
  if (!isValidPeriod(period) || !isValidPeriod(smoothPeriod)) return null;
  if (prices.length < period + 1) return null;

  const gains: number[] = [0];
  const losses: number[] = [0];
  for (let i = 1; i < prices.length; i++) {
    const change = prices[i] - prices[i - 1];
    gains.push(change > 0 ? change : 0);
    losses.push(change < 0 ? -change : 0);
  }

  const avgGains = calculateEMA(gains, period);
  const avgLosses = calculateEMA(losses, period);
  if (!avgGains || !avgLosses) return null;

  const rsi: IndicatorSeries = new Array<number | undefined>(prices.length).fill(undefined);
  for (let i = period; i < prices.length; i++) {
    const avgGain = avgGains[i];
    const avgLoss = avgLosses[i];
    if (avgGain === undefined || avgLoss === undefined) continue;
    rsi[i] = rsiFromAverages(avgGain, avgLoss);
  }

  const signal: IndicatorSeries = new Array<number | undefined>(prices.length).fill(undefined);
  const defined = rsi.slice(period).filter((v): v is number => v !== undefined);
  const smoothed = calculateEMA(defined, smoothPeriod);
  if (smoothed) {
    smoothed.forEach((value, j) => {
      signal[period + j] = value;
    });
  }

  const histogram: IndicatorSeries = rsi.map((value, i) => {
    const line = signal[i];
    return value !== undefined && line !== undefined ? value - line : undefined;
  });

  const divergence: IndicatorSeries = rsi.map((value, i) => {
    if (i < RSI_DIVERGENCE_LOOKBACK || value === undefined) return undefined;
    const past = rsi[i - RSI_DIVERGENCE_LOOKBACK];
    if (past === undefined) return undefined;

    const priceDelta = prices[i] - prices[i - RSI_DIVERGENCE_LOOKBACK];
    const rsiDelta = value - past;
    if (priceDelta < 0 && rsiDelta > 0) return 1;
    if (priceDelta > 0 && rsiDelta < 0) return -1;
    return 0;
  });

  return { rsi, signal, histogram, divergence };
}

/**
 * One streaming RSI step from the previous gain/loss averages
 */
export function nextRSI(
  price: number,
  prevPrice: number,
  prevGainEma: number,
  prevLossEma: number,
  period: number
): RSIStep | null {
  const change = price - prevPrice;
  const gainEma = nextEMA(change > 0 ? change : 0, prevGainEma, period);
  const lossEma = nextEMA(change < 0 ? -change : 0, prevLossEma, period);
  if (gainEma === null || lossEma === null) return null;

  return { rsi: rsiFromAverages(gainEma, lossEma), gainEma, lossEma };
}
