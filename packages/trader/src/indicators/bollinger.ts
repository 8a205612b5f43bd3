/**
 * Bollinger Bands
 *
 * Middle band is the rolling SMA, bands sit k population standard deviations away.
 */

import { BollingerBands } from 'technicalindicators';
import { isValidPeriod, type IndicatorSeries } from './ema.js';

export interface BollingerBandsResult {
  upper: IndicatorSeries;
  middle: IndicatorSeries;
  lower: IndicatorSeries;
  /** (upper - lower) / middle */
  width: IndicatorSeries;
}

export interface BollingerPoint {
  upper: number;
  middle: number;
  lower: number;
  width: number;
}

function bandWidth(upper: number, middle: number, lower: number): number {
  return middle !== 0 ? (upper - lower) / middle : 0;
}

export function calculateBollingerBands(
  prices: readonly number[],
  period: number = 20,
  k: number = 2
): BollingerBandsResult | null {
  if (!isValidPeriod(period) || k < 0 || prices.length < period) return null;

  const bands = BollingerBands.calculate({ period, stdDev: k, values: [...prices] });
  const size = prices.length;
  const result: BollingerBandsResult = {
    upper: new Array<number | undefined>(size).fill(undefined),
    middle: new Array<number | undefined>(size).fill(undefined),
    lower: new Array<number | undefined>(size).fill(undefined),
    width: new Array<number | undefined>(size).fill(undefined),
  };

  // output starts at the first full window
  const offset = size - bands.length;
  bands.forEach((band, j) => {
    const i = offset + j;
    result.upper[i] = band.upper;
    result.middle[i] = band.middle;
    result.lower[i] = band.lower;
    result.width[i] = bandWidth(band.upper, band.middle, band.lower);
  });

  return result;
}

/**
 * Bands for the trailing window only
 */
export function bollingerPoint(
  prices: readonly number[],
  period: number = 20,
  k: number = 2
): BollingerPoint | null {
  const bands = calculateBollingerBands(prices.slice(-period), period, k);
  if (!bands) return null;

  const last = period - 1;
  const upper = bands.upper[last];
  const middle = bands.middle[last];
  const lower = bands.lower[last];
  const width = bands.width[last];
  if (upper === undefined || middle === undefined || lower === undefined || width === undefined) return null;

  return { upper, middle, lower, width };
}
