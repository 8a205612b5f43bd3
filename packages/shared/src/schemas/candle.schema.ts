import { z } from 'zod';

export const TimeframeSchema = z.enum(['5m', '15m', '1h', '4h']);

/**
 * Zod schema for Candle validation
 */
export const CandleSchema = z
  .object({
    symbol: z.string().min(1),
    timeframe: TimeframeSchema,
    openTime: z.number().int().nonnegative(),
    closeTime: z.number().int().positive(),
    open: z.number().positive(),
    high: z.number().positive(),
    low: z.number().positive(),
    close: z.number().positive(),
    volume: z.number().nonnegative(),
    tradeCount: z.number().int().nonnegative(),
  })
  .superRefine((candle, ctx) => {
    if (candle.closeTime <= candle.openTime) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['closeTime'],
        message: 'closeTime must be after openTime',
      });
    }
    if (candle.high < Math.max(candle.open, candle.close)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['high'],
        message: 'high must be >= open and close',
      });
    }
    if (candle.low > Math.min(candle.open, candle.close)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['low'],
        message: 'low must be <= open and close',
      });
    }
  });

/**
 * One (symbol, timeframe) series: strictly increasing openTime
 */
export const CandleSeriesSchema = z.array(CandleSchema).superRefine((candles, ctx) => {
  const first = candles[0];
  if (!first) return;

  for (let i = 1; i < candles.length; i++) {
    const prev = candles[i - 1];
    const curr = candles[i];
    if (!prev || !curr) continue;

    if (curr.symbol !== first.symbol || curr.timeframe !== first.timeframe) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [i],
        message: `mixed series: expected ${first.symbol}/${first.timeframe}, got ${curr.symbol}/${curr.timeframe}`,
      });
    }
    if (curr.openTime <= prev.openTime) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [i, 'openTime'],
        message: 'openTime must be strictly increasing',
      });
    }
  }
});

