/**
 * Backtest configuration
 *
 * Defaults: 10 starting balance, 50x leverage, 2% risk per trade,
 * 200 warm-up bars. Env variables override through loadBacktestConfigFromEnv().
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { StrategyConfigSchema, formatZodIssues } from './strategy-config.js';

export const SizingSchema = z.discriminatedUnion('mode', [
  /** initialBalance * riskPerTrade * leverage / entryPrice */
  z.object({ mode: z.literal('risk') }),
  z.object({ mode: z.literal('fixed'), fixedSize: z.number().positive().default(1) }),
]);

export const BacktestConfigSchema = z.object({
  initialBalance: z.number().positive().default(10),
  leverage: z.number().positive().default(50),
  riskPerTrade: z.number().positive().max(1).default(0.02),
  sizing: SizingSchema.default({ mode: 'risk' }),
  /** 5m bars required before the first decision; also the analysis window */
  warmupBars: z.number().int().positive().default(200),
  /** Symbols simulated at once */
  concurrency: z.number().int().positive().default(4),
  reversalDelta: z.number().nonnegative().default(0.1),
  strategy: StrategyConfigSchema.default({}),
});

export type BacktestConfig = z.infer<typeof BacktestConfigSchema>;
export type BacktestConfigInput = z.input<typeof BacktestConfigSchema>;
export type SizingConfig = z.infer<typeof SizingSchema>;

export function createBacktestConfig(input: BacktestConfigInput = {}): BacktestConfig {
  const parsed = BacktestConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid backtest config', formatZodIssues(parsed.error));
  }
  const { strategy, sizing } = parsed.data;
  return Object.freeze({
    ...parsed.data,
    sizing: Object.freeze(sizing),
    strategy: Object.freeze({ ...strategy, weights: Object.freeze(strategy.weights) }),
  });
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  // NaN is left for the schema to reject with the field name
  return Number(raw);
}

/**
 * Build the config from environment variables:
 * BACKTEST_INITIAL_BALANCE, BACKTEST_LEVERAGE, BACKTEST_RISK_PER_TRADE,
 * BACKTEST_SIZING (risk | fixed), BACKTEST_FIXED_SIZE, BACKTEST_WARMUP_BARS,
 * BACKTEST_CONCURRENCY, STRATEGY_MIN_CONFIDENCE, STRATEGY_REVERSAL_DELTA
 */
export function loadBacktestConfigFromEnv(env: Env = process.env): BacktestConfig {
  const sizingMode = env.BACKTEST_SIZING ?? (env.BACKTEST_FIXED_SIZE ? 'fixed' : 'risk');
  let sizing: BacktestConfigInput['sizing'];
  if (sizingMode === 'fixed') {
    sizing = { mode: 'fixed', fixedSize: readNumber(env, 'BACKTEST_FIXED_SIZE') };
  } else if (sizingMode === 'risk') {
    sizing = { mode: 'risk' };
  } else {
    throw new ConfigurationError('Invalid backtest config', [`BACKTEST_SIZING: expected "risk" or "fixed", got "${sizingMode}"`]);
  }

  return createBacktestConfig({
    initialBalance: readNumber(env, 'BACKTEST_INITIAL_BALANCE'),
    leverage: readNumber(env, 'BACKTEST_LEVERAGE'),
    riskPerTrade: readNumber(env, 'BACKTEST_RISK_PER_TRADE'),
    sizing,
    warmupBars: readNumber(env, 'BACKTEST_WARMUP_BARS'),
    concurrency: readNumber(env, 'BACKTEST_CONCURRENCY'),
    reversalDelta: readNumber(env, 'STRATEGY_REVERSAL_DELTA'),
    strategy: {
      minConfidence: readNumber(env, 'STRATEGY_MIN_CONFIDENCE'),
    },
  });
}
