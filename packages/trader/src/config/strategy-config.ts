/**
 * Strategy configuration
 *
 * Parsed once and frozen; evaluation never writes to it.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

export const StrategyWeightsSchema = z.object({
  volume: z.number().nonnegative().default(0.3),
  technical: z.number().nonnegative().default(0.35),
  price: z.number().nonnegative().default(0.35),
});

export const StrategyConfigSchema = z.object({
  /** Take-profit distance as a fraction of entry */
  targetProfit: z.number().positive().lt(1).default(0.01),
  /** Stop-loss distance as a fraction of entry */
  stopLoss: z.number().positive().lt(1).default(0.006),
  minConfidence: z.number().min(0).max(1).default(0.7),
  weights: StrategyWeightsSchema.default({}),
});

export type StrategyConfig = Readonly<z.infer<typeof StrategyConfigSchema>>;
export type StrategyConfigInput = z.input<typeof StrategyConfigSchema>;

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function createStrategyConfig(input: StrategyConfigInput = {}): StrategyConfig {
  const parsed = StrategyConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid strategy config', formatZodIssues(parsed.error));
  }
  return Object.freeze({ ...parsed.data, weights: Object.freeze(parsed.data.weights) });
}

export const DEFAULT_STRATEGY_CONFIG: StrategyConfig = createStrategyConfig();
