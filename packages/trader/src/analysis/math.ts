import type { Bias } from '@kline-bot/shared';

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return value > 0 ? 1 : 0;
  return Math.min(Math.max(value, 0), 1);
}

/**
 * Sign of a value with a dead zone around zero
 */
export function toBias(value: number, threshold = 0): Bias {
  if (value > threshold) return 1;
  if (value < -threshold) return -1;
  return 0;
}

export function relativeChanges(values: readonly number[]): number[] {
  const changes: number[] = [];
  for (let i = 1; i < values.length; i++) {
    const prev = values[i - 1];
    changes.push(prev !== 0 ? (values[i] - prev) / prev : 0);
  }
  return changes;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function populationStdDev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const avg = mean(values);
  return Math.sqrt(values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / values.length);
}
