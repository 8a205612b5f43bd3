/**
 * Types for the backtest engine
 */

import type { EquityPoint, Position, TimeframeCandles, Trade } from '@kline-bot/shared';
import type { PositionSnapshot, StrategyResult } from '../strategy/index.js';
import type { BacktestMetrics } from './metrics.js';

/**
 * Decision source driven by the simulator; StrategyManager in production
 */
export interface SignalSource {
  analyze(position: PositionSnapshot | null, frames: TimeframeCandles): StrategyResult;
}

export type SymbolStatus = 'completed' | 'skipped' | 'failed' | 'cancelled';

/**
 * What one symbol's replay produced
 */
export interface SymbolRun {
  symbol: string;
  trades: Trade[];
  /** Still open after the last candle; not part of the statistics */
  openPosition: Position | null;
  candlesProcessed: number;
}

export type SymbolOutcome =
  | { status: 'completed'; run: SymbolRun }
  | { status: 'cancelled'; run: SymbolRun }
  | { status: 'skipped'; symbol: string; reason: string };

export interface SymbolReport {
  symbol: string;
  status: SymbolStatus;
  reason?: string;
  trades: number;
  candlesProcessed: number;
  openPosition: Position | null;
}

export interface BacktestResults extends BacktestMetrics {
  trades: Trade[];
  equityCurve: EquityPoint[];
  symbols: SymbolReport[];
}

export interface RunBacktestOptions {
  signal?: AbortSignal;
}
