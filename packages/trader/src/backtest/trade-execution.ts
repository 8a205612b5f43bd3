/**
 * Trade Execution
 *
 * Pure functions for the position state machine:
 * 1. Sizing from the backtest config (no compounding)
 * 2. Exit detection within one candle, take-profit before stop-loss
 * 3. Leveraged PnL on close
 */

import type { Candle, Direction, ExitReason, Position, Trade } from '@kline-bot/shared';
import type { BacktestConfig } from '../config/backtest-config.js';
import type { ValidStrategyResult } from '../strategy/index.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ExitSignal {
  reason: Extract<ExitReason, 'take_profit' | 'stop_loss'>;
  /** Fill price: the level that was touched */
  price: number;
}

export interface OpenPositionParams {
  id: string;
  symbol: string;
  result: ValidStrategyResult;
  size: number;
  leverage: number;
  openTime: number;
}

// =============================================================================
// SIZING
// =============================================================================

/**
 * Position size in base units.
 * Risk mode sizes off the initial balance so results do not compound.
 */
export function positionSize(config: Pick<BacktestConfig, 'sizing' | 'initialBalance' | 'riskPerTrade' | 'leverage'>, entryPrice: number): number {
  if (config.sizing.mode === 'fixed') {
    return config.sizing.fixedSize;
  }
  if (entryPrice <= 0) return 0;
  return (config.initialBalance * config.riskPerTrade * config.leverage) / entryPrice;
}

// =============================================================================
// TRADE EXECUTION (Pure functions - no side effects)
// =============================================================================

/**
 * Exit check against one candle's range.
 * When both levels sit inside the candle, take-profit wins.
 */
export function checkExit(position: Position, candle: Candle): ExitSignal | null {
  if (position.side === 'long') {
    if (candle.high >= position.takeProfitPrice) {
      return { reason: 'take_profit', price: position.takeProfitPrice };
    }
    if (candle.low <= position.stopLossPrice) {
      return { reason: 'stop_loss', price: position.stopLossPrice };
    }
    return null;
  }

  if (candle.low <= position.takeProfitPrice) {
    return { reason: 'take_profit', price: position.takeProfitPrice };
  }
  if (candle.high >= position.stopLossPrice) {
    return { reason: 'stop_loss', price: position.stopLossPrice };
  }
  return null;
}

/**
 * Return of the move from entry to exit, positive when it favours the side
 */
export function signedReturn(side: Direction, entryPrice: number, exitPrice: number): number {
  if (entryPrice === 0) return 0;
  const change = (exitPrice - entryPrice) / entryPrice;
  return side === 'long' ? change : -change;
}

/**
 * pnl = size * leverage * signedReturn
 */
export function calculatePnl(position: Pick<Position, 'side' | 'size' | 'leverage' | 'entryPrice'>, exitPrice: number): number {
  return position.size * position.leverage * signedReturn(position.side, position.entryPrice, exitPrice);
}

export function openPosition(params: OpenPositionParams): Position {
  const { result } = params;
  return {
    id: params.id,
    symbol: params.symbol,
    side: result.direction,
    size: params.size,
    leverage: params.leverage,
    entryPrice: result.entryPrice,
    stopLossPrice: result.stopLoss,
    takeProfitPrice: result.takeProfit,
    confidence: result.confidence,
    openTime: params.openTime,
    status: 'open',
    pnl: 0,
  };
}

export function closePosition(position: Position, exitPrice: number, closeTime: number, exitReason: ExitReason): Trade {
  return {
    ...position,
    status: 'closed',
    closeTime,
    exitPrice,
    exitReason,
    pnl: calculatePnl(position, exitPrice),
  };
}
