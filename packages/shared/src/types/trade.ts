/**
 * Trade and position types
 */

/** Side of a position */
export type Direction = 'long' | 'short';

/** Directional signal: 1 (bullish), -1 (bearish), 0 (neutral) */
export type Bias = -1 | 0 | 1;

export type ExitReason = 'take_profit' | 'stop_loss' | 'reversal' | 'unknown';

export type PositionStatus = 'open' | 'closed';

/**
 * A leveraged position. Once closed it is a trade record.
 */
export interface Position {
  id: string;
  symbol: string;
  side: Direction;
  /** Position size in base units */
  size: number;
  leverage: number;
  entryPrice: number;
  stopLossPrice: number;
  takeProfitPrice: number;
  /** Confidence of the signal that opened the position */
  confidence: number;
  openTime: number;
  closeTime?: number;
  exitPrice?: number;
  status: PositionStatus;
  pnl: number;
  exitReason?: ExitReason;
}

/**
 * A closed position: exit fields are always present
 */
export interface Trade extends Position {
  status: 'closed';
  closeTime: number;
  exitPrice: number;
  exitReason: ExitReason;
}

/**
 * Balance snapshot after a trade close
 */
export interface EquityPoint {
  timestamp: number;
  balance: number;
}

export function oppositeSide(side: Direction): Direction {
  return side === 'long' ? 'short' : 'long';
}
