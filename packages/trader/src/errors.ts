/**
 * Error taxonomy
 *
 * Insufficient data and failed trade conditions are not errors: indicators
 * return null and strategies return an invalid result. These classes cover
 * what has to unwind a call: bad configuration, failing data access and
 * cancellation.
 */

export type TradingErrorCode = 'CONFIGURATION_ERROR' | 'UPSTREAM_FAILURE' | 'BACKTEST_CANCELLED';

export class TradingError extends Error {
  constructor(
    public readonly code: TradingErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TradingError';
  }
}

export class ConfigurationError extends TradingError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super('CONFIGURATION_ERROR', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A data-access call (candles, positions) failed
 */
export class UpstreamFailureError extends TradingError {
  constructor(
    public readonly operation: string,
    public readonly symbol: string,
    cause: unknown
  ) {
    super('UPSTREAM_FAILURE', `${operation} failed for ${symbol}: ${errorMessage(cause)}`, { cause });
    this.name = 'UpstreamFailureError';
  }
}

export class BacktestCancelledError extends TradingError {
  constructor(reason?: unknown) {
    super('BACKTEST_CANCELLED', reason === undefined ? 'Backtest cancelled' : `Backtest cancelled: ${errorMessage(reason)}`);
    this.name = 'BacktestCancelledError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
