/**
 * Signal Service
 *
 * Live counterpart of the backtest loop: loads the current multi-timeframe
 * windows and the open position for a symbol and asks the strategy manager
 * for a decision. No scheduling and no order routing happen here.
 */

import { TIMEFRAME_MS, TIMEFRAMES, createSilentLogger, type Candle, type Logger, type Position, type Timeframe, type TimeframeCandles } from '@kline-bot/shared';
import { normalizeSeries, type CandleRepository, type PositionReader } from '../backtest/data/candle-repository.js';
import type { SignalSource } from '../backtest/types.js';
import { UpstreamFailureError } from '../errors.js';
import { StrategyManager, type StrategyResult } from '../strategy/index.js';

export interface SignalServiceOptions {
  candles: CandleRepository;
  positions: PositionReader;
  /** Defaults to a StrategyManager with default config */
  signalSource?: SignalSource;
  /** Bars per window (default: 200) */
  windowBars?: number;
  logger?: Logger;
}

export interface SignalEvaluation {
  symbol: string;
  timestamp: number;
  position: Position | null;
  result: StrategyResult;
}

export class SignalService {
  private readonly candles: CandleRepository;
  private readonly positions: PositionReader;
  private readonly signalSource: SignalSource;
  private readonly windowBars: number;
  private readonly logger: Logger;

  constructor(options: SignalServiceOptions) {
    this.candles = options.candles;
    this.positions = options.positions;
    this.signalSource = options.signalSource ?? new StrategyManager();
    this.windowBars = options.windowBars ?? 200;
    this.logger = options.logger ?? createSilentLogger('signals');
  }

  /**
   * Decide for `symbol` using candles closed at or before `now`
   */
  async evaluate(symbol: string, now: number): Promise<SignalEvaluation> {
    const [frames, position] = await Promise.all([this.loadFrames(symbol, now), this.loadPosition(symbol)]);
    const result = this.signalSource.analyze(position, frames);

    if (result.isValid) {
      this.logger.info('Signal', {
        symbol,
        direction: result.direction,
        confidence: result.confidence,
        entryPrice: result.entryPrice,
        reversal: position !== null,
      });
    } else {
      this.logger.debug('No signal', { symbol, reason: result.reason });
    }

    return { symbol, timestamp: now, position, result };
  }

  private async loadPosition(symbol: string): Promise<Position | null> {
    try {
      return await this.positions.getOpenPosition(symbol);
    } catch (error) {
      throw new UpstreamFailureError('getOpenPosition', symbol, error);
    }
  }

  private async loadFrames(symbol: string, now: number): Promise<TimeframeCandles> {
    const windows = await Promise.all(TIMEFRAMES.map((timeframe) => this.loadWindow(symbol, timeframe, now)));
    const [m5 = [], m15 = [], h1 = [], h4 = []] = windows;
    return { '5m': m5, '15m': m15, '1h': h1, '4h': h4 };
  }

  private async loadWindow(symbol: string, timeframe: Timeframe, now: number): Promise<Candle[]> {
    // one extra bar on 5m, matching the backtest window
    const bars = timeframe === '5m' ? this.windowBars + 1 : this.windowBars;
    const from = now - (bars + 1) * TIMEFRAME_MS[timeframe];
    try {
      const candles = normalizeSeries(await this.candles.getCandles(symbol, timeframe, from, now));
      return candles.filter((c) => c.closeTime <= now).slice(-bars);
    } catch (error) {
      throw new UpstreamFailureError(`getCandles(${timeframe})`, symbol, error);
    }
  }
}
