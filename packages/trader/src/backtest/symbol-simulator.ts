/**
 * Symbol Simulator
 *
 * Replays one symbol bar by bar on the 5m series. Higher timeframes are read
 * through cursors that only admit candles already closed at the current 5m
 * close, so no decision sees the future.
 */

import { TIMEFRAME_MS, TIMEFRAMES, type Candle, type Logger, type Position, type Timeframe, type TimeframeCandles, type Trade } from '@kline-bot/shared';
import type { BacktestConfig } from '../config/backtest-config.js';
import { UpstreamFailureError } from '../errors.js';
import type { ValidStrategyResult } from '../strategy/index.js';
import { normalizeSeries, type CandleRepository } from './data/candle-repository.js';
import { checkExit, closePosition, openPosition, positionSize } from './trade-execution.js';
import type { SignalSource, SymbolOutcome, SymbolRun } from './types.js';

export const INSUFFICIENT_WARMUP = 'insufficient warm-up data';

export interface SymbolSimulatorDeps {
  config: BacktestConfig;
  repository: CandleRepository;
  signalSource: SignalSource;
  logger: Logger;
}

export interface SimulationWindow {
  start: number;
  end: number;
  signal?: AbortSignal;
}

type HigherTimeframe = Exclude<Timeframe, '5m'>;

/**
 * Trailing window over a higher timeframe, advanced by close time
 */
class FrameCursor {
  /** Count of candles closed so far */
  private closed = 0;

  constructor(
    private readonly candles: readonly Candle[],
    private readonly size: number
  ) {}

  advance(closeTime: number): readonly Candle[] {
    while (this.closed < this.candles.length) {
      const candle = this.candles[this.closed];
      if (!candle || candle.closeTime > closeTime) break;
      this.closed++;
    }
    return this.candles.slice(Math.max(0, this.closed - this.size), this.closed);
  }
}

export class SymbolSimulator {
  private readonly config: BacktestConfig;
  private readonly repository: CandleRepository;
  private readonly signalSource: SignalSource;
  private readonly logger: Logger;
  private positionCount = 0;

  constructor(
    private readonly symbol: string,
    deps: SymbolSimulatorDeps
  ) {
    this.config = deps.config;
    this.repository = deps.repository;
    this.signalSource = deps.signalSource;
    this.logger = deps.logger.child({ symbol });
  }

  async run(window: SimulationWindow): Promise<SymbolOutcome> {
    const run: SymbolRun = { symbol: this.symbol, trades: [], openPosition: null, candlesProcessed: 0 };
    if (window.signal?.aborted) {
      return { status: 'cancelled', run };
    }

    const series = await this.loadSeries(window.start, window.end);
    const base = series['5m'];
    const { warmupBars } = this.config;

    if (base.length < warmupBars + 1) {
      this.logger.warn('Skipping symbol', { reason: INSUFFICIENT_WARMUP, candles: base.length, required: warmupBars + 1 });
      return { status: 'skipped', symbol: this.symbol, reason: INSUFFICIENT_WARMUP };
    }

    const cursors: Record<HigherTimeframe, FrameCursor> = {
      '15m': new FrameCursor(series['15m'], warmupBars),
      '1h': new FrameCursor(series['1h'], warmupBars),
      '4h': new FrameCursor(series['4h'], warmupBars),
    };

    let position: Position | null = null;

    for (let i = warmupBars; i < base.length; i++) {
      if (window.signal?.aborted) {
        this.logger.info('Cancelled', { candlesProcessed: run.candlesProcessed });
        return { status: 'cancelled', run: { ...run, openPosition: position } };
      }

      const candle = base[i];
      if (!candle || candle.openTime < window.start || candle.openTime > window.end) continue;
      run.candlesProcessed++;

      const frames: TimeframeCandles = {
        '5m': base.slice(i - warmupBars, i + 1),
        '15m': cursors['15m'].advance(candle.closeTime),
        '1h': cursors['1h'].advance(candle.closeTime),
        '4h': cursors['4h'].advance(candle.closeTime),
      };

      if (position) {
        const exit = checkExit(position, candle);
        if (exit) {
          this.record(run.trades, closePosition(position, exit.price, candle.closeTime, exit.reason));
          position = null;
          continue;
        }

        const reversal = this.signalSource.analyze(position, frames);
        if (!reversal.isValid) continue;

        this.record(run.trades, closePosition(position, candle.close, candle.closeTime, 'reversal'));
        position = this.open(reversal, candle);
        continue;
      }

      const result = this.signalSource.analyze(null, frames);
      if (result.isValid) {
        position = this.open(result, candle);
      }
    }

    run.openPosition = position;
    this.logger.info('Symbol completed', {
      trades: run.trades.length,
      candlesProcessed: run.candlesProcessed,
      open: position !== null,
    });
    return { status: 'completed', run };
  }

  private async loadSeries(start: number, end: number): Promise<TimeframeCandles> {
    const { warmupBars } = this.config;
    const loaded = await Promise.all(
      TIMEFRAMES.map(async (timeframe) => {
        const from = start - warmupBars * TIMEFRAME_MS[timeframe];
        try {
          return normalizeSeries(await this.repository.getCandles(this.symbol, timeframe, from, end));
        } catch (error) {
          throw new UpstreamFailureError(`getCandles(${timeframe})`, this.symbol, error);
        }
      })
    );

    const [m5 = [], m15 = [], h1 = [], h4 = []] = loaded;
    this.logger.debug('Series loaded', { '5m': m5.length, '15m': m15.length, '1h': h1.length, '4h': h4.length });
    return { '5m': m5, '15m': m15, '1h': h1, '4h': h4 };
  }

  private open(result: ValidStrategyResult, candle: Candle): Position {
    this.positionCount++;
    const position = openPosition({
      id: `${this.symbol}-${this.positionCount}`,
      symbol: this.symbol,
      result,
      size: positionSize(this.config, candle.close),
      leverage: this.config.leverage,
      openTime: candle.closeTime,
    });
    this.logger.debug('Position opened', {
      side: position.side,
      entryPrice: position.entryPrice,
      confidence: position.confidence,
    });
    return position;
  }

  private record(trades: Trade[], trade: Trade): void {
    trades.push(trade);
    this.logger.debug('Position closed', { side: trade.side, exitReason: trade.exitReason, pnl: trade.pnl });
  }
}
