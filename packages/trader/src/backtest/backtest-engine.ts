/**
 * Backtest Engine
 *
 * Runs one SymbolSimulator per symbol with bounded concurrency and hands
 * every outcome to a ResultAggregator. A failing symbol is reported as
 * failed and never aborts the others; cancellation keeps the trades that
 * closed before it.
 *
 * @example
 * ```typescript
 * const engine = new BacktestEngine({ config, repository });
 * const results = await engine.runBacktest(start, end, ['BTCUSDT', 'ETHUSDT']);
 * console.log(formatMetrics(results));
 * ```
 */

import { createSilentLogger, type Logger } from '@kline-bot/shared';
import type { BacktestConfig } from '../config/backtest-config.js';
import { BacktestCancelledError, ConfigurationError, errorMessage } from '../errors.js';
import { StrategyManager } from '../strategy/index.js';
import { runTaskGroup } from '../utils/task-group.js';
import type { CandleRepository } from './data/candle-repository.js';
import { ResultAggregator } from './result-aggregator.js';
import { SymbolSimulator } from './symbol-simulator.js';
import type { BacktestResults, RunBacktestOptions, SignalSource, SymbolOutcome } from './types.js';

export interface BacktestEngineOptions {
  config: BacktestConfig;
  repository: CandleRepository;
  /** Defaults to a StrategyManager built from the config */
  signalSource?: SignalSource;
  logger?: Logger;
}

export class BacktestEngine {
  private readonly config: BacktestConfig;
  private readonly repository: CandleRepository;
  private readonly signalSource: SignalSource;
  private readonly logger: Logger;

  constructor(options: BacktestEngineOptions) {
    this.config = options.config;
    this.repository = options.repository;
    this.signalSource =
      options.signalSource ??
      new StrategyManager({ strategy: options.config.strategy, reversalDelta: options.config.reversalDelta });
    this.logger = options.logger ?? createSilentLogger('backtest');
  }

  async runBacktest(
    start: number,
    end: number,
    symbols: readonly string[],
    options: RunBacktestOptions = {}
  ): Promise<BacktestResults> {
    if (!Number.isFinite(start) || !Number.isFinite(end) || end < start) {
      throw new ConfigurationError('Invalid backtest range', [`start ${start} must not be after end ${end}`]);
    }

    const unique = [...new Set(symbols)];
    const aggregator = new ResultAggregator(unique, this.config.initialBalance);
    this.logger.info('Backtest started', {
      symbols: unique,
      start: new Date(start).toISOString(),
      end: new Date(end).toISOString(),
      concurrency: this.config.concurrency,
    });

    const tasks = unique.map(
      (symbol) => (): Promise<SymbolOutcome> =>
        new SymbolSimulator(symbol, {
          config: this.config,
          repository: this.repository,
          signalSource: this.signalSource,
          logger: this.logger,
        }).run({ start, end, signal: options.signal })
    );

    const settled = await runTaskGroup(tasks, { concurrency: this.config.concurrency, signal: options.signal });

    settled.forEach((outcome, i) => {
      const symbol = unique[i];
      if (symbol === undefined) return;

      if (outcome.status === 'rejected') {
        if (outcome.reason instanceof BacktestCancelledError) {
          aggregator.addSkipped(symbol, 'cancelled', outcome.reason.message);
          return;
        }
        this.logger.error('Symbol failed', { symbol, error: errorMessage(outcome.reason) });
        aggregator.addSkipped(symbol, 'failed', errorMessage(outcome.reason));
        return;
      }

      const result = outcome.value;
      if (result.status === 'skipped') {
        aggregator.addSkipped(result.symbol, 'skipped', result.reason);
      } else {
        aggregator.addRun(result.status, result.run);
      }
    });

    const results = aggregator.finalize();
    this.logger.info('Backtest finished', {
      totalTrades: results.totalTrades,
      finalBalance: results.finalBalance,
      statuses: results.symbols.map((s) => `${s.symbol}:${s.status}`),
    });
    return results;
  }
}
