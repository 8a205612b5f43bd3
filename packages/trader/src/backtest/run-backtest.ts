/**
 * Backtest Runner
 *
 * Replays the long/short strategy pair over CSV klines.
 *
 * Usage:
 *   SYMBOLS="BTCUSDT,ETHUSDT" BACKTEST_START=2024-01-01 BACKTEST_END=2024-03-01 npm run backtest
 *
 * Data: BACKTEST_DATA_DIR (default ./backtest-data) holding <SYMBOL>_<timeframe>.csv.
 * Missing 15m/1h/4h files are built from the 5m file.
 * Ctrl+C stops the run and prints what has closed so far.
 */

import { createLogger, isLogLevel, loadEnvFromRoot } from '@kline-bot/shared';
import { loadBacktestConfigFromEnv } from '../config/backtest-config.js';
import { ConfigurationError, errorMessage } from '../errors.js';
import { BacktestEngine } from './backtest-engine.js';
import { CsvCandleRepository } from './data/csv-repository.js';
import { formatMetrics } from './metrics.js';
import type { BacktestResults } from './types.js';

loadEnvFromRoot();

const DAY_MS = 24 * 60 * 60 * 1000;

function parseDate(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = /^\d+$/.test(raw) ? Number(raw) : Date.parse(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError('Invalid backtest range', [`${name}: cannot parse "${raw}"`]);
  }
  return value;
}

function printResults(results: BacktestResults): void {
  console.log(`\n${'='.repeat(60)}`);
  console.log('BACKTEST RESULTS');
  console.log('='.repeat(60));
  console.log(formatMetrics(results));

  console.log('\nSymbols:');
  for (const report of results.symbols) {
    const detail = report.reason ? ` (${report.reason})` : '';
    const open = report.openPosition ? `, open ${report.openPosition.side} @ ${report.openPosition.entryPrice}` : '';
    console.log(`  ${report.symbol.padEnd(10)} ${report.status.padEnd(9)} trades=${report.trades} bars=${report.candlesProcessed}${open}${detail}`);
  }
}

async function main(): Promise<void> {
  const level = process.env.LOG_LEVEL;
  const logger = createLogger({
    service: 'backtest',
    level: isLogLevel(level) ? level : 'info',
    console: true,
    file: process.env.LOG_TO_FILE === 'true',
  });

  const config = loadBacktestConfigFromEnv();
  const symbols = (process.env.SYMBOLS ?? 'BTCUSDT')
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  const end = parseDate('BACKTEST_END', Date.now());
  const start = parseDate('BACKTEST_START', end - 30 * DAY_MS);

  const repository = new CsvCandleRepository({
    dataDir: process.env.BACKTEST_DATA_DIR ?? './backtest-data',
    logger,
  });
  const engine = new BacktestEngine({ config, repository, logger });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted, finishing current bars');
    controller.abort();
  });

  const results = await engine.runBacktest(start, end, symbols, { signal: controller.signal });
  printResults(results);
  await logger.close();
}

main().catch((error: unknown) => {
  console.error('Fatal error:', errorMessage(error));
  process.exit(1);
});
