/**
 * Tests for Symbol Simulator
 */

import { describe, it, expect } from 'vitest';
import { createSilentLogger, type Candle } from '@kline-bot/shared';
import { createBacktestConfig } from '../config/backtest-config.js';
import { invalid } from '../strategy/index.js';
import { seriesFromCloses } from '../testing/candle-factory.js';
import { ScriptedSignalSource, enterOnce, validResult } from '../testing/scripted-signal.js';
import { InMemoryCandleRepository } from './data/in-memory-repository.js';
import { INSUFFICIENT_WARMUP, SymbolSimulator } from './symbol-simulator.js';
import type { SignalSource, SymbolOutcome, SymbolRun } from './types.js';

// =============================================================================
// HELPERS
// =============================================================================

const FIVE_MIN = 300_000;
const END = 100 * FIVE_MIN;

function simulate(candles: Candle[], signalSource: SignalSource, warmupBars = 2, signal?: AbortSignal): Promise<SymbolOutcome> {
  const simulator = new SymbolSimulator('TESTUSDT', {
    config: createBacktestConfig({ warmupBars }),
    repository: new InMemoryCandleRepository(candles),
    signalSource,
    logger: createSilentLogger(),
  });
  return simulator.run({ start: 0, end: END, signal });
}

function runOf(outcome: SymbolOutcome): SymbolRun {
  if (outcome.status === 'skipped') throw new Error(`unexpected skip: ${outcome.reason}`);
  return outcome.run;
}

const long100 = () => validResult('long', 100, { stopLoss: 99.4, takeProfit: 101, confidence: 0.6 });

// =============================================================================
// TESTS
// =============================================================================

describe('SymbolSimulator', () => {
  it('skips a symbol without enough warm-up candles', async () => {
    const outcome = await simulate(seriesFromCloses([100, 100, 100]), enterOnce(long100), 3);
    expect(outcome).toEqual({ status: 'skipped', symbol: 'TESTUSDT', reason: INSUFFICIENT_WARMUP });
  });

  it('closes a long at the take-profit price', async () => {
    const candles = seriesFromCloses([100, 100, 100, 101.5, 101.5]);
    const outcome = await simulate(candles, enterOnce(long100));
    const run = runOf(outcome);

    expect(outcome.status).toBe('completed');
    expect(run.candlesProcessed).toBe(3);
    expect(run.trades).toHaveLength(1);
    expect(run.trades[0]).toMatchObject({
      side: 'long',
      entryPrice: 100,
      exitPrice: 101,
      exitReason: 'take_profit',
      openTime: 3 * FIVE_MIN - 1,
      closeTime: 4 * FIVE_MIN - 1,
    });
    expect(run.trades[0]?.pnl).toBeCloseTo(0.05, 12);
    expect(run.openPosition).toBeNull();
  });

  it('closes a long at the stop price', async () => {
    const candles = seriesFromCloses([100, 100, 100, 99, 99]);
    const run = runOf(await simulate(candles, enterOnce(long100)));

    expect(run.trades[0]?.exitReason).toBe('stop_loss');
    expect(run.trades[0]?.exitPrice).toBe(99.4);
    expect(run.trades[0]?.pnl).toBeCloseTo(-0.03, 12);
  });

  it('does not enter again on the bar that exited', async () => {
    const always = new ScriptedSignalSource(({ position, candle }) =>
      position ? invalid('no reversal setup found') : validResult('long', candle.close, { stopLoss: 99.4, takeProfit: 101 })
    );
    const candles = seriesFromCloses([100, 100, 100, 101.5, 101.5]);
    const run = runOf(await simulate(candles, always));

    // bar 2 enters, bar 3 exits without asking, bar 4 enters again
    expect(always.calls.map((c) => c.candle.openTime)).toEqual([2 * FIVE_MIN, 4 * FIVE_MIN]);
    expect(run.trades).toHaveLength(1);
    expect(run.openPosition?.openTime).toBe(5 * FIVE_MIN - 1);
    expect(run.openPosition?.entryPrice).toBe(101.5);
  });

  it('never checks exits on the entry bar', async () => {
    // entry bar itself spans the take-profit
    const candles = seriesFromCloses([100, 100, 100, 100.5], { spread: 0.02 });
    const run = runOf(await simulate(candles, enterOnce(long100)));

    expect(run.trades).toHaveLength(1);
    expect(run.trades[0]?.openTime).toBe(3 * FIVE_MIN - 1);
    expect(run.trades[0]?.closeTime).toBe(4 * FIVE_MIN - 1);
  });

  it('reverses when the manager returns the opposite side', async () => {
    const source = new ScriptedSignalSource(({ position, candle }) => {
      if (!position) return long100();
      return validResult('short', candle.close, { confidence: 0.9 });
    });
    const candles = seriesFromCloses([100, 100, 100, 100.2]);
    const run = runOf(await simulate(candles, source));

    expect(source.calls[1]?.position).toMatchObject({ side: 'long', confidence: 0.6 });
    expect(run.trades).toHaveLength(1);
    expect(run.trades[0]).toMatchObject({ exitReason: 'reversal', exitPrice: 100.2 });
    expect(run.trades[0]?.pnl).toBeCloseTo(0.01, 9);
    expect(run.openPosition).toMatchObject({ side: 'short', entryPrice: 100.2, confidence: 0.9, openTime: 4 * FIVE_MIN - 1 });
  });

  it('keeps a position open at the end out of the trades', async () => {
    const candles = seriesFromCloses([100, 100, 100, 100.1]);
    const run = runOf(await simulate(candles, enterOnce(long100)));

    expect(run.trades).toEqual([]);
    expect(run.openPosition?.status).toBe('open');
  });

  it('only shows higher timeframe candles closed by the current bar', async () => {
    const base = seriesFromCloses([100, 100, 100, 100, 100, 100, 100, 100, 100]);
    const m15 = seriesFromCloses([100, 100, 100], { timeframe: '15m' });
    const source = new ScriptedSignalSource(() => invalid('no valid setup found'));
    await simulate([...base, ...m15], source);

    expect(source.calls.map((c) => c.frames['15m'].length)).toEqual([1, 1, 1, 2, 2, 2, 2]);
    expect(source.calls.map((c) => c.frames['5m'].length)).toEqual([3, 3, 3, 3, 3, 3, 3]);
    for (const call of source.calls) {
      for (const candle of call.frames['15m']) {
        expect(candle.closeTime).toBeLessThanOrEqual(call.candle.closeTime);
      }
    }
    expect(source.calls[6]?.frames['15m'].map((c) => c.openTime)).toEqual([900_000, 1_800_000]);
  });

  it('stops at the next bar after cancellation and keeps closed trades', async () => {
    const controller = new AbortController();
    const source = new ScriptedSignalSource(({ position }) => {
      if (source.calls.length === 1 && !position) return long100();
      controller.abort();
      return invalid('no valid setup found');
    });
    const candles = seriesFromCloses([100, 100, 100, 101.5, 101.5, 101.5, 101.5]);
    const outcome = await simulate(candles, source, 2, controller.signal);
    const run = runOf(outcome);

    expect(outcome.status).toBe('cancelled');
    expect(run.trades).toHaveLength(1);
    expect(run.candlesProcessed).toBe(3);
  });

  it('wraps repository failures', async () => {
    const simulator = new SymbolSimulator('TESTUSDT', {
      config: createBacktestConfig({ warmupBars: 2 }),
      repository: {
        getCandles: async (_symbol, timeframe) => {
          if (timeframe === '1h') throw new Error('boom');
          return [];
        },
      },
      signalSource: enterOnce(long100),
      logger: createSilentLogger(),
    });

    await expect(simulator.run({ start: 0, end: END })).rejects.toThrow('getCandles(1h) failed for TESTUSDT: boom');
  });
});
