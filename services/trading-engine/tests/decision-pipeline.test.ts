import { afterEach, describe, it, expect, vi } from 'vitest';
import type { HaltEvent, RiskVerdict } from '@perp-scalper/domain';
import { createTradingEngine, loadConfig, ConfigError, type TradingEngine } from '../src/engine';
import type { ExecutionResult } from '../src/services/execution-gateway';
import { ScriptedExchange, tradeIntent } from './helpers';

const testConfig = (overrides: Record<string, string> = {}) =>
  loadConfig({
    NODE_ENV: 'test',
    SYMBOLS: 'BTCUSDT',
    RISK_MAX_RISK_PER_TRADE: '50',
    RISK_DAILY_LOSS_LIMIT: '10',
    RISK_COOLDOWN_MS: '0',
    TREND_FEED_MODE: 'live',
    TREND_RECOMPUTE_INTERVAL_MS: '60000',
    EXECUTION_MIN_BACKOFF_MS: '1',
    EXECUTION_MAX_BACKOFF_MS: '2',
    EXECUTION_FILL_TIMEOUT_MS: '60000',
    PAPER_FEE_BPS: '0',
    BROADCAST_INTERVAL_MS: '60000',
    HOUSEKEEPING_INTERVAL_MS: '60000',
    ...overrides,
  });

const book = (bids: [number, number][], asks: [number, number][]) => ({
  symbol: 'BTCUSDT',
  timestamp: Date.now(),
  bids,
  asks,
});

// Bid volume 19 against ask volume 1: imbalance 0.9, long
const bidHeavyBook = () =>
  book(
    [
      [100, 10],
      [99.5, 9],
    ],
    [[101, 1]]
  );

const quietBook = () => book([[100, 1]], [[100.1, 1]]);

const outcomeOf = (verdict: RiskVerdict) => [
  verdict.intent.id,
  verdict.outcome,
  verdict.outcome === 'rejected' ? verdict.reason : null,
];

describe('DecisionPipeline', () => {
  let engine: TradingEngine | null = null;

  afterEach(async () => {
    await engine?.close();
    engine = null;
  });

  it('turns a dominant book into a filled paper position', async () => {
    engine = createTradingEngine(testConfig());
    const executions: ExecutionResult[] = [];
    engine.pipeline.on('execution', (result) => executions.push(result));
    engine.start();

    const signal = engine.onOrderBook(bidHeavyBook());
    expect(signal?.direction).toBe('long');
    await engine.pipeline.idle();

    const snapshot = engine.snapshot();
    expect(snapshot.recentDecisions[0]).toMatchObject({ outcome: 'approved', requestedSize: 63, adjustedSize: 50 });
    expect(snapshot.positions).toHaveLength(1);
    expect(snapshot.positions[0]).toMatchObject({ symbol: 'BTCUSDT', side: 'long', quantity: 0.495049, entryPrice: 101 });
    expect(snapshot.reservations).toEqual([]);
    expect(executions.map((result) => result.status)).toEqual(['filled']);
  });

  it('halts on a loss breach and liquidates open positions', async () => {
    engine = createTradingEngine(testConfig());
    const halts: HaltEvent[] = [];
    engine.broadcaster.on('engine.halted', (event) => halts.push(event));
    engine.start();
    engine.onOrderBook(bidHeavyBook());
    await engine.pipeline.idle();

    // Mid 70.25 against an entry at 101 on 0.495049 units
    engine.onOrderBook(book([[70, 5]], [[70.5, 5]]));

    const current = engine;
    await vi.waitFor(() => expect(current.snapshot().positions).toEqual([]));
    const snapshot = engine.snapshot();
    expect(snapshot.running).toBe(false);
    expect(snapshot.haltReason).toBe('Daily loss 15.22 reached limit 10');
    expect(snapshot.pnl.realized).toBe(-15.346519);
    expect(halts).toHaveLength(1);
    expect(halts[0].data.reason).toBe('Daily loss 15.22 reached limit 10');
  });

  it('rejects the intent that meets the loss breach and every one after it', async () => {
    engine = createTradingEngine(testConfig());
    const verdicts: RiskVerdict[] = [];
    const halts: HaltEvent[] = [];
    engine.pipeline.on('verdict', (verdict) => verdicts.push(verdict));
    engine.broadcaster.on('engine.halted', (event) => halts.push(event));
    engine.start();
    engine.onOrderBook(bidHeavyBook());
    await engine.pipeline.idle();

    // Ask-heavy book: a short intent while the long marks at 70.25
    const askHeavyBook = () => book([[70, 1]], [[70.5, 19]]);
    expect(engine.onOrderBook(askHeavyBook())?.direction).toBe('short');
    await engine.pipeline.idle();

    expect(verdicts.map((verdict) => verdict.outcome)).toEqual(['approved', 'rejected']);
    expect(engine.snapshot().lastRejection).toMatchObject({
      direction: 'short',
      reason: 'daily-loss',
      message: 'Daily loss 15.22 reached limit 10',
    });
    expect(engine.snapshot().running).toBe(false);
    expect(engine.snapshot().haltReason).toBe('Daily loss 15.22 reached limit 10');

    engine.onOrderBook(askHeavyBook());
    await engine.pipeline.idle();

    expect(verdicts.map(outcomeOf).slice(1)).toEqual([
      [verdicts[1].intent.id, 'rejected', 'daily-loss'],
      [verdicts[2].intent.id, 'rejected', 'stopped'],
    ]);
    expect(engine.snapshot().lastRejection?.message).toBe('Trading is halted: Daily loss 15.22 reached limit 10');
    expect(halts).toHaveLength(1);
  });

  it('keeps one intent waiting per symbol and rejects it after a stop', async () => {
    const exchange = new ScriptedExchange();
    engine = createTradingEngine(testConfig(), { exchange });
    const verdicts: RiskVerdict[] = [];
    const executions: ExecutionResult[] = [];
    engine.pipeline.on('verdict', (verdict) => verdicts.push(verdict));
    engine.pipeline.on('execution', (result) => executions.push(result));
    engine.start();
    expect(engine.onOrderBook(quietBook())?.direction).toBe('flat');

    engine.router.emit('intent', tradeIntent({ id: 'a', size: 10, referencePrice: 100.1 }));
    await vi.waitFor(() => expect(verdicts).toHaveLength(1));
    engine.router.emit('intent', tradeIntent({ id: 'b', size: 10, referencePrice: 100.1 }));
    engine.router.emit('intent', tradeIntent({ id: 'c', size: 10, referencePrice: 100.1 }));
    expect(engine.pipeline.replaced).toBe(1);

    await engine.stop();
    await engine.pipeline.idle();

    expect(verdicts.map(outcomeOf)).toEqual([
      ['a', 'approved', null],
      ['c', 'rejected', 'stopped'],
    ]);
    expect(executions).toHaveLength(1);
    expect(executions[0]).toMatchObject({
      clientOrderId: 'entry-a',
      status: 'cancelled',
      filledQuantity: 0,
      averagePrice: null,
      error: 'Cancelled by stop request',
    });
    await vi.waitFor(() => expect(exchange.cancelled).toEqual(['entry-a']));
    expect(engine.snapshot().reservations).toEqual([]);

    engine.router.emit('intent', tradeIntent({ id: 'd', size: 10, referencePrice: 100.1 }));
    await engine.pipeline.idle();
    expect(verdicts.map(outcomeOf)[2]).toEqual(['d', 'rejected', 'stopped']);
    expect(engine.snapshot().lastRejection).toMatchObject({ intentId: 'd', reason: 'stopped' });
    expect(exchange.submitted).toHaveLength(1);
  });

  it('drops malformed books and records the error', () => {
    engine = createTradingEngine(testConfig());

    expect(engine.onOrderBook({ symbol: 'BTCUSDT', timestamp: 1, bids: [], asks: [[101, 1]] })).toBeNull();
    expect(engine.snapshot().recentErrors[0]).toMatchObject({ source: 'market-data', code: 'INVALID_SNAPSHOT' });
  });

  it('routes a lower-case book to the configured symbol', () => {
    engine = createTradingEngine(testConfig());

    engine.onOrderBook({ ...quietBook(), symbol: 'btcusdt' });
    expect(engine.router.latest('BTCUSDT').market?.direction).toBe('flat');
  });

  it('rejects an invalid risk update and keeps the old limits', () => {
    engine = createTradingEngine(testConfig());
    const before = engine.snapshot().riskConfig;

    expect(() => engine?.updateRiskConfig({ ...before, dailyLossLimit: -5 })).toThrow(ConfigError);
    expect(engine.snapshot().riskConfig).toEqual(before);
  });

  it('routes posts through the live feed into trend scores', () => {
    engine = createTradingEngine(testConfig({ SYMBOLS: 'BTCUSDT,SOLUSDT' }));

    const signal = engine.ingestPost({ source: 'social', text: 'solana breakout, bullish', timestamp: Date.now() });
    expect(signal?.symbol).toBe('SOLUSDT');

    const [score] = engine.aggregator.recompute(['SOLUSDT']);
    expect(score).toMatchObject({ symbol: 'SOLUSDT', source: 'live', sampleCount: 1 });
    expect(score.score).toBeGreaterThan(0.7);
  });

  it('ignores external sentiment when the simulated feed is configured', () => {
    engine = createTradingEngine(testConfig({ TREND_FEED_MODE: 'simulated' }));

    expect(
      engine.ingestSentiment({ symbol: 'BTCUSDT', timestamp: Date.now(), source: 'news', score: 0.5, confidence: 1 })
    ).toBeNull();
    expect(engine.aggregator.feedKind).toBe('simulated');
  });
});
