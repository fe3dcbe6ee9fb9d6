import type { MarketSignal, RiskConfig, SentimentSignal, SystemStateEvent } from '@perp-scalper/domain';
import type { EngineConfig } from './config';
import type { ExchangeClient } from './types';
import { DecisionPipeline } from './services/decision-pipeline';
import { ExecutionGateway } from './services/execution-gateway';
import { MarketSignalGenerator } from './services/market-signal-generator';
import { PaperExchange } from './services/paper-exchange';
import { QuoteBoard } from './services/quote-board';
import { RiskEngine } from './services/risk-engine';
import { LiveSentimentFeed, SimulatedSentimentFeed, type SentimentFeed } from './services/sentiment-feeds';
import { StateBroadcaster } from './services/state-broadcaster';
import { InMemoryStatePersistence, type StatePersistence } from './services/state-persistence';
import { StateStore, type StoreSnapshot } from './services/state-store';
import { StrategyRouter } from './services/strategy-router';
import { TrendAggregator } from './services/trend-aggregator';
import { createLogger } from './utils/logger';
import { systemClock, type Clock } from './utils/time';

const logger = createLogger('engine');

export interface TradingEngineOverrides {
  /** Live exchange client; a paper venue is used when absent. */
  exchange?: ExchangeClient;
  persistence?: StatePersistence;
  clock?: Clock;
}

export interface TradingEngine {
  readonly store: StateStore;
  readonly pipeline: DecisionPipeline;
  readonly broadcaster: StateBroadcaster;
  readonly gateway: ExecutionGateway;
  readonly aggregator: TrendAggregator;
  readonly router: StrategyRouter;
  readonly risk: RiskEngine;
  readonly exchange: ExchangeClient;
  onOrderBook(raw: unknown): MarketSignal | null;
  ingestSentiment(raw: unknown): SentimentSignal | null;
  ingestPost(raw: unknown): SentimentSignal | null;
  start(): void;
  stop(): Promise<void>;
  updateRiskConfig(raw: unknown): RiskConfig;
  snapshot(): StoreSnapshot;
  onSystemState(listener: (event: SystemStateEvent) => void): () => void;
  /** Load persisted state, if any. Call before start(). */
  restore(): Promise<boolean>;
  close(): Promise<void>;
}

export function createTradingEngine(config: EngineConfig, overrides: TradingEngineOverrides = {}): TradingEngine {
  const clock = overrides.clock ?? systemClock;
  const persistence = overrides.persistence ?? new InMemoryStatePersistence();

  const store = new StateStore({
    riskConfig: config.risk,
    historyLimit: config.monitoring.historyLimit,
    persistence,
    clock,
  });

  const quotes = new QuoteBoard();
  const generator = new MarketSignalGenerator(config.signal);

  const liveFeed =
    config.trend.feedMode === 'live'
      ? new LiveSentimentFeed({ capacity: config.trend.bufferCapacity * config.symbols.length })
      : null;
  const feed: SentimentFeed = liveFeed ?? new SimulatedSentimentFeed(config.trend.simulationSeed);
  const aggregator = new TrendAggregator(config.trend, feed, clock);
  const router = new StrategyRouter(config.strategy);
  const risk = new RiskEngine(store, (symbol) => quotes.get(symbol), undefined, clock);

  let paper: PaperExchange | null = null;
  let exchange: ExchangeClient;
  if (overrides.exchange) {
    exchange = overrides.exchange;
  } else {
    paper = new PaperExchange({ feeBps: config.execution.paperFeeBps, clock });
    exchange = paper;
  }
  const gateway = new ExecutionGateway(exchange, store, config.execution, clock);

  const pipeline = new DecisionPipeline(
    {
      store,
      quotes,
      generator,
      aggregator,
      router,
      risk,
      gateway,
      liveFeed,
      bookListeners: paper ? [paper.updateBook.bind(paper)] : [],
    },
    {
      symbols: config.symbols,
      housekeepingIntervalMs: config.monitoring.housekeepingIntervalMs,
    }
  );

  const broadcaster = new StateBroadcaster(store, {
    intervalMs: config.monitoring.broadcastIntervalMs,
    source: config.serviceName,
    clock,
  });

  logger.info('Trading engine assembled', {
    symbols: config.symbols,
    feed: feed.kind,
    exchange: paper ? 'paper' : 'external',
    persistence: persistence instanceof InMemoryStatePersistence ? 'memory' : 'external',
  });

  return {
    store,
    pipeline,
    broadcaster,
    gateway,
    aggregator,
    router,
    risk,
    exchange,
    onOrderBook: (raw) => pipeline.onOrderBook(raw),
    ingestSentiment: (raw) => pipeline.ingestSentiment(raw),
    ingestPost: (raw) => pipeline.ingestPost(raw),
    start: () => {
      pipeline.start();
      broadcaster.start();
    },
    stop: () => pipeline.stop(),
    updateRiskConfig: (raw) => pipeline.updateRiskConfig(raw),
    snapshot: () => store.snapshot(),
    onSystemState: (listener) => {
      broadcaster.on('system.state', listener);
      return () => {
        broadcaster.off('system.state', listener);
      };
    },
    restore: () => store.load(),
    close: async () => {
      broadcaster.stop();
      await pipeline.close();
      await persistence.close();
    },
  };
}

export type { ExchangeClient, ExchangeEvents, FillEvent, CancelEvent, OrderAck, OrderRequest } from './types';
export type { StatePersistence, PersistedState } from './services/state-persistence';
export type { StoreSnapshot } from './services/state-store';
export { ExchangeRequestError, ConfigError, InputError } from './utils/errors';
export { loadConfig } from './config';
