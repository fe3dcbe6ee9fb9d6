import EventEmitter from 'eventemitter3';
import PQueue from 'p-queue';
import type {
  MarketSignal,
  OrderBookSnapshot,
  RiskConfig,
  RiskVerdict,
  SentimentSignal,
  TradeIntent,
} from '@perp-scalper/domain';
import type { ExitInstruction } from '../types';
import { HaltCondition, InputError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { ExecutionGateway, ExecutionResult } from './execution-gateway';
import type { MarketSignalGenerator } from './market-signal-generator';
import type { QuoteBoard } from './quote-board';
import type { RiskEngine } from './risk-engine';
import type { LiveSentimentFeed } from './sentiment-feeds';
import type { StateStore } from './state-store';
import type { StrategyRouter } from './strategy-router';
import type { TrendAggregator } from './trend-aggregator';

const logger = createLogger('decision-pipeline');

export interface DecisionPipelineOptions {
  symbols: readonly string[];
  housekeepingIntervalMs: number;
}

export interface DecisionPipelineDeps {
  store: StateStore;
  quotes: QuoteBoard;
  generator: MarketSignalGenerator;
  aggregator: TrendAggregator;
  router: StrategyRouter;
  risk: RiskEngine;
  gateway: ExecutionGateway;
  /** Null when the simulated feed stands in. */
  liveFeed: LiveSentimentFeed | null;
  /** Extra consumers of validated books, such as a paper venue. */
  bookListeners?: ((book: OrderBookSnapshot) => void)[];
}

interface PipelineEvents {
  verdict: (verdict: RiskVerdict) => void;
  execution: (result: ExecutionResult) => void;
  exit: (instruction: ExitInstruction, result: ExecutionResult) => void;
}

/** Per-symbol admission: one intent in process, at most one waiting. */
interface Lane {
  queue: PQueue;
  pending: TradeIntent | null;
  drainQueued: boolean;
}

/**
 * Wires order books and sentiment through fusion, risk and execution.
 * Intents for one symbol are validated and executed strictly in order;
 * a newer intent replaces one still waiting instead of queueing behind it.
 */
export class DecisionPipeline extends EventEmitter<PipelineEvents> {
  private readonly lanes = new Map<string, Lane>();
  private readonly exitQueue = new PQueue({ concurrency: 4 });
  private housekeepingTimer: NodeJS.Timeout | null = null;
  private replacedIntents = 0;

  constructor(
    private readonly deps: DecisionPipelineDeps,
    private readonly options: DecisionPipelineOptions
  ) {
    super();
    deps.router.on('intent', (intent) => this.admit(intent));
    deps.aggregator.on('trend', (score) => {
      deps.router.onTrendScore(score);
    });
    deps.store.on('halt', (condition) => {
      this.handleHalt(condition).catch((error: unknown) => {
        logger.error('Halt handling failed', { error: errorMessage(error) });
        deps.store.recordError('pipeline', error);
      });
    });
  }

  get replaced(): number {
    return this.replacedIntents;
  }

  // Inbound data

  onOrderBook(raw: unknown): MarketSignal | null {
    const { store, generator, quotes, risk, router } = this.deps;
    let book: OrderBookSnapshot;
    try {
      book = generator.parse(raw);
    } catch (error) {
      this.dropInput('market-data', error);
      return null;
    }

    quotes.update(book);
    for (const listener of this.deps.bookListeners ?? []) {
      listener(book);
    }
    const mid = quotes.mid(book.symbol);
    if (mid !== null) {
      store.updateMarkPrice(book.symbol, mid);
    }
    const signal = generator.fromSnapshot(book);
    router.onMarketSignal(signal);
    // An intent fused from this book has already met the loss check in validation
    risk.assess();
    return signal;
  }

  ingestSentiment(raw: unknown): SentimentSignal | null {
    const { liveFeed } = this.deps;
    if (!liveFeed) {
      logger.debug('Ignoring sentiment signal: simulated feed is configured');
      return null;
    }
    try {
      return liveFeed.push(raw);
    } catch (error) {
      this.dropInput('sentiment', error);
      return null;
    }
  }

  ingestPost(raw: unknown): SentimentSignal | null {
    const { liveFeed } = this.deps;
    if (!liveFeed) {
      logger.debug('Ignoring post: simulated feed is configured');
      return null;
    }
    try {
      return liveFeed.publishPost(raw);
    } catch (error) {
      this.dropInput('sentiment', error);
      return null;
    }
  }

  // Control

  start(): void {
    this.deps.store.setRunning(true);
    if (!this.deps.aggregator.isRunning) {
      this.deps.aggregator.start(this.options.symbols);
    }
    if (!this.housekeepingTimer) {
      this.housekeepingTimer = setInterval(() => this.housekeeping(), this.options.housekeepingIntervalMs);
    }
    logger.info('Decision pipeline started', { symbols: this.options.symbols });
  }

  /**
   * Cancel every order without a confirmed fill. Intents still waiting, and
   * any that arrive later, are rejected as stopped. Positions already
   * filled remain.
   */
  async stop(): Promise<void> {
    this.deps.store.setRunning(false);
    const cancelled = await this.deps.gateway.cancelOutstanding();
    logger.info('Decision pipeline stopped', { cancelledOrders: cancelled });
  }

  updateRiskConfig(raw: unknown): RiskConfig {
    return this.deps.store.updateRiskConfig(raw);
  }

  /** Stop timers and wait for in-flight work; used on shutdown. */
  async close(): Promise<void> {
    this.deps.aggregator.stop();
    if (this.housekeepingTimer) {
      clearInterval(this.housekeepingTimer);
      this.housekeepingTimer = null;
    }
    await this.stop();
    await Promise.all([...this.lanes.values()].map((lane) => lane.queue.onIdle()));
    await this.exitQueue.onIdle();
    this.deps.gateway.detach();
    await this.deps.store.flush();
  }

  /** Roll the trading day, re-check the loss limit and submit due exits. */
  housekeeping(): void {
    const { store, risk } = this.deps;
    store.rollDay();
    risk.assess();
    for (const instruction of risk.reviewPositions()) {
      this.submitExit(instruction);
    }
  }

  /** Resolves when every lane and the exit queue are idle. */
  async idle(): Promise<void> {
    await Promise.all([...this.lanes.values()].map((lane) => lane.queue.onIdle()));
    await this.exitQueue.onIdle();
  }

  // Admission

  private admit(intent: TradeIntent): void {
    const lane = this.lane(intent.symbol);
    if (lane.pending) {
      this.replacedIntents += 1;
      logger.debug('Pending intent replaced', {
        symbol: intent.symbol,
        replacedIntentId: lane.pending.id,
        intentId: intent.id,
      });
    }
    lane.pending = intent;
    if (!lane.drainQueued) {
      lane.drainQueued = true;
      lane.queue
        .add(() => this.drain(lane))
        .catch((error: unknown) => {
          logger.error('Admission lane failed', { symbol: intent.symbol, error: errorMessage(error) });
          this.deps.store.recordError('pipeline', error);
        });
    }
  }

  private async drain(lane: Lane): Promise<void> {
    lane.drainQueued = false;
    const intent = lane.pending;
    lane.pending = null;
    if (!intent) return;

    // Validation and slot reservation complete in this synchronous turn
    const verdict = this.deps.risk.validate(intent);
    this.emit('verdict', verdict);
    if (verdict.outcome !== 'approved') return;

    const result = await this.deps.gateway.execute(verdict);
    this.emit('execution', result);
  }

  private lane(symbol: string): Lane {
    let lane = this.lanes.get(symbol);
    if (!lane) {
      lane = { queue: new PQueue({ concurrency: 1 }), pending: null, drainQueued: false };
      this.lanes.set(symbol, lane);
    }
    return lane;
  }

  // Halts and exits

  private async handleHalt(condition: HaltCondition): Promise<void> {
    const cancelled = await this.deps.gateway.cancelOutstanding();
    logger.warn('Pipeline halted', { reason: condition.reason, cancelledOrders: cancelled });
    if (this.deps.store.snapshot().riskConfig.liquidateOnHalt) {
      for (const instruction of this.deps.risk.reviewPositions()) {
        this.submitExit(instruction);
      }
    }
  }

  private submitExit(instruction: ExitInstruction): void {
    this.exitQueue
      .add(() => this.deps.gateway.exit(instruction))
      .then((result) => {
        if (result) {
          this.emit('exit', instruction, result);
        }
      })
      .catch((error: unknown) => {
        logger.error('Exit failed', { positionId: instruction.positionId, error: errorMessage(error) });
        this.deps.store.recordError('execution', error);
      });
  }

  private dropInput(source: string, error: unknown): void {
    if (error instanceof InputError) {
      logger.warn('Dropping malformed input', { source, error: error.message });
    } else {
      logger.error('Unexpected input failure', { source, error: errorMessage(error) });
    }
    this.deps.store.recordError(source, error);
  }
}
