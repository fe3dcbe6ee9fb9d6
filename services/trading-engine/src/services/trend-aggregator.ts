import EventEmitter from 'eventemitter3';
import Decimal from 'decimal.js';
import { SentimentSignalSchema, type SentimentSignal, type TrendScore } from '@perp-scalper/domain';
import { InputError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { systemClock, type Clock } from '../utils/time';
import type { SentimentFeed } from './sentiment-feeds';

const logger = createLogger('trend-aggregator');

export interface TrendAggregatorOptions {
  stalenessWindowMs: number;
  /** Per-symbol buffer size. */
  bufferCapacity: number;
  recomputeIntervalMs: number;
}

interface TrendAggregatorEvents {
  trend: (score: TrendScore) => void;
}

export const neutralTrend = (symbol: string, timestamp: number): TrendScore => ({
  symbol,
  timestamp,
  score: 0,
  source: 'stale',
  sampleCount: 0,
});

export class TrendAggregator extends EventEmitter<TrendAggregatorEvents> {
  private readonly buffers = new Map<string, SentimentSignal[]>();
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly options: TrendAggregatorOptions,
    private readonly feed: SentimentFeed,
    private readonly clock: Clock = systemClock
  ) {
    super();
  }

  get feedKind(): SentimentFeed['kind'] {
    return this.feed.kind;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  ingest(raw: unknown): void {
    const result = SentimentSignalSchema.safeParse(raw);
    if (!result.success) {
      throw InputError.fromZod(result.error, 'sentiment signal');
    }
    this.insert({ ...result.data, symbol: result.data.symbol.toUpperCase() });
  }

  bufferSize(symbol: string): number {
    return this.buffers.get(symbol)?.length ?? 0;
  }

  /**
   * Recency-weighted mean of the non-stale buffer; each entry weighs
   * confidence × (1 − age / window). Never throws: an empty or fully
   * stale buffer yields a neutral score.
   */
  aggregate(symbol: string, now: number = this.clock()): TrendScore {
    const buffer = this.evictStale(symbol, now);
    const window = this.options.stalenessWindowMs;

    let weighted = new Decimal(0);
    let totalWeight = new Decimal(0);
    let samples = 0;
    for (const entry of buffer) {
      const age = Math.max(0, now - entry.timestamp);
      const weight = new Decimal(entry.confidence).times(new Decimal(1).minus(new Decimal(age).div(window)));
      if (weight.lte(0)) continue;
      weighted = weighted.plus(weight.times(entry.score));
      totalWeight = totalWeight.plus(weight);
      samples += 1;
    }

    if (totalWeight.isZero()) {
      return neutralTrend(symbol, now);
    }

    const score = Decimal.max(-1, Decimal.min(1, weighted.div(totalWeight))).toNumber();
    return {
      symbol,
      timestamp: now,
      score,
      source: this.feed.kind === 'simulated' ? 'simulated' : 'live',
      sampleCount: samples,
    };
  }

  /**
   * Drain the feed into the buffers and publish a fresh score per symbol.
   */
  recompute(symbols: readonly string[], now: number = this.clock()): TrendScore[] {
    for (const signal of this.feed.drain(symbols, now)) {
      try {
        this.ingest(signal);
      } catch (error) {
        logger.warn('Dropping sentiment signal', { error: errorMessage(error) });
      }
    }

    return symbols.map((symbol) => {
      const score = this.aggregate(symbol, now);
      this.emit('trend', score);
      return score;
    });
  }

  start(symbols: readonly string[]): void {
    if (this.timer) {
      logger.warn('Trend aggregator is already running');
      return;
    }
    this.timer = setInterval(() => {
      this.recompute(symbols);
    }, this.options.recomputeIntervalMs);
    logger.info('Trend aggregator started', {
      feed: this.feed.kind,
      intervalMs: this.options.recomputeIntervalMs,
      symbols,
    });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info('Trend aggregator stopped');
    }
  }

  private insert(signal: SentimentSignal): void {
    const buffer = this.buffers.get(signal.symbol) ?? [];
    let index = buffer.length;
    while (index > 0 && buffer[index - 1].timestamp > signal.timestamp) {
      index -= 1;
    }
    buffer.splice(index, 0, signal);
    if (buffer.length > this.options.bufferCapacity) {
      buffer.splice(0, buffer.length - this.options.bufferCapacity);
    }
    this.buffers.set(signal.symbol, buffer);
  }

  private evictStale(symbol: string, now: number): SentimentSignal[] {
    const buffer = this.buffers.get(symbol);
    if (!buffer) return [];
    const cutoff = now - this.options.stalenessWindowMs;
    const firstFresh = buffer.findIndex((entry) => entry.timestamp > cutoff);
    const fresh = firstFresh === -1 ? [] : buffer.slice(firstFresh);
    this.buffers.set(symbol, fresh);
    return fresh;
  }
}
