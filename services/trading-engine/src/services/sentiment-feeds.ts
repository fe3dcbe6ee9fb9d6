import {
  SentimentSignalSchema,
  SocialPostSchema,
  type SentimentSignal,
} from '@perp-scalper/domain';
import { InputError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { LexiconSentimentScorer, type SentimentScorer } from './sentiment-scorer';
import { SymbolMapper } from './symbol-mapper';

const logger = createLogger('sentiment-feed');

export type SentimentFeedKind = 'live' | 'simulated';

/**
 * Input contract of the TrendAggregator. `kind` is fixed at construction
 * and tags every TrendScore derived from the feed.
 */
export interface SentimentFeed {
  readonly kind: SentimentFeedKind;
  drain(symbols: readonly string[], now: number): SentimentSignal[];
}

export interface LiveSentimentFeedOptions {
  capacity: number;
  mapper?: SymbolMapper;
  scorer?: SentimentScorer;
}

/**
 * Collects normalized signals pushed by external feed clients until the
 * aggregator drains them.
 */
export class LiveSentimentFeed implements SentimentFeed {
  readonly kind = 'live' as const;
  private queue: SentimentSignal[] = [];
  private readonly mapper: SymbolMapper;
  private readonly scorer: SentimentScorer;

  constructor(private readonly options: LiveSentimentFeedOptions) {
    this.mapper = options.mapper ?? new SymbolMapper();
    this.scorer = options.scorer ?? new LexiconSentimentScorer();
  }

  get pending(): number {
    return this.queue.length;
  }

  push(raw: unknown): SentimentSignal {
    const result = SentimentSignalSchema.safeParse(raw);
    if (!result.success) {
      throw InputError.fromZod(result.error, 'sentiment signal');
    }
    const signal = result.data;
    this.queue.push(signal);
    if (this.queue.length > this.options.capacity) {
      this.queue.splice(0, this.queue.length - this.options.capacity);
    }
    return signal;
  }

  /**
   * Map a raw post to a symbol and score its text. Posts that mention no
   * known symbol are dropped and yield null.
   */
  publishPost(raw: unknown): SentimentSignal | null {
    const result = SocialPostSchema.safeParse(raw);
    if (!result.success) {
      throw InputError.fromZod(result.error, 'social post');
    }
    const post = result.data;
    const symbol = this.mapper.resolve(post.text, post.symbolHint);
    if (!symbol) {
      logger.debug('Post did not map to any symbol', { source: post.source, text: post.text.slice(0, 50) });
      return null;
    }
    const { score, confidence } = this.scorer.score(post.text);
    return this.push({ symbol, timestamp: post.timestamp, source: post.source, score, confidence });
  }

  drain(): SentimentSignal[] {
    const drained = this.queue;
    this.queue = [];
    return drained;
  }
}

// mulberry32
const createRandom = (seed: number): (() => number) => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

/**
 * Seeded stand-in used when no live feed is configured. Each drain emits
 * one bounded pseudo-random observation per symbol; the same seed and
 * symbol order replay the same sequence.
 */
export class SimulatedSentimentFeed implements SentimentFeed {
  readonly kind = 'simulated' as const;
  private readonly random: () => number;

  constructor(
    seed: number,
    private readonly source: string = 'simulator'
  ) {
    this.random = createRandom(seed);
  }

  drain(symbols: readonly string[], now: number): SentimentSignal[] {
    return symbols.map((symbol) => ({
      symbol,
      timestamp: now,
      source: this.source,
      score: Math.round((this.random() * 2 - 1) * 1e6) / 1e6,
      confidence: Math.round((0.2 + this.random() * 0.6) * 1e6) / 1e6,
    }));
  }
}
