import { afterEach, describe, it, expect, vi } from 'vitest';
import type { TrendScore } from '@perp-scalper/domain';
import { LiveSentimentFeed, SimulatedSentimentFeed } from '../src/services/sentiment-feeds';
import { TrendAggregator } from '../src/services/trend-aggregator';
import { InputError } from '../src/utils/errors';

const options = { stalenessWindowMs: 1000, bufferCapacity: 3, recomputeIntervalMs: 1000 };

const signal = (timestamp: number, score: number, confidence: number) => ({
  symbol: 'BTCUSDT',
  timestamp,
  source: 'news',
  score,
  confidence,
});

describe('TrendAggregator', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns a neutral stale score for an empty buffer', () => {
    const aggregator = new TrendAggregator(options, new LiveSentimentFeed({ capacity: 10 }));

    expect(aggregator.aggregate('BTCUSDT', 5000)).toEqual({
      symbol: 'BTCUSDT',
      timestamp: 5000,
      score: 0,
      source: 'stale',
      sampleCount: 0,
    });
  });

  it('treats signals at or past the window as stale and evicts them', () => {
    const aggregator = new TrendAggregator(options, new LiveSentimentFeed({ capacity: 10 }));
    aggregator.ingest(signal(0, 0.9, 1));

    const score = aggregator.aggregate('BTCUSDT', 1000);

    expect(score.source).toBe('stale');
    expect(score.score).toBe(0);
    expect(aggregator.bufferSize('BTCUSDT')).toBe(0);
  });

  it('weights signals by confidence and recency', () => {
    const aggregator = new TrendAggregator(options, new LiveSentimentFeed({ capacity: 10 }));
    aggregator.ingest(signal(1000, 0.5, 1));
    aggregator.ingest(signal(500, -1, 0.5));

    // weights 1 and 0.5 × 0.5: (0.5 − 0.25) / 1.25
    expect(aggregator.aggregate('BTCUSDT', 1000)).toEqual({
      symbol: 'BTCUSDT',
      timestamp: 1000,
      score: 0.2,
      source: 'live',
      sampleCount: 2,
    });
  });

  it('ignores signals with zero confidence', () => {
    const aggregator = new TrendAggregator(options, new LiveSentimentFeed({ capacity: 10 }));
    aggregator.ingest(signal(900, 1, 0));

    expect(aggregator.aggregate('BTCUSDT', 1000).source).toBe('stale');
  });

  it('keeps only the newest signals up to capacity', () => {
    const aggregator = new TrendAggregator(options, new LiveSentimentFeed({ capacity: 10 }));
    for (const timestamp of [4, 1, 3, 2]) {
      aggregator.ingest(signal(timestamp, 0.1, 0.5));
    }
    expect(aggregator.bufferSize('BTCUSDT')).toBe(3);
  });

  it('rejects malformed signals', () => {
    const aggregator = new TrendAggregator(options, new LiveSentimentFeed({ capacity: 10 }));
    expect(() => aggregator.ingest({ symbol: 'BTCUSDT', timestamp: 1, source: 'news', score: 0.1 })).toThrow(
      InputError
    );
  });

  it('drains the live feed on recompute and publishes a score per symbol', () => {
    const feed = new LiveSentimentFeed({ capacity: 10 });
    const aggregator = new TrendAggregator(options, feed);
    const published: TrendScore[] = [];
    aggregator.on('trend', (score) => published.push(score));

    feed.push(signal(900, 0.6, 1));
    const scores = aggregator.recompute(['BTCUSDT', 'ETHUSDT'], 1000);

    expect(scores.map((score) => [score.symbol, score.source, score.score])).toEqual([
      ['BTCUSDT', 'live', 0.6],
      ['ETHUSDT', 'stale', 0],
    ]);
    expect(published).toEqual(scores);
    expect(feed.pending).toBe(0);
  });

  it('tags scores from the simulated feed', () => {
    const aggregator = new TrendAggregator(options, new SimulatedSentimentFeed(42));
    const [score] = aggregator.recompute(['BTCUSDT'], 1000);

    expect(aggregator.feedKind).toBe('simulated');
    expect(score.source).toBe('simulated');
    expect(score.sampleCount).toBe(1);
  });

  it('recomputes on its interval until stopped', () => {
    vi.useFakeTimers();
    const aggregator = new TrendAggregator(options, new SimulatedSentimentFeed(1), () => Date.now());
    const listener = vi.fn();
    aggregator.on('trend', listener);

    aggregator.start(['BTCUSDT']);
    expect(aggregator.isRunning).toBe(true);
    vi.advanceTimersByTime(3000);
    expect(listener).toHaveBeenCalledTimes(3);

    aggregator.stop();
    vi.advanceTimersByTime(3000);
    expect(listener).toHaveBeenCalledTimes(3);
    expect(aggregator.isRunning).toBe(false);
  });
});
