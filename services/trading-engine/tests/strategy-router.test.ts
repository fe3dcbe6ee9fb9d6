import { describe, it, expect } from 'vitest';
import type { TradeIntent } from '@perp-scalper/domain';
import { StrategyRouter, fuseSignals } from '../src/services/strategy-router';
import { ConfigError } from '../src/utils/errors';
import { NOW, marketSignal, trendScore } from './helpers';

const options = {
  dominanceThreshold: 0.6,
  trendThreshold: 0.3,
  marketWeight: 0.7,
  trendWeight: 0.3,
  disagreementPenalty: 0.5,
  baseOrderSize: 100,
};

describe('fuseSignals', () => {
  it('lets a dominant book override a disagreeing trend at reduced confidence', () => {
    const intent = fuseSignals(marketSignal({ magnitude: 0.9 }), trendScore({ score: -0.8 }), options, 'fixed-id');

    expect(intent).not.toBeNull();
    expect(intent?.id).toBe('fixed-id');
    expect(intent?.direction).toBe('long');
    // (0.7 × 0.9 + 0.3 × 0.8) × 0.5
    expect(intent?.confidence).toBe(0.435);
    expect(intent?.size).toBe(43.5);
    expect(intent?.provenance.driver).toBe('market');
    expect(intent?.provenance.disagreement).toBe(true);
  });

  it('combines agreeing sources without a penalty', () => {
    const intent = fuseSignals(marketSignal({ magnitude: 0.9 }), trendScore({ score: 0.5 }), options);

    expect(intent?.confidence).toBe(0.78);
    expect(intent?.size).toBe(78);
    expect(intent?.referencePrice).toBe(100);
    expect(intent?.provenance.disagreement).toBe(false);
  });

  it('follows a strong trend when the book is not dominant', () => {
    const intent = fuseSignals(marketSignal({ magnitude: 0.3 }), trendScore({ score: -0.5 }), options);

    expect(intent?.direction).toBe('short');
    expect(intent?.provenance.driver).toBe('trend');
    expect(intent?.confidence).toBe(0.36);
    expect(intent?.referencePrice).toBe(99.9);
  });

  it('treats magnitude at the dominance threshold as dominant', () => {
    const intent = fuseSignals(marketSignal({ magnitude: 0.6 }), trendScore({ score: 0 }), options);
    expect(intent?.direction).toBe('long');
    expect(intent?.confidence).toBe(0.42);
  });

  it('emits nothing when neither source clears its threshold', () => {
    expect(fuseSignals(marketSignal({ magnitude: 0.5 }), trendScore({ score: 0.3 }), options)).toBeNull();
    expect(
      fuseSignals(marketSignal({ direction: 'flat', magnitude: 0.1 }), trendScore({ score: -0.2 }), options)
    ).toBeNull();
  });

  it('caps confidence at 1', () => {
    const intent = fuseSignals(marketSignal({ magnitude: 1 }), trendScore({ score: 1 }), {
      ...options,
      marketWeight: 0.9,
      trendWeight: 0.9,
    });
    expect(intent?.confidence).toBe(1);
    expect(intent?.size).toBe(100);
  });

  it('stamps the intent with the newer input time', () => {
    const intent = fuseSignals(
      marketSignal({ timestamp: NOW }),
      trendScore({ score: 0.5, timestamp: NOW + 250 }),
      options
    );
    expect(intent?.timestamp).toBe(NOW + 250);
  });
});

describe('StrategyRouter', () => {
  it('refuses weights that do not sum to 1', () => {
    expect(() => new StrategyRouter({ ...options, trendWeight: 0.2 })).toThrow(ConfigError);
  });

  it('treats a missing trend as neutral', () => {
    const router = new StrategyRouter(options);
    const intent = router.onMarketSignal(marketSignal({ magnitude: 0.9 }));

    expect(intent?.confidence).toBe(0.63);
    expect(intent?.provenance.trendScore.source).toBe('stale');
  });

  it('waits for a market signal before fusing', () => {
    const router = new StrategyRouter(options);
    expect(router.onTrendScore(trendScore({ score: 0.9 }))).toBeNull();
  });

  it('re-fuses when a new trend score arrives', () => {
    const router = new StrategyRouter(options);
    const emitted: TradeIntent[] = [];
    router.on('intent', (intent) => emitted.push(intent));

    expect(router.onMarketSignal(marketSignal({ magnitude: 0.2 }))).toBeNull();
    router.onTrendScore(trendScore({ score: 0.8 }));

    expect(emitted).toHaveLength(1);
    expect(emitted[0].provenance.driver).toBe('trend');
    expect(emitted[0].direction).toBe('long');
    expect(router.latest('BTCUSDT').trend?.score).toBe(0.8);
  });

  it('gives each intent a fresh id', () => {
    const router = new StrategyRouter(options);
    const first = router.onMarketSignal(marketSignal());
    const second = router.onMarketSignal(marketSignal());
    expect(first?.id).not.toBe(second?.id);
  });
});
