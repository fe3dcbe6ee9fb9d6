import { describe, it, expect, vi } from 'vitest';
import type { FillApplication } from '../src/services/state-store';
import { StateStore } from '../src/services/state-store';
import { InMemoryStatePersistence } from '../src/services/state-persistence';
import { ConfigError, HaltCondition, InputError } from '../src/utils/errors';
import { NOW, baseRiskConfig, createTestStore, openTestPosition } from './helpers';

const fill = (overrides: Partial<FillApplication>): FillApplication => ({
  symbol: 'BTCUSDT',
  side: 'buy',
  price: 100,
  quantity: 1,
  fee: 0,
  purpose: 'entry',
  notional: 100,
  timestamp: NOW,
  ...overrides,
});

describe('StateStore', () => {
  describe('snapshots', () => {
    it('are deep-frozen and reused until the next mutation', () => {
      const { store } = createTestStore();
      openTestPosition(store);

      const first = store.snapshot();
      expect(Object.isFrozen(first)).toBe(true);
      expect(Object.isFrozen(first.positions)).toBe(true);
      expect(Object.isFrozen(first.positions[0])).toBe(true);
      expect(Object.isFrozen(first.riskConfig)).toBe(true);
      expect(store.snapshot()).toBe(first);

      store.updateMarkPrice('BTCUSDT', 101);
      const second = store.snapshot();
      expect(second).not.toBe(first);
      expect(second.version).toBeGreaterThan(first.version);
      expect(first.positions[0].markPrice).toBe(100);
    });
  });

  describe('applyFill', () => {
    it('opens, grows, reduces and closes a long position', () => {
      const { store } = createTestStore();

      store.applyFill(fill({ quantity: 2, price: 100, fee: 0.1, notional: 200 }));
      expect(store.position('BTCUSDT')).toMatchObject({ side: 'long', quantity: 2, entryPrice: 100 });
      expect(store.snapshot().pnl.realized).toBe(-0.1);

      store.applyFill(fill({ quantity: 2, price: 110, notional: 220 }));
      expect(store.position('BTCUSDT')).toMatchObject({ quantity: 4, entryPrice: 105, notional: 420 });

      const reduced = store.applyFill(fill({ side: 'sell', quantity: 1, price: 120, purpose: 'exit', notional: 0 }));
      expect(reduced.realizedPnl).toBe(15);
      expect(reduced.closed).toBe(false);
      expect(store.position('BTCUSDT')).toMatchObject({ quantity: 3, notional: 315 });
      expect(store.snapshot().pnl.realized).toBe(14.9);

      const closed = store.applyFill(fill({ side: 'sell', quantity: 3, price: 100, purpose: 'exit', notional: 0 }));
      expect(closed).toEqual({ position: null, realizedPnl: -15, closed: true });
      expect(store.snapshot().positions).toEqual([]);
      expect(store.snapshot().pnl.realized).toBe(-0.1);
    });

    it('books short PnL with the opposite sign', () => {
      const { store } = createTestStore();
      store.applyFill(fill({ side: 'sell', quantity: 1, price: 100 }));
      const outcome = store.applyFill(fill({ side: 'buy', quantity: 1, price: 90, purpose: 'exit' }));

      expect(outcome.realizedPnl).toBe(10);
      expect(outcome.closed).toBe(true);
    });

    it('ignores exit fills when nothing is open', () => {
      const { store } = createTestStore();
      const before = store.snapshot();
      const outcome = store.applyFill(fill({ side: 'sell', purpose: 'exit' }));

      expect(outcome).toEqual({ position: null, realizedPnl: 0, closed: false });
      expect(store.snapshot()).toBe(before);
    });

    it('caps a reducing fill at the open quantity', () => {
      const { store } = createTestStore();
      store.applyFill(fill({ quantity: 1, price: 100 }));
      const outcome = store.applyFill(fill({ side: 'sell', quantity: 3, price: 105, purpose: 'exit' }));

      expect(outcome.realizedPnl).toBe(5);
      expect(outcome.closed).toBe(true);
    });
  });

  it('marks positions to market', () => {
    const { store } = createTestStore();
    openTestPosition(store, { side: 'short', entryPrice: 100, quantity: 2 });
    store.updateMarkPrice('BTCUSDT', 105);

    expect(store.snapshot().pnl).toEqual({ realized: 0, unrealized: -10, total: -10 });
  });

  it('refuses to open a second position on one symbol', () => {
    const { store } = createTestStore();
    openTestPosition(store);
    expect(() => openTestPosition(store)).toThrow(InputError);
  });

  it('closes a position at a given price', () => {
    const { store } = createTestStore();
    openTestPosition(store, { entryPrice: 100, quantity: 2 });

    expect(store.closePosition('BTCUSDT', 99, 0.5).realizedPnl).toBe(-2.5);
    expect(store.position('BTCUSDT')).toBeUndefined();
  });

  describe('risk configuration', () => {
    it('keeps the previous configuration when an update is invalid', () => {
      const { store } = createTestStore();

      expect(() => store.updateRiskConfig({ ...baseRiskConfig, maxConcurrentPositions: 1.5 })).toThrow(ConfigError);
      expect(store.snapshot().riskConfig.maxConcurrentPositions).toBe(2);
      expect(store.snapshot().recentErrors[0]).toMatchObject({ source: 'config', code: 'CONFIG_ERROR' });
    });

    it('applies a valid update', () => {
      const { store } = createTestStore();
      const updated = store.updateRiskConfig({ ...baseRiskConfig, cooldownMs: 5000 });

      expect(updated.cooldownMs).toBe(5000);
      expect(store.snapshot().riskConfig.cooldownMs).toBe(5000);
    });
  });

  describe('running flag and halts', () => {
    it('keeps the first halt reason until an explicit start', () => {
      const { store } = createTestStore();
      const onHalt = vi.fn();
      store.on('halt', onHalt);
      store.setRunning(true);

      store.halt(new HaltCondition('first', -120));
      store.halt(new HaltCondition('second', -130));

      expect(store.snapshot().haltReason).toBe('first');
      expect(onHalt).toHaveBeenCalledTimes(1);

      store.setRunning(true);
      expect(store.snapshot()).toMatchObject({ running: true, haltReason: null });
    });

    it('resets realized PnL on a new trading day but keeps a halt', () => {
      let now = NOW;
      const { store } = createTestStore({}, () => now);
      store.applyFill(fill({ quantity: 1, price: 100 }));
      store.applyFill(fill({ side: 'sell', quantity: 1, price: 90, purpose: 'exit' }));
      store.setRunning(true);
      store.halt(new HaltCondition('loss', -10));
      expect(store.snapshot().pnl.realized).toBe(-10);

      expect(store.rollDay()).toBe(false);
      now = Date.UTC(2024, 2, 2, 0, 0, 1);
      expect(store.rollDay()).toBe(true);

      expect(store.snapshot()).toMatchObject({
        tradingDay: '2024-03-02',
        running: false,
        haltReason: 'loss',
        pnl: { realized: 0, unrealized: 0, total: 0 },
      });
    });
  });

  describe('history', () => {
    it('keeps a bounded newest-first error list', () => {
      const { store } = createTestStore({}, () => NOW, 2);
      store.recordError('a', new Error('one'));
      store.recordError('b', new InputError('two', 'BAD_INPUT'));
      store.recordError('c', 'three');

      expect(store.snapshot().recentErrors).toEqual([
        { source: 'c', code: 'UNKNOWN_ERROR', message: 'three', at: NOW },
        { source: 'b', code: 'BAD_INPUT', message: 'two', at: NOW },
      ]);
    });

    it('updates an order record in place of the earlier one', () => {
      const { store } = createTestStore();
      const record = {
        clientOrderId: 'entry-1',
        orderId: null,
        symbol: 'BTCUSDT',
        side: 'buy' as const,
        purpose: 'entry' as const,
        quantity: 1,
        filledQuantity: 0,
        averagePrice: null,
        status: 'submitted' as const,
        reason: null,
        at: NOW,
      };
      store.recordOrder(record);
      store.recordOrder({ ...record, clientOrderId: 'entry-2' });
      store.recordOrder({ ...record, status: 'filled', filledQuantity: 1, averagePrice: 100 });

      expect(store.snapshot().recentOrders.map((order) => [order.clientOrderId, order.status])).toEqual([
        ['entry-1', 'filled'],
        ['entry-2', 'submitted'],
      ]);
    });
  });

  describe('persistence', () => {
    it('writes durable changes through and restores them stopped', async () => {
      const { store, persistence } = createTestStore();
      store.setRunning(true);
      openTestPosition(store, { entryPrice: 100, quantity: 2 });
      store.recordError('test', new Error('not persisted'));
      await store.flush();

      expect(persistence.saves).toBe(2);

      const restored = new StateStore({
        riskConfig: { ...baseRiskConfig, dailyLossLimit: 999 },
        historyLimit: 20,
        persistence,
        clock: () => NOW,
      });
      expect(await restored.load()).toBe(true);

      const snapshot = restored.snapshot();
      expect(snapshot.running).toBe(false);
      expect(snapshot.riskConfig.dailyLossLimit).toBe(100);
      expect(snapshot.positions).toEqual(store.snapshot().positions);
      expect(snapshot.recentErrors).toEqual([]);
    });

    it('reports nothing to load from an empty driver', async () => {
      const { store } = createTestStore();
      expect(await store.load()).toBe(false);
    });

    it('records persistence failures without throwing', async () => {
      const persistence = new InMemoryStatePersistence();
      vi.spyOn(persistence, 'save').mockRejectedValue(new Error('disk full'));
      const store = new StateStore({ riskConfig: baseRiskConfig, historyLimit: 5, persistence, clock: () => NOW });

      store.setRunning(true);
      await store.flush();

      expect(store.snapshot().recentErrors[0]).toMatchObject({ source: 'persistence', message: 'disk full' });
    });
  });
});
