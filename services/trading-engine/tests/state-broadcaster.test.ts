import { afterEach, describe, it, expect, vi } from 'vitest';
import { validateEvent, type HaltEvent, type SystemStateEvent } from '@perp-scalper/domain';
import { StateBroadcaster } from '../src/services/state-broadcaster';
import { HaltCondition } from '../src/utils/errors';
import { NOW, createTestStore, openTestPosition } from './helpers';

describe('StateBroadcaster', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('publishes the store as a system.state envelope', () => {
    const { store } = createTestStore();
    openTestPosition(store, { entryPrice: 100, quantity: 2 });
    store.updateMarkPrice('BTCUSDT', 101);
    const broadcaster = new StateBroadcaster(store, { intervalMs: 1000, source: 'trading-engine', clock: () => NOW });

    const event = broadcaster.publish();

    expect(event).not.toBeNull();
    expect(event?.type).toBe('system.state');
    expect(event?.source).toBe('trading-engine');
    expect(event?.data).toMatchObject({
      running: false,
      haltReason: null,
      tradingDay: '2024-03-01',
      dailyPnl: { realized: 0, unrealized: 2, total: 2 },
      timestamp: new Date(NOW).toISOString(),
    });
    expect(event?.data.positions).toHaveLength(1);
    expect(validateEvent(event)).toEqual(event);
  });

  it('stamps each publication with the publish time, not the last change', () => {
    let now = NOW;
    const { store } = createTestStore({}, () => now);
    store.setRunning(true);
    const broadcaster = new StateBroadcaster(store, { intervalMs: 1000, source: 'trading-engine', clock: () => now });

    now = NOW + 5000;
    const idle = broadcaster.publish();

    expect(idle?.data.timestamp).toBe(new Date(NOW + 5000).toISOString());
    expect(store.snapshot().changedAt).toBe(NOW);
  });

  it('publishes on its interval until stopped', () => {
    vi.useFakeTimers();
    const { store } = createTestStore();
    const broadcaster = new StateBroadcaster(store, { intervalMs: 1000, source: 'trading-engine' });
    const events: SystemStateEvent[] = [];
    broadcaster.on('system.state', (event) => events.push(event));

    broadcaster.start();
    vi.advanceTimersByTime(2500);
    broadcaster.stop();
    vi.advanceTimersByTime(2000);

    expect(events).toHaveLength(2);
    expect(broadcaster.isRunning).toBe(false);
  });

  it('announces a halt as soon as it happens', () => {
    const { store } = createTestStore();
    const broadcaster = new StateBroadcaster(store, { intervalMs: 1000, source: 'trading-engine' });
    const halts: HaltEvent[] = [];
    broadcaster.on('engine.halted', (event) => halts.push(event));

    store.setRunning(true);
    store.halt(new HaltCondition('Daily loss 120.00 reached limit 100', -120));

    expect(halts).toHaveLength(1);
    expect(halts[0].data).toEqual({ reason: 'Daily loss 120.00 reached limit 100', dailyPnl: -120 });
  });
});
