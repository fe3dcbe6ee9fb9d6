import EventEmitter from 'eventemitter3';
import { createEvent, type HaltEvent, type SystemState, type SystemStateEvent } from '@perp-scalper/domain';
import type { HaltCondition } from '../utils/errors';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { systemClock, type Clock } from '../utils/time';
import type { StateStore, StoreSnapshot } from './state-store';

const logger = createLogger('state-broadcaster');

export interface StateBroadcasterOptions {
  intervalMs: number;
  source: string;
  clock?: Clock;
}

interface BroadcasterEvents {
  'system.state': (event: SystemStateEvent) => void;
  'engine.halted': (event: HaltEvent) => void;
}

export const toSystemState = (snapshot: StoreSnapshot, publishedAt: number): SystemState => ({
  running: snapshot.running,
  haltReason: snapshot.haltReason,
  tradingDay: snapshot.tradingDay,
  dailyPnl: { ...snapshot.pnl },
  positions: snapshot.positions.map((position) => ({ ...position })),
  recentDecisions: [...snapshot.recentDecisions],
  recentOrders: [...snapshot.recentOrders],
  recentErrors: [...snapshot.recentErrors],
  lastRejection: snapshot.lastRejection,
  riskConfig: { ...snapshot.riskConfig },
  timestamp: new Date(publishedAt).toISOString(),
});

/**
 * Publishes the store's state as `system.state` envelopes for the
 * external broadcaster, plus an `engine.halted` envelope the moment a
 * halt happens. Read-only with respect to the store.
 */
export class StateBroadcaster extends EventEmitter<BroadcasterEvents> {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly store: StateStore,
    private readonly options: StateBroadcasterOptions
  ) {
    super();
    store.on('halt', (condition) => this.publishHalt(condition));
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  publish(): SystemStateEvent | null {
    try {
      const event = createEvent(
        'system.state',
        toSystemState(this.store.snapshot(), (this.options.clock ?? systemClock)()),
        this.options.source
      );
      this.emit('system.state', event);
      return event;
    } catch (error) {
      logger.error('Failed to build system state', { error: errorMessage(error) });
      this.store.recordError('broadcaster', error);
      return null;
    }
  }

  private publishHalt(condition: HaltCondition): void {
    const event = createEvent(
      'engine.halted',
      { reason: condition.reason, dailyPnl: condition.dailyPnl },
      this.options.source
    );
    this.emit('engine.halted', event);
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.publish(), this.options.intervalMs);
    logger.info('State broadcaster started', { intervalMs: this.options.intervalMs });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info('State broadcaster stopped');
    }
  }
}
