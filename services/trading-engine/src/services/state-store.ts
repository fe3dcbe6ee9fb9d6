import EventEmitter from 'eventemitter3';
import Decimal from 'decimal.js';
import PQueue from 'p-queue';
import { v4 as uuidv4 } from 'uuid';
import {
  RiskConfigSchema,
  type DecisionRecord,
  type ErrorRecord,
  type OrderRecord,
  type OrderSide,
  type Position,
  type PositionSide,
  type RiskConfig,
  type RiskVerdict,
} from '@perp-scalper/domain';
import { ConfigError, HaltCondition, InputError, codeOf, errorMessage } from '../utils/errors';
import { deepFreeze } from '../utils/freeze';
import { createLogger } from '../utils/logger';
import { systemClock, tradingDayOf, type Clock } from '../utils/time';
import type { PersistedState, StatePersistence } from './state-persistence';

const logger = createLogger('state-store');

// Remaining quantity below this is treated as flat
const QUANTITY_EPSILON = 1e-9;

/** Risk capacity held for an approved entry that has not filled yet. */
export interface Reservation {
  intentId: string;
  symbol: string;
  side: PositionSide;
  notional: number;
  reservedAt: number;
}

export interface StoreSnapshot {
  readonly version: number;
  /** Clock time of the last mutation. */
  readonly changedAt: number;
  readonly running: boolean;
  readonly haltReason: string | null;
  readonly tradingDay: string;
  readonly pnl: { readonly realized: number; readonly unrealized: number; readonly total: number };
  readonly positions: readonly Readonly<Position>[];
  readonly reservations: readonly Readonly<Reservation>[];
  readonly riskConfig: Readonly<RiskConfig>;
  readonly lastEntryAt: Readonly<Record<string, number>>;
  readonly recentDecisions: readonly DecisionRecord[];
  readonly recentOrders: readonly OrderRecord[];
  readonly recentErrors: readonly ErrorRecord[];
  readonly lastRejection: DecisionRecord | null;
}

export interface FillApplication {
  symbol: string;
  side: OrderSide;
  price: number;
  quantity: number;
  fee: number;
  purpose: 'entry' | 'exit';
  /** Risk units committed by this entry fill. */
  notional: number;
  stopLoss?: number | null;
  takeProfit?: number | null;
  timestamp: number;
}

export interface FillOutcome {
  position: Position | null;
  realizedPnl: number;
  closed: boolean;
}

export interface OpenPositionParams {
  symbol: string;
  side: PositionSide;
  entryPrice: number;
  quantity: number;
  notional: number;
  stopLoss: number | null;
  takeProfit: number | null;
  openedAt: number;
}

export interface StateStoreOptions {
  riskConfig: RiskConfig;
  historyLimit: number;
  persistence: StatePersistence;
  clock?: Clock;
}

interface StateStoreEvents {
  change: (version: number) => void;
  halt: (condition: HaltCondition) => void;
}

const sideOfOrder = (side: OrderSide): PositionSide => (side === 'buy' ? 'long' : 'short');

const unrealizedOf = (side: PositionSide, entryPrice: number, markPrice: number, quantity: number): number => {
  const move = new Decimal(markPrice).minus(entryPrice).times(quantity);
  return (side === 'long' ? move : move.neg()).toNumber();
};

const pushBounded = <T>(list: T[], item: T, limit: number): T[] => [item, ...list].slice(0, limit);

/**
 * Single owner of positions, daily PnL, the running flag and the risk
 * configuration. Every mutator is synchronous, so a mutation is complete
 * before any other callback observes the store; readers get deep-frozen
 * snapshots. Durable fields are written through to the persistence
 * driver on a serial queue.
 */
export class StateStore extends EventEmitter<StateStoreEvents> {
  private running = false;
  private haltReason: string | null = null;
  private tradingDay: string;
  private realizedPnl = new Decimal(0);
  private riskConfig: RiskConfig;
  private readonly positions = new Map<string, Position>();
  private readonly reservations = new Map<string, Reservation>();
  private lastEntryAt: Record<string, number> = {};
  private recentDecisions: DecisionRecord[] = [];
  private recentOrders: OrderRecord[] = [];
  private recentErrors: ErrorRecord[] = [];
  private lastRejection: DecisionRecord | null = null;

  private version = 0;
  private changedAt: number;
  private cached: StoreSnapshot | null = null;
  private readonly writeQueue = new PQueue({ concurrency: 1 });
  private readonly clock: Clock;
  private readonly historyLimit: number;
  private readonly persistence: StatePersistence;

  constructor(options: StateStoreOptions) {
    super();
    this.clock = options.clock ?? systemClock;
    this.riskConfig = RiskConfigSchema.parse(options.riskConfig);
    this.historyLimit = options.historyLimit;
    this.persistence = options.persistence;
    this.changedAt = this.clock();
    this.tradingDay = tradingDayOf(this.changedAt);
  }

  // Reads

  snapshot(): StoreSnapshot {
    if (this.cached && this.cached.version === this.version) {
      return this.cached;
    }
    const positions = [...this.positions.values()].map((position) => ({ ...position }));
    const unrealized = positions.reduce((sum, position) => sum.plus(position.unrealizedPnl), new Decimal(0));

    this.cached = deepFreeze({
      version: this.version,
      changedAt: this.changedAt,
      running: this.running,
      haltReason: this.haltReason,
      tradingDay: this.tradingDay,
      pnl: {
        realized: this.realizedPnl.toNumber(),
        unrealized: unrealized.toNumber(),
        total: this.realizedPnl.plus(unrealized).toNumber(),
      },
      positions,
      reservations: [...this.reservations.values()].map((reservation) => ({ ...reservation })),
      riskConfig: { ...this.riskConfig },
      lastEntryAt: { ...this.lastEntryAt },
      recentDecisions: [...this.recentDecisions],
      recentOrders: [...this.recentOrders],
      recentErrors: [...this.recentErrors],
      lastRejection: this.lastRejection,
    });
    return this.cached;
  }

  position(symbol: string): Position | undefined {
    const position = this.positions.get(symbol);
    return position ? { ...position } : undefined;
  }

  isRunning(): boolean {
    return this.running;
  }

  // Control mutations

  /** Explicit operator control. Starting clears any halt. */
  setRunning(running: boolean): void {
    this.running = running;
    if (running) {
      this.haltReason = null;
    }
    logger.info(running ? 'Trading started' : 'Trading stopped');
    this.commit(true);
  }

  halt(condition: HaltCondition): void {
    // First halt reason sticks until an explicit start
    if (!this.running && this.haltReason !== null) {
      return;
    }
    this.running = false;
    this.haltReason = condition.reason;
    this.commit(true);
    logger.error('Trading halted', { reason: condition.reason, dailyPnl: condition.dailyPnl });
    this.emit('halt', condition);
  }

  /**
   * Replace the risk configuration. Invalid input leaves the current
   * configuration untouched.
   */
  updateRiskConfig(raw: unknown): RiskConfig {
    const result = RiskConfigSchema.safeParse(raw);
    if (!result.success) {
      const error = new ConfigError(InputError.fromZod(result.error, 'risk config').message);
      this.recordError('config', error);
      throw error;
    }
    this.riskConfig = result.data;
    logger.info('Risk configuration updated', { riskConfig: result.data });
    this.commit(true);
    return result.data;
  }

  /** Start a new trading day on the UTC boundary. Halts stay in force. */
  rollDay(now: number = this.clock()): boolean {
    const day = tradingDayOf(now);
    if (day === this.tradingDay) {
      return false;
    }
    logger.info('Rolling trading day', {
      from: this.tradingDay,
      to: day,
      realizedPnl: this.realizedPnl.toNumber(),
    });
    this.tradingDay = day;
    this.realizedPnl = new Decimal(0);
    this.commit(true);
    return true;
  }

  // Slot reservations

  reserveSlot(reservation: Omit<Reservation, 'reservedAt'>): void {
    const reservedAt = this.clock();
    this.reservations.set(reservation.intentId, { ...reservation, reservedAt });
    this.lastEntryAt = { ...this.lastEntryAt, [reservation.symbol]: reservedAt };
    this.commit(true);
  }

  releaseSlot(intentId: string): void {
    if (this.reservations.delete(intentId)) {
      this.commit(false);
    }
  }

  // Position mutations

  openPosition(params: OpenPositionParams): Position {
    if (this.positions.has(params.symbol)) {
      throw new InputError(`Position already open for ${params.symbol}`, 'POSITION_EXISTS');
    }
    const position = this.createPosition(params, 0);
    this.commit(true);
    return { ...position };
  }

  /** Close the whole position at `exitPrice`, booking its PnL. */
  closePosition(symbol: string, exitPrice: number, fee: number = 0): FillOutcome {
    const position = this.positions.get(symbol);
    if (!position) {
      return { position: null, realizedPnl: 0, closed: false };
    }
    return this.applyFill({
      symbol,
      side: position.side === 'long' ? 'sell' : 'buy',
      price: exitPrice,
      quantity: position.quantity,
      fee,
      purpose: 'exit',
      notional: 0,
      timestamp: this.clock(),
    });
  }

  /**
   * Apply one execution. Same-side fills open or grow the symbol's single
   * position; opposite-side fills reduce it and book realized PnL, closing
   * it at zero. Opposite quantity beyond the open size is ignored.
   */
  applyFill(fill: FillApplication): FillOutcome {
    const side = sideOfOrder(fill.side);
    const existing = this.positions.get(fill.symbol);

    if (!existing) {
      if (fill.purpose === 'exit') {
        logger.warn('Exit fill without an open position', { symbol: fill.symbol });
        return { position: null, realizedPnl: 0, closed: false };
      }
      const position = this.createPosition(
        {
          symbol: fill.symbol,
          side,
          entryPrice: fill.price,
          quantity: fill.quantity,
          notional: fill.notional,
          stopLoss: fill.stopLoss ?? null,
          takeProfit: fill.takeProfit ?? null,
          openedAt: fill.timestamp,
        },
        -fill.fee
      );
      this.realizedPnl = this.realizedPnl.minus(fill.fee);
      this.commit(true);
      return { position: { ...position }, realizedPnl: -fill.fee, closed: false };
    }

    if (existing.side === side) {
      const quantity = new Decimal(existing.quantity).plus(fill.quantity);
      const entryPrice = new Decimal(existing.entryPrice)
        .times(existing.quantity)
        .plus(new Decimal(fill.price).times(fill.quantity))
        .div(quantity);
      const grown: Position = {
        ...existing,
        quantity: quantity.toNumber(),
        entryPrice: entryPrice.toNumber(),
        notional: new Decimal(existing.notional).plus(fill.notional).toNumber(),
        markPrice: fill.price,
        realizedPnl: new Decimal(existing.realizedPnl).minus(fill.fee).toNumber(),
        stopLoss: fill.stopLoss ?? existing.stopLoss,
        takeProfit: fill.takeProfit ?? existing.takeProfit,
      };
      grown.unrealizedPnl = unrealizedOf(grown.side, grown.entryPrice, grown.markPrice, grown.quantity);
      this.positions.set(grown.symbol, grown);
      this.realizedPnl = this.realizedPnl.minus(fill.fee);
      this.commit(true);
      return { position: { ...grown }, realizedPnl: -fill.fee, closed: false };
    }

    const closing = Decimal.min(fill.quantity, existing.quantity);
    if (closing.lt(fill.quantity)) {
      logger.warn('Reducing fill exceeds open quantity', {
        symbol: fill.symbol,
        open: existing.quantity,
        filled: fill.quantity,
      });
    }
    const move = new Decimal(fill.price).minus(existing.entryPrice).times(closing);
    const pnl = (existing.side === 'long' ? move : move.neg()).minus(fill.fee);
    const remaining = new Decimal(existing.quantity).minus(closing);
    this.realizedPnl = this.realizedPnl.plus(pnl);

    if (remaining.lte(QUANTITY_EPSILON)) {
      this.positions.delete(existing.symbol);
      logger.info('Position closed', {
        positionId: existing.id,
        symbol: existing.symbol,
        exitPrice: fill.price,
        realizedPnl: new Decimal(existing.realizedPnl).plus(pnl).toNumber(),
      });
      this.commit(true);
      return { position: null, realizedPnl: pnl.toNumber(), closed: true };
    }

    const reduced: Position = {
      ...existing,
      quantity: remaining.toNumber(),
      notional: new Decimal(existing.notional).times(remaining).div(existing.quantity).toNumber(),
      markPrice: fill.price,
      realizedPnl: new Decimal(existing.realizedPnl).plus(pnl).toNumber(),
    };
    reduced.unrealizedPnl = unrealizedOf(reduced.side, reduced.entryPrice, reduced.markPrice, reduced.quantity);
    this.positions.set(reduced.symbol, reduced);
    this.commit(true);
    return { position: { ...reduced }, realizedPnl: pnl.toNumber(), closed: false };
  }

  updateMarkPrice(symbol: string, markPrice: number): void {
    const position = this.positions.get(symbol);
    if (!position || position.markPrice === markPrice) {
      return;
    }
    this.positions.set(symbol, {
      ...position,
      markPrice,
      unrealizedPnl: unrealizedOf(position.side, position.entryPrice, markPrice, position.quantity),
    });
    this.commit(true);
  }

  // Observability records (kept in memory only)

  recordDecision(verdict: RiskVerdict): DecisionRecord {
    const record: DecisionRecord = {
      intentId: verdict.intent.id,
      symbol: verdict.intent.symbol,
      direction: verdict.intent.direction,
      confidence: verdict.intent.confidence,
      requestedSize: verdict.intent.size,
      outcome: verdict.outcome,
      adjustedSize: verdict.adjustedSize,
      reason: verdict.outcome === 'rejected' ? verdict.reason : null,
      message: verdict.outcome === 'rejected' ? verdict.message : null,
      at: verdict.validatedAt,
    };
    this.recentDecisions = pushBounded(this.recentDecisions, record, this.historyLimit);
    if (verdict.outcome === 'rejected') {
      this.lastRejection = record;
    }
    this.commit(false);
    return record;
  }

  /** Insert or update the order's entry, moving it to the front. */
  recordOrder(record: OrderRecord): void {
    const others = this.recentOrders.filter((order) => order.clientOrderId !== record.clientOrderId);
    this.recentOrders = pushBounded(others, record, this.historyLimit);
    this.commit(false);
  }

  recordError(source: string, error: unknown): ErrorRecord {
    const record: ErrorRecord = {
      source,
      code: codeOf(error),
      message: errorMessage(error),
      at: this.clock(),
    };
    this.recentErrors = pushBounded(this.recentErrors, record, this.historyLimit);
    this.commit(false);
    return record;
  }

  // Persistence

  /** Restore durable state. Trading stays stopped until an explicit start. */
  hydrate(state: PersistedState): void {
    this.running = false;
    this.haltReason = state.haltReason;
    this.tradingDay = state.tradingDay;
    this.realizedPnl = new Decimal(state.realizedPnl);
    this.riskConfig = RiskConfigSchema.parse(state.riskConfig);
    this.positions.clear();
    for (const position of state.positions) {
      this.positions.set(position.symbol, { ...position });
    }
    this.lastEntryAt = { ...state.lastEntryAt };
    logger.info('State hydrated', {
      tradingDay: state.tradingDay,
      positions: state.positions.length,
      haltReason: state.haltReason,
    });
    this.commit(false);
  }

  async load(): Promise<boolean> {
    const state = await this.persistence.load();
    if (!state) {
      return false;
    }
    this.hydrate(state);
    return true;
  }

  /** Resolves once every queued write has reached the persistence driver. */
  async flush(): Promise<void> {
    await this.writeQueue.onIdle();
  }

  private persisted(): PersistedState {
    return {
      running: this.running,
      haltReason: this.haltReason,
      tradingDay: this.tradingDay,
      realizedPnl: this.realizedPnl.toNumber(),
      riskConfig: { ...this.riskConfig },
      positions: [...this.positions.values()].map((position) => ({ ...position })),
      lastEntryAt: { ...this.lastEntryAt },
    };
  }

  private createPosition(params: OpenPositionParams, realizedPnl: number): Position {
    const position: Position = {
      id: uuidv4(),
      symbol: params.symbol,
      side: params.side,
      entryPrice: params.entryPrice,
      quantity: params.quantity,
      notional: params.notional,
      openedAt: params.openedAt,
      markPrice: params.entryPrice,
      unrealizedPnl: 0,
      realizedPnl,
      stopLoss: params.stopLoss,
      takeProfit: params.takeProfit,
    };
    this.positions.set(position.symbol, position);
    logger.info('Position opened', {
      positionId: position.id,
      symbol: position.symbol,
      side: position.side,
      quantity: position.quantity,
      entryPrice: position.entryPrice,
    });
    return position;
  }

  private commit(durable: boolean): void {
    this.version += 1;
    this.changedAt = this.clock();
    if (durable) {
      const state = this.persisted();
      this.writeQueue
        .add(() => this.persistence.save(state))
        .catch((error: unknown) => {
          logger.error('Failed to persist engine state', { error: errorMessage(error) });
          this.recordError('persistence', error);
        });
    }
    this.emit('change', this.version);
  }
}
