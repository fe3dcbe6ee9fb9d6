import Decimal from 'decimal.js';
import pRetry, { AbortError } from 'p-retry';
import type { ApprovedVerdict, OrderRecord, OrderSide, OrderStatus } from '@perp-scalper/domain';
import type { CancelEvent, ExchangeClient, ExitInstruction, FillEvent, OrderRequest } from '../types';
import {
  TerminalExecutionError,
  TransientExecutionError,
  classifyExecutionError,
  errorMessage,
} from '../utils/errors';
import { createLogger } from '../utils/logger';
import { systemClock, type Clock } from '../utils/time';
import type { StateStore } from './state-store';

const logger = createLogger('execution-gateway');

// Base-quantity precision for entry orders
const QUANTITY_DECIMALS = 6;
const COMPLETED_ENTRY_MEMORY = 1_000;

export interface ExecutionGatewayOptions {
  maxAttempts: number;
  minBackoffMs: number;
  maxBackoffMs: number;
  fillTimeoutMs: number;
}

export type ExecutionStatus = 'filled' | 'partially-filled' | 'cancelled' | 'failed';

export interface ExecutionResult {
  clientOrderId: string;
  orderId: string | null;
  status: ExecutionStatus;
  filledQuantity: number;
  averagePrice: number | null;
  error?: string;
}

interface TrackedOrder {
  request: OrderRequest;
  purpose: 'entry' | 'exit';
  intentId: string | null;
  /** Risk units per base unit, so entry fills carry their share of the approved size. */
  notionalPerUnit: Decimal;
  stopLoss: number | null;
  takeProfit: number | null;
  orderId: string | null;
  filled: Decimal;
  cost: Decimal;
  controller: AbortController;
  timer: NodeJS.Timeout | null;
  result: ExecutionResult | null;
  cancelRequested: boolean;
  settle: (result: ExecutionResult) => void;
  done: Promise<ExecutionResult>;
}

export const entryKey = (intentId: string): string => `entry-${intentId}`;
export const exitKey = (positionId: string): string => `exit-${positionId}`;

/**
 * Sole writer of orders. Each approved verdict (or exit instruction)
 * becomes exactly one order keyed by a client order id derived from its
 * identity; repeated calls share the first submission and retries reuse
 * the same id.
 */
export class ExecutionGateway {
  private readonly submissions = new Map<string, Promise<ExecutionResult>>();
  private readonly orders = new Map<string, TrackedOrder>();
  private readonly exitAttempts = new Map<string, number>();
  private readonly onFill = (fill: FillEvent) => this.handleFill(fill);
  private readonly onCancel = (cancel: CancelEvent) => this.handleCancel(cancel);

  constructor(
    private readonly exchange: ExchangeClient,
    private readonly store: StateStore,
    private readonly options: ExecutionGatewayOptions,
    private readonly clock: Clock = systemClock
  ) {
    exchange.on('fill', this.onFill);
    exchange.on('cancel', this.onCancel);
  }

  get inFlight(): number {
    let count = 0;
    for (const order of this.orders.values()) {
      if (!order.result) count += 1;
    }
    return count;
  }

  execute(verdict: ApprovedVerdict): Promise<ExecutionResult> {
    const key = entryKey(verdict.intent.id);
    const existing = this.submissions.get(key);
    if (existing) {
      logger.debug('Duplicate execute call joined existing submission', { clientOrderId: key });
      return existing;
    }

    const { intent } = verdict;
    const maxSlippageBps = this.store.snapshot().riskConfig.maxSlippageBps;
    const quantity = new Decimal(verdict.adjustedSize)
      .div(intent.referencePrice)
      .toDecimalPlaces(QUANTITY_DECIMALS, Decimal.ROUND_DOWN);
    const tolerance = new Decimal(maxSlippageBps).div(10_000);
    const limitPrice = new Decimal(intent.referencePrice)
      .times(intent.direction === 'long' ? tolerance.plus(1) : new Decimal(1).minus(tolerance))
      .toDecimalPlaces(8)
      .toNumber();

    const side: OrderSide = intent.direction === 'long' ? 'buy' : 'sell';
    const promise = quantity.lte(0)
      ? this.rejectUnsized(key, intent.symbol, side, intent.id)
      : this.run(
          this.track(
            {
              clientOrderId: key,
              symbol: intent.symbol,
              side,
              type: 'limit',
              quantity: quantity.toNumber(),
              price: limitPrice,
              timeInForce: 'GTC',
              reduceOnly: false,
            },
            {
              purpose: 'entry',
              intentId: intent.id,
              notionalPerUnit: new Decimal(verdict.adjustedSize).div(quantity),
              stopLoss: verdict.stopLoss,
              takeProfit: verdict.takeProfit,
            }
          )
        );

    this.submissions.set(key, promise);
    this.forgetOldEntries();
    return promise;
  }

  /** Reduce-only market exit; at most one in flight per position. */
  exit(instruction: ExitInstruction): Promise<ExecutionResult> {
    const key = exitKey(instruction.positionId);
    const existing = this.submissions.get(key);
    if (existing) {
      return existing;
    }

    // A partially filled exit may be followed by another one for the same position
    const attempt = (this.exitAttempts.get(instruction.positionId) ?? 0) + 1;
    this.exitAttempts.set(instruction.positionId, attempt);
    const clientOrderId = `${key}-${attempt}`;

    logger.info('Submitting exit', {
      positionId: instruction.positionId,
      symbol: instruction.symbol,
      reason: instruction.reason,
      clientOrderId,
    });
    const promise = this.run(
      this.track(
        {
          clientOrderId,
          symbol: instruction.symbol,
          side: instruction.side,
          type: 'market',
          quantity: instruction.quantity,
          timeInForce: 'IOC',
          reduceOnly: true,
        },
        { purpose: 'exit', intentId: null, notionalPerUnit: new Decimal(0), stopLoss: null, takeProfit: null }
      )
    ).finally(() => {
      this.submissions.delete(key);
    });
    this.submissions.set(key, promise);
    return promise;
  }

  /**
   * Stop retries and cancel every unfinished order (optionally for one
   * symbol). Fills already confirmed stay applied.
   */
  async cancelOutstanding(symbol?: string): Promise<number> {
    const targets = [...this.orders.values()].filter(
      (order) => !order.result && (symbol === undefined || order.request.symbol === symbol)
    );
    await Promise.all(targets.map((order) => this.cancel(order, 'Cancelled by stop request')));
    if (targets.length > 0) {
      logger.info('Cancelled outstanding orders', { count: targets.length, symbol: symbol ?? 'all' });
    }
    return targets.length;
  }

  detach(): void {
    this.exchange.off('fill', this.onFill);
    this.exchange.off('cancel', this.onCancel);
  }

  private track(
    request: OrderRequest,
    meta: Pick<TrackedOrder, 'purpose' | 'intentId' | 'notionalPerUnit' | 'stopLoss' | 'takeProfit'>
  ): TrackedOrder {
    let settle: (result: ExecutionResult) => void = () => undefined;
    const done = new Promise<ExecutionResult>((resolve) => {
      settle = resolve;
    });
    const order: TrackedOrder = {
      request,
      ...meta,
      orderId: null,
      filled: new Decimal(0),
      cost: new Decimal(0),
      controller: new AbortController(),
      timer: null,
      result: null,
      cancelRequested: false,
      settle,
      done,
    };
    // Registered before submission so fills racing the ack are matched
    this.orders.set(request.clientOrderId, order);
    this.recordOrder(order, 'submitted', null);
    return order;
  }

  private async run(order: TrackedOrder): Promise<ExecutionResult> {
    const { request } = order;
    try {
      const ack = await pRetry(
        async () => {
          try {
            const response = await this.exchange.submitOrder(request);
            order.orderId = response.orderId;
            if (order.cancelRequested) {
              // Ack landed after a cancel; make sure the order does not stay live
              await this.exchange.cancelOrder(request.symbol, request.clientOrderId);
            }
            return response;
          } catch (error) {
            if (classifyExecutionError(error) === 'terminal') {
              throw new AbortError(
                error instanceof Error ? error : new TerminalExecutionError(errorMessage(error))
              );
            }
            throw error;
          }
        },
        {
          retries: this.options.maxAttempts - 1,
          factor: 2,
          minTimeout: this.options.minBackoffMs,
          maxTimeout: this.options.maxBackoffMs,
          signal: order.controller.signal,
          onFailedAttempt: (error) => {
            logger.warn('Order submission attempt failed', {
              clientOrderId: request.clientOrderId,
              attempt: error.attemptNumber,
              retriesLeft: error.retriesLeft,
              error: error.message,
            });
          },
        }
      );

      if (!order.result) {
        logger.info('Order acknowledged', {
          clientOrderId: request.clientOrderId,
          orderId: ack.orderId,
          duplicate: ack.duplicate,
        });
        this.awaitFills(order);
      }
    } catch (error) {
      if (!order.result) {
        const failure =
          classifyExecutionError(error) === 'transient'
            ? new TransientExecutionError(
                `Submission failed after ${this.options.maxAttempts} attempts: ${errorMessage(error)}`,
                this.options.maxAttempts
              )
            : error;
        this.fail(order, failure);
      }
    }
    return order.done;
  }

  private awaitFills(order: TrackedOrder): void {
    if (order.result) return;
    if (order.filled.gte(order.request.quantity)) {
      this.finish(order, 'filled');
      return;
    }
    order.timer = setTimeout(() => {
      order.timer = null;
      logger.warn('Fill timeout, cancelling remainder', {
        clientOrderId: order.request.clientOrderId,
        filled: order.filled.toNumber(),
        quantity: order.request.quantity,
      });
      this.cancel(order, 'Fill timeout').catch((error: unknown) => {
        this.store.recordError('execution', error);
      });
    }, this.options.fillTimeoutMs);
  }

  private async cancel(order: TrackedOrder, reason: string): Promise<void> {
    if (order.result) return;
    order.cancelRequested = true;
    order.controller.abort(new TerminalExecutionError(reason, 'CANCELLED'));
    if (order.orderId) {
      try {
        await this.exchange.cancelOrder(order.request.symbol, order.request.clientOrderId);
      } catch (error) {
        logger.error('Cancel request failed', {
          clientOrderId: order.request.clientOrderId,
          error: errorMessage(error),
        });
        this.store.recordError('execution', error);
      }
    }
    this.finish(order, order.filled.gt(0) ? 'partially-filled' : 'cancelled', reason);
  }

  private handleFill(fill: FillEvent): void {
    const order = this.orders.get(fill.clientOrderId);
    if (!order) {
      logger.warn('Fill for unknown order', { clientOrderId: fill.clientOrderId, symbol: fill.symbol });
      return;
    }

    order.filled = order.filled.plus(fill.quantity);
    order.cost = order.cost.plus(new Decimal(fill.price).times(fill.quantity));
    if (order.orderId === null) {
      order.orderId = fill.orderId;
    }

    this.store.applyFill({
      symbol: fill.symbol,
      side: fill.side,
      price: fill.price,
      quantity: fill.quantity,
      fee: fill.fee,
      purpose: order.purpose,
      notional: order.notionalPerUnit.times(fill.quantity).toNumber(),
      stopLoss: order.stopLoss,
      takeProfit: order.takeProfit,
      timestamp: fill.timestamp,
    });

    if (order.result) {
      // Late fill after cancel or timeout: the position reflects it, the result does not change
      logger.warn('Fill arrived after order completion', { clientOrderId: fill.clientOrderId });
      return;
    }

    if (fill.remaining <= 0 || order.filled.gte(order.request.quantity)) {
      this.finish(order, 'filled');
    } else {
      this.recordOrder(order, 'partially-filled', null);
    }
  }

  private handleCancel(cancel: CancelEvent): void {
    const order = this.orders.get(cancel.clientOrderId);
    if (!order || order.result) return;
    order.controller.abort(new TerminalExecutionError('Cancelled by venue', 'CANCELLED'));
    this.finish(order, order.filled.gt(0) ? 'partially-filled' : 'cancelled', 'Cancelled by venue');
  }

  private fail(order: TrackedOrder, error: unknown): void {
    logger.error('Order submission failed', {
      clientOrderId: order.request.clientOrderId,
      error: errorMessage(error),
    });
    this.store.recordError('execution', error);
    this.finish(order, 'failed', errorMessage(error));
  }

  private finish(order: TrackedOrder, status: ExecutionStatus, reason?: string): void {
    if (order.result) return;
    if (order.timer) {
      clearTimeout(order.timer);
      order.timer = null;
    }
    order.result = {
      clientOrderId: order.request.clientOrderId,
      orderId: order.orderId,
      status,
      filledQuantity: order.filled.toNumber(),
      averagePrice: this.averagePrice(order),
      ...(reason ? { error: reason } : {}),
    };
    if (order.intentId) {
      this.store.releaseSlot(order.intentId);
    }
    this.recordOrder(order, status, reason ?? null);
    logger.info('Order finished', {
      clientOrderId: order.request.clientOrderId,
      status,
      filled: order.result.filledQuantity,
    });
    order.settle(order.result);
  }

  private async rejectUnsized(
    clientOrderId: string,
    symbol: string,
    side: OrderSide,
    intentId: string
  ): Promise<ExecutionResult> {
    const error = new TerminalExecutionError('Order quantity rounds to zero', 'QUANTITY_TOO_SMALL');
    this.store.releaseSlot(intentId);
    this.store.recordError('execution', error);
    this.store.recordOrder({
      clientOrderId,
      orderId: null,
      symbol,
      side,
      purpose: 'entry',
      quantity: 0,
      filledQuantity: 0,
      averagePrice: null,
      status: 'failed',
      reason: error.message,
      at: this.clock(),
    });
    return {
      clientOrderId,
      orderId: null,
      status: 'failed',
      filledQuantity: 0,
      averagePrice: null,
      error: error.message,
    };
  }

  private averagePrice(order: TrackedOrder): number | null {
    return order.filled.gt(0) ? order.cost.div(order.filled).toDecimalPlaces(8).toNumber() : null;
  }

  private recordOrder(order: TrackedOrder, status: OrderStatus, reason: string | null): void {
    const record: OrderRecord = {
      clientOrderId: order.request.clientOrderId,
      orderId: order.orderId,
      symbol: order.request.symbol,
      side: order.request.side,
      purpose: order.purpose,
      quantity: order.request.quantity,
      filledQuantity: order.filled.toNumber(),
      averagePrice: this.averagePrice(order),
      status,
      reason,
      at: this.clock(),
    };
    this.store.recordOrder(record);
  }

  private forgetOldEntries(): void {
    if (this.orders.size <= COMPLETED_ENTRY_MEMORY) return;
    for (const [key, order] of this.orders) {
      if (this.orders.size <= COMPLETED_ENTRY_MEMORY) break;
      if (order.result) {
        this.orders.delete(key);
        this.submissions.delete(key);
      }
    }
  }
}
