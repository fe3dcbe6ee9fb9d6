import EventEmitter from 'eventemitter3';
import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import type { OrderBookSnapshot, PriceLevel } from '@perp-scalper/domain';
import type { ExchangeClient, ExchangeEvents, OrderAck, OrderRequest } from '../types';
import { ExchangeRequestError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { systemClock, type Clock } from '../utils/time';

const logger = createLogger('paper-exchange');

export interface PaperExchangeOptions {
  feeBps: number;
  clock?: Clock;
  /** Finished client order ids remembered for duplicate detection. */
  recentOrderLimit?: number;
}

const DEFAULT_RECENT_ORDER_LIMIT = 1000;

interface PaperOrder {
  orderId: string;
  request: OrderRequest;
  remaining: Decimal;
}

/**
 * In-process venue used when no live exchange client is configured.
 * Market orders walk the book; limit orders take at most the top level
 * per book update and rest the remainder.
 */
export class PaperExchange extends EventEmitter<ExchangeEvents> implements ExchangeClient {
  private readonly books = new Map<string, OrderBookSnapshot>();
  private readonly open = new Map<string, PaperOrder>();
  /** clientOrderId → orderId of filled or cancelled orders, oldest first. */
  private readonly finished = new Map<string, string>();
  private readonly netPositions = new Map<string, Decimal>();
  private readonly clock: Clock;
  private readonly recentOrderLimit: number;

  constructor(private readonly options: PaperExchangeOptions) {
    super();
    this.clock = options.clock ?? systemClock;
    this.recentOrderLimit = options.recentOrderLimit ?? DEFAULT_RECENT_ORDER_LIMIT;
  }

  netPosition(symbol: string): number {
    return this.netPositions.get(symbol)?.toNumber() ?? 0;
  }

  openOrders(symbol?: string): OrderRequest[] {
    return [...this.open.values()]
      .filter((order) => symbol === undefined || order.request.symbol === symbol)
      .map((order) => ({ ...order.request }));
  }

  updateBook(book: OrderBookSnapshot): void {
    this.books.set(book.symbol, book);
    for (const order of this.open.values()) {
      if (order.request.symbol === book.symbol) {
        this.match(order, book);
      }
    }
  }

  async submitOrder(request: OrderRequest): Promise<OrderAck> {
    const knownId = this.open.get(request.clientOrderId)?.orderId ?? this.finished.get(request.clientOrderId);
    if (knownId !== undefined) {
      return { orderId: knownId, clientOrderId: request.clientOrderId, duplicate: true };
    }
    if (!(request.quantity > 0)) {
      throw new ExchangeRequestError('Order quantity must be positive', 'INVALID_QUANTITY');
    }
    if (request.type === 'limit' && !(request.price !== undefined && request.price > 0)) {
      throw new ExchangeRequestError('Limit order requires a positive price', 'INVALID_PRICE');
    }

    let quantity = new Decimal(request.quantity);
    if (request.reduceOnly) {
      const net = this.netPositions.get(request.symbol) ?? new Decimal(0);
      const reducible = request.side === 'buy' ? Decimal.max(0, net.neg()) : Decimal.max(0, net);
      if (reducible.lte(0)) {
        throw new ExchangeRequestError('Reduce-only order would open a position', 'REDUCE_ONLY_REJECTED');
      }
      quantity = Decimal.min(quantity, reducible);
    }

    const book = this.books.get(request.symbol);
    if (request.type === 'market' && !book) {
      throw new ExchangeRequestError(`No liquidity for ${request.symbol}`, 'NO_LIQUIDITY');
    }

    const order: PaperOrder = { orderId: uuidv4(), request, remaining: quantity };
    this.open.set(request.clientOrderId, order);
    logger.debug('Paper order accepted', {
      orderId: order.orderId,
      clientOrderId: request.clientOrderId,
      symbol: request.symbol,
      side: request.side,
      type: request.type,
      quantity: quantity.toNumber(),
    });

    if (book) {
      this.match(order, book);
    }
    if (request.type === 'market' && this.open.has(request.clientOrderId)) {
      this.cancelRemaining(order);
    }
    return { orderId: order.orderId, clientOrderId: request.clientOrderId, duplicate: false };
  }

  async cancelOrder(symbol: string, clientOrderId: string): Promise<void> {
    const order = this.open.get(clientOrderId);
    if (order && order.request.symbol === symbol) {
      this.cancelRemaining(order);
      return;
    }
    // Cancelling a finished order is a no-op
    if (!order && this.finished.has(clientOrderId)) {
      return;
    }
    throw new ExchangeRequestError(`Unknown order ${clientOrderId}`, 'UNKNOWN_ORDER');
  }

  private match(order: PaperOrder, book: OrderBookSnapshot): void {
    const { request } = order;
    const levels: readonly PriceLevel[] = request.side === 'buy' ? book.asks : book.bids;
    const limit = request.price;
    const marketable = (price: number) =>
      request.type === 'market' || limit === undefined || (request.side === 'buy' ? price <= limit : price >= limit);

    // Limit orders take only the top level per update
    const available = request.type === 'market' ? levels : levels.slice(0, 1);
    for (const [price, size] of available) {
      if (order.remaining.lte(0) || !marketable(price)) break;
      const quantity = Decimal.min(order.remaining, size);
      if (quantity.lte(0)) continue;
      this.fill(order, price, quantity);
    }
  }

  private fill(order: PaperOrder, price: number, quantity: Decimal): void {
    const { request } = order;
    order.remaining = order.remaining.minus(quantity);
    if (order.remaining.lte(0)) {
      this.finish(order);
    }
    const signed = request.side === 'buy' ? quantity : quantity.neg();
    this.netPositions.set(request.symbol, (this.netPositions.get(request.symbol) ?? new Decimal(0)).plus(signed));

    const fee = new Decimal(price).times(quantity).times(this.options.feeBps).div(10_000);
    this.emit('fill', {
      orderId: order.orderId,
      clientOrderId: request.clientOrderId,
      symbol: request.symbol,
      side: request.side,
      price,
      quantity: quantity.toNumber(),
      fee: fee.toDecimalPlaces(8).toNumber(),
      remaining: order.remaining.toNumber(),
      timestamp: this.clock(),
    });
  }

  private finish(order: PaperOrder): void {
    const { clientOrderId } = order.request;
    this.open.delete(clientOrderId);
    this.finished.set(clientOrderId, order.orderId);
    if (this.finished.size > this.recentOrderLimit) {
      const oldest = this.finished.keys().next();
      if (!oldest.done) {
        this.finished.delete(oldest.value);
      }
    }
  }

  private cancelRemaining(order: PaperOrder): void {
    this.finish(order);
    this.emit('cancel', {
      orderId: order.orderId,
      clientOrderId: order.request.clientOrderId,
      remaining: order.remaining.toNumber(),
      timestamp: this.clock(),
    });
  }
}
