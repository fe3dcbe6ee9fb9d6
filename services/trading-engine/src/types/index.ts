import type EventEmitter from 'eventemitter3';
import type { OrderSide } from '@perp-scalper/domain';

export type OrderType = 'limit' | 'market';
export type TimeInForce = 'GTC' | 'IOC';

/** Order request handed to the exchange client. */
export interface OrderRequest {
  clientOrderId: string;
  symbol: string;
  side: OrderSide;
  type: OrderType;
  quantity: number;
  /** Limit price; absent for market orders. */
  price?: number;
  timeInForce: TimeInForce;
  reduceOnly: boolean;
}

export interface OrderAck {
  orderId: string;
  clientOrderId: string;
  /** Set when the venue already knew the client order id. */
  duplicate: boolean;
}

export interface FillEvent {
  orderId: string;
  clientOrderId: string;
  symbol: string;
  side: OrderSide;
  price: number;
  quantity: number;
  fee: number;
  /** Quantity still open on the order after this fill. */
  remaining: number;
  timestamp: number;
}

export interface CancelEvent {
  orderId: string;
  clientOrderId: string;
  remaining: number;
  timestamp: number;
}

export interface ExchangeEvents {
  fill: (fill: FillEvent) => void;
  cancel: (cancel: CancelEvent) => void;
}

/**
 * Boundary to the exchange execution client. Submission must be
 * idempotent on `clientOrderId`; fills arrive asynchronously as events.
 */
export interface ExchangeClient extends EventEmitter<ExchangeEvents> {
  submitOrder(request: OrderRequest): Promise<OrderAck>;
  cancelOrder(symbol: string, clientOrderId: string): Promise<void>;
}

export type ExitReason = 'stop-loss' | 'take-profit' | 'liquidation';

export interface ExitInstruction {
  positionId: string;
  symbol: string;
  side: OrderSide;
  quantity: number;
  reason: ExitReason;
}
