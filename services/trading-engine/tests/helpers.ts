import EventEmitter from 'eventemitter3';
import type { MarketSignal, Position, RiskConfig, TradeIntent, TrendScore } from '@perp-scalper/domain';
import { StateStore } from '../src/services/state-store';
import { InMemoryStatePersistence } from '../src/services/state-persistence';
import type { ExchangeClient, ExchangeEvents, OrderAck, OrderRequest } from '../src/types';
import type { Clock } from '../src/utils/time';

// 2024-03-01T12:00:00.000Z
export const NOW = Date.UTC(2024, 2, 1, 12, 0, 0);

export const baseRiskConfig: RiskConfig = {
  dailyLossLimit: 100,
  maxRiskPerTrade: 50,
  maxConcurrentPositions: 2,
  maxSlippageBps: 50,
  takeProfitBps: 50,
  stopLossBps: 25,
  cooldownMs: 0,
  allowPyramiding: false,
  liquidateOnHalt: true,
};

export interface TestStore {
  store: StateStore;
  persistence: InMemoryStatePersistence;
}

export function createTestStore(
  risk: Partial<RiskConfig> = {},
  clock: Clock = () => NOW,
  historyLimit: number = 20
): TestStore {
  const persistence = new InMemoryStatePersistence();
  const store = new StateStore({
    riskConfig: { ...baseRiskConfig, ...risk },
    historyLimit,
    persistence,
    clock,
  });
  return { store, persistence };
}

export function marketSignal(overrides: Partial<MarketSignal> = {}): MarketSignal {
  return {
    symbol: 'BTCUSDT',
    timestamp: NOW,
    direction: 'long',
    magnitude: 0.9,
    imbalance: 0.9,
    bestBid: 99.9,
    bestAsk: 100,
    referencePrice: 100,
    ...overrides,
  };
}

export function trendScore(overrides: Partial<TrendScore> = {}): TrendScore {
  return {
    symbol: 'BTCUSDT',
    timestamp: NOW,
    score: 0,
    source: 'live',
    sampleCount: 1,
    ...overrides,
  };
}

export function tradeIntent(overrides: Partial<TradeIntent> = {}): TradeIntent {
  return {
    id: 'intent-1',
    symbol: 'BTCUSDT',
    direction: 'long',
    size: 40,
    confidence: 0.8,
    referencePrice: 100,
    timestamp: NOW,
    provenance: {
      marketSignal: marketSignal(),
      trendScore: trendScore({ source: 'stale', sampleCount: 0 }),
      driver: 'market',
      disagreement: false,
    },
    ...overrides,
  };
}

export const quoteOf =
  (bestBid: number, bestAsk: number) =>
  (symbol: string) => ({ symbol, bestBid, bestAsk, timestamp: NOW });

export function openTestPosition(store: StateStore, overrides: Partial<Position> = {}): Position {
  return store.openPosition({
    symbol: overrides.symbol ?? 'BTCUSDT',
    side: overrides.side ?? 'long',
    entryPrice: overrides.entryPrice ?? 100,
    quantity: overrides.quantity ?? 1,
    notional: overrides.notional ?? 50,
    stopLoss: overrides.stopLoss ?? null,
    takeProfit: overrides.takeProfit ?? null,
    openedAt: overrides.openedAt ?? NOW,
  });
}

export type ScriptedResponse = 'ack' | Error;

/**
 * Exchange double. Each submission consumes the next scripted response
 * (acknowledging once the script runs out); fills and cancels are pushed
 * by the test.
 */
export class ScriptedExchange extends EventEmitter<ExchangeEvents> implements ExchangeClient {
  readonly submitted: OrderRequest[] = [];
  readonly cancelled: string[] = [];
  readonly live = new Set<string>();
  responses: ScriptedResponse[] = [];

  async submitOrder(request: OrderRequest): Promise<OrderAck> {
    this.submitted.push({ ...request });
    const next = this.responses.shift() ?? 'ack';
    if (next instanceof Error) {
      throw next;
    }
    const duplicate = this.live.has(request.clientOrderId);
    this.live.add(request.clientOrderId);
    return { orderId: `venue-${request.clientOrderId}`, clientOrderId: request.clientOrderId, duplicate };
  }

  async cancelOrder(_symbol: string, clientOrderId: string): Promise<void> {
    this.cancelled.push(clientOrderId);
    this.live.delete(clientOrderId);
  }

  fill(request: OrderRequest, quantity: number, price: number, remaining: number, fee: number = 0): void {
    this.emit('fill', {
      orderId: `venue-${request.clientOrderId}`,
      clientOrderId: request.clientOrderId,
      symbol: request.symbol,
      side: request.side,
      price,
      quantity,
      fee,
      remaining,
      timestamp: NOW,
    });
  }
}
