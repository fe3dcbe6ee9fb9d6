/**
 * Event definitions and message schemas published by the trading engine
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  PositionSchema,
  PositionSideSchema,
  RejectionReasonSchema,
  RiskConfigSchema,
} from './types';

// Base event schema
export const BaseEventSchema = z.object({
  id: z.string(),
  type: z.string(),
  timestamp: z.string().datetime(),
  source: z.string(),
  version: z.string().default('1.0'),
});

export const DecisionRecordSchema = z.object({
  intentId: z.string(),
  symbol: z.string(),
  direction: PositionSideSchema,
  confidence: z.number(),
  requestedSize: z.number(),
  outcome: z.enum(['approved', 'rejected']),
  adjustedSize: z.number(),
  reason: RejectionReasonSchema.nullable(),
  message: z.string().nullable(),
  at: z.number().int(),
});

export const OrderStatusSchema = z.enum([
  'submitted',
  'filled',
  'partially-filled',
  'cancelled',
  'failed',
]);

export const OrderRecordSchema = z.object({
  clientOrderId: z.string(),
  orderId: z.string().nullable(),
  symbol: z.string(),
  side: z.enum(['buy', 'sell']),
  purpose: z.enum(['entry', 'exit']),
  quantity: z.number(),
  filledQuantity: z.number(),
  averagePrice: z.number().nullable(),
  status: OrderStatusSchema,
  reason: z.string().nullable(),
  at: z.number().int(),
});

export const ErrorRecordSchema = z.object({
  source: z.string(),
  code: z.string(),
  message: z.string(),
  at: z.number().int(),
});

export const SystemStateSchema = z.object({
  running: z.boolean(),
  haltReason: z.string().nullable(),
  tradingDay: z.string(),
  dailyPnl: z.object({
    realized: z.number(),
    unrealized: z.number(),
    total: z.number(),
  }),
  positions: z.array(PositionSchema),
  recentDecisions: z.array(DecisionRecordSchema),
  recentOrders: z.array(OrderRecordSchema),
  recentErrors: z.array(ErrorRecordSchema),
  lastRejection: DecisionRecordSchema.nullable(),
  riskConfig: RiskConfigSchema,
  timestamp: z.string().datetime(),
});

export const SystemStateEventSchema = BaseEventSchema.extend({
  type: z.literal('system.state'),
  data: SystemStateSchema,
});

export const HaltEventSchema = BaseEventSchema.extend({
  type: z.literal('engine.halted'),
  data: z.object({
    reason: z.string(),
    dailyPnl: z.number(),
  }),
});

// Type exports
export type BaseEvent = z.infer<typeof BaseEventSchema>;
export type DecisionRecord = z.infer<typeof DecisionRecordSchema>;
export type OrderStatus = z.infer<typeof OrderStatusSchema>;
export type OrderRecord = z.infer<typeof OrderRecordSchema>;
export type ErrorRecord = z.infer<typeof ErrorRecordSchema>;
export type SystemState = z.infer<typeof SystemStateSchema>;
export type SystemStateEvent = z.infer<typeof SystemStateEventSchema>;
export type HaltEvent = z.infer<typeof HaltEventSchema>;

export type EngineEvent = SystemStateEvent | HaltEvent;

// Event type constants
export const EventTypes = {
  SYSTEM_STATE: 'system.state',
  ENGINE_HALTED: 'engine.halted',
} as const;

// Event validation helpers
export const validateEvent = (event: unknown): EngineEvent => {
  const baseEvent = BaseEventSchema.parse(event);

  switch (baseEvent.type) {
    case EventTypes.SYSTEM_STATE:
      return SystemStateEventSchema.parse(event);
    case EventTypes.ENGINE_HALTED:
      return HaltEventSchema.parse(event);
    default:
      throw new Error(`Unknown event type: ${baseEvent.type}`);
  }
};

// Event creation helpers
export function createEvent(type: SystemStateEvent['type'], data: SystemState, source: string): SystemStateEvent;
export function createEvent(type: HaltEvent['type'], data: HaltEvent['data'], source: string): HaltEvent;
export function createEvent(
  type: EngineEvent['type'],
  data: EngineEvent['data'],
  source: string
): EngineEvent {
  const envelope = {
    id: randomUUID(),
    timestamp: new Date().toISOString(),
    source,
    version: '1.0',
  };
  return type === EventTypes.SYSTEM_STATE
    ? SystemStateEventSchema.parse({ ...envelope, type, data })
    : HaltEventSchema.parse({ ...envelope, type, data });
}
