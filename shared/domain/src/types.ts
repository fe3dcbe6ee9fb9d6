// Core domain types for the perp scalper
import { z } from 'zod';

// Enums
export const DirectionSchema = z.enum(['long', 'short', 'flat']);
export const PositionSideSchema = z.enum(['long', 'short']);
export const OrderSideSchema = z.enum(['buy', 'sell']);

export type Direction = z.infer<typeof DirectionSchema>;
export type PositionSide = z.infer<typeof PositionSideSchema>;
export type OrderSide = z.infer<typeof OrderSideSchema>;

// Exchange symbols are matched case-insensitively and carried upper-case
export const SymbolSchema = z.string().trim().min(1).toUpperCase();

// Order book
export const PriceLevelSchema = z.tuple([
  z.number().positive().finite(),
  z.number().nonnegative().finite(),
]);

export type PriceLevel = z.infer<typeof PriceLevelSchema>;

const isStrictlyOrdered = (levels: PriceLevel[], descending: boolean): boolean =>
  levels.every((level, i) => {
    if (i === 0) return true;
    const previous = levels[i - 1][0];
    return descending ? level[0] < previous : level[0] > previous;
  });

export const OrderBookSnapshotSchema = z
  .object({
    symbol: SymbolSchema,
    timestamp: z.number().int().nonnegative(),
    bids: z.array(PriceLevelSchema).min(1, 'book has no bids'),
    asks: z.array(PriceLevelSchema).min(1, 'book has no asks'),
  })
  .superRefine((book, ctx) => {
    if (!isStrictlyOrdered(book.bids, true)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['bids'], message: 'bids must be strictly descending' });
    }
    if (!isStrictlyOrdered(book.asks, false)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['asks'], message: 'asks must be strictly ascending' });
    }
    if (book.bids.length > 0 && book.asks.length > 0 && book.bids[0][0] >= book.asks[0][0]) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['bids'], message: 'book is crossed' });
    }
  })
  .transform((book) => ({
    ...book,
    bestBid: book.bids[0][0],
    bestAsk: book.asks[0][0],
  }));

export type OrderBookSnapshot = Readonly<z.output<typeof OrderBookSnapshotSchema>>;

export interface Quote {
  symbol: string;
  bestBid: number;
  bestAsk: number;
  timestamp: number;
}

export interface MarketSignal {
  symbol: string;
  timestamp: number;
  direction: Direction;
  magnitude: number; // 0..1
  imbalance: number; // -1..1, positive = bid pressure
  bestBid: number;
  bestAsk: number;
  referencePrice: number;
}

// Sentiment
export const SentimentSignalSchema = z.object({
  symbol: SymbolSchema,
  timestamp: z.number().int().nonnegative(),
  source: z.string().min(1),
  score: z.number().min(-1).max(1),
  confidence: z.number().min(0).max(1),
});

export type SentimentSignal = z.infer<typeof SentimentSignalSchema>;

// Raw social/news text before symbol mapping and scoring
export const SocialPostSchema = z.object({
  source: z.string().min(1),
  text: z.string(),
  timestamp: z.number().int().nonnegative(),
  symbolHint: z.string().optional(),
  url: z.string().optional(),
  author: z.string().optional(),
});

export type SocialPost = z.infer<typeof SocialPostSchema>;

export const TrendSourceSchema = z.enum(['live', 'simulated', 'stale']);
export type TrendSource = z.infer<typeof TrendSourceSchema>;

export interface TrendScore {
  symbol: string;
  timestamp: number;
  score: number; // -1..1
  source: TrendSource;
  sampleCount: number;
}

// Decisions
export interface IntentProvenance {
  marketSignal: MarketSignal;
  trendScore: TrendScore;
  driver: 'market' | 'trend';
  disagreement: boolean;
}

export interface TradeIntent {
  id: string;
  symbol: string;
  direction: PositionSide;
  size: number; // quote-currency risk units
  confidence: number;
  referencePrice: number;
  timestamp: number;
  provenance: IntentProvenance;
}

export const RejectionReasonSchema = z.enum([
  'stopped',
  'daily-loss',
  'daily-profit-target',
  'position-count',
  'size',
  'slippage',
  'cooldown',
]);

export type RejectionReason = z.infer<typeof RejectionReasonSchema>;

export interface ApprovedVerdict {
  outcome: 'approved';
  intent: TradeIntent;
  adjustedSize: number;
  stopLoss: number;
  takeProfit: number;
  validatedAt: number;
}

export interface RejectedVerdict {
  outcome: 'rejected';
  intent: TradeIntent;
  reason: RejectionReason;
  message: string;
  adjustedSize: 0;
  validatedAt: number;
}

export type RiskVerdict = ApprovedVerdict | RejectedVerdict;

// Positions
export const PositionSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  side: PositionSideSchema,
  entryPrice: z.number().positive(),
  quantity: z.number().positive(),
  notional: z.number().nonnegative(),
  openedAt: z.number().int(),
  markPrice: z.number().positive(),
  unrealizedPnl: z.number(),
  realizedPnl: z.number(),
  stopLoss: z.number().positive().nullable(),
  takeProfit: z.number().positive().nullable(),
});

export type Position = z.infer<typeof PositionSchema>;

// Risk configuration
export const RiskConfigSchema = z.object({
  dailyLossLimit: z.number().positive(),
  maxRiskPerTrade: z.number().positive(),
  maxConcurrentPositions: z.number().int().positive(),
  maxSlippageBps: z.number().nonnegative(),
  takeProfitBps: z.number().positive().default(50),
  stopLossBps: z.number().positive().default(25),
  dailyProfitTarget: z.number().positive().optional(),
  cooldownMs: z.number().int().nonnegative().default(60_000),
  allowPyramiding: z.boolean().default(false),
  liquidateOnHalt: z.boolean().default(true),
});

export type RiskConfig = z.output<typeof RiskConfigSchema>;
