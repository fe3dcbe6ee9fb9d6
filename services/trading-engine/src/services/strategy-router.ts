import EventEmitter from 'eventemitter3';
import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import type { MarketSignal, PositionSide, TradeIntent, TrendScore } from '@perp-scalper/domain';
import { ConfigError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { neutralTrend } from './trend-aggregator';

const logger = createLogger('strategy-router');

export interface StrategyRouterOptions {
  /** Market magnitude at or above which the order book decides direction. */
  dominanceThreshold: number;
  /** |trend| strictly above which the trend may decide direction. */
  trendThreshold: number;
  marketWeight: number;
  trendWeight: number;
  /** Confidence multiplier when the two sources point opposite ways. */
  disagreementPenalty: number;
  baseOrderSize: number;
}

interface StrategyRouterEvents {
  intent: (intent: TradeIntent) => void;
}

const sideOfScore = (score: number): PositionSide => (score > 0 ? 'long' : 'short');

/**
 * Fuse one market signal with one trend score. Returns null when neither
 * source clears its threshold.
 */
export function fuseSignals(
  market: MarketSignal,
  trend: TrendScore,
  options: StrategyRouterOptions,
  id: string = uuidv4()
): TradeIntent | null {
  const marketClears = market.direction !== 'flat' && market.magnitude >= options.dominanceThreshold;
  const trendClears = Math.abs(trend.score) > options.trendThreshold;

  let direction: PositionSide;
  let driver: 'market' | 'trend';
  let disagreement = false;

  if (marketClears && market.direction !== 'flat') {
    direction = market.direction;
    driver = 'market';
    disagreement = trendClears && sideOfScore(trend.score) !== direction;
  } else if (trendClears) {
    direction = sideOfScore(trend.score);
    driver = 'trend';
  } else {
    return null;
  }

  let confidence = new Decimal(options.marketWeight)
    .times(market.magnitude)
    .plus(new Decimal(options.trendWeight).times(Math.abs(trend.score)));
  if (disagreement) {
    confidence = confidence.times(options.disagreementPenalty);
  }
  confidence = Decimal.min(1, confidence);

  return {
    id,
    symbol: market.symbol,
    direction,
    size: new Decimal(options.baseOrderSize).times(confidence).toNumber(),
    confidence: confidence.toNumber(),
    referencePrice: direction === 'long' ? market.bestAsk : market.bestBid,
    timestamp: Math.max(market.timestamp, trend.timestamp),
    provenance: { marketSignal: market, trendScore: trend, driver, disagreement },
  };
}

/**
 * Keeps the latest market signal and trend score per symbol and re-runs
 * fusion whenever either side updates.
 */
export class StrategyRouter extends EventEmitter<StrategyRouterEvents> {
  private readonly markets = new Map<string, MarketSignal>();
  private readonly trends = new Map<string, TrendScore>();

  constructor(private readonly options: StrategyRouterOptions) {
    super();
    if (Math.abs(options.marketWeight + options.trendWeight - 1) > 1e-9) {
      throw new ConfigError('marketWeight and trendWeight must sum to 1');
    }
  }

  onMarketSignal(signal: MarketSignal): TradeIntent | null {
    this.markets.set(signal.symbol, signal);
    return this.evaluate(signal.symbol);
  }

  onTrendScore(score: TrendScore): TradeIntent | null {
    this.trends.set(score.symbol, score);
    return this.evaluate(score.symbol);
  }

  latest(symbol: string): { market: MarketSignal | undefined; trend: TrendScore | undefined } {
    return { market: this.markets.get(symbol), trend: this.trends.get(symbol) };
  }

  evaluate(symbol: string): TradeIntent | null {
    const market = this.markets.get(symbol);
    if (!market) return null;

    const trend = this.trends.get(symbol) ?? neutralTrend(symbol, market.timestamp);
    const intent = fuseSignals(market, trend, this.options);
    if (intent) {
      logger.debug('Trade intent emitted', {
        intentId: intent.id,
        symbol,
        direction: intent.direction,
        confidence: intent.confidence,
        driver: intent.provenance.driver,
      });
      this.emit('intent', intent);
    }
    return intent;
  }
}
