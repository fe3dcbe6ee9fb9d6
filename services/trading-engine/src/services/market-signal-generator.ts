import Decimal from 'decimal.js';
import {
  OrderBookSnapshotSchema,
  type Direction,
  type MarketSignal,
  type OrderBookSnapshot,
  type PriceLevel,
} from '@perp-scalper/domain';
import { InputError, InvalidSnapshotError } from '../utils/errors';

export interface MarketSignalOptions {
  /** Number of top-of-book levels per side. */
  depth: number;
  longThreshold: number;
  shortThreshold: number;
}

const sumVolume = (levels: readonly PriceLevel[], depth: number): Decimal =>
  levels.slice(0, depth).reduce((total, [, size]) => total.plus(size), new Decimal(0));

/**
 * Order-book imbalance signal. Stateless: every call derives one signal
 * from one snapshot.
 */
export class MarketSignalGenerator {
  constructor(private readonly options: MarketSignalOptions) {
    if (options.shortThreshold > 0 || options.longThreshold < 0) {
      throw new RangeError('shortThreshold must be <= 0 and longThreshold >= 0');
    }
  }

  parse(raw: unknown): OrderBookSnapshot {
    const result = OrderBookSnapshotSchema.safeParse(raw);
    if (!result.success) {
      throw new InvalidSnapshotError(InputError.fromZod(result.error, 'order book snapshot').message);
    }
    return Object.freeze(result.data);
  }

  generate(raw: unknown): MarketSignal {
    return this.fromSnapshot(this.parse(raw));
  }

  fromSnapshot(book: OrderBookSnapshot): MarketSignal {
    const bidVolume = sumVolume(book.bids, this.options.depth);
    const askVolume = sumVolume(book.asks, this.options.depth);
    const total = bidVolume.plus(askVolume);

    const imbalance = total.isZero() ? 0 : bidVolume.minus(askVolume).div(total).toNumber();
    const direction = this.directionOf(imbalance);
    const mid = new Decimal(book.bestBid).plus(book.bestAsk).div(2).toNumber();

    return {
      symbol: book.symbol,
      timestamp: book.timestamp,
      direction,
      magnitude: Math.min(1, Math.max(0, Math.abs(imbalance))),
      imbalance,
      bestBid: book.bestBid,
      bestAsk: book.bestAsk,
      referencePrice: direction === 'long' ? book.bestAsk : direction === 'short' ? book.bestBid : mid,
    };
  }

  private directionOf(imbalance: number): Direction {
    if (imbalance > this.options.longThreshold) return 'long';
    if (imbalance < this.options.shortThreshold) return 'short';
    return 'flat';
  }
}
