import type { OrderBookSnapshot, Quote } from '@perp-scalper/domain';

/** Latest top of book per symbol, read by the risk engine's slippage check. */
export class QuoteBoard {
  private readonly quotes = new Map<string, Quote>();

  update(book: OrderBookSnapshot): Quote {
    const quote = { symbol: book.symbol, bestBid: book.bestBid, bestAsk: book.bestAsk, timestamp: book.timestamp };
    this.quotes.set(book.symbol, quote);
    return quote;
  }

  get(symbol: string): Quote | null {
    return this.quotes.get(symbol) ?? null;
  }

  mid(symbol: string): number | null {
    const quote = this.quotes.get(symbol);
    return quote ? (quote.bestBid + quote.bestAsk) / 2 : null;
  }
}
