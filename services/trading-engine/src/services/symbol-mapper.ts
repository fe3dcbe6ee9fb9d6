import { z } from 'zod';
import symbolMapData from '../config/symbol-map.json';
import { PhraseMatcher } from '../utils/text';

const SymbolMapSchema = z.record(z.array(z.string()));

export type SymbolMap = z.infer<typeof SymbolMapSchema>;

export const defaultSymbolMap: SymbolMap = SymbolMapSchema.parse(symbolMapData);

/**
 * Resolves free text to a tradable symbol through keyword lists
 * (`$TICKER`, `#tag`, project names).
 */
export class SymbolMapper {
  private readonly symbols: Set<string>;
  private readonly keywords: Map<string, string>;
  private readonly matcher: PhraseMatcher<string>;

  constructor(symbolMap: SymbolMap = defaultSymbolMap) {
    this.symbols = new Set(Object.keys(symbolMap).map((symbol) => symbol.toUpperCase()));
    this.keywords = new Map();
    for (const [symbol, keywords] of Object.entries(symbolMap)) {
      for (const keyword of keywords) {
        this.keywords.set(keyword.toLowerCase(), symbol.toUpperCase());
      }
    }
    this.matcher = new PhraseMatcher(this.keywords.entries());
  }

  /**
   * An explicit hint that names a known symbol or keyword wins; otherwise
   * the first keyword found in the text, longest phrase first.
   */
  resolve(text: string, hint?: string): string | null {
    if (hint) {
      const upper = hint.trim().toUpperCase();
      if (this.symbols.has(upper)) return upper;
      const keyword = this.keywords.get(hint.trim().toLowerCase());
      if (keyword) return keyword;
    }
    const [first] = this.matcher.match(text);
    return first ?? null;
  }
}
