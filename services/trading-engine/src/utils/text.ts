/** Lowercased word tokens; `$` and `#` prefixes survive so tickers and tags stay distinct. */
export const tokenize = (text: string): string[] =>
  text
    .toLowerCase()
    .replace(/[^a-z0-9$#\s]/g, ' ')
    .split(/\s+/)
    .filter((token) => token.length > 0);

interface Phrase<T> {
  tokens: string[];
  value: T;
}

/**
 * Greedy left-to-right phrase matcher over word tokens. At each position
 * the longest phrase wins and its tokens are consumed.
 */
export class PhraseMatcher<T> {
  private readonly phrases: Phrase<T>[];

  constructor(entries: Iterable<readonly [string, T]>) {
    this.phrases = Array.from(entries, ([phrase, value]) => ({ tokens: tokenize(phrase), value }))
      .filter((phrase) => phrase.tokens.length > 0)
      .sort((a, b) => b.tokens.length - a.tokens.length || b.tokens.join(' ').length - a.tokens.join(' ').length);
  }

  get size(): number {
    return this.phrases.length;
  }

  match(text: string): T[] {
    const tokens = tokenize(text);
    const found: T[] = [];
    let i = 0;
    while (i < tokens.length) {
      const phrase = this.phrases.find((candidate) =>
        candidate.tokens.every((token, offset) => tokens[i + offset] === token)
      );
      if (phrase) {
        found.push(phrase.value);
        i += phrase.tokens.length;
      } else {
        i += 1;
      }
    }
    return found;
  }
}
