import { z } from 'zod';
import lexiconData from '../config/sentiment-lexicon.json';
import { PhraseMatcher } from '../utils/text';

export interface SentimentScore {
  score: number;
  confidence: number;
}

/** Pluggable text scorer; implementations must stay within [-1, 1]. */
export interface SentimentScorer {
  score(text: string): SentimentScore;
}

const LexiconSchema = z.record(z.number().min(-4).max(4));

export const defaultLexicon: Record<string, number> = LexiconSchema.parse(lexiconData);

// Normalization constant for the summed weights; ±15 maps to about ±0.97
const ALPHA = 15;

/**
 * Sums crypto-domain phrase weights and squashes the total into [-1, 1].
 * Confidence is the strength of the result regardless of sign.
 */
export class LexiconSentimentScorer implements SentimentScorer {
  private readonly matcher: PhraseMatcher<number>;

  constructor(lexicon: Record<string, number> = defaultLexicon) {
    this.matcher = new PhraseMatcher(Object.entries(lexicon));
  }

  score(text: string): SentimentScore {
    const total = this.matcher.match(text).reduce((sum, weight) => sum + weight, 0);
    if (total === 0) {
      return { score: 0, confidence: 0 };
    }
    const score = total / Math.sqrt(total * total + ALPHA);
    return { score, confidence: Math.abs(score) };
  }
}
