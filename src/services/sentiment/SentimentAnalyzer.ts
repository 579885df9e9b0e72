/// <reference path="../../types/vader-sentiment.d.ts" />
import vader from 'vader-sentiment';

/**
 * Maps free text to a compound polarity score in [-1, 1]
 */
export interface SentimentAnalyzer {
  score(text: string): number;
}

/**
 * SentimentAnalyzer backed by the VADER lexicon
 */
export class VaderSentimentAnalyzer implements SentimentAnalyzer {
  score(text: string): number {
    if (!text.trim()) {
      return 0;
    }
    const { compound } = vader.SentimentIntensityAnalyzer.polarity_scores(text);
    if (!Number.isFinite(compound)) {
      return 0;
    }
    return Math.max(-1, Math.min(1, compound));
  }
}
