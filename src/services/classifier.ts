import Sentiment from 'sentiment';
import { ECONOMICS_TERMS, ECONOMICS_TOPIC, OTHER_TOPIC } from '../constants/economics.js';
import type { Classification, HeadlineClassifier, SentimentLabel } from '../types.js';
import { containsTerm, normalizeHeadline } from '../utils/normalize.js';

export interface LexiconClassifierOptions {
  /** Comparative score beyond which a headline counts as positive or negative. */
  threshold?: number;
  terms?: readonly string[];
}

/**
 * Lexicon classifier: topic from the economics term list, sentiment from the
 * AFINN-based `sentiment` comparative score.
 */
export class LexiconClassifier implements HeadlineClassifier {
  private readonly analyzer = new Sentiment();
  private readonly threshold: number;
  private readonly terms: readonly string[];

  constructor(opts: LexiconClassifierOptions = {}) {
    this.threshold = opts.threshold ?? 0.05;
    this.terms = opts.terms ?? ECONOMICS_TERMS;
  }

  topicOf(headline: string): string {
    const normalized = normalizeHeadline(headline);
    return this.terms.some((term) => containsTerm(normalized, term)) ? ECONOMICS_TOPIC : OTHER_TOPIC;
  }

  sentimentOf(headline: string): SentimentLabel {
    const { comparative } = this.analyzer.analyze(headline);
    if (comparative > this.threshold) return 'Positive';
    if (comparative < -this.threshold) return 'Negative';
    return 'Neutral';
  }

  async classify(headlines: string[]): Promise<Classification[]> {
    return headlines.map((headline) => ({
      topic: this.topicOf(headline),
      sentiment: this.sentimentOf(headline),
    }));
  }
}
