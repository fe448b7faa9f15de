/**
 * Deterministic keyword classifier.
 *
 * Used whenever the remote path is unavailable or its output is rejected.
 * No I/O, no clock, no randomness: the same text always yields the same
 * classification, and no input makes it throw.
 */

import { CATEGORIES, type Category, type Classification, type Urgency } from '../types/models.js';
import { containsTerm, defaultLexicon, tokenize, type Lexicon, type WeightedTerm } from './lexicon.js';

/** Confidence reported for every non-empty fallback classification. */
export const FALLBACK_CONFIDENCE = 0.6;
/** Confidence reported for empty or whitespace-only text. */
export const EMPTY_TEXT_CONFIDENCE = 0.3;

/** Minimum urgency score per tier, checked highest first. */
export const URGENCY_THRESHOLDS = { critical: 5, high: 3, medium: 1 } as const;

/** Texts with fewer non-space characters are spam. */
export const MIN_TEXT_LENGTH = 10;
/** Punctuation-to-letter ratio above which a text is spam. */
export const MAX_PUNCTUATION_RATIO = 0.5;
/** Texts with this many links or more are spam. */
export const MAX_LINKS = 3;

const EXCLAMATION_RUN = /!{2,}/;
const SHOUTED_WORD = /\b[A-Z]{4,}\b/;
const LETTER = /\p{L}/gu;
const PUNCTUATION = /[^\p{L}\p{N}\s]/gu;
const LINK = /https?:\/\//gi;

export interface LexicalAnalysis {
  classification: Classification;
  categoryScores: Partial<Record<Category, number>>;
  urgencyScore: number;
  spamReasons: string[];
}

export class LexicalClassifier {
  constructor(private readonly lexicon: Lexicon = defaultLexicon()) {}

  classify(text: string): Classification {
    return this.analyze(text).classification;
  }

  /** Classification plus the scores and spam reasons behind it. */
  analyze(text: string): LexicalAnalysis {
    if (text.trim().length === 0) {
      return {
        classification: {
          category: 'other',
          urgency: 'low',
          isSpam: false,
          confidence: EMPTY_TEXT_CONFIDENCE,
          source: 'fallback',
        },
        categoryScores: {},
        urgencyScore: 0,
        spamReasons: [],
      };
    }

    const tokens = tokenize(text);
    const categoryScores = this.scoreCategories(tokens);
    const urgencyScore = this.scoreUrgency(text, tokens);
    const spamReasons = this.detectSpam(text);

    return {
      classification: {
        category: pickCategory(categoryScores),
        urgency: urgencyForScore(urgencyScore),
        isSpam: spamReasons.length > 0,
        confidence: FALLBACK_CONFIDENCE,
        source: 'fallback',
      },
      categoryScores,
      urgencyScore,
      spamReasons,
    };
  }

  private scoreCategories(tokens: string[]): Partial<Record<Category, number>> {
    const scores: Partial<Record<Category, number>> = {};
    for (const [category, terms] of this.lexicon.categories) {
      const score = sumMatches(tokens, terms);
      if (score > 0) scores[category] = score;
    }
    return scores;
  }

  private scoreUrgency(text: string, tokens: string[]): number {
    let score = sumMatches(tokens, this.lexicon.urgency);
    if (EXCLAMATION_RUN.test(text)) score += 1;
    if (SHOUTED_WORD.test(text)) score += 1;
    return score;
  }

  private detectSpam(text: string): string[] {
    const reasons: string[] = [];

    const visible = text.replace(/\s+/g, '').length;
    if (visible < MIN_TEXT_LENGTH) {
      reasons.push(`too short (${visible} characters)`);
    }

    const letters = text.match(LETTER)?.length ?? 0;
    const punctuation = text.match(PUNCTUATION)?.length ?? 0;
    if (letters === 0) {
      reasons.push('no letters');
    } else if (punctuation / letters > MAX_PUNCTUATION_RATIO) {
      reasons.push('excessive punctuation');
    }

    const links = text.match(LINK)?.length ?? 0;
    if (links >= MAX_LINKS) {
      reasons.push(`too many links (${links})`);
    }

    for (const pattern of this.lexicon.spamPatterns) {
      if (pattern.test(text)) {
        reasons.push(`matches denylist pattern ${pattern.source}`);
      }
    }

    return reasons;
  }
}

function sumMatches(tokens: string[], terms: readonly WeightedTerm[]): number {
  let score = 0;
  for (const term of terms) {
    if (containsTerm(tokens, term)) score += term.weight;
  }
  return score;
}

/** Highest score wins; ties go to the category listed first in CATEGORIES. */
function pickCategory(scores: Partial<Record<Category, number>>): Category {
  let best: Category = 'other';
  let bestScore = 0;
  for (const category of CATEGORIES) {
    const score = scores[category] ?? 0;
    if (score > bestScore) {
      best = category;
      bestScore = score;
    }
  }
  return best;
}

function urgencyForScore(score: number): Urgency {
  if (score >= URGENCY_THRESHOLDS.critical) return 'critical';
  if (score >= URGENCY_THRESHOLDS.high) return 'high';
  if (score >= URGENCY_THRESHOLDS.medium) return 'medium';
  return 'low';
}
