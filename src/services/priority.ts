/**
 * Priority score for the officials' queue, in [0, 1].
 * Urgency sets the base, the category scales it and urgent wording in the
 * text adds a capped boost. Citizens with a long submission history get a
 * slight damping. Spam always scores 0.
 */

import type { Category, Classification, Urgency } from '../types/models.js';
import { containsTerm, defaultLexicon, tokenize, type Lexicon } from '../fallback/lexicon.js';

export const URGENCY_BASE: Record<Urgency, number> = {
  low: 0.2,
  medium: 0.5,
  high: 0.8,
  critical: 0.95,
};

export const CATEGORY_MULTIPLIER: Record<Category, number> = {
  safety: 1.2,
  water: 1.1,
  electricity: 1.1,
  traffic: 1.0,
  sanitation: 0.9,
  infrastructure: 0.8,
  other: 0.7,
};

export const KEYWORD_BOOST = 0.1;
export const MAX_KEYWORD_BOOST = 0.3;

/** Prior submissions above which a citizen's new reports are damped. */
export const FREQUENT_SUBMITTER_THRESHOLD = 10;
export const FREQUENT_SUBMITTER_FACTOR = 0.95;

export function priorityScore(
  classification: Classification,
  text: string,
  priorSubmissions = 0,
  lexicon: Lexicon = defaultLexicon()
): number {
  if (classification.isSpam) return 0;

  const tokens = tokenize(text);
  const hits = lexicon.priorityBoost.filter((term) => containsTerm(tokens, term)).length;
  const boost = Math.min(hits * KEYWORD_BOOST, MAX_KEYWORD_BOOST);

  let score =
    URGENCY_BASE[classification.urgency] * CATEGORY_MULTIPLIER[classification.category] + boost;
  if (priorSubmissions > FREQUENT_SUBMITTER_THRESHOLD) {
    score *= FREQUENT_SUBMITTER_FACTOR;
  }

  return Math.round(Math.min(1, score) * 100) / 100;
}
