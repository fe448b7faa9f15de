/**
 * Keyword tables for the lexical classifier.
 *
 * The tables are policy, tuned in data/lexicon.json; this module loads them
 * once, validates them and freezes the compiled form. A broken table fails
 * at load, never during classification.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { CATEGORIES, type Category } from '../types/models.js';

export interface WeightedTerm {
  /** The term as written in the table. */
  readonly term: string;
  /** Lowercase tokens, matched as a contiguous run. */
  readonly tokens: readonly string[];
  readonly weight: number;
}

export interface Lexicon {
  readonly categories: ReadonlyMap<Category, readonly WeightedTerm[]>;
  readonly urgency: readonly WeightedTerm[];
  readonly priorityBoost: readonly WeightedTerm[];
  readonly spamPatterns: readonly RegExp[];
}

const TOKEN = /[a-z0-9']+/g;

/** Lowercase word tokens of a text. */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN) ?? [];
}

/** Whether the term's tokens occur as a contiguous run. */
export function containsTerm(tokens: readonly string[], term: WeightedTerm): boolean {
  const n = term.tokens.length;
  for (let i = 0; i + n <= tokens.length; i++) {
    let matched = true;
    for (let j = 0; j < n; j++) {
      if (tokens[i + j] !== term.tokens[j]) {
        matched = false;
        break;
      }
    }
    if (matched) return true;
  }
  return false;
}

function isValidPattern(source: string): boolean {
  try {
    new RegExp(source, 'i');
    return true;
  } catch {
    return false;
  }
}

const TermSchema = z
  .string()
  .min(1)
  .refine((term) => tokenize(term).join(' ') === term, {
    message: 'terms must be lowercase words separated by single spaces',
  });

const WeightedTermsSchema = z.record(TermSchema, z.number().positive());

export const LexiconFileSchema = z.object({
  categories: z.record(z.enum(CATEGORIES), WeightedTermsSchema),
  urgency: WeightedTermsSchema,
  priorityBoost: z.array(TermSchema),
  spamPatterns: z.array(
    z.string().min(1).refine(isValidPattern, { message: 'invalid regular expression' })
  ),
});

export type LexiconFile = z.infer<typeof LexiconFileSchema>;

function compileTerms(terms: Record<string, number>): WeightedTerm[] {
  return Object.entries(terms).map(([term, weight]) =>
    Object.freeze({ term, tokens: Object.freeze(tokenize(term)), weight })
  );
}

/** Validate raw table data and compile it. Throws a ZodError on bad data. */
export function compileLexicon(data: unknown): Lexicon {
  const file = LexiconFileSchema.parse(data);

  const categories = new Map<Category, readonly WeightedTerm[]>();
  for (const category of CATEGORIES) {
    const terms = file.categories[category];
    if (terms) categories.set(category, Object.freeze(compileTerms(terms)));
  }

  return Object.freeze({
    categories,
    urgency: Object.freeze(compileTerms(file.urgency)),
    priorityBoost: Object.freeze(
      file.priorityBoost.map((term) => Object.freeze({ term, tokens: tokenize(term), weight: 1 }))
    ),
    spamPatterns: Object.freeze(file.spamPatterns.map((source) => new RegExp(source, 'i'))),
  });
}

const DEFAULT_LEXICON_URL = new URL('../../data/lexicon.json', import.meta.url);

let cached: Lexicon | null = null;

/** The lexicon shipped in data/lexicon.json, loaded on first use. */
export function defaultLexicon(): Lexicon {
  if (cached) return cached;
  const raw: unknown = JSON.parse(readFileSync(DEFAULT_LEXICON_URL, 'utf8'));
  cached = compileLexicon(raw);
  return cached;
}
